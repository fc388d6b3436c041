export type ByteOrder = "little" | "big";

const detectHostByteOrder = (): ByteOrder => {
	const probe = new Uint16Array([0x0102]);
	return new Uint8Array(probe.buffer)[0] === 0x02 ? "little" : "big";
};

/** Byte order of the machine running this process. */
export const HOST_BYTE_ORDER: ByteOrder = detectHostByteOrder();

/**
 * Flag for the `littleEndian` argument of `DataView` accessors that
 * selects the host's native layout.
 */
export const HOST_LITTLE_ENDIAN = HOST_BYTE_ORDER === "little";
