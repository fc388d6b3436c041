export {
	bytesToHex,
	hexToBytes,
	utf8ToBytes,
} from "@noble/ciphers/utils";

/** Normalize a byte span given either as a `Uint8Array` or a plain number array. */
export const toBytes = (bytes: Uint8Array | readonly number[]): Uint8Array => {
	return bytes instanceof Uint8Array ? bytes : Uint8Array.from(bytes);
};

export const isBytes = (value: unknown): value is Uint8Array | number[] => {
	if (value instanceof Uint8Array) {
		return true;
	}
	if (Array.isArray(value)) {
		return value.every(
			(v) => typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 255,
		);
	}
	return false;
};
