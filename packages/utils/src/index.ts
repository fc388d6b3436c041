export {
	bytesToHex,
	hexToBytes,
	isBytes,
	toBytes,
	utf8ToBytes,
} from "./bytes-utils";
export { HOST_BYTE_ORDER, HOST_LITTLE_ENDIAN, type ByteOrder } from "./endian";
export { parseOptionalBoolean } from "./env-utils";
export { ZodBigInt, ZodUint8Array } from "./schemas";
