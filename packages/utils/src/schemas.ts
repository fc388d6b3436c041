import { z } from "zod/v4";
import { hexToBytes, isBytes, toBytes } from "./bytes-utils";

// Conversions that fail leave the input as is so the inner schema reports it
export const ZodUint8Array = z.preprocess(
	(val) => {
		if (typeof val === "string" && /^([0-9a-fA-F]{2})*$/.test(val)) {
			return hexToBytes(val);
		}
		if (isBytes(val)) return toBytes(val);
		return val;
	},
	z.instanceof(Uint8Array),
);

const toBigInt = (val: unknown): unknown => {
	if (typeof val === "number" && Number.isInteger(val)) return BigInt(val);
	if (typeof val === "string" && /^-?\d+$/.test(val.trim())) {
		return BigInt(val.trim());
	}
	return val;
};

export const ZodBigInt = z.preprocess(toBigInt, z.bigint());
