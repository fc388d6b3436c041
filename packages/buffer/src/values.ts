import { BufferValueListSchema } from "./schemas";
import type { BufferValue } from "./types";

/**
 * Validate tagged values coming from an untyped source (JSON, a config
 * file) before they are handed to `OutBuffer.addAll`. Hex strings and
 * number arrays are accepted for `bytes`, decimal strings for 64-bit values.
 */
export const parseBufferValues = (input: unknown): BufferValue[] => {
	return BufferValueListSchema.parse(input);
};
