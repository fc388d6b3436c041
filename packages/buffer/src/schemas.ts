import type { ILogger } from "@wirebuf/types";
import { ZodBigInt, ZodUint8Array } from "@wirebuf/utils";
import { z } from "zod/v4";

const isLogger = (value: unknown): value is ILogger => {
	if (typeof value !== "object" || value === null) return false;
	return (["trace", "debug", "info", "warn", "error"] as const).every(
		(level) => level in value && typeof Reflect.get(value, level) === "function",
	);
};

export const OutBufferOptionsSchema = z.object({
	assertions: z.boolean().optional(),
	logger: z.custom<ILogger>(isLogger, "Expected a logger").optional(),
});

const intValue = <T extends string>(type: T, min: number, max: number) =>
	z.object({
		type: z.literal(type),
		value: z.number().int().min(min).max(max),
	});

const bigIntValue = <T extends string>(type: T, min: bigint, max: bigint) =>
	z.object({
		type: z.literal(type),
		value: ZodBigInt.pipe(z.bigint().min(min).max(max)),
	});

const floatValue = <T extends string>(type: T) =>
	z.object({
		type: z.literal(type),
		value: z.number(),
	});

export const BufferValueSchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("bytes"),
		value: ZodUint8Array,
		length: z.number().int().min(0).optional(),
	}),
	z.object({
		type: z.literal("string"),
		value: z.string(),
	}),
	intValue("uint8", 0, 0xff),
	intValue("int8", -0x80, 0x7f),
	intValue("uint16", 0, 0xffff),
	intValue("int16", -0x8000, 0x7fff),
	intValue("uint32", 0, 0xffffffff),
	intValue("int32", -0x80000000, 0x7fffffff),
	bigIntValue("uint64", 0n, 0xffffffffffffffffn),
	bigIntValue("int64", -0x8000000000000000n, 0x7fffffffffffffffn),
	floatValue("float"),
	floatValue("double"),
]);

export const BufferValueListSchema = z.array(BufferValueSchema);
