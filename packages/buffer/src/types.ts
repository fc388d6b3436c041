import type { ILogger } from "@wirebuf/types";
import type { z } from "zod/v4";
import type { BufferValueSchema } from "./schemas";

/** A single typed operand for `OutBuffer.add`, tagged with its wire encoding. */
export type BufferValue = z.infer<typeof BufferValueSchema>;

export type BufferValueType = BufferValue["type"];

export interface OutBufferOptions {
	/** Check capacity and use-after-move on every append. Off by default. */
	assertions?: boolean;
	logger?: ILogger;
}
