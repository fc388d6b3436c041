export {
	ASSERTIONS_ENV_VAR,
	DEFAULT_BUFFER_CONFIG,
	MAX_BUFFER_CAPACITY,
	SILENT_LOGGER,
} from "./defaults";
export {
	BufferAllocationError,
	BufferMovedError,
	BufferOverrunError,
} from "./errors";
export { OutBuffer } from "./out-buffer";
export {
	BufferValueListSchema,
	BufferValueSchema,
	OutBufferOptionsSchema,
} from "./schemas";
export type { BufferValue, BufferValueType, OutBufferOptions } from "./types";
export { parseBufferValues } from "./values";
