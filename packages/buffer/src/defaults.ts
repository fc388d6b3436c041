import type { ILogger } from "@wirebuf/types";
import { parseOptionalBoolean } from "@wirebuf/utils";

// Largest capacity a buffer accepts, capacities are unsigned 32-bit
export const MAX_BUFFER_CAPACITY = 0xffffffff;

export const ASSERTIONS_ENV_VAR = "WIREBUF_ASSERTIONS";

const noop = (): void => {};

// Appends, copies and moves stay free of I/O unless a logger is passed in
export const SILENT_LOGGER: ILogger = {
	trace: noop,
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};

export const DEFAULT_BUFFER_CONFIG = {
	// debug-only checks, never on unless asked for
	assertions: parseOptionalBoolean(process.env[ASSERTIONS_ENV_VAR]),
	logger: SILENT_LOGGER,
};
