// Utility functions for parsing environment values

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

/**
 * Parses an optional flag from a string value.
 * @param value The string value to parse, typically an environment variable.
 * @param fallback Returned when the value is missing or not a recognized flag.
 */
export function parseOptionalBoolean(
	value: string | undefined | null,
	fallback = false,
): boolean {
	if (value === undefined || value === null) {
		return fallback;
	}
	const normalized = value.trim().toLowerCase();
	if (TRUTHY.has(normalized)) return true;
	if (FALSY.has(normalized)) return false;
	return fallback;
}
