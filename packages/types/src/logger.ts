// Logger interface - pino-compatible, `console` satisfies it as well
export interface ILogger {
	trace(...data: unknown[]): void;
	debug(...data: unknown[]): void;
	info(obj: unknown, msg?: string): void;
	warn(obj: unknown, msg?: string): void;
	error(obj: unknown, msg?: string): void;
}
