/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
export const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/** Options shared by the parser and the table instance. */
export type STTOptions = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/** Returns a debug log function which is a no-op unless `debug` is set. */
export function createDebugLog(
	options: STTOptions = {}
): (...args: unknown[]) => void {
	const logger = options.logger ?? defaultLogger;
	return options.debug
		? (...args: unknown[]) => {
				logger.debug("[STT]", ...args);
		  }
		: () => {};
}
