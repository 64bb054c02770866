export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Minimal logging surface used throughout the library.
 * Pass your own implementation (pino, winston, ...) through the session
 * options, or use {@link noopLogger} to silence the library entirely.
 */
export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
	/**
	 * Prefix written before every message.
	 * @default '[ble-session]'
	 */
	prefix?: string;
	/**
	 * Lowest level that is written.
	 * @default 'warn'
	 */
	level?: LogLevel;
}

export const DEFAULT_LOG_PREFIX = "[ble-session]";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export const noopLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};

/**
 * Creates a logger writing to the console with a fixed prefix.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ prefix: "[thermostat]", level: "debug" });
 * logger.info("Connected", { peer: "AA:BB" });
 * // console.info("[thermostat] Connected", { peer: "AA:BB" })
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const prefix = options.prefix ?? DEFAULT_LOG_PREFIX;
	const threshold = LEVEL_ORDER[options.level ?? "warn"];

	function enabled(level: Exclude<LogLevel, "silent">): boolean {
		return LEVEL_ORDER[level] >= threshold;
	}

	return {
		debug(message, ...details) {
			if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
		},
		info(message, ...details) {
			if (enabled("info")) console.info(`${prefix} ${message}`, ...details);
		},
		warn(message, ...details) {
			if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
		},
		error(message, ...details) {
			if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
		},
	};
}

/** Renders an unknown failure for a log line */
export function describeError(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
