import type { SessionObserver } from "../types";
import { createConsoleLogger, DEFAULT_LOG_PREFIX, type Logger } from "../utils/logger";

/** Automatic reconnect attempts after an unexpected drop */
export const DEFAULT_RETRY_COUNT = 3;

/** Connection watchdog in milliseconds */
export const DEFAULT_CONNECTION_TIMEOUT_MS = 20000;

/** Appended to every text command */
export const DEFAULT_COMMAND_TERMINATOR = "\n";

export interface SessionOptions {
	/**
	 * Automatic reconnect attempts after the link drops with an error.
	 * @default 3
	 */
	retryCount?: number;
	/**
	 * How long a connect or reconnect attempt may take before it is reported
	 * as a ConnectionTimeoutError.
	 * @default 20000
	 */
	connectionTimeoutMs?: number;
	/**
	 * Appended to text commands before encoding. Byte commands are written
	 * verbatim.
	 * @default '\n'
	 */
	commandTerminator?: string;
	/**
	 * Serialize `sendAndWait` calls per notify endpoint, so a request cannot
	 * observe the reply to the previous one.
	 * @default true
	 */
	serializeRequests?: boolean;
	/** Logger for lifecycle events and declined sends */
	logger?: Logger;
	/**
	 * Prefix of the default console logger. Ignored when `logger` is set.
	 * @default '[ble-session]'
	 */
	logPrefix?: string;
	/** Initial observer; can be replaced with `setObserver` */
	observer?: SessionObserver;
}

export interface ResolvedSessionOptions {
	retryCount: number;
	connectionTimeoutMs: number;
	commandTerminator: string;
	serializeRequests: boolean;
	logger: Logger;
	observer: SessionObserver | undefined;
}

/**
 * Applies defaults and validates session options.
 *
 * @throws RangeError if `retryCount` is not a non-negative integer or
 * `connectionTimeoutMs` is not a positive finite number
 * @throws TypeError if `commandTerminator` is not a string
 */
export function resolveSessionOptions(
	options: SessionOptions = {},
): ResolvedSessionOptions {
	const {
		retryCount = DEFAULT_RETRY_COUNT,
		connectionTimeoutMs = DEFAULT_CONNECTION_TIMEOUT_MS,
		commandTerminator = DEFAULT_COMMAND_TERMINATOR,
		serializeRequests = true,
	} = options;

	if (!Number.isInteger(retryCount) || retryCount < 0) {
		throw new RangeError(
			`retryCount must be a non-negative integer, got ${retryCount}`,
		);
	}

	if (!Number.isFinite(connectionTimeoutMs) || connectionTimeoutMs <= 0) {
		throw new RangeError(
			`connectionTimeoutMs must be a positive number, got ${connectionTimeoutMs}`,
		);
	}

	if (typeof commandTerminator !== "string") {
		throw new TypeError(
			`commandTerminator must be a string, got ${typeof commandTerminator}`,
		);
	}

	return {
		retryCount,
		connectionTimeoutMs,
		commandTerminator,
		serializeRequests,
		logger:
			options.logger ??
			createConsoleLogger({ prefix: options.logPrefix ?? DEFAULT_LOG_PREFIX }),
		observer: options.observer,
	};
}
