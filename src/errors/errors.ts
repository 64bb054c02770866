/**
 * Error thrown or reported when an operation does not finish in time.
 *
 * Note: the underlying radio operation may still complete in the background
 * after a timeout is reported. Radio stacks do not support true operation
 * cancellation.
 */
export class TimeoutError extends Error {
	constructor(
		public readonly operation: string,
		public readonly timeout: number,
	) {
		super(`${operation} timed out after ${timeout}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * The connection watchdog expired before the transport confirmed the
 * connection, either on the initial connect or on a reconnect attempt.
 */
export class ConnectionTimeoutError extends TimeoutError {
	constructor(
		public readonly peerId: string,
		timeout: number,
		public readonly reconnecting = false,
	) {
		super(reconnecting ? "Reconnection" : "Connection", timeout);
		this.name = "ConnectionTimeoutError";
	}
}

/**
 * The transport dropped the link with an error and no retries were left
 * (or the initial connect attempt itself failed).
 */
export class ConnectionDroppedError extends Error {
	constructor(
		public readonly peerId: string,
		public override readonly cause: Error,
	) {
		super(`Connection to ${peerId} dropped: ${cause.message}`);
		this.name = "ConnectionDroppedError";
	}
}

/**
 * The link was closed (by the caller or cleanly by the peer) while an
 * operation was still outstanding.
 */
export class DisconnectedError extends Error {
	constructor(message = "Disconnected") {
		super(message);
		this.name = "DisconnectedError";
	}
}

export class NoWritableEndpointError extends Error {
	constructor(message = "No writable endpoint available") {
		super(message);
		this.name = "NoWritableEndpointError";
	}
}

export class NoNotifiableEndpointError extends Error {
	constructor(message = "No notifiable endpoint available") {
		super(message);
		this.name = "NoNotifiableEndpointError";
	}
}

/** No matching notification arrived within the caller's deadline. */
export class RequestTimeoutError extends TimeoutError {
	constructor(timeout: number) {
		super("Request", timeout);
		this.name = "RequestTimeoutError";
	}
}

/** The command could not be converted to transport bytes. */
export class EncodingError extends Error {
	constructor(reason: string) {
		super(`Cannot encode command: ${reason}`);
		this.name = "EncodingError";
	}
}

/** An operation was called in a phase that does not allow it. */
export class InvalidStateError extends Error {
	constructor(
		public readonly operation: string,
		public readonly phase: string,
	) {
		super(`Cannot ${operation} while ${phase}`);
		this.name = "InvalidStateError";
	}
}

/**
 * Error reported when an operation is aborted via AbortSignal or an explicit
 * cancel.
 */
export class AbortError extends Error {
	constructor(message = "Operation aborted") {
		super(message);
		this.name = "AbortError";
	}
}

/**
 * Reads a human readable reason out of an aborted signal.
 */
export function abortReason(signal: AbortSignal): string {
	const reason: unknown = signal.reason;
	if (reason instanceof Error) {
		return reason.message;
	}
	return typeof reason === "string" ? reason : "Operation aborted";
}

/**
 * Turns whatever a radio stack rejected with into an Error. Strings become the
 * message; plain objects are serialized when possible.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}
	switch (typeof e) {
		case "string":
			return new Error(e);
		case "object": {
			if (e === null) return new Error("null");
			try {
				return new Error(JSON.stringify(e));
			} catch {
				return new Error(String(e));
			}
		}
		default:
			return new Error(String(e));
	}
}

/**
 * Rejects with TimeoutError when `promise` has not settled within `ms`.
 * The underlying radio operation keeps running.
 *
 * @example
 * ```typescript
 * const services = await withTimeout(
 *   peripheral.discoverServicesAsync([]),
 *   10000,
 *   "Service discovery",
 * );
 * ```
 */
export function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	label: string,
): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(new TimeoutError(label, ms));
		}, ms);
	});
	return Promise.race([promise, deadline]).finally(() => {
		clearTimeout(timer);
	});
}

const PERMANENT_FAILURES = [
	/permission denied/,
	/unauthori[sz]ed/,
	/unsupported/,
	/not found/,
	/powered ?off/,
	/unknown (peer|peripheral|endpoint)/,
];

const TRANSIENT_FAILURES = [
	/gatt/,
	/att error/,
	/busy/,
	/connection/,
	/disconnect/,
	/not connected/,
	/operation failed/,
];

/**
 * Decides whether a failed GATT operation is worth another attempt.
 *
 * Timeouts are transient and aborts never are. Otherwise the name and message
 * are matched against known permanent failures first, then transient ones;
 * anything unrecognized is not retried.
 */
export function isTransientBLEError(error: Error): boolean {
	if (error instanceof AbortError || error.name === "AbortError") {
		return false;
	}
	if (error instanceof TimeoutError || error.name === "TimeoutError") {
		return true;
	}

	const text = `${error.name} ${error.message}`.toLowerCase();
	if (PERMANENT_FAILURES.some((pattern) => pattern.test(text))) {
		return false;
	}
	return TRANSIENT_FAILURES.some((pattern) => pattern.test(text));
}
