import pRetry, { AbortError as StopRetrying } from "p-retry";
import {
	AbortError,
	abortReason,
	isTransientBLEError,
	normalizeError,
} from "../errors/errors";

/**
 * Backoff settings for GATT round trips that fail transiently.
 */
export interface RetryOptions {
	/** Attempts including the first (default: 3) */
	maxAttempts?: number;
	/** Delay before the first retry, in ms (default: 1000) */
	initialDelayMs?: number;
	/** Upper bound for any delay, in ms (default: 30000) */
	maxDelayMs?: number;
	/** Growth factor between consecutive delays (default: 2) */
	backoffMultiplier?: number;
	/** Randomize delays (default: true) */
	jitter?: boolean;
	/** Stops retrying; the call then rejects with AbortError */
	signal?: AbortSignal;
	/** Called before each retry with the failed attempt's number and the nominal delay */
	onRetry?: (attempt: number, delayMs: number, error: Error) => void;
	/** Default: isTransientBLEError */
	isRetryable?: (error: Error) => boolean;
}

export interface RetryPolicy {
	readonly maxAttempts: number;
	readonly initialDelayMs: number;
	readonly maxDelayMs: number;
	readonly backoffMultiplier: number;
	readonly jitter: boolean;
}

/**
 * Fills in defaults and validates. The initial delay is clamped to the
 * maximum.
 *
 * @throws RangeError when `maxAttempts` is not a positive integer
 */
export function resolveRetryPolicy(options: RetryOptions = {}): RetryPolicy {
	const maxAttempts = options.maxAttempts ?? 3;
	if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
		throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
	}
	const maxDelayMs = options.maxDelayMs ?? 30000;
	return {
		maxAttempts,
		initialDelayMs: Math.min(options.initialDelayMs ?? 1000, maxDelayMs),
		maxDelayMs,
		backoffMultiplier: options.backoffMultiplier ?? 2,
		jitter: options.jitter ?? true,
	};
}

/** Nominal delay after failed attempt number `attempt` (1-based), before jitter. */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
	return Math.min(
		policy.initialDelayMs * policy.backoffMultiplier ** (attempt - 1),
		policy.maxDelayMs,
	);
}

/**
 * Runs `operation` until it succeeds, fails with an error that is not worth
 * retrying, or runs out of attempts. Backoff and timing are p-retry's.
 *
 * The Node transport wraps discovery and subscription changes in this.
 * Connection attempts never go through here: reconnects are governed by the
 * session's retry budget.
 *
 * @example
 * ```typescript
 * const services = await withRetry(
 *   () => withTimeout(peripheral.discoverServicesAsync([]), 10000, "Service discovery"),
 *   { maxAttempts: 3, signal: lifetime.signal },
 * );
 * ```
 *
 * @throws The last failure, a non-retryable failure unchanged, or AbortError
 */
export async function withRetry<T>(
	operation: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const policy = resolveRetryPolicy(options);
	const { signal, onRetry, isRetryable = isTransientBLEError } = options;

	if (signal?.aborted) {
		throw new AbortError(abortReason(signal));
	}

	// p-retry rejects with its own wrapper when told to stop; this keeps the original
	let permanent: Error | undefined;

	const attempt = async (): Promise<T> => {
		try {
			return await operation();
		} catch (e) {
			const error = normalizeError(e);
			if (isRetryable(error)) {
				throw error;
			}
			permanent = error;
			throw new StopRetrying(error.message);
		}
	};

	try {
		return await pRetry(attempt, {
			retries: policy.maxAttempts - 1,
			minTimeout: policy.initialDelayMs,
			maxTimeout: policy.maxDelayMs,
			factor: policy.backoffMultiplier,
			randomize: policy.jitter,
			...(signal && { signal }),
			onFailedAttempt: (failure) => {
				if (failure.retriesLeft > 0) {
					onRetry?.(
						failure.attemptNumber,
						retryDelay(policy, failure.attemptNumber),
						failure,
					);
				}
			},
		});
	} catch (e) {
		if (signal?.aborted) {
			throw new AbortError(abortReason(signal));
		}
		throw permanent ?? e;
	}
}
