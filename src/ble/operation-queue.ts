import { AbortError, abortReason, normalizeError } from "../errors/errors";

/**
 * Options for creating an operation queue.
 */
export interface OperationQueueOptions {
	/**
	 * AbortSignal that rejects every pending operation and refuses new ones.
	 */
	signal?: AbortSignal;
}

/**
 * A per-key operation queue. Operations sharing a key run one after another;
 * operations on different keys run independently.
 *
 * The session keys request/response exchanges by notify endpoint, so a
 * second `sendAndWait` on an endpoint only dispatches once the previous one
 * has resolved and cannot observe its reply.
 *
 * @example
 * ```typescript
 * const queue = createOperationQueue();
 *
 * // Runs sequentially: the second exchange starts after the first settles
 * const [a, b] = await Promise.all([
 *   queue.enqueue(key, () => exchange("PING")),
 *   queue.enqueue(key, () => exchange("STATUS")),
 * ]);
 * ```
 */
export interface OperationQueue {
	/**
	 * Enqueues an operation under `key`. It runs once every earlier
	 * operation under the same key has settled.
	 *
	 * @throws AbortError (as rejection) if the queue's signal is aborted or the
	 * operation is cleared before it starts
	 */
	enqueue<T>(key: string, operation: () => Promise<T>): Promise<T>;

	/** Number of queued plus running operations under `key`. */
	getQueueDepth(key: string): number;

	/**
	 * Rejects every operation that has not started yet with AbortError.
	 * Running operations complete normally; the queue stays usable.
	 */
	clear(): void;
}

interface QueueEntry {
	started: boolean;
	cancelled: boolean;
	reject: (error: Error) => void;
}

export function createOperationQueue(
	options: OperationQueueOptions = {},
): OperationQueue {
	const { signal } = options;

	// Promise chain per key, acts as a mutex
	const tails = new Map<string, Promise<void>>();
	const entries = new Map<string, Set<QueueEntry>>();

	function cancelWaiting(reason: string): void {
		for (const set of entries.values()) {
			for (const entry of set) {
				if (!entry.started && !entry.cancelled) {
					entry.cancelled = true;
					entry.reject(new AbortError(reason));
				}
			}
		}
	}

	signal?.addEventListener(
		"abort",
		() => {
			cancelWaiting(abortReason(signal));
		},
		{ once: true },
	);

	function enqueue<T>(key: string, operation: () => Promise<T>): Promise<T> {
		if (signal?.aborted) {
			return Promise.reject(new AbortError(abortReason(signal)));
		}

		let set = entries.get(key);
		if (!set) {
			set = new Set();
			entries.set(key, set);
		}
		const pending = set;

		return new Promise<T>((resolve, reject) => {
			const entry: QueueEntry = { started: false, cancelled: false, reject };
			pending.add(entry);

			const run = async (): Promise<void> => {
				if (entry.cancelled) return;
				entry.started = true;
				try {
					resolve(await operation());
				} catch (e) {
					reject(normalizeError(e));
				}
			};

			const tail = (tails.get(key) ?? Promise.resolve())
				.then(run)
				.finally(() => {
					pending.delete(entry);
					if (pending.size === 0 && entries.get(key) === pending) {
						entries.delete(key);
					}
					if (tails.get(key) === tail) {
						tails.delete(key);
					}
				});
			tails.set(key, tail);
		});
	}

	function getQueueDepth(key: string): number {
		let depth = 0;
		for (const entry of entries.get(key) ?? []) {
			if (!entry.cancelled) depth++;
		}
		return depth;
	}

	function clear(): void {
		cancelWaiting("Queue has been cleared");
	}

	return {
		enqueue,
		getQueueDepth,
		clear,
	};
}
