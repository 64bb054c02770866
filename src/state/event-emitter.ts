import { createConsoleLogger, type Logger } from "../utils/logger";

export type EventMap = { [key: string]: unknown };

/**
 * Event emitter keyed by an event map, so each event name fixes its payload type.
 * Transports publish their inbound radio events through one of these.
 *
 * @example
 * ```typescript
 * const events = createEventEmitter<TransportEvents>({ logger });
 * const stop = events.on("valueUpdate", ({ endpoint, value }) => {
 *   if (value) logger.debug(`${endpoint.uuid}: ${value.byteLength} bytes`);
 * });
 * stop();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	once<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	emit<K extends keyof T>(event: K, data: T[K]): void;
	listenerCount<K extends keyof T>(event: K): number;
}

export interface EventEmitterOptions {
	/** Receives errors thrown by listeners. Defaults to a console logger. */
	logger?: Logger;
}

interface ListenerEntry<D> {
	callback: (data: D) => void;
	once: boolean;
}

type ListenerTable<T extends EventMap> = {
	[K in keyof T]?: ListenerEntry<T[K]>[];
};

export function createEventEmitter<T extends EventMap>(
	options: EventEmitterOptions = {},
): TypedEventEmitter<T> {
	const logger = options.logger ?? createConsoleLogger();
	const table: ListenerTable<T> = {};

	function add<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
		once: boolean,
	): () => void {
		const entry: ListenerEntry<T[K]> = { callback, once };
		const entries = table[event];
		if (entries) {
			entries.push(entry);
		} else {
			table[event] = [entry];
		}
		return () => {
			removeEntry(event, entry);
		};
	}

	function removeEntry<K extends keyof T>(
		event: K,
		entry: ListenerEntry<T[K]>,
	): void {
		const entries = table[event];
		if (!entries) return;
		const index = entries.indexOf(entry);
		if (index >= 0) {
			entries.splice(index, 1);
		}
		if (entries.length === 0) {
			delete table[event];
		}
	}

	function on<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		return add(event, callback, false);
	}

	function once<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		return add(event, callback, true);
	}

	function off<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): void {
		const entry = table[event]?.find((e) => e.callback === callback);
		if (entry) {
			removeEntry(event, entry);
		}
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event !== undefined) {
			delete table[event];
			return;
		}
		for (const key in table) {
			delete table[key];
		}
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const entries = table[event];
		if (!entries) return;

		// Snapshot: listeners added or removed during emit take effect next time
		for (const entry of [...entries]) {
			if (entry.once) {
				removeEntry(event, entry);
			}
			try {
				entry.callback(data);
			} catch (err) {
				logger.error(
					`Listener for "${String(event)}" threw an error:`,
					err,
				);
			}
		}
	}

	function listenerCount<K extends keyof T>(event: K): number {
		return table[event]?.length ?? 0;
	}

	return {
		on,
		once,
		off,
		removeAllListeners,
		emit,
		listenerCount,
	};
}
