import {
	AbortError,
	type DisconnectedError,
	RequestTimeoutError,
} from "../errors/errors";
import type { TypedEventEmitter } from "../state/event-emitter";
import type {
	Endpoint,
	RequestCallback,
	RequestOutcome,
	TransportEvents,
} from "../types";
import { bytesEqual, matchesPattern } from "../utils/bytes";
import { describeError, type Logger } from "../utils/logger";
import { endpointKey, sameEndpoint } from "./endpoints";
import type { OperationQueue } from "./operation-queue";

export interface CorrelatorOptions {
	events: TypedEventEmitter<TransportEvents>;
	logger: Logger;
	/**
	 * When set, requests on the same endpoint are serialized: a request is
	 * dispatched (and its deadline starts) only after the previous one settled.
	 */
	queue?: OperationQueue;
}

export interface RequestPlan {
	/** Notify endpoint the response is expected on */
	endpoint: Endpoint;
	/** Encoded pattern; `null` never matches */
	expected: Uint8Array | null;
	timeoutMs: number;
	/** Writes the command. Called after the timer is armed and the listener attached. */
	dispatch: () => void;
}

/** Handle to one outstanding request/response exchange. */
export interface RequestHandle {
	readonly id: number;
	/** True once an outcome was delivered */
	readonly settled: boolean;
	/** Resolves the request with AbortError unless it already settled */
	cancel(reason?: string): void;
}

export interface ResponseCorrelator {
	begin(plan: RequestPlan, onComplete: RequestCallback): RequestHandle;
	/** Settles every outstanding request with `error` */
	cancelAll(error: DisconnectedError | AbortError): void;
	readonly pendingCount: number;
}

interface PendingRequest {
	readonly id: number;
	readonly plan: RequestPlan;
	readonly onComplete: RequestCallback;
	settled: boolean;
	timer: ReturnType<typeof setTimeout> | undefined;
	unsubscribe: (() => void) | undefined;
	/** Previous value seen by this request; duplicates are not re-evaluated */
	previous: Uint8Array | undefined;
	/** Frees the request's queue slot */
	release: (() => void) | undefined;
}

/**
 * Creates the request/response correlator.
 *
 * Each request goes through the same steps in one synchronous run: arm the
 * deadline timer, attach a `valueUpdate` listener, dispatch the write. The
 * first of {matching value, deadline, cancel} settles it; settling clears the
 * timer, detaches the listener and releases the queue slot, so late events
 * are no-ops.
 *
 * Deduplication is per request: consecutive identical values on the endpoint
 * count as one evaluation, and a new request starts with no previous value.
 *
 * @example
 * ```typescript
 * const handle = correlator.begin(
 *   {
 *     endpoint: tx,
 *     expected: encodePattern("PONG"),
 *     timeoutMs: 2000,
 *     dispatch: () => dispatcher.write(prepared),
 *   },
 *   (outcome) => {
 *     if (outcome.ok) console.log("reply", decodeText(outcome.value));
 *   },
 * );
 * ```
 */
export function createResponseCorrelator(
	options: CorrelatorOptions,
): ResponseCorrelator {
	const { events, logger, queue } = options;
	const pending = new Map<number, PendingRequest>();
	let nextId = 1;

	function settle(request: PendingRequest, outcome: RequestOutcome): void {
		if (request.settled) return;
		request.settled = true;

		if (request.timer !== undefined) {
			clearTimeout(request.timer);
			request.timer = undefined;
		}
		request.unsubscribe?.();
		request.unsubscribe = undefined;
		request.release?.();
		request.release = undefined;
		pending.delete(request.id);

		logger.debug(
			`Request #${request.id} settled: ${outcome.ok ? "matched" : outcome.error.name}`,
		);

		try {
			request.onComplete(outcome);
		} catch (e) {
			logger.error(`Request #${request.id} completion callback threw:`, e);
		}
	}

	function handleValue(
		request: PendingRequest,
		data: TransportEvents["valueUpdate"],
	): void {
		if (request.settled || !sameEndpoint(data.endpoint, request.plan.endpoint)) {
			return;
		}
		if (data.error || data.value === undefined) {
			return;
		}

		const value = data.value;
		if (request.previous && bytesEqual(request.previous, value)) {
			return;
		}
		request.previous = Uint8Array.from(value);

		if (matchesPattern(value, request.plan.expected)) {
			settle(request, { ok: true, value: Uint8Array.from(value) });
		}
	}

	function start(request: PendingRequest): void {
		if (request.settled) {
			request.release?.();
			return;
		}

		const { timeoutMs } = request.plan;
		request.timer = setTimeout(() => {
			request.timer = undefined;
			settle(request, { ok: false, error: new RequestTimeoutError(timeoutMs) });
		}, timeoutMs);

		request.unsubscribe = events.on("valueUpdate", (data) => {
			handleValue(request, data);
		});

		try {
			request.plan.dispatch();
		} catch (e) {
			logger.error(`Request #${request.id} dispatch failed:`, e);
			settle(request, {
				ok: false,
				error: new AbortError(`Dispatch failed: ${describeError(e)}`),
			});
		}
	}

	function begin(
		plan: RequestPlan,
		onComplete: RequestCallback,
	): RequestHandle {
		const request: PendingRequest = {
			id: nextId++,
			plan,
			onComplete,
			settled: false,
			timer: undefined,
			unsubscribe: undefined,
			previous: undefined,
			release: undefined,
		};
		pending.set(request.id, request);

		if (queue) {
			queue
				.enqueue(
					endpointKey(plan.endpoint),
					() =>
						new Promise<void>((resolve) => {
							request.release = resolve;
							start(request);
						}),
				)
				.catch((e: unknown) => {
					settle(request, {
						ok: false,
						error: new AbortError(describeError(e)),
					});
				});
		} else {
			start(request);
		}

		return {
			id: request.id,
			get settled() {
				return request.settled;
			},
			cancel(reason = "Request cancelled") {
				settle(request, { ok: false, error: new AbortError(reason) });
			},
		};
	}

	function cancelAll(error: DisconnectedError | AbortError): void {
		for (const request of [...pending.values()]) {
			settle(request, { ok: false, error });
		}
	}

	return {
		begin,
		cancelAll,
		get pendingCount() {
			return pending.size;
		},
	};
}
