import {
	createConnectionManager,
	type ConnectOptions,
} from "../ble/connection";
import {
	createResponseCorrelator,
	type RequestHandle,
} from "../ble/correlator";
import { createCommandDispatcher, type WriteTarget } from "../ble/dispatcher";
import {
	endpointKey,
	findEndpoint,
	notifiable,
	sameEndpoint,
	writable,
} from "../ble/endpoints";
import { createOperationQueue } from "../ble/operation-queue";
import {
	AbortError,
	abortReason,
	DisconnectedError,
	InvalidStateError,
	NoNotifiableEndpointError,
} from "../errors/errors";
import type { TransitionCallback } from "../state/state-machine";
import type {
	AdapterState,
	BLETransport,
	Command,
	ConnectionPhase,
	ConnectOutcome,
	Endpoint,
	Expected,
	Peer,
	RequestCallback,
	RequestError,
	RequestOutcome,
	ScanOptions,
	Service,
	SessionObserver,
} from "../types";
import { encodePattern } from "../utils/bytes";
import { createEventFanOut } from "./fan-out";
import { resolveSessionOptions, type SessionOptions } from "./options";

export interface SendAndWaitOptions {
	/** Cancels the request; it then resolves with AbortError */
	signal?: AbortSignal;
	/** Write target; defaults to the first writable endpoint */
	target?: WriteTarget;
}

/**
 * A client session over one peer link: connection lifecycle with bounded
 * automatic reconnect, fire-and-forget commands, and request/response
 * exchanges correlated against value notifications.
 */
export interface BLESession {
	readonly phase: ConnectionPhase;
	/** The peer while connected, `null` otherwise */
	readonly connectedPeer: Peer | null;
	readonly retriesLeft: number;
	readonly adapterState: AdapterState;
	readonly services: readonly Service[];
	/** Every endpoint discovered on the connected peer, over all services */
	readonly endpoints: readonly Endpoint[];
	readonly writableEndpoints: readonly Endpoint[];
	readonly notifiableEndpoints: readonly Endpoint[];
	/** Number of `sendAndWait` calls that have not settled yet */
	readonly pendingRequests: number;

	/** Last value notified on `endpoint` during this connection */
	lastValue(endpoint: Endpoint): Uint8Array | undefined;
	findEndpoint(uuid: string, serviceUuid?: string): Endpoint | undefined;

	/**
	 * Registers the observer for every transport event. The session does not
	 * keep the observer alive; pass `undefined` to unregister.
	 */
	setObserver(observer: SessionObserver | undefined): void;

	startScan(serviceUuids?: readonly string[], options?: ScanOptions): void;
	stopScan(): void;

	connect(peer: Peer, options?: ConnectOptions): Promise<ConnectOutcome>;
	disconnect(peer?: Peer): boolean;

	/**
	 * Enables or disables notifications on `endpoint`, or on the first
	 * notifiable endpoint. Returns false when there is no such endpoint or the
	 * session is not connected.
	 */
	setNotifying(enabled: boolean, endpoint?: Endpoint): boolean;

	/**
	 * Writes a command without waiting for anything. Returns false, after
	 * logging why, when it was declined.
	 */
	send(command: Command, target?: WriteTarget): boolean;

	/**
	 * Writes a command and waits for a notification that equals or contains
	 * `expected`, on the first notifiable endpoint. Notifications are enabled
	 * on that endpoint first when needed.
	 *
	 * The callback is invoked exactly once. Endpoint and encoding failures are
	 * delivered before this returns.
	 */
	sendAndWait(
		command: Command,
		expected: Expected,
		timeoutMs: number,
		callback: RequestCallback,
		target?: WriteTarget,
	): RequestHandle;
	/** Same as the callback form, resolved with the outcome. Never rejects. */
	sendAndWait(
		command: Command,
		expected: Expected,
		timeoutMs: number,
		options?: SendAndWaitOptions,
	): Promise<RequestOutcome>;

	onPhaseChange(callback: TransitionCallback): () => void;

	/**
	 * Cancels pending requests, disconnects and detaches from the transport.
	 * The transport itself stays owned by the caller.
	 */
	dispose(): void;
}

/**
 * Creates a session on top of a transport.
 *
 * @example
 * ```typescript
 * const transport = await createNobleTransport();
 * const session = createBLESession(transport, { retryCount: 2 });
 *
 * session.setObserver(observer);
 * session.startScan(["ffe0"]);
 *
 * const connected = await session.connect(peer);
 * if (connected.ok) {
 *   const reply = await session.sendAndWait("PING", "PONG", 2000);
 *   if (reply.ok) console.log(decodeText(reply.value));
 * }
 * ```
 *
 * @throws RangeError or TypeError for invalid options
 */
export function createBLESession(
	transport: BLETransport,
	options: SessionOptions = {},
): BLESession {
	const resolved = resolveSessionOptions(options);
	const { logger } = resolved;

	const fanOut = createEventFanOut(logger);
	fanOut.setObserver(resolved.observer);

	let adapterState: AdapterState = transport.adapterState ?? "unknown";
	let services: Service[] = [];
	let endpoints: Endpoint[] = [];
	const lastValues = new Map<string, Uint8Array>();
	const notifying = new Set<string>();
	let disposed = false;

	const queue = resolved.serializeRequests ? createOperationQueue() : undefined;

	const correlator = createResponseCorrelator({
		events: transport.events,
		logger,
		...(queue && { queue }),
	});

	const dispatcher = createCommandDispatcher({
		transport,
		endpoints: () => endpoints,
		terminator: resolved.commandTerminator,
		logger,
	});

	function clearEndpointCache(): void {
		services = [];
		endpoints = [];
		lastValues.clear();
		notifying.clear();
	}

	const connection = createConnectionManager({
		transport,
		retryCount: resolved.retryCount,
		connectionTimeoutMs: resolved.connectionTimeoutMs,
		logger,
		hooks: {
			onEstablished(peer) {
				clearEndpointCache();
				transport.discoverServices(peer);
			},
			onInterrupted() {
				clearEndpointCache();
			},
			onReleased(_peer, error) {
				clearEndpointCache();
				correlator.cancelAll(
					new DisconnectedError(
						error ? `Disconnected: ${error.message}` : "Disconnected",
					),
				);
			},
			onFailure(error) {
				fanOut.connectionError(error);
			},
		},
	});

	const unsubscribePhase = connection.onPhaseChange((from, to) => {
		logger.debug(`Phase ${from} -> ${to}`);
		fanOut.phaseChange(from, to);
	});

	function isCurrentPeer(peer: Peer): boolean {
		return connection.peer?.id === peer.id;
	}

	const { events } = transport;
	const unsubscribers = [
		unsubscribePhase,
		events.on("stateChange", ({ state }) => {
			adapterState = state;
			fanOut.adapterStateChange(state);
			connection.handleAdapterState(state);
		}),
		events.on("discover", ({ peer, advertisement, rssi }) => {
			fanOut.discover(peer, advertisement, rssi);
		}),
		events.on("servicesDiscover", ({ peer, services: found, error }) => {
			fanOut.servicesDiscovered(found, error);
			if (!isCurrentPeer(peer)) return;
			if (error) {
				logger.warn(`Service discovery failed: ${error.message}`);
				return;
			}
			services = [...found];
			for (const service of found) {
				transport.discoverEndpoints(peer, service);
			}
		}),
		events.on("endpointsDiscover", ({ peer, service, endpoints: found, error }) => {
			fanOut.endpointsDiscovered(found, service, error);
			if (!isCurrentPeer(peer)) return;
			if (error) {
				logger.warn(
					`Endpoint discovery failed for service ${service.uuid}: ${error.message}`,
				);
				return;
			}
			endpoints = [
				...endpoints.filter((e) => !found.some((f) => sameEndpoint(e, f))),
				...found,
			];
		}),
		events.on("write", ({ endpoint, error }) => {
			if (error) {
				logger.debug(`Write to ${endpoint.uuid} failed: ${error.message}`);
			}
			fanOut.write(endpoint, error);
		}),
		events.on("valueUpdate", ({ endpoint, value, error }) => {
			if (value !== undefined && !error) {
				lastValues.set(endpointKey(endpoint), Uint8Array.from(value));
			}
			fanOut.valueUpdate(endpoint, value, error);
		}),
	];

	function setNotifying(enabled: boolean, endpoint?: Endpoint): boolean {
		const target = endpoint ?? notifiable(endpoints)[0];
		if (!target) {
			logger.warn("setNotifying: no notifiable endpoint available");
			return false;
		}
		if (connection.phase !== "connected") {
			logger.warn(`setNotifying: not connected (${connection.phase})`);
			return false;
		}
		if (target.properties.notify !== true && target.properties.indicate !== true) {
			logger.warn(`setNotifying: endpoint ${target.uuid} does not notify`);
			return false;
		}

		transport.subscribe(target, enabled);
		if (enabled) {
			notifying.add(endpointKey(target));
		} else {
			notifying.delete(endpointKey(target));
		}
		return true;
	}

	function send(command: Command, target?: WriteTarget): boolean {
		if (connection.phase !== "connected") {
			logger.warn(`Send declined: not connected (${connection.phase})`);
			return false;
		}
		return dispatcher.send(command, target);
	}

	function settledHandle(): RequestHandle {
		return {
			id: 0,
			settled: true,
			cancel() {},
		};
	}

	function beginRequest(
		command: Command,
		expected: Expected,
		timeoutMs: number,
		callback: RequestCallback,
		target: WriteTarget | undefined,
	): RequestHandle {
		const fail = (error: RequestError): RequestHandle => {
			logger.warn(`Request declined: ${error.message}`);
			try {
				callback({ ok: false, error });
			} catch (e) {
				logger.error("Request completion callback threw:", e);
			}
			return settledHandle();
		};

		if (disposed || connection.phase !== "connected") {
			return fail(
				new InvalidStateError(
					"send a request",
					disposed ? "disposed" : connection.phase,
				),
			);
		}

		const responseEndpoint = notifiable(endpoints)[0];
		if (!responseEndpoint) {
			return fail(new NoNotifiableEndpointError());
		}

		const prepared = dispatcher.prepare(command, target);
		if (!prepared.ok) {
			return fail(prepared.error);
		}
		const write = prepared.value;

		if (!notifying.has(endpointKey(responseEndpoint))) {
			setNotifying(true, responseEndpoint);
		}

		return correlator.begin(
			{
				endpoint: responseEndpoint,
				expected: encodePattern(expected),
				timeoutMs,
				dispatch: () => {
					dispatcher.write(write);
				},
			},
			callback,
		);
	}

	function sendAndWait(
		command: Command,
		expected: Expected,
		timeoutMs: number,
		callback: RequestCallback,
		target?: WriteTarget,
	): RequestHandle;
	function sendAndWait(
		command: Command,
		expected: Expected,
		timeoutMs: number,
		options?: SendAndWaitOptions,
	): Promise<RequestOutcome>;
	function sendAndWait(
		command: Command,
		expected: Expected,
		timeoutMs: number,
		callbackOrOptions?: RequestCallback | SendAndWaitOptions,
		target?: WriteTarget,
	): RequestHandle | Promise<RequestOutcome> {
		if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
			throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
		}

		if (typeof callbackOrOptions === "function") {
			return beginRequest(command, expected, timeoutMs, callbackOrOptions, target);
		}

		const { signal, target: writeTarget } = callbackOrOptions ?? {};
		if (signal?.aborted) {
			return Promise.resolve({
				ok: false,
				error: new AbortError(abortReason(signal)),
			});
		}

		// Bridges exactly one callback invocation into the promise
		return new Promise<RequestOutcome>((resolve) => {
			let resumed = false;
			let detachAbort: (() => void) | undefined;

			const handle = beginRequest(
				command,
				expected,
				timeoutMs,
				(outcome) => {
					if (resumed) {
						throw new Error("sendAndWait continuation resumed more than once");
					}
					resumed = true;
					detachAbort?.();
					resolve(outcome);
				},
				writeTarget,
			);

			if (signal && !handle.settled) {
				const onAbort = (): void => {
					handle.cancel(abortReason(signal));
				};
				signal.addEventListener("abort", onAbort, { once: true });
				detachAbort = () => {
					signal.removeEventListener("abort", onAbort);
				};
			}
		});
	}

	function dispose(): void {
		if (disposed) return;
		disposed = true;
		correlator.cancelAll(new AbortError("Session disposed"));
		queue?.clear();
		connection.dispose();
		for (const unsubscribe of unsubscribers) {
			unsubscribe();
		}
		clearEndpointCache();
		fanOut.setObserver(undefined);
	}

	return {
		get phase() {
			return connection.phase;
		},
		get connectedPeer() {
			return connection.phase === "connected" ? connection.peer : null;
		},
		get retriesLeft() {
			return connection.retriesLeft;
		},
		get adapterState() {
			return adapterState;
		},
		get services() {
			return services;
		},
		get endpoints() {
			return endpoints;
		},
		get writableEndpoints() {
			return writable(endpoints);
		},
		get notifiableEndpoints() {
			return notifiable(endpoints);
		},
		get pendingRequests() {
			return correlator.pendingCount;
		},
		lastValue(endpoint) {
			const value = lastValues.get(endpointKey(endpoint));
			return value && Uint8Array.from(value);
		},
		findEndpoint(uuid, serviceUuid) {
			return findEndpoint(endpoints, uuid, serviceUuid);
		},
		setObserver(observer) {
			fanOut.setObserver(observer);
		},
		startScan(serviceUuids, scanOptions) {
			logger.debug("Scan started");
			transport.scan(serviceUuids, scanOptions);
		},
		stopScan() {
			transport.stopScan();
		},
		connect(peer, connectOptions) {
			return connection.connect(peer, connectOptions);
		},
		disconnect(peer) {
			return connection.disconnect(peer);
		},
		setNotifying,
		send,
		sendAndWait,
		onPhaseChange: connection.onPhaseChange,
		dispose,
	};
}
