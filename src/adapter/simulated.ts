import { endpointKey, findEndpoint } from "../ble/endpoints";
import { createEventEmitter } from "../state/event-emitter";
import type {
	AdapterState,
	AdvertisementEvent,
	BLETransport,
	Command,
	Endpoint,
	EndpointProperties,
	Peer,
	Service,
	TransportEvents,
} from "../types";
import { decodeText } from "../utils/bytes";
import { noopLogger, type Logger } from "../utils/logger";
import { uuidMatches } from "../utils/uuid";

/**
 * How a simulated peer answers a connect request:
 * - 'confirm': connects after `connectDelayMs`
 * - 'ignore': never answers (exercises the watchdog)
 * - 'fail': reports a failed attempt
 */
export type SimulatedConnectBehavior = "confirm" | "ignore" | "fail";

export interface SimulatedEndpointConfig {
	serviceUuid: string;
	uuid: string;
	properties: EndpointProperties;
}

/** A write the simulated transport received */
export interface SimulatedWrite {
	readonly endpoint: Endpoint;
	readonly data: Uint8Array;
	readonly ackRequested: boolean;
	/** `data` decoded as UTF-8 */
	readonly text: string;
}

export interface SimulatedPeerConfig {
	id: string;
	name?: string;
	rssi?: number;
	advertisement?: AdvertisementEvent;
	endpoints: SimulatedEndpointConfig[];
	/** @default 'confirm' */
	connectBehavior?: SimulatedConnectBehavior;
	/** @default 0 */
	connectDelayMs?: number;
	/** Device behaviour: called for every write the peer receives */
	onWrite?: (write: SimulatedWrite, transport: SimulatedTransport) => void;
}

export interface NotifyOptions {
	/** Peer that notifies; defaults to the first peer declaring the endpoint */
	peerId?: string;
	/** Delivery delay; 0 delivers on the next microtask */
	delayMs?: number;
}

/**
 * An in-process transport standing in for a radio and its peers. Events are
 * delivered asynchronously, from a microtask or a timer, like a real stack.
 */
export interface SimulatedTransport extends BLETransport {
	readonly writes: readonly SimulatedWrite[];
	readonly connectRequests: number;
	readonly disconnectRequests: number;
	readonly scanning: boolean;
	peer(peerId: string): Peer;
	isConnected(peerId: string): boolean;
	isSubscribed(endpointUuid: string, peerId?: string): boolean;
	/** Sends a notification; dropped at delivery time unless subscribed */
	notify(endpointUuid: string, value: Command, options?: NotifyOptions): void;
	/** Drops the link from the peer's side; with an error unless `error` is null */
	drop(peerId: string, error?: Error | null): void;
	/** Confirms a pending connect attempt now, whatever the peer's behaviour */
	confirmConnect(peerId: string): void;
	setConnectBehavior(peerId: string, behavior: SimulatedConnectBehavior): void;
	setAdapterState(state: AdapterState): void;
	dispose(): void;
}

interface PeerState {
	readonly config: SimulatedPeerConfig;
	readonly peer: Peer;
	readonly endpoints: Endpoint[];
	behavior: SimulatedConnectBehavior;
	connected: boolean;
	connecting: boolean;
	pendingConnect: ReturnType<typeof setTimeout> | undefined;
	readonly subscriptions: Set<string>;
}

const encoder = new TextEncoder();

function toBytes(value: Command): Uint8Array {
	return typeof value === "string" ? encoder.encode(value) : Uint8Array.from(value);
}

/**
 * Creates an in-process transport for tests and demos.
 *
 * @example Echo device
 * ```typescript
 * const transport = createSimulatedTransport([
 *   {
 *     id: "echo-1",
 *     name: "Echo",
 *     endpoints: [
 *       { serviceUuid: "ffe0", uuid: "ffe1", properties: { writeWithoutResponse: true } },
 *       { serviceUuid: "ffe0", uuid: "ffe2", properties: { notify: true } },
 *     ],
 *     onWrite: (write, t) => {
 *       if (write.text === "PING\n") t.notify("ffe2", "PONG", { delayMs: 50 });
 *     },
 *   },
 * ]);
 * ```
 */
export function createSimulatedTransport(
	peers: readonly SimulatedPeerConfig[],
	logger: Logger = noopLogger,
): SimulatedTransport {
	const events = createEventEmitter<TransportEvents>({ logger });
	const states = new Map<string, PeerState>();
	const writes: SimulatedWrite[] = [];
	let connectRequests = 0;
	let disconnectRequests = 0;
	let scanning = false;
	let adapterState: AdapterState = "poweredOn";

	for (const config of peers) {
		const peer: Peer = { id: config.id, name: config.name };
		states.set(config.id, {
			config,
			peer,
			endpoints: config.endpoints.map((e) => ({
				peerId: config.id,
				serviceUuid: e.serviceUuid,
				uuid: e.uuid,
				properties: { ...e.properties },
			})),
			behavior: config.connectBehavior ?? "confirm",
			connected: false,
			connecting: false,
			pendingConnect: undefined,
			subscriptions: new Set(),
		});
	}

	function deliver(delayMs: number, action: () => void): void {
		if (delayMs > 0) {
			setTimeout(action, delayMs);
		} else {
			queueMicrotask(action);
		}
	}

	function stateOf(peerId: string): PeerState {
		const state = states.get(peerId);
		if (!state) {
			throw new Error(`Unknown simulated peer: ${peerId}`);
		}
		return state;
	}

	function cancelPendingConnect(state: PeerState): void {
		if (state.pendingConnect !== undefined) {
			clearTimeout(state.pendingConnect);
			state.pendingConnect = undefined;
		}
		state.connecting = false;
	}

	function completeConnect(state: PeerState): void {
		cancelPendingConnect(state);
		state.connected = true;
		events.emit("connect", { peer: state.peer });
	}

	function servicesOf(state: PeerState): Service[] {
		const result: Service[] = [];
		for (const endpoint of state.endpoints) {
			if (!result.some((s) => uuidMatches(s.uuid, endpoint.serviceUuid))) {
				result.push({ peerId: state.peer.id, uuid: endpoint.serviceUuid });
			}
		}
		return result;
	}

	const transport: SimulatedTransport = {
		events,

		get adapterState() {
			return adapterState;
		},

		get writes() {
			return writes;
		},
		get connectRequests() {
			return connectRequests;
		},
		get disconnectRequests() {
			return disconnectRequests;
		},
		get scanning() {
			return scanning;
		},

		scan(serviceUuids) {
			scanning = true;
			for (const state of states.values()) {
				const advertised = servicesOf(state).map((s) => s.uuid);
				if (
					serviceUuids &&
					serviceUuids.length > 0 &&
					!serviceUuids.some((u) => advertised.some((a) => uuidMatches(a, u)))
				) {
					continue;
				}
				deliver(0, () => {
					if (!scanning) return;
					events.emit("discover", {
						peer: state.peer,
						advertisement: state.config.advertisement ?? {
							...(state.config.name === undefined ? {} : { name: state.config.name }),
							uuids: advertised,
						},
						rssi: state.config.rssi ?? -60,
					});
				});
			}
		},

		stopScan() {
			scanning = false;
		},

		connect(peer) {
			connectRequests++;
			const state = states.get(peer.id);
			if (!state) {
				deliver(0, () => {
					events.emit("disconnect", {
						peer,
						error: new Error(`Unknown peer ${peer.id}`),
					});
				});
				return;
			}

			cancelPendingConnect(state);
			state.connecting = true;

			switch (state.behavior) {
				case "confirm": {
					const delayMs = state.config.connectDelayMs ?? 0;
					if (delayMs > 0) {
						state.pendingConnect = setTimeout(() => {
							completeConnect(state);
						}, delayMs);
					} else {
						queueMicrotask(() => {
							if (state.connecting) completeConnect(state);
						});
					}
					break;
				}
				case "fail":
					deliver(0, () => {
						if (!state.connecting) return;
						state.connecting = false;
						events.emit("disconnect", {
							peer: state.peer,
							error: new Error("Connection failed"),
						});
					});
					break;
				case "ignore":
					break;
			}
		},

		disconnect(peer) {
			disconnectRequests++;
			const state = states.get(peer.id);
			if (!state) return;
			const linked = state.connected || state.connecting;
			cancelPendingConnect(state);
			state.subscriptions.clear();
			if (!linked) return;
			state.connected = false;
			deliver(0, () => {
				events.emit("disconnect", { peer: state.peer });
			});
		},

		discoverServices(peer) {
			const state = stateOf(peer.id);
			const services = servicesOf(state);
			deliver(0, () => {
				events.emit("servicesDiscover", { peer: state.peer, services });
			});
		},

		discoverEndpoints(peer, service) {
			const state = stateOf(peer.id);
			const endpoints = state.endpoints.filter((e) =>
				uuidMatches(e.serviceUuid, service.uuid),
			);
			deliver(0, () => {
				events.emit("endpointsDiscover", { peer: state.peer, service, endpoints });
			});
		},

		write(endpoint, data, ackRequested) {
			const state = stateOf(endpoint.peerId);
			const write: SimulatedWrite = {
				endpoint,
				data: Uint8Array.from(data),
				ackRequested,
				text: decodeText(data),
			};
			writes.push(write);

			if (!state.connected) {
				deliver(0, () => {
					events.emit("write", { endpoint, error: new Error("Not connected") });
				});
				return;
			}
			if (ackRequested) {
				deliver(0, () => {
					events.emit("write", { endpoint });
				});
			}
			state.config.onWrite?.(write, transport);
		},

		subscribe(endpoint, enabled) {
			const state = stateOf(endpoint.peerId);
			if (enabled) {
				state.subscriptions.add(endpointKey(endpoint));
			} else {
				state.subscriptions.delete(endpointKey(endpoint));
			}
		},

		peer(peerId) {
			return stateOf(peerId).peer;
		},

		isConnected(peerId) {
			return stateOf(peerId).connected;
		},

		isSubscribed(endpointUuid, peerId) {
			for (const state of states.values()) {
				if (peerId !== undefined && state.peer.id !== peerId) continue;
				const endpoint = findEndpoint(state.endpoints, endpointUuid);
				if (endpoint && state.subscriptions.has(endpointKey(endpoint))) {
					return true;
				}
			}
			return false;
		},

		notify(endpointUuid, value, options = {}) {
			const candidates =
				options.peerId !== undefined ? [stateOf(options.peerId)] : [...states.values()];
			let state: PeerState | undefined;
			let endpoint: Endpoint | undefined;
			for (const candidate of candidates) {
				endpoint = findEndpoint(candidate.endpoints, endpointUuid);
				if (endpoint) {
					state = candidate;
					break;
				}
			}
			if (!state || !endpoint) {
				throw new Error(`No simulated endpoint ${endpointUuid}`);
			}

			const from = state;
			const target = endpoint;
			const bytes = toBytes(value);
			deliver(options.delayMs ?? 0, () => {
				if (!from.connected || !from.subscriptions.has(endpointKey(target))) {
					logger.debug(`Dropping notification on ${target.uuid}: not subscribed`);
					return;
				}
				events.emit("valueUpdate", { endpoint: target, value: bytes });
			});
		},

		drop(peerId, error) {
			const state = stateOf(peerId);
			cancelPendingConnect(state);
			state.connected = false;
			state.subscriptions.clear();
			const reason = error === undefined ? new Error("Link lost") : error;
			deliver(0, () => {
				events.emit("disconnect", {
					peer: state.peer,
					...(reason === null ? {} : { error: reason }),
				});
			});
		},

		confirmConnect(peerId) {
			completeConnect(stateOf(peerId));
		},

		setConnectBehavior(peerId, behavior) {
			stateOf(peerId).behavior = behavior;
		},

		setAdapterState(state) {
			deliver(0, () => {
				adapterState = state;
				events.emit("stateChange", { state });
			});
		},

		dispose() {
			for (const state of states.values()) {
				cancelPendingConnect(state);
			}
			events.removeAllListeners();
		},
	};

	return transport;
}
