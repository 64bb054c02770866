import { endpointKey } from "../ble/endpoints";
import { resolveRetryPolicy, type RetryOptions, withRetry } from "../ble/retry";
import { normalizeError, withTimeout } from "../errors/errors";
import { createEventEmitter } from "../state/event-emitter";
import type {
	AdapterState,
	AdvertisementEvent,
	BLETransport,
	Endpoint,
	EndpointProperties,
	Peer,
	Service,
	TransportEvents,
} from "../types";
import { createConsoleLogger, type Logger } from "../utils/logger";
import { toCompactUuid } from "../utils/uuid";

/** Default timeout for a single discovery or subscription round trip */
export const DEFAULT_OPERATION_TIMEOUT_MS = 10000;

/** Advertisement fields as noble reports them */
export interface NobleAdvertisement {
	localName?: string;
	txPowerLevel?: number;
	manufacturerData?: Buffer;
	serviceData?: { uuid: string; data: Buffer }[];
	serviceUuids?: string[];
}

export interface NobleCharacteristic {
	readonly uuid: string;
	readonly properties: string[];
	writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
	subscribeAsync(): Promise<void>;
	unsubscribeAsync(): Promise<void>;
	on(event: "data", listener: (data: Buffer, isNotification: boolean) => void): unknown;
	removeListener(
		event: "data",
		listener: (data: Buffer, isNotification: boolean) => void,
	): unknown;
}

export interface NobleService {
	readonly uuid: string;
	discoverCharacteristicsAsync(uuids?: string[]): Promise<NobleCharacteristic[]>;
}

export interface NoblePeripheral {
	readonly id: string;
	readonly rssi: number;
	readonly advertisement: NobleAdvertisement;
	connectAsync(): Promise<void>;
	disconnectAsync(): Promise<void>;
	discoverServicesAsync(uuids?: string[]): Promise<NobleService[]>;
	on(event: "disconnect", listener: () => void): unknown;
	removeListener(event: "disconnect", listener: () => void): unknown;
}

/** The part of the noble central the transport drives */
export interface NobleCentral {
	readonly state: string;
	startScanningAsync(serviceUuids?: string[], allowDuplicates?: boolean): Promise<void>;
	stopScanningAsync(): Promise<void>;
	on(event: "stateChange", listener: (state: string) => void): unknown;
	on(event: "discover", listener: (peripheral: NoblePeripheral) => void): unknown;
	removeListener(event: "stateChange", listener: (state: string) => void): unknown;
	removeListener(
		event: "discover",
		listener: (peripheral: NoblePeripheral) => void,
	): unknown;
}

export interface NobleTransportOptions {
	/**
	 * Central to drive. Defaults to the `@abandonware/noble` singleton, which
	 * is only loaded when no central is given.
	 */
	central?: NobleCentral;
	/**
	 * Timeout for each discovery or subscription round trip.
	 * @default 10000
	 */
	operationTimeoutMs?: number;
	/** Backoff for transient discovery and subscription failures */
	operationRetry?: Omit<RetryOptions, "signal">;
	logger?: Logger;
}

const ADAPTER_STATES: readonly AdapterState[] = [
	"unknown",
	"resetting",
	"unsupported",
	"unauthorized",
	"poweredOff",
	"poweredOn",
];

function toAdapterState(state: string): AdapterState {
	return ADAPTER_STATES.find((s) => s === state) ?? "unknown";
}

function isNobleCentral(value: unknown): value is NobleCentral {
	return (
		typeof value === "object" &&
		value !== null &&
		"state" in value &&
		"startScanningAsync" in value &&
		typeof value.startScanningAsync === "function" &&
		"stopScanningAsync" in value &&
		typeof value.stopScanningAsync === "function" &&
		"on" in value &&
		typeof value.on === "function" &&
		"removeListener" in value &&
		typeof value.removeListener === "function"
	);
}

async function loadDefaultCentral(): Promise<NobleCentral> {
	const loaded: unknown = await import("@abandonware/noble");
	// CommonJS module: the central is the default export under ESM
	const candidate =
		typeof loaded === "object" && loaded !== null && "default" in loaded
			? loaded.default
			: loaded;
	if (!isNobleCentral(candidate)) {
		throw new Error("@abandonware/noble did not export a usable central");
	}
	return candidate;
}

/** noble addresses UUIDs as lowercase hex without dashes */
function toNobleUuid(uuid: string): string {
	return toCompactUuid(uuid);
}

function toPeer(peripheral: NoblePeripheral): Peer {
	return { id: peripheral.id, name: peripheral.advertisement.localName };
}

function toAdvertisement(advertisement: NobleAdvertisement): AdvertisementEvent {
	const data: AdvertisementEvent = {};

	if (advertisement.localName !== undefined) data.name = advertisement.localName;
	if (advertisement.txPowerLevel !== undefined)
		data.txPower = advertisement.txPowerLevel;
	if (advertisement.manufacturerData !== undefined)
		data.manufacturerData = Uint8Array.from(advertisement.manufacturerData);
	if (advertisement.serviceData !== undefined && advertisement.serviceData.length > 0)
		data.serviceData = new Map(
			advertisement.serviceData.map((entry) => [
				entry.uuid,
				Uint8Array.from(entry.data),
			]),
		);
	if (advertisement.serviceUuids !== undefined)
		data.uuids = [...advertisement.serviceUuids];

	return data;
}

function toProperties(properties: readonly string[]): EndpointProperties {
	return {
		broadcast: properties.includes("broadcast"),
		read: properties.includes("read"),
		writeWithoutResponse: properties.includes("writeWithoutResponse"),
		write: properties.includes("write"),
		notify: properties.includes("notify"),
		indicate: properties.includes("indicate"),
	};
}

function serviceKey(peerId: string, uuid: string): string {
	return `${peerId}/${toNobleUuid(uuid)}`;
}

/**
 * Creates a transport backed by noble, the Node.js BLE central.
 *
 * Discovery and subscription round trips are bounded by
 * `operationTimeoutMs` and retried on transient failures. Connection
 * attempts are issued once: reconnect policy belongs to the session.
 *
 * Peers must have been seen by a scan before they can be connected.
 *
 * @example
 * ```typescript
 * const transport = await createNobleTransport({ operationTimeoutMs: 5000 });
 * const session = createBLESession(transport);
 *
 * transport.events.on("discover", ({ peer }) => {
 *   if (peer.name?.startsWith("Sensor")) {
 *     session.stopScan();
 *     void session.connect(peer);
 *   }
 * });
 * session.startScan();
 * ```
 */
export async function createNobleTransport(
	options: NobleTransportOptions = {},
): Promise<BLETransport> {
	const central = options.central ?? (await loadDefaultCentral());
	const logger = options.logger ?? createConsoleLogger();
	const operationTimeoutMs =
		options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
	const retryOptions = options.operationRetry ?? {};

	if (!Number.isFinite(operationTimeoutMs) || operationTimeoutMs <= 0) {
		throw new RangeError(
			`operationTimeoutMs must be a positive number, got ${operationTimeoutMs}`,
		);
	}
	resolveRetryPolicy(retryOptions);

	// Aborted on dispose so pending retries stop
	const lifetime = new AbortController();

	const events = createEventEmitter<TransportEvents>({ logger });
	const peripherals = new Map<string, NoblePeripheral>();
	const services = new Map<string, NobleService>();
	const characteristics = new Map<string, NobleCharacteristic>();
	const dataListeners = new Map<string, (data: Buffer) => void>();
	const disconnectListeners = new Map<string, () => void>();
	const expectedDisconnects = new Set<string>();

	/** Emits from a later tick, like every other transport event */
	function emitLater<K extends keyof TransportEvents>(
		event: K,
		data: TransportEvents[K],
	): void {
		queueMicrotask(() => {
			events.emit(event, data);
		});
	}

	function retrying<T>(operation: () => Promise<T>, label: string): Promise<T> {
		return withRetry(() => withTimeout(operation(), operationTimeoutMs, label), {
			...retryOptions,
			signal: lifetime.signal,
			onRetry: (attempt, delayMs, error) => {
				logger.debug(
					`${label} attempt ${attempt} failed (${error.message}), retrying in ${delayMs}ms`,
				);
				retryOptions.onRetry?.(attempt, delayMs, error);
			},
		});
	}

	function forgetPeer(peerId: string): void {
		for (const [key, characteristic] of characteristics) {
			if (!key.startsWith(`${peerId}/`)) continue;
			const listener = dataListeners.get(key);
			if (listener) {
				characteristic.removeListener("data", listener);
				dataListeners.delete(key);
			}
			characteristics.delete(key);
		}
		for (const key of services.keys()) {
			if (key.startsWith(`${peerId}/`)) services.delete(key);
		}
	}

	const handleStateChange = (state: string): void => {
		events.emit("stateChange", { state: toAdapterState(state) });
	};

	const handleDiscover = (peripheral: NoblePeripheral): void => {
		peripherals.set(peripheral.id, peripheral);
		events.emit("discover", {
			peer: toPeer(peripheral),
			advertisement: toAdvertisement(peripheral.advertisement),
			rssi: peripheral.rssi,
		});
	};

	central.on("stateChange", handleStateChange);
	central.on("discover", handleDiscover);

	function watchDisconnect(peripheral: NoblePeripheral): void {
		if (disconnectListeners.has(peripheral.id)) return;
		const listener = (): void => {
			forgetPeer(peripheral.id);
			const expected = expectedDisconnects.delete(peripheral.id);
			events.emit("disconnect", {
				peer: toPeer(peripheral),
				error: expected
					? undefined
					: new Error(`Peripheral ${peripheral.id} disconnected unexpectedly`),
			});
		};
		peripheral.on("disconnect", listener);
		disconnectListeners.set(peripheral.id, listener);
	}

	return {
		events,

		get adapterState() {
			return toAdapterState(central.state);
		},

		scan(serviceUuids, scanOptions) {
			const uuids = serviceUuids ? serviceUuids.map(toNobleUuid) : [];
			central
				.startScanningAsync(uuids, scanOptions?.allowDuplicates ?? false)
				.catch((e: unknown) => {
					logger.error("Failed to start scanning:", normalizeError(e).message);
				});
		},

		stopScan() {
			central.stopScanningAsync().catch((e: unknown) => {
				logger.warn("Failed to stop scanning:", normalizeError(e).message);
			});
		},

		connect(peer) {
			const peripheral = peripherals.get(peer.id);
			if (!peripheral) {
				emitLater("disconnect", {
					peer,
					error: new Error(`Unknown peer ${peer.id}: scan for it first`),
				});
				return;
			}

			watchDisconnect(peripheral);
			expectedDisconnects.delete(peer.id);
			peripheral.connectAsync().then(
				() => {
					events.emit("connect", { peer: toPeer(peripheral) });
				},
				(e: unknown) => {
					events.emit("disconnect", { peer, error: normalizeError(e) });
				},
			);
		},

		// Every requested disconnect is confirmed, even when noble cannot carry it out
		disconnect(peer) {
			const peripheral = peripherals.get(peer.id);
			if (!peripheral) {
				emitLater("disconnect", { peer });
				return;
			}
			expectedDisconnects.add(peer.id);
			peripheral.disconnectAsync().catch((e: unknown) => {
				expectedDisconnects.delete(peer.id);
				logger.warn(`Disconnect from ${peer.id} failed:`, normalizeError(e).message);
				forgetPeer(peer.id);
				events.emit("disconnect", { peer: toPeer(peripheral) });
			});
		},

		discoverServices(peer) {
			const peripheral = peripherals.get(peer.id);
			if (!peripheral) {
				emitLater("servicesDiscover", {
					peer,
					services: [],
					error: new Error(`Unknown peer ${peer.id}`),
				});
				return;
			}

			retrying(() => peripheral.discoverServicesAsync([]), "Service discovery").then(
				(found) => {
					const result: Service[] = found.map((service) => {
						services.set(serviceKey(peer.id, service.uuid), service);
						return { peerId: peer.id, uuid: service.uuid };
					});
					events.emit("servicesDiscover", { peer, services: result });
				},
				(e: unknown) => {
					events.emit("servicesDiscover", {
						peer,
						services: [],
						error: normalizeError(e),
					});
				},
			);
		},

		discoverEndpoints(peer, service) {
			const nobleService = services.get(serviceKey(peer.id, service.uuid));
			if (!nobleService) {
				emitLater("endpointsDiscover", {
					peer,
					service,
					endpoints: [],
					error: new Error(`Unknown service ${service.uuid}`),
				});
				return;
			}

			retrying(
				() => nobleService.discoverCharacteristicsAsync([]),
				"Endpoint discovery",
			).then(
				(found) => {
					const endpoints: Endpoint[] = found.map((characteristic) => {
						const endpoint: Endpoint = {
							peerId: peer.id,
							serviceUuid: service.uuid,
							uuid: characteristic.uuid,
							properties: toProperties(characteristic.properties),
						};
						characteristics.set(endpointKey(endpoint), characteristic);
						return endpoint;
					});
					events.emit("endpointsDiscover", { peer, service, endpoints });
				},
				(e: unknown) => {
					events.emit("endpointsDiscover", {
						peer,
						service,
						endpoints: [],
						error: normalizeError(e),
					});
				},
			);
		},

		write(endpoint, data, ackRequested) {
			const characteristic = characteristics.get(endpointKey(endpoint));
			if (!characteristic) {
				emitLater("write", {
					endpoint,
					error: new Error(`Unknown endpoint ${endpoint.uuid}`),
				});
				return;
			}

			characteristic.writeAsync(Buffer.from(data), !ackRequested).then(
				() => {
					if (ackRequested) {
						events.emit("write", { endpoint });
					}
				},
				(e: unknown) => {
					events.emit("write", { endpoint, error: normalizeError(e) });
				},
			);
		},

		subscribe(endpoint, enabled) {
			const key = endpointKey(endpoint);
			const characteristic = characteristics.get(key);
			if (!characteristic) {
				emitLater("valueUpdate", {
					endpoint,
					error: new Error(`Unknown endpoint ${endpoint.uuid}`),
				});
				return;
			}

			if (!enabled) {
				const listener = dataListeners.get(key);
				if (listener) {
					characteristic.removeListener("data", listener);
					dataListeners.delete(key);
				}
				characteristic.unsubscribeAsync().catch((e: unknown) => {
					logger.warn(
						`Unsubscribe from ${endpoint.uuid} failed:`,
						normalizeError(e).message,
					);
				});
				return;
			}

			if (!dataListeners.has(key)) {
				const listener = (data: Buffer): void => {
					events.emit("valueUpdate", { endpoint, value: Uint8Array.from(data) });
				};
				characteristic.on("data", listener);
				dataListeners.set(key, listener);
			}

			retrying(() => characteristic.subscribeAsync(), "Subscribe").catch(
				(e: unknown) => {
					events.emit("valueUpdate", { endpoint, error: normalizeError(e) });
				},
			);
		},

		dispose() {
			lifetime.abort(new Error("Transport disposed"));
			central.removeListener("stateChange", handleStateChange);
			central.removeListener("discover", handleDiscover);
			for (const [id, listener] of disconnectListeners) {
				peripherals.get(id)?.removeListener("disconnect", listener);
				forgetPeer(id);
			}
			disconnectListeners.clear();
			peripherals.clear();
			events.removeAllListeners();
		},
	};
}
