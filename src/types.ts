/**
 * @fileoverview Core type definitions for ble-session.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`null`**: intentionally empty, "we checked and nothing is there"
 *   - `session.connectedPeer` is `null` while idle
 *   - an expected response of `null` means "never match"
 *
 * - **`undefined`**: not set yet or optional
 *   - `session.lastValue()` is `undefined` before the first notification
 *   - optional event fields (`error`, `value`) are `undefined` when absent
 */

import type {
	AbortError,
	ConnectionDroppedError,
	ConnectionTimeoutError,
	DisconnectedError,
	EncodingError,
	InvalidStateError,
	NoNotifiableEndpointError,
	NoWritableEndpointError,
	RequestTimeoutError,
} from "./errors/errors";
import type { TypedEventEmitter } from "./state/event-emitter";

/**
 * Connection lifecycle phase.
 * - 'idle': no connection and no attempt in progress
 * - 'connecting': user-initiated connect in progress, watchdog armed
 * - 'connected': link established
 * - 'reconnecting': link dropped with an error, automatic reconnect in progress
 * - 'disconnecting': user-initiated teardown in progress
 */
export type ConnectionPhase =
	| "idle"
	| "connecting"
	| "connected"
	| "reconnecting"
	| "disconnecting";

/** Power/availability state of the local radio, as reported by the transport. */
export type AdapterState =
	| "unknown"
	| "resetting"
	| "unsupported"
	| "unauthorized"
	| "poweredOff"
	| "poweredOn";

/** The remote device. Identity is the transport's peer id. */
export interface Peer {
	readonly id: string;
	readonly name: string | undefined;
}

/**
 * Event data received when an advertisement is detected while scanning.
 */
export interface AdvertisementEvent {
	/** Device name from advertisement */
	name?: string;
	/** Transmit power level in dBm */
	txPower?: number;
	/** Raw manufacturer-specific data (company id in the first two bytes) */
	manufacturerData?: Uint8Array;
	/** Service-specific data keyed by service UUID */
	serviceData?: Map<string, Uint8Array>;
	/** Service UUIDs advertised by the device */
	uuids?: string[];
}

/**
 * Capability flags of an endpoint (GATT characteristic).
 */
export interface EndpointProperties {
	broadcast?: boolean;
	read?: boolean;
	/** Supports write without response (faster, no ACK) */
	writeWithoutResponse?: boolean;
	/** Supports write with response */
	write?: boolean;
	/** Supports notifications (passive value updates) */
	notify?: boolean;
	/** Supports indications (acknowledged notifications) */
	indicate?: boolean;
}

/** A service discovered on the connected peer. */
export interface Service {
	readonly peerId: string;
	readonly uuid: string;
}

/**
 * An addressable read/write/notify channel exposed by a peer.
 * Identity is the (service UUID, endpoint UUID) pair.
 */
export interface Endpoint {
	readonly peerId: string;
	readonly serviceUuid: string;
	readonly uuid: string;
	readonly properties: EndpointProperties;
}

/** A command is text (encoded as UTF-8 plus terminator) or raw bytes. */
export type Command = string | Uint8Array;

/**
 * Pattern a notification must equal or contain to satisfy a request.
 * `null`, `undefined` and an empty pattern never match.
 */
export type Expected = Command | null | undefined;

export type Outcome<T, E extends Error> =
	| { ok: true; value: T }
	| { ok: false; error: E };

export type RequestError =
	| AbortError
	| DisconnectedError
	| EncodingError
	| InvalidStateError
	| NoNotifiableEndpointError
	| NoWritableEndpointError
	| RequestTimeoutError;

/** Result of `sendAndWait`: the matched raw value or why there is none. */
export type RequestOutcome = Outcome<Uint8Array, RequestError>;

export type RequestCallback = (outcome: RequestOutcome) => void;

/** Failures reported to the observer's `onConnectionError`. */
export type ConnectionFailure = ConnectionTimeoutError | ConnectionDroppedError;

export type ConnectError =
	| AbortError
	| ConnectionFailure
	| DisconnectedError
	| InvalidStateError;

export type ConnectOutcome = Outcome<Peer, ConnectError>;

export interface ScanOptions {
	/**
	 * Report every advertisement, not only the first one per peer.
	 * @default false
	 */
	allowDuplicates?: boolean;
}

/**
 * Inbound events of a transport. Every event is delivered asynchronously,
 * from the transport's own callback context.
 */
export interface TransportEvents extends Record<string, unknown> {
	stateChange: { state: AdapterState };
	discover: { peer: Peer; advertisement: AdvertisementEvent; rssi: number };
	connect: { peer: Peer };
	/** `error` is set for unexpected drops and failed connect attempts */
	disconnect: { peer: Peer; error?: Error | undefined };
	servicesDiscover: {
		peer: Peer;
		services: Service[];
		error?: Error | undefined;
	};
	endpointsDiscover: {
		peer: Peer;
		service: Service;
		endpoints: Endpoint[];
		error?: Error | undefined;
	};
	write: { endpoint: Endpoint; error?: Error | undefined };
	valueUpdate: {
		endpoint: Endpoint;
		value?: Uint8Array | undefined;
		error?: Error | undefined;
	};
}

/**
 * The radio stack the session drives. Every operation is fire-and-forget;
 * results come back through `events`.
 *
 * @remarks
 * Implementers should ensure that:
 * - a failed connect attempt is reported as `disconnect` with an error
 * - a disconnect requested through `disconnect()` is always reported without an
 *   error, also when the radio could not tear the link down
 * - `write` events are emitted for failures, and for successes only when an
 *   acknowledgement was requested
 *
 * @example Wrapping a custom radio library
 * ```typescript
 * const events = createEventEmitter<TransportEvents>();
 * const transport: BLETransport = {
 *   events,
 *   connect(peer) {
 *     radio.connect(peer.id).then(
 *       () => events.emit("connect", { peer }),
 *       (e) => events.emit("disconnect", { peer, error: normalizeError(e) }),
 *     );
 *   },
 *   // ...
 * };
 * ```
 */
export interface BLETransport {
	readonly events: TypedEventEmitter<TransportEvents>;
	/** Current radio state; later changes arrive as `stateChange` */
	readonly adapterState?: AdapterState;
	scan(serviceUuids?: readonly string[], options?: ScanOptions): void;
	stopScan(): void;
	connect(peer: Peer): void;
	disconnect(peer: Peer): void;
	discoverServices(peer: Peer): void;
	discoverEndpoints(peer: Peer, service: Service): void;
	write(endpoint: Endpoint, data: Uint8Array, ackRequested: boolean): void;
	subscribe(endpoint: Endpoint, enabled: boolean): void;
	/** Releases radio resources and listeners */
	dispose?(): void;
}

/**
 * The single sink for every transport event. Each capability is optional;
 * unimplemented ones are skipped.
 *
 * The session never owns its observer: it holds a weak reference, so the
 * caller must keep the observer alive for as long as it wants events.
 */
export interface SessionObserver {
	onAdapterStateChange?(state: AdapterState): void;
	onPhaseChange?(from: ConnectionPhase, to: ConnectionPhase): void;
	/** Watchdog expiry, or a drop after the retry budget ran out */
	onConnectionError?(error: ConnectionFailure): void;
	onDiscover?(peer: Peer, advertisement: AdvertisementEvent, rssi: number): void;
	onServicesDiscovered?(
		services: readonly Service[],
		error: Error | undefined,
	): void;
	onEndpointsDiscovered?(
		endpoints: readonly Endpoint[],
		service: Service,
		error: Error | undefined,
	): void;
	onWrite?(endpoint: Endpoint, error: Error | undefined): void;
	onValueUpdate?(
		endpoint: Endpoint,
		value: Uint8Array | undefined,
		error: Error | undefined,
	): void;
}
