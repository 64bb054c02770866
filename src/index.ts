/**
 * ble-session - Connection lifecycle and request/response correlation for a
 * single BLE peer.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import {
 *   createBLESession,
 *   createNobleTransport,
 *   decodeText,
 * } from 'ble-session';
 *
 * const transport = await createNobleTransport();
 * const session = createBLESession(transport, { retryCount: 3 });
 *
 * const connected = await session.connect(peer);
 * if (connected.ok) {
 *   session.setNotifying(true);
 *   const reply = await session.sendAndWait('STATUS', 'OK', 2000);
 *   if (reply.ok) console.log(decodeText(reply.value));
 * }
 * ```
 */

// Transports
export {
	createNobleTransport,
	createSimulatedTransport,
	DEFAULT_OPERATION_TIMEOUT_MS,
	type NobleAdvertisement,
	type NobleCentral,
	type NobleCharacteristic,
	type NoblePeripheral,
	type NobleService,
	type NobleTransportOptions,
	type NotifyOptions,
	type SimulatedConnectBehavior,
	type SimulatedEndpointConfig,
	type SimulatedPeerConfig,
	type SimulatedTransport,
	type SimulatedWrite,
} from "./adapter";
// Session building blocks
export {
	type CommandDispatcher,
	type ConnectionHooks,
	type ConnectionManager,
	type ConnectOptions,
	createCommandDispatcher,
	createConnectionManager,
	createOperationQueue,
	createResponseCorrelator,
	endpointKey,
	findEndpoint,
	isWritable,
	notifiable,
	type OperationQueue,
	type RequestPlan,
	type RequestHandle,
	type ResponseCorrelator,
	type RetryOptions,
	sameEndpoint,
	withRetry,
	writable,
	type WriteTarget,
} from "./ble";
// Errors
export {
	AbortError,
	ConnectionDroppedError,
	ConnectionTimeoutError,
	DisconnectedError,
	EncodingError,
	InvalidStateError,
	isTransientBLEError,
	NoNotifiableEndpointError,
	NoWritableEndpointError,
	normalizeError,
	RequestTimeoutError,
	TimeoutError,
	withTimeout,
} from "./errors";
// Session
export {
	type BLESession,
	createBLESession,
	createEventFanOut,
	DEFAULT_COMMAND_TERMINATOR,
	DEFAULT_CONNECTION_TIMEOUT_MS,
	DEFAULT_RETRY_COUNT,
	type EventFanOut,
	resolveSessionOptions,
	type SendAndWaitOptions,
	type SessionOptions,
} from "./session";
// State management
export {
	createEventEmitter,
	createStateMachine,
	type EventMap,
	type StateMachine,
	type TransitionCallback,
	type TypedEventEmitter,
} from "./state";
// Types
export type {
	AdapterState,
	AdvertisementEvent,
	BLETransport,
	Command,
	ConnectError,
	ConnectionFailure,
	ConnectionPhase,
	ConnectOutcome,
	Endpoint,
	EndpointProperties,
	Expected,
	Outcome,
	Peer,
	RequestCallback,
	RequestError,
	RequestOutcome,
	ScanOptions,
	Service,
	SessionObserver,
	TransportEvents,
} from "./types";
// Utils
export {
	BLUETOOTH_UUID_BASE,
	bytesEqual,
	bytesIncludes,
	type ConsoleLoggerOptions,
	createConsoleLogger,
	decodeText,
	encodeCommand,
	encodePattern,
	type Logger,
	type LogLevel,
	matchesPattern,
	noopLogger,
	toCompactUuid,
	toFullUuid,
	toHex,
	uuidMatches,
} from "./utils";
