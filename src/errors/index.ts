export {
	AbortError,
	abortReason,
	ConnectionDroppedError,
	ConnectionTimeoutError,
	DisconnectedError,
	EncodingError,
	InvalidStateError,
	isTransientBLEError,
	normalizeError,
	NoNotifiableEndpointError,
	NoWritableEndpointError,
	RequestTimeoutError,
	TimeoutError,
	withTimeout,
} from "./errors";
