export { createEventFanOut, type EventFanOut } from "./fan-out";
export {
	DEFAULT_COMMAND_TERMINATOR,
	DEFAULT_CONNECTION_TIMEOUT_MS,
	DEFAULT_RETRY_COUNT,
	type ResolvedSessionOptions,
	resolveSessionOptions,
	type SessionOptions,
} from "./options";
export {
	type BLESession,
	createBLESession,
	type SendAndWaitOptions,
} from "./session";
