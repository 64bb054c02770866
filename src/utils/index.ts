export {
	bytesEqual,
	bytesIncludes,
	decodeText,
	encodeCommand,
	encodePattern,
	matchesPattern,
	toHex,
} from "./bytes";

export {
	type ConsoleLoggerOptions,
	createConsoleLogger,
	DEFAULT_LOG_PREFIX,
	describeError,
	type Logger,
	type LogLevel,
	noopLogger,
} from "./logger";

export {
	BLUETOOTH_UUID_BASE,
	toCompactUuid,
	toFullUuid,
	uuidMatches,
} from "./uuid";

export { createNonOwningRef, type Ref } from "./weakref";
