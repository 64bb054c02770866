export {
	type ConnectionHooks,
	type ConnectionManager,
	type ConnectionManagerOptions,
	type ConnectOptions,
	createConnectionManager,
} from "./connection";
export {
	type CorrelatorOptions,
	createResponseCorrelator,
	type RequestPlan,
	type RequestHandle,
	type ResponseCorrelator,
} from "./correlator";
export {
	type CommandDispatcher,
	type CommandDispatcherOptions,
	createCommandDispatcher,
	type PreparedWrite,
	type PrepareError,
	type WriteTarget,
} from "./dispatcher";
export {
	endpointKey,
	findEndpoint,
	isWritable,
	notifiable,
	sameEndpoint,
	writable,
} from "./endpoints";
export {
	createOperationQueue,
	type OperationQueue,
	type OperationQueueOptions,
} from "./operation-queue";
export {
	resolveRetryPolicy,
	type RetryOptions,
	type RetryPolicy,
	retryDelay,
	withRetry,
} from "./retry";
