import {
	AbortError,
	abortReason,
	ConnectionDroppedError,
	ConnectionTimeoutError,
	DisconnectedError,
	InvalidStateError,
	normalizeError,
} from "../errors/errors";
import {
	createStateMachine,
	type TransitionCallback,
} from "../state/state-machine";
import type {
	AdapterState,
	BLETransport,
	ConnectError,
	ConnectionFailure,
	ConnectionPhase,
	ConnectOutcome,
	Peer,
	TransportEvents,
} from "../types";
import type { Logger } from "../utils/logger";

/**
 * Callbacks through which the connection manager tells its owner about link
 * changes. All are invoked synchronously, before the phase change they cause.
 */
export interface ConnectionHooks {
	/** The transport confirmed the link (initial connect or reconnect) */
	onEstablished?(peer: Peer, reconnected: boolean): void;
	/** The link dropped with an error and an automatic reconnect was issued */
	onInterrupted?(peer: Peer, error: Error): void;
	/** The connection is gone for good; `error` is set when it failed */
	onReleased?(peer: Peer, error: Error | undefined): void;
	/** Watchdog expiry or a drop with no retries left */
	onFailure?(error: ConnectionFailure): void;
}

export interface ConnectionManagerOptions {
	transport: BLETransport;
	/** Automatic reconnect attempts after an unexpected drop */
	retryCount: number;
	/** Watchdog duration for connect and reconnect attempts */
	connectionTimeoutMs: number;
	logger: Logger;
	hooks?: ConnectionHooks;
}

export interface ConnectOptions {
	/** Overrides the watchdog duration for this connect */
	timeoutMs?: number;
	/** Aborts the attempt while it is still connecting */
	signal?: AbortSignal;
}

export interface ConnectionManager {
	readonly phase: ConnectionPhase;
	/** The peer of the current connection, `null` while idle */
	readonly peer: Peer | null;
	/** Remaining automatic reconnect attempts */
	readonly retriesLeft: number;
	readonly watchdogArmed: boolean;
	/**
	 * Starts a connection. Only valid while idle; otherwise resolves
	 * immediately with InvalidStateError. The promise never rejects. Called
	 * from a phase listener, the phase is checked once the current transition
	 * has finished.
	 */
	connect(peer: Peer, options?: ConnectOptions): Promise<ConnectOutcome>;
	/**
	 * Tears the connection down. Returns false when there is nothing to
	 * disconnect or `peer` is not the connected peer. Called from a phase
	 * listener, the teardown starts once the current transition has finished.
	 */
	disconnect(peer?: Peer): boolean;
	/** Runs disconnect cleanup when the radio powers off mid-connection */
	handleAdapterState(state: AdapterState): void;
	onPhaseChange(callback: TransitionCallback): () => void;
	dispose(): void;
}

interface Watchdog {
	timer: ReturnType<typeof setTimeout>;
	token: number;
}

/** Everything that belongs to one connection, mutated as a unit */
interface LinkRecord {
	peer: Peer;
	timeoutMs: number;
	watchdog: Watchdog | undefined;
	waiter: ((outcome: ConnectOutcome) => void) | undefined;
	abortCleanup: (() => void) | undefined;
}

/**
 * Creates the connection manager: phase machine, retry budget and watchdog
 * for a single peer link.
 *
 * - `connect` arms a watchdog; if the transport has not confirmed when it
 *   fires, the attempt is cancelled and reported as ConnectionTimeoutError.
 *   The initial connect is never retried.
 * - A drop with an error while connected (or a failed reconnect attempt)
 *   spends one unit of the retry budget on an immediate reconnect with a
 *   fresh watchdog. With no budget left the link is released and reported as
 *   ConnectionDroppedError.
 * - A drop without an error is a clean disconnect: straight back to idle.
 * - The budget is reset to `retryCount` when a user-initiated connect is
 *   confirmed, so consecutive drops exhaust it.
 *
 * Watchdog timers carry a token that is re-checked when they fire; a timer
 * whose connection attempt already settled does nothing.
 *
 * @example
 * ```typescript
 * const connection = createConnectionManager({
 *   transport,
 *   retryCount: 3,
 *   connectionTimeoutMs: 20000,
 *   logger,
 *   hooks: {
 *     onEstablished: (peer) => transport.discoverServices(peer),
 *     onFailure: (error) => console.error(error.message),
 *   },
 * });
 *
 * const outcome = await connection.connect(peer);
 * if (!outcome.ok) {
 *   console.error("connect failed:", outcome.error.message);
 * }
 * ```
 */
export function createConnectionManager(
	options: ConnectionManagerOptions,
): ConnectionManager {
	const { transport, retryCount, connectionTimeoutMs, logger } = options;
	const hooks = options.hooks ?? {};

	const machine = createStateMachine("idle", logger);
	let link: LinkRecord | null = null;
	let retriesLeft = retryCount;
	let watchdogToken = 0;
	let disposed = false;
	/** Set while phase listeners run; calls made from them wait for the transition to finish */
	let transitioning = false;
	/** Peers we asked the transport to disconnect; their confirmation is not a new event */
	const releasing = new Set<string>();

	function enter(phase: ConnectionPhase): void {
		transitioning = true;
		try {
			machine.transition(phase);
		} finally {
			transitioning = false;
		}
	}

	function afterTransition(task: () => void): void {
		if (transitioning) {
			queueMicrotask(task);
		} else {
			task();
		}
	}

	function armWatchdog(record: LinkRecord, reconnecting: boolean): void {
		disarmWatchdog(record);
		const token = ++watchdogToken;
		const timer = setTimeout(() => {
			onWatchdogFired(record, token, reconnecting);
		}, record.timeoutMs);
		record.watchdog = { timer, token };
	}

	function disarmWatchdog(record: LinkRecord): void {
		if (record.watchdog) {
			clearTimeout(record.watchdog.timer);
			record.watchdog = undefined;
		}
	}

	function onWatchdogFired(
		record: LinkRecord,
		token: number,
		reconnecting: boolean,
	): void {
		// Stale: the attempt this timer guarded has already settled
		if (link !== record || record.watchdog?.token !== token) {
			return;
		}
		record.watchdog = undefined;

		const error = new ConnectionTimeoutError(
			record.peer.id,
			record.timeoutMs,
			reconnecting,
		);
		logger.warn(error.message);
		release(record, { cancelTransport: true, error, failure: error });
	}

	/**
	 * Resolves the pending `connect` promise, if any. Safe to call repeatedly.
	 */
	function settleConnect(record: LinkRecord, outcome: ConnectOutcome): void {
		record.abortCleanup?.();
		record.abortCleanup = undefined;
		const waiter = record.waiter;
		record.waiter = undefined;
		waiter?.(outcome);
	}

	/**
	 * Ends the connection: cancels timers, optionally cancels the transport
	 * link, notifies the owner and returns to idle.
	 */
	function release(
		record: LinkRecord,
		how: {
			cancelTransport: boolean;
			error?: Error;
			failure?: ConnectionFailure;
			connectError?: ConnectError;
			viaDisconnecting?: boolean;
		},
	): void {
		disarmWatchdog(record);
		link = null;

		if (how.viaDisconnecting && machine.canTransition("disconnecting")) {
			enter("disconnecting");
		}

		if (how.cancelTransport) {
			releasing.add(record.peer.id);
			try {
				transport.disconnect(record.peer);
			} catch (e) {
				logger.error("Transport disconnect threw:", e);
			}
		}

		try {
			hooks.onReleased?.(record.peer, how.error);
		} catch (e) {
			logger.error("Release hook threw:", e);
		}

		if (machine.getState() !== "idle") {
			enter("idle");
		}

		if (how.failure) {
			try {
				hooks.onFailure?.(how.failure);
			} catch (e) {
				logger.error("Failure hook threw:", e);
			}
		}

		settleConnect(record, {
			ok: false,
			error:
				how.connectError ??
				how.failure ??
				new DisconnectedError("Disconnected before the connection was established"),
		});
	}

	/**
	 * Checks and spends one unit of the retry budget in a single step.
	 */
	function takeRetry(): boolean {
		if (retriesLeft < 1) {
			return false;
		}
		retriesLeft -= 1;
		return true;
	}

	function handleConnect({ peer }: TransportEvents["connect"]): void {
		releasing.delete(peer.id);
		const record = link;
		if (!record || record.peer.id !== peer.id) {
			logger.debug(`Ignoring connect event for ${peer.id}`);
			return;
		}

		const phase = machine.getState();
		if (phase !== "connecting" && phase !== "reconnecting") {
			logger.debug(`Ignoring connect event for ${peer.id} while ${phase}`);
			return;
		}

		disarmWatchdog(record);
		record.peer = peer;
		const reconnected = phase === "reconnecting";
		if (!reconnected) {
			retriesLeft = retryCount;
		}

		logger.info(`${reconnected ? "Reconnected" : "Connected"} to ${peer.id}`);

		try {
			hooks.onEstablished?.(peer, reconnected);
		} catch (e) {
			logger.error("Established hook threw:", e);
		}
		enter("connected");
		settleConnect(record, { ok: true, value: peer });
	}

	function handleDisconnect({ peer, error }: TransportEvents["disconnect"]): void {
		// A requested disconnect is confirmed without an error; a failure always
		// belongs to the current attempt
		if (!error && releasing.delete(peer.id)) {
			logger.debug(`Transport confirmed disconnect from ${peer.id}`);
			return;
		}

		const record = link;
		if (!record || record.peer.id !== peer.id) {
			logger.debug(`Ignoring disconnect event for ${peer.id}`);
			return;
		}

		const phase = machine.getState();

		if (!error) {
			logger.info(`Peer ${peer.id} disconnected`);
			release(record, {
				cancelTransport: false,
				connectError: new DisconnectedError("Peer disconnected"),
			});
			return;
		}

		if (phase === "connecting") {
			const failure = new ConnectionDroppedError(peer.id, error);
			logger.warn(failure.message);
			release(record, { cancelTransport: false, error, failure });
			return;
		}

		if (!takeRetry()) {
			const failure = new ConnectionDroppedError(peer.id, error);
			logger.warn(`${failure.message} (no retries left)`);
			release(record, { cancelTransport: false, error, failure });
			return;
		}

		logger.warn(
			`Connection to ${peer.id} lost (${error.message}), reconnecting; ${retriesLeft} retries left`,
		);

		try {
			hooks.onInterrupted?.(record.peer, error);
		} catch (e) {
			logger.error("Interrupted hook threw:", e);
		}

		if (phase === "connected") {
			enter("reconnecting");
		}
		armWatchdog(record, true);
		issueConnect(record);
	}

	function issueConnect(record: LinkRecord): void {
		try {
			transport.connect(record.peer);
		} catch (e) {
			const cause = normalizeError(e);
			const failure = new ConnectionDroppedError(record.peer.id, cause);
			logger.error(failure.message);
			if (link === record) {
				release(record, { cancelTransport: false, error: cause, failure });
			}
		}
	}

	const unsubscribers = [
		transport.events.on("connect", (event) => {
			afterTransition(() => handleConnect(event));
		}),
		transport.events.on("disconnect", (event) => {
			afterTransition(() => handleDisconnect(event));
		}),
	];

	function connect(
		peer: Peer,
		connectOptions: ConnectOptions = {},
	): Promise<ConnectOutcome> {
		const timeoutMs = connectOptions.timeoutMs ?? connectionTimeoutMs;
		if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
			throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
		}

		if (transitioning) {
			return new Promise<ConnectOutcome>((resolve) => {
				queueMicrotask(() => {
					resolve(connect(peer, connectOptions));
				});
			});
		}

		const phase = machine.getState();
		if (disposed || phase !== "idle") {
			return Promise.resolve({
				ok: false,
				error: new InvalidStateError("connect", disposed ? "disposed" : phase),
			});
		}

		const { signal } = connectOptions;
		if (signal?.aborted) {
			return Promise.resolve({
				ok: false,
				error: new AbortError(abortReason(signal)),
			});
		}

		const record: LinkRecord = {
			peer,
			timeoutMs,
			watchdog: undefined,
			waiter: undefined,
			abortCleanup: undefined,
		};

		const outcome = new Promise<ConnectOutcome>((resolve) => {
			record.waiter = resolve;
		});

		if (signal) {
			const onAbort = (): void => {
				afterTransition(() => {
					if (link === record && machine.getState() === "connecting") {
						logger.info(`Connect to ${peer.id} aborted`);
						release(record, {
							cancelTransport: true,
							connectError: new AbortError(abortReason(signal)),
						});
					}
				});
			};
			signal.addEventListener("abort", onAbort, { once: true });
			record.abortCleanup = () => {
				signal.removeEventListener("abort", onAbort);
			};
		}

		link = record;
		logger.debug(`Connecting to ${peer.id} (watchdog ${timeoutMs}ms)`);
		enter("connecting");
		armWatchdog(record, false);
		issueConnect(record);

		return outcome;
	}

	function disconnect(peer?: Peer): boolean {
		const record = link;
		if (!record) {
			logger.debug("Disconnect requested while idle");
			return false;
		}
		if (peer && peer.id !== record.peer.id) {
			logger.warn(`Disconnect requested for ${peer.id}, connected to ${record.peer.id}`);
			return false;
		}

		afterTransition(() => {
			if (link !== record) return;
			logger.info(`Disconnecting from ${record.peer.id}`);
			release(record, { cancelTransport: true, viaDisconnecting: true });
		});
		return true;
	}

	function handleAdapterState(state: AdapterState): void {
		if (state !== "poweredOff") {
			return;
		}
		afterTransition(() => {
			const record = link;
			if (!record) return;
			logger.warn(`Adapter powered off, releasing ${record.peer.id}`);
			release(record, {
				cancelTransport: true,
				viaDisconnecting: true,
				connectError: new DisconnectedError("Adapter powered off"),
			});
		});
	}

	function dispose(): void {
		if (disposed) return;
		disconnect();
		disposed = true;
		for (const unsubscribe of unsubscribers) {
			unsubscribe();
		}
	}

	return {
		get phase() {
			return machine.getState();
		},
		get peer() {
			return link?.peer ?? null;
		},
		get retriesLeft() {
			return retriesLeft;
		},
		get watchdogArmed() {
			return link?.watchdog !== undefined;
		},
		connect,
		disconnect,
		handleAdapterState,
		onPhaseChange: machine.onTransition,
		dispose,
	};
}
