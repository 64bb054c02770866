import type { ConnectionPhase } from "../types";
import { createConsoleLogger, type Logger } from "../utils/logger";

export type TransitionCallback = (
	from: ConnectionPhase,
	to: ConnectionPhase,
) => void;

export interface StateMachine {
	getState(): ConnectionPhase;
	canTransition(to: ConnectionPhase): boolean;
	/** @throws Error on an edge missing from the phase graph, or when called from a callback */
	transition(to: ConnectionPhase): void;
	onTransition(callback: TransitionCallback): () => void;
}

// connecting and reconnecting fall back to idle on a watchdog or a spent budget;
// connected falls back to idle on a clean drop
const PHASE_GRAPH = {
	idle: ["connecting"],
	connecting: ["connected", "disconnecting", "idle"],
	connected: ["reconnecting", "disconnecting", "idle"],
	reconnecting: ["connected", "disconnecting", "idle"],
	disconnecting: ["idle"],
} as const satisfies Record<ConnectionPhase, readonly ConnectionPhase[]>;

function hasEdge(from: ConnectionPhase, to: ConnectionPhase): boolean {
	const targets: readonly ConnectionPhase[] = PHASE_GRAPH[from];
	return targets.includes(to);
}

/**
 * Phase machine behind a connection. Listeners run synchronously, in
 * subscription order, after the phase has changed; a listener cannot start
 * another transition.
 *
 * @example
 * ```typescript
 * const phases = createStateMachine("idle", logger);
 * phases.onTransition((from, to) => logger.debug(`${from} -> ${to}`));
 *
 * if (phases.canTransition("connecting")) phases.transition("connecting");
 * ```
 */
export function createStateMachine(
	initialState: ConnectionPhase = "idle",
	logger: Logger = createConsoleLogger(),
): StateMachine {
	let current = initialState;
	let notifying = false;
	const listeners = new Set<TransitionCallback>();

	const notify = (from: ConnectionPhase, to: ConnectionPhase) => {
		notifying = true;
		try {
			for (const listener of listeners) {
				try {
					listener(from, to);
				} catch (e) {
					logger.error("Transition callback error:", e);
				}
			}
		} finally {
			notifying = false;
		}
	};

	return {
		getState: () => current,

		canTransition: (to) => hasEdge(current, to),

		transition(to) {
			if (notifying) {
				throw new Error(
					`Cannot transition while another transition is in progress (attempted ${current} -> ${to})`,
				);
			}
			if (!hasEdge(current, to)) {
				throw new Error(`Invalid state transition: ${current} -> ${to}`);
			}
			const from = current;
			current = to;
			notify(from, to);
		},

		onTransition(callback) {
			listeners.add(callback);
			return () => {
				listeners.delete(callback);
			};
		},
	};
}
