export {
	createEventEmitter,
	type EventEmitterOptions,
	type EventMap,
	type TypedEventEmitter,
} from "./event-emitter";

export {
	createStateMachine,
	type StateMachine,
	type TransitionCallback,
} from "./state-machine";
