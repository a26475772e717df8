export {
	createEventEmitter,
	type EventEmitterOptions,
	type EventMap,
	type TypedEventEmitter,
} from "./event-emitter";

export {
	createStateCell,
	formatStateBanner,
	parseToggleToken,
	type StateCell,
	type StateChange,
} from "./state-cell";

export {
	createStateMachine,
	type StateMachine,
	type StateMachineOptions,
	type TransitionCallback,
	type TransitionTable,
} from "./state-machine";
