export {
	BOOTSTRAP_TRANSITIONS,
	type BootstrapOptions,
	type BootstrapResult,
	type BootstrapSequencer,
	type BootstrapState,
	createBootstrapSequencer,
	DEFAULT_POWER_POLL_INTERVAL_MS,
} from "./bootstrap";
export {
	createEventDispatcher,
	type EventDispatcher,
	type EventDispatcherOptions,
} from "./dispatcher";
export {
	createResponder,
	type Responder,
	type ResponderHandle,
} from "./responder";
export {
	AUXILIARY_CHARACTERISTIC_UUID,
	createToggleService,
	TOGGLE_CHARACTERISTIC_UUID,
	TOGGLE_DESCRIPTOR_UUID,
	TOGGLE_DESCRIPTOR_VALUE,
	TOGGLE_SERVICE_UUID,
} from "./service";
