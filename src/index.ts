/**
 * ble-toggle - A BLE peripheral exposing one on/off toggle, kept in sync
 * between remote GATT clients and a local console.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import { createInterface } from "node:readline";
 * import { createBlenoPeripheral, startApp } from "ble-toggle";
 *
 * const app = await startApp({
 *   createPeripheral: (events) => createBlenoPeripheral(events),
 *   input: createInterface({ input: process.stdin }),
 * });
 * ```
 */

// Adapters
export {
	type BlenoModule,
	type BlenoPeripheralOptions,
	createBlenoPeripheral,
	createMemoryPeripheral,
	isBlenoModule,
	loadBleno,
	type MemoryNotification,
	type MemoryPeripheral,
	type MemoryPeripheralOptions,
} from "./adapter";
// Application
export {
	type AppHandle,
	type AppOptions,
	type FailedApp,
	type RunningApp,
	startApp,
} from "./app";
// Async utilities
export {
	createEventChannel,
	DEFAULT_CHANNEL_CAPACITY,
	type EventChannel,
	type EventChannelOptions,
	pollUntil,
	type PollUntilOptions,
} from "./async";
// BLE core
export {
	AUXILIARY_CHARACTERISTIC_UUID,
	BOOTSTRAP_TRANSITIONS,
	type BootstrapOptions,
	type BootstrapResult,
	type BootstrapSequencer,
	type BootstrapState,
	createBootstrapSequencer,
	createEventDispatcher,
	createResponder,
	createToggleService,
	type EventDispatcher,
	type EventDispatcherOptions,
	type Responder,
	type ResponderHandle,
	TOGGLE_CHARACTERISTIC_UUID,
	TOGGLE_DESCRIPTOR_UUID,
	TOGGLE_DESCRIPTOR_VALUE,
	TOGGLE_SERVICE_UUID,
} from "./ble";
// Configuration
export {
	type AppConfig,
	DEFAULT_CONFIG,
	ENV_KEYS,
	resolveConfig,
} from "./config";
// Console
export {
	type CommandLoop,
	type CommandLoopOptions,
	type CommandLoopResult,
	createCommandLoop,
} from "./console";
// Errors
export {
	AbortError,
	ChannelClosedError,
	ConfigError,
	ResponderClosedError,
	ResponseAlreadySentError,
	StartupError,
	type StartupStage,
} from "./errors";
// Logging
export {
	createConsoleLogger,
	createNoOpLogger,
	type Logger,
	type LogLevel,
	normalizeLogLevel,
} from "./logging";
// State management
export {
	createEventEmitter,
	createStateCell,
	createStateMachine,
	type EventMap,
	formatStateBanner,
	parseToggleToken,
	type StateCell,
	type StateChange,
	type StateMachine,
	type TransitionCallback,
	type TypedEventEmitter,
} from "./state";
// Types
export type {
	CharacteristicDefinition,
	DescriptorDefinition,
	EventSink,
	Peripheral,
	PeripheralEvent,
	PeripheralFactory,
	ReadRequestResponse,
	RequestInfo,
	RequestResponse,
	ServiceDescriptor,
	ToggleState,
	WriteRequestResponse,
} from "./types";
// Utils
export {
	decodeText,
	encodeText,
	toCompactUuid,
	toFullUuid,
	uuidEquals,
} from "./utils";
