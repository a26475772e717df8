/**
 * @fileoverview Core type definitions for ble-toggle.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`null`**: Intentionally empty or "not found"
 *   - `decodeText()` returns `null` for bytes that are not valid UTF-8
 *   - `EventChannel.receive()` returns `null` once the channel is closed and drained
 *
 * - **`undefined`**: Not set yet or optional property
 *   - `CharacteristicDefinition.value` is `undefined` when the characteristic
 *     has no static value
 */

import type { Responder } from "./ble/responder";

/**
 * The single value exposed by the peripheral.
 */
export type ToggleState = "on" | "off";

/**
 * Where a state write came from. Used for diagnostics only.
 */
export type StateSource = "remote" | "console";

/**
 * GATT characteristic properties, named the way peripheral stacks
 * declare them.
 */
export type CharacteristicProperty =
	| "broadcast"
	| "read"
	| "writeWithoutResponse"
	| "write"
	| "notify"
	| "indicate";

export type AttributePermission =
	| "readable"
	| "writeable"
	| "readEncryptionRequired"
	| "writeEncryptionRequired";

export interface DescriptorDefinition {
	readonly uuid: string;
	readonly value?: Uint8Array;
}

export interface CharacteristicDefinition {
	readonly uuid: string;
	readonly properties: readonly CharacteristicProperty[];
	readonly permissions: readonly AttributePermission[];
	readonly value?: Uint8Array;
	readonly descriptors: readonly DescriptorDefinition[];
}

/**
 * Schema of a GATT service handed to the peripheral for registration.
 * Built once at startup and frozen.
 */
export interface ServiceDescriptor {
	readonly uuid: string;
	readonly primary: boolean;
	readonly characteristics: readonly CharacteristicDefinition[];
}

/**
 * Identifies the remote party and attribute behind a request.
 */
export interface RequestInfo {
	/** Remote client address or handle, as reported by the peripheral stack */
	readonly client: string;
	readonly service: string;
	readonly characteristic: string;
}

/**
 * ATT result codes a response can carry. The toggle only ever answers
 * `success`; the others exist so facades can map their own failures.
 */
export type RequestResponse =
	| "success"
	| "invalidOffset"
	| "invalidAttributeLength"
	| "unlikelyError";

export interface ReadRequestResponse {
	readonly value: Uint8Array;
	readonly response: RequestResponse;
}

export interface WriteRequestResponse {
	readonly response: RequestResponse;
}

/**
 * Events delivered by a peripheral to the core, in arrival order.
 */
export type PeripheralEvent =
	| { readonly type: "stateUpdate"; readonly isPowered: boolean }
	| {
			readonly type: "subscriptionUpdate";
			readonly request: RequestInfo;
			readonly subscribed: boolean;
	  }
	| {
			readonly type: "readRequest";
			readonly request: RequestInfo;
			readonly offset: number;
			readonly responder: Responder<ReadRequestResponse>;
	  }
	| {
			readonly type: "writeRequest";
			readonly request: RequestInfo;
			readonly offset: number;
			readonly value: Uint8Array;
			readonly responder: Responder<WriteRequestResponse>;
	  }
	| {
			readonly type: "unknown";
			readonly kind: string;
			readonly detail?: unknown;
	  };

/**
 * Write side of the event channel, as seen by a peripheral.
 */
export interface EventSink<T> {
	/**
	 * Enqueues without waiting.
	 * @returns false if the channel is full or closed
	 */
	trySend(item: T): boolean;
	/**
	 * Enqueues, waiting for capacity when the channel is full.
	 * @throws ChannelClosedError if the channel is closed
	 */
	send(item: T): Promise<void>;
}

/**
 * The BLE peripheral stack the core talks to.
 *
 * @remarks
 * Implementations own the radio, the subscriber table and the wire encoding.
 * They deliver inbound traffic as {@link PeripheralEvent}s to the sink they
 * were created with.
 *
 * @example Custom peripheral
 * ```typescript
 * const createMyPeripheral: PeripheralFactory = (events) => ({
 *   async isPowered() {
 *     return myStack.state === "poweredOn";
 *   },
 *   async addService(service) {
 *     await myStack.register(service);
 *   },
 *   async startAdvertising(name, serviceUuids) {
 *     await myStack.advertise(name, serviceUuids);
 *   },
 *   async updateCharacteristic(uuid, value) {
 *     myStack.notify(uuid, value);
 *   },
 * });
 * ```
 */
export interface Peripheral {
	isPowered(): Promise<boolean>;
	addService(service: ServiceDescriptor): Promise<void>;
	startAdvertising(name: string, serviceUuids: readonly string[]): Promise<void>;
	/**
	 * Stores a new characteristic value and notifies current subscribers.
	 */
	updateCharacteristic(uuid: string, value: Uint8Array): Promise<void>;
	stopAdvertising?(): Promise<void>;
}

export type PeripheralFactory = (
	events: EventSink<PeripheralEvent>,
) => Peripheral | Promise<Peripheral>;
