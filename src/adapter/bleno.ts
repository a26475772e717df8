import { createRequire } from "node:module";
import { createResponder } from "../ble/responder";
import { createConsoleLogger, type Logger } from "../logging";
import type {
	AttributePermission,
	CharacteristicDefinition,
	DescriptorDefinition,
	EventSink,
	Peripheral,
	PeripheralEvent,
	ReadRequestResponse,
	RequestInfo,
	RequestResponse,
	ServiceDescriptor,
	WriteRequestResponse,
} from "../types";
import { toBytes, toCompactUuid, uuidEquals } from "../utils";

/** ATT result codes passed to bleno request callbacks */
export const RESULT_CODES: Readonly<Record<RequestResponse, number>> = {
	success: 0x00,
	invalidOffset: 0x07,
	invalidAttributeLength: 0x0d,
	unlikelyError: 0x0e,
};

export interface BlenoDescriptorOptions {
	uuid: string;
	value?: Buffer;
}

export interface BlenoCharacteristicOptions {
	uuid: string;
	properties: string[];
	secure: string[];
	descriptors: object[];
	value?: Buffer;
	onReadRequest(
		offset: number,
		callback: (result: number, data?: Buffer) => void,
	): void;
	onWriteRequest(
		data: Buffer,
		offset: number,
		withoutResponse: boolean,
		callback: (result: number) => void,
	): void;
	onSubscribe(maxValueSize: number, updateValueCallback: (data: Buffer) => void): void;
	onUnsubscribe(): void;
}

export interface BlenoServiceOptions {
	uuid: string;
	characteristics: object[];
}

type ErrorCallback = (error?: Error | null) => void;

/**
 * The parts of `@abandonware/bleno` this adapter drives. The package ships
 * no type declarations; the shape is checked at load time by
 * {@link isBlenoModule}.
 */
export interface BlenoModule {
	readonly state: string;
	on(event: string, listener: (...args: unknown[]) => void): unknown;
	setServices(services: object[], callback?: ErrorCallback): void;
	startAdvertising(
		name: string,
		serviceUuids: string[],
		callback?: ErrorCallback,
	): void;
	stopAdvertising(callback?: () => void): void;
	PrimaryService: new (options: BlenoServiceOptions) => object;
	Characteristic: new (options: BlenoCharacteristicOptions) => object;
	Descriptor: new (options: BlenoDescriptorOptions) => object;
}

const REQUIRED_FUNCTIONS = [
	"on",
	"setServices",
	"startAdvertising",
	"stopAdvertising",
	"PrimaryService",
	"Characteristic",
	"Descriptor",
] as const;

/** bleno events the core has no counterpart for; forwarded as `unknown` */
const FORWARDED_EVENTS = [
	"accept",
	"disconnect",
	"mtuChange",
	"rssiUpdate",
	"advertisingStartError",
	"servicesSetError",
] as const;

const NO_CLIENT = "unknown";

export function isBlenoModule(value: unknown): value is BlenoModule {
	if ((typeof value !== "object" && typeof value !== "function") || value === null) {
		return false;
	}
	return (
		typeof Reflect.get(value, "state") === "string" &&
		REQUIRED_FUNCTIONS.every((key) => typeof Reflect.get(value, key) === "function")
	);
}

/**
 * Loads `@abandonware/bleno`. Requiring it opens the HCI socket, so this runs
 * only when a real radio is wanted.
 *
 * @throws Error if the package is missing or exports something unexpected
 */
export function loadBleno(): BlenoModule {
	let loaded: unknown;
	try {
		loaded = createRequire(import.meta.url)("@abandonware/bleno");
	} catch (e) {
		throw new Error(
			"@abandonware/bleno could not be loaded; install it or run with --simulate",
			{ cause: e },
		);
	}
	if (!isBlenoModule(loaded)) {
		throw new Error("@abandonware/bleno does not export a peripheral stack");
	}
	return loaded;
}

function toSecure(permissions: readonly AttributePermission[]): string[] {
	const secure: string[] = [];
	if (permissions.includes("readEncryptionRequired")) secure.push("read");
	if (permissions.includes("writeEncryptionRequired")) secure.push("write");
	return secure;
}

function callbackToPromise(
	start: (callback: ErrorCallback) => void,
): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		start((error) => {
			if (error) {
				reject(error);
			} else {
				resolve();
			}
		});
	});
}

export interface BlenoPeripheralOptions {
	/** Defaults to {@link loadBleno} */
	bleno?: BlenoModule;
	logger?: Logger;
}

/**
 * Adapts bleno's callback API to {@link Peripheral}.
 *
 * Each bleno request callback is wrapped in a responder and delivered to the
 * sink as an event. bleno reports no client per request; the address from
 * the last `accept` event is used.
 *
 * @example
 * ```typescript
 * const channel = createEventChannel<PeripheralEvent>();
 * const peripheral = createBlenoPeripheral(channel);
 * ```
 */
export function createBlenoPeripheral(
	events: EventSink<PeripheralEvent>,
	options: BlenoPeripheralOptions = {},
): Peripheral {
	const bleno = options.bleno ?? loadBleno();
	const logger = options.logger ?? createConsoleLogger({ scope: "bleno" });

	let client = NO_CLIENT;
	const updaters = new Map<string, (data: Buffer) => void>();
	// bleno replaces its whole GATT table on every setServices call
	const registered: ServiceDescriptor[] = [];
	const adaptedServices: object[] = [];

	function deliver(event: PeripheralEvent): boolean {
		if (events.trySend(event)) return true;
		logger.warn(`Event channel full, dropping ${event.type}`);
		return false;
	}

	bleno.on("stateChange", (state) => {
		deliver({ type: "stateUpdate", isPowered: state === "poweredOn" });
	});

	bleno.on("accept", (address) => {
		client = String(address);
	});
	bleno.on("disconnect", () => {
		client = NO_CLIENT;
		updaters.clear();
	});

	for (const kind of FORWARDED_EVENTS) {
		bleno.on(kind, (detail) => {
			deliver(
				detail === undefined
					? { type: "unknown", kind }
					: { type: "unknown", kind, detail },
			);
		});
	}

	function adaptDescriptor(descriptor: DescriptorDefinition): object {
		return new bleno.Descriptor({
			uuid: toCompactUuid(descriptor.uuid),
			...(descriptor.value && { value: Buffer.from(descriptor.value) }),
		});
	}

	function adaptCharacteristic(
		service: ServiceDescriptor,
		characteristic: CharacteristicDefinition,
	): object {
		const request: () => RequestInfo = () => ({
			client,
			service: service.uuid,
			characteristic: characteristic.uuid,
		});

		return new bleno.Characteristic({
			uuid: toCompactUuid(characteristic.uuid),
			properties: [...characteristic.properties],
			secure: toSecure(characteristic.permissions),
			descriptors: characteristic.descriptors.map(adaptDescriptor),
			...(characteristic.value && { value: Buffer.from(characteristic.value) }),

			onReadRequest(offset, callback) {
				const responder = createResponder<ReadRequestResponse>((res) => {
					callback(RESULT_CODES[res.response], Buffer.from(res.value));
				});
				const event: PeripheralEvent = {
					type: "readRequest",
					request: request(),
					offset,
					responder,
				};
				if (!deliver(event)) {
					responder.send({ value: new Uint8Array(), response: "unlikelyError" });
				}
			},

			onWriteRequest(data, offset, _withoutResponse, callback) {
				const responder = createResponder<WriteRequestResponse>((res) => {
					callback(RESULT_CODES[res.response]);
				});
				const event: PeripheralEvent = {
					type: "writeRequest",
					request: request(),
					offset,
					value: toBytes(data),
					responder,
				};
				if (!deliver(event)) {
					responder.send({ response: "unlikelyError" });
				}
			},

			onSubscribe(_maxValueSize, updateValueCallback) {
				updaters.set(characteristic.uuid, updateValueCallback);
				deliver({ type: "subscriptionUpdate", request: request(), subscribed: true });
			},

			onUnsubscribe() {
				updaters.delete(characteristic.uuid);
				deliver({ type: "subscriptionUpdate", request: request(), subscribed: false });
			},
		});
	}

	function adaptService(service: ServiceDescriptor): object {
		return new bleno.PrimaryService({
			uuid: toCompactUuid(service.uuid),
			characteristics: service.characteristics.map((c) =>
				adaptCharacteristic(service, c),
			),
		});
	}

	function findCharacteristic(uuid: string): CharacteristicDefinition | undefined {
		for (const service of registered) {
			const found = service.characteristics.find((c) => uuidEquals(c.uuid, uuid));
			if (found) return found;
		}
		return undefined;
	}

	return {
		async isPowered() {
			return bleno.state === "poweredOn";
		},

		async addService(service) {
			const adapted = adaptService(service);
			await callbackToPromise((done) =>
				bleno.setServices([...adaptedServices, adapted], done),
			);
			adaptedServices.push(adapted);
			registered.push(service);
		},

		async startAdvertising(name, serviceUuids) {
			await callbackToPromise((done) =>
				bleno.startAdvertising(name, serviceUuids.map(toCompactUuid), done),
			);
		},

		async stopAdvertising() {
			await new Promise<void>((resolve) => {
				bleno.stopAdvertising(resolve);
			});
		},

		async updateCharacteristic(uuid, value) {
			const characteristic = findCharacteristic(uuid);
			if (!characteristic) {
				throw new Error(`Unknown characteristic ${uuid}`);
			}
			updaters.get(characteristic.uuid)?.(Buffer.from(value));
		},
	};

}
