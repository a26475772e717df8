import { createResponder, type ResponderHandle } from "../ble/responder";
import { TOGGLE_CHARACTERISTIC_UUID } from "../ble/service";
import { normalizeError, ResponderClosedError } from "../errors";
import { createEventEmitter } from "../state";
import type {
	CharacteristicDefinition,
	EventSink,
	Peripheral,
	PeripheralEvent,
	ReadRequestResponse,
	RequestInfo,
	ServiceDescriptor,
	WriteRequestResponse,
} from "../types";
import { encodeText, uuidEquals } from "../utils";

export interface MemoryNotification {
	client: string;
	characteristic: string;
	value: Uint8Array;
}

export interface MemoryAdvertisement {
	name: string;
	serviceUuids: readonly string[];
}

export interface MemoryPeripheralOptions {
	/** @default true */
	powered?: boolean;
	/** Make addService reject with this error */
	addServiceError?: Error;
	/** Make startAdvertising reject with this error */
	startAdvertisingError?: Error;
	/**
	 * Notifications kept for `getNotifications`; older ones are dropped.
	 * @default 1000
	 */
	notificationLimit?: number;
}

const DEFAULT_NOTIFICATION_LIMIT = 1000;

/**
 * In-process peripheral for tests and the `--simulate` mode.
 *
 * Remote clients are plain strings. `read` and `write` go through the event
 * sink exactly like traffic from a real radio and resolve when the core
 * answers.
 */
export interface MemoryPeripheral extends Peripheral {
	setPowered(powered: boolean): void;
	subscribe(client: string, characteristic?: string): void;
	unsubscribe(client: string, characteristic?: string): void;
	read(
		client: string,
		characteristic?: string,
		offset?: number,
	): Promise<ReadRequestResponse>;
	write(
		client: string,
		value: Uint8Array | string,
		characteristic?: string,
	): Promise<WriteRequestResponse>;
	/**
	 * Drops the client: its subscriptions end and its unanswered requests
	 * reject with ResponderClosedError.
	 */
	disconnect(client: string): void;
	/** Delivers an event kind the core does not know */
	emitUnknown(kind: string, detail?: unknown): void;
	getServices(): readonly ServiceDescriptor[];
	getAdvertisement(): MemoryAdvertisement | null;
	getValue(characteristic?: string): Uint8Array | undefined;
	/** The most recent notifications, oldest first */
	getNotifications(): readonly MemoryNotification[];
	onNotification(listener: (notification: MemoryNotification) => void): () => void;
}

interface PendingRequest {
	client: string;
	drop(reason: string): void;
}

export function createMemoryPeripheral(
	events: EventSink<PeripheralEvent>,
	options: MemoryPeripheralOptions = {},
): MemoryPeripheral {
	let powered = options.powered ?? true;
	const services: ServiceDescriptor[] = [];
	let advertisement: MemoryAdvertisement | null = null;
	const values = new Map<string, Uint8Array>();
	const subscribers = new Map<string, Set<string>>();
	const notificationLimit = options.notificationLimit ?? DEFAULT_NOTIFICATION_LIMIT;
	const notifications: MemoryNotification[] = [];
	const pending = new Set<PendingRequest>();
	const emitter = createEventEmitter<{ notification: MemoryNotification }>();

	function findCharacteristic(
		uuid: string,
	): { service: ServiceDescriptor; characteristic: CharacteristicDefinition } | null {
		for (const service of services) {
			const characteristic = service.characteristics.find((c) =>
				uuidEquals(c.uuid, uuid),
			);
			if (characteristic) {
				return { service, characteristic };
			}
		}
		return null;
	}

	function requireCharacteristic(uuid: string) {
		const found = findCharacteristic(uuid);
		if (!found) {
			throw new Error(`Unknown characteristic ${uuid}`);
		}
		return found;
	}

	function requestInfo(client: string, uuid: string): RequestInfo {
		const { service, characteristic } = requireCharacteristic(uuid);
		return { client, service: service.uuid, characteristic: characteristic.uuid };
	}

	function subscriberSet(uuid: string): Set<string> {
		const { characteristic } = requireCharacteristic(uuid);
		let set = subscribers.get(characteristic.uuid);
		if (!set) {
			set = new Set();
			subscribers.set(characteristic.uuid, set);
		}
		return set;
	}

	function track<T>(
		client: string,
		build: (responder: ResponderHandle<T>) => PeripheralEvent,
	): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			const responder = createResponder<T>((response) => {
				pending.delete(entry);
				resolve(response);
			});
			const entry: PendingRequest = {
				client,
				drop: (reason) => {
					pending.delete(entry);
					responder.close(reason);
					reject(new ResponderClosedError(reason));
				},
			};
			pending.add(entry);

			events.send(build(responder)).catch((error: unknown) => {
				pending.delete(entry);
				responder.close();
				reject(normalizeError(error));
			});
		});
	}

	return {
		async isPowered() {
			return powered;
		},

		async addService(service) {
			if (options.addServiceError) {
				throw options.addServiceError;
			}
			services.push(service);
			for (const characteristic of service.characteristics) {
				if (characteristic.value) {
					values.set(characteristic.uuid, characteristic.value);
				}
			}
		},

		async startAdvertising(name, serviceUuids) {
			if (options.startAdvertisingError) {
				throw options.startAdvertisingError;
			}
			if (!powered) {
				throw new Error("Cannot advertise while powered off");
			}
			advertisement = { name, serviceUuids: [...serviceUuids] };
		},

		async stopAdvertising() {
			advertisement = null;
		},

		async updateCharacteristic(uuid, value) {
			const { characteristic } = requireCharacteristic(uuid);
			values.set(characteristic.uuid, value);

			for (const client of subscribers.get(characteristic.uuid) ?? []) {
				const notification = {
					client,
					characteristic: characteristic.uuid,
					value,
				};
				notifications.push(notification);
				if (notifications.length > notificationLimit) {
					notifications.shift();
				}
				emitter.emit("notification", notification);
			}
		},

		setPowered(next) {
			if (next === powered) return;
			powered = next;
			if (!powered) {
				advertisement = null;
			}
			events.trySend({ type: "stateUpdate", isPowered: next });
		},

		subscribe(client, characteristic = TOGGLE_CHARACTERISTIC_UUID) {
			subscriberSet(characteristic).add(client);
			events.trySend({
				type: "subscriptionUpdate",
				request: requestInfo(client, characteristic),
				subscribed: true,
			});
		},

		unsubscribe(client, characteristic = TOGGLE_CHARACTERISTIC_UUID) {
			if (!subscriberSet(characteristic).delete(client)) return;
			events.trySend({
				type: "subscriptionUpdate",
				request: requestInfo(client, characteristic),
				subscribed: false,
			});
		},

		read(client, characteristic = TOGGLE_CHARACTERISTIC_UUID, offset = 0) {
			const request = requestInfo(client, characteristic);
			return track<ReadRequestResponse>(client, (responder) => ({
				type: "readRequest",
				request,
				offset,
				responder,
			}));
		},

		write(client, value, characteristic = TOGGLE_CHARACTERISTIC_UUID) {
			const request = requestInfo(client, characteristic);
			const bytes = typeof value === "string" ? encodeText(value) : value;
			return track<WriteRequestResponse>(client, (responder) => ({
				type: "writeRequest",
				request,
				offset: 0,
				value: bytes,
				responder,
			}));
		},

		disconnect(client) {
			for (const set of subscribers.values()) {
				set.delete(client);
			}
			for (const entry of [...pending]) {
				if (entry.client === client) {
					entry.drop(`Client ${client} disconnected`);
				}
			}
		},

		emitUnknown(kind, detail) {
			events.trySend(
				detail === undefined
					? { type: "unknown", kind }
					: { type: "unknown", kind, detail },
			);
		},

		getServices: () => [...services],
		getAdvertisement: () => advertisement,
		getValue: (characteristic = TOGGLE_CHARACTERISTIC_UUID) => {
			const found = findCharacteristic(characteristic);
			return found ? values.get(found.characteristic.uuid) : undefined;
		},
		getNotifications: () => [...notifications],
		onNotification: (listener) => emitter.on("notification", listener),
	};
}
