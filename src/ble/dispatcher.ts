import { createConsoleLogger, type Logger } from "../logging";
import { formatStateBanner, parseToggleToken, type StateCell } from "../state";
import type {
	Peripheral,
	PeripheralEvent,
	ReadRequestResponse,
	RequestInfo,
	WriteRequestResponse,
} from "../types";
import { decodeText, encodeText } from "../utils";
import type { Responder } from "./responder";
import { TOGGLE_CHARACTERISTIC_UUID } from "./service";

export interface EventDispatcherOptions {
	/** The shared toggle; never copied */
	state: StateCell;
	/** Used to notify subscribers after a remote write */
	peripheral: Pick<Peripheral, "updateCharacteristic">;
	/** @default TOGGLE_CHARACTERISTIC_UUID */
	characteristicUuid?: string;
	logger?: Logger;
}

export interface EventDispatcher {
	/**
	 * Reacts to one event. Read and write requests are answered exactly once
	 * before this resolves. Never rejects: every failure is logged.
	 */
	handle(event: PeripheralEvent): Promise<void>;
	/**
	 * Handles events one at a time, in arrival order, until the source ends.
	 * @returns the number of events handled
	 */
	run(events: AsyncIterable<PeripheralEvent>): Promise<number>;
}

function describeRequest(request: RequestInfo): string {
	return `client=${request.client} characteristic=${request.characteristic}`;
}

/**
 * Creates the consumer side of the peripheral event stream.
 *
 * Remote writes are matched case-sensitively after trimming: only exactly
 * `on` or `off` change the state. Every write is acknowledged with success,
 * including undecodable and unrecognized payloads.
 *
 * @example
 * ```typescript
 * const channel = createEventChannel<PeripheralEvent>();
 * const peripheral = await createPeripheral(channel);
 * const dispatcher = createEventDispatcher({ state, peripheral });
 *
 * void dispatcher.run(channel);
 * ```
 */
export function createEventDispatcher(
	options: EventDispatcherOptions,
): EventDispatcher {
	const {
		state,
		peripheral,
		characteristicUuid = TOGGLE_CHARACTERISTIC_UUID,
		logger = createConsoleLogger({ scope: "dispatcher" }),
	} = options;

	function respond<T>(responder: Responder<T>, response: T, kind: string): void {
		try {
			responder.send(response);
		} catch (e) {
			logger.error(`Failed to send ${kind} response:`, e);
		}
	}

	async function notify(value: string): Promise<void> {
		try {
			await peripheral.updateCharacteristic(
				characteristicUuid,
				encodeText(value),
			);
		} catch (e) {
			logger.error("Error updating characteristic in WriteRequest:", e);
		}
	}

	function handleRead(
		request: RequestInfo,
		offset: number,
		responder: Responder<ReadRequestResponse>,
	): void {
		const value = state.read();
		logger.info(
			`ReadRequest: ${describeRequest(request)} Offset: ${offset} -> Responding: ${value}`,
		);
		respond(responder, { value: encodeText(value), response: "success" }, "read");
	}

	async function handleWrite(
		request: RequestInfo,
		offset: number,
		payload: Uint8Array,
		responder: Responder<WriteRequestResponse>,
	): Promise<void> {
		const message = decodeText(payload);

		if (message === null) {
			logger.error(
				`WriteRequest: Received non-UTF8 data (${payload.byteLength} bytes) from ${describeRequest(request)}`,
			);
		} else {
			logger.info(`WriteRequest: Received message -> ${message}`);
			logger.debug(`WriteRequest: ${describeRequest(request)} Offset: ${offset}`);

			const next = parseToggleToken(message.trim());
			if (next === null) {
				logger.warn(`WriteRequest: Unrecognized value -> ${message}`);
				await notify(message);
			} else {
				state.write(next, "remote");
				logger.info(formatStateBanner(next));
				await notify(next);
			}
		}

		respond(responder, { response: "success" }, "write");
	}

	async function handle(event: PeripheralEvent): Promise<void> {
		switch (event.type) {
			case "stateUpdate":
				logger.info(`PowerOn: ${event.isPowered}`);
				return;
			case "subscriptionUpdate":
				logger.info(
					`CharacteristicSubscriptionUpdate: Subscribed ${event.subscribed} ${describeRequest(event.request)}`,
				);
				return;
			case "readRequest":
				handleRead(event.request, event.offset, event.responder);
				return;
			case "writeRequest":
				await handleWrite(
					event.request,
					event.offset,
					event.value,
					event.responder,
				);
				return;
			case "unknown":
				logger.info(`Unhandled event: ${event.kind}`);
				return;
		}
	}

	async function run(events: AsyncIterable<PeripheralEvent>): Promise<number> {
		let handled = 0;
		for await (const event of events) {
			await handle(event);
			handled++;
		}
		return handled;
	}

	return { handle, run };
}
