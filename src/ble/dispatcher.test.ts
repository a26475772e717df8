import * as fc from "fast-check";
import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../logging";
import { createStateCell } from "../state";
import type {
	PeripheralEvent,
	ReadRequestResponse,
	RequestInfo,
	WriteRequestResponse,
} from "../types";
import { decodeText, encodeText } from "../utils";
import { createEventDispatcher } from "./dispatcher";
import { createResponder } from "./responder";
import { TOGGLE_CHARACTERISTIC_UUID } from "./service";

const REQUEST: RequestInfo = {
	client: "aa:bb:cc:dd:ee:ff",
	service: "1234",
	characteristic: "2a3d",
};

function createSpyLogger(): Logger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function readEvent() {
	const responses: ReadRequestResponse[] = [];
	const responder = createResponder<ReadRequestResponse>((r) => {
		responses.push(r);
	});
	const event: PeripheralEvent = {
		type: "readRequest",
		request: REQUEST,
		offset: 0,
		responder,
	};
	return { event, responses, responder };
}

function writeEvent(value: Uint8Array | string) {
	const responses: WriteRequestResponse[] = [];
	const responder = createResponder<WriteRequestResponse>((r) => {
		responses.push(r);
	});
	const event: PeripheralEvent = {
		type: "writeRequest",
		request: REQUEST,
		offset: 0,
		value: typeof value === "string" ? encodeText(value) : value,
		responder,
	};
	return { event, responses, responder };
}

function setup(initial: "on" | "off" = "off") {
	const state = createStateCell(initial);
	const updateCharacteristic = vi
		.fn<(uuid: string, value: Uint8Array) => Promise<void>>()
		.mockResolvedValue(undefined);
	const logger = createSpyLogger();
	const dispatcher = createEventDispatcher({
		state,
		peripheral: { updateCharacteristic },
		logger,
	});
	const notified = () =>
		updateCharacteristic.mock.calls.map(([, value]) => decodeText(value));
	return { state, updateCharacteristic, logger, dispatcher, notified };
}

describe("createEventDispatcher", () => {
	describe("stateUpdate / subscriptionUpdate", () => {
		it("only logs power changes", async () => {
			const { dispatcher, state, logger, updateCharacteristic } = setup();

			await dispatcher.handle({ type: "stateUpdate", isPowered: true });

			expect(logger.info).toHaveBeenCalledWith("PowerOn: true");
			expect(state.read()).toBe("off");
			expect(updateCharacteristic).not.toHaveBeenCalled();
		});

		it("only logs subscription changes", async () => {
			const { dispatcher, logger, updateCharacteristic } = setup();

			await dispatcher.handle({
				type: "subscriptionUpdate",
				request: REQUEST,
				subscribed: true,
			});

			expect(logger.info).toHaveBeenCalledWith(
				"CharacteristicSubscriptionUpdate: Subscribed true client=aa:bb:cc:dd:ee:ff characteristic=2a3d",
			);
			expect(updateCharacteristic).not.toHaveBeenCalled();
		});
	});

	describe("readRequest", () => {
		it.each(["on", "off"] as const)("answers %s with the current state", async (initial) => {
			const { dispatcher } = setup(initial);
			const { event, responses } = readEvent();

			await dispatcher.handle(event);

			expect(responses).toHaveLength(1);
			expect(responses[0]?.response).toBe("success");
			expect(decodeText(responses[0]?.value ?? new Uint8Array())).toBe(initial);
		});

		it("logs and survives a closed responder", async () => {
			const { dispatcher, logger } = setup();
			const { event, responder } = readEvent();
			responder.close("client disconnected");

			await expect(dispatcher.handle(event)).resolves.toBeUndefined();

			expect(logger.error).toHaveBeenCalledWith(
				"Failed to send read response:",
				expect.objectContaining({ name: "ResponderClosedError" }),
			);
		});
	});

	describe("writeRequest", () => {
		it.each([
			["on", "on"],
			["off", "off"],
			["  on\n", "on"],
		] as const)("payload %j sets state to %s and notifies it", async (payload, expected) => {
			const { dispatcher, state, notified } = setup(
				expected === "on" ? "off" : "on",
			);
			const { event, responses } = writeEvent(payload);

			await dispatcher.handle(event);

			expect(state.read()).toBe(expected);
			expect(notified()).toEqual([expected]);
			expect(responses).toEqual([{ response: "success" }]);
		});

		it("logs the state banner", async () => {
			const { dispatcher, logger } = setup();

			await dispatcher.handle(writeEvent("on").event);

			expect(logger.info).toHaveBeenCalledWith("WriteRequest: Received message -> on");
			expect(logger.info).toHaveBeenCalledWith("STATE changed to: ON ✅");
		});

		it("notifies through the configured characteristic", async () => {
			const { dispatcher, updateCharacteristic } = setup();

			await dispatcher.handle(writeEvent("off").event);

			expect(updateCharacteristic).toHaveBeenCalledWith(
				TOGGLE_CHARACTERISTIC_UUID,
				encodeText("off"),
			);
		});

		it("compares case-sensitively", async () => {
			const { dispatcher, state, logger } = setup();
			const { event, responses } = writeEvent("ON");

			await dispatcher.handle(event);

			expect(state.read()).toBe("off");
			expect(logger.warn).toHaveBeenCalledWith(
				"WriteRequest: Unrecognized value -> ON",
			);
			expect(responses).toEqual([{ response: "success" }]);
		});

		it('leaves state alone for "maybe" but still acknowledges and forwards it', async () => {
			const { dispatcher, state, notified } = setup("on");
			const { event, responses } = writeEvent("maybe");

			await dispatcher.handle(event);

			expect(state.read()).toBe("on");
			expect(notified()).toEqual(["maybe"]);
			expect(responses).toEqual([{ response: "success" }]);
		});

		it("acknowledges non-UTF-8 payloads without touching state", async () => {
			const { dispatcher, state, logger, updateCharacteristic } = setup("on");
			const { event, responses } = writeEvent(new Uint8Array([0xff, 0xfe]));

			await dispatcher.handle(event);

			expect(state.read()).toBe("on");
			expect(updateCharacteristic).not.toHaveBeenCalled();
			expect(logger.error).toHaveBeenCalledWith(
				"WriteRequest: Received non-UTF8 data (2 bytes) from client=aa:bb:cc:dd:ee:ff characteristic=2a3d",
			);
			expect(responses).toEqual([{ response: "success" }]);
		});

		it("still responds when the notification fails", async () => {
			const { dispatcher, state, logger, updateCharacteristic } = setup();
			const failure = new Error("no subscribers table");
			updateCharacteristic.mockRejectedValueOnce(failure);
			const { event, responses } = writeEvent("on");

			await dispatcher.handle(event);

			expect(state.read()).toBe("on");
			expect(logger.error).toHaveBeenCalledWith(
				"Error updating characteristic in WriteRequest:",
				failure,
			);
			expect(responses).toEqual([{ response: "success" }]);
		});

		it("notifies before it responds", async () => {
			const order: string[] = [];
			const state = createStateCell();
			const dispatcher = createEventDispatcher({
				state,
				peripheral: {
					updateCharacteristic: async () => {
						order.push("notify");
					},
				},
				logger: createSpyLogger(),
			});
			const responder = createResponder<WriteRequestResponse>(() => {
				order.push("respond");
			});

			await dispatcher.handle({
				type: "writeRequest",
				request: REQUEST,
				offset: 0,
				value: encodeText("on"),
				responder,
			});

			expect(order).toEqual(["notify", "respond"]);
		});

		it("logs and survives a responder that was already used", async () => {
			const { dispatcher, logger } = setup();
			const { event, responder } = writeEvent("on");
			responder.send({ response: "success" });

			await dispatcher.handle(event);

			expect(logger.error).toHaveBeenCalledWith(
				"Failed to send write response:",
				expect.objectContaining({ name: "ResponseAlreadySentError" }),
			);
		});
	});

	describe("unknown events", () => {
		it("logs and discards them", async () => {
			const { dispatcher, logger, state } = setup();

			await dispatcher.handle({ type: "unknown", kind: "mtuChange" });

			expect(logger.info).toHaveBeenCalledWith("Unhandled event: mtuChange");
			expect(state.read()).toBe("off");
		});
	});

	describe("run", () => {
		it("handles events sequentially in arrival order", async () => {
			const order: string[] = [];
			let release: () => void = () => {};
			const gate = new Promise<void>((resolve) => {
				release = resolve;
			});
			const state = createStateCell();
			const dispatcher = createEventDispatcher({
				state,
				peripheral: {
					updateCharacteristic: async (_uuid, value) => {
						order.push(`notify:${decodeText(value)}`);
						await gate;
					},
				},
				logger: createSpyLogger(),
			});
			const write = writeEvent("on");
			const read = readEvent();

			async function* source(): AsyncGenerator<PeripheralEvent> {
				yield write.event;
				yield read.event;
			}

			const running = dispatcher.run(source());
			await new Promise((r) => setTimeout(r, 0));
			expect(order).toEqual(["notify:on"]);
			expect(read.responses).toHaveLength(0);

			release();
			await expect(running).resolves.toBe(2);
			expect(decodeText(read.responses[0]?.value ?? new Uint8Array())).toBe("on");
		});
	});

	describe("properties", () => {
		const payloadArb = fc.oneof(
			fc.constantFrom("on", "off", " on ", "off\n", "ON", "maybe", ""),
			fc.string(),
		);

		it("the last exact on/off write wins and every write is answered once", async () => {
			await fc.assert(
				fc.asyncProperty(
					fc.constantFrom("on" as const, "off" as const),
					fc.array(payloadArb, { maxLength: 30 }),
					async (initial, payloads) => {
						const { dispatcher, state } = setup(initial);
						const writes = payloads.map((p) => writeEvent(p));

						for (const write of writes) {
							await dispatcher.handle(write.event);
						}

						const tokens = payloads
							.map((p) => p.trim())
							.filter((p) => p === "on" || p === "off");
						const expected = tokens.at(-1) ?? initial;

						expect(state.read()).toBe(expected);
						for (const write of writes) {
							expect(write.responses).toEqual([{ response: "success" }]);
						}
					},
				),
				{ numRuns: 200 },
			);
		});

		it("every read reports the state at the time it is handled", async () => {
			await fc.assert(
				fc.asyncProperty(
					fc.array(fc.constantFrom("on", "off", "read"), { maxLength: 30 }),
					async (script) => {
						const { dispatcher } = setup();
						let current = "off";

						for (const step of script) {
							if (step === "read") {
								const read = readEvent();
								await dispatcher.handle(read.event);
								expect(read.responses).toHaveLength(1);
								expect(
									decodeText(read.responses[0]?.value ?? new Uint8Array()),
								).toBe(current);
							} else {
								await dispatcher.handle(writeEvent(step).event);
								current = step;
							}
						}
					},
				),
				{ numRuns: 200 },
			);
		});
	});
});
