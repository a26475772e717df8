/**
 * End-to-End Toggle Scenario Tests
 *
 * Runs the whole application against the in-memory peripheral: remote
 * clients, the local console and the startup sequence together.
 */

import { once } from "node:events";
import { createInterface } from "node:readline";
import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createMemoryPeripheral, type MemoryPeripheral } from "../../adapter";
import { startApp, type AppOptions, type RunningApp } from "../../app";
import { createEventChannel } from "../../async";
import { TOGGLE_CHARACTERISTIC_UUID, TOGGLE_SERVICE_UUID } from "../../ble";
import { type AppConfig, DEFAULT_CONFIG } from "../../config";
import { AbortError, StartupError } from "../../errors";
import type { Logger } from "../../logging";
import { decodeText } from "../../utils";

// =============================================================================
// Helpers
// =============================================================================

function createSpyLogger(): Logger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createLoggers() {
	const loggers = new Map<string, Logger>();
	const createLogger = (scope: string): Logger => {
		const existing = loggers.get(scope);
		if (existing) return existing;
		const logger = createSpyLogger();
		loggers.set(scope, logger);
		return logger;
	};
	return { createLogger, get: createLogger };
}

/** Console input that tests feed line by line */
function createLineSource() {
	const channel = createEventChannel<{ line: string }>();
	async function* lines(): AsyncGenerator<string> {
		for await (const { line } of channel) {
			yield line;
		}
	}
	return {
		input: lines(),
		push: (line: string) => channel.trySend({ line }),
		end: () => channel.close(),
	};
}

interface Harness {
	created: MemoryPeripheral[];
	loggers: ReturnType<typeof createLoggers>;
	options: AppOptions;
}

function createHarness(
	overrides: Partial<AppOptions> = {},
	peripheralOptions: Parameters<typeof createMemoryPeripheral>[1] = {},
	config: AppConfig = DEFAULT_CONFIG,
): Harness {
	const created: MemoryPeripheral[] = [];
	const loggers = createLoggers();
	return {
		created,
		loggers,
		options: {
			config,
			createLogger: loggers.createLogger,
			createPeripheral: (events) => {
				const peripheral = createMemoryPeripheral(events, peripheralOptions);
				created.push(peripheral);
				return peripheral;
			},
			...overrides,
		},
	};
}

function only(created: MemoryPeripheral[]): MemoryPeripheral {
	const [peripheral] = created;
	if (!peripheral || created.length !== 1) {
		throw new Error(`expected one peripheral, got ${created.length}`);
	}
	return peripheral;
}

async function startRunning(harness: Harness): Promise<RunningApp> {
	const app = await startApp(harness.options);
	if (app.status !== "running") {
		throw new Error(`startup failed: ${app.error.message}`);
	}
	running.push(app);
	return app;
}

function notifiedValues(peripheral: MemoryPeripheral): (string | null)[] {
	return peripheral.getNotifications().map(({ value }) => decodeText(value));
}

const running: RunningApp[] = [];

afterEach(async () => {
	await Promise.all(running.splice(0).map((app) => app.stop()));
	vi.useRealTimers();
});

// =============================================================================
// Startup
// =============================================================================

describe("Startup", () => {
	it("registers and advertises only after the radio powers on", async () => {
		vi.useFakeTimers();
		const harness = createHarness({}, { powered: false });

		const started = startApp(harness.options);
		await vi.advanceTimersByTimeAsync(500);

		const peripheral = only(harness.created);
		const addService = vi.spyOn(peripheral, "addService");
		const startAdvertising = vi.spyOn(peripheral, "startAdvertising");
		expect(peripheral.getServices()).toEqual([]);
		expect(peripheral.getAdvertisement()).toBeNull();

		peripheral.setPowered(true);
		await vi.advanceTimersByTimeAsync(100);

		const app = await started;
		expect(app.status).toBe("running");
		if (app.status === "running") running.push(app);

		expect(addService).toHaveBeenCalledTimes(1);
		expect(startAdvertising).toHaveBeenCalledTimes(1);
		expect(peripheral.getAdvertisement()).toEqual({
			name: "BLE-Toggle",
			serviceUuids: [TOGGLE_SERVICE_UUID],
		});
	});

	it("advertises the configured device name", async () => {
		const harness = createHarness({}, {}, { ...DEFAULT_CONFIG, deviceName: "Desk Lamp" });

		await startRunning(harness);

		expect(only(harness.created).getAdvertisement()?.name).toBe("Desk Lamp");
	});

	it("never advertises when the service cannot be registered", async () => {
		const failure = new Error("GATT table full");
		const harness = createHarness({}, { addServiceError: failure });

		const app = await startApp(harness.options);

		expect(app.status).toBe("failed");
		if (app.status === "failed") {
			expect(app.error).toBeInstanceOf(StartupError);
			expect(app.error.stage).toBe("addService");
			expect(app.error.cause).toBe(failure);
		}
		expect(only(harness.created).getAdvertisement()).toBeNull();
		expect(harness.loggers.get("bootstrap").error).toHaveBeenCalledWith(
			"Error adding service:",
			failure,
		);
	});

	it("reports an advertising failure", async () => {
		const harness = createHarness(
			{},
			{ startAdvertisingError: new Error("advertising not supported") },
		);

		const app = await startApp(harness.options);

		expect(app.status).toBe("failed");
		if (app.status === "failed") {
			expect(app.error.message).toBe(
				"Startup failed at startAdvertising: advertising not supported",
			);
		}
	});

	it("does not start the console when startup fails", async () => {
		const source = createLineSource();
		const print = vi.fn();
		const harness = createHarness(
			{ input: source.input, print },
			{ addServiceError: new Error("GATT table full") },
		);

		await startApp(harness.options);
		source.push("on");

		expect(print).not.toHaveBeenCalled();
	});

	it("rejects with AbortError when aborted while waiting for power", async () => {
		vi.useFakeTimers();
		const controller = new AbortController();
		const harness = createHarness({ signal: controller.signal }, { powered: false });

		const started = startApp(harness.options);
		const assertion = expect(started).rejects.toBeInstanceOf(AbortError);
		await vi.advanceTimersByTimeAsync(300);
		controller.abort();

		await assertion;
		expect(only(harness.created).getServices()).toEqual([]);
	});
});

// =============================================================================
// Remote clients
// =============================================================================

describe("Remote clients", () => {
	it("toggles through writes and reads back the state", async () => {
		const harness = createHarness();
		const app = await startRunning(harness);
		const peripheral = only(harness.created);
		peripheral.subscribe("phone");

		await expect(peripheral.write("laptop", "on")).resolves.toEqual({
			response: "success",
		});
		const read = await peripheral.read("phone");

		expect(app.state.read()).toBe("on");
		expect(decodeText(read.value)).toBe("on");
		expect(notifiedValues(peripheral)).toEqual(["on"]);
		expect(harness.loggers.get("dispatcher").info).toHaveBeenCalledWith(
			"STATE changed to: ON ✅",
		);
	});

	it("acknowledges an unrecognized value without changing state", async () => {
		const harness = createHarness();
		const app = await startRunning(harness);
		const peripheral = only(harness.created);
		peripheral.subscribe("phone");

		await expect(peripheral.write("phone", "maybe")).resolves.toEqual({
			response: "success",
		});

		expect(app.state.read()).toBe("off");
		expect(notifiedValues(peripheral)).toEqual(["maybe"]);
		expect(harness.loggers.get("dispatcher").warn).toHaveBeenCalledWith(
			"WriteRequest: Unrecognized value -> maybe",
		);
	});

	it("acknowledges invalid UTF-8 without changing state", async () => {
		const harness = createHarness();
		const app = await startRunning(harness);
		const peripheral = only(harness.created);
		peripheral.subscribe("phone");

		await expect(
			peripheral.write("phone", Uint8Array.from([0xff, 0xfe])),
		).resolves.toEqual({ response: "success" });

		expect(app.state.read()).toBe("off");
		expect(peripheral.getNotifications()).toEqual([]);
		expect(harness.loggers.get("dispatcher").error).toHaveBeenCalledWith(
			`WriteRequest: Received non-UTF8 data (2 bytes) from client=phone characteristic=${TOGGLE_CHARACTERISTIC_UUID}`,
		);
	});

	it("matches remote writes case-sensitively", async () => {
		const harness = createHarness();
		const app = await startRunning(harness);

		await only(harness.created).write("phone", "ON");

		expect(app.state.read()).toBe("off");
	});
});

// =============================================================================
// Console
// =============================================================================

describe("Console", () => {
	it("turns the toggle on from an uppercase command and notifies it verbatim", async () => {
		const source = createLineSource();
		const print = vi.fn();
		const harness = createHarness({ input: source.input, print });
		const app = await startRunning(harness);
		const peripheral = only(harness.created);
		peripheral.subscribe("phone");

		source.push("ON");
		source.end();

		await expect(app.console).resolves.toEqual({ lines: 1, reason: "end" });
		expect(app.state.read()).toBe("on");
		expect(print).toHaveBeenCalledWith("STATE changed to: ON ✅");
		expect(notifiedValues(peripheral)).toEqual(["ON"]);
	});

	it("shares one state with remote clients", async () => {
		const source = createLineSource();
		const harness = createHarness({ input: source.input, print: vi.fn() });
		const app = await startRunning(harness);
		const peripheral = only(harness.created);

		source.push("on");
		source.end();
		await app.console;

		const read = await peripheral.read("phone");
		expect(decodeText(read.value)).toBe("on");

		await peripheral.write("phone", "off");
		expect(app.state.read()).toBe("off");
	});

	it("keeps console input that ends while waiting for power", async () => {
		const stdin = new PassThrough();
		const rl = createInterface({ input: stdin, terminal: false });
		const print = vi.fn();
		const harness = createHarness(
			{ input: rl, print },
			{ powered: false },
			{ ...DEFAULT_CONFIG, pollIntervalMs: 5 },
		);

		const started = startApp(harness.options);
		stdin.end("on\n");
		await once(rl, "close");
		only(harness.created).setPowered(true);

		const app = await started;
		if (app.status !== "running") throw new Error("startup failed");
		running.push(app);

		await expect(app.console).resolves.toEqual({ lines: 1, reason: "end" });
		expect(app.state.read()).toBe("on");
		expect(print).toHaveBeenCalledWith("STATE changed to: ON ✅");
	});

	it("runs without a console when no input is given", async () => {
		const app = await startRunning(createHarness());

		expect(app.console).toBeNull();
	});
});

// =============================================================================
// Shutdown
// =============================================================================

describe("Shutdown", () => {
	it("stops advertising and reports handled events", async () => {
		const harness = createHarness();
		const app = await startApp(harness.options);
		if (app.status !== "running") throw new Error("startup failed");
		const peripheral = only(harness.created);

		peripheral.subscribe("phone");
		await peripheral.write("phone", "on");
		await peripheral.read("phone");

		await expect(app.stop()).resolves.toBe(3);
		expect(peripheral.getAdvertisement()).toBeNull();
	});

	it("rejects requests after shutdown", async () => {
		const harness = createHarness();
		const app = await startApp(harness.options);
		if (app.status !== "running") throw new Error("startup failed");

		await app.stop();

		await expect(only(harness.created).read("phone")).rejects.toThrow(
			"Event channel is closed",
		);
	});
});
