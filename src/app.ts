import { createEventChannel } from "./async";
import {
	type BootstrapResult,
	createBootstrapSequencer,
	createEventDispatcher,
	createToggleService,
} from "./ble";
import { type AppConfig, resolveConfig } from "./config";
import { type CommandLoopResult, createCommandLoop } from "./console";
import type { StartupError } from "./errors";
import { createConsoleLogger, type Logger } from "./logging";
import { createStateCell, type StateCell } from "./state";
import type { Peripheral, PeripheralEvent, PeripheralFactory } from "./types";

export interface AppOptions {
	/** Creates the peripheral on top of the app's event channel */
	createPeripheral: PeripheralFactory;
	/** @default resolveConfig() */
	config?: AppConfig;
	/**
	 * Console lines. Without input no console loop is started. Reading
	 * begins as soon as the app is started, so lines and end of input that
	 * arrive during startup are kept for the console loop.
	 */
	input?: AsyncIterable<string>;
	/** Console output; defaults to console.log */
	print?: (line: string) => void;
	/** Aborts the power wait */
	signal?: AbortSignal;
	/** @default scoped console loggers at `config.logLevel` */
	createLogger?: (scope: string) => Logger;
}

export interface RunningApp {
	readonly status: "running";
	readonly state: StateCell;
	readonly peripheral: Peripheral;
	/** Settles when the console input ends; null when started without input */
	readonly console: Promise<CommandLoopResult> | null;
	/**
	 * Closes the event channel, stops advertising and waits for the
	 * dispatcher to drain.
	 * @returns the number of events handled
	 */
	stop(): Promise<number>;
}

export interface FailedApp {
	readonly status: "failed";
	readonly error: StartupError;
}

export type AppHandle = RunningApp | FailedApp;

/**
 * Wires the toggle peripheral together and brings it up.
 *
 * The dispatcher starts before the bootstrap so power and subscription
 * events are handled while the radio comes up. The console loop starts only
 * once advertising has begun.
 *
 * @throws AbortError if `signal` aborts while waiting for power
 *
 * @example
 * ```typescript
 * const app = await startApp({
 *   createPeripheral: (events) => createBlenoPeripheral(events),
 *   input: createInterface({ input: process.stdin }),
 * });
 * if (app.status === "failed") process.exitCode = 1;
 * ```
 */
export async function startApp(options: AppOptions): Promise<AppHandle> {
	// Subscribe before the first await; readline drops lines nobody iterates
	const lines = options.input?.[Symbol.asyncIterator]();
	const config = options.config ?? resolveConfig();
	const createLogger =
		options.createLogger ??
		((scope: string) => createConsoleLogger({ scope, level: config.logLevel }));
	const logger = createLogger("app");

	const channel = createEventChannel<PeripheralEvent>({
		capacity: config.channelCapacity,
	});
	const peripheral = await options.createPeripheral(channel);
	const state = createStateCell("off");

	state.onChange(({ from, to, source }) => {
		logger.debug(`State ${from} -> ${to} (${source})`);
	});

	const dispatcher = createEventDispatcher({
		state,
		peripheral,
		logger: createLogger("dispatcher"),
	});
	const dispatching = dispatcher.run(channel);

	const sequencer = createBootstrapSequencer({
		peripheral,
		service: createToggleService(),
		deviceName: config.deviceName,
		pollIntervalMs: config.pollIntervalMs,
		...(options.signal && { signal: options.signal }),
		logger: createLogger("bootstrap"),
	});

	let result: BootstrapResult;
	try {
		result = await sequencer.run();
	} catch (e) {
		channel.close();
		await lines?.return?.();
		await dispatching;
		throw e;
	}

	if (!result.ok) {
		channel.close();
		await lines?.return?.();
		await dispatching;
		return { status: "failed", error: result.error };
	}

	const consoleRun = lines
		? createCommandLoop({
				state,
				peripheral,
				input: { [Symbol.asyncIterator]: () => lines },
				...(options.print && { print: options.print }),
				logger: createLogger("console"),
			}).run()
		: null;

	async function stop(): Promise<number> {
		channel.close();
		try {
			await peripheral.stopAdvertising?.();
		} catch (e) {
			logger.warn("Error stopping advertising:", e);
		}
		return dispatching;
	}

	return {
		status: "running",
		state,
		peripheral,
		console: consoleRun,
		stop,
	};
}
