import { pollUntil } from "../async";
import { normalizeError, StartupError, type StartupStage } from "../errors";
import { createConsoleLogger, type Logger } from "../logging";
import {
	createStateMachine,
	type TransitionCallback,
	type TransitionTable,
} from "../state";
import type { Peripheral, ServiceDescriptor } from "../types";

/** Default delay between power checks in milliseconds */
export const DEFAULT_POWER_POLL_INTERVAL_MS = 100;

/**
 * Readiness sequence:
 * - uninitialized -> waitingForPower (peripheral handle exists)
 * - waitingForPower -> serviceRegistered (radio reported powered on)
 * - serviceRegistered -> advertising | failed (addService)
 * - advertising -> running | failed (startAdvertising)
 */
export type BootstrapState =
	| "uninitialized"
	| "waitingForPower"
	| "serviceRegistered"
	| "advertising"
	| "running"
	| "failed";

export const BOOTSTRAP_TRANSITIONS: TransitionTable<BootstrapState> = {
	uninitialized: ["waitingForPower"],
	waitingForPower: ["serviceRegistered"],
	serviceRegistered: ["advertising", "failed"],
	advertising: ["running", "failed"],
	running: [],
	failed: [],
};

export interface BootstrapOptions {
	peripheral: Peripheral;
	service: ServiceDescriptor;
	/** Local name put in the advertisement */
	deviceName: string;
	/** @default 100 */
	pollIntervalMs?: number;
	/** Stops the power wait */
	signal?: AbortSignal;
	logger?: Logger;
}

export type BootstrapResult =
	| { ok: true; powerChecks: number }
	| { ok: false; error: StartupError };

export interface BootstrapSequencer {
	getState(): BootstrapState;
	onTransition(callback: TransitionCallback<BootstrapState>): () => void;
	/**
	 * Waits for power, registers the service and starts advertising.
	 *
	 * Resolves with `ok: false` when registration or advertising fails; the
	 * sequence stops there. Rejects only with AbortError (signal aborted while
	 * waiting) or when called a second time.
	 */
	run(): Promise<BootstrapResult>;
}

export function createBootstrapSequencer(
	options: BootstrapOptions,
): BootstrapSequencer {
	const {
		peripheral,
		service,
		deviceName,
		pollIntervalMs = DEFAULT_POWER_POLL_INTERVAL_MS,
		signal,
		logger = createConsoleLogger({ scope: "bootstrap" }),
	} = options;

	const machine = createStateMachine({
		transitions: BOOTSTRAP_TRANSITIONS,
		initialState: "uninitialized",
		logger,
	});

	machine.onTransition((from, to) => {
		logger.debug(`Bootstrap: ${from} -> ${to}`);
	});

	// One attempt per stage; a failure ends the sequence
	async function attempt(
		stage: StartupStage,
		operation: () => Promise<void>,
	): Promise<StartupError | null> {
		try {
			await operation();
			return null;
		} catch (e) {
			return new StartupError(stage, normalizeError(e));
		}
	}

	function fail(error: StartupError, message: string): BootstrapResult {
		logger.error(message, error.cause);
		machine.transition("failed");
		return { ok: false, error };
	}

	async function run(): Promise<BootstrapResult> {
		machine.transition("waitingForPower");

		const powerChecks = await pollUntil(() => peripheral.isPowered(), {
			intervalMs: pollIntervalMs,
			...(signal && { signal }),
			onError: (error) => {
				logger.debug(`Power check failed: ${error.message}`);
			},
		});
		machine.transition("serviceRegistered");

		const serviceError = await attempt("addService", () =>
			peripheral.addService(service),
		);
		if (serviceError) {
			return fail(serviceError, "Error adding service:");
		}
		logger.info("Service Added");
		machine.transition("advertising");

		const advertisingError = await attempt("startAdvertising", () =>
			peripheral.startAdvertising(deviceName, [service.uuid]),
		);
		if (advertisingError) {
			return fail(advertisingError, "Error starting advertising:");
		}
		logger.info("Advertising Started");
		machine.transition("running");

		return { ok: true, powerChecks };
	}

	return {
		getState: machine.getState,
		onTransition: machine.onTransition,
		run,
	};
}
