import { TOGGLE_CHARACTERISTIC_UUID } from "../ble/service";
import { createConsoleLogger, type Logger } from "../logging";
import { formatStateBanner, parseToggleToken, type StateCell } from "../state";
import type { Peripheral } from "../types";
import { encodeText } from "../utils";

export interface CommandLoopOptions {
	state: StateCell;
	peripheral: Pick<Peripheral, "updateCharacteristic">;
	/** Lines without their terminators, e.g. a `node:readline` interface */
	input: AsyncIterable<string>;
	/** @default console.log */
	print?: (line: string) => void;
	/** @default TOGGLE_CHARACTERISTIC_UUID */
	characteristicUuid?: string;
	logger?: Logger;
}

export type CommandLoopEndReason = "end" | "error";

export interface CommandLoopResult {
	/** Lines processed before the input ended */
	lines: number;
	reason: CommandLoopEndReason;
}

export interface CommandLoop {
	/** Applies one console line. Never rejects. */
	handleLine(line: string): Promise<void>;
	/**
	 * Reads lines until the input ends or fails. An input failure is logged
	 * and ends the loop; it does not reject.
	 */
	run(): Promise<CommandLoopResult>;
}

/**
 * Creates the local operator console.
 *
 * Lines are trimmed and lowercased before matching, so `" ON "` switches the
 * toggle on. Whatever was typed is then pushed to subscribers unchanged.
 *
 * @example
 * ```typescript
 * const rl = createInterface({ input: process.stdin });
 * const loop = createCommandLoop({ state, peripheral, input: rl });
 * const { reason } = await loop.run();
 * ```
 */
export function createCommandLoop(options: CommandLoopOptions): CommandLoop {
	const {
		state,
		peripheral,
		input,
		print = (line: string) => {
			console.log(line);
		},
		characteristicUuid = TOGGLE_CHARACTERISTIC_UUID,
		logger = createConsoleLogger({ scope: "console" }),
	} = options;

	async function handleLine(line: string): Promise<void> {
		const next = parseToggleToken(line.trim().toLowerCase());

		if (next === null) {
			print(`Writing: ${line} to ${characteristicUuid}`);
		} else {
			state.write(next, "console");
			print(formatStateBanner(next));
		}

		try {
			await peripheral.updateCharacteristic(characteristicUuid, encodeText(line));
		} catch (e) {
			logger.error("Error updating characteristic:", e);
		}
	}

	async function run(): Promise<CommandLoopResult> {
		const lines = input[Symbol.asyncIterator]();
		let count = 0;

		while (true) {
			let next: IteratorResult<string>;
			try {
				next = await lines.next();
			} catch (e) {
				logger.error("Error reading from console:", e);
				return { lines: count, reason: "error" };
			}

			if (next.done) {
				return { lines: count, reason: "end" };
			}

			await handleLine(next.value);
			count++;
		}
	}

	return { handleLine, run };
}
