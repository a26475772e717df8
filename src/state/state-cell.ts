import type { StateSource, ToggleState } from "../types";
import { createEventEmitter } from "./event-emitter";

export interface StateChange {
	from: ToggleState;
	to: ToggleState;
	source: StateSource;
}

/**
 * The one authoritative copy of the toggle.
 *
 * Every read and write is a single synchronous step on the event loop, so
 * callers on different async paths never observe a partial update and all
 * writes fall into one total order. The last committed write wins.
 */
export interface StateCell {
	read(): ToggleState;
	write(next: ToggleState, source?: StateSource): void;
	/**
	 * Subscribes to committed changes. Writes of the current value are not
	 * reported.
	 * @returns unsubscribe function
	 */
	onChange(listener: (change: StateChange) => void): () => void;
}

export function createStateCell(initial: ToggleState = "off"): StateCell {
	let value: ToggleState = initial;
	const emitter = createEventEmitter<{ change: StateChange }>();

	return {
		read() {
			return value;
		},
		write(next, source = "remote") {
			const from = value;
			value = next;
			if (from !== next) {
				emitter.emit("change", { from, to: next, source });
			}
		},
		onChange(listener) {
			return emitter.on("change", listener);
		},
	};
}

/**
 * Maps an exact token to a state. No trimming or case folding: callers decide
 * how lenient their input path is.
 */
export function parseToggleToken(token: string): ToggleState | null {
	if (token === "on" || token === "off") {
		return token;
	}
	return null;
}

export function formatStateBanner(state: ToggleState): string {
	return state === "on" ? "STATE changed to: ON ✅" : "STATE changed to: OFF ❌";
}
