import { createConsoleLogger, type Logger } from "../logging";

export type TransitionCallback<S extends string> = (from: S, to: S) => void;

export interface StateMachine<S extends string> {
	getState(): S;
	canTransition(to: S): boolean;
	transition(to: S): void;
	onTransition(callback: TransitionCallback<S>): () => void;
}

export type TransitionTable<S extends string> = Readonly<
	Record<S, readonly S[]>
>;

export interface StateMachineOptions<S extends string> {
	transitions: TransitionTable<S>;
	initialState: S;
	logger?: Logger;
}

/**
 * Creates a state machine that only moves along the edges of `transitions`
 * and notifies listeners after every change.
 *
 * @example Readiness sequence
 * ```typescript
 * const machine = createStateMachine({
 *   transitions: { idle: ["busy"], busy: ["idle", "failed"], failed: [] },
 *   initialState: "idle",
 * });
 *
 * machine.onTransition((from, to) => log.info(`${from} -> ${to}`));
 * machine.transition("busy");
 * ```
 */
export function createStateMachine<S extends string>(
	options: StateMachineOptions<S>,
): StateMachine<S> {
	const { transitions } = options;
	const logger =
		options.logger ?? createConsoleLogger({ scope: "state-machine" });
	let state: S = options.initialState;
	const callbacks = new Set<TransitionCallback<S>>();
	let isTransitioning = false;

	function getState(): S {
		return state;
	}

	function canTransition(to: S): boolean {
		return transitions[state].includes(to);
	}

	function transition(to: S): void {
		if (isTransitioning) {
			throw new Error(
				`Cannot transition while another transition is in progress (attempted ${state} -> ${to})`,
			);
		}

		if (!canTransition(to)) {
			throw new Error(`Invalid state transition: ${state} -> ${to}`);
		}

		const from = state;
		state = to;
		isTransitioning = true;

		try {
			for (const cb of callbacks) {
				try {
					cb(from, to);
				} catch (e) {
					logger.error("Transition callback error:", e);
				}
			}
		} finally {
			isTransitioning = false;
		}
	}

	function onTransition(callback: TransitionCallback<S>): () => void {
		callbacks.add(callback);
		return () => {
			callbacks.delete(callback);
		};
	}

	return {
		getState,
		canTransition,
		transition,
		onTransition,
	};
}
