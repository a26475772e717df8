import { createConsoleLogger, type Logger } from "../logging";

export type EventMap = { [key: string]: unknown };

type Listener = (data: unknown) => void;

/**
 * A type-safe event emitter.
 *
 * @example
 * ```typescript
 * type CellEvents = {
 *   change: { from: ToggleState; to: ToggleState };
 * };
 *
 * const emitter = createEventEmitter<CellEvents>();
 * const unsubscribe = emitter.on("change", ({ to }) => console.log(to));
 * emitter.emit("change", { from: "off", to: "on" });
 * unsubscribe();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	once<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	emit<K extends keyof T>(event: K, data: T[K]): void;
	listenerCount<K extends keyof T>(event: K): number;
}

export interface EventEmitterOptions {
	/** Receives errors thrown by listeners. Defaults to a console logger. */
	logger?: Logger;
}

/**
 * Listeners run synchronously in registration order. A throwing listener is
 * logged and does not prevent the remaining listeners from running.
 */
export function createEventEmitter<T extends EventMap>(
	options: EventEmitterOptions = {},
): TypedEventEmitter<T> {
	const logger = options.logger ?? createConsoleLogger({ scope: "event-emitter" });
	const listeners = new Map<keyof T, Set<Listener>>();
	// original callback -> wrapper registered by once()
	const onceWrappers = new Map<Listener, Listener>();

	function getListenerSet(event: keyof T): Set<Listener> {
		let set = listeners.get(event);
		if (!set) {
			set = new Set();
			listeners.set(event, set);
		}
		return set;
	}

	function on<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		getListenerSet(event).add(callback as Listener);
		return () => off(event, callback);
	}

	function once<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		const original = callback as Listener;
		const wrapper: Listener = (data) => {
			off(event, callback);
			original(data);
		};
		onceWrappers.set(original, wrapper);
		getListenerSet(event).add(wrapper);
		return () => off(event, callback);
	}

	function off<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): void {
		const set = listeners.get(event);
		if (!set) return;

		const original = callback as Listener;
		const wrapper = onceWrappers.get(original);
		if (wrapper) {
			set.delete(wrapper);
			onceWrappers.delete(original);
		} else {
			set.delete(original);
		}
		if (set.size === 0) {
			listeners.delete(event);
		}
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event === undefined) {
			listeners.clear();
			onceWrappers.clear();
			return;
		}

		const set = listeners.get(event);
		if (set) {
			for (const [original, wrapper] of onceWrappers) {
				if (set.has(wrapper)) {
					onceWrappers.delete(original);
				}
			}
		}
		listeners.delete(event);
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const set = listeners.get(event);
		if (!set) return;

		for (const cb of [...set]) {
			try {
				cb(data);
			} catch (err) {
				logger.error(`Listener for "${String(event)}" threw:`, err);
			}
		}
	}

	function listenerCount<K extends keyof T>(event: K): number {
		return listeners.get(event)?.size ?? 0;
	}

	return {
		on,
		once,
		off,
		removeAllListeners,
		emit,
		listenerCount,
	};
}
