import { ChannelClosedError } from "../errors";
import type { EventSink } from "../types";

/** Default number of events buffered between a peripheral and its consumer */
export const DEFAULT_CHANNEL_CAPACITY = 256;

export interface EventChannelOptions {
	/**
	 * Maximum number of buffered items.
	 * @default 256
	 */
	capacity?: number;
}

/**
 * A bounded FIFO between producers (peripheral callbacks) and a single
 * async consumer. Items are objects so that `null` can mark the end of the
 * stream.
 *
 * @example Draining a channel
 * ```typescript
 * const channel = createEventChannel<PeripheralEvent>();
 * const peripheral = await createPeripheral(channel);
 *
 * for await (const event of channel) {
 *   await dispatcher.handle(event);
 * }
 * ```
 */
export interface EventChannel<T extends object> extends EventSink<T>, AsyncIterable<T> {
	/**
	 * Waits for the next item.
	 * @returns the item, or null once the channel is closed and drained
	 */
	receive(): Promise<T | null>;
	/**
	 * Stops accepting items. Buffered items can still be received; waiting
	 * senders are rejected with ChannelClosedError.
	 */
	close(): void;
	isClosed(): boolean;
	/** Number of buffered items */
	size(): number;
	readonly capacity: number;
}

interface PendingSender<V> {
	item: V;
	resolve: () => void;
	reject: (error: Error) => void;
}

export function createEventChannel<T extends object>(
	options: EventChannelOptions = {},
): EventChannel<T> {
	const { capacity = DEFAULT_CHANNEL_CAPACITY } = options;

	if (!Number.isInteger(capacity) || capacity < 1) {
		throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
	}

	const buffer: T[] = [];
	// Consumers parked on an empty buffer
	const receivers: ((item: T | null) => void)[] = [];
	// Producers parked on a full buffer, each holding the item it wants to add
	const senders: PendingSender<T>[] = [];
	let closed = false;

	function trySend(item: T): boolean {
		if (closed) return false;

		const receiver = receivers.shift();
		if (receiver) {
			receiver(item);
			return true;
		}

		if (buffer.length >= capacity) return false;

		buffer.push(item);
		return true;
	}

	function send(item: T): Promise<void> {
		if (closed) {
			return Promise.reject(new ChannelClosedError());
		}
		if (trySend(item)) {
			return Promise.resolve();
		}
		return new Promise<void>((resolve, reject) => {
			senders.push({ item, resolve, reject });
		});
	}

	function admitWaitingSender(): void {
		const sender = senders.shift();
		if (sender) {
			buffer.push(sender.item);
			sender.resolve();
		}
	}

	function receive(): Promise<T | null> {
		const item = buffer.shift();
		if (item !== undefined) {
			admitWaitingSender();
			return Promise.resolve(item);
		}

		if (closed) {
			return Promise.resolve(null);
		}

		return new Promise<T | null>((resolve) => {
			receivers.push(resolve);
		});
	}

	function close(): void {
		if (closed) return;
		closed = true;

		for (const receiver of receivers.splice(0)) {
			receiver(null);
		}
		for (const sender of senders.splice(0)) {
			sender.reject(new ChannelClosedError());
		}
	}

	async function* iterate(): AsyncGenerator<T, void, undefined> {
		while (true) {
			const item = await receive();
			if (item === null) return;
			yield item;
		}
	}

	return {
		trySend,
		send,
		receive,
		close,
		isClosed: () => closed,
		size: () => buffer.length,
		capacity,
		[Symbol.asyncIterator]: iterate,
	};
}
