import { normalizeError, sleep, throwIfAborted } from "../errors";

export interface PollUntilOptions {
	/** Delay between checks in milliseconds */
	intervalMs: number;
	/** Stops waiting; the returned promise rejects with AbortError */
	signal?: AbortSignal;
	/**
	 * Called when a check throws or rejects. The failed check counts as
	 * "not yet" and polling continues.
	 */
	onError?: (error: Error) => void;
}

/**
 * Calls `check` until it reports true, sleeping `intervalMs` between calls.
 * There is no timeout: without a signal this waits forever.
 *
 * @returns the number of checks made, including the successful one
 * @throws {AbortError} If the signal aborts before the check succeeds
 *
 * @example Waiting for the radio
 * ```typescript
 * await pollUntil(() => peripheral.isPowered(), { intervalMs: 100 });
 * ```
 */
export async function pollUntil(
	check: () => boolean | Promise<boolean>,
	options: PollUntilOptions,
): Promise<number> {
	const { intervalMs, signal, onError } = options;

	if (!Number.isFinite(intervalMs) || intervalMs < 0) {
		throw new RangeError(`intervalMs must be >= 0, got ${intervalMs}`);
	}

	let attempts = 0;

	while (true) {
		throwIfAborted(signal);
		attempts++;

		let ready = false;
		try {
			ready = await check();
		} catch (e) {
			onError?.(normalizeError(e));
		}

		if (ready) {
			return attempts;
		}

		await sleep(intervalMs, signal);
	}
}
