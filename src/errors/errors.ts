/**
 * Error thrown when an operation is aborted via AbortSignal.
 */
export class AbortError extends Error {
	constructor(message = "Operation aborted") {
		super(message);
		this.name = "AbortError";
	}
}

function abortMessage(signal: AbortSignal): string {
	const reason: unknown = signal.reason;
	return reason instanceof Error
		? reason.message
		: typeof reason === "string"
			? reason
			: "Operation aborted";
}

/**
 * Throws an AbortError if the given signal is aborted.
 *
 * @throws {AbortError} If the signal is aborted
 */
export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new AbortError(abortMessage(signal));
	}
}

/**
 * Resolves after `ms`, or rejects with AbortError as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new AbortError(abortMessage(signal)));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			if (signal) {
				reject(new AbortError(abortMessage(signal)));
			}
		};

		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Thrown when sending on, or waiting for capacity in, a closed event channel.
 */
export class ChannelClosedError extends Error {
	constructor() {
		super("Event channel is closed");
		this.name = "ChannelClosedError";
	}
}

/**
 * The remote side of a request is gone; its response can no longer be delivered.
 */
export class ResponderClosedError extends Error {
	constructor(message = "Responder is closed: remote side no longer waiting") {
		super(message);
		this.name = "ResponderClosedError";
	}
}

/**
 * A responder was asked to answer a request it had already answered.
 */
export class ResponseAlreadySentError extends Error {
	constructor() {
		super("Response already sent for this request");
		this.name = "ResponseAlreadySentError";
	}
}

export type StartupStage = "addService" | "startAdvertising";

/**
 * Fatal failure while bringing the peripheral up.
 */
export class StartupError extends Error {
	constructor(
		public readonly stage: StartupStage,
		public override readonly cause: Error,
	) {
		super(`Startup failed at ${stage}: ${cause.message}`);
		this.name = "StartupError";
	}
}

/**
 * Invalid configuration value.
 */
export class ConfigError extends Error {
	constructor(
		public readonly key: string,
		message: string,
	) {
		super(`${key}: ${message}`);
		this.name = "ConfigError";
	}
}

/**
 * Normalizes any thrown value into an Error instance.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}

	if (e === null) {
		return new Error("null");
	}

	if (e === undefined) {
		return new Error("undefined");
	}

	if (typeof e === "string") {
		return new Error(e);
	}

	if (typeof e === "object") {
		try {
			return new Error(JSON.stringify(e));
		} catch {
			// Circular reference or other JSON error
			return new Error(String(e));
		}
	}

	return new Error(String(e));
}
