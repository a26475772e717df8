export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

/** Prefix shared by every scoped log line */
export const LOG_NAMESPACE = "ble-toggle";

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
	/** Module name shown in the prefix, e.g. "dispatcher" */
	scope: string;
	/** Entries below this level are dropped. @default "info" */
	level?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Maps a free-form level string (typically from the environment) to a LogLevel.
 * Unknown or missing values fall back to "info".
 */
export function normalizeLogLevel(value: string | undefined): LogLevel {
	const normalized = value?.trim().toLowerCase() ?? "";
	if (normalized === "warning") return "warn";
	if (normalized === "none" || normalized === "off") return "silent";
	return isLogLevel(normalized) ? normalized : "info";
}

/**
 * Creates a logger writing `[ble-toggle:<scope>] <message>` lines to the console.
 *
 * @example
 * ```typescript
 * const log = createConsoleLogger({ scope: "dispatcher", level: "debug" });
 * log.info("Service Added");
 * // [ble-toggle:dispatcher] Service Added
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
	const { scope, level = "info" } = options;
	const prefix = `[${LOG_NAMESPACE}:${scope}]`;
	const threshold = LEVEL_ORDER[level];

	function enabled(entryLevel: Exclude<LogLevel, "silent">): boolean {
		return LEVEL_ORDER[entryLevel] >= threshold;
	}

	return {
		debug(message, ...details) {
			if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
		},
		info(message, ...details) {
			if (enabled("info")) console.info(`${prefix} ${message}`, ...details);
		},
		warn(message, ...details) {
			if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
		},
		error(message, ...details) {
			if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
		},
	};
}

export function createNoOpLogger(): Logger {
	const noop = () => {};
	return { debug: noop, info: noop, warn: noop, error: noop };
}
