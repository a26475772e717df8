import { DEFAULT_CHANNEL_CAPACITY } from "../async";
import { DEFAULT_POWER_POLL_INTERVAL_MS } from "../ble/bootstrap";
import { ConfigError } from "../errors";
import { type LogLevel, normalizeLogLevel } from "../logging";

export interface AppConfig {
	/** Local name put in the advertisement */
	readonly deviceName: string;
	readonly pollIntervalMs: number;
	readonly channelCapacity: number;
	readonly logLevel: LogLevel;
	/** Use the in-memory peripheral instead of bleno */
	readonly simulate: boolean;
}

export const DEFAULT_DEVICE_NAME = "BLE-Toggle";

export const DEFAULT_CONFIG: AppConfig = Object.freeze({
	deviceName: DEFAULT_DEVICE_NAME,
	pollIntervalMs: DEFAULT_POWER_POLL_INTERVAL_MS,
	channelCapacity: DEFAULT_CHANNEL_CAPACITY,
	logLevel: "info",
	simulate: false,
});

export const ENV_KEYS = {
	deviceName: "BLE_TOGGLE_DEVICE_NAME",
	pollIntervalMs: "BLE_TOGGLE_POLL_INTERVAL_MS",
	channelCapacity: "BLE_TOGGLE_CHANNEL_CAPACITY",
	logLevel: "BLE_TOGGLE_LOG_LEVEL",
	simulate: "BLE_TOGGLE_SIMULATE",
} as const satisfies Record<keyof AppConfig, string>;

export type Environment = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function read(env: Environment, key: string): string | undefined {
	const value = env[key]?.trim();
	return value ? value : undefined;
}

function parsePositiveInteger(key: string, raw: string): number {
	const value = Number(raw);
	if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value < 1) {
		throw new ConfigError(key, `expected a positive integer, got "${raw}"`);
	}
	return value;
}

function parseBoolean(key: string, raw: string): boolean {
	const normalized = raw.toLowerCase();
	if (TRUE_VALUES.has(normalized)) return true;
	if (FALSE_VALUES.has(normalized)) return false;
	throw new ConfigError(key, `expected a boolean, got "${raw}"`);
}

function checkPositiveInteger(key: string, value: number): number {
	if (!Number.isSafeInteger(value) || value < 1) {
		throw new ConfigError(key, `expected a positive integer, got ${value}`);
	}
	return value;
}

/**
 * Builds the application config from environment variables, then applies
 * explicit overrides (for example from command-line flags).
 *
 * Empty variables count as unset. Log levels are normalized leniently;
 * numbers and booleans are not.
 *
 * @throws ConfigError naming the offending variable or field
 *
 * @example
 * ```typescript
 * const config = resolveConfig(process.env, { simulate: argv.includes("--simulate") });
 * ```
 */
export function resolveConfig(
	env: Environment = process.env,
	overrides: Partial<AppConfig> = {},
): AppConfig {
	const rawDeviceName = read(env, ENV_KEYS.deviceName);
	const rawPollInterval = read(env, ENV_KEYS.pollIntervalMs);
	const rawCapacity = read(env, ENV_KEYS.channelCapacity);
	const rawSimulate = read(env, ENV_KEYS.simulate);

	const fromEnv: AppConfig = {
		deviceName: rawDeviceName ?? DEFAULT_CONFIG.deviceName,
		pollIntervalMs: rawPollInterval
			? parsePositiveInteger(ENV_KEYS.pollIntervalMs, rawPollInterval)
			: DEFAULT_CONFIG.pollIntervalMs,
		channelCapacity: rawCapacity
			? parsePositiveInteger(ENV_KEYS.channelCapacity, rawCapacity)
			: DEFAULT_CONFIG.channelCapacity,
		logLevel: normalizeLogLevel(read(env, ENV_KEYS.logLevel)),
		simulate: rawSimulate
			? parseBoolean(ENV_KEYS.simulate, rawSimulate)
			: DEFAULT_CONFIG.simulate,
	};

	const merged = { ...fromEnv, ...overrides };

	if (merged.deviceName.trim() === "") {
		throw new ConfigError("deviceName", "must not be empty");
	}

	return Object.freeze({
		...merged,
		pollIntervalMs: checkPositiveInteger("pollIntervalMs", merged.pollIntervalMs),
		channelCapacity: checkPositiveInteger("channelCapacity", merged.channelCapacity),
	});
}
