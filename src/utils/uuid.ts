/** Bluetooth Base UUID suffix for constructing full UUIDs */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

const FULL_UUID_PATTERN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Converts a short UUID to a full Bluetooth Base UUID.
 * @param shortId - A number (0-65535) or hex string (1-4 chars)
 * @throws RangeError if number is out of 16-bit range
 * @throws Error if string is invalid hex or empty
 *
 * @example
 * ```typescript
 * toFullUuid(0x2a3d); // "00002a3d-0000-1000-8000-00805f9b34fb"
 * toFullUuid("1209"); // "00001209-0000-1000-8000-00805f9b34fb"
 * ```
 */
export function toFullUuid(shortId: number | string): string {
	if (typeof shortId === "number") {
		if (!Number.isInteger(shortId) || shortId < 0 || shortId > 0xffff) {
			throw new RangeError(
				`Short UUID must be integer 0-65535, got ${shortId}`,
			);
		}
		return `0000${shortId.toString(16).padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
	}

	if (shortId.length === 0 || shortId.length > 4) {
		throw new Error(
			`Invalid short UUID length: ${shortId.length} (must be 1-4)`,
		);
	}

	if (!/^[0-9a-fA-F]+$/.test(shortId)) {
		throw new Error(`Invalid short UUID format: ${shortId} (must be hex)`);
	}

	return `0000${shortId.toLowerCase().padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
}

/**
 * Strips the Bluetooth base and dashes, the form most Node peripheral stacks
 * expect: "2a3d" for SIG-assigned UUIDs, 32 hex digits for custom ones.
 *
 * @example
 * ```typescript
 * toCompactUuid("00002a3d-0000-1000-8000-00805f9b34fb"); // "2a3d"
 * toCompactUuid("6e400001-b5a3-f393-e0a9-e50e24dcca9e"); // "6e400001b5a3f393e0a9e50e24dcca9e"
 * ```
 */
export function toCompactUuid(uuid: string): string {
	const normalized = uuid.toLowerCase();
	if (!FULL_UUID_PATTERN.test(normalized)) {
		return normalized;
	}
	if (normalized.startsWith("0000") && normalized.endsWith(BLUETOOTH_UUID_BASE)) {
		return normalized.substring(4, 8);
	}
	return normalized.replaceAll("-", "");
}

/**
 * Compares two UUIDs in any of the short, compact or full forms.
 *
 * @example
 * ```typescript
 * uuidEquals("2A3D", "00002a3d-0000-1000-8000-00805f9b34fb"); // true
 * ```
 */
export function uuidEquals(a: string, b: string): boolean {
	return expand(a) === expand(b);
}

function expand(uuid: string): string {
	const normalized = uuid.toLowerCase();
	if (normalized.length <= 4 && /^[0-9a-f]+$/.test(normalized)) {
		return toFullUuid(normalized);
	}
	if (/^[0-9a-f]{32}$/.test(normalized)) {
		return [
			normalized.substring(0, 8),
			normalized.substring(8, 12),
			normalized.substring(12, 16),
			normalized.substring(16, 20),
			normalized.substring(20),
		].join("-");
	}
	return normalized;
}
