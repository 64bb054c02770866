/** Bluetooth Base UUID suffix for constructing full UUIDs */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

const SHORT_UUID = /^[0-9a-f]{1,4}$/;
const FULL_UUID =
	/^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/;

/**
 * Converts a 16-bit short UUID to a full Bluetooth Base UUID.
 * @param shortId - A number (0-65535) or hex string (1-4 chars)
 * @throws RangeError if number is out of 16-bit range
 * @throws Error if string is invalid hex or empty
 *
 * @example
 * ```typescript
 * toFullUuid(0x180d); // "0000180d-0000-1000-8000-00805f9b34fb"
 * toFullUuid("ffe1"); // "0000ffe1-0000-1000-8000-00805f9b34fb"
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

	const normalized = shortId.toLowerCase();
	if (!SHORT_UUID.test(normalized)) {
		throw new Error(`Invalid short UUID: "${shortId}" (must be 1-4 hex chars)`);
	}
	return `0000${normalized.padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
}

/**
 * Normalizes any UUID spelling to the compact form radio stacks report:
 * 4 hex chars for UUIDs on the Bluetooth base, 32 undashed hex chars otherwise.
 *
 * @example
 * ```typescript
 * toCompactUuid("0000FFE1-0000-1000-8000-00805F9B34FB"); // "ffe1"
 * toCompactUuid("1");                                      // "0001"
 * toCompactUuid("6e400001-b5a3-f393-e0a9-e50e24dcca9e");   // "6e400001b5a3f393e0a9e50e24dcca9e"
 * ```
 */
export function toCompactUuid(uuid: string): string {
	const normalized = uuid.trim().toLowerCase();
	if (SHORT_UUID.test(normalized)) {
		return normalized.padStart(4, "0");
	}
	if (!FULL_UUID.test(normalized)) {
		throw new Error(`Invalid UUID: "${uuid}"`);
	}
	const undashed = normalized.replaceAll("-", "");
	if (
		undashed.startsWith("0000") &&
		undashed.endsWith(BLUETOOTH_UUID_BASE.replaceAll("-", ""))
	) {
		return undashed.substring(4, 8);
	}
	return undashed;
}

/**
 * Checks whether two UUIDs name the same attribute, whatever their spelling
 * (short or full, dashed or not, any case). Malformed input never matches.
 *
 * @example
 * ```typescript
 * uuidMatches("0000ffe1-0000-1000-8000-00805f9b34fb", "FFE1"); // true
 * uuidMatches("ffe1", "ffe2");                                 // false
 * ```
 */
export function uuidMatches(a: string, b: string): boolean {
	try {
		return toCompactUuid(a) === toCompactUuid(b);
	} catch {
		return false;
	}
}
