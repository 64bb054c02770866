import { EncodingError } from "../errors/errors";
import type { Command, Outcome } from "../types";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: false });

/** Matches a high surrogate not followed by a low one, or a lone low surrogate */
const LONE_SURROGATE =
	/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Converts a command into the bytes written to the peer.
 *
 * Text commands are UTF-8 encoded with `terminator` appended. Byte commands
 * are copied verbatim, the terminator only applies to text. Empty commands of
 * either kind are refused.
 *
 * @example
 * ```typescript
 * encodeCommand("PING", "\n"); // { ok: true, value: Uint8Array [80, 73, 78, 71, 10] }
 * encodeCommand(new Uint8Array(0), "\n"); // { ok: false, error: EncodingError }
 * ```
 */
export function encodeCommand(
	command: Command,
	terminator: string,
): Outcome<Uint8Array, EncodingError> {
	if (typeof command === "string") {
		if (command.length === 0) {
			return { ok: false, error: new EncodingError("command is empty") };
		}
		const text = `${command}${terminator}`;
		if (LONE_SURROGATE.test(text)) {
			return {
				ok: false,
				error: new EncodingError("command contains an unpaired surrogate"),
			};
		}
		return { ok: true, value: encoder.encode(text) };
	}

	if (command.byteLength === 0) {
		return {
			ok: false,
			error: new EncodingError("cannot write zero bytes to an endpoint"),
		};
	}
	return { ok: true, value: Uint8Array.from(command) };
}

/**
 * Converts an expected response pattern into bytes.
 * `null` and `undefined` stay absent: an absent pattern never matches.
 */
export function encodePattern(
	pattern: Command | null | undefined,
): Uint8Array | null {
	if (pattern === null || pattern === undefined) {
		return null;
	}
	return typeof pattern === "string"
		? encoder.encode(pattern)
		: Uint8Array.from(pattern);
}

/** Decodes bytes as UTF-8, replacing invalid sequences */
export function decodeText(data: Uint8Array): string {
	return decoder.decode(data);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.byteLength !== b.byteLength) {
		return false;
	}
	for (let i = 0; i < a.byteLength; i++) {
		if (a[i] !== b[i]) {
			return false;
		}
	}
	return true;
}

/**
 * Returns true when `needle` occurs as a contiguous run inside `haystack`.
 * An empty needle is contained in every value.
 */
export function bytesIncludes(haystack: Uint8Array, needle: Uint8Array): boolean {
	if (needle.byteLength === 0) {
		return true;
	}
	const last = haystack.byteLength - needle.byteLength;
	outer: for (let start = 0; start <= last; start++) {
		for (let j = 0; j < needle.byteLength; j++) {
			if (haystack[start + j] !== needle[j]) {
				continue outer;
			}
		}
		return true;
	}
	return false;
}

/**
 * Match policy for correlated responses: the value equals the pattern or
 * contains it. An absent or empty pattern never matches.
 */
export function matchesPattern(
	value: Uint8Array,
	pattern: Uint8Array | null,
): boolean {
	if (pattern === null || pattern.byteLength === 0) {
		return false;
	}
	return bytesEqual(value, pattern) || bytesIncludes(value, pattern);
}

/** Renders bytes as space separated hex, for log lines */
export function toHex(data: Uint8Array): string {
	return Array.from(data, (b) => b.toString(16).padStart(2, "0")).join(" ");
}
