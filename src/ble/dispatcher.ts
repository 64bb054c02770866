import { type EncodingError, NoWritableEndpointError } from "../errors/errors";
import type { BLETransport, Command, Endpoint, Outcome } from "../types";
import { encodeCommand, toHex } from "../utils/bytes";
import type { Logger } from "../utils/logger";
import { findEndpoint, isWritable, writable } from "./endpoints";

/** A command resolved to its target endpoint and encoded, ready to write. */
export interface PreparedWrite {
	readonly endpoint: Endpoint;
	readonly data: Uint8Array;
	/** True when the endpoint only supports write-with-response */
	readonly ackRequested: boolean;
}

export type PrepareError = NoWritableEndpointError | EncodingError;

/** Explicit endpoint, or an endpoint UUID looked up among the known endpoints */
export type WriteTarget = Endpoint | string;

export interface CommandDispatcherOptions {
	transport: BLETransport;
	/** Current endpoint list; read on every call */
	endpoints: () => readonly Endpoint[];
	/** Appended to text commands */
	terminator: string;
	logger: Logger;
}

export interface CommandDispatcher {
	/**
	 * Resolves the target and encodes the command without writing anything.
	 * Used by the correlator, which must fail before any write happens.
	 */
	prepare(command: Command, target?: WriteTarget): Outcome<PreparedWrite, PrepareError>;
	/** Issues the transport write. Never waits for an acknowledgement. */
	write(prepared: PreparedWrite): void;
	/**
	 * Fire-and-forget send. Returns false, after logging the reason, when the
	 * command was declined.
	 */
	send(command: Command, target?: WriteTarget): boolean;
}

/**
 * Creates the command dispatcher.
 *
 * Target resolution: an explicit writable endpoint, else the endpoint with
 * the given UUID, else the first writable endpoint of the connected peer.
 * Endpoints that support write-without-response are written without one;
 * the rest request an acknowledgement, which only ever reaches the observer.
 *
 * @example
 * ```typescript
 * const dispatcher = createCommandDispatcher({
 *   transport,
 *   endpoints: () => cache,
 *   terminator: "\n",
 *   logger,
 * });
 *
 * dispatcher.send("LED ON");              // first writable endpoint
 * dispatcher.send(new Uint8Array([1]), "fff2");
 * ```
 */
export function createCommandDispatcher(
	options: CommandDispatcherOptions,
): CommandDispatcher {
	const { transport, endpoints, terminator, logger } = options;

	function resolveTarget(target: WriteTarget | undefined): Endpoint | undefined {
		const known = endpoints();
		if (target === undefined) {
			return writable(known)[0];
		}
		const endpoint =
			typeof target === "string" ? findEndpoint(known, target) : target;
		return endpoint && isWritable(endpoint) ? endpoint : undefined;
	}

	function prepare(
		command: Command,
		target?: WriteTarget,
	): Outcome<PreparedWrite, PrepareError> {
		const endpoint = resolveTarget(target);
		if (!endpoint) {
			return {
				ok: false,
				error:
					target === undefined
						? new NoWritableEndpointError()
						: new NoWritableEndpointError(
								`Endpoint ${typeof target === "string" ? target : target.uuid} is not writable`,
							),
			};
		}

		const encoded = encodeCommand(command, terminator);
		if (!encoded.ok) {
			return encoded;
		}

		return {
			ok: true,
			value: {
				endpoint,
				data: encoded.value,
				ackRequested: endpoint.properties.writeWithoutResponse !== true,
			},
		};
	}

	function write(prepared: PreparedWrite): void {
		logger.debug(
			`Writing ${prepared.data.byteLength} bytes to ${prepared.endpoint.uuid}: ${toHex(prepared.data)}`,
		);
		transport.write(prepared.endpoint, prepared.data, prepared.ackRequested);
	}

	function send(command: Command, target?: WriteTarget): boolean {
		const prepared = prepare(command, target);
		if (!prepared.ok) {
			logger.warn(`Send declined: ${prepared.error.message}`);
			return false;
		}
		write(prepared.value);
		return true;
	}

	return {
		prepare,
		write,
		send,
	};
}
