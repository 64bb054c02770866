import type { Endpoint } from "../types";
import { toCompactUuid } from "../utils/uuid";

/** Endpoints that accept writes, with or without response. */
export function writable(endpoints: readonly Endpoint[]): Endpoint[] {
	return endpoints.filter(isWritable);
}

/** Endpoints that deliver value notifications. */
export function notifiable(endpoints: readonly Endpoint[]): Endpoint[] {
	return endpoints.filter((e) => e.properties.notify === true);
}

export function isWritable(endpoint: Endpoint): boolean {
	return (
		endpoint.properties.write === true ||
		endpoint.properties.writeWithoutResponse === true
	);
}

/**
 * Stable identity of an endpoint: peer, service and endpoint UUID.
 * Used as map key for caches and per-endpoint queues.
 */
export function endpointKey(endpoint: Endpoint): string {
	return `${endpoint.peerId}/${keyPart(endpoint.serviceUuid)}/${keyPart(endpoint.uuid)}`;
}

function keyPart(uuid: string): string {
	try {
		return toCompactUuid(uuid);
	} catch {
		return uuid.toLowerCase();
	}
}

export function sameEndpoint(a: Endpoint, b: Endpoint): boolean {
	return a === b || endpointKey(a) === endpointKey(b);
}

/**
 * Looks an endpoint up by UUID (any spelling), optionally within one service.
 */
export function findEndpoint(
	endpoints: readonly Endpoint[],
	uuid: string,
	serviceUuid?: string,
): Endpoint | undefined {
	return endpoints.find(
		(e) =>
			keyPart(e.uuid) === keyPart(uuid) &&
			(serviceUuid === undefined ||
				keyPart(e.serviceUuid) === keyPart(serviceUuid)),
	);
}
