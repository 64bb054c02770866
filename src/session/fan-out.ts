import type {
	AdapterState,
	AdvertisementEvent,
	ConnectionFailure,
	ConnectionPhase,
	Endpoint,
	Peer,
	Service,
	SessionObserver,
} from "../types";
import type { Logger } from "../utils/logger";
import { createNonOwningRef, type Ref } from "../utils/weakref";

/**
 * Forwards transport events to the single registered observer.
 *
 * No buffering, filtering or reordering: each call is delivered synchronously
 * or dropped when no observer is set (or it has been garbage collected).
 */
export interface EventFanOut {
	setObserver(observer: SessionObserver | undefined): void;
	readonly hasObserver: boolean;
	adapterStateChange(state: AdapterState): void;
	phaseChange(from: ConnectionPhase, to: ConnectionPhase): void;
	connectionError(error: ConnectionFailure): void;
	discover(peer: Peer, advertisement: AdvertisementEvent, rssi: number): void;
	servicesDiscovered(services: readonly Service[], error: Error | undefined): void;
	endpointsDiscovered(
		endpoints: readonly Endpoint[],
		service: Service,
		error: Error | undefined,
	): void;
	write(endpoint: Endpoint, error: Error | undefined): void;
	valueUpdate(
		endpoint: Endpoint,
		value: Uint8Array | undefined,
		error: Error | undefined,
	): void;
}

export function createEventFanOut(logger: Logger): EventFanOut {
	let ref: Ref<SessionObserver> | undefined;

	function deliver(
		capability: keyof SessionObserver,
		invoke: (observer: SessionObserver) => void,
	): void {
		const observer = ref?.deref();
		if (!observer) return;
		try {
			invoke(observer);
		} catch (e) {
			logger.error(`Observer ${capability} threw:`, e);
		}
	}

	return {
		setObserver(observer) {
			ref = observer ? createNonOwningRef(observer) : undefined;
		},
		get hasObserver() {
			return ref?.deref() !== undefined;
		},
		adapterStateChange(state) {
			deliver("onAdapterStateChange", (o) => o.onAdapterStateChange?.(state));
		},
		phaseChange(from, to) {
			deliver("onPhaseChange", (o) => o.onPhaseChange?.(from, to));
		},
		connectionError(error) {
			deliver("onConnectionError", (o) => o.onConnectionError?.(error));
		},
		discover(peer, advertisement, rssi) {
			deliver("onDiscover", (o) => o.onDiscover?.(peer, advertisement, rssi));
		},
		servicesDiscovered(services, error) {
			deliver("onServicesDiscovered", (o) =>
				o.onServicesDiscovered?.(services, error),
			);
		},
		endpointsDiscovered(endpoints, service, error) {
			deliver("onEndpointsDiscovered", (o) =>
				o.onEndpointsDiscovered?.(endpoints, service, error),
			);
		},
		write(endpoint, error) {
			deliver("onWrite", (o) => o.onWrite?.(endpoint, error));
		},
		valueUpdate(endpoint, value, error) {
			deliver("onValueUpdate", (o) => o.onValueUpdate?.(endpoint, value, error));
		},
	};
}
