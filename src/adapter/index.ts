export {
	createNobleTransport,
	DEFAULT_OPERATION_TIMEOUT_MS,
	type NobleAdvertisement,
	type NobleCentral,
	type NobleCharacteristic,
	type NoblePeripheral,
	type NobleService,
	type NobleTransportOptions,
} from "./noble";
export {
	createSimulatedTransport,
	type NotifyOptions,
	type SimulatedConnectBehavior,
	type SimulatedEndpointConfig,
	type SimulatedPeerConfig,
	type SimulatedTransport,
	type SimulatedWrite,
} from "./simulated";
