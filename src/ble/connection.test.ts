import * as fc from "fast-check";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSimulatedTransport, type SimulatedPeerConfig } from "../adapter/simulated";
import {
	AbortError,
	ConnectionDroppedError,
	ConnectionTimeoutError,
	DisconnectedError,
	InvalidStateError,
} from "../errors";
import type { ConnectOutcome } from "../types";
import { noopLogger } from "../utils/logger";
import { createConnectionManager } from "./connection";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const device: SimulatedPeerConfig = {
	id: "dev-1",
	name: "Thermostat",
	endpoints: [
		{ serviceUuid: "ffe0", uuid: "ffe1", properties: { writeWithoutResponse: true } },
		{ serviceUuid: "ffe0", uuid: "ffe2", properties: { notify: true } },
	],
};

function setup(
	options: { retryCount?: number; connectionTimeoutMs?: number } = {},
	config: SimulatedPeerConfig = device,
) {
	const transport = createSimulatedTransport([config]);
	const hooks = {
		onEstablished: vi.fn(),
		onInterrupted: vi.fn(),
		onReleased: vi.fn(),
		onFailure: vi.fn(),
	};
	const connection = createConnectionManager({
		transport,
		retryCount: options.retryCount ?? 3,
		connectionTimeoutMs: options.connectionTimeoutMs ?? 20000,
		logger: noopLogger,
		hooks,
	});
	const phases: string[] = [];
	connection.onPhaseChange((from, to) => {
		phases.push(`${from}->${to}`);
	});
	const peer = transport.peer(config.id);
	return { transport, hooks, connection, phases, peer };
}

describe("createConnectionManager", () => {
	beforeEach(() => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	describe("connect", () => {
		it("connects and reports the peer", async () => {
			const { connection, hooks, phases, peer, transport } = setup();

			const outcome = await connection.connect(peer);

			expect(outcome).toEqual({ ok: true, value: peer });
			expect(connection.phase).toBe("connected");
			expect(connection.peer).toEqual(peer);
			expect(connection.watchdogArmed).toBe(false);
			expect(hooks.onEstablished).toHaveBeenCalledWith(peer, false);
			expect(phases).toEqual(["idle->connecting", "connecting->connected"]);
			expect(transport.connectRequests).toBe(1);
		});

		it("arms the watchdog while connecting", () => {
			const { connection, peer } = setup();

			void connection.connect(peer);

			expect(connection.phase).toBe("connecting");
			expect(connection.watchdogArmed).toBe(true);
		});

		it("refuses to connect unless idle", async () => {
			const { connection, peer, transport } = setup();

			void connection.connect(peer);
			const second = await connection.connect(peer);

			expect(second.ok).toBe(false);
			if (!second.ok) {
				expect(second.error).toBeInstanceOf(InvalidStateError);
				expect(second.error.message).toBe("Cannot connect while connecting");
			}
			expect(transport.connectRequests).toBe(1);
		});

		it("rejects an invalid timeout synchronously", () => {
			const { connection, peer } = setup();

			expect(() => connection.connect(peer, { timeoutMs: 0 })).toThrow(
				"timeoutMs must be a positive number, got 0",
			);
			expect(() => connection.connect(peer, { timeoutMs: Number.NaN })).toThrow(
				RangeError,
			);
			expect(connection.phase).toBe("idle");
		});

		it("does not start with an aborted signal", async () => {
			const { connection, peer, transport } = setup();
			const controller = new AbortController();
			controller.abort();

			const outcome = await connection.connect(peer, { signal: controller.signal });

			expect(!outcome.ok && outcome.error).toBeInstanceOf(AbortError);
			expect(transport.connectRequests).toBe(0);
		});

		it("cancels the attempt when aborted while connecting", async () => {
			const { connection, peer, transport } = setup({}, { ...device, connectBehavior: "ignore" });
			const controller = new AbortController();

			const pending = connection.connect(peer, { signal: controller.signal });
			controller.abort("user closed the dialog");
			const outcome = await pending;

			expect(outcome).toEqual({
				ok: false,
				error: new AbortError("user closed the dialog"),
			});
			expect(connection.phase).toBe("idle");
			expect(transport.disconnectRequests).toBe(1);
		});

		it("reports a failed initial attempt without retrying", async () => {
			const { connection, peer, transport, hooks } = setup({}, { ...device, connectBehavior: "fail" });

			const outcome = await connection.connect(peer);

			expect(outcome.ok).toBe(false);
			if (!outcome.ok) {
				expect(outcome.error).toBeInstanceOf(ConnectionDroppedError);
				expect(outcome.error.message).toBe("Connection to dev-1 dropped: Connection failed");
			}
			expect(hooks.onFailure).toHaveBeenCalledTimes(1);
			expect(transport.connectRequests).toBe(1);
			expect(connection.phase).toBe("idle");
		});

		it("reports a clean disconnect during the attempt", async () => {
			const { connection, peer, transport, hooks } = setup({}, { ...device, connectBehavior: "ignore" });

			const pending = connection.connect(peer);
			transport.drop("dev-1", null);

			expect(await pending).toEqual({
				ok: false,
				error: new DisconnectedError("Peer disconnected"),
			});
			expect(hooks.onFailure).not.toHaveBeenCalled();
		});
	});

	describe("watchdog", () => {
		it("times out an unanswered connect", async () => {
			const { connection, peer, transport, hooks, phases } = setup({}, {
				...device,
				connectBehavior: "ignore",
			});
			const settled = vi.fn();
			void connection.connect(peer).then(settled);

			await vi.advanceTimersByTimeAsync(19999);
			expect(settled).not.toHaveBeenCalled();

			await vi.advanceTimersByTimeAsync(1);
			await flush();
			const outcome: ConnectOutcome = settled.mock.calls[0]?.[0];
			expect(outcome.ok).toBe(false);
			if (!outcome.ok) {
				expect(outcome.error).toBeInstanceOf(ConnectionTimeoutError);
				expect(outcome.error.message).toBe("Connection timed out after 20000ms");
				expect(hooks.onFailure).toHaveBeenCalledWith(outcome.error);
			}
			expect(transport.disconnectRequests).toBe(1);
			expect(connection.phase).toBe("idle");
			expect(phases).toEqual(["idle->connecting", "connecting->idle"]);
		});

		it("uses the per-connect timeout", async () => {
			const { connection, peer } = setup({}, { ...device, connectBehavior: "ignore" });
			const pending = connection.connect(peer, { timeoutMs: 500 });

			await vi.advanceTimersByTimeAsync(500);
			const outcome = await pending;

			expect(!outcome.ok && outcome.error.message).toBe("Connection timed out after 500ms");
		});

		it("does nothing once the connection was confirmed", async () => {
			const { connection, peer, hooks } = setup();
			await connection.connect(peer);

			await vi.advanceTimersByTimeAsync(60000);

			expect(connection.phase).toBe("connected");
			expect(hooks.onFailure).not.toHaveBeenCalled();
		});

		it("ignores a confirmation that arrives after the timeout", async () => {
			const { connection, peer, transport, hooks } = setup({}, {
				...device,
				connectBehavior: "ignore",
			});
			const pending = connection.connect(peer);
			await vi.advanceTimersByTimeAsync(20000);
			await pending;

			transport.confirmConnect("dev-1");

			expect(connection.phase).toBe("idle");
			expect(hooks.onEstablished).not.toHaveBeenCalled();
		});

		it("can connect again after a timeout", async () => {
			const { connection, peer, transport } = setup({}, { ...device, connectBehavior: "ignore" });
			const first = connection.connect(peer);
			await vi.advanceTimersByTimeAsync(20000);
			await first;

			transport.setConnectBehavior("dev-1", "confirm");
			const second = await connection.connect(peer);

			expect(second.ok).toBe(true);
			expect(connection.phase).toBe("connected");
		});
	});

	describe("reconnection", () => {
		it("reconnects after a drop with an error", async () => {
			const { connection, peer, transport, hooks, phases } = setup({ retryCount: 3 });
			await connection.connect(peer);

			transport.drop("dev-1");
			await flush();

			expect(hooks.onInterrupted).toHaveBeenCalledWith(peer, new Error("Link lost"));
			expect(hooks.onEstablished).toHaveBeenLastCalledWith(peer, true);
			expect(connection.phase).toBe("connected");
			expect(connection.retriesLeft).toBe(2);
			expect(transport.connectRequests).toBe(2);
			expect(phases).toEqual([
				"idle->connecting",
				"connecting->connected",
				"connected->reconnecting",
				"reconnecting->connected",
			]);
		});

		it("times out a reconnect attempt", async () => {
			const { connection, peer, transport, hooks } = setup();
			await connection.connect(peer);
			transport.setConnectBehavior("dev-1", "ignore");

			transport.drop("dev-1");
			await flush();
			expect(connection.phase).toBe("reconnecting");
			expect(connection.watchdogArmed).toBe(true);

			await vi.advanceTimersByTimeAsync(20000);

			expect(connection.phase).toBe("idle");
			expect(hooks.onFailure).toHaveBeenCalledTimes(1);
			const failure = hooks.onFailure.mock.calls[0]?.[0];
			expect(failure).toBeInstanceOf(ConnectionTimeoutError);
			expect(failure.reconnecting).toBe(true);
			expect(failure.message).toBe("Reconnection timed out after 20000ms");
		});

		it("spends the budget on failed reconnect attempts", async () => {
			const { connection, peer, transport, hooks } = setup({ retryCount: 2 });
			await connection.connect(peer);
			transport.setConnectBehavior("dev-1", "fail");

			transport.drop("dev-1");
			await flush();

			expect(transport.connectRequests).toBe(3);
			expect(connection.phase).toBe("idle");
			expect(connection.retriesLeft).toBe(0);
			const failure = hooks.onFailure.mock.calls[0]?.[0];
			expect(failure).toBeInstanceOf(ConnectionDroppedError);
			expect(failure.message).toBe("Connection to dev-1 dropped: Connection failed");
		});

		it("gives up at once with no budget", async () => {
			const { connection, peer, transport, hooks } = setup({ retryCount: 0 });
			await connection.connect(peer);

			transport.drop("dev-1");
			await flush();

			expect(connection.phase).toBe("idle");
			expect(transport.connectRequests).toBe(1);
			expect(hooks.onInterrupted).not.toHaveBeenCalled();
			expect(hooks.onReleased).toHaveBeenCalledWith(peer, new Error("Link lost"));
			expect(hooks.onFailure).toHaveBeenCalledWith(
				new ConnectionDroppedError("dev-1", new Error("Link lost")),
			);
		});

		it("does not refill the budget on reconnect", async () => {
			const { connection, peer, transport } = setup({ retryCount: 2 });
			await connection.connect(peer);

			transport.drop("dev-1");
			await flush();
			transport.drop("dev-1");
			await flush();

			expect(connection.phase).toBe("connected");
			expect(connection.retriesLeft).toBe(0);
		});

		it("refills the budget on a user-initiated connect", async () => {
			const { connection, peer, transport } = setup({ retryCount: 1 });
			await connection.connect(peer);
			transport.drop("dev-1");
			await flush();
			expect(connection.retriesLeft).toBe(0);

			connection.disconnect();
			await connection.connect(peer);

			expect(connection.retriesLeft).toBe(1);
		});

		it("exhausts the budget after exactly retryCount drops", async () => {
			await fc.assert(
				fc.asyncProperty(
					fc.integer({ min: 0, max: 4 }),
					fc.integer({ min: 0, max: 6 }),
					async (retryCount, drops) => {
						const { connection, peer, transport, hooks } = setup({ retryCount });
						await connection.connect(peer);

						for (let i = 0; i < drops; i++) {
							transport.drop("dev-1");
							await flush();
						}

						if (drops <= retryCount) {
							expect(connection.phase).toBe("connected");
							expect(connection.retriesLeft).toBe(retryCount - drops);
							expect(hooks.onFailure).not.toHaveBeenCalled();
						} else {
							expect(connection.phase).toBe("idle");
							expect(hooks.onFailure).toHaveBeenCalledTimes(1);
						}
						expect(transport.connectRequests).toBe(1 + Math.min(drops, retryCount));
						transport.dispose();
					},
				),
				{ numRuns: 30 },
			);
		});
	});

	describe("disconnect", () => {
		it("returns false while idle", () => {
			const { connection, transport } = setup();

			expect(connection.disconnect()).toBe(false);
			expect(transport.disconnectRequests).toBe(0);
		});

		it("ignores a different peer", async () => {
			const { connection, peer } = setup();
			await connection.connect(peer);

			expect(connection.disconnect({ id: "dev-2", name: undefined })).toBe(false);
			expect(connection.phase).toBe("connected");
		});

		it("tears the link down through disconnecting", async () => {
			const { connection, peer, transport, hooks, phases } = setup();
			await connection.connect(peer);

			expect(connection.disconnect(peer)).toBe(true);
			await flush();

			expect(connection.phase).toBe("idle");
			expect(connection.peer).toBeNull();
			expect(transport.disconnectRequests).toBe(1);
			expect(hooks.onReleased).toHaveBeenCalledWith(peer, undefined);
			expect(hooks.onFailure).not.toHaveBeenCalled();
			expect(phases.slice(-2)).toEqual(["connected->disconnecting", "disconnecting->idle"]);
		});

		it("settles a pending connect", async () => {
			const { connection, peer } = setup({}, { ...device, connectBehavior: "ignore" });

			const pending = connection.connect(peer);
			connection.disconnect();

			expect(await pending).toEqual({
				ok: false,
				error: new DisconnectedError("Disconnected before the connection was established"),
			});
		});

		it("goes idle on a clean drop from the peer", async () => {
			const { connection, peer, transport, hooks } = setup();
			await connection.connect(peer);

			transport.drop("dev-1", null);
			await flush();

			expect(connection.phase).toBe("idle");
			expect(transport.connectRequests).toBe(1);
			expect(hooks.onReleased).toHaveBeenCalledWith(peer, undefined);
			expect(hooks.onFailure).not.toHaveBeenCalled();
		});
	});

	describe("calls from phase listeners", () => {
		it("disconnects once the link has come up", async () => {
			const { connection, peer, transport, hooks, phases } = setup();
			connection.onPhaseChange((_, to) => {
				if (to === "connected") connection.disconnect();
			});

			const outcome = await connection.connect(peer);
			await flush();

			expect(outcome).toEqual({ ok: true, value: peer });
			expect(connection.phase).toBe("idle");
			expect(connection.peer).toBeNull();
			expect(transport.disconnectRequests).toBe(1);
			expect(transport.isConnected("dev-1")).toBe(false);
			expect(hooks.onReleased).toHaveBeenCalledWith(peer, undefined);
			expect(phases).toEqual([
				"idle->connecting",
				"connecting->connected",
				"connected->disconnecting",
				"disconnecting->idle",
			]);
		});

		it("connects again after a timeout", async () => {
			const { connection, peer, transport } = setup({}, { ...device, connectBehavior: "ignore" });
			let retried: Promise<ConnectOutcome> | undefined;
			connection.onPhaseChange((from, to) => {
				if (from === "connecting" && to === "idle" && !retried) {
					transport.setConnectBehavior("dev-1", "confirm");
					retried = connection.connect(peer);
				}
			});

			const first = connection.connect(peer);
			await vi.advanceTimersByTimeAsync(20000);
			const firstOutcome = await first;
			await flush();

			expect(!firstOutcome.ok && firstOutcome.error).toBeInstanceOf(ConnectionTimeoutError);
			expect(await retried).toEqual({ ok: true, value: peer });
			expect(connection.phase).toBe("connected");
			expect(transport.connectRequests).toBe(2);
		});
	});

	describe("unconfirmed disconnects", () => {
		it("still reports a failed attempt to the same peer as a drop", async () => {
			const transport = createSimulatedTransport([{ ...device, connectBehavior: "ignore" }]);
			const connection = createConnectionManager({
				transport: { ...transport, disconnect: vi.fn() },
				retryCount: 3,
				connectionTimeoutMs: 30,
				logger: noopLogger,
			});
			const peer = transport.peer("dev-1");
			const first = connection.connect(peer);
			await vi.advanceTimersByTimeAsync(30);
			const firstOutcome = await first;

			transport.setConnectBehavior("dev-1", "fail");
			const settled = vi.fn();
			void connection.connect(peer).then(settled);
			await flush();

			expect(!firstOutcome.ok && firstOutcome.error).toBeInstanceOf(ConnectionTimeoutError);
			expect(settled).toHaveBeenCalledWith({
				ok: false,
				error: new ConnectionDroppedError("dev-1", new Error("Connection failed")),
			});
			expect(connection.phase).toBe("idle");
		});
	});

	describe("adapter state", () => {
		it("releases the link when the radio powers off", async () => {
			const { connection, peer, hooks } = setup({}, { ...device, connectBehavior: "ignore" });
			const pending = connection.connect(peer);

			connection.handleAdapterState("poweredOff");

			expect(await pending).toEqual({
				ok: false,
				error: new DisconnectedError("Adapter powered off"),
			});
			expect(connection.phase).toBe("idle");
			expect(hooks.onReleased).toHaveBeenCalledWith(peer, undefined);
		});

		it("ignores other states", async () => {
			const { connection, peer } = setup();
			await connection.connect(peer);

			connection.handleAdapterState("resetting");

			expect(connection.phase).toBe("connected");
		});
	});

	describe("dispose", () => {
		it("disconnects and refuses new connections", async () => {
			const { connection, peer, transport } = setup();
			await connection.connect(peer);

			connection.dispose();
			const outcome = await connection.connect(peer);

			expect(transport.disconnectRequests).toBe(1);
			expect(!outcome.ok && outcome.error.message).toBe("Cannot connect while disposed");
		});
	});
});
