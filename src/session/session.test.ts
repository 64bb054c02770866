import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSimulatedTransport, type SimulatedPeerConfig } from "../adapter/simulated";
import {
	AbortError,
	ConnectionDroppedError,
	ConnectionTimeoutError,
	DisconnectedError,
	EncodingError,
	InvalidStateError,
	NoNotifiableEndpointError,
	NoWritableEndpointError,
	RequestTimeoutError,
} from "../errors";
import type { RequestOutcome, SessionObserver } from "../types";
import { noopLogger } from "../utils/logger";
import type { SessionOptions } from "./options";
import { createBLESession } from "./session";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));
const text = (value: string) => new TextEncoder().encode(value);

const echo: SimulatedPeerConfig = {
	id: "dev-1",
	name: "Echo",
	endpoints: [
		{ serviceUuid: "ffe0", uuid: "ffe1", properties: { writeWithoutResponse: true } },
		{ serviceUuid: "ffe0", uuid: "ffe2", properties: { notify: true } },
	],
	onWrite: (write, t) => {
		if (write.text === "PING\n") {
			t.notify("ffe2", "PONG", { delayMs: 50 });
		} else if (write.text.startsWith("GET ")) {
			t.notify("ffe2", `VAL ${write.text.slice(4).trim()}`, { delayMs: 10 });
		}
	},
};

function createObserver() {
	return {
		onAdapterStateChange: vi.fn(),
		onPhaseChange: vi.fn(),
		onConnectionError: vi.fn(),
		onDiscover: vi.fn(),
		onServicesDiscovered: vi.fn(),
		onEndpointsDiscovered: vi.fn(),
		onWrite: vi.fn(),
		onValueUpdate: vi.fn(),
	} satisfies SessionObserver;
}

function setup(options: SessionOptions = {}, config: SimulatedPeerConfig = echo) {
	const transport = createSimulatedTransport([config]);
	const logger = { ...noopLogger, warn: vi.fn() };
	const observer = createObserver();
	const session = createBLESession(transport, { logger, observer, ...options });
	const peer = transport.peer(config.id);

	async function connected() {
		const outcome = await session.connect(peer);
		await flush();
		return outcome;
	}

	return { transport, logger, observer, session, peer, connected };
}

describe("createBLESession", () => {
	beforeEach(() => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("validates options", () => {
		const transport = createSimulatedTransport([echo]);

		expect(() => createBLESession(transport, { retryCount: -1 })).toThrow(RangeError);
		expect(() => createBLESession(transport, { connectionTimeoutMs: 0 })).toThrow(
			"connectionTimeoutMs must be a positive number, got 0",
		);
	});

	describe("connection", () => {
		it("discovers services and endpoints after connecting", async () => {
			const { session, peer, connected } = setup();

			const outcome = await connected();

			expect(outcome).toEqual({ ok: true, value: peer });
			expect(session.phase).toBe("connected");
			expect(session.connectedPeer).toBe(peer);
			expect(session.services).toEqual([{ peerId: "dev-1", uuid: "ffe0" }]);
			expect(session.endpoints.map((e) => e.uuid)).toEqual(["ffe1", "ffe2"]);
			expect(session.writableEndpoints.map((e) => e.uuid)).toEqual(["ffe1"]);
			expect(session.notifiableEndpoints.map((e) => e.uuid)).toEqual(["ffe2"]);
		});

		it("forwards lifecycle events to the observer", async () => {
			const { observer, connected } = setup();

			await connected();

			expect(observer.onPhaseChange.mock.calls).toEqual([
				["idle", "connecting"],
				["connecting", "connected"],
			]);
			expect(observer.onServicesDiscovered).toHaveBeenCalledWith(
				[{ peerId: "dev-1", uuid: "ffe0" }],
				undefined,
			);
			expect(observer.onEndpointsDiscovered).toHaveBeenCalledTimes(1);
		});

		it("has no connected peer while connecting", () => {
			const { session, peer } = setup();

			void session.connect(peer);

			expect(session.phase).toBe("connecting");
			expect(session.connectedPeer).toBeNull();
		});

		it("reports a watchdog expiry to the caller and the observer", async () => {
			const { session, peer, observer } = setup({}, { ...echo, connectBehavior: "ignore" });

			const pending = session.connect(peer);
			await vi.advanceTimersByTimeAsync(20000);
			const outcome = await pending;

			expect(outcome.ok).toBe(false);
			if (!outcome.ok) {
				expect(outcome.error).toBeInstanceOf(ConnectionTimeoutError);
				expect(observer.onConnectionError).toHaveBeenCalledWith(outcome.error);
			}
			expect(session.phase).toBe("idle");
		});

		it("rediscovers endpoints after an automatic reconnect", async () => {
			const { session, transport, connected } = setup();
			await connected();
			session.setNotifying(true);

			transport.drop("dev-1");
			await flush();

			expect(session.phase).toBe("connected");
			expect(session.retriesLeft).toBe(2);
			expect(session.endpoints).toHaveLength(2);
			expect(transport.isSubscribed("ffe2")).toBe(false);
		});

		it("forgets services and endpoints on disconnect", async () => {
			const { session, connected } = setup();
			await connected();

			expect(session.disconnect()).toBe(true);

			expect(session.phase).toBe("idle");
			expect(session.services).toEqual([]);
			expect(session.endpoints).toEqual([]);
		});

		it("surfaces a drop after the budget ran out", async () => {
			const { session, transport, observer, connected } = setup({ retryCount: 0 });
			await connected();

			transport.drop("dev-1");
			await flush();

			expect(session.phase).toBe("idle");
			expect(observer.onConnectionError).toHaveBeenCalledWith(
				new ConnectionDroppedError("dev-1", new Error("Link lost")),
			);
		});

		it("accepts a disconnect from a phase listener", async () => {
			const { session, transport, peer } = setup();
			session.onPhaseChange((_, to) => {
				if (to === "connected") session.disconnect();
			});

			const outcome = await session.connect(peer);
			await flush();

			expect(outcome.ok).toBe(true);
			expect(session.phase).toBe("idle");
			expect(transport.isConnected("dev-1")).toBe(false);
			expect(transport.disconnectRequests).toBe(1);
		});

		it("accepts a disconnect from the observer", async () => {
			const { session, transport, peer } = setup();
			const observer: SessionObserver = {
				onPhaseChange: (_, to) => {
					if (to === "connected") session.disconnect(peer);
				},
			};
			session.setObserver(observer);

			await session.connect(peer);
			await flush();

			expect(session.phase).toBe("idle");
			expect(transport.disconnectRequests).toBe(1);
			expect((await session.connect(peer)).ok).toBe(true);
		});
	});

	describe("adapter state", () => {
		it("tracks and forwards the radio state", async () => {
			const { session, transport, observer } = setup();
			expect(session.adapterState).toBe("poweredOn");

			transport.setAdapterState("resetting");
			await flush();

			expect(session.adapterState).toBe("resetting");
			expect(observer.onAdapterStateChange).toHaveBeenCalledWith("resetting");
		});

		it("cleans up when the radio powers off", async () => {
			const { session, transport, connected } = setup();
			await connected();
			const reply = session.sendAndWait("STATUS", "OK", 5000);

			transport.setAdapterState("poweredOff");
			await flush();

			expect(session.phase).toBe("idle");
			expect(await reply).toEqual({
				ok: false,
				error: new DisconnectedError("Disconnected"),
			});
		});
	});

	describe("scanning", () => {
		it("forwards discoveries", async () => {
			const { session, observer, peer, transport } = setup();

			session.startScan(["ffe0"]);
			await flush();
			session.stopScan();

			expect(observer.onDiscover).toHaveBeenCalledWith(
				peer,
				{ name: "Echo", uuids: ["ffe0"] },
				-60,
			);
			expect(transport.scanning).toBe(false);
		});
	});

	describe("setNotifying", () => {
		it("declines without a notifiable endpoint", () => {
			const { session, logger } = setup();

			expect(session.setNotifying(true)).toBe(false);
			expect(logger.warn).toHaveBeenCalledWith(
				"setNotifying: no notifiable endpoint available",
			);
		});

		it("subscribes the first notifiable endpoint", async () => {
			const { session, transport, connected } = setup();
			await connected();

			expect(session.setNotifying(true)).toBe(true);
			expect(transport.isSubscribed("ffe2")).toBe(true);

			expect(session.setNotifying(false)).toBe(true);
			expect(transport.isSubscribed("ffe2")).toBe(false);
		});

		it("declines endpoints that do not notify", async () => {
			const { session, logger, connected } = setup();
			await connected();
			const command = session.findEndpoint("ffe1");

			expect(command && session.setNotifying(true, command)).toBe(false);
			expect(logger.warn).toHaveBeenCalledWith("setNotifying: endpoint ffe1 does not notify");
		});

		it("records the last value of each endpoint", async () => {
			const { session, transport, observer, connected } = setup();
			await connected();
			session.setNotifying(true);

			transport.notify("ffe2", "TEMP=21.5");
			await flush();

			const status = session.findEndpoint("FFE2");
			expect(status && session.lastValue(status)).toEqual(text("TEMP=21.5"));
			expect(observer.onValueUpdate).toHaveBeenCalledWith(
				status,
				text("TEMP=21.5"),
				undefined,
			);
		});
	});

	describe("send", () => {
		it("declines while not connected", () => {
			const { session, transport, logger } = setup();

			expect(session.send("LED ON")).toBe(false);
			expect(logger.warn).toHaveBeenCalledWith("Send declined: not connected (idle)");
			expect(transport.writes).toHaveLength(0);
		});

		it("writes the terminated command without response", async () => {
			const { session, transport, connected } = setup();
			await connected();

			expect(session.send("LED ON")).toBe(true);

			expect(transport.writes).toHaveLength(1);
			expect(transport.writes[0]?.text).toBe("LED ON\n");
			expect(transport.writes[0]?.ackRequested).toBe(false);
		});

		it("uses the configured terminator", async () => {
			const { session, transport, connected } = setup({ commandTerminator: "\r\n" });
			await connected();

			session.send("LED ON");

			expect(transport.writes[0]?.text).toBe("LED ON\r\n");
		});

		it("reports write acknowledgements to the observer", async () => {
			const { session, observer, connected } = setup(
				{},
				{
					id: "dev-1",
					endpoints: [
						{ serviceUuid: "ffe0", uuid: "ffe3", properties: { write: true } },
					],
				},
			);
			await connected();

			session.send(new Uint8Array([0x01]));
			await flush();

			expect(observer.onWrite).toHaveBeenCalledWith(session.findEndpoint("ffe3"), undefined);
		});
	});

	describe("sendAndWait", () => {
		it("resolves with the matching notification", async () => {
			const { session, transport, connected } = setup();
			await connected();

			const reply = session.sendAndWait("PING", "PONG", 2000);
			await flush();
			await vi.advanceTimersByTimeAsync(50);

			expect(await reply).toEqual({ ok: true, value: text("PONG") });
			expect(transport.isSubscribed("ffe2")).toBe(true);
			expect(session.pendingRequests).toBe(0);
		});

		it("invokes the callback exactly once", async () => {
			const { session, transport, connected } = setup();
			await connected();
			const callback = vi.fn();

			const handle = session.sendAndWait("PING", "PONG", 2000, callback);
			expect(handle.settled).toBe(false);
			await flush();
			await vi.advanceTimersByTimeAsync(50);
			transport.notify("ffe2", "PONG!");
			await flush();
			await vi.advanceTimersByTimeAsync(2000);

			expect(handle.settled).toBe(true);
			expect(callback).toHaveBeenCalledTimes(1);
			expect(callback).toHaveBeenCalledWith({ ok: true, value: text("PONG") });
		});

		it("times out when no matching value arrives", async () => {
			const { session, connected } = setup();
			await connected();

			const reply = session.sendAndWait("STATUS", "OK", 1000);
			await flush();
			await vi.advanceTimersByTimeAsync(1000);
			const outcome = await reply;

			expect(outcome.ok).toBe(false);
			if (!outcome.ok) {
				expect(outcome.error).toBeInstanceOf(RequestTimeoutError);
				expect(outcome.error.message).toBe("Request timed out after 1000ms");
			}
		});

		it("fails synchronously while not connected", () => {
			const { session, logger } = setup();
			const callback = vi.fn();

			const handle = session.sendAndWait("PING", "PONG", 1000, callback);

			expect(callback).toHaveBeenCalledWith({
				ok: false,
				error: new InvalidStateError("send a request", "idle"),
			});
			expect(handle.id).toBe(0);
			expect(handle.settled).toBe(true);
			expect(logger.warn).toHaveBeenCalledWith(
				"Request declined: Cannot send a request while idle",
			);
		});

		it("fails without a notifiable endpoint", async () => {
			const { session, transport, connected } = setup(
				{},
				{
					id: "dev-1",
					endpoints: [
						{ serviceUuid: "ffe0", uuid: "ffe1", properties: { writeWithoutResponse: true } },
					],
				},
			);
			await connected();
			const callback = vi.fn();

			session.sendAndWait("PING", "PONG", 1000, callback);

			const outcome: RequestOutcome = callback.mock.calls[0]?.[0];
			expect(!outcome.ok && outcome.error).toBeInstanceOf(NoNotifiableEndpointError);
			expect(transport.writes).toHaveLength(0);
		});

		it("fails without a writable endpoint", async () => {
			const { session, connected } = setup(
				{},
				{
					id: "dev-1",
					endpoints: [{ serviceUuid: "ffe0", uuid: "ffe2", properties: { notify: true } }],
				},
			);
			await connected();

			const outcome = await session.sendAndWait("PING", "PONG", 1000);

			expect(!outcome.ok && outcome.error).toBeInstanceOf(NoWritableEndpointError);
		});

		it("fails for commands that cannot be encoded", async () => {
			const { session, transport, connected } = setup();
			await connected();

			const outcome = await session.sendAndWait(new Uint8Array(0), "PONG", 1000);

			expect(!outcome.ok && outcome.error).toBeInstanceOf(EncodingError);
			expect(transport.writes).toHaveLength(0);
		});

		it("rejects an invalid timeout synchronously", async () => {
			const { session, connected } = setup();
			await connected();

			expect(() => session.sendAndWait("PING", "PONG", 0, vi.fn())).toThrow(
				"timeoutMs must be a positive number, got 0",
			);
			expect(() => session.sendAndWait("PING", "PONG", -1)).toThrow(RangeError);
		});

		it("never matches an absent expected value", async () => {
			const { session, connected } = setup();
			await connected();

			const reply = session.sendAndWait("PING", null, 500);
			await flush();
			await vi.advanceTimersByTimeAsync(500);
			const outcome = await reply;

			expect(!outcome.ok && outcome.error).toBeInstanceOf(RequestTimeoutError);
		});

		it("resolves with AbortError for an aborted signal", async () => {
			const { session, transport, connected } = setup();
			await connected();
			const controller = new AbortController();
			controller.abort();

			const outcome = await session.sendAndWait("PING", "PONG", 1000, {
				signal: controller.signal,
			});

			expect(!outcome.ok && outcome.error).toBeInstanceOf(AbortError);
			expect(transport.writes).toHaveLength(0);
		});

		it("resolves with AbortError when aborted while pending", async () => {
			const { session, connected } = setup();
			await connected();
			const controller = new AbortController();

			const reply = session.sendAndWait("STATUS", "OK", 1000, {
				signal: controller.signal,
			});
			await flush();
			controller.abort(new Error("Screen closed"));

			expect(await reply).toEqual({ ok: false, error: new AbortError("Screen closed") });
			expect(session.pendingRequests).toBe(0);
		});

		it("writes to an explicit target", async () => {
			const { session, transport, connected } = setup(
				{},
				{
					...echo,
					endpoints: [
						...echo.endpoints,
						{ serviceUuid: "ffe0", uuid: "ffe3", properties: { write: true } },
					],
				},
			);
			await connected();

			session.sendAndWait("PING", "PONG", 1000, vi.fn(), "ffe3");
			await flush();

			expect(transport.writes[0]?.endpoint.uuid).toBe("ffe3");
			expect(transport.writes[0]?.ackRequested).toBe(true);
		});

		it("resolves pending requests on disconnect", async () => {
			const { session, connected } = setup();
			await connected();

			const reply = session.sendAndWait("STATUS", "OK", 5000);
			await flush();
			session.disconnect();

			expect(await reply).toEqual({
				ok: false,
				error: new DisconnectedError("Disconnected"),
			});
			expect(session.pendingRequests).toBe(0);
		});

		it("resolves pending requests when the link is lost for good", async () => {
			const { session, transport, connected } = setup({ retryCount: 0 });
			await connected();

			const reply = session.sendAndWait("STATUS", "OK", 5000);
			await flush();
			transport.drop("dev-1");

			expect(await reply).toEqual({
				ok: false,
				error: new DisconnectedError("Disconnected: Link lost"),
			});
		});

		it("serializes requests on the same endpoint", async () => {
			const { session, transport, connected } = setup();
			await connected();

			const a = session.sendAndWait("GET A", "VAL A", 1000);
			const b = session.sendAndWait("GET B", "VAL B", 1000);
			await flush();
			expect(transport.writes.map((w) => w.text)).toEqual(["GET A\n"]);

			await vi.advanceTimersByTimeAsync(10);
			await flush();
			expect(transport.writes.map((w) => w.text)).toEqual(["GET A\n", "GET B\n"]);
			await vi.advanceTimersByTimeAsync(10);

			expect(await a).toEqual({ ok: true, value: text("VAL A") });
			expect(await b).toEqual({ ok: true, value: text("VAL B") });
		});

		it("dispatches at once when serialization is off", async () => {
			const { session, transport, connected } = setup({ serializeRequests: false });
			await connected();

			const a = session.sendAndWait("GET A", "VAL A", 1000);
			const b = session.sendAndWait("GET B", "VAL B", 1000);
			expect(transport.writes.map((w) => w.text)).toEqual(["GET A\n", "GET B\n"]);

			await vi.advanceTimersByTimeAsync(10);

			expect(await a).toEqual({ ok: true, value: text("VAL A") });
			expect(await b).toEqual({ ok: true, value: text("VAL B") });
		});
	});

	describe("dispose", () => {
		it("cancels requests, disconnects and detaches", async () => {
			const { session, transport, observer, connected } = setup();
			await connected();
			const reply = session.sendAndWait("STATUS", "OK", 5000);
			await flush();

			session.dispose();

			expect(await reply).toEqual({ ok: false, error: new AbortError("Session disposed") });
			expect(session.phase).toBe("idle");
			expect(transport.disconnectRequests).toBe(1);
			expect(transport.events.listenerCount("valueUpdate")).toBe(0);
			expect(transport.events.listenerCount("connect")).toBe(0);

			observer.onAdapterStateChange.mockClear();
			transport.setAdapterState("poweredOn");
			await flush();
			expect(observer.onAdapterStateChange).not.toHaveBeenCalled();
		});

		it("refuses work afterwards", async () => {
			const { session, peer } = setup();
			session.dispose();

			const connect = await session.connect(peer);
			const callback = vi.fn();
			session.sendAndWait("PING", "PONG", 1000, callback);

			expect(!connect.ok && connect.error.message).toBe("Cannot connect while disposed");
			expect(callback).toHaveBeenCalledWith({
				ok: false,
				error: new InvalidStateError("send a request", "disposed"),
			});
		});
	});
});
