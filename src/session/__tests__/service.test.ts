/**
 * Session Service Tests
 *
 * Runs real sessions against a scripted in-process device behind a mocked
 * node:net.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

// Mock the socket layer before importing the session
vi.mock("node:net", async () => {
  const { mockNetwork } = await import("./fake-device.js");
  return {
    createConnection: vi.fn((options: { host?: string }) =>
      mockNetwork.connect(options),
    ),
  };
});

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => {
  const logger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
  };
  return {
    createLogger: () => logger,
    logOperationStart: vi.fn(),
    logOperationComplete: vi.fn(),
    logOperationFailed: vi.fn(),
  };
});

import {
  FakeDevice,
  type FakeDeviceOptions,
  type MockSocket,
  mockNetwork,
} from "./fake-device.js";
// Import after mocks
import type { SessionError, StateChangeEvent } from "../index.js";
import { type DeviceSession, openSession } from "../service.js";

const BASE_OPTIONS = {
  address: "10.0.0.9",
  connectTimeoutMs: 200,
  requestTimeoutMs: 200,
  keepaliveMs: 0,
};

const GANG_SWITCH: FakeDeviceOptions = {
  info: { did: "sw1", pid: "p2g", dtp: "00" },
  attr: [1],
  state: { "1": 0 },
};

const COLOR_LIGHT: FakeDeviceOptions = {
  info: { did: "abc123", pid: "p1", dtp: "01" },
  attr: [1, 2, 3, 4, 5, 6],
  state: { "1": 255, "2": 0, "3": 500, "4": 800, "5": 65535, "6": 65535 },
};

let devices: FakeDevice[] = [];
let openSessions: DeviceSession[] = [];

function scriptDevice(options: FakeDeviceOptions): void {
  mockNetwork.onSocket = (socket) => {
    devices.push(new FakeDevice(socket, options));
  };
}

function lastDevice(): FakeDevice {
  const device = devices.at(-1);
  if (!device) throw new Error("no device connected");
  return device;
}

function lastSocket(): MockSocket {
  const socket = mockNetwork.sockets.at(-1);
  if (!socket) throw new Error("no socket created");
  return socket;
}

async function open(
  options: FakeDeviceOptions,
  overrides: Record<string, unknown> = {},
): Promise<DeviceSession> {
  scriptDevice(options);
  const result = await openSession({ ...BASE_OPTIONS, ...overrides });
  if (result.isErr()) {
    throw new Error(`open failed: ${result.error.type}`);
  }
  openSessions.push(result.value);
  return result.value;
}

function setFrames(socket: MockSocket) {
  return socket.sentFrames().filter((frame) => frame.cmd === 3);
}

describe("Session Service", () => {
  beforeEach(() => {
    mockNetwork.reset();
    devices = [];
    openSessions = [];
  });

  afterEach(() => {
    for (const session of openSessions) session.close();
  });

  // ===========================================================================
  // Opening
  // ===========================================================================

  describe("openSession", () => {
    it("discovers, classifies and enters ready", async () => {
      const session = await open(COLOR_LIGHT);

      expect(session.status()).toBe("ready");
      expect(session.identity()).toEqual({
        deviceId: "abc123",
        productId: "p1",
        deviceType: 1,
        modelName: "CozyLife Device (p1)",
      });
      expect(session.capabilities().classification).toBe("colorLight");
      expect(session.entities()).toHaveLength(1);
      expect(session.rawState()).toEqual(COLOR_LIGHT.state);
      expect(lastSocket().sentFrames().map((frame) => frame.cmd)).toEqual([
        0, 2,
      ]);
    });

    it("derives entity state from the discovered state", async () => {
      const session = await open(COLOR_LIGHT);

      expect(session.currentState(0)._unsafeUnwrap()).toEqual({
        index: 0,
        on: true,
        brightness: 80,
        colorTemperature: 4250,
        hue: null,
        saturation: null,
        colorMode: "colorTemperature",
      });
    });

    it("derives every entity state in entity order", async () => {
      const session = await open({ ...GANG_SWITCH, state: { "1": 2 } });

      expect(session.currentStates().map((state) => state.on)).toEqual([
        false,
        true,
      ]);
    });

    it("returns CONNECT_REFUSED when nothing is listening", async () => {
      mockNetwork.outcome = "refuse";

      const result = await openSession(BASE_OPTIONS);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "CONNECT_REFUSED",
        address: "10.0.0.9",
        port: 5555,
        code: "ECONNREFUSED",
      });
      expect(lastSocket().destroyed).toBe(true);
    });

    it("returns CONNECT_TIMEOUT when the connection never completes", async () => {
      mockNetwork.outcome = "hang";

      const result = await openSession({ ...BASE_OPTIONS, connectTimeoutMs: 30 });

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "CONNECT_TIMEOUT",
        timeoutMs: 30,
      });
      expect(lastSocket().destroyed).toBe(true);
    });

    it("returns DISCOVERY_TIMEOUT and closes the socket when INFO goes unanswered", async () => {
      mockNetwork.onSocket = (socket) => {
        const device = new FakeDevice(socket, COLOR_LIGHT);
        device.answerInfo = false;
        devices.push(device);
      };

      const result = await openSession({ ...BASE_OPTIONS, requestTimeoutMs: 30 });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "DISCOVERY_TIMEOUT",
        stage: "info",
        timeoutMs: 30,
        message: "No INFO response within 30ms",
      });
      expect(lastSocket().destroyed).toBe(true);
    });

    it("returns DISCOVERY_REJECTED for an incomplete identity", async () => {
      scriptDevice({ info: { did: "abc123" } });

      const result = await openSession(BASE_OPTIONS);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "DISCOVERY_REJECTED",
        reason: "INCOMPLETE_IDENTITY",
        missing: ["pid", "dtp"],
      });
      expect(lastSocket().destroyed).toBe(true);
    });

    it("rejects skip-validation without an assumed device", async () => {
      const result = await openSession({
        ...BASE_OPTIONS,
        skipValidation: true,
      });

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_OPTIONS");
      expect(mockNetwork.sockets).toHaveLength(0);
    });

    it("uses the assumed device and sends nothing in skip-validation mode", async () => {
      const session = await open(GANG_SWITCH, {
        skipValidation: true,
        assumed: { productId: "p2g", deviceType: 0, dpids: [1] },
      });

      expect(session.identity().deviceId).toBe("cozylife_10_0_0_9");
      expect(session.entities()).toHaveLength(2);
      expect(lastSocket().writes).toHaveLength(0);
    });

    it("honours the gang count override", async () => {
      const session = await open(GANG_SWITCH, { gangCount: 3 });

      expect(session.entities().map((entity) => entity.uniqueId)).toEqual([
        "sw1_1",
        "sw1_2",
        "sw1_3",
      ]);
    });
  });

  // ===========================================================================
  // Commands
  // ===========================================================================

  describe("set", () => {
    it("switches one gang without touching the other", async () => {
      const session = await open(GANG_SWITCH);

      const result = await session.set(0, { type: "power", on: true });

      expect(result.isOk()).toBe(true);
      expect(setFrames(lastSocket())[0]?.msg).toEqual({
        attr: [1],
        data: { "1": 1 },
      });
      expect(session.currentState(0)._unsafeUnwrap().on).toBe(true);
      expect(session.currentState(1)._unsafeUnwrap().on).toBe(false);
    });

    it("completes concurrent gang commands acknowledged out of order", async () => {
      const session = await open(GANG_SWITCH);
      const device = lastDevice();
      device.holdAcks = true;

      const first = session.set(0, { type: "power", on: true });
      const second = session.set(1, { type: "power", on: true });
      await vi.waitFor(() => expect(device.heldAcks).toHaveLength(2));
      device.releaseAcksInReverse();

      const results = await Promise.all([first, second]);

      expect(results.every((result) => result.isOk())).toBe(true);
      expect(
        setFrames(lastSocket()).map((frame) => frame.msg),
      ).toEqual([
        { attr: [1], data: { "1": 1 } },
        { attr: [1], data: { "1": 3 } },
      ]);
      expect(session.rawState()["1"]).toBe(3);
      expect(session.currentState(0)._unsafeUnwrap().on).toBe(true);
      expect(session.currentState(1)._unsafeUnwrap().on).toBe(true);
    });

    it("writes work mode and color temperature for a light", async () => {
      const session = await open(COLOR_LIGHT);

      await session.set(0, { type: "colorTemperature", value: 2000 });

      expect(setFrames(lastSocket())[0]?.msg).toEqual({
        attr: [2, 3],
        data: { "2": 0, "3": 0 },
      });
      expect(session.currentState(0)._unsafeUnwrap().colorTemperature).toBe(
        2000,
      );
    });

    it("returns UNSUPPORTED_INTENT without writing", async () => {
      const session = await open(GANG_SWITCH);

      const result = await session.set(0, { type: "brightness", value: 50 });

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "UNSUPPORTED_INTENT",
        entityIndex: 0,
        missingRole: "brightness",
      });
      expect(setFrames(lastSocket())).toHaveLength(0);
    });

    it("returns INVALID_INTENT for a malformed payload", async () => {
      const session = await open(GANG_SWITCH);

      const result = await session.set(0, { type: "power" });

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_INTENT");
    });

    it("returns UNKNOWN_ENTITY for an index past the end", async () => {
      const session = await open(GANG_SWITCH);

      const result = await session.set(2, { type: "power", on: true });

      expect(result._unsafeUnwrapErr().type).toBe("UNKNOWN_ENTITY");
    });

    it("returns COMMAND_REJECTED when the device answers with an error code", async () => {
      const session = await open({ ...GANG_SWITCH, setResult: 4 });

      const result = await session.set(1, { type: "power", on: true });

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "COMMAND_REJECTED",
        resultCode: 4,
        dpids: [1],
        entityIndex: 1,
      });
      expect(session.rawState()["1"]).toBe(0);
    });

    it("returns REQUEST_TIMEOUT when the acknowledgement never arrives", async () => {
      const session = await open(GANG_SWITCH, { requestTimeoutMs: 30 });
      lastDevice().silent = true;

      const result = await session.set(1, { type: "power", on: true });

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "REQUEST_TIMEOUT",
        command: "set",
        timeoutMs: 30,
        entityIndex: 1,
        dpids: [1],
      });
    });
  });

  // ===========================================================================
  // Inbound State
  // ===========================================================================

  describe("inbound state", () => {
    it("keeps unknown DPIDs in raw state without affecting entities", async () => {
      const session = await open({
        info: { did: "d1", pid: "p1", dtp: "01" },
        attr: [1, 4],
        state: { "1": 255, "4": 300 },
      });
      const before = session.currentState(0)._unsafeUnwrap();

      lastDevice().report({ "99": 7 });

      expect(session.status()).toBe("ready");
      expect(session.rawState()["99"]).toBe(7);
      expect(session.currentState(0)._unsafeUnwrap()).toEqual(before);
    });

    it("emits state changes in wire order", async () => {
      const session = await open(GANG_SWITCH);
      const events: StateChangeEvent[] = [];
      session.on("stateChange", (event) => events.push(event));

      lastSocket().receiveRaw(
        '{"cmd":10,"sn":"a","msg":{"data":{"1":1}}}\r\n' +
          '{"cmd":10,"sn":"b","msg":{"data":{"1":2}}}\r\n',
      );

      expect(events.map((event) => [event.sequenceId, event.changes])).toEqual([
        ["a", { "1": 1 }],
        ["b", { "1": 2 }],
      ]);
      expect(events.map((event) => event.source)).toEqual(["report", "report"]);
      expect(session.rawState()["1"]).toBe(2);
    });

    it("reassembles a frame split across reads", async () => {
      const session = await open(GANG_SWITCH);
      const frame = '{"cmd":10,"sn":"c","msg":{"data":{"1":3}}}\r\n';

      lastSocket().receiveRaw(frame.slice(0, 12));
      expect(session.rawState()["1"]).toBe(0);

      lastSocket().receiveRaw(frame.slice(12));
      expect(session.rawState()["1"]).toBe(3);
    });

    it("reports a malformed line and stays ready", async () => {
      const session = await open(GANG_SWITCH);
      const frameErrors = vi.fn();
      session.on("frameError", frameErrors);

      lastSocket().receiveRaw("not json\r\n");

      expect(frameErrors).toHaveBeenCalledTimes(1);
      expect(session.status()).toBe("ready");
    });

    it("faults on buffer overflow", async () => {
      const session = await open(GANG_SWITCH, { maxFrameBytes: 64 });
      const faults: SessionError[] = [];
      session.on("fault", (error) => faults.push(error));

      lastSocket().receiveRaw("x".repeat(100));

      expect(session.status()).toBe("faulted");
      expect(faults[0]).toMatchObject({
        type: "FAULTED",
        reason: "FRAME_OVERFLOW",
      });
    });

    it("refreshes state with an explicit query", async () => {
      const session = await open(GANG_SWITCH);
      lastDevice().state["1"] = 2;

      const result = await session.refresh();

      expect(result._unsafeUnwrap()).toEqual({ "1": 2 });
      expect(session.currentState(1)._unsafeUnwrap().on).toBe(true);
    });
  });

  // ===========================================================================
  // Liveness
  // ===========================================================================

  describe("keepalive", () => {
    it("faults when the liveness probe goes unanswered", async () => {
      const session = await open(GANG_SWITCH, {
        keepaliveMs: 20,
        probeTimeoutMs: 20,
      });
      const fault = new Promise<SessionError>((resolve) => {
        session.once("fault", resolve);
      });
      lastDevice().silent = true;

      const error = await fault;

      expect(error).toMatchObject({
        type: "FAULTED",
        reason: "KEEPALIVE_TIMEOUT",
        address: "10.0.0.9",
      });
      expect(session.status()).toBe("faulted");
      expect(lastSocket().destroyed).toBe(true);

      const result = await session.set(0, { type: "power", on: true });
      expect(result._unsafeUnwrapErr().type).toBe("FAULTED");
    });

    it("stays ready while probes are answered", async () => {
      const session = await open(GANG_SWITCH, {
        keepaliveMs: 10,
        probeTimeoutMs: 50,
      });

      await vi.waitFor(() => {
        const queries = lastDevice().received.filter((frame) => frame.cmd === 2);
        expect(queries.length).toBeGreaterThanOrEqual(3);
      });

      expect(session.status()).toBe("ready");
    });

    it("emits no state change when an answered probe reports the same state", async () => {
      const session = await open(GANG_SWITCH, {
        keepaliveMs: 10,
        probeTimeoutMs: 50,
      });
      const events: StateChangeEvent[] = [];
      session.on("stateChange", (event) => events.push(event));

      await vi.waitFor(() => {
        const queries = lastDevice().received.filter((frame) => frame.cmd === 2);
        expect(queries.length).toBeGreaterThanOrEqual(4);
      });

      expect(events).toEqual([]);
      expect(session.rawState()).toEqual({ "1": 0 });
    });

    it("emits only the data points a probe response changed", async () => {
      const session = await open(
        { ...GANG_SWITCH, state: { "1": 0, "2": 5 } },
        { keepaliveMs: 10, probeTimeoutMs: 50 },
      );
      const events: StateChangeEvent[] = [];
      session.on("stateChange", (event) => events.push(event));

      lastDevice().state["1"] = 2;
      await vi.waitFor(() => expect(events).toHaveLength(1));

      expect(events[0]).toMatchObject({ source: "query", changes: { "1": 2 } });
    });

    it("faults when the device closes the connection", async () => {
      const session = await open(GANG_SWITCH);

      lastSocket().destroy();

      expect(session.status()).toBe("faulted");
      expect(session.currentState(0).isOk()).toBe(true);
    });
  });

  // ===========================================================================
  // Closing
  // ===========================================================================

  describe("close", () => {
    it("fails pending requests with SESSION_CLOSED and is idempotent", async () => {
      const session = await open(GANG_SWITCH);
      const device = lastDevice();
      device.holdAcks = true;

      const pending = session.set(0, { type: "power", on: true });
      await vi.waitFor(() => expect(device.heldAcks).toHaveLength(1));
      session.close();
      session.close();

      expect((await pending)._unsafeUnwrapErr()).toMatchObject({
        type: "SESSION_CLOSED",
        entityIndex: 0,
        dpids: [1],
      });
      expect(session.status()).toBe("disconnected");
      expect(lastSocket().destroyed).toBe(true);

      const after = await session.set(0, { type: "power", on: false });
      expect(after._unsafeUnwrapErr().type).toBe("SESSION_CLOSED");
    });

    it("ends subscriptions", async () => {
      const session = await open(GANG_SWITCH);
      const iterator = session.subscribe();

      const next = iterator.next();
      lastDevice().report({ "1": 1 });

      expect((await next).value).toMatchObject({
        source: "report",
        changes: { "1": 1 },
      });

      const done = iterator.next();
      session.close();

      expect(await done).toEqual({ done: true, value: undefined });
    });
  });
});
