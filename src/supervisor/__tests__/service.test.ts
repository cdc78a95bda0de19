/**
 * Supervisor Service Tests
 *
 * Drives the reconnect loop against the in-process fake device.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("node:net", async () => {
  const { mockNetwork } = await import("../../session/__tests__/fake-device.js");
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
  mockNetwork,
} from "../../session/__tests__/fake-device.js";
// Import after mocks
import {
  getActiveSession,
  getSupervisorState,
  startSupervisor,
  stopSupervisor,
} from "../service.js";

const OPTIONS = {
  session: {
    address: "10.0.0.9",
    connectTimeoutMs: 200,
    requestTimeoutMs: 200,
    keepaliveMs: 0,
  },
  baseDelayMs: 10,
  maxDelayMs: 40,
};

function answerAsSwitch(): void {
  mockNetwork.onSocket = (socket) => {
    new FakeDevice(socket, {
      info: { did: "sw1", pid: "p2g", dtp: "00" },
      attr: [1],
      state: { "1": 0 },
    });
  };
}

describe("Supervisor Service", () => {
  beforeEach(() => {
    mockNetwork.reset();
  });

  afterEach(() => {
    if (getSupervisorState().isRunning) stopSupervisor();
  });

  it("opens a session and reports it", async () => {
    answerAsSwitch();
    const onConnected = vi.fn();

    startSupervisor(OPTIONS, { onConnected });

    await vi.waitFor(() => expect(getSupervisorState().phase).toBe("connected"));
    expect(onConnected).toHaveBeenCalledTimes(1);
    expect(getActiveSession()?.identity().deviceId).toBe("sw1");
    expect(getSupervisorState().failures).toBe(0);
  });

  it("retries failed opens until the device answers", async () => {
    mockNetwork.outcome = "refuse";

    startSupervisor(OPTIONS);

    await vi.waitFor(() => expect(mockNetwork.sockets.length).toBeGreaterThanOrEqual(3));
    expect(getSupervisorState().failures).toBeGreaterThanOrEqual(2);
    expect(getSupervisorState().lastError).toContain("ECONNREFUSED");
    expect(getActiveSession()).toBeNull();

    mockNetwork.outcome = "connect";
    answerAsSwitch();

    await vi.waitFor(() => expect(getSupervisorState().phase).toBe("connected"));
    expect(getSupervisorState().failures).toBe(0);
    expect(getSupervisorState().lastError).toBeNull();
  });

  it("closes a faulted session and opens a new one", async () => {
    answerAsSwitch();
    const onDisconnected = vi.fn();
    const onConnected = vi.fn();
    startSupervisor(OPTIONS, { onConnected, onDisconnected });
    await vi.waitFor(() => expect(onConnected).toHaveBeenCalledTimes(1));
    const first = getActiveSession();

    mockNetwork.sockets[0]?.destroy();

    expect(onDisconnected).toHaveBeenCalledWith(
      expect.objectContaining({ type: "FAULTED", reason: "SOCKET_CLOSED" }),
    );
    expect(first?.status()).toBe("disconnected");
    expect(getSupervisorState().phase).toBe("backoff");

    await vi.waitFor(() => expect(onConnected).toHaveBeenCalledTimes(2));
    expect(getActiveSession()).not.toBe(first);
    expect(mockNetwork.sockets).toHaveLength(2);
  });

  it("stops retrying and closes the session on stop", async () => {
    answerAsSwitch();
    startSupervisor(OPTIONS);
    await vi.waitFor(() => expect(getSupervisorState().phase).toBe("connected"));
    const session = getActiveSession();

    stopSupervisor();

    expect(session?.status()).toBe("disconnected");
    expect(getActiveSession()).toBeNull();
    expect(getSupervisorState()).toMatchObject({
      phase: "stopped",
      isRunning: false,
    });

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(mockNetwork.sockets).toHaveLength(1);
  });
});
