/**
 * Session Module - Transport
 *
 * Owns the TCP socket of one device: connect, single inbound reader,
 * serialised writes, sequence-id correlation, raw state and keepalive.
 * DeviceSession wraps it once discovery has succeeded.
 */
import { EventEmitter } from "node:events";
import { type Socket, createConnection } from "node:net";

import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import {
  type DataPointMap,
  type FrameDecoder,
  type RequestCommand,
  type WireMessage,
  createFrameDecoder,
  encodeFrame,
  formatCodecError,
  nextSequenceId,
} from "../codec/index.js";
import type { DataPointWrite } from "../translator/index.js";
import {
  type FaultReason,
  type SessionError,
  connectRefused,
  connectTimeout,
  faulted,
  notReady,
  requestTimeout,
  sessionClosed,
  writeError,
} from "./errors.js";
import type {
  ResolvedSessionOptions,
  SessionEvents,
  SessionStatus,
  StateChangeSource,
} from "./schema.js";
import {
  acknowledgedChanges,
  applyDataPoints,
  changedDataPoints,
  composeWrites,
} from "./transform.js";

type Waiter = {
  command: RequestCommand;
  resolve: (result: Result<WireMessage, SessionError>) => void;
  timer: NodeJS.Timeout;
};

const RESPONSE_KIND: Readonly<Record<RequestCommand, WireMessage["kind"]>> = {
  info: "discoveryResponse",
  query: "queryResponse",
  set: "acknowledgement",
};

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

export class SessionTransport extends EventEmitter<SessionEvents> {
  private socket: Socket | null = null;
  private readonly decoder: FrameDecoder;
  private readonly waiters = new Map<string, Waiter>();
  /** Writes of SET requests awaiting acknowledgement, by sequence id */
  private readonly inflight = new Map<string, readonly DataPointWrite[]>();
  private writeChain: Promise<unknown> = Promise.resolve();
  private state: DataPointMap = Object.freeze({});
  private currentStatus: SessionStatus = "disconnected";
  private fault: SessionError | null = null;
  private lastSequenceId: string | null = null;
  private keepaliveTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly options: ResolvedSessionOptions,
    private readonly log: Logger,
  ) {
    super();
    this.decoder = createFrameDecoder({ maxFrameBytes: options.maxFrameBytes });
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  status(): SessionStatus {
    return this.currentStatus;
  }

  rawState(): DataPointMap {
    return this.state;
  }

  lastFault(): SessionError | null {
    return this.fault;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Open the TCP connection. On failure the socket is destroyed and the
   * transport is back in "disconnected".
   */
  async connect(): Promise<Result<void, SessionError>> {
    const { address, port, connectTimeoutMs } = this.options;
    this.setStatus("connecting");
    this.log.debug({ port, connectTimeoutMs }, "Connecting");

    const connected = await new Promise<Result<Socket, SessionError>>(
      (resolve) => {
        const socket = createConnection({ host: address, port });

        const cleanup = (): void => {
          clearTimeout(timer);
          socket.off("connect", onConnect);
          socket.off("error", onError);
        };
        const onConnect = (): void => {
          cleanup();
          resolve(ok(socket));
        };
        const onError = (error: Error): void => {
          cleanup();
          socket.destroy();
          const code = errorCode(error);
          resolve(
            err(
              code === "ETIMEDOUT"
                ? connectTimeout(address, port, connectTimeoutMs)
                : connectRefused(address, port, error, code),
            ),
          );
        };
        const timer = setTimeout(() => {
          cleanup();
          socket.destroy();
          resolve(err(connectTimeout(address, port, connectTimeoutMs)));
        }, connectTimeoutMs);

        socket.once("connect", onConnect);
        socket.once("error", onError);
      },
    );

    if (connected.isErr()) {
      this.setStatus("disconnected");
      return err(connected.error);
    }

    this.attach(connected.value);
    this.setStatus("discovering");
    return ok(undefined);
  }

  /**
   * Enter "ready" and start the keepalive timer.
   */
  markReady(): void {
    if (this.currentStatus !== "discovering") return;
    this.setStatus("ready");
    this.scheduleKeepalive();
  }

  /**
   * Stop timers, fail waiters with SESSION_CLOSED and destroy the socket.
   * Idempotent.
   */
  close(): void {
    if (
      this.currentStatus === "disconnected" ||
      this.currentStatus === "closing"
    ) {
      return;
    }
    this.setStatus("closing");
    this.stopKeepalive();
    this.drainWaiters(sessionClosed());
    this.destroySocket();
    this.setStatus("disconnected");
  }

  // ===========================================================================
  // Requests
  // ===========================================================================

  /**
   * Send one request and wait for the response with the same sequence id.
   * The waiter is registered before the frame is written.
   */
  request(
    command: RequestCommand,
    timeoutMs: number,
  ): Promise<Result<WireMessage, SessionError>> {
    return this.dispatch(command, timeoutMs, {}, []);
  }

  /**
   * Compose and send a SET for `writes`. Masked writes are resolved against
   * the raw state and other in-flight writes at this moment.
   */
  write(
    writes: readonly DataPointWrite[],
    timeoutMs: number,
  ): Promise<Result<WireMessage, SessionError>> {
    const pending = Array.from(this.inflight.values()).flat();
    const data = composeWrites(writes, this.state, pending);
    return this.dispatch("set", timeoutMs, data, writes);
  }

  private dispatch(
    command: RequestCommand,
    timeoutMs: number,
    data: DataPointMap,
    writes: readonly DataPointWrite[],
  ): Promise<Result<WireMessage, SessionError>> {
    const blocked = this.requestBlocker();
    const socket = this.socket;
    if (blocked || !socket) {
      return Promise.resolve(err(blocked ?? sessionClosed()));
    }

    const sequenceId = nextSequenceId(this.lastSequenceId, Date.now());
    this.lastSequenceId = sequenceId;
    const frame = encodeFrame(command, sequenceId, data);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.settle(
          sequenceId,
          err(requestTimeout(sequenceId, command, timeoutMs)),
        );
      }, timeoutMs);

      this.waiters.set(sequenceId, { command, resolve, timer });
      if (writes.length > 0) this.inflight.set(sequenceId, writes);

      this.log.debug({ sequenceId, command, data }, "Sending request");

      void this.enqueueWrite(socket, sequenceId, frame).then((written) => {
        if (written.isErr()) this.settle(sequenceId, err(written.error));
      });
    });
  }

  private requestBlocker(): SessionError | null {
    switch (this.currentStatus) {
      case "discovering":
      case "ready":
        return null;
      case "faulted":
        return this.fault ?? sessionClosed();
      case "connecting":
        return notReady(this.currentStatus);
      case "closing":
      case "disconnected":
        return sessionClosed();
    }
  }

  private settle(
    sequenceId: string,
    result: Result<WireMessage, SessionError>,
  ): void {
    const waiter = this.waiters.get(sequenceId);
    if (!waiter) return;
    this.waiters.delete(sequenceId);
    this.inflight.delete(sequenceId);
    clearTimeout(waiter.timer);
    waiter.resolve(result);
  }

  private drainWaiters(error: SessionError): void {
    const sequenceIds = Array.from(this.waiters.keys());
    for (const sequenceId of sequenceIds) {
      this.settle(sequenceId, err(error));
    }
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  private enqueueWrite(
    socket: Socket,
    sequenceId: string,
    frame: Buffer,
  ): Promise<Result<void, SessionError>> {
    const next = this.writeChain.then(() =>
      this.writeFrame(socket, sequenceId, frame),
    );
    this.writeChain = next;
    return next;
  }

  private writeFrame(
    socket: Socket,
    sequenceId: string,
    frame: Buffer,
  ): Promise<Result<void, SessionError>> {
    if (socket.destroyed) {
      return Promise.resolve(err(writeError(sequenceId, "Socket is closed")));
    }

    const { writeTimeoutMs } = this.options;
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        resolve(
          err(
            writeError(
              sequenceId,
              `Frame not flushed within ${writeTimeoutMs}ms`,
            ),
          ),
        );
      }, writeTimeoutMs);

      socket.write(frame, (error?: Error | null) => {
        clearTimeout(timer);
        resolve(
          error ? err(writeError(sequenceId, error.message, error)) : ok(undefined),
        );
      });
    });
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  private attach(socket: Socket): void {
    this.socket = socket;
    socket.on("data", (chunk: Buffer) => this.handleData(chunk));
    socket.on("error", (error: Error) => {
      this.enterFault("SOCKET_ERROR", error.message, error);
    });
    socket.on("close", () => {
      this.enterFault("SOCKET_CLOSED", "Device closed the connection");
    });
  }

  private handleData(chunk: Buffer): void {
    if (this.socket === null) return;
    this.scheduleKeepalive();

    for (const result of this.decoder.push(chunk)) {
      if (result.isErr()) {
        this.log.warn(
          { bufferedBytes: result.error.bufferedBytes },
          formatCodecError(result.error),
        );
        this.emit("frameError", result.error);
        if (result.error.reason === "OVERFLOW") {
          this.enterFault("FRAME_OVERFLOW", result.error.message);
          return;
        }
        continue;
      }
      this.handleMessage(result.value);
    }
  }

  private handleMessage(message: WireMessage): void {
    const waiter = this.waiters.get(message.sequenceId);
    const matched =
      waiter !== undefined && RESPONSE_KIND[waiter.command] === message.kind;

    switch (message.kind) {
      case "queryResponse":
        this.applyChanges("query", message.sequenceId, message.data);
        break;
      case "stateReport":
        this.applyChanges("report", message.sequenceId, message.data);
        break;
      case "acknowledgement": {
        const writes = matched ? this.inflight.get(message.sequenceId) : undefined;
        if (writes === undefined) {
          this.applyChanges("acknowledgement", message.sequenceId, message.data);
        } else if (message.resultCode === 0) {
          this.applyChanges(
            "acknowledgement",
            message.sequenceId,
            acknowledgedChanges(writes, this.state),
          );
        }
        break;
      }
      case "discoveryResponse":
        break;
    }

    if (matched) {
      this.settle(message.sequenceId, ok(message));
    } else if (message.kind !== "stateReport") {
      this.log.debug(
        { sequenceId: message.sequenceId, kind: message.kind },
        "Response without a pending request",
      );
    }
  }

  private applyChanges(
    source: StateChangeSource,
    sequenceId: string,
    incoming: DataPointMap,
  ): void {
    const changes = changedDataPoints(this.state, incoming);
    if (Object.keys(changes).length === 0) return;
    this.state = applyDataPoints(this.state, changes);
    this.emit("stateChange", {
      source,
      sequenceId,
      changes,
      state: this.state,
      timestamp: Date.now(),
    });
  }

  // ===========================================================================
  // Keepalive & Faults
  // ===========================================================================

  private scheduleKeepalive(): void {
    this.stopKeepalive();
    if (this.currentStatus !== "ready" || this.options.keepaliveMs <= 0) return;
    this.keepaliveTimer = setTimeout(() => {
      this.keepaliveTimer = null;
      void this.probe();
    }, this.options.keepaliveMs);
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearTimeout(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  private async probe(): Promise<void> {
    if (this.currentStatus !== "ready") return;
    const { probeTimeoutMs } = this.options;
    this.log.debug({ probeTimeoutMs }, "Idle, sending liveness probe");

    const result = await this.request("query", probeTimeoutMs);
    if (result.isOk()) return;

    const error = result.error;
    switch (error.type) {
      case "REQUEST_TIMEOUT":
        this.enterFault(
          "KEEPALIVE_TIMEOUT",
          `No response to liveness probe within ${probeTimeoutMs}ms`,
        );
        break;
      case "WRITE_ERROR":
        this.enterFault("SOCKET_ERROR", error.message, error.cause);
        break;
      default:
        break;
    }
  }

  private enterFault(reason: FaultReason, message: string, cause?: Error): void {
    if (
      this.currentStatus === "faulted" ||
      this.currentStatus === "closing" ||
      this.currentStatus === "disconnected"
    ) {
      return;
    }

    const error = faulted(this.options.address, reason, message, cause);
    this.fault = error;
    this.log.error({ reason }, `Session faulted: ${message}`);

    this.stopKeepalive();
    this.setStatus("faulted");
    this.drainWaiters(error);
    this.destroySocket();
    this.emit("fault", error);
  }

  private destroySocket(): void {
    const socket = this.socket;
    this.socket = null;
    this.decoder.reset();
    if (socket && !socket.destroyed) socket.destroy();
  }

  private setStatus(next: SessionStatus): void {
    const previous = this.currentStatus;
    if (previous === next) return;
    this.currentStatus = next;
    this.log.debug({ from: previous, to: next }, "Status changed");
    this.emit("statusChange", { from: previous, to: next });
  }
}
