/**
 * Session Module - Service Layer
 *
 * openSession() connects, discovers and classifies one device and hands
 * back a ready DeviceSession. The core never reconnects by itself: a
 * faulted session must be closed and reopened by the caller.
 */
import { EventEmitter } from "node:events";

import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import {
  type CapabilityModel,
  type EntityDescriptor,
  inferCapabilities,
} from "../capabilities/index.js";
import type { DataPointMap } from "../codec/index.js";
import {
  type DeviceIdentity,
  type DiscoveryResult,
  assumedDiscovery,
  runDiscovery,
} from "../discovery/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type EntityState,
  deriveEntityState,
  findEntity,
  intentToWrites,
  parseIntent,
} from "../translator/index.js";
import {
  type SessionError,
  commandRejected,
  formatSessionError,
  invalidOptions,
  notReady,
  sessionClosed,
  withCommandTarget,
} from "./errors.js";
import {
  type ResolvedSessionOptions,
  type SessionEvents,
  type SessionOptions,
  SessionOptionsSchema,
  type SessionStatus,
  type StateChangeEvent,
} from "./schema.js";
import { Subscription } from "./subscription.js";
import { SessionTransport } from "./transport.js";
import { writtenDpids } from "./transform.js";

const log = createLogger("session");

// =============================================================================
// Device Session
// =============================================================================

/**
 * A ready connection to one device. Identity, capabilities and entities are
 * fixed for the lifetime of the session.
 */
export class DeviceSession extends EventEmitter<SessionEvents> {
  private readonly subscriptions = new Set<Subscription>();

  constructor(
    private readonly transport: SessionTransport,
    private readonly discovery: DiscoveryResult,
    private readonly model: CapabilityModel,
    private readonly entityList: readonly EntityDescriptor[],
    private readonly options: ResolvedSessionOptions,
  ) {
    super();
    transport.on("stateChange", (event) => {
      for (const subscription of this.subscriptions) subscription.push(event);
      this.emit("stateChange", event);
    });
    transport.on("statusChange", (event) => this.emit("statusChange", event));
    transport.on("fault", (error) => this.emit("fault", error));
    transport.on("frameError", (error) => this.emit("frameError", error));
  }

  identity(): DeviceIdentity {
    return this.discovery.identity;
  }

  capabilities(): CapabilityModel {
    return this.model;
  }

  entities(): readonly EntityDescriptor[] {
    return this.entityList;
  }

  status(): SessionStatus {
    return this.transport.status();
  }

  /**
   * Frozen snapshot of the latest raw value per DPID, unknown DPIDs included.
   */
  rawState(): DataPointMap {
    return this.transport.rawState();
  }

  /**
   * High-level state of one entity, derived from the latest raw state.
   */
  currentState(entityIndex: number): Result<EntityState, SessionError> {
    const entity = findEntity(this.entityList, entityIndex);
    if (entity.isErr()) return err(entity.error);
    return ok(deriveEntityState(entity.value, this.model, this.rawState()));
  }

  /**
   * Current state of every entity, in entity order.
   */
  currentStates(): EntityState[] {
    const raw = this.rawState();
    return this.entityList.map((entity) =>
      deriveEntityState(entity, this.model, raw),
    );
  }

  /**
   * Apply an intent to one entity. Resolves once the device acknowledged
   * the write.
   */
  async set(
    entityIndex: number,
    intent: unknown,
  ): Promise<Result<void, SessionError>> {
    const blocked = this.readiness();
    if (blocked) return err(blocked);

    const parsed = parseIntent(intent);
    if (parsed.isErr()) return err(parsed.error);

    const entity = findEntity(this.entityList, entityIndex);
    if (entity.isErr()) return err(entity.error);

    const writes = intentToWrites(entity.value, this.model, parsed.value);
    if (writes.isErr()) return err(writes.error);

    const response = await this.transport.write(
      writes.value,
      this.options.requestTimeoutMs,
    );
    if (response.isErr()) {
      const error = withCommandTarget(
        response.error,
        entityIndex,
        writtenDpids(writes.value),
      );
      log.warn(
        { entityIndex, intent: parsed.value.type },
        formatSessionError(error),
      );
      return err(error);
    }

    if (response.value.resultCode !== 0) {
      return err(
        commandRejected(
          response.value.sequenceId,
          response.value.resultCode,
          writtenDpids(writes.value),
          entityIndex,
        ),
      );
    }

    return ok(undefined);
  }

  /**
   * Explicit QUERY round trip. Returns the raw state after the response has
   * been applied.
   */
  async refresh(): Promise<Result<DataPointMap, SessionError>> {
    const blocked = this.readiness();
    if (blocked) return err(blocked);

    const response = await this.transport.request(
      "query",
      this.options.requestTimeoutMs,
    );
    if (response.isErr()) return err(response.error);

    if (response.value.resultCode !== 0) {
      return err(
        commandRejected(response.value.sequenceId, response.value.resultCode, []),
      );
    }
    return ok(this.rawState());
  }

  /**
   * State changes in wire order, from the first `next()` call until the
   * session closes.
   */
  async *subscribe(): AsyncGenerator<StateChangeEvent, void, undefined> {
    if (this.status() === "disconnected") return;

    const subscription = new Subscription();
    this.subscriptions.add(subscription);
    try {
      for (;;) {
        const event = await subscription.next();
        if (event === null) return;
        yield event;
      }
    } finally {
      this.subscriptions.delete(subscription);
    }
  }

  /**
   * Close the session. Pending requests fail with SESSION_CLOSED and every
   * subscription ends. Idempotent.
   */
  close(): void {
    if (this.status() === "disconnected") return;
    this.transport.close();
    for (const subscription of this.subscriptions) subscription.end();
    this.subscriptions.clear();
    log.info(
      { address: this.options.address, deviceId: this.discovery.identity.deviceId },
      "Session closed",
    );
  }

  private readiness(): SessionError | null {
    const status = this.status();
    switch (status) {
      case "ready":
        return null;
      case "faulted":
        return this.transport.lastFault() ?? sessionClosed();
      case "closing":
      case "disconnected":
        return sessionClosed();
      default:
        return notReady(status);
    }
  }
}

// =============================================================================
// Open
// =============================================================================

function validateOptions(
  options: SessionOptions,
): Result<ResolvedSessionOptions, SessionError> {
  const parsed = SessionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    return err(
      invalidOptions(
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
        ),
      ),
    );
  }
  return ok(parsed.data);
}

async function identify(
  transport: SessionTransport,
  options: ResolvedSessionOptions,
  sessionLog: Logger,
): Promise<Result<DiscoveryResult, SessionError>> {
  if (options.skipValidation && options.assumed) {
    sessionLog.warn(
      { productId: options.assumed.productId },
      "Skipping discovery, using assumed identity",
    );
    return ok(assumedDiscovery(options.assumed, options.address));
  }
  return runDiscovery(
    { request: (command, timeoutMs) => transport.request(command, timeoutMs) },
    options.requestTimeoutMs,
    sessionLog,
  );
}

/**
 * Connect to a device, run discovery (or apply the assumed identity) and
 * infer its capabilities.
 *
 * On any failure the socket is destroyed and nothing is left running.
 *
 * @example
 * const result = await openSession({ address: "192.168.1.50" });
 * if (result.isOk()) {
 *   await result.value.set(0, { type: "power", on: true });
 * }
 */
export async function openSession(
  options: SessionOptions,
): Promise<Result<DeviceSession, SessionError>> {
  const validated = validateOptions(options);
  if (validated.isErr()) return err(validated.error);
  const resolved = validated.value;

  const sessionLog = log.child({ address: resolved.address });
  const startTime = Date.now();
  logOperationStart(sessionLog, "openSession", { port: resolved.port });

  const transport = new SessionTransport(resolved, sessionLog);

  const connected = await transport.connect();
  if (connected.isErr()) {
    logOperationFailed(sessionLog, "openSession", formatSessionError(connected.error));
    return err(connected.error);
  }

  const discovered = await identify(transport, resolved, sessionLog);
  if (discovered.isErr()) {
    transport.close();
    logOperationFailed(sessionLog, "openSession", formatSessionError(discovered.error));
    return err(discovered.error);
  }

  const { identity, dpids } = discovered.value;
  const { model, entities } = inferCapabilities(
    {
      deviceId: identity.deviceId,
      productId: identity.productId,
      deviceType: identity.deviceType,
      dpids,
    },
    { gangCount: resolved.gangCount },
  );

  if (model.diagnostics.length > 0) {
    sessionLog.info(
      { diagnostics: model.diagnostics, unknownDpids: model.unknownDpids },
      "Capability diagnostics",
    );
  }

  const session = new DeviceSession(
    transport,
    discovered.value,
    model,
    entities,
    resolved,
  );
  transport.markReady();

  if (session.status() !== "ready") {
    const error = transport.lastFault() ?? sessionClosed();
    session.close();
    return err(error);
  }

  logOperationComplete(sessionLog, "openSession", startTime, {
    deviceId: identity.deviceId,
    classification: model.classification,
    entities: entities.length,
  });

  return ok(session);
}
