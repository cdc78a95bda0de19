/**
 * API routes for the CozyLife Local bridge.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/device - Identity and capabilities of the supervised device
 * - /api/entities/* - Entity listing, state and commands
 * - /api/refresh - Explicit state query
 * - /api/events - SSE stream for real-time updates
 */
import { Hono } from "hono";

import { createLogger } from "../logger.js";
import { type SessionError, formatSessionError } from "../session/index.js";
import { type SseEvent, createSseStream, getClientCount } from "../sse/index.js";
import { getActiveSession, getSupervisorState } from "../supervisor/index.js";

const log = createLogger("api");

const VERSION = "1.0.0";

export const routes = new Hono();

// =============================================================================
// Helpers
// =============================================================================

type ErrorStatus = 400 | 404 | 422 | 500 | 502 | 503 | 504;

/**
 * HTTP status for a session-level error.
 */
export function httpStatusFor(error: SessionError): ErrorStatus {
  switch (error.type) {
    case "INVALID_INTENT":
    case "INVALID_OPTIONS":
      return 400;
    case "UNKNOWN_ENTITY":
      return 404;
    case "UNSUPPORTED_INTENT":
      return 422;
    case "COMMAND_REJECTED":
    case "MALFORMED_FRAME":
    case "DISCOVERY_REJECTED":
      return 502;
    case "REQUEST_TIMEOUT":
    case "CONNECT_TIMEOUT":
    case "DISCOVERY_TIMEOUT":
      return 504;
    case "FAULTED":
    case "SESSION_CLOSED":
    case "NOT_READY":
    case "CONNECT_REFUSED":
      return 503;
    case "WRITE_ERROR":
      return 500;
  }
}

function parseIndex(raw: string): number | null {
  const index = Number(raw);
  return Number.isInteger(index) && index >= 0 ? index : null;
}

function notConnected(requestId: string) {
  const supervisor = getSupervisorState();
  return {
    error: "Device not connected",
    phase: supervisor.phase,
    lastError: supervisor.lastError,
    requestId,
  };
}

// =============================================================================
// Health Check
// =============================================================================

/**
 * Health endpoint - returns bridge and session status.
 */
routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  const session = getActiveSession();
  const supervisor = getSupervisorState();

  return c.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    requestId,
    version: VERSION,
    device: {
      phase: supervisor.phase,
      status: session?.status() ?? null,
      deviceId: session?.identity().deviceId ?? null,
      failures: supervisor.failures,
      lastError: supervisor.lastError,
    },
    sseClients: getClientCount(),
  });
});

// =============================================================================
// Device
// =============================================================================

/**
 * Identity, capability model and entity descriptors.
 */
routes.get("/api/device", (c) => {
  const requestId = c.get("requestId");
  const session = getActiveSession();
  if (!session) return c.json(notConnected(requestId), 503);

  return c.json({
    identity: session.identity(),
    status: session.status(),
    capabilities: session.capabilities(),
    entities: session.entities(),
    requestId,
  });
});

// =============================================================================
// Entities
// =============================================================================

routes.get("/api/entities", (c) => {
  const requestId = c.get("requestId");
  const session = getActiveSession();
  if (!session) return c.json(notConnected(requestId), 503);

  const states = session.currentStates();
  return c.json({
    entities: session.entities().map((entity) => ({
      ...entity,
      state: states.find((state) => state.index === entity.index) ?? null,
    })),
    requestId,
  });
});

routes.get("/api/entities/:index/state", (c) => {
  const requestId = c.get("requestId");
  const session = getActiveSession();
  if (!session) return c.json(notConnected(requestId), 503);

  const index = parseIndex(c.req.param("index"));
  if (index === null) {
    return c.json({ error: "Entity index must be a non-negative integer", requestId }, 400);
  }

  const state = session.currentState(index);
  if (state.isErr()) {
    return c.json(
      { error: formatSessionError(state.error), requestId },
      httpStatusFor(state.error),
    );
  }

  return c.json({ state: state.value, requestId });
});

/**
 * Apply an intent to one entity. Body: `{ "type": "power", "on": true }`,
 * `{ "type": "brightness", "value": 50 }`, ...
 */
routes.post("/api/entities/:index", async (c) => {
  const requestId = c.get("requestId");
  const session = getActiveSession();
  if (!session) return c.json({ success: false, ...notConnected(requestId) }, 503);

  const index = parseIndex(c.req.param("index"));
  if (index === null) {
    return c.json(
      { success: false, error: "Entity index must be a non-negative integer", requestId },
      400,
    );
  }

  let intent: unknown;
  try {
    intent = await c.req.json();
  } catch {
    return c.json({ success: false, error: "Request body must be JSON", requestId }, 400);
  }

  log.info({ requestId, index, intent }, "POST /api/entities/:index");

  const result = await session.set(index, intent);
  if (result.isErr()) {
    const message = formatSessionError(result.error);
    log.warn({ requestId, index, error: message }, "Command failed");
    return c.json(
      { success: false, error: message, errorType: result.error.type, requestId },
      httpStatusFor(result.error),
    );
  }

  const state = session.currentState(index);
  return c.json({
    success: true,
    state: state.isOk() ? state.value : null,
    requestId,
  });
});

// =============================================================================
// Refresh
// =============================================================================

/**
 * Query the device and return the refreshed state.
 */
routes.post("/api/refresh", async (c) => {
  const requestId = c.get("requestId");
  const session = getActiveSession();
  if (!session) return c.json({ success: false, ...notConnected(requestId) }, 503);

  const result = await session.refresh();
  if (result.isErr()) {
    const message = formatSessionError(result.error);
    log.warn({ requestId, error: message }, "Refresh failed");
    return c.json(
      { success: false, error: message, requestId },
      httpStatusFor(result.error),
    );
  }

  return c.json({
    success: true,
    raw: result.value,
    entities: session.currentStates(),
    requestId,
  });
});

// =============================================================================
// Server-Sent Events Stream
// =============================================================================

/**
 * SSE endpoint for real-time updates. New clients get the current status
 * and, when a session is open, a full snapshot.
 */
routes.get("/api/events", (c) => {
  const requestId = c.get("requestId");
  const session = getActiveSession();
  const supervisor = getSupervisorState();

  const initial: SseEvent[] = [
    {
      type: "device_status",
      deviceId: session?.identity().deviceId ?? null,
      status: session?.status() ?? null,
      phase: supervisor.phase,
    },
  ];
  if (session) {
    initial.push({
      type: "device_snapshot",
      identity: session.identity(),
      entities: session.currentStates(),
    });
  }

  const { stream, clientId } = createSseStream(initial);
  log.info({ requestId, clientId }, "SSE client connected");

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
});
