/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting of device state to bridge clients.
 */
import { createLogger } from "../logger.js";
import type {
  DeviceIdentity,
  EntityState,
  SessionStatus,
  StateChangeEvent,
} from "../session/index.js";
import type { SupervisorPhase } from "../supervisor/index.js";
import type { SseEvent } from "./schema.js";

const log = createLogger("sse");

const encoder = new TextEncoder();

function encodeEvent(name: string, payload: unknown): Uint8Array {
  return encoder.encode(`event: ${name}\ndata: ${JSON.stringify(payload)}\n\n`);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Client Management
// =============================================================================

/** Open streams by client ID */
const clients = new Map<number, ReadableStreamDefaultController<Uint8Array>>();
let nextClientId = 1;

export function getClientCount(): number {
  return clients.size;
}

/**
 * Enqueue on one client; drops the client when its stream is gone.
 */
function enqueue(clientId: number, data: Uint8Array): boolean {
  const controller = clients.get(clientId);
  if (!controller) return false;

  try {
    controller.enqueue(data);
    return true;
  } catch (error) {
    clients.delete(clientId);
    log.debug({ clientId, error: describe(error) }, "Dropping closed client");
    return false;
  }
}

/**
 * Create a new SSE stream for a client. `initial` events are queued right
 * after the `connected` confirmation.
 */
export function createSseStream(initial: readonly SseEvent[] = []): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      clients.set(clientId, controller);
      log.info({ clientId, totalClients: clients.size }, "SSE client connected");

      controller.enqueue(encodeEvent("connected", { clientId }));
      for (const event of initial) {
        controller.enqueue(encodeEvent(event.type, event));
      }
    },
    cancel() {
      if (clients.delete(clientId)) {
        log.info(
          { clientId, remainingClients: clients.size },
          "SSE client disconnected",
        );
      }
    },
  });

  return { stream, clientId };
}

export function removeClient(clientId: number): void {
  if (clients.delete(clientId)) {
    log.debug({ clientId }, "SSE client removed");
  }
}

// =============================================================================
// Event Broadcasting
// =============================================================================

/**
 * Broadcast an event to all connected clients.
 */
export function broadcast(event: SseEvent): void {
  if (clients.size === 0) {
    log.debug({ eventType: event.type }, "No clients to broadcast to");
    return;
  }

  const data = encodeEvent(event.type, event);
  let sent = 0;
  for (const clientId of Array.from(clients.keys())) {
    if (enqueue(clientId, data)) sent++;
  }

  log.debug({ eventType: event.type, clients: sent }, "Event broadcasted");
}

/**
 * Broadcast a raw state change with the re-derived entity states.
 */
export function broadcastStateChange(
  deviceId: string,
  event: StateChangeEvent,
  entities: readonly EntityState[],
): void {
  broadcast({
    type: "state_change",
    deviceId,
    source: event.source,
    sequenceId: event.sequenceId,
    changes: event.changes,
    entities,
  });
}

export function broadcastDeviceStatus(
  deviceId: string | null,
  status: SessionStatus | null,
  phase: SupervisorPhase,
): void {
  broadcast({ type: "device_status", deviceId, status, phase });
}

export function broadcastDeviceFault(deviceId: string | null, error: string): void {
  broadcast({ type: "device_fault", deviceId, error });
}

export function broadcastSnapshot(
  identity: DeviceIdentity,
  entities: readonly EntityState[],
): void {
  broadcast({ type: "device_snapshot", identity, entities });
}

/**
 * Send event to a specific client.
 */
export function sendToClient(clientId: number, event: SseEvent): boolean {
  return enqueue(clientId, encodeEvent(event.type, event));
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * Close every stream (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.size }, "Disconnecting all SSE clients...");

  for (const [clientId, controller] of clients) {
    try {
      controller.close();
    } catch (error) {
      log.debug({ clientId, error: describe(error) }, "Stream already closed");
    }
  }

  clients.clear();
}
