/**
 * SSE Module - Schemas and Types
 *
 * Event types pushed to bridge clients over Server-Sent Events.
 */
import type {
  DeviceIdentity,
  EntityState,
  SessionStatus,
  StateChangeSource,
} from "../session/index.js";
import type { SupervisorPhase } from "../supervisor/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * Raw state changed; carries the re-derived state of every entity.
 */
export type StateChangeSseEvent = Readonly<{
  type: "state_change";
  deviceId: string;
  source: StateChangeSource;
  sequenceId: string;
  changes: Readonly<Record<string, number>>;
  entities: readonly EntityState[];
}>;

/**
 * Session or supervisor status changed.
 */
export type DeviceStatusEvent = Readonly<{
  type: "device_status";
  deviceId: string | null;
  status: SessionStatus | null;
  phase: SupervisorPhase;
}>;

/**
 * The session faulted and will be reopened.
 */
export type DeviceFaultEvent = Readonly<{
  type: "device_fault";
  deviceId: string | null;
  error: string;
}>;

/**
 * Full snapshot, sent when a session opens.
 */
export type DeviceSnapshotEvent = Readonly<{
  type: "device_snapshot";
  identity: DeviceIdentity;
  entities: readonly EntityState[];
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent =
  | StateChangeSseEvent
  | DeviceStatusEvent
  | DeviceFaultEvent
  | DeviceSnapshotEvent;
