/**
 * Session Module - Public API
 *
 * Entry point of the device driver: open a session, read identity,
 * capabilities and entities, send intents, observe state.
 */

// Types
export type {
  ResolvedSessionOptions,
  SessionEvents,
  SessionOptions,
  SessionStatus,
  StateChangeEvent,
  StateChangeSource,
  StatusChangeEvent,
} from "./schema.js";
export type { CommandTarget, FaultReason, SessionError } from "./errors.js";
export type { DeviceIdentity } from "../discovery/index.js";
export type {
  CapabilityModel,
  EntityDescriptor,
} from "../capabilities/index.js";
export type { EntityState, Intent, IntentInput } from "../translator/index.js";

// Schemas and constants
export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_KEEPALIVE_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_WRITE_TIMEOUT_MS,
  SessionOptionsSchema,
} from "./schema.js";

// Error utilities
export { formatSessionError } from "./errors.js";

// Service
export { DeviceSession, openSession } from "./service.js";
