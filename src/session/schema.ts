/**
 * Session Module - Schemas and Types
 *
 * Options, lifecycle states and events of one device session.
 */
import { z } from "zod";

import {
  COZYLIFE_PORT,
  type CodecError,
  type DataPointMap,
  DEFAULT_MAX_FRAME_BYTES,
} from "../codec/index.js";
import { AssumedDeviceSchema } from "../discovery/schema.js";
import type { SessionError } from "./errors.js";

// =============================================================================
// Options
// =============================================================================

export const DEFAULT_CONNECT_TIMEOUT_MS = 3000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 3000;
export const DEFAULT_WRITE_TIMEOUT_MS = 2000;
export const DEFAULT_KEEPALIVE_MS = 30000;
export const DEFAULT_PROBE_TIMEOUT_MS = 3000;

export const SessionOptionsSchema = z
  .object({
    address: z.string().trim().min(1),
    port: z.number().int().min(1).max(65535).default(COZYLIFE_PORT),
    connectTimeoutMs: z.number().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
    requestTimeoutMs: z.number().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
    writeTimeoutMs: z.number().positive().default(DEFAULT_WRITE_TIMEOUT_MS),
    /** Idle window before a liveness probe; 0 disables keepalive */
    keepaliveMs: z.number().min(0).default(DEFAULT_KEEPALIVE_MS),
    probeTimeoutMs: z.number().positive().default(DEFAULT_PROBE_TIMEOUT_MS),
    maxFrameBytes: z.number().int().positive().default(DEFAULT_MAX_FRAME_BYTES),
    gangCount: z.number().int().min(1).max(8).optional(),
    skipValidation: z.boolean().default(false),
    assumed: AssumedDeviceSchema.optional(),
  })
  .refine((options) => !options.skipValidation || options.assumed !== undefined, {
    message: "skipValidation requires an assumed device",
    path: ["assumed"],
  });

/** Options as a caller writes them (defaults optional). */
export type SessionOptions = z.input<typeof SessionOptionsSchema>;
/** Options with defaults applied. */
export type ResolvedSessionOptions = z.output<typeof SessionOptionsSchema>;

// =============================================================================
// Lifecycle
// =============================================================================

export type SessionStatus =
  | "disconnected"
  | "connecting"
  | "discovering"
  | "ready"
  | "closing"
  | "faulted";

// =============================================================================
// Events
// =============================================================================

export type StateChangeSource = "report" | "query" | "acknowledgement";

/**
 * One applied batch of data point updates, in wire order.
 */
export type StateChangeEvent = Readonly<{
  source: StateChangeSource;
  /** Sequence id of the frame that carried the update */
  sequenceId: string;
  /** DPIDs whose values were carried by the frame */
  changes: DataPointMap;
  /** Full raw state after applying the changes */
  state: DataPointMap;
  timestamp: number;
}>;

export type StatusChangeEvent = Readonly<{
  from: SessionStatus;
  to: SessionStatus;
}>;

/**
 * Event map for DeviceSession.
 */
export type SessionEvents = {
  stateChange: [event: StateChangeEvent];
  statusChange: [event: StatusChangeEvent];
  fault: [error: SessionError];
  frameError: [error: CodecError];
};
