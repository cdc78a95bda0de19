/**
 * Supervisor Module - Schemas and Types
 *
 * State of the caller-side reconnect loop around one device session.
 */
import type {
  DeviceSession,
  SessionError,
  SessionOptions,
} from "../session/index.js";

// =============================================================================
// Options
// =============================================================================

export type SupervisorOptions = Readonly<{
  session: SessionOptions;
  /** Delay before the first retry (ms) */
  baseDelayMs: number;
  /** Upper bound for the retry delay (ms) */
  maxDelayMs: number;
}>;

/**
 * Callbacks invoked as the supervised session comes and goes.
 */
export type SupervisorHandlers = Readonly<{
  onConnected?: (session: DeviceSession) => void;
  onDisconnected?: (error: SessionError) => void;
}>;

// =============================================================================
// Supervisor State
// =============================================================================

export type SupervisorPhase =
  | "idle"
  | "connecting"
  | "connected"
  | "backoff"
  | "stopped";

export type SupervisorState = Readonly<{
  phase: SupervisorPhase;
  /** Whether the loop has been started and not stopped */
  isRunning: boolean;
  /** Consecutive failed opens or faults since the last successful open */
  failures: number;
  /** Formatted last error, cleared on a successful open */
  lastError: string | null;
  /** Timestamp of the last successful open */
  connectedAt: number | null;
  /** When the pending retry fires */
  nextRetryAt: number | null;
}>;

export const INITIAL_SUPERVISOR_STATE: SupervisorState = {
  phase: "idle",
  isRunning: false,
  failures: 0,
  lastError: null,
  connectedAt: null,
  nextRetryAt: null,
};
