/**
 * Supervisor Module - Service Layer
 *
 * Keeps one device session open for the HTTP bridge. The session itself
 * never reconnects: on a fault the supervisor closes it and opens a new one
 * with exponential backoff.
 */
import { createLogger, logOperationComplete, logOperationFailed, logOperationStart } from "../logger.js";
import {
  type DeviceSession,
  type SessionError,
  formatSessionError,
  openSession,
} from "../session/index.js";
import {
  INITIAL_SUPERVISOR_STATE,
  type SupervisorHandlers,
  type SupervisorOptions,
  type SupervisorState,
} from "./schema.js";
import { backoffDelay } from "./transform.js";

const log = createLogger("supervisor");

// =============================================================================
// Module State
// =============================================================================

let state: SupervisorState = INITIAL_SUPERVISOR_STATE;
let options: SupervisorOptions | null = null;
let handlers: SupervisorHandlers = {};
let activeSession: DeviceSession | null = null;
let reconnectTimer: NodeJS.Timeout | null = null;
/** Bumped on stop so in-flight opens from a previous run are discarded */
let generation = 0;

export function getSupervisorState(): SupervisorState {
  return state;
}

/**
 * The open session, or null while connecting or backing off.
 */
export function getActiveSession(): DeviceSession | null {
  return activeSession;
}

// =============================================================================
// Connect Loop
// =============================================================================

async function connect(run: number): Promise<void> {
  const current = options;
  if (!current || run !== generation) return;

  state = { ...state, phase: "connecting", nextRetryAt: null };
  const startTime = Date.now();
  logOperationStart(log, "connect", {
    address: current.session.address,
    failures: state.failures,
  });

  const result = await openSession(current.session);

  if (run !== generation) {
    // Stopped while opening
    if (result.isOk()) result.value.close();
    return;
  }

  if (result.isErr()) {
    const message = formatSessionError(result.error);
    logOperationFailed(log, "connect", message);
    state = { ...state, failures: state.failures + 1, lastError: message };
    scheduleReconnect(run);
    return;
  }

  const session = result.value;
  activeSession = session;
  state = {
    ...state,
    phase: "connected",
    failures: 0,
    lastError: null,
    connectedAt: Date.now(),
  };
  session.once("fault", (error) => handleFault(run, session, error));
  logOperationComplete(log, "connect", startTime, {
    deviceId: session.identity().deviceId,
  });
  handlers.onConnected?.(session);
}

function handleFault(
  run: number,
  session: DeviceSession,
  error: SessionError,
): void {
  if (run !== generation || activeSession !== session) return;

  const message = formatSessionError(error);
  log.warn({ error: message }, "Session faulted, reconnecting");

  activeSession = null;
  session.close();
  state = { ...state, failures: state.failures + 1, lastError: message };
  handlers.onDisconnected?.(error);
  scheduleReconnect(run);
}

function scheduleReconnect(run: number): void {
  const current = options;
  if (!current || reconnectTimer || run !== generation) return;

  const delayMs = backoffDelay(
    state.failures,
    current.baseDelayMs,
    current.maxDelayMs,
  );
  state = { ...state, phase: "backoff", nextRetryAt: Date.now() + delayMs };
  log.info({ failures: state.failures, delayMs }, "Reconnect scheduled");

  reconnectTimer = setTimeout(() => {
    reconnectTimer = null;
    runConnect(run);
  }, delayMs);
}

function runConnect(run: number): void {
  connect(run).catch((error: unknown) => {
    const message = error instanceof Error ? error.message : "Unknown error";
    log.error({ error: message }, "Error in connect cycle");
    state = { ...state, failures: state.failures + 1, lastError: message };
    scheduleReconnect(run);
  });
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Start supervising a session. Returns immediately; the first open runs in
 * the background.
 */
export function startSupervisor(
  supervisorOptions: SupervisorOptions,
  supervisorHandlers: SupervisorHandlers = {},
): void {
  if (state.isRunning) {
    log.warn("Supervisor already running");
    return;
  }

  log.info({ address: supervisorOptions.session.address }, "Starting supervisor");
  options = supervisorOptions;
  handlers = supervisorHandlers;
  state = { ...INITIAL_SUPERVISOR_STATE, isRunning: true };
  runConnect(generation);
}

/**
 * Stop supervising: cancel any pending retry and close the open session.
 */
export function stopSupervisor(): void {
  if (!state.isRunning) {
    log.warn("Supervisor not running");
    return;
  }

  log.info("Stopping supervisor...");
  generation += 1;

  if (reconnectTimer) {
    clearTimeout(reconnectTimer);
    reconnectTimer = null;
  }

  const session = activeSession;
  activeSession = null;
  session?.close();

  options = null;
  handlers = {};
  state = { ...state, phase: "stopped", isRunning: false, nextRetryAt: null };
}
