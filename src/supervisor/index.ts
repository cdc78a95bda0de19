/**
 * Supervisor Module - Public API
 */

// Types
export type {
  SupervisorHandlers,
  SupervisorOptions,
  SupervisorPhase,
  SupervisorState,
} from "./schema.js";

export { INITIAL_SUPERVISOR_STATE } from "./schema.js";

// Pure functions
export { backoffDelay } from "./transform.js";

// Service functions
export {
  getActiveSession,
  getSupervisorState,
  startSupervisor,
  stopSupervisor,
} from "./service.js";
