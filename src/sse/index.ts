/**
 * SSE Module - Public API
 *
 * Exports types and service functions for Server-Sent Events.
 */

// Types
export type {
  DeviceFaultEvent,
  DeviceSnapshotEvent,
  DeviceStatusEvent,
  SseEvent,
  StateChangeSseEvent,
} from "./schema.js";

// Service functions
export {
  broadcast,
  broadcastDeviceFault,
  broadcastDeviceStatus,
  broadcastSnapshot,
  broadcastStateChange,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
  sendToClient,
} from "./service.js";
