/**
 * Discovery Module - Public API
 */

// Types
export type {
  AssumedDevice,
  DeviceIdentity,
  DiscoveryResult,
  DiscoveryStage,
} from "./schema.js";
export type { DiscoveryError, DiscoveryRejectReason } from "./errors.js";
export type { DiscoveryChannel } from "./service.js";

// Schemas
export { AssumedDeviceSchema } from "./schema.js";

// Error utilities
export {
  deviceRejected,
  discoveryTimeout,
  formatDiscoveryError,
  incompleteIdentity,
  unexpectedResponse,
} from "./errors.js";

// Pure transformations
export {
  assumedDeviceId,
  assumedDiscovery,
  normalizeDeviceType,
  parseInfoResponse,
  parseQueryResponse,
} from "./transform.js";

// Service
export { runDiscovery } from "./service.js";
