/**
 * Capabilities Module - Public API
 *
 * Pure inference of what a device and its entities can do.
 */

// Types
export type {
  CapabilityChannels,
  CapabilityDiagnostic,
  CapabilityModel,
  DeviceClassification,
  Dpid3Role,
  DpidRole,
  EntityAddress,
  EntityControls,
  EntityDescriptor,
  InferenceInput,
  InferenceOptions,
  InferenceResult,
} from "./schema.js";

// Constants
export { DEFAULT_GANG_COUNT, DeviceType, Dpid } from "./schema.js";

// Pure transformations
export {
  BRIGHTNESS_ON_DPID3_PRODUCTS,
  inferCapabilities,
  modelNameFor,
  normalizeDpids,
  resolveDpid3Role,
  resolveDpidRole,
} from "./transform.js";
