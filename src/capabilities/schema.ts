/**
 * Capabilities Module - Schemas and Types
 *
 * Semantic description of what a device and each of its entities can do,
 * derived from the raw DPID set at discovery time.
 */

// =============================================================================
// Well-Known DPIDs
// =============================================================================

/**
 * DPIDs with a fixed meaning across CozyLife products.
 * DPID 3 is deliberately absent: its role depends on the product ID.
 */
export const Dpid = {
  POWER: 1,
  WORK_MODE: 2,
  TEMP_OR_BRIGHTNESS: 3,
  BRIGHTNESS: 4,
  HUE: 5,
  SATURATION: 6,
} as const;

/**
 * Device-type codes reported in `dtp`.
 */
export const DeviceType = {
  SWITCH: 0,
  LIGHT: 1,
  RGB_LIGHT: 2,
} as const;

export const DEFAULT_GANG_COUNT = 2;

// =============================================================================
// Roles
// =============================================================================

/**
 * Semantic role of one supported DPID.
 */
export type DpidRole =
  | "power"
  | "workMode"
  | "brightness"
  | "colorTemperature"
  | "hue"
  | "saturation"
  | "unknown";

/**
 * Role of the product-dependent DPID 3. Always exactly one of the two.
 */
export type Dpid3Role = "brightness" | "colorTemperature";

/**
 * Which DPID serves each semantic channel (absent = not supported).
 */
export type CapabilityChannels = Readonly<{
  power?: number;
  workMode?: number;
  brightness?: number;
  colorTemperature?: number;
  hue?: number;
  saturation?: number;
}>;

export type DeviceClassification =
  | "multiGangSwitch"
  | "colorLight"
  | "colorTemperatureLight"
  | "dimmableLight"
  | "onOff";

/**
 * Observable notes about how the model was resolved.
 */
export type CapabilityDiagnostic =
  | "ON_OFF_ONLY"
  | "NO_POWER_DPID"
  | "HUE_WITHOUT_SATURATION"
  | "DPID3_BRIGHTNESS_SHADOWED"
  | "GANG_COUNT_ASSUMED"
  | "UNKNOWN_DPIDS";

// =============================================================================
// Capability Model
// =============================================================================

export type CapabilityModel = Readonly<{
  productId: string;
  deviceType: number;
  /** Supported DPIDs, ascending */
  dpids: readonly number[];
  /** Total mapping of every supported DPID to its role */
  roles: Readonly<Record<string, DpidRole>>;
  /** Resolved role of DPID 3 for this product, whether or not it is supported */
  dpid3Role: Dpid3Role;
  channels: CapabilityChannels;
  onOff: boolean;
  dimmable: boolean;
  colorTemperature: boolean;
  color: boolean;
  classification: DeviceClassification;
  /** Supported DPIDs with role "unknown", ascending */
  unknownDpids: readonly number[];
  diagnostics: readonly CapabilityDiagnostic[];
}>;

// =============================================================================
// Entities
// =============================================================================

/**
 * Fixed sub-address of an entity within its device.
 */
export type EntityAddress =
  | Readonly<{ type: "device" }>
  | Readonly<{ type: "gang"; gang: number; bit: number }>;

export type EntityControls = Readonly<{
  power: boolean;
  brightness: boolean;
  colorTemperature: boolean;
  color: boolean;
}>;

export type EntityDescriptor = Readonly<{
  /** 0-based, stable for the lifetime of the session */
  index: number;
  kind: "switch" | "light";
  address: EntityAddress;
  controls: EntityControls;
  uniqueId: string;
  name: string;
}>;

// =============================================================================
// Inputs
// =============================================================================

export type InferenceInput = Readonly<{
  deviceId: string;
  productId: string;
  deviceType: number;
  dpids: readonly number[];
}>;

export type InferenceOptions = Readonly<{
  /** Gang count override for switch-family devices */
  gangCount?: number;
}>;

export type InferenceResult = Readonly<{
  model: CapabilityModel;
  entities: readonly EntityDescriptor[];
}>;
