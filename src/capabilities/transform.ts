/**
 * Capabilities Module - Pure Transformations
 *
 * Maps (product ID, device type, supported DPIDs) to a capability model and
 * an ordered list of entity descriptors. Never performs I/O, never fails:
 * ambiguous input resolves to the smaller capability set.
 */
import {
  type CapabilityChannels,
  type CapabilityDiagnostic,
  type CapabilityModel,
  DEFAULT_GANG_COUNT,
  DeviceType,
  type DeviceClassification,
  Dpid,
  type Dpid3Role,
  type DpidRole,
  type EntityDescriptor,
  type InferenceInput,
  type InferenceOptions,
  type InferenceResult,
} from "./schema.js";

// =============================================================================
// Product Quirks
// =============================================================================

/**
 * Products that report brightness on DPID 3 instead of color temperature.
 * Keyed on the exact product ID string.
 */
export const BRIGHTNESS_ON_DPID3_PRODUCTS: ReadonlySet<string> = new Set([
  "d50v0i",
]);

/**
 * Resolve the role of DPID 3. Color temperature unless the product is known
 * to use it for brightness.
 */
export function resolveDpid3Role(productId: string): Dpid3Role {
  return BRIGHTNESS_ON_DPID3_PRODUCTS.has(productId)
    ? "brightness"
    : "colorTemperature";
}

/**
 * Role of a single DPID given the product's DPID 3 role.
 */
export function resolveDpidRole(dpid: number, dpid3Role: Dpid3Role): DpidRole {
  switch (dpid) {
    case Dpid.POWER:
      return "power";
    case Dpid.WORK_MODE:
      return "workMode";
    case Dpid.TEMP_OR_BRIGHTNESS:
      return dpid3Role;
    case Dpid.BRIGHTNESS:
      return "brightness";
    case Dpid.HUE:
      return "hue";
    case Dpid.SATURATION:
      return "saturation";
    default:
      return "unknown";
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Friendly model name; the device reports no name of its own.
 */
export function modelNameFor(productId: string): string {
  return `CozyLife Device (${productId})`;
}

/**
 * Unique, positive, ascending.
 */
export function normalizeDpids(dpids: readonly number[]): number[] {
  return Array.from(
    new Set(dpids.filter((dpid) => Number.isInteger(dpid) && dpid > 0)),
  ).sort((a, b) => a - b);
}

function resolveGangCount(override: number | undefined): number {
  return override !== undefined && Number.isInteger(override) && override >= 1
    ? override
    : DEFAULT_GANG_COUNT;
}

function classify(
  switchFamily: boolean,
  gangCount: number,
  channels: CapabilityChannels,
): DeviceClassification {
  if (switchFamily) {
    return gangCount > 1 ? "multiGangSwitch" : "onOff";
  }
  if (channels.hue !== undefined && channels.saturation !== undefined) {
    return "colorLight";
  }
  if (channels.colorTemperature !== undefined) return "colorTemperatureLight";
  if (channels.brightness !== undefined) return "dimmableLight";
  return "onOff";
}

// =============================================================================
// Channel Resolution
// =============================================================================

function resolveChannels(
  supported: ReadonlySet<number>,
  switchFamily: boolean,
  dpid3Role: Dpid3Role,
): CapabilityChannels {
  const power = supported.has(Dpid.POWER) ? Dpid.POWER : undefined;

  // Gang switches share DPID 1 as a bitmask and expose nothing else.
  if (switchFamily) {
    return { power };
  }

  const dpid3 = supported.has(Dpid.TEMP_OR_BRIGHTNESS);

  let brightness: number | undefined;
  if (supported.has(Dpid.BRIGHTNESS)) {
    brightness = Dpid.BRIGHTNESS;
  } else if (dpid3 && dpid3Role === "brightness") {
    brightness = Dpid.TEMP_OR_BRIGHTNESS;
  }

  const colorTemperature =
    dpid3 && dpid3Role === "colorTemperature"
      ? Dpid.TEMP_OR_BRIGHTNESS
      : undefined;

  const color = supported.has(Dpid.HUE) && supported.has(Dpid.SATURATION);

  return {
    power,
    workMode: supported.has(Dpid.WORK_MODE) ? Dpid.WORK_MODE : undefined,
    brightness,
    colorTemperature,
    hue: color ? Dpid.HUE : undefined,
    saturation: color ? Dpid.SATURATION : undefined,
  };
}

function collectDiagnostics(
  supported: ReadonlySet<number>,
  switchFamily: boolean,
  dpid3Role: Dpid3Role,
  channels: CapabilityChannels,
  unknownDpids: readonly number[],
  gangCountOverride: number | undefined,
): CapabilityDiagnostic[] {
  const diagnostics: CapabilityDiagnostic[] = [];

  if (channels.power === undefined) diagnostics.push("NO_POWER_DPID");

  if (
    channels.brightness === undefined &&
    channels.colorTemperature === undefined &&
    channels.hue === undefined
  ) {
    diagnostics.push("ON_OFF_ONLY");
  }

  if (
    !switchFamily &&
    supported.has(Dpid.HUE) &&
    !supported.has(Dpid.SATURATION)
  ) {
    diagnostics.push("HUE_WITHOUT_SATURATION");
  }

  if (
    !switchFamily &&
    dpid3Role === "brightness" &&
    supported.has(Dpid.TEMP_OR_BRIGHTNESS) &&
    supported.has(Dpid.BRIGHTNESS)
  ) {
    diagnostics.push("DPID3_BRIGHTNESS_SHADOWED");
  }

  if (switchFamily && resolveGangCount(gangCountOverride) !== gangCountOverride) {
    diagnostics.push("GANG_COUNT_ASSUMED");
  }

  if (unknownDpids.length > 0) diagnostics.push("UNKNOWN_DPIDS");

  return diagnostics;
}

// =============================================================================
// Entity Derivation
// =============================================================================

function buildEntities(
  input: InferenceInput,
  model: CapabilityModel,
  gangCount: number,
): EntityDescriptor[] {
  const name = modelNameFor(input.productId);
  const switchFamily = input.deviceType === DeviceType.SWITCH;

  if (switchFamily) {
    if (!model.onOff) return [];
    return Array.from({ length: gangCount }, (_, bit) => ({
      index: bit,
      kind: "switch" as const,
      address: { type: "gang" as const, gang: bit + 1, bit },
      controls: {
        power: true,
        brightness: false,
        colorTemperature: false,
        color: false,
      },
      uniqueId: `${input.deviceId}_${bit + 1}`,
      name: `${name} ${bit + 1}`,
    }));
  }

  const isLight = model.dimmable || model.colorTemperature || model.color;
  if (!model.onOff && !isLight) return [];

  return [
    {
      index: 0,
      kind: isLight ? "light" : "switch",
      address: { type: "device" },
      controls: {
        power: model.onOff,
        brightness: model.dimmable,
        colorTemperature: model.colorTemperature,
        color: model.color,
      },
      uniqueId: `${input.deviceId}_${isLight ? "light" : "switch"}`,
      name,
    },
  ];
}

// =============================================================================
// Inference
// =============================================================================

/**
 * Infer the capability model and entity list for a discovered device.
 *
 * Rules, in order:
 * 1. DPID 1 present: on/off capability.
 * 2. Switch-family device type: `gangCount` gang entities on DPID 1 (default 2).
 * 3. DPID 3 is brightness for known products, color temperature otherwise.
 * 4. DPID 4 is brightness and wins over DPID 3-as-brightness.
 * 5. DPIDs 5 and 6 together enable hue/saturation; 5 alone does not.
 * 6. Other DPIDs, and every DPID but 1 on a switch, get role "unknown".
 * 7. Nothing dimmable or colored: on/off only, flagged in diagnostics.
 */
export function inferCapabilities(
  input: InferenceInput,
  options: InferenceOptions = {},
): InferenceResult {
  const dpids = normalizeDpids(input.dpids);
  const supported = new Set(dpids);
  const switchFamily = input.deviceType === DeviceType.SWITCH;
  const dpid3Role = resolveDpid3Role(input.productId);
  const gangCount = resolveGangCount(options.gangCount);

  // Switches only drive DPID 1; anything else they report is unknown to them.
  const roles: Record<string, DpidRole> = {};
  for (const dpid of dpids) {
    roles[String(dpid)] =
      switchFamily && dpid !== Dpid.POWER
        ? "unknown"
        : resolveDpidRole(dpid, dpid3Role);
  }
  const unknownDpids = dpids.filter((dpid) => roles[String(dpid)] === "unknown");

  const channels = resolveChannels(supported, switchFamily, dpid3Role);

  const model: CapabilityModel = {
    productId: input.productId,
    deviceType: input.deviceType,
    dpids,
    roles,
    dpid3Role,
    channels,
    onOff: channels.power !== undefined,
    dimmable: channels.brightness !== undefined,
    colorTemperature: channels.colorTemperature !== undefined,
    color: channels.hue !== undefined && channels.saturation !== undefined,
    classification: classify(switchFamily, gangCount, channels),
    unknownDpids,
    diagnostics: collectDiagnostics(
      supported,
      switchFamily,
      dpid3Role,
      channels,
      unknownDpids,
      options.gangCount,
    ),
  };

  return { model, entities: buildEntities(input, model, gangCount) };
}
