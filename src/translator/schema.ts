/**
 * Translator Module - Schemas and Types
 *
 * High-level intents accepted from callers and the entity state derived
 * back from raw data points.
 *
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Ranges
// =============================================================================

/** Warmest color temperature the devices accept. */
export const MIN_KELVIN = 2000;

/** Coldest color temperature the devices accept. */
export const MAX_KELVIN = 6500;

/** Native scale of brightness, saturation and color temperature. */
export const WIRE_SCALE = 1000;

/** Light power values. */
export const WIRE_POWER_ON = 255;
export const WIRE_POWER_OFF = 0;

/** Work mode values on DPID 2. */
export const WorkMode = {
  WHITE: 0,
  COLOR: 1,
} as const;

/**
 * Raw values at or above this mean "not active in the current mode"
 * (the device reports 65535 for hue while in white mode, and vice versa).
 */
export const INACTIVE_SENTINEL = 60000;

// =============================================================================
// Intents
// =============================================================================

export const PowerIntentSchema = z.object({
  type: z.literal("power"),
  on: z.boolean(),
});

export const BrightnessIntentSchema = z.object({
  type: z.literal("brightness"),
  value: z.number().min(0).max(100),
});

/**
 * Color temperature in kelvin (default) or mireds. Out-of-range values are
 * clamped to the device range when translated.
 */
export const ColorTemperatureIntentSchema = z.object({
  type: z.literal("colorTemperature"),
  value: z.number().positive(),
  unit: z.enum(["kelvin", "mired"]).default("kelvin"),
});

export const HueIntentSchema = z.object({
  type: z.literal("hue"),
  value: z.number().min(0).max(360),
});

export const SaturationIntentSchema = z.object({
  type: z.literal("saturation"),
  value: z.number().min(0).max(100),
});

export const IntentSchema = z.discriminatedUnion("type", [
  PowerIntentSchema,
  BrightnessIntentSchema,
  ColorTemperatureIntentSchema,
  HueIntentSchema,
  SaturationIntentSchema,
]);

export type Intent = z.infer<typeof IntentSchema>;
/** Intent as a caller may write it (unit optional). */
export type IntentInput = z.input<typeof IntentSchema>;
export type IntentType = Intent["type"];

// =============================================================================
// Data Point Writes
// =============================================================================

/**
 * One DPID write produced from an intent.
 *
 * `value` writes set the DPID outright. `mask` writes flip bits of a shared
 * bitmask DPID; the session composes the final value at send time.
 */
export type DataPointWrite =
  | Readonly<{ kind: "value"; dpid: number; value: number }>
  | Readonly<{ kind: "mask"; dpid: number; mask: number; on: boolean }>;

// =============================================================================
// Entity State
// =============================================================================

export type ColorMode = "hs" | "colorTemperature" | "brightness" | "onOff";

/**
 * High-level snapshot of one entity. Controls the entity does not have, or
 * values the device reports as inactive, are null.
 */
export type EntityState = Readonly<{
  index: number;
  on: boolean | null;
  /** 0-100 */
  brightness: number | null;
  /** Kelvin, 2000-6500 */
  colorTemperature: number | null;
  /** 0-360 */
  hue: number | null;
  /** 0-100 */
  saturation: number | null;
  colorMode: ColorMode;
}>;

/**
 * Channels rescaled between the public range and the wire range.
 */
export type ScaledChannel = "brightness" | "hue" | "saturation";
