/**
 * Translator Module - Pure Transformations
 *
 * Intents to DPID writes and raw data points back to entity state.
 * Every DPID decision goes through the resolved capability channels;
 * no module outside capabilities interprets raw DPID numbers.
 */
import { type Result, err, ok } from "neverthrow";

import type {
  CapabilityModel,
  EntityDescriptor,
} from "../capabilities/index.js";
import type { DataPointMap } from "../codec/index.js";
import {
  type TranslatorError,
  invalidIntent,
  unknownEntity,
  unsupportedIntent,
} from "./errors.js";
import {
  type ColorMode,
  type DataPointWrite,
  type EntityState,
  INACTIVE_SENTINEL,
  type Intent,
  IntentSchema,
  MAX_KELVIN,
  MIN_KELVIN,
  type ScaledChannel,
  WIRE_POWER_OFF,
  WIRE_POWER_ON,
  WIRE_SCALE,
  WorkMode,
} from "./schema.js";

// =============================================================================
// Scaling
// =============================================================================

const WIRE_FACTOR: Readonly<Record<ScaledChannel, number>> = {
  brightness: 10,
  hue: 1,
  saturation: 10,
};

const PUBLIC_MAX: Readonly<Record<ScaledChannel, number>> = {
  brightness: 100,
  hue: 360,
  saturation: 100,
};

/**
 * Round to the nearest integer, halves away from negative infinity.
 */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Public value (0-100, hue 0-360) to the wire integer.
 *
 * @example
 * toWire("brightness", 50) // 500
 */
export function toWire(channel: ScaledChannel, value: number): number {
  return roundHalfUp(value * WIRE_FACTOR[channel]);
}

/**
 * Wire integer to the public value, clamped to the public range.
 */
export function fromWire(channel: ScaledChannel, wire: number): number {
  return clamp(roundHalfUp(wire / WIRE_FACTOR[channel]), 0, PUBLIC_MAX[channel]);
}

/**
 * Kelvin (clamped to 2000-6500) to the 0-1000 wire scale.
 */
export function kelvinToWire(kelvin: number): number {
  const clamped = clamp(kelvin, MIN_KELVIN, MAX_KELVIN);
  return roundHalfUp(
    ((clamped - MIN_KELVIN) / (MAX_KELVIN - MIN_KELVIN)) * WIRE_SCALE,
  );
}

export function wireToKelvin(wire: number): number {
  const clamped = clamp(wire, 0, WIRE_SCALE);
  return roundHalfUp(
    MIN_KELVIN + (clamped / WIRE_SCALE) * (MAX_KELVIN - MIN_KELVIN),
  );
}

export function miredToKelvin(mired: number): number {
  return 1_000_000 / mired;
}

export function kelvinToMired(kelvin: number): number {
  return roundHalfUp(1_000_000 / kelvin);
}

/**
 * Set or clear `mask` in a bitmask value.
 */
export function applyMask(value: number, mask: number, on: boolean): number {
  return on ? value | mask : value & ~mask;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate an untrusted intent payload.
 */
export function parseIntent(input: unknown): Result<Intent, TranslatorError> {
  const parsed = IntentSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      invalidIntent(
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "intent"}: ${issue.message}`,
        ),
      ),
    );
  }
  return ok(parsed.data);
}

/**
 * Look up an entity by index.
 */
export function findEntity(
  entities: readonly EntityDescriptor[],
  index: number,
): Result<EntityDescriptor, TranslatorError> {
  const entity = entities.find((candidate) => candidate.index === index);
  return entity ? ok(entity) : err(unknownEntity(index, entities.length));
}

// =============================================================================
// Intent → Writes
// =============================================================================

function workModeWrite(
  model: CapabilityModel,
  mode: number,
): DataPointWrite[] {
  const dpid = model.channels.workMode;
  return dpid === undefined ? [] : [{ kind: "value", dpid, value: mode }];
}

/**
 * Translate one intent into the DPID writes that realise it on `entity`.
 *
 * Fails with UNSUPPORTED_INTENT when the entity lacks the control; nothing
 * is written in that case.
 */
export function intentToWrites(
  entity: EntityDescriptor,
  model: CapabilityModel,
  intent: Intent,
): Result<DataPointWrite[], TranslatorError> {
  const { channels } = model;

  switch (intent.type) {
    case "power": {
      const dpid = channels.power;
      if (!entity.controls.power || dpid === undefined) {
        return err(unsupportedIntent(entity.index, intent.type, "power"));
      }
      if (entity.address.type === "gang") {
        return ok([
          { kind: "mask", dpid, mask: 1 << entity.address.bit, on: intent.on },
        ]);
      }
      return ok([
        {
          kind: "value",
          dpid,
          value: intent.on ? WIRE_POWER_ON : WIRE_POWER_OFF,
        },
      ]);
    }

    case "brightness": {
      const dpid = channels.brightness;
      if (!entity.controls.brightness || dpid === undefined) {
        return err(unsupportedIntent(entity.index, intent.type, "brightness"));
      }
      return ok([
        { kind: "value", dpid, value: toWire("brightness", intent.value) },
      ]);
    }

    case "colorTemperature": {
      const dpid = channels.colorTemperature;
      if (!entity.controls.colorTemperature || dpid === undefined) {
        return err(
          unsupportedIntent(entity.index, intent.type, "colorTemperature"),
        );
      }
      const kelvin =
        intent.unit === "mired" ? miredToKelvin(intent.value) : intent.value;
      return ok([
        ...workModeWrite(model, WorkMode.WHITE),
        { kind: "value", dpid, value: kelvinToWire(kelvin) },
      ]);
    }

    case "hue": {
      const dpid = channels.hue;
      if (!entity.controls.color || dpid === undefined) {
        return err(unsupportedIntent(entity.index, intent.type, "hue"));
      }
      return ok([
        ...workModeWrite(model, WorkMode.COLOR),
        { kind: "value", dpid, value: toWire("hue", intent.value) },
      ]);
    }

    case "saturation": {
      const dpid = channels.saturation;
      if (!entity.controls.color || dpid === undefined) {
        return err(unsupportedIntent(entity.index, intent.type, "saturation"));
      }
      return ok([
        ...workModeWrite(model, WorkMode.COLOR),
        { kind: "value", dpid, value: toWire("saturation", intent.value) },
      ]);
    }
  }
}

// =============================================================================
// Raw State → Entity State
// =============================================================================

function readActive(raw: DataPointMap, dpid: number | undefined): number | null {
  if (dpid === undefined) return null;
  const value = raw[String(dpid)];
  return value === undefined || value >= INACTIVE_SENTINEL ? null : value;
}

function resolveColorMode(
  entity: EntityDescriptor,
  raw: DataPointMap,
  model: CapabilityModel,
  hue: number | null,
  colorTemperature: number | null,
): ColorMode {
  const { controls } = entity;

  // DPID 2 is authoritative when the device has it.
  const workMode = readActive(raw, model.channels.workMode);
  if (workMode === WorkMode.COLOR && controls.color) return "hs";
  if (workMode === WorkMode.WHITE && controls.colorTemperature) {
    return "colorTemperature";
  }

  if (controls.color && hue !== null) return "hs";
  if (controls.colorTemperature && colorTemperature !== null) {
    return "colorTemperature";
  }
  if (controls.colorTemperature) return "colorTemperature";
  if (controls.color) return "hs";
  if (controls.brightness) return "brightness";
  return "onOff";
}

/**
 * Re-derive the high-level state of `entity` from raw data points.
 * DPIDs outside the entity's channels are never read.
 */
export function deriveEntityState(
  entity: EntityDescriptor,
  model: CapabilityModel,
  raw: DataPointMap,
): EntityState {
  const { channels } = model;
  const { controls } = entity;

  let on: boolean | null = null;
  const power = controls.power ? readActive(raw, channels.power) : null;
  if (power !== null) {
    on =
      entity.address.type === "gang"
        ? (power & (1 << entity.address.bit)) !== 0
        : power > 0;
  }

  const brightnessWire = controls.brightness
    ? readActive(raw, channels.brightness)
    : null;
  const temperatureWire = controls.colorTemperature
    ? readActive(raw, channels.colorTemperature)
    : null;
  const hueWire = controls.color ? readActive(raw, channels.hue) : null;
  const saturationWire = controls.color
    ? readActive(raw, channels.saturation)
    : null;

  const hue = hueWire === null ? null : fromWire("hue", hueWire);
  const colorTemperature =
    temperatureWire === null ? null : wireToKelvin(temperatureWire);

  return {
    index: entity.index,
    on,
    brightness:
      brightnessWire === null ? null : fromWire("brightness", brightnessWire),
    colorTemperature,
    hue,
    saturation:
      saturationWire === null ? null : fromWire("saturation", saturationWire),
    colorMode: resolveColorMode(entity, raw, model, hue, colorTemperature),
  };
}
