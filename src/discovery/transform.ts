/**
 * Discovery Module - Pure Transformations
 *
 * Parses INFO and QUERY responses into identity, DPID list and state.
 */
import { type Result, err, ok } from "neverthrow";

import { modelNameFor, normalizeDpids } from "../capabilities/index.js";
import type { WireMessage } from "../codec/index.js";
import {
  type DiscoveryError,
  deviceRejected,
  incompleteIdentity,
  unexpectedResponse,
} from "./errors.js";
import type {
  AssumedDevice,
  DeviceIdentity,
  DiscoveryResult,
} from "./schema.js";

const DIGITS = /^\d+$/;

/**
 * Normalise the wire `dtp` ("01", "0", 2) to an integer.
 * Returns null when it is not a non-negative integer.
 */
export function normalizeDeviceType(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw >= 0 ? raw : null;
  }
  if (typeof raw === "string" && DIGITS.test(raw.trim())) {
    return Number.parseInt(raw.trim(), 10);
  }
  return null;
}

function readIdentifier(raw: unknown): string | null {
  if (typeof raw === "string" && raw.trim() !== "") return raw.trim();
  if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
  return null;
}

/**
 * Parse the INFO response into a DeviceIdentity.
 */
export function parseInfoResponse(
  message: WireMessage,
): Result<DeviceIdentity, DiscoveryError> {
  if (message.kind !== "discoveryResponse") {
    return err(unexpectedResponse("info", message.kind));
  }
  if (message.resultCode !== 0) {
    return err(deviceRejected("info", message.resultCode));
  }

  const deviceId = readIdentifier(message.info["did"]);
  const productId = readIdentifier(message.info["pid"]);
  const deviceType = normalizeDeviceType(message.info["dtp"]);

  const missing: string[] = [];
  if (deviceId === null) missing.push("did");
  if (productId === null) missing.push("pid");
  if (deviceType === null) missing.push("dtp");

  if (deviceId === null || productId === null || deviceType === null) {
    return err(incompleteIdentity(missing));
  }

  return ok({
    deviceId,
    productId,
    deviceType,
    modelName: modelNameFor(productId),
  });
}

/**
 * Parse the QUERY response into supported DPIDs and initial state.
 * A response without `attr` yields an empty DPID list.
 */
export function parseQueryResponse(
  message: WireMessage,
): Result<Pick<DiscoveryResult, "dpids" | "state">, DiscoveryError> {
  if (message.kind !== "queryResponse") {
    return err(unexpectedResponse("query", message.kind));
  }
  if (message.resultCode !== 0) {
    return err(deviceRejected("query", message.resultCode));
  }
  return ok({ dpids: normalizeDpids(message.attr), state: message.data });
}

/**
 * Fallback device id for skip-validation mode, derived from the address.
 */
export function assumedDeviceId(address: string): string {
  return `cozylife_${address.replace(/[^0-9A-Za-z]/g, "_")}`;
}

/**
 * Build a discovery result from a caller-supplied assumption.
 */
export function assumedDiscovery(
  assumed: AssumedDevice,
  address: string,
): DiscoveryResult {
  return {
    identity: {
      deviceId: assumed.deviceId ?? assumedDeviceId(address),
      productId: assumed.productId,
      deviceType: assumed.deviceType,
      modelName: modelNameFor(assumed.productId),
    },
    dpids: normalizeDpids(assumed.dpids),
    state: {},
  };
}
