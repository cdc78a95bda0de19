/**
 * Discovery Module - Error Types
 */
import type { DiscoveryStage } from "./schema.js";

export type DiscoveryRejectReason =
  | "DEVICE_ERROR"
  | "INCOMPLETE_IDENTITY"
  | "UNEXPECTED_RESPONSE";

/**
 * Errors that can occur during the INFO/QUERY exchange.
 */
export type DiscoveryError =
  | {
      readonly type: "DISCOVERY_TIMEOUT";
      readonly stage: DiscoveryStage;
      readonly timeoutMs: number;
      readonly message: string;
    }
  | {
      readonly type: "DISCOVERY_REJECTED";
      readonly stage: DiscoveryStage;
      readonly reason: DiscoveryRejectReason;
      readonly message: string;
      /** Device result code when the device answered with `res ≠ 0` */
      readonly resultCode?: number;
      /** Identity fields absent from the INFO response */
      readonly missing?: readonly string[];
    };

/**
 * Create a DISCOVERY_TIMEOUT error.
 */
export function discoveryTimeout(
  stage: DiscoveryStage,
  timeoutMs: number,
): DiscoveryError {
  return {
    type: "DISCOVERY_TIMEOUT",
    stage,
    timeoutMs,
    message: `No ${stage.toUpperCase()} response within ${timeoutMs}ms`,
  };
}

/**
 * Create a DISCOVERY_REJECTED error for a device-side error code.
 */
export function deviceRejected(
  stage: DiscoveryStage,
  resultCode: number,
): DiscoveryError {
  return {
    type: "DISCOVERY_REJECTED",
    stage,
    reason: "DEVICE_ERROR",
    resultCode,
    message: `Device answered ${stage.toUpperCase()} with result code ${resultCode}`,
  };
}

/**
 * Create a DISCOVERY_REJECTED error for missing identity fields.
 */
export function incompleteIdentity(missing: readonly string[]): DiscoveryError {
  return {
    type: "DISCOVERY_REJECTED",
    stage: "info",
    reason: "INCOMPLETE_IDENTITY",
    missing,
    message: `INFO response is missing ${missing.join(", ")}`,
  };
}

/**
 * Create a DISCOVERY_REJECTED error for a response of the wrong kind.
 */
export function unexpectedResponse(
  stage: DiscoveryStage,
  kind: string,
): DiscoveryError {
  return {
    type: "DISCOVERY_REJECTED",
    stage,
    reason: "UNEXPECTED_RESPONSE",
    message: `Expected a ${stage.toUpperCase()} response, got ${kind}`,
  };
}

/**
 * Format a DiscoveryError for logging.
 */
export function formatDiscoveryError(error: DiscoveryError): string {
  switch (error.type) {
    case "DISCOVERY_TIMEOUT":
      return `Discovery timed out: ${error.message}`;
    case "DISCOVERY_REJECTED":
      return `Discovery rejected (${error.reason}): ${error.message}`;
  }
}
