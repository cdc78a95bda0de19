/**
 * Session Module - Error Types
 *
 * The full error taxonomy surfaced by a device session. Errors from the
 * lower modules (codec, discovery, translator) are part of the union so a
 * caller handles one type.
 */
import { type CodecError, formatCodecError } from "../codec/index.js";
import {
  type DiscoveryError,
  formatDiscoveryError,
} from "../discovery/errors.js";
import {
  type TranslatorError,
  formatTranslatorError,
} from "../translator/errors.js";
import type { SessionStatus } from "./schema.js";

/**
 * The entity and DPIDs a failed `set()` was writing.
 */
export interface CommandTarget {
  readonly entityIndex?: number;
  readonly dpids?: readonly number[];
}

export type FaultReason =
  | "KEEPALIVE_TIMEOUT"
  | "SOCKET_ERROR"
  | "SOCKET_CLOSED"
  | "FRAME_OVERFLOW";

/**
 * Errors that can occur while opening or using a session.
 */
export type SessionError =
  | {
      readonly type: "CONNECT_TIMEOUT";
      readonly address: string;
      readonly port: number;
      readonly timeoutMs: number;
      readonly message: string;
    }
  | {
      readonly type: "CONNECT_REFUSED";
      readonly address: string;
      readonly port: number;
      /** System error code, e.g. ECONNREFUSED or EHOSTUNREACH */
      readonly code?: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | ({
      readonly type: "WRITE_ERROR";
      readonly sequenceId: string;
      readonly message: string;
      readonly cause?: Error;
    } & CommandTarget)
  | ({
      readonly type: "REQUEST_TIMEOUT";
      readonly sequenceId: string;
      readonly command: string;
      readonly timeoutMs: number;
      readonly message: string;
    } & CommandTarget)
  | {
      readonly type: "COMMAND_REJECTED";
      readonly sequenceId: string;
      readonly resultCode: number;
      readonly entityIndex?: number;
      readonly dpids: readonly number[];
      readonly message: string;
    }
  | ({
      readonly type: "SESSION_CLOSED";
      readonly message: string;
    } & CommandTarget)
  | ({
      readonly type: "FAULTED";
      readonly address: string;
      readonly reason: FaultReason;
      readonly message: string;
      readonly cause?: Error;
    } & CommandTarget)
  | {
      readonly type: "INVALID_OPTIONS";
      readonly issues: readonly string[];
      readonly message: string;
    }
  | {
      readonly type: "NOT_READY";
      readonly status: SessionStatus;
      readonly message: string;
    }
  | CodecError
  | DiscoveryError
  | TranslatorError;

/**
 * Create a CONNECT_TIMEOUT error.
 */
export function connectTimeout(
  address: string,
  port: number,
  timeoutMs: number,
): SessionError {
  return {
    type: "CONNECT_TIMEOUT",
    address,
    port,
    timeoutMs,
    message: `No TCP connection to ${address}:${port} within ${timeoutMs}ms`,
  };
}

/**
 * Create a CONNECT_REFUSED error.
 */
export function connectRefused(
  address: string,
  port: number,
  cause?: Error,
  code?: string,
): SessionError {
  const message = `Connection to ${address}:${port} failed${code ? ` (${code})` : ""}`;
  if (cause) {
    return { type: "CONNECT_REFUSED", address, port, code, message, cause };
  }
  return { type: "CONNECT_REFUSED", address, port, code, message };
}

/**
 * Create a WRITE_ERROR.
 */
export function writeError(
  sequenceId: string,
  message: string,
  cause?: Error,
): SessionError {
  if (cause) {
    return { type: "WRITE_ERROR", sequenceId, message, cause };
  }
  return { type: "WRITE_ERROR", sequenceId, message };
}

/**
 * Create a REQUEST_TIMEOUT error.
 */
export function requestTimeout(
  sequenceId: string,
  command: string,
  timeoutMs: number,
): SessionError {
  return {
    type: "REQUEST_TIMEOUT",
    sequenceId,
    command,
    timeoutMs,
    message: `No response to ${command} ${sequenceId} within ${timeoutMs}ms`,
  };
}

/**
 * Create a COMMAND_REJECTED error.
 */
export function commandRejected(
  sequenceId: string,
  resultCode: number,
  dpids: readonly number[],
  entityIndex?: number,
): SessionError {
  const target =
    entityIndex === undefined ? "" : ` for entity ${entityIndex}`;
  return {
    type: "COMMAND_REJECTED",
    sequenceId,
    resultCode,
    dpids,
    entityIndex,
    message: `Device rejected write of DPIDs ${dpids.join(",")}${target} (result code ${resultCode})`,
  };
}

/**
 * Create a SESSION_CLOSED error.
 */
export function sessionClosed(): SessionError {
  return { type: "SESSION_CLOSED", message: "Session is closed" };
}

/**
 * Create a FAULTED error.
 */
export function faulted(
  address: string,
  reason: FaultReason,
  message: string,
  cause?: Error,
): SessionError {
  if (cause) {
    return { type: "FAULTED", address, reason, message, cause };
  }
  return { type: "FAULTED", address, reason, message };
}

/**
 * Create an INVALID_OPTIONS error.
 */
export function invalidOptions(issues: readonly string[]): SessionError {
  return {
    type: "INVALID_OPTIONS",
    issues,
    message: `Invalid session options: ${issues.join("; ")}`,
  };
}

/**
 * Create a NOT_READY error.
 */
export function notReady(status: SessionStatus): SessionError {
  return {
    type: "NOT_READY",
    status,
    message: `Session is ${status}, not ready`,
  };
}

/**
 * Attach the entity and DPIDs of a failed write to a transport error.
 * Other errors already carry their own context and pass through.
 */
export function withCommandTarget(
  error: SessionError,
  entityIndex: number,
  dpids: readonly number[],
): SessionError {
  switch (error.type) {
    case "WRITE_ERROR":
    case "REQUEST_TIMEOUT":
    case "SESSION_CLOSED":
    case "FAULTED":
      return { ...error, entityIndex, dpids };
    default:
      return error;
  }
}

function describeTarget(target: CommandTarget): string {
  if (target.entityIndex === undefined) return "";
  const dpids = target.dpids?.length ? `, DPIDs ${target.dpids.join(",")}` : "";
  return ` [entity ${target.entityIndex}${dpids}]`;
}

/**
 * Format a SessionError for logging.
 */
export function formatSessionError(error: SessionError): string {
  switch (error.type) {
    case "CONNECT_TIMEOUT":
      return `Connect timeout: ${error.message}`;
    case "CONNECT_REFUSED":
      return `Connect refused: ${error.message}`;
    case "WRITE_ERROR":
      return `Write error (sn ${error.sequenceId}): ${error.message}${describeTarget(error)}`;
    case "REQUEST_TIMEOUT":
      return `Request timeout: ${error.message}${describeTarget(error)}`;
    case "COMMAND_REJECTED":
      return `Command rejected: ${error.message}`;
    case "SESSION_CLOSED":
      return `${error.message}${describeTarget(error)}`;
    case "FAULTED":
      return `Session faulted (${error.reason}): ${error.message}${describeTarget(error)}`;
    case "INVALID_OPTIONS":
      return error.message;
    case "NOT_READY":
      return error.message;
    case "MALFORMED_FRAME":
      return formatCodecError(error);
    case "DISCOVERY_TIMEOUT":
    case "DISCOVERY_REJECTED":
      return formatDiscoveryError(error);
    case "UNSUPPORTED_INTENT":
    case "INVALID_INTENT":
    case "UNKNOWN_ENTITY":
      return formatTranslatorError(error);
  }
}
