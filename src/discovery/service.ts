/**
 * Discovery Module - Service Layer
 *
 * Runs the INFO then QUERY exchange over an already-connected channel.
 */
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import type { WireMessage } from "../codec/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { SessionError } from "../session/errors.js";
import { discoveryTimeout, formatDiscoveryError } from "./errors.js";
import type { DiscoveryResult, DiscoveryStage } from "./schema.js";
import { parseInfoResponse, parseQueryResponse } from "./transform.js";

const moduleLog = createLogger("discovery");

/**
 * Request/response access to one device, provided by the session.
 */
export type DiscoveryChannel = Readonly<{
  request: (
    command: DiscoveryStage,
    timeoutMs: number,
  ) => Promise<Result<WireMessage, SessionError>>;
}>;

async function exchange(
  channel: DiscoveryChannel,
  stage: DiscoveryStage,
  timeoutMs: number,
): Promise<Result<WireMessage, SessionError>> {
  const response = await channel.request(stage, timeoutMs);
  if (response.isErr() && response.error.type === "REQUEST_TIMEOUT") {
    return err(discoveryTimeout(stage, timeoutMs));
  }
  return response;
}

/**
 * Retrieve identity, supported DPIDs and initial state.
 *
 * A timeout on either exchange yields DISCOVERY_TIMEOUT; a device error code
 * or an INFO response without did/pid/dtp yields DISCOVERY_REJECTED. Other
 * channel failures (closed, faulted, write error) pass through unchanged.
 */
export async function runDiscovery(
  channel: DiscoveryChannel,
  timeoutMs: number,
  log: Logger = moduleLog,
): Promise<Result<DiscoveryResult, SessionError>> {
  const startTime = Date.now();
  logOperationStart(log, "discovery", { timeoutMs });

  const infoResponse = await exchange(channel, "info", timeoutMs);
  if (infoResponse.isErr()) {
    logOperationFailed(log, "discovery", infoResponse.error.message);
    return err(infoResponse.error);
  }

  const identity = parseInfoResponse(infoResponse.value);
  if (identity.isErr()) {
    logOperationFailed(log, "discovery", formatDiscoveryError(identity.error));
    return err(identity.error);
  }

  const queryResponse = await exchange(channel, "query", timeoutMs);
  if (queryResponse.isErr()) {
    logOperationFailed(log, "discovery", queryResponse.error.message);
    return err(queryResponse.error);
  }

  const query = parseQueryResponse(queryResponse.value);
  if (query.isErr()) {
    logOperationFailed(log, "discovery", formatDiscoveryError(query.error));
    return err(query.error);
  }

  logOperationComplete(log, "discovery", startTime, {
    deviceId: identity.value.deviceId,
    productId: identity.value.productId,
    deviceType: identity.value.deviceType,
    dpids: query.value.dpids,
  });

  return ok({ identity: identity.value, ...query.value });
}
