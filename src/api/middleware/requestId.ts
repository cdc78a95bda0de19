/**
 * Request ID middleware - generates or propagates a request ID so every
 * log line of a request can be correlated.
 */
import { randomUUID } from "node:crypto";

import type { MiddlewareHandler } from "hono";

import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

/** Incoming IDs longer than this are replaced */
const MAX_REQUEST_ID_LENGTH = 128;

const REQUEST_ID_PATTERN = /^[\w.:-]+$/;

function acceptRequestId(candidate: string | undefined): string | null {
  if (candidate === undefined) return null;
  const trimmed = candidate.trim();
  return trimmed.length > 0 &&
    trimmed.length <= MAX_REQUEST_ID_LENGTH &&
    REQUEST_ID_PATTERN.test(trimmed)
    ? trimmed
    : null;
}

/**
 * Attaches an ID to each request. Propagates a well-formed x-request-id
 * header if present.
 */
export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = acceptRequestId(c.req.header("x-request-id")) ?? randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  log.debug({ requestId, method: c.req.method, path: c.req.path }, "Request started");

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    "Request completed",
  );
};

// Type augmentation for Hono context
declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
