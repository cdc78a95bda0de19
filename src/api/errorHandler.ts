/**
 * Global error boundary for the bridge. Anything a route throws is logged
 * with request context and answered with a JSON body.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  if (err instanceof HTTPException) {
    log.warn(
      { requestId, status: err.status, path: c.req.path, error: err.message },
      "Request rejected",
    );
    return c.json({ error: err.message, requestId }, err.status);
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "Unhandled error",
  );

  // Internal messages stay out of production responses
  const message =
    process.env.NODE_ENV === "production"
      ? "Internal server error"
      : err.message;

  return c.json({ error: message, requestId }, 500);
};
