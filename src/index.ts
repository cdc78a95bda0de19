/**
 * CozyLife Local Bridge - Application Entry Point
 *
 * Sets up the Hono server on Node with:
 * - Health, device and entity routes
 * - SSE for real-time state updates
 * - Request ID tracing
 * - Global error handling
 * - The session supervisor (reconnects on faults)
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { routes } from "./api/routes.js";
import { config, getReconnectConfig, getSessionConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { type DeviceSession, formatSessionError } from "./session/index.js";
import {
  broadcastDeviceFault,
  broadcastDeviceStatus,
  broadcastSnapshot,
  broadcastStateChange,
  disconnectAllClients,
} from "./sse/index.js";
import {
  getSupervisorState,
  startSupervisor,
  stopSupervisor,
} from "./supervisor/index.js";

const log = createLogger("api");

// =============================================================================
// CONFIGURATION
// =============================================================================

const sessionConfig = getSessionConfig();
if (!sessionConfig) {
  log.fatal("COZYLIFE_DEVICE_IP is not set; nothing to bridge");
  process.exit(1);
}

const reconnectConfig = getReconnectConfig();

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    device: `${sessionConfig.address}:${sessionConfig.port}`,
    keepaliveMs: sessionConfig.keepaliveMs,
    gangCount: sessionConfig.gangCount ?? "default",
    skipValidation: sessionConfig.skipValidation,
    reconnect: reconnectConfig,
  },
  "Configuration loaded",
);

if (sessionConfig.skipValidation) {
  log.warn("Skip-validation mode: discovery is bypassed, identity is assumed");
}

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

app.use("*", requestIdMiddleware);
app.onError(errorHandler);
app.route("/", routes);

// =============================================================================
// SESSION SUPERVISOR
// =============================================================================

function bridgeSession(session: DeviceSession): void {
  const { deviceId } = session.identity();

  session.on("stateChange", (event) => {
    broadcastStateChange(deviceId, event, session.currentStates());
  });
  session.on("statusChange", (event) => {
    broadcastDeviceStatus(deviceId, event.to, getSupervisorState().phase);
  });

  broadcastDeviceStatus(deviceId, session.status(), getSupervisorState().phase);
  broadcastSnapshot(session.identity(), session.currentStates());
}

startSupervisor(
  {
    session: sessionConfig,
    baseDelayMs: reconnectConfig.baseDelayMs,
    maxDelayMs: reconnectConfig.maxDelayMs,
  },
  {
    onConnected: bridgeSession,
    onDisconnected: (error) => {
      broadcastDeviceFault(null, formatSessionError(error));
      broadcastDeviceStatus(null, null, getSupervisorState().phase);
    },
  },
);

// =============================================================================
// START SERVER
// =============================================================================

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0", // Bind to all interfaces for remote access
  },
  (info) => {
    log.info(
      { port: info.port, appName: config.APP_NAME },
      `${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string): void => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  stopSupervisor();
  disconnectAllClients();

  server.close((error) => {
    if (error) {
      log.error({ error: error.message }, "HTTP server close failed");
      process.exit(1);
    }
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
