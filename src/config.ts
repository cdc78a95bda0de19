/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * CozyLife Local configuration covering:
 * - HTTP bridge settings
 * - Device session (address, timeouts, keepalive, gang count)
 * - Skip-validation developer mode
 * - Caller-side reconnect policy
 * - LAN scanner
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

/**
 * Comma-separated DPID list, e.g. "1,3,5".
 */
const dpidList = z
  .string()
  .optional()
  .transform((val, ctx) => {
    if (val === undefined || val.trim() === "") return undefined;
    const dpids = val.split(",").map((part) => Number(part.trim()));
    if (dpids.some((dpid) => !Number.isInteger(dpid) || dpid <= 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "DPID list must contain positive integers",
      });
      return z.NEVER;
    }
    return dpids;
  });

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8083).describe("HTTP bridge port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("CozyLifeLocal").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Device Session
  // ==========================================================================
  COZYLIFE_DEVICE_IP: optionalString.describe(
    "Device IPv4 address (required by the bridge)",
  ),
  COZYLIFE_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(5555)
    .describe("Device TCP port"),
  COZYLIFE_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(3000)
    .describe("TCP connect timeout (ms)"),
  COZYLIFE_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(3000)
    .describe("Response timeout for discovery and commands (ms)"),
  COZYLIFE_WRITE_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(2000)
    .describe("Socket write timeout (ms)"),
  COZYLIFE_KEEPALIVE_MS: z.coerce
    .number()
    .min(0)
    .default(30000)
    .describe("Idle window before a liveness probe is sent (ms, 0 disables)"),
  COZYLIFE_PROBE_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(3000)
    .describe("Liveness probe response timeout (ms)"),
  COZYLIFE_GANG_COUNT: z.coerce
    .number()
    .int()
    .min(1)
    .max(8)
    .optional()
    .describe("Gang count override for multi-gang switches (default 2)"),

  // ==========================================================================
  // Skip Validation (development)
  // ==========================================================================
  COZYLIFE_SKIP_VALIDATION: envBoolean(false).describe(
    "Bypass discovery and use the assumed identity below",
  ),
  COZYLIFE_ASSUMED_PID: optionalString.describe("Assumed product ID"),
  COZYLIFE_ASSUMED_DTP: z.coerce
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Assumed device-type code"),
  COZYLIFE_ASSUMED_DPIDS: dpidList.describe("Assumed supported DPIDs"),

  // ==========================================================================
  // Reconnect Policy (bridge side)
  // ==========================================================================
  RECONNECT_BASE_DELAY_MS: z.coerce
    .number()
    .positive()
    .default(1000)
    .describe("First reconnect delay after a fault (ms)"),
  RECONNECT_MAX_DELAY_MS: z.coerce
    .number()
    .positive()
    .default(60000)
    .describe("Upper bound for reconnect backoff (ms)"),

  // ==========================================================================
  // LAN Scanner
  // ==========================================================================
  SCAN_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(10)
    .describe("Concurrent probes while scanning"),
  SCAN_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(2000)
    .describe("Per-address probe timeout (ms)"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Session options for the configured device.
 * Returns null if no device address is configured.
 */
export function getSessionConfig(): Readonly<{
  address: string;
  port: number;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  writeTimeoutMs: number;
  keepaliveMs: number;
  probeTimeoutMs: number;
  gangCount: number | undefined;
  skipValidation: boolean;
  assumed:
    | { productId: string; deviceType: number; dpids: number[] }
    | undefined;
}> | null {
  if (!config.COZYLIFE_DEVICE_IP) {
    return null;
  }

  const assumed =
    config.COZYLIFE_ASSUMED_PID !== undefined &&
    config.COZYLIFE_ASSUMED_DTP !== undefined &&
    config.COZYLIFE_ASSUMED_DPIDS !== undefined
      ? {
          productId: config.COZYLIFE_ASSUMED_PID,
          deviceType: config.COZYLIFE_ASSUMED_DTP,
          dpids: config.COZYLIFE_ASSUMED_DPIDS,
        }
      : undefined;

  return {
    address: config.COZYLIFE_DEVICE_IP,
    port: config.COZYLIFE_PORT,
    connectTimeoutMs: config.COZYLIFE_CONNECT_TIMEOUT_MS,
    requestTimeoutMs: config.COZYLIFE_REQUEST_TIMEOUT_MS,
    writeTimeoutMs: config.COZYLIFE_WRITE_TIMEOUT_MS,
    keepaliveMs: config.COZYLIFE_KEEPALIVE_MS,
    probeTimeoutMs: config.COZYLIFE_PROBE_TIMEOUT_MS,
    gangCount: config.COZYLIFE_GANG_COUNT,
    skipValidation: config.COZYLIFE_SKIP_VALIDATION,
    assumed,
  };
}

/**
 * Reconnect backoff configuration for the supervisor.
 */
export function getReconnectConfig(): Readonly<{
  baseDelayMs: number;
  maxDelayMs: number;
}> {
  return {
    baseDelayMs: config.RECONNECT_BASE_DELAY_MS,
    maxDelayMs: config.RECONNECT_MAX_DELAY_MS,
  };
}

/**
 * LAN scanner configuration.
 */
export const scanConfig = {
  concurrency: config.SCAN_CONCURRENCY,
  timeoutMs: config.SCAN_TIMEOUT_MS,
  port: config.COZYLIFE_PORT,
} as const;
