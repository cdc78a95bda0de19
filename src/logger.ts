/**
 * Module-scoped color-coded loggers for CozyLife Local.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import pino from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Driver modules
  session: "\x1b[36m", // cyan
  discovery: "\x1b[35m", // magenta

  // Bridge modules
  api: "\x1b[34m", // blue
  middleware: "\x1b[94m", // bright blue
  sse: "\x1b[95m", // bright magenta
  supervisor: "\x1b[91m", // bright red
  scanner: "\x1b[93m", // bright yellow
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

const isDevelopment = config.NODE_ENV === "development";

/**
 * Process-wide root logger. Module loggers are its children.
 */
const rootLogger = isDevelopment
  ? pino({
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: "{tag} {msg}",
          ignore: "pid,hostname,module,tag",
          translateTime: "HH:MM:ss",
        },
      },
    })
  : pino({
      level: config.LOG_LEVEL,
      base: { app: config.APP_NAME },
    });

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger("session");
 * log.info({ address }, "Connecting to device");
 */
export function createLogger(module: ModuleName): pino.Logger {
  if (!isDevelopment) return rootLogger.child({ module });

  const color = MODULE_COLORS[module];
  return rootLogger.child({ module, tag: `${color}[${module}]${RESET}` });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: pino.Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: pino.Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
