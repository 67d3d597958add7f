/**
 * Module-scoped color-coded loggers for the Energy Usage Collector.
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
  // Core modules
  api: "\x1b[34m", // blue
  middleware: "\x1b[94m", // bright blue
  collector: "\x1b[33m", // yellow
  usage: "\x1b[32m", // green

  // Upstream
  emporia: "\x1b[36m", // cyan
  accounts: "\x1b[35m", // magenta

  // Downstream
  sink: "\x1b[91m", // bright red
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('collector');
 * log.info({ account }, 'Submitting points');
 */
export function createLogger(module: ModuleName): pino.Logger {
  const color = MODULE_COLORS[module];

  const isDevelopment = config.NODE_ENV === "development";

  if (isDevelopment) {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/** The logger calls the cycle helpers make. */
export type CycleLogger = Pick<pino.Logger, "info" | "error">;

/**
 * Log the start of a polling cycle.
 */
export function logCycleStart(
  logger: CycleLogger,
  cycle: number,
  context: Record<string, unknown> = {},
): void {
  logger.info({ cycle, ...context }, `→ cycle ${cycle} started`);
}

/**
 * Log a finished polling cycle with its duration and per-account counts.
 */
export function logCycleComplete(
  logger: CycleLogger,
  cycle: number,
  startTime: number,
  summary: Readonly<{ succeeded: number; failed: number; points: number }>,
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { cycle, durationMs, ...summary },
    `✓ cycle ${cycle} completed (${durationMs}ms): ` +
      `${summary.succeeded} ok, ${summary.failed} failed, ${summary.points} points`,
  );
}

/**
 * Log a cycle that threw before it could finish.
 */
export function logCycleFailed(
  logger: CycleLogger,
  cycle: number,
  error: unknown,
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { cycle, error: errorMessage },
    `✗ cycle ${cycle} failed: ${errorMessage}`,
  );
}
