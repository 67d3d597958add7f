/**
 * Collector Module - Error Types
 *
 * Recoverable per-account cycle failures. Both variants are logged and
 * skip the account for one cycle; neither stops the loop.
 */
import type { EmporiaError } from "../emporia/index.js";
import { formatEmporiaError } from "../emporia/errors.js";
import type { SinkError } from "../sink/index.js";
import { formatSinkError } from "../sink/errors.js";

export type CycleError =
  | {
      readonly type: "TIMEOUT";
      readonly account: string;
      readonly message: string;
    }
  | {
      readonly type: "FAILED";
      readonly account: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a TIMEOUT cycle error.
 */
export function cycleTimeout(account: string, message: string): CycleError {
  return { type: "TIMEOUT", account, message };
}

/**
 * Create a FAILED cycle error.
 */
export function cycleFailed(
  account: string,
  message: string,
  cause?: Error,
): CycleError {
  if (cause) {
    return { type: "FAILED", account, message, cause };
  }
  return { type: "FAILED", account, message };
}

export function fromEmporiaError(
  account: string,
  error: EmporiaError,
): CycleError {
  return error.type === "TIMEOUT"
    ? cycleTimeout(account, formatEmporiaError(error))
    : cycleFailed(account, formatEmporiaError(error));
}

export function fromSinkError(account: string, error: SinkError): CycleError {
  return error.type === "TIMEOUT"
    ? cycleTimeout(account, formatSinkError(error))
    : cycleFailed(account, formatSinkError(error));
}

/**
 * Wrap an unexpected exception.
 */
export function fromThrown(account: string, error: unknown): CycleError {
  const cause = error instanceof Error ? error : new Error(String(error));
  if (cause.name === "TimeoutError") {
    return cycleTimeout(account, cause.message);
  }
  return cycleFailed(account, cause.message, cause);
}

/**
 * Format a CycleError for logging.
 */
export function formatCycleError(error: CycleError): string {
  switch (error.type) {
    case "TIMEOUT":
      return `Timed out (${error.account}): ${error.message}`;
    case "FAILED":
      return `Failed (${error.account}): ${error.message}`;
  }
}
