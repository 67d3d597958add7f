/**
 * Sink Module - Error Types
 *
 * Typed error unions for writing points downstream.
 * Errors are values, not exceptions.
 */
import type { SinkKind } from "./schema.js";

export type SinkError =
  | {
      readonly type: "NOT_CONFIGURED";
      readonly message: string;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly sink: SinkKind;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly sink: SinkKind;
      readonly message: string;
    }
  | {
      readonly type: "RESET_FAILED";
      readonly sink: SinkKind;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a NOT_CONFIGURED error.
 */
export function notConfigured(message: string): SinkError {
  return { type: "NOT_CONFIGURED", message };
}

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(
  sink: SinkKind,
  message: string,
  cause?: Error,
): SinkError {
  if (cause) {
    return { type: "WRITE_FAILED", sink, message, cause };
  }
  return { type: "WRITE_FAILED", sink, message };
}

/**
 * Create a TIMEOUT error.
 */
export function writeTimeout(sink: SinkKind, message: string): SinkError {
  return { type: "TIMEOUT", sink, message };
}

/**
 * Create a RESET_FAILED error.
 */
export function resetFailed(
  sink: SinkKind,
  message: string,
  cause?: Error,
): SinkError {
  if (cause) {
    return { type: "RESET_FAILED", sink, message, cause };
  }
  return { type: "RESET_FAILED", sink, message };
}

/**
 * Format a SinkError for logging.
 */
export function formatSinkError(error: SinkError): string {
  switch (error.type) {
    case "NOT_CONFIGURED":
      return `Sink not configured: ${error.message}`;
    case "WRITE_FAILED":
      return `Write to ${error.sink} failed: ${error.message}`;
    case "TIMEOUT":
      return `Write to ${error.sink} timed out: ${error.message}`;
    case "RESET_FAILED":
      return `Reset of ${error.sink} failed: ${error.message}`;
  }
}
