/**
 * Emporia Module - Error Types
 *
 * Typed error unions for Emporia cloud API operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while talking to the Emporia cloud.
 */
export type EmporiaError =
  | {
      readonly type: "AUTH_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly operation: string;
      readonly message: string;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    };

/**
 * Create an AUTH_FAILED error.
 */
export function authFailed(message: string, cause?: Error): EmporiaError {
  if (cause) {
    return { type: "AUTH_FAILED", message, cause };
  }
  return { type: "AUTH_FAILED", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(operation: string): EmporiaError {
  return { type: "TIMEOUT", operation, message: `${operation} timed out` };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): EmporiaError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  message: string,
  responseData?: unknown,
): EmporiaError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

/**
 * Format an EmporiaError for logging.
 */
export function formatEmporiaError(error: EmporiaError): string {
  switch (error.type) {
    case "AUTH_FAILED":
      return `Auth failed: ${error.message}`;
    case "TIMEOUT":
      return `Timeout: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
  }
}
