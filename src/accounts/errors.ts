/**
 * Accounts Module - Error Types
 *
 * Typed error unions for loading the accounts file.
 * Errors are values, not exceptions.
 */
import type { ZodIssue } from "zod";

export type AccountsError =
  | {
      readonly type: "FILE_UNREADABLE";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_ACCOUNTS";
      readonly path: string;
      readonly issues: ReadonlyArray<ZodIssue>;
    };

/**
 * Create a FILE_UNREADABLE error.
 */
export function fileUnreadable(
  path: string,
  message: string,
  cause?: Error,
): AccountsError {
  if (cause) {
    return { type: "FILE_UNREADABLE", path, message, cause };
  }
  return { type: "FILE_UNREADABLE", path, message };
}

/**
 * Create an INVALID_ACCOUNTS error.
 */
export function invalidAccounts(
  path: string,
  issues: ReadonlyArray<ZodIssue>,
): AccountsError {
  return { type: "INVALID_ACCOUNTS", path, issues };
}

/**
 * Format an AccountsError for logging.
 */
export function formatAccountsError(error: AccountsError): string {
  switch (error.type) {
    case "FILE_UNREADABLE":
      return `Cannot read ${error.path}: ${error.message}`;
    case "INVALID_ACCOUNTS":
      return `Invalid accounts in ${error.path}: ${error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`;
  }
}
