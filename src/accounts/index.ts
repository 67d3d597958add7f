/**
 * Accounts Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type { Account, AccountConfig, DeviceNaming } from "./schema.js";
export type { AccountsError } from "./errors.js";
export type { LoginFn } from "./service.js";

// Error utilities
export { formatAccountsError } from "./errors.js";

// Service functions (side effects)
export {
  createAccount,
  ensureSession,
  invalidateSession,
  loadAccountsFile,
  lookupChannelName,
  lookupDeviceName,
  populateDevices,
} from "./service.js";

// Pure transformations
export {
  buildIndices,
  channelKey,
  resolveChannelName,
  toCredentials,
} from "./transform.js";
