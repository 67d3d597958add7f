/**
 * Emporia Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  ChannelInfo,
  Credentials,
  DeviceInfo,
  EmporiaSession,
  Granularity,
  UsageChannel,
  UsageDevice,
  UsageSeries,
} from "./schema.js";
export type { EmporiaError } from "./errors.js";

// Error utilities
export { formatEmporiaError } from "./errors.js";

// Service functions (side effects)
export { createEmporiaSession, loginEmporia } from "./service.js";

// Pure transformations
export {
  MAINS_CHANNEL_NUM,
  buildChartUsageUrl,
  buildDeviceListUsagesUrl,
  parseChartUsage,
  parseCustomerDevices,
  parseDeviceListUsages,
} from "./transform.js";
