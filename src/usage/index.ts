/**
 * Usage Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  BackfillWindow,
  ExtractionContext,
  ExtractionMode,
  OutputPoint,
  PowerState,
  PowerStateMap,
  Transition,
} from "./schema.js";

export { MEASUREMENT } from "./schema.js";

// Service functions (side effects)
export { extractDevicePoints } from "./service.js";

// Pure transformations
export {
  EXCLUDED_DETAIL_CHANNEL_NUMS,
  computeStopTime,
  convertSeries,
  detectTransition,
  isExcludedFromDetail,
  kwhToWatts,
  makePoint,
  planBackfillWindows,
  powerStateKey,
  shouldCollectDetails,
} from "./transform.js";
