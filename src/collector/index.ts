/**
 * Collector Module - Public API
 *
 * Poll/backfill scheduler and its state.
 */

// Types
export type {
  AccountOutcome,
  AccountStatus,
  Collector,
  CollectorDeps,
  CollectorState,
  CycleSummary,
} from "./schema.js";
export type { CycleError } from "./errors.js";
export type { Pause } from "./pause.js";

// Error utilities
export { formatCycleError } from "./errors.js";

// Service functions
export { createCollector } from "./service.js";
export { createPause } from "./pause.js";
