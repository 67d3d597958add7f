/**
 * Sink Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type { JsonPoint, Sink, SinkKind } from "./schema.js";
export type { SinkError } from "./errors.js";

// Error utilities
export { formatSinkError } from "./errors.js";

// Service functions (side effects)
export { createInfluxSink, createMqttSink, createSink } from "./service.js";

// Pure transformations
export {
  buildTopic,
  pointsToJson,
  toInfluxPoint,
  toJsonPoint,
} from "./transform.js";
