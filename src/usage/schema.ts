/**
 * Usage Module - Schemas and Types
 *
 * Output points, power states and the context the hierarchy walker
 * runs with.
 */
import type { Result } from "neverthrow";

import type {
  EmporiaError,
  EmporiaSession,
  UsageChannel,
} from "../emporia/index.js";

// =============================================================================
// Power State
// =============================================================================

/**
 * Last known on/off state of a channel. "unknown" until first observed.
 */
export type PowerState = "unknown" | "on" | "off";

/**
 * Event emitted when a reading crosses the power-on threshold.
 */
export type Transition = "on" | "off";

export type TransitionResult = Readonly<{
  transition: Transition | null;
  state: PowerState;
}>;

/**
 * Power state per channel key ("gid:channelNum").
 */
export type PowerStateMap = ReadonlyMap<string, PowerState>;

// =============================================================================
// Output Point
// =============================================================================

export const MEASUREMENT = "energy_usage";

export type PointTags = Readonly<{
  account_name: string;
  device_name: string;
  detailed: boolean;
}>;

export type PointFields = Readonly<{
  /** Watts */
  usage: number;
  transition?: Transition;
}>;

/**
 * One time-series record destined for the sink.
 */
export type OutputPoint = Readonly<{
  measurement: typeof MEASUREMENT;
  tags: PointTags;
  fields: PointFields;
  timestamp: Date;
}>;

// =============================================================================
// Extraction
// =============================================================================

/**
 * What a walk over a device tree produces.
 * - realtime: one point per channel at stopTime, plus per-second samples
 *   over [detailedStart, stopTime) when detailedStart is set
 * - history: per-minute samples over [start, end)
 */
export type ExtractionMode =
  | { readonly kind: "realtime"; readonly detailedStart: Date | null }
  | { readonly kind: "history"; readonly start: Date; readonly end: Date };

export type ExtractionContext = Readonly<{
  accountName: string;
  session: Pick<EmporiaSession, "getChannelUsageSeries">;
  resolveChannelName: (
    channel: UsageChannel,
  ) => Promise<Result<string, EmporiaError>>;
  thresholdWatts: number;
  stopTime: Date;
  mode: ExtractionMode;
}>;

/**
 * A half-day slice of the startup backfill.
 */
export type BackfillWindow = Readonly<{
  /** 0 = the 24h before stopTime */
  day: number;
  half: "later" | "earlier";
  start: Date;
  end: Date;
}>;
