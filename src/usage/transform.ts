/**
 * Usage Module - Pure Transformations
 *
 * Hysteresis, unit conversion and point construction.
 * No side effects, no I/O - just data in, data out.
 */
import type { Granularity, UsageChannel } from "../emporia/index.js";
import type {
  BackfillWindow,
  OutputPoint,
  PowerState,
  PowerStateMap,
  Transition,
  TransitionResult,
} from "./schema.js";
import { MEASUREMENT } from "./schema.js";

// =============================================================================
// Constants
// =============================================================================

const MINUTES_IN_AN_HOUR = 60;
const SECONDS_IN_A_MINUTE = 60;
const WATTS_IN_A_KW = 1000;

/**
 * kWh-per-slot to watts, by slot length.
 */
export const KWH_TO_WATTS: Readonly<Record<Granularity, number>> = {
  MINUTE: MINUTES_IN_AN_HOUR * WATTS_IN_A_KW,
  SECOND: SECONDS_IN_A_MINUTE * MINUTES_IN_AN_HOUR * WATTS_IN_A_KW,
};

const SLOT_MS: Readonly<Record<Granularity, number>> = {
  MINUTE: 60 * 1000,
  SECOND: 1000,
};

/**
 * Channels that only ever get the coarse realtime point.
 */
export const EXCLUDED_DETAIL_CHANNEL_NUMS: ReadonlyArray<string> = [
  "Balance",
  "TotalUsage",
];

const HOUR_MS = 60 * 60 * 1000;
const HALF_DAY_MS = 12 * HOUR_MS;
const DAY_MS = 24 * HOUR_MS;

// =============================================================================
// Transition Detection
// =============================================================================

/**
 * Single-threshold hysteresis. The first observation always emits.
 *
 * @example
 * detectTransition("unknown", 600, 1) // { transition: "on", state: "on" }
 * detectTransition("on", 0.5, 1)      // { transition: "off", state: "off" }
 * detectTransition("on", 1, 1)        // { transition: null, state: "on" }
 */
export function detectTransition(
  previous: PowerState,
  watts: number,
  threshold: number,
): TransitionResult {
  if (previous === "unknown") {
    return watts > threshold
      ? { transition: "on", state: "on" }
      : { transition: "off", state: "off" };
  }

  if (previous === "on" && watts < threshold) {
    return { transition: "off", state: "off" };
  }

  if (previous === "off" && watts > threshold) {
    return { transition: "on", state: "on" };
  }

  return { transition: null, state: previous };
}

// =============================================================================
// Point Synthesis
// =============================================================================

/**
 * Build a frozen output point. The transition field is present only when given.
 */
export function makePoint(
  accountName: string,
  channelName: string,
  watts: number,
  timestamp: Date,
  detailed: boolean,
  transition: Transition | null = null,
): OutputPoint {
  return Object.freeze({
    measurement: MEASUREMENT,
    tags: {
      account_name: accountName,
      device_name: channelName,
      detailed,
    },
    fields: transition ? { usage: watts, transition } : { usage: watts },
    timestamp,
  });
}

// =============================================================================
// Unit Conversion
// =============================================================================

/**
 * Convert energy used over one slot into average power.
 */
export function kwhToWatts(kwh: number, granularity: Granularity): number {
  return KWH_TO_WATTS[granularity] * kwh;
}

/**
 * Whether a channel is limited to realtime points.
 */
export function isExcludedFromDetail(channelNum: string): boolean {
  return EXCLUDED_DETAIL_CHANNEL_NUMS.includes(channelNum);
}

export type SeriesConversion = Readonly<{
  points: OutputPoint[];
  state: PowerState;
}>;

/**
 * Turn a kWh series into points timestamped start + index slots.
 * Null samples are gaps: they produce no point and keep later samples
 * at their own slot. With a threshold, transitions are chained from
 * `state`; without one, no transitions are emitted and state is untouched.
 */
export function convertSeries(
  args: Readonly<{
    usage: ReadonlyArray<number | null>;
    start: Date;
    granularity: Granularity;
    accountName: string;
    channelName: string;
    detailed: boolean;
    thresholdWatts: number | null;
    state: PowerState;
  }>,
): SeriesConversion {
  const points: OutputPoint[] = [];
  let state = args.state;
  const startMs = args.start.getTime();

  args.usage.forEach((kwh, index) => {
    if (kwh === null) {
      return;
    }

    const watts = kwhToWatts(kwh, args.granularity);
    const timestamp = new Date(startMs + index * SLOT_MS[args.granularity]);

    let transition: Transition | null = null;
    if (args.thresholdWatts !== null) {
      const detected = detectTransition(state, watts, args.thresholdWatts);
      transition = detected.transition;
      state = detected.state;
    }

    points.push(
      makePoint(
        args.accountName,
        args.channelName,
        watts,
        timestamp,
        args.detailed,
        transition,
      ),
    );
  });

  return { points, state };
}

// =============================================================================
// Power State Map
// =============================================================================

/**
 * Key under which a channel's power state is tracked.
 */
export function powerStateKey(
  channel: Pick<UsageChannel, "deviceGid" | "channelNum">,
): string {
  return `${channel.deviceGid}:${channel.channelNum}`;
}

export function getPowerState(states: PowerStateMap, key: string): PowerState {
  return states.get(key) ?? "unknown";
}

/**
 * Return a copy of the map with one state replaced.
 */
export function withPowerState(
  states: PowerStateMap,
  key: string,
  state: PowerState,
): PowerStateMap {
  if (states.get(key) === state) {
    return states;
  }
  const next = new Map(states);
  next.set(key, state);
  return next;
}

// =============================================================================
// Scheduling Arithmetic
// =============================================================================

/**
 * End of the queried interval: now minus the settling lag.
 */
export function computeStopTime(now: Date, lagSecs: number): Date {
  return new Date(now.getTime() - lagSecs * 1000);
}

/**
 * Whether this cycle pulls per-second samples.
 */
export function shouldCollectDetails(
  settings: Readonly<{
    detailedDataEnabled: boolean;
    detailedIntervalSecs: number;
  }>,
  stopTime: Date,
  detailedStart: Date,
): boolean {
  if (!settings.detailedDataEnabled || settings.detailedIntervalSecs <= 0) {
    return false;
  }
  const elapsedSecs = (stopTime.getTime() - detailedStart.getTime()) / 1000;
  return elapsedSecs >= settings.detailedIntervalSecs;
}

/**
 * Half-day backfill windows, newest first. For each day the later half
 * comes before the earlier one, so together they cover
 * [stopTime - historyDays * 24h, stopTime) without gap or overlap.
 *
 * @example
 * planBackfillWindows(stop, 1)
 * // [{ day: 0, half: "later", start: stop-12h, end: stop },
 * //  { day: 0, half: "earlier", start: stop-24h, end: stop-12h }]
 */
export function planBackfillWindows(
  stopTime: Date,
  historyDays: number,
): BackfillWindow[] {
  const stopMs = stopTime.getTime();
  const windows: BackfillWindow[] = [];

  for (let day = 0; day < historyDays; day++) {
    const dayEnd = stopMs - day * DAY_MS;
    const dayStart = stopMs - (day + 1) * DAY_MS;

    windows.push({
      day,
      half: "later",
      start: new Date(dayStart + HALF_DAY_MS),
      end: new Date(dayEnd),
    });
    windows.push({
      day,
      half: "earlier",
      start: new Date(dayStart),
      end: new Date(dayStart + HALF_DAY_MS),
    });
  }

  return windows;
}
