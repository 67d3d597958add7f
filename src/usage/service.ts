/**
 * Usage Module - Service Layer
 *
 * Hierarchy walker: descends a device's channel tree, pulling series
 * from the Emporia session where the extraction mode asks for them and
 * appending output points to a shared accumulator.
 */
import { type Result, err, ok } from "neverthrow";

import type {
  EmporiaError,
  Granularity,
  UsageChannel,
  UsageDevice,
} from "../emporia/index.js";
import { createLogger } from "../logger.js";
import type {
  ExtractionContext,
  OutputPoint,
  PowerState,
  PowerStateMap,
} from "./schema.js";
import {
  convertSeries,
  detectTransition,
  getPowerState,
  isExcludedFromDetail,
  kwhToWatts,
  makePoint,
  powerStateKey,
  withPowerState,
} from "./transform.js";

const log = createLogger("usage");

/**
 * Walk a device tree depth-first, nested devices before their parent
 * channel, and append points to `points`.
 *
 * @returns Result with the updated power-state map or the first upstream error
 */
export async function extractDevicePoints(
  device: UsageDevice,
  context: ExtractionContext,
  powerStates: PowerStateMap,
  points: OutputPoint[],
): Promise<Result<PowerStateMap, EmporiaError>> {
  let states = powerStates;

  for (const channel of device.channels) {
    for (const nested of channel.nestedDevices) {
      const nestedResult = await extractDevicePoints(
        nested,
        context,
        states,
        points,
      );
      if (nestedResult.isErr()) {
        return err(nestedResult.error);
      }
      states = nestedResult.value;
    }

    const nameResult = await context.resolveChannelName(channel);
    if (nameResult.isErr()) {
      return err(nameResult.error);
    }

    const key = powerStateKey(channel);
    const channelResult = await extractChannelPoints(
      channel,
      nameResult.value,
      context,
      getPowerState(states, key),
      points,
    );
    if (channelResult.isErr()) {
      return err(channelResult.error);
    }
    states = withPowerState(states, key, channelResult.value);
  }

  return ok(states);
}

/**
 * Produce one channel's points for the context's mode.
 *
 * @returns Result with the channel's power state after its last reading
 */
async function extractChannelPoints(
  channel: UsageChannel,
  channelName: string,
  context: ExtractionContext,
  previous: PowerState,
  points: OutputPoint[],
): Promise<Result<PowerState, EmporiaError>> {
  const { mode } = context;
  const excluded = isExcludedFromDetail(channel.channelNum);

  if (mode.kind === "history") {
    if (excluded) {
      return ok(previous);
    }

    return fetchSeriesPoints(channel, channelName, context, {
      start: mode.start,
      end: mode.end,
      granularity: "MINUTE",
      detailed: false,
      state: previous,
      points,
    });
  }

  let state = previous;

  if (channel.usage !== null) {
    const watts = kwhToWatts(channel.usage, "MINUTE");
    const detected = detectTransition(state, watts, context.thresholdWatts);
    state = detected.state;
    points.push(
      makePoint(
        context.accountName,
        channelName,
        watts,
        context.stopTime,
        false,
        detected.transition,
      ),
    );
  }

  if (excluded || mode.detailedStart === null) {
    return ok(state);
  }

  // Per-second samples never carry transitions
  const detailed = await fetchSeriesPoints(channel, channelName, context, {
    start: mode.detailedStart,
    end: context.stopTime,
    granularity: "SECOND",
    detailed: true,
    state,
    points,
  });
  return detailed.map(() => state);
}

async function fetchSeriesPoints(
  channel: UsageChannel,
  channelName: string,
  context: ExtractionContext,
  request: Readonly<{
    start: Date;
    end: Date;
    granularity: Granularity;
    detailed: boolean;
    state: PowerState;
    points: OutputPoint[];
  }>,
): Promise<Result<PowerState, EmporiaError>> {
  const seriesResult = await context.session.getChannelUsageSeries(
    channel,
    request.start,
    request.end,
    request.granularity,
  );
  if (seriesResult.isErr()) {
    return err(seriesResult.error);
  }

  const converted = convertSeries({
    usage: seriesResult.value.usage,
    start: request.start,
    granularity: request.granularity,
    accountName: context.accountName,
    channelName,
    detailed: request.detailed,
    thresholdWatts: request.detailed ? null : context.thresholdWatts,
    state: request.state,
  });

  // A spread argument list overflows the stack on long per-second series.
  for (const point of converted.points) {
    request.points.push(point);
  }

  log.debug(
    {
      channel: channelName,
      granularity: request.granularity,
      samples: seriesResult.value.usage.length,
      points: converted.points.length,
    },
    "Series converted",
  );

  return ok(converted.state);
}
