/**
 * Sink Module - Pure Transformations
 *
 * Output point encodings for InfluxDB and MQTT.
 */
import { Point } from "@influxdata/influxdb-client";

import { MEASUREMENT, type OutputPoint } from "../usage/schema.js";
import type { JsonPoint } from "./schema.js";

/** Predicate selecting everything this service writes. */
export const RESET_PREDICATE = `_measurement="${MEASUREMENT}"`;

export const RESET_START = "1970-01-01T00:00:00Z";

/**
 * Encode an output point for the InfluxDB write API.
 * The detailed tag is written as "true"/"false".
 */
export function toInfluxPoint(point: OutputPoint): Point {
  const influxPoint = new Point(point.measurement)
    .tag("account_name", point.tags.account_name)
    .tag("device_name", point.tags.device_name)
    .tag("detailed", String(point.tags.detailed))
    .floatField("usage", point.fields.usage)
    .timestamp(point.timestamp);

  if (point.fields.transition !== undefined) {
    influxPoint.stringField("transition", point.fields.transition);
  }

  return influxPoint;
}

/**
 * Encode an output point as plain JSON.
 */
export function toJsonPoint(point: OutputPoint): JsonPoint {
  return {
    measurement: point.measurement,
    tags: { ...point.tags },
    fields: { ...point.fields },
    time: point.timestamp.toISOString(),
  };
}

/**
 * Serialize a batch for one MQTT message.
 */
export function pointsToJson(points: ReadonlyArray<OutputPoint>): string {
  return JSON.stringify(points.map(toJsonPoint));
}

/**
 * Topic for an account's batches. MQTT wildcard and level characters in
 * the account name are replaced with '_'.
 *
 * @example
 * buildTopic("energy/usage", "home #1") // "energy/usage/home _1"
 */
export function buildTopic(prefix: string, accountName: string): string {
  const safeName = accountName.replace(/[/+#]/g, "_");
  const base = prefix.endsWith("/") ? prefix.slice(0, -1) : prefix;
  return `${base}/${safeName}`;
}

/**
 * Format a reset window end for the delete API (second precision, UTC).
 */
export function formatResetStop(until: Date): string {
  return `${until.toISOString().slice(0, 19)}Z`;
}
