/**
 * Sink Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { OutputPoint } from "../usage/index.js";
import type { SinkError } from "./errors.js";

export type SinkKind = "influxdb" | "mqtt";

/**
 * Batch writer for output points. Retries and durability are the sink's
 * own business; the collector writes each account's batch once per cycle.
 */
export interface Sink {
  readonly kind: SinkKind;
  write(
    accountName: string,
    points: ReadonlyArray<OutputPoint>,
  ): Promise<Result<void, SinkError>>;
  /** Delete every energy_usage point up to `until`. */
  reset(until: Date): Promise<Result<void, SinkError>>;
  close(): Promise<void>;
}

/**
 * Wire form of a point on the MQTT sink.
 */
export type JsonPoint = Readonly<{
  measurement: string;
  tags: Readonly<{
    account_name: string;
    device_name: string;
    detailed: boolean;
  }>;
  fields: Readonly<{ usage: number; transition?: string }>;
  time: string;
}>;
