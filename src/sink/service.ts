/**
 * Sink Module - Service Layer
 *
 * InfluxDB v2 writer and MQTT publisher behind the Sink interface.
 * Uses Result types for explicit error handling.
 */
import { InfluxDB, RequestTimedOutError } from "@influxdata/influxdb-client";
import { DeleteAPI } from "@influxdata/influxdb-client-apis";
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import { getInfluxConfig, getMqttSinkConfig } from "../config.js";
import { createLogger } from "../logger.js";
import type { OutputPoint } from "../usage/index.js";
import type { SinkError } from "./errors.js";
import {
  notConfigured,
  resetFailed,
  writeFailed,
  writeTimeout,
} from "./errors.js";
import type { Sink } from "./schema.js";
import {
  RESET_PREDICATE,
  RESET_START,
  buildTopic,
  formatResetStop,
  pointsToJson,
  toInfluxPoint,
} from "./transform.js";

const log = createLogger("sink");

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// =============================================================================
// InfluxDB
// =============================================================================

export type InfluxSinkConfig = Readonly<{
  url: string;
  token: string;
  org: string;
  bucket: string;
  sslVerify: boolean;
  timeoutMs: number;
}>;

/** Points per write request. */
export const INFLUX_CHUNK_SIZE = 5000;

/**
 * Sink writing to an InfluxDB v2 bucket with millisecond precision.
 *
 * Each chunk is flushed and awaited on its own; any rejected request
 * fails the write.
 */
export function createInfluxSink(influxConfig: InfluxSinkConfig): Sink {
  const influx = new InfluxDB({
    url: influxConfig.url,
    token: influxConfig.token,
    timeout: influxConfig.timeoutMs,
    transportOptions: { rejectUnauthorized: influxConfig.sslVerify },
  });

  log.info(
    { url: influxConfig.url, org: influxConfig.org, bucket: influxConfig.bucket },
    "InfluxDB sink ready",
  );

  return {
    kind: "influxdb",

    async write(
      accountName: string,
      points: ReadonlyArray<OutputPoint>,
    ): Promise<Result<void, SinkError>> {
      const writeApi = influx.getWriteApi(
        influxConfig.org,
        influxConfig.bucket,
        "ms",
        {
          batchSize: INFLUX_CHUNK_SIZE + 1,
          flushInterval: 0,
          maxRetries: 0,
        },
      );

      let written = 0;
      try {
        while (written < points.length) {
          const chunk = points.slice(written, written + INFLUX_CHUNK_SIZE);
          writeApi.writePoints(chunk.map(toInfluxPoint));
          await writeApi.flush();
          written += chunk.length;
        }
        return ok(undefined);
      } catch (error) {
        log.error(
          { account: accountName, written, total: points.length },
          "InfluxDB write rejected",
        );
        if (error instanceof RequestTimedOutError) {
          return err(writeTimeout("influxdb", error.message));
        }
        const cause = toError(error);
        return err(
          writeFailed(
            "influxdb",
            `Failed to write ${points.length} points for ${accountName}`,
            cause,
          ),
        );
      } finally {
        await writeApi.close().catch((error: unknown) => {
          log.warn(
            { error: toError(error).message },
            "Failed to close InfluxDB writer",
          );
        });
      }
    },

    async reset(until: Date): Promise<Result<void, SinkError>> {
      log.info({ bucket: influxConfig.bucket }, "Resetting database");
      try {
        await new DeleteAPI(influx).postDelete({
          org: influxConfig.org,
          bucket: influxConfig.bucket,
          body: {
            start: RESET_START,
            stop: formatResetStop(until),
            predicate: RESET_PREDICATE,
          },
        });
        return ok(undefined);
      } catch (error) {
        const cause = toError(error);
        return err(resetFailed("influxdb", cause.message, cause));
      }
    },

    async close(): Promise<void> {
      log.info("InfluxDB sink closed");
    },
  };
}

// =============================================================================
// MQTT
// =============================================================================

export type MqttSinkConfig = Readonly<{
  brokerUrl: string;
  topicPrefix: string;
}>;

/**
 * The part of the MQTT client the sink uses.
 */
export type MqttPublisher = Pick<
  MqttClient,
  "connected" | "publishAsync" | "endAsync"
>;

/**
 * Sink publishing each account batch as one JSON array (QoS 1).
 *
 * @param client - Optional pre-built client (tests)
 */
export function createMqttSink(
  mqttConfig: MqttSinkConfig,
  client: MqttPublisher = connectMqtt(mqttConfig.brokerUrl),
): Sink {
  return {
    kind: "mqtt",

    async write(
      accountName: string,
      points: ReadonlyArray<OutputPoint>,
    ): Promise<Result<void, SinkError>> {
      if (!client.connected) {
        return err(writeFailed("mqtt", "MQTT client not connected"));
      }

      const topic = buildTopic(mqttConfig.topicPrefix, accountName);
      try {
        await client.publishAsync(topic, pointsToJson(points), { qos: 1 });
        log.debug({ topic, points: points.length }, "Batch published");
        return ok(undefined);
      } catch (error) {
        const cause = toError(error);
        return err(writeFailed("mqtt", `Publish to ${topic} failed`, cause));
      }
    },

    async reset(): Promise<Result<void, SinkError>> {
      log.warn("Reset is not supported by the MQTT sink; skipping");
      return ok(undefined);
    },

    async close(): Promise<void> {
      log.info("Disconnecting MQTT client...");
      await client.endAsync();
    },
  };
}

function connectMqtt(brokerUrl: string): MqttClient {
  log.info({ broker: brokerUrl }, "Connecting to MQTT broker...");

  const client = mqtt.connect(brokerUrl, {
    reconnectPeriod: 5000, // Reconnect every 5 seconds
    connectTimeout: 10000, // 10 second connection timeout
  });

  client.on("connect", () => {
    log.info("Connected to MQTT broker");
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });

  return client;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build the sink selected by SINK_TYPE.
 */
export function createSink(): Result<Sink, SinkError> {
  const influxConfig = getInfluxConfig();
  if (influxConfig) {
    return ok(createInfluxSink(influxConfig));
  }

  const mqttConfig = getMqttSinkConfig();
  if (mqttConfig) {
    return ok(createMqttSink(mqttConfig));
  }

  return err(notConfigured("Neither InfluxDB nor MQTT sink is configured"));
}
