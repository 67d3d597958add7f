/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Energy Usage Collector configuration covering:
 * - Server settings (status API)
 * - Polling cadence, detailed data and historical backfill
 * - Emporia cloud API endpoints
 * - Time-series sink (InfluxDB or MQTT)
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

/** Backfill never reaches further back than a week. */
export const MAX_HISTORY_DAYS = 7;

const ConfigSchema = z
  .object({
    // ==========================================================================
    // Server Configuration
    // ==========================================================================
    PORT: z.coerce.number().default(8084).describe("Status API port"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development")
      .describe("Runtime environment"),
    APP_NAME: z.string().default("EnergyCollector").describe("Application name"),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .default("info")
      .describe("Pino log level"),

    // ==========================================================================
    // Accounts
    // ==========================================================================
    ACCOUNTS_FILE: z
      .string()
      .min(1)
      .default("./accounts.json")
      .describe("JSON file listing Emporia accounts and channel names"),

    // ==========================================================================
    // Polling & Extraction
    // ==========================================================================
    UPDATE_INTERVAL_SECS: z.coerce
      .number()
      .positive()
      .default(60)
      .describe("Seconds between polling cycles"),
    DETAILED_DATA_ENABLED: envBoolean(false).describe(
      "Collect per-second usage samples",
    ),
    DETAILED_INTERVAL_SECS: z.coerce
      .number()
      .nonnegative()
      .default(3600)
      .describe("Seconds between per-second usage pulls"),
    LAG_SECS: z.coerce
      .number()
      .nonnegative()
      .default(5)
      .describe("Seconds to stay behind now so upstream data has settled"),
    HISTORY_DAYS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(0)
      .transform((days) => Math.min(days, MAX_HISTORY_DAYS))
      .describe("Days of per-minute history to backfill on startup (max 7)"),
    POWER_ON_THRESHOLD_WATTS: z.coerce
      .number()
      .nonnegative()
      .default(1)
      .describe("Wattage above which a channel counts as powered on"),
    BACKFILL_PAUSE_SECS: z.coerce
      .number()
      .nonnegative()
      .default(5)
      .describe("Pause after each backfill window (upstream rate limits)"),
    REQUEST_TIMEOUT_MS: z.coerce
      .number()
      .positive()
      .default(10000)
      .describe("HTTP timeout for Emporia and InfluxDB requests (ms)"),

    // ==========================================================================
    // Emporia Cloud API
    // ==========================================================================
    EMPORIA_API_URL: z
      .string()
      .url()
      .default("https://api.emporiaenergy.com")
      .describe("Emporia customer API base URL"),
    EMPORIA_COGNITO_URL: z
      .string()
      .url()
      .default("https://cognito-idp.us-east-2.amazonaws.com/")
      .describe("Cognito identity provider endpoint used for login"),
    EMPORIA_CLIENT_ID: z
      .string()
      .min(1)
      .default("4qte47jbstod8apnfic0bunmrq")
      .describe("Cognito app client id"),

    // ==========================================================================
    // Sink
    // ==========================================================================
    SINK_TYPE: z
      .enum(["influxdb", "mqtt"])
      .default("influxdb")
      .describe("Where usage points are written"),

    INFLUX_URL: optionalString.describe("InfluxDB v2 URL"),
    INFLUX_TOKEN: optionalString.describe("InfluxDB API token"),
    INFLUX_ORG: optionalString.describe("InfluxDB organisation"),
    INFLUX_BUCKET: optionalString.describe("InfluxDB bucket"),
    INFLUX_RESET: envBoolean(false).describe(
      "Delete all energy_usage points on startup",
    ),
    INFLUX_SSL_VERIFY: envBoolean(true).describe(
      "Verify the InfluxDB server certificate",
    ),

    MQTT_BROKER_URL: optionalString.describe("MQTT broker connection URL"),
    MQTT_TOPIC_PREFIX: z
      .string()
      .default("energy/usage")
      .describe("Topic prefix; points are published to <prefix>/<account>"),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.SINK_TYPE === "influxdb") {
      for (const key of [
        "INFLUX_URL",
        "INFLUX_TOKEN",
        "INFLUX_ORG",
        "INFLUX_BUCKET",
      ] as const) {
        if (!cfg[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required when SINK_TYPE=influxdb`,
          });
        }
      }
    }
    if (cfg.SINK_TYPE === "mqtt" && !cfg.MQTT_BROKER_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MQTT_BROKER_URL"],
        message: "MQTT_BROKER_URL is required when SINK_TYPE=mqtt",
      });
    }
  });

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Polling and extraction settings consumed by the collector.
 */
export type CollectorSettings = Readonly<{
  updateIntervalSecs: number;
  detailedDataEnabled: boolean;
  detailedIntervalSecs: number;
  lagSecs: number;
  historyDays: number;
  powerOnThresholdWatts: number;
  backfillPauseSecs: number;
}>;

export function getCollectorSettings(): CollectorSettings {
  return {
    updateIntervalSecs: config.UPDATE_INTERVAL_SECS,
    detailedDataEnabled: config.DETAILED_DATA_ENABLED,
    detailedIntervalSecs: config.DETAILED_INTERVAL_SECS,
    lagSecs: config.LAG_SECS,
    historyDays: config.HISTORY_DAYS,
    powerOnThresholdWatts: config.POWER_ON_THRESHOLD_WATTS,
    backfillPauseSecs: config.BACKFILL_PAUSE_SECS,
  };
}

/**
 * Emporia endpoints and request timeout.
 */
export function getEmporiaConfig(): Readonly<{
  apiUrl: string;
  cognitoUrl: string;
  clientId: string;
  timeoutMs: number;
}> {
  return {
    apiUrl: config.EMPORIA_API_URL,
    cognitoUrl: config.EMPORIA_COGNITO_URL,
    clientId: config.EMPORIA_CLIENT_ID,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  };
}

/**
 * InfluxDB sink configuration.
 * Returns null unless the InfluxDB sink is selected.
 */
export function getInfluxConfig(): Readonly<{
  url: string;
  token: string;
  org: string;
  bucket: string;
  reset: boolean;
  sslVerify: boolean;
  timeoutMs: number;
}> | null {
  if (
    config.SINK_TYPE !== "influxdb" ||
    !config.INFLUX_URL ||
    !config.INFLUX_TOKEN ||
    !config.INFLUX_ORG ||
    !config.INFLUX_BUCKET
  ) {
    return null;
  }

  return {
    url: config.INFLUX_URL,
    token: config.INFLUX_TOKEN,
    org: config.INFLUX_ORG,
    bucket: config.INFLUX_BUCKET,
    reset: config.INFLUX_RESET,
    sslVerify: config.INFLUX_SSL_VERIFY,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  };
}

/**
 * MQTT sink configuration.
 * Returns null unless the MQTT sink is selected.
 */
export function getMqttSinkConfig(): Readonly<{
  brokerUrl: string;
  topicPrefix: string;
}> | null {
  if (config.SINK_TYPE !== "mqtt" || !config.MQTT_BROKER_URL) {
    return null;
  }

  return {
    brokerUrl: config.MQTT_BROKER_URL,
    topicPrefix: config.MQTT_TOPIC_PREFIX,
  };
}
