/**
 * Emporia Module - Schemas and Types
 *
 * Raw response shapes of the Emporia customer API (validated with Zod)
 * and the device/usage trees the rest of the app works with.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { EmporiaError } from "./errors.js";

// =============================================================================
// Login
// =============================================================================

export type Credentials = Readonly<{
  username: string;
  password: string;
}>;

/**
 * Cognito InitiateAuth response. RefreshToken is absent on refresh calls.
 */
export const CognitoAuthResponseSchema = z.object({
  AuthenticationResult: z.object({
    IdToken: z.string().min(1),
    RefreshToken: z.string().optional(),
    ExpiresIn: z.number().positive().optional(),
  }),
});

export type CognitoAuthResponse = z.infer<typeof CognitoAuthResponseSchema>;

/**
 * Cached id token for the authtoken header.
 */
export type TokenCache = Readonly<{
  idToken: string;
  refreshToken: string | null;
  expiresAt: number;
}>;

// =============================================================================
// Device Discovery (GET /customers/devices)
// =============================================================================

export const RawChannelSchema = z.object({
  deviceGid: z.number(),
  channelNum: z.string(),
  name: z.string().nullish(),
});

export type RawChannel = z.infer<typeof RawChannelSchema>;

export type RawDevice = {
  deviceGid: number;
  locationProperties?: { deviceName?: string | null | undefined } | null;
  channels?: RawChannel[] | undefined;
  devices?: RawDevice[] | undefined;
};

export const RawDeviceSchema: z.ZodType<RawDevice> = z.lazy(() =>
  z.object({
    deviceGid: z.number(),
    locationProperties: z
      .object({ deviceName: z.string().nullish() })
      .nullish(),
    channels: z.array(RawChannelSchema).optional(),
    devices: z.array(RawDeviceSchema).optional(),
  }),
);

export const CustomerDevicesResponseSchema = z.object({
  devices: z.array(RawDeviceSchema),
});

export type CustomerDevicesResponse = z.infer<
  typeof CustomerDevicesResponseSchema
>;

// =============================================================================
// Usage (GET /AppAPI?apiMethod=getDeviceListUsages)
// =============================================================================

export type RawChannelUsage = {
  deviceGid: number;
  channelNum: string;
  name?: string | null | undefined;
  usage?: number | null | undefined;
  nestedDevices?: RawDeviceUsage[] | undefined;
};

export type RawDeviceUsage = {
  deviceGid: number;
  channelUsages: RawChannelUsage[];
};

export const RawDeviceUsageSchema: z.ZodType<RawDeviceUsage> = z.lazy(() =>
  z.object({
    deviceGid: z.number(),
    channelUsages: z.array(
      z.object({
        deviceGid: z.number(),
        channelNum: z.string(),
        name: z.string().nullish(),
        usage: z.number().nullish(),
        nestedDevices: z.array(RawDeviceUsageSchema).optional(),
      }),
    ),
  }),
);

export const DeviceListUsagesResponseSchema = z.object({
  deviceListUsages: z.object({
    instant: z.string().optional(),
    devices: z.array(RawDeviceUsageSchema),
  }),
});

export type DeviceListUsagesResponse = z.infer<
  typeof DeviceListUsagesResponseSchema
>;

// =============================================================================
// Chart Usage (GET /AppAPI?apiMethod=getChartUsage)
// =============================================================================

export const ChartUsageResponseSchema = z.object({
  firstUsageInstant: z.string(),
  usageList: z.array(z.number().nullable()),
});

export type ChartUsageResponse = z.infer<typeof ChartUsageResponseSchema>;

// =============================================================================
// Domain Types
// =============================================================================

/**
 * Resolution of a usage series request.
 */
export type Granularity = "SECOND" | "MINUTE";

/**
 * A metered circuit as discovered through the device list.
 */
export type ChannelInfo = Readonly<{
  deviceGid: number;
  channelNum: string;
  name: string | null;
}>;

/**
 * A monitoring device. Nested devices are flattened into their own entries.
 */
export type DeviceInfo = Readonly<{
  gid: number;
  name: string;
  channels: ReadonlyArray<ChannelInfo>;
}>;

/**
 * A channel with the energy used over the queried interval (kWh).
 */
export type UsageChannel = Readonly<{
  deviceGid: number;
  channelNum: string;
  name: string | null;
  usage: number | null;
  nestedDevices: ReadonlyArray<UsageDevice>;
}>;

/**
 * Usage tree for one device. Children are reachable only through channels.
 */
export type UsageDevice = Readonly<{
  gid: number;
  channels: ReadonlyArray<UsageChannel>;
}>;

/**
 * kWh per slot starting at firstUsageInstant; null marks an upstream gap.
 */
export type UsageSeries = Readonly<{
  usage: ReadonlyArray<number | null>;
  firstUsageInstant: Date;
}>;

/**
 * Authenticated handle on the Emporia cloud for one account.
 */
export interface EmporiaSession {
  listDevices(): Promise<Result<ReadonlyArray<DeviceInfo>, EmporiaError>>;
  getUsage(
    deviceGids: ReadonlyArray<number>,
    asOf: Date,
  ): Promise<Result<ReadonlyMap<number, UsageDevice>, EmporiaError>>;
  getChannelUsageSeries(
    channel: UsageChannel,
    start: Date,
    end: Date,
    granularity: Granularity,
  ): Promise<Result<UsageSeries, EmporiaError>>;
}
