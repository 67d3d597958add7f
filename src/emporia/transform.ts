/**
 * Emporia Module - Pure Transformations
 *
 * Request building and response parsing for the Emporia cloud API.
 * No side effects, no I/O - just data in, data out.
 */
import type {
  ChannelInfo,
  ChartUsageResponse,
  CognitoAuthResponse,
  Credentials,
  CustomerDevicesResponse,
  DeviceInfo,
  DeviceListUsagesResponse,
  Granularity,
  RawDevice,
  RawDeviceUsage,
  TokenCache,
  UsageChannel,
  UsageDevice,
  UsageSeries,
} from "./schema.js";

// =============================================================================
// Constants
// =============================================================================

/** Channel number of a device's combined mains reading. */
export const MAINS_CHANNEL_NUM = "1,2,3";

export const ENERGY_UNIT = "KilowattHours";

/**
 * Scale parameter per series granularity.
 */
export const SCALE_BY_GRANULARITY: Readonly<Record<Granularity, string>> = {
  SECOND: "1S",
  MINUTE: "1MIN",
};

/** Refresh the id token this long before it actually expires. */
export const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;

/** Cognito id tokens live for an hour unless told otherwise. */
export const DEFAULT_TOKEN_TTL_SECS = 3600;

const COGNITO_TARGET = "AWSCognitoIdentityProviderService.InitiateAuth";

// =============================================================================
// Login
// =============================================================================

/**
 * Headers for a Cognito InitiateAuth call.
 */
export function buildCognitoHeaders(): Record<string, string> {
  return {
    "Content-Type": "application/x-amz-json-1.1",
    "X-Amz-Target": COGNITO_TARGET,
  };
}

/**
 * Body for a username/password login.
 */
export function buildPasswordAuthBody(
  clientId: string,
  credentials: Credentials,
): string {
  return JSON.stringify({
    AuthFlow: "USER_PASSWORD_AUTH",
    ClientId: clientId,
    AuthParameters: {
      USERNAME: credentials.username,
      PASSWORD: credentials.password,
    },
  });
}

/**
 * Body for exchanging a refresh token for a new id token.
 */
export function buildRefreshAuthBody(
  clientId: string,
  refreshToken: string,
): string {
  return JSON.stringify({
    AuthFlow: "REFRESH_TOKEN_AUTH",
    ClientId: clientId,
    AuthParameters: {
      REFRESH_TOKEN: refreshToken,
    },
  });
}

/**
 * Calculate token expiry timestamp.
 *
 * @param expiresInSecs - Token lifetime reported by Cognito
 * @param now - Current timestamp (ms)
 * @returns Timestamp (ms) after which the token must be refreshed
 */
export function calculateTokenExpiry(
  expiresInSecs: number,
  now: number,
): number {
  return now + expiresInSecs * 1000 - TOKEN_REFRESH_MARGIN_MS;
}

/**
 * Check whether a cached token can still be used.
 */
export function isTokenValid(expiresAt: number, now: number): boolean {
  return now < expiresAt;
}

/**
 * Build a token cache from a Cognito response.
 * A refresh response carries no refresh token, so the previous one is kept.
 */
export function toTokenCache(
  response: CognitoAuthResponse,
  now: number,
  previousRefreshToken: string | null = null,
): TokenCache {
  const result = response.AuthenticationResult;
  return {
    idToken: result.IdToken,
    refreshToken: result.RefreshToken ?? previousRefreshToken,
    expiresAt: calculateTokenExpiry(
      result.ExpiresIn ?? DEFAULT_TOKEN_TTL_SECS,
      now,
    ),
  };
}

// =============================================================================
// URLs
// =============================================================================

/**
 * Format an instant the way the AppAPI expects (UTC ISO-8601).
 */
export function formatInstant(instant: Date): string {
  return instant.toISOString();
}

export function buildDevicesUrl(apiUrl: string): string {
  return `${trimSlash(apiUrl)}/customers/devices`;
}

/**
 * URL for the batched per-minute usage of several devices.
 * Gids are joined with a literal '+', as the AppAPI expects.
 *
 * @example
 * buildDeviceListUsagesUrl("https://api.example", [1, 2], new Date(0))
 * // "https://api.example/AppAPI?apiMethod=getDeviceListUsages&deviceGids=1+2&instant=1970-01-01T00:00:00.000Z&scale=1MIN&energyUnit=KilowattHours"
 */
export function buildDeviceListUsagesUrl(
  apiUrl: string,
  deviceGids: ReadonlyArray<number>,
  instant: Date,
): string {
  return (
    `${trimSlash(apiUrl)}/AppAPI?apiMethod=getDeviceListUsages` +
    `&deviceGids=${deviceGids.join("+")}` +
    `&instant=${formatInstant(instant)}` +
    `&scale=${SCALE_BY_GRANULARITY.MINUTE}` +
    `&energyUnit=${ENERGY_UNIT}`
  );
}

/**
 * URL for one channel's usage series over [start, end).
 */
export function buildChartUsageUrl(
  apiUrl: string,
  channel: Pick<UsageChannel, "deviceGid" | "channelNum">,
  start: Date,
  end: Date,
  granularity: Granularity,
): string {
  const params = new URLSearchParams({
    apiMethod: "getChartUsage",
    deviceGid: String(channel.deviceGid),
    channel: channel.channelNum,
    start: formatInstant(start),
    end: formatInstant(end),
    scale: SCALE_BY_GRANULARITY[granularity],
    energyUnit: ENERGY_UNIT,
  });
  return `${trimSlash(apiUrl)}/AppAPI?${params.toString()}`;
}

function trimSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

// =============================================================================
// Response Parsing
// =============================================================================

/**
 * Flatten the customer device list, including nested devices, into
 * DeviceInfo entries. A nameless mains channel takes its device's name.
 */
export function parseCustomerDevices(
  response: CustomerDevicesResponse,
): DeviceInfo[] {
  const devices: DeviceInfo[] = [];

  const visit = (raw: RawDevice): void => {
    const name =
      raw.locationProperties?.deviceName ?? String(raw.deviceGid);

    const channels: ChannelInfo[] = (raw.channels ?? []).map((chan) => ({
      deviceGid: chan.deviceGid,
      channelNum: chan.channelNum,
      name:
        chan.name ?? (chan.channelNum === MAINS_CHANNEL_NUM ? name : null),
    }));

    devices.push({ gid: raw.deviceGid, name, channels });

    for (const nested of raw.devices ?? []) {
      visit(nested);
    }
  };

  for (const raw of response.devices) {
    visit(raw);
  }

  return devices;
}

/**
 * Convert a raw usage device into the owned usage tree.
 */
export function toUsageDevice(raw: RawDeviceUsage): UsageDevice {
  return {
    gid: raw.deviceGid,
    channels: raw.channelUsages.map((chan) => ({
      deviceGid: chan.deviceGid,
      channelNum: chan.channelNum,
      name: chan.name ?? null,
      usage: chan.usage ?? null,
      nestedDevices: (chan.nestedDevices ?? []).map(toUsageDevice),
    })),
  };
}

/**
 * Index the batched usage response by device gid.
 */
export function parseDeviceListUsages(
  response: DeviceListUsagesResponse,
): Map<number, UsageDevice> {
  const usages = new Map<number, UsageDevice>();
  for (const raw of response.deviceListUsages.devices) {
    usages.set(raw.deviceGid, toUsageDevice(raw));
  }
  return usages;
}

/**
 * Parse a chart usage response.
 *
 * @returns UsageSeries or null if the start instant is not a valid date
 */
export function parseChartUsage(
  response: ChartUsageResponse,
): UsageSeries | null {
  const firstUsageInstant = new Date(response.firstUsageInstant);
  if (Number.isNaN(firstUsageInstant.getTime())) {
    return null;
  }
  return { usage: response.usageList, firstUsageInstant };
}
