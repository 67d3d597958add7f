/**
 * Emporia Module - Service Layer
 *
 * Side effects happen here: Cognito login and HTTP calls to the
 * Emporia customer API. Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import { getEmporiaConfig } from "../config.js";
import { createLogger } from "../logger.js";
import type { EmporiaError } from "./errors.js";
import { authFailed, invalidResponse, networkError, timeout } from "./errors.js";
import type {
  Credentials,
  DeviceInfo,
  EmporiaSession,
  Granularity,
  TokenCache,
  UsageChannel,
  UsageDevice,
  UsageSeries,
} from "./schema.js";
import {
  ChartUsageResponseSchema,
  CognitoAuthResponseSchema,
  CustomerDevicesResponseSchema,
  DeviceListUsagesResponseSchema,
} from "./schema.js";
import {
  buildChartUsageUrl,
  buildCognitoHeaders,
  buildDeviceListUsagesUrl,
  buildDevicesUrl,
  buildPasswordAuthBody,
  buildRefreshAuthBody,
  isTokenValid,
  parseChartUsage,
  parseCustomerDevices,
  parseDeviceListUsages,
  toTokenCache,
} from "./transform.js";

const log = createLogger("emporia");

// =============================================================================
// HTTP Helper
// =============================================================================

/**
 * Perform a request and validate the JSON body against a schema.
 */
async function requestJson<T>(
  operation: string,
  url: string,
  init: RequestInit,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<Result<T, EmporiaError>> {
  const { timeoutMs } = getEmporiaConfig();

  try {
    const response = await fetch(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (response.status === 401 || response.status === 403) {
      return err(authFailed(`${operation}: HTTP ${response.status}`));
    }

    if (!response.ok) {
      return err(
        networkError(
          `${operation}: HTTP ${response.status}: ${response.statusText}`,
        ),
      );
    }

    const data: unknown = await response.json();
    const parsed = schema.safeParse(data);

    if (!parsed.success) {
      return err(invalidResponse(`${operation}: unexpected response`, data));
    }

    return ok(parsed.data);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    // Handle timeout specifically
    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(timeout(operation));
    }

    return err(networkError(`${operation} failed`, cause));
  }
}

// =============================================================================
// Cognito Login
// =============================================================================

async function initiateAuth(
  body: string,
  now: number,
  previousRefreshToken: string | null,
): Promise<Result<TokenCache, EmporiaError>> {
  const { cognitoUrl } = getEmporiaConfig();

  const result = await requestJson(
    "login",
    cognitoUrl,
    { method: "POST", headers: buildCognitoHeaders(), body },
    CognitoAuthResponseSchema,
  );

  if (result.isErr()) {
    // Cognito answers bad credentials with HTTP 400
    if (result.error.type === "NETWORK_ERROR") {
      return err(authFailed(result.error.message));
    }
    return err(result.error);
  }

  return ok(toTokenCache(result.value, now, previousRefreshToken));
}

/**
 * Log in with username and password and open a session.
 *
 * @returns Result with an authenticated session or error
 */
export async function loginEmporia(
  credentials: Credentials,
): Promise<Result<EmporiaSession, EmporiaError>> {
  const { clientId } = getEmporiaConfig();

  log.info({ username: credentials.username }, "Logging in to Emporia...");

  const tokenResult = await initiateAuth(
    buildPasswordAuthBody(clientId, credentials),
    Date.now(),
    null,
  );

  if (tokenResult.isErr()) {
    return err(tokenResult.error);
  }

  log.info({ username: credentials.username }, "Login completed");
  return ok(createEmporiaSession(credentials, tokenResult.value));
}

// =============================================================================
// Session
// =============================================================================

/**
 * Build a session around an initial token. The token is refreshed on
 * demand, falling back to a full password login when no refresh token is
 * available or the refresh is rejected.
 */
export function createEmporiaSession(
  credentials: Credentials,
  initialToken: TokenCache,
): EmporiaSession {
  const { apiUrl, clientId } = getEmporiaConfig();
  let tokenCache: TokenCache = initialToken;

  async function ensureValidToken(): Promise<Result<string, EmporiaError>> {
    const now = Date.now();

    if (isTokenValid(tokenCache.expiresAt, now)) {
      return ok(tokenCache.idToken);
    }

    log.debug("Id token expired, refreshing");

    const refreshed = tokenCache.refreshToken
      ? await initiateAuth(
          buildRefreshAuthBody(clientId, tokenCache.refreshToken),
          now,
          tokenCache.refreshToken,
        )
      : err<TokenCache, EmporiaError>(authFailed("No refresh token"));

    const next =
      refreshed.isOk() || refreshed.error.type !== "AUTH_FAILED"
        ? refreshed
        : await initiateAuth(
            buildPasswordAuthBody(clientId, credentials),
            now,
            null,
          );

    if (next.isErr()) {
      return err(next.error);
    }

    tokenCache = next.value;
    return ok(tokenCache.idToken);
  }

  async function authorizedGet<T>(
    operation: string,
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Result<T, EmporiaError>> {
    const token = await ensureValidToken();
    if (token.isErr()) {
      return err(token.error);
    }

    return requestJson(
      operation,
      url,
      { method: "GET", headers: { authtoken: token.value } },
      schema,
    );
  }

  return {
    async listDevices(): Promise<
      Result<ReadonlyArray<DeviceInfo>, EmporiaError>
    > {
      log.debug("Fetching device list...");
      const result = await authorizedGet(
        "listDevices",
        buildDevicesUrl(apiUrl),
        CustomerDevicesResponseSchema,
      );
      return result.map(parseCustomerDevices);
    },

    async getUsage(
      deviceGids: ReadonlyArray<number>,
      asOf: Date,
    ): Promise<Result<ReadonlyMap<number, UsageDevice>, EmporiaError>> {
      if (deviceGids.length === 0) {
        return ok(new Map());
      }

      log.debug({ deviceGids, asOf: asOf.toISOString() }, "Fetching usage...");
      const result = await authorizedGet(
        "getUsage",
        buildDeviceListUsagesUrl(apiUrl, deviceGids, asOf),
        DeviceListUsagesResponseSchema,
      );
      return result.map(parseDeviceListUsages);
    },

    async getChannelUsageSeries(
      channel: UsageChannel,
      start: Date,
      end: Date,
      granularity: Granularity,
    ): Promise<Result<UsageSeries, EmporiaError>> {
      log.debug(
        {
          deviceGid: channel.deviceGid,
          channelNum: channel.channelNum,
          start: start.toISOString(),
          end: end.toISOString(),
          granularity,
        },
        "Fetching usage series...",
      );

      const result = await authorizedGet(
        "getChannelUsageSeries",
        buildChartUsageUrl(apiUrl, channel, start, end, granularity),
        ChartUsageResponseSchema,
      );

      if (result.isErr()) {
        return err(result.error);
      }

      const series = parseChartUsage(result.value);
      if (!series) {
        return err(
          invalidResponse("Invalid firstUsageInstant in series", result.value),
        );
      }
      return ok(series);
    },
  };
}
