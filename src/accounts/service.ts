/**
 * Accounts Module - Service Layer
 *
 * Accounts file loading, lazy session establishment and device/channel
 * index maintenance. Index lookups that miss trigger one rediscovery.
 */
import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "neverthrow";

import type {
  Credentials,
  EmporiaError,
  EmporiaSession,
  UsageChannel,
} from "../emporia/index.js";
import { createLogger } from "../logger.js";
import type { AccountsError } from "./errors.js";
import { fileUnreadable, invalidAccounts } from "./errors.js";
import type { Account, AccountConfig } from "./schema.js";
import { AccountsFileSchema } from "./schema.js";
import {
  buildIndices,
  deviceNameFromIndex,
  resolveChannelName,
  toCredentials,
} from "./transform.js";

const log = createLogger("accounts");

/**
 * Opens a session for a set of credentials.
 */
export type LoginFn = (
  credentials: Credentials,
) => Promise<Result<EmporiaSession, EmporiaError>>;

// =============================================================================
// Accounts File
// =============================================================================

/**
 * Read and validate the accounts file.
 *
 * @param path - Path to a JSON file of the form { "accounts": [...] }
 * @returns Result with the account configs or error
 */
export async function loadAccountsFile(
  path: string,
): Promise<Result<AccountConfig[], AccountsError>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(fileUnreadable(path, cause.message, cause));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(fileUnreadable(path, `Malformed JSON: ${cause.message}`, cause));
  }

  const parsed = AccountsFileSchema.safeParse(data);
  if (!parsed.success) {
    return err(invalidAccounts(path, parsed.error.issues));
  }

  log.info(
    { path, accounts: parsed.data.accounts.map((a) => a.name) },
    "Accounts loaded",
  );
  return ok(parsed.data.accounts);
}

/**
 * Runtime record for a configured account. No session yet.
 */
export function createAccount(
  config: AccountConfig,
  backfillPending: boolean,
): Account {
  return {
    config,
    session: null,
    deviceIndex: new Map(),
    channelIndex: new Map(),
    powerStates: new Map(),
    backfillPending,
  };
}

// =============================================================================
// Session
// =============================================================================

/**
 * Return the account's session, logging in and discovering devices when
 * there is none yet. Idempotent once a session is established.
 */
export async function ensureSession(
  account: Account,
  login: LoginFn,
): Promise<Result<EmporiaSession, EmporiaError>> {
  if (account.session) {
    return ok(account.session);
  }

  const sessionResult = await login(toCredentials(account.config));
  if (sessionResult.isErr()) {
    return err(sessionResult.error);
  }

  const session = sessionResult.value;
  const populated = await populateDevices(account, session);
  if (populated.isErr()) {
    return err(populated.error);
  }

  account.session = session;
  return ok(session);
}

/**
 * Drop the session so the next cycle logs in again.
 */
export function invalidateSession(account: Account): void {
  if (account.session) {
    log.info({ account: account.config.name }, "Session invalidated");
  }
  account.session = null;
}

/**
 * Rebuild the device and channel indices from the device list.
 */
export async function populateDevices(
  account: Account,
  session: EmporiaSession,
): Promise<Result<void, EmporiaError>> {
  const devicesResult = await session.listDevices();
  if (devicesResult.isErr()) {
    return err(devicesResult.error);
  }

  const { deviceIndex, channelIndex } = buildIndices(devicesResult.value);

  for (const [key, channel] of channelIndex) {
    if (!account.channelIndex.has(key)) {
      log.info(
        {
          account: account.config.name,
          channel: channel.name,
          channelNum: channel.channelNum,
        },
        `Channel found: ${channel.name ?? key} (${channel.channelNum})`,
      );
    }
  }

  account.deviceIndex = deviceIndex;
  account.channelIndex = channelIndex;
  return ok(undefined);
}

// =============================================================================
// Name Lookup
// =============================================================================

/**
 * Rediscover devices once if the gid is unknown.
 */
async function refreshIfUnknown(
  account: Account,
  gid: number,
): Promise<Result<void, EmporiaError>> {
  if (account.deviceIndex.has(gid) || !account.session) {
    return ok(undefined);
  }

  log.debug({ account: account.config.name, gid }, "Unknown device, rediscovering");
  return populateDevices(account, account.session);
}

/**
 * Device display name, falling back to the gid.
 */
export async function lookupDeviceName(
  account: Account,
  gid: number,
): Promise<Result<string, EmporiaError>> {
  const refreshed = await refreshIfUnknown(account, gid);
  return refreshed.map(() => deviceNameFromIndex(account.deviceIndex, gid));
}

/**
 * Tag value identifying a channel in the output.
 */
export async function lookupChannelName(
  account: Account,
  channel: Pick<UsageChannel, "deviceGid" | "channelNum">,
): Promise<Result<string, EmporiaError>> {
  const deviceName = await lookupDeviceName(account, channel.deviceGid);

  return deviceName.map((name) =>
    resolveChannelName(account.config, name, channel.channelNum),
  );
}
