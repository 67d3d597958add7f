/**
 * Accounts Module - Schemas and Types
 *
 * Accounts file shape (validated with Zod) and the runtime account
 * record the collector owns.
 */
import { z } from "zod";

import type {
  ChannelInfo,
  DeviceInfo,
  EmporiaSession,
} from "../emporia/index.js";
import type { PowerStateMap } from "../usage/index.js";

// =============================================================================
// Accounts File
// =============================================================================

/**
 * Channel name overrides for one device, matched by device name.
 * channels[n - 1] names channel number n.
 */
export const DeviceNamingSchema = z.object({
  name: z.string().min(1),
  channels: z.array(z.string()).default([]),
});

export type DeviceNaming = Readonly<z.infer<typeof DeviceNamingSchema>>;

export const AccountConfigSchema = z.object({
  name: z.string().min(1).describe("Tag value written as account_name"),
  email: z.string().min(1).describe("Emporia login"),
  password: z.string().min(1).describe("Emporia password"),
  devices: z.array(DeviceNamingSchema).default([]),
});

export type AccountConfig = Readonly<z.infer<typeof AccountConfigSchema>>;

export const AccountsFileSchema = z.object({
  accounts: z
    .array(AccountConfigSchema)
    .min(1, "At least one account is required"),
});

export type AccountsFile = z.infer<typeof AccountsFileSchema>;

// =============================================================================
// Runtime Account
// =============================================================================

export type DeviceIndex = ReadonlyMap<number, DeviceInfo>;

/**
 * Keyed by "gid:channelNum".
 */
export type ChannelIndex = ReadonlyMap<string, ChannelInfo>;

/**
 * Per-account runtime state. Owned by the collector and only touched
 * from that account's processing path.
 */
export type Account = {
  readonly config: AccountConfig;
  /** Null until the first successful login */
  session: EmporiaSession | null;
  deviceIndex: DeviceIndex;
  channelIndex: ChannelIndex;
  powerStates: PowerStateMap;
  /** Cleared once the startup backfill has run for this account */
  backfillPending: boolean;
};
