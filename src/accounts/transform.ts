/**
 * Accounts Module - Pure Transformations
 *
 * Index building and channel name resolution.
 */
import type {
  ChannelInfo,
  Credentials,
  DeviceInfo,
} from "../emporia/index.js";
import { MAINS_CHANNEL_NUM } from "../emporia/transform.js";
import type {
  AccountConfig,
  ChannelIndex,
  DeviceIndex,
} from "./schema.js";

/**
 * Channel index key.
 *
 * @example
 * channelKey(1234, "1,2,3") // "1234:1,2,3"
 */
export function channelKey(deviceGid: number, channelNum: string): string {
  return `${deviceGid}:${channelNum}`;
}

/**
 * Build the device and channel indices from a discovered device list.
 */
export function buildIndices(devices: ReadonlyArray<DeviceInfo>): {
  deviceIndex: DeviceIndex;
  channelIndex: ChannelIndex;
} {
  const deviceIndex = new Map<number, DeviceInfo>();
  const channelIndex = new Map<string, ChannelInfo>();

  for (const device of devices) {
    deviceIndex.set(device.gid, device);
    for (const channel of device.channels) {
      channelIndex.set(channelKey(device.gid, channel.channelNum), channel);
    }
  }

  return { deviceIndex, channelIndex };
}

/**
 * Device display name, falling back to the gid.
 */
export function deviceNameFromIndex(
  deviceIndex: DeviceIndex,
  gid: number,
): string {
  return deviceIndex.get(gid)?.name ?? String(gid);
}

/**
 * Resolve the device_name tag for a channel.
 *
 * Order:
 * 1. numeric channel n with a configured device of the same name listing
 *    at least n channels: channels[n - 1]
 * 2. the mains channel ("1,2,3"): the device name
 * 3. "<device name>-<channel number>"
 *
 * Display names from discovery are only logged, never used as tags.
 */
export function resolveChannelName(
  accountConfig: AccountConfig,
  deviceName: string,
  channelNum: string,
): string {
  if (/^\d+$/.test(channelNum)) {
    const num = Number.parseInt(channelNum, 10);
    const naming = accountConfig.devices.find((d) => d.name === deviceName);
    const configured = naming?.channels[num - 1];
    if (num >= 1 && configured !== undefined) {
      return configured;
    }
  } else if (channelNum === MAINS_CHANNEL_NUM) {
    return deviceName;
  }

  return `${deviceName}-${channelNum}`;
}

/**
 * Login credentials from an account config.
 */
export function toCredentials(accountConfig: AccountConfig): Credentials {
  return {
    username: accountConfig.email,
    password: accountConfig.password,
  };
}
