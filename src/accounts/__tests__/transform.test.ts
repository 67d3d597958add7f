/**
 * Accounts Transform Unit Tests
 */
import { describe, expect, test } from "vitest";
import type { AccountConfig } from "../schema.js";
import {
  buildIndices,
  channelKey,
  deviceNameFromIndex,
  resolveChannelName,
  toCredentials,
} from "../transform.js";

const ACCOUNT: AccountConfig = {
  name: "Home",
  email: "user@example.com",
  password: "test-password",
  devices: [{ name: "Panel", channels: ["Oven", "Dryer"] }],
};

describe("Accounts Transforms", () => {
  describe("buildIndices", () => {
    test("indexes devices by gid and channels by gid:num", () => {
      const { deviceIndex, channelIndex } = buildIndices([
        {
          gid: 1,
          name: "Panel",
          channels: [
            { deviceGid: 1, channelNum: "1,2,3", name: "Panel" },
            { deviceGid: 1, channelNum: "1", name: null },
          ],
        },
        { gid: 2, name: "Plug", channels: [] },
      ]);

      expect([...deviceIndex.keys()]).toEqual([1, 2]);
      expect([...channelIndex.keys()]).toEqual(["1:1,2,3", "1:1"]);
      expect(channelIndex.get(channelKey(1, "1,2,3"))?.name).toBe("Panel");
    });
  });

  describe("deviceNameFromIndex", () => {
    test("falls back to the gid", () => {
      const { deviceIndex } = buildIndices([
        { gid: 1, name: "Panel", channels: [] },
      ]);

      expect(deviceNameFromIndex(deviceIndex, 1)).toBe("Panel");
      expect(deviceNameFromIndex(deviceIndex, 99)).toBe("99");
    });
  });

  describe("resolveChannelName", () => {
    test("configured name wins for numeric channels", () => {
      expect(resolveChannelName(ACCOUNT, "Panel", "2")).toBe("Dryer");
    });

    test("numeric channel beyond the configured list is device-channel", () => {
      expect(resolveChannelName(ACCOUNT, "Panel", "3")).toBe("Panel-3");
    });

    test("mains channel takes the device name", () => {
      expect(resolveChannelName(ACCOUNT, "Panel", "1,2,3")).toBe("Panel");
    });

    test("unconfigured device is device-channel", () => {
      expect(resolveChannelName(ACCOUNT, "Garage", "1")).toBe("Garage-1");
    });

    test("named non-numeric channels are device-channel", () => {
      expect(resolveChannelName(ACCOUNT, "Garage", "TotalUsage")).toBe(
        "Garage-TotalUsage",
      );
    });
  });

  describe("toCredentials", () => {
    test("uses the email as username", () => {
      expect(toCredentials(ACCOUNT)).toEqual({
        username: "user@example.com",
        password: "test-password",
      });
    });
  });
});
