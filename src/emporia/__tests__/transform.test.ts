/**
 * Emporia Transform Unit Tests
 *
 * Request building and response parsing. Pure functions, no mocks.
 */
import { describe, expect, test } from "vitest";
import {
  buildChartUsageUrl,
  buildDeviceListUsagesUrl,
  buildDevicesUrl,
  buildPasswordAuthBody,
  buildRefreshAuthBody,
  calculateTokenExpiry,
  isTokenValid,
  parseChartUsage,
  parseCustomerDevices,
  parseDeviceListUsages,
  toTokenCache,
} from "../transform.js";

const API = "https://api.test";

describe("Emporia Transforms", () => {
  // ===========================================================================
  // Login
  // ===========================================================================

  describe("auth bodies", () => {
    test("password body", () => {
      expect(
        JSON.parse(
          buildPasswordAuthBody("client-1", {
            username: "user@example.com",
            password: "test-password",
          }),
        ),
      ).toEqual({
        AuthFlow: "USER_PASSWORD_AUTH",
        ClientId: "client-1",
        AuthParameters: {
          USERNAME: "user@example.com",
          PASSWORD: "test-password",
        },
      });
    });

    test("refresh body", () => {
      expect(JSON.parse(buildRefreshAuthBody("client-1", "refresh-1"))).toEqual(
        {
          AuthFlow: "REFRESH_TOKEN_AUTH",
          ClientId: "client-1",
          AuthParameters: { REFRESH_TOKEN: "refresh-1" },
        },
      );
    });
  });

  describe("token expiry", () => {
    test("refreshes a minute before the reported lifetime", () => {
      expect(calculateTokenExpiry(3600, 1_000_000)).toBe(1_000_000 + 3_540_000);
    });

    test("isTokenValid", () => {
      expect(isTokenValid(2000, 1999)).toBe(true);
      expect(isTokenValid(2000, 2000)).toBe(false);
    });

    test("toTokenCache keeps the previous refresh token when none is returned", () => {
      const cache = toTokenCache(
        { AuthenticationResult: { IdToken: "id-2", ExpiresIn: 120 } },
        0,
        "refresh-1",
      );

      expect(cache).toEqual({
        idToken: "id-2",
        refreshToken: "refresh-1",
        expiresAt: 60_000,
      });
    });

    test("toTokenCache defaults to an hour", () => {
      const cache = toTokenCache(
        { AuthenticationResult: { IdToken: "id", RefreshToken: "r" } },
        0,
      );

      expect(cache.refreshToken).toBe("r");
      expect(cache.expiresAt).toBe(3_540_000);
    });
  });

  // ===========================================================================
  // URLs
  // ===========================================================================

  describe("URLs", () => {
    test("devices URL trims a trailing slash", () => {
      expect(buildDevicesUrl(`${API}/`)).toBe(`${API}/customers/devices`);
    });

    test("device list usages joins gids with a literal plus", () => {
      expect(
        buildDeviceListUsagesUrl(
          API,
          [1, 2],
          new Date("2024-03-10T12:00:00.000Z"),
        ),
      ).toBe(
        `${API}/AppAPI?apiMethod=getDeviceListUsages&deviceGids=1+2` +
          "&instant=2024-03-10T12:00:00.000Z&scale=1MIN&energyUnit=KilowattHours",
      );
    });

    test("chart usage URL carries channel, range and scale", () => {
      const url = new URL(
        buildChartUsageUrl(
          API,
          { deviceGid: 7, channelNum: "1,2,3" },
          new Date("2024-03-10T11:00:00.000Z"),
          new Date("2024-03-10T12:00:00.000Z"),
          "SECOND",
        ),
      );

      expect(url.pathname).toBe("/AppAPI");
      expect(Object.fromEntries(url.searchParams)).toEqual({
        apiMethod: "getChartUsage",
        deviceGid: "7",
        channel: "1,2,3",
        start: "2024-03-10T11:00:00.000Z",
        end: "2024-03-10T12:00:00.000Z",
        scale: "1S",
        energyUnit: "KilowattHours",
      });
    });
  });

  // ===========================================================================
  // Parsing
  // ===========================================================================

  describe("parseCustomerDevices", () => {
    test("flattens nested devices and names mains channels", () => {
      const devices = parseCustomerDevices({
        devices: [
          {
            deviceGid: 1,
            locationProperties: { deviceName: "House" },
            channels: [
              { deviceGid: 1, channelNum: "1,2,3", name: null },
              { deviceGid: 1, channelNum: "1", name: "Oven" },
              { deviceGid: 1, channelNum: "2" },
            ],
            devices: [
              {
                deviceGid: 2,
                locationProperties: null,
                channels: [{ deviceGid: 2, channelNum: "1,2,3" }],
              },
            ],
          },
        ],
      });

      expect(devices).toEqual([
        {
          gid: 1,
          name: "House",
          channels: [
            { deviceGid: 1, channelNum: "1,2,3", name: "House" },
            { deviceGid: 1, channelNum: "1", name: "Oven" },
            { deviceGid: 1, channelNum: "2", name: null },
          ],
        },
        {
          gid: 2,
          name: "2",
          channels: [{ deviceGid: 2, channelNum: "1,2,3", name: "2" }],
        },
      ]);
    });
  });

  describe("parseDeviceListUsages", () => {
    test("indexes by gid and keeps nesting", () => {
      const usages = parseDeviceListUsages({
        deviceListUsages: {
          devices: [
            {
              deviceGid: 1,
              channelUsages: [
                {
                  deviceGid: 1,
                  channelNum: "1,2,3",
                  usage: 0.01,
                  nestedDevices: [
                    {
                      deviceGid: 2,
                      channelUsages: [
                        { deviceGid: 2, channelNum: "1", usage: null },
                      ],
                    },
                  ],
                },
              ],
            },
          ],
        },
      });

      expect([...usages.keys()]).toEqual([1]);
      expect(usages.get(1)).toEqual({
        gid: 1,
        channels: [
          {
            deviceGid: 1,
            channelNum: "1,2,3",
            name: null,
            usage: 0.01,
            nestedDevices: [
              {
                gid: 2,
                channels: [
                  {
                    deviceGid: 2,
                    channelNum: "1",
                    name: null,
                    usage: null,
                    nestedDevices: [],
                  },
                ],
              },
            ],
          },
        ],
      });
    });
  });

  describe("parseChartUsage", () => {
    test("parses the start instant", () => {
      expect(
        parseChartUsage({
          firstUsageInstant: "2024-03-10T11:00:00Z",
          usageList: [0.1, null],
        }),
      ).toEqual({
        usage: [0.1, null],
        firstUsageInstant: new Date("2024-03-10T11:00:00.000Z"),
      });
    });

    test("rejects an invalid instant", () => {
      expect(
        parseChartUsage({ firstUsageInstant: "not-a-date", usageList: [] }),
      ).toBeNull();
    });
  });
});
