/**
 * Collector Service Tests
 *
 * Runs poll cycles against in-memory sessions, an in-memory sink and a
 * pause that never sleeps.
 */
import { type Mock, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logCycleStart: vi.fn(),
  logCycleComplete: vi.fn(),
  logCycleFailed: vi.fn(),
}));

import { err, ok } from "neverthrow";
import type { AccountConfig, LoginFn } from "../../accounts/index.js";
import type { CollectorSettings } from "../../config.js";
import { authFailed } from "../../emporia/errors.js";
import type { EmporiaSession, UsageDevice } from "../../emporia/index.js";
import { writeFailed } from "../../sink/errors.js";
import type { Sink } from "../../sink/index.js";
import type { OutputPoint } from "../../usage/index.js";
import type { Pause } from "../pause.js";
import { createCollector } from "../service.js";

const T0 = new Date("2024-03-10T12:00:00.000Z");
const HOUR_MS = 60 * 60 * 1000;

const SETTINGS: CollectorSettings = {
  updateIntervalSecs: 60,
  detailedDataEnabled: false,
  detailedIntervalSecs: 3600,
  lagSecs: 5,
  historyDays: 0,
  powerOnThresholdWatts: 1,
  backfillPauseSecs: 5,
};

function account(name: string): AccountConfig {
  return {
    name,
    email: `${name.toLowerCase()}@example.com`,
    password: "test-password",
    devices: [],
  };
}

const USAGE: UsageDevice = {
  gid: 1,
  channels: [
    {
      deviceGid: 1,
      channelNum: "1,2,3",
      name: null,
      usage: 0.01,
      nestedDevices: [],
    },
  ],
};

function createSession() {
  return {
    listDevices: vi.fn<EmporiaSession["listDevices"]>(async () =>
      ok([
        {
          gid: 1,
          name: "Panel",
          channels: [{ deviceGid: 1, channelNum: "1,2,3", name: "Panel" }],
        },
      ]),
    ),
    getUsage: vi.fn<EmporiaSession["getUsage"]>(async () =>
      ok(new Map([[1, USAGE]])),
    ),
    getChannelUsageSeries: vi.fn<EmporiaSession["getChannelUsageSeries"]>(
      async (_channel, start) => ok({ usage: [0.001], firstUsageInstant: start }),
    ),
  };
}

/**
 * Pause that never sleeps. Cancels itself on the given wait (1-based).
 */
function createTestPause(cancelOnWait: number | null = null) {
  let cancelled = false;
  const waits: number[] = [];

  const pause: Pause = {
    async wait(ms: number): Promise<boolean> {
      waits.push(ms);
      if (cancelOnWait !== null && waits.length >= cancelOnWait) {
        cancelled = true;
      }
      return cancelled;
    },
    cancel(): void {
      cancelled = true;
    },
    isCancelled(): boolean {
      return cancelled;
    },
  };

  return { pause, waits };
}

function createSink() {
  return { write: vi.fn<Sink["write"]>(async () => ok(undefined)) };
}

function writtenPoints(
  sink: ReturnType<typeof createSink>,
  call = 0,
): ReadonlyArray<OutputPoint> {
  return sink.write.mock.calls[call]?.[1] ?? [];
}

describe("createCollector", () => {
  let now: Date;
  let session: ReturnType<typeof createSession>;
  let login: Mock<LoginFn>;
  let sink: ReturnType<typeof createSink>;

  beforeEach(() => {
    now = T0;
    session = createSession();
    login = vi.fn<LoginFn>(async () => ok(session));
    sink = createSink();
  });

  // ===========================================================================
  // Realtime
  // ===========================================================================

  test("realtime cycle writes one point per channel and commits state", async () => {
    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: SETTINGS,
      clock: () => now,
      pause: createTestPause().pause,
    });

    const summary = await collector.runCycle();

    const stopTime = new Date(T0.getTime() - 5000);
    expect(summary.stopTime).toEqual(stopTime);
    expect(summary.collectedDetails).toBe(false);
    expect(summary.outcomes).toEqual([
      { account: "Home", status: "ok", points: 1, backfilled: false },
    ]);

    expect(session.getUsage).toHaveBeenCalledWith([1], stopTime);
    expect(sink.write).toHaveBeenCalledTimes(1);
    expect(writtenPoints(sink)).toEqual([
      {
        measurement: "energy_usage",
        tags: { account_name: "Home", device_name: "Panel", detailed: false },
        fields: { usage: 600, transition: "on" },
        timestamp: stopTime,
      },
    ]);

    const state = collector.getState();
    expect(state.cycle).toBe(1);
    expect(state.lastCycleAt).toBe(stopTime.toISOString());
    expect(state.accounts[0]?.powerStates).toEqual({ "1:1,2,3": "on" });
    expect(state.accounts[0]?.sessionActive).toBe(true);
  });

  test("second cycle carries power state, so no repeated transition", async () => {
    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: SETTINGS,
      clock: () => now,
      pause: createTestPause().pause,
    });

    await collector.runCycle();
    now = new Date(T0.getTime() + 60_000);
    await collector.runCycle();

    expect(login).toHaveBeenCalledTimes(1);
    expect(writtenPoints(sink, 1)[0]?.fields).toEqual({ usage: 600 });
  });

  // ===========================================================================
  // Failure Isolation
  // ===========================================================================

  test("a failing account does not stop the others", async () => {
    login.mockResolvedValueOnce(err(authFailed("bad password")));

    const collector = createCollector({
      accounts: [account("Broken"), account("Home")],
      login,
      sink,
      settings: SETTINGS,
      clock: () => now,
      pause: createTestPause().pause,
    });

    const summary = await collector.runCycle();

    expect(summary.outcomes.map((o) => [o.account, o.status])).toEqual([
      ["Broken", "error"],
      ["Home", "ok"],
    ]);
    expect(sink.write).toHaveBeenCalledTimes(1);
    expect(sink.write.mock.calls[0]?.[0]).toBe("Home");
    expect(collector.getState().accounts[0]?.lastError).toBe(
      "Failed (Broken): Auth failed: bad password",
    );
  });

  test("an auth failure while polling forces a new login next cycle", async () => {
    session.getUsage.mockResolvedValueOnce(err(authFailed("getUsage: HTTP 401")));

    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: SETTINGS,
      clock: () => now,
      pause: createTestPause().pause,
    });

    const first = await collector.runCycle();
    expect(first.outcomes[0]?.status).toBe("error");
    expect(collector.getState().accounts[0]?.sessionActive).toBe(false);

    const second = await collector.runCycle();
    expect(second.outcomes[0]?.status).toBe("ok");
    expect(login).toHaveBeenCalledTimes(2);
  });

  test("a sink failure keeps state uncommitted", async () => {
    sink.write.mockResolvedValueOnce(err(writeFailed("influxdb", "boom")));

    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: { ...SETTINGS, historyDays: 1 },
      clock: () => now,
      pause: createTestPause().pause,
    });

    const summary = await collector.runCycle();

    expect(summary.outcomes[0]).toEqual({
      account: "Home",
      status: "error",
      error: {
        type: "FAILED",
        account: "Home",
        message: "Write to influxdb failed: boom",
      },
    });
    const status = collector.getState().accounts[0];
    expect(status?.backfillPending).toBe(true);
    expect(status?.powerStates).toEqual({});
  });

  test("a thrown error becomes a failed outcome", async () => {
    sink.write.mockRejectedValueOnce(new Error("unexpected"));

    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: SETTINGS,
      clock: () => now,
      pause: createTestPause().pause,
    });

    const summary = await collector.runCycle();

    expect(summary.outcomes[0]).toMatchObject({
      status: "error",
      error: { type: "FAILED", account: "Home", message: "unexpected" },
    });
  });

  // ===========================================================================
  // Backfill
  // ===========================================================================

  test("backfill walks two half-day windows per day, newest first", async () => {
    const { pause, waits } = createTestPause();
    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: { ...SETTINGS, historyDays: 2 },
      clock: () => now,
      pause,
    });

    const summary = await collector.runCycle();

    const stopMs = T0.getTime() - 5000;
    const calls = session.getChannelUsageSeries.mock.calls;
    expect(calls).toHaveLength(4);
    expect(calls.map((c) => [c[1].getTime(), c[2].getTime(), c[3]])).toEqual([
      [stopMs - 12 * HOUR_MS, stopMs, "MINUTE"],
      [stopMs - 24 * HOUR_MS, stopMs - 12 * HOUR_MS, "MINUTE"],
      [stopMs - 36 * HOUR_MS, stopMs - 24 * HOUR_MS, "MINUTE"],
      [stopMs - 48 * HOUR_MS, stopMs - 36 * HOUR_MS, "MINUTE"],
    ]);
    expect(waits).toEqual([5000, 5000, 5000, 5000]);

    expect(summary.outcomes[0]).toEqual({
      account: "Home",
      status: "ok",
      points: 5,
      backfilled: true,
    });
    expect(collector.getState().accounts[0]?.backfillPending).toBe(false);

    await collector.runCycle();
    expect(session.getChannelUsageSeries).toHaveBeenCalledTimes(4);
  });

  test("cancelling mid-backfill still writes the windows already walked", async () => {
    const { pause } = createTestPause(1);
    const collector = createCollector({
      accounts: [account("Home"), account("Cabin")],
      login,
      sink,
      settings: { ...SETTINGS, historyDays: 3 },
      clock: () => now,
      pause,
    });

    const summary = await collector.runCycle();

    expect(session.getChannelUsageSeries).toHaveBeenCalledTimes(1);
    expect(summary.outcomes).toEqual([
      { account: "Home", status: "ok", points: 2, backfilled: true },
    ]);
    expect(writtenPoints(sink)).toHaveLength(2);
    expect(sink.write).toHaveBeenCalledTimes(1);
  });

  // ===========================================================================
  // Detailed Data
  // ===========================================================================

  test("per-second samples are pulled once the interval has elapsed", async () => {
    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: { ...SETTINGS, detailedDataEnabled: true, detailedIntervalSecs: 60 },
      clock: () => now,
      pause: createTestPause().pause,
    });

    now = new Date(T0.getTime() + 120_000);
    const first = await collector.runCycle();
    const firstStop = new Date(T0.getTime() + 115_000);

    expect(first.collectedDetails).toBe(true);
    expect(session.getChannelUsageSeries).toHaveBeenCalledWith(
      USAGE.channels[0],
      T0,
      firstStop,
      "SECOND",
    );
    expect(writtenPoints(sink).map((p) => p.tags.detailed)).toEqual([
      false,
      true,
    ]);
    expect(collector.getState().detailedStart).toBe(firstStop.toISOString());

    now = new Date(T0.getTime() + 150_000);
    const second = await collector.runCycle();

    expect(second.collectedDetails).toBe(false);
    expect(session.getChannelUsageSeries).toHaveBeenCalledTimes(1);
  });

  // ===========================================================================
  // Loop Control
  // ===========================================================================

  test("start runs cycles until stopped", async () => {
    const { pause, waits } = createTestPause(2);
    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: SETTINGS,
      clock: () => now,
      pause,
    });

    await collector.start();

    expect(collector.getState().cycle).toBe(2);
    expect(collector.getState().isRunning).toBe(false);
    expect(waits).toEqual([60_000, 60_000]);
  });

  test("stop before start runs nothing", async () => {
    const collector = createCollector({
      accounts: [account("Home")],
      login,
      sink,
      settings: SETTINGS,
      clock: () => now,
      pause: createTestPause().pause,
    });

    collector.stop();
    await collector.start();

    expect(collector.getState().cycle).toBe(0);
    expect(login).not.toHaveBeenCalled();
  });
});
