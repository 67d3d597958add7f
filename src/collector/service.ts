/**
 * Collector Module - Service Layer
 *
 * Poll/backfill scheduler. Each cycle walks every account in turn:
 * realtime (and, when due, per-second) extraction, the one-shot startup
 * backfill, then a single batch write. Failures are isolated per account.
 */
import { type Result, err, ok } from "neverthrow";

import type { Account } from "../accounts/index.js";
import {
  createAccount,
  ensureSession,
  invalidateSession,
  lookupChannelName,
} from "../accounts/index.js";
import type { EmporiaSession, UsageDevice } from "../emporia/index.js";
import {
  createLogger,
  logCycleComplete,
  logCycleFailed,
  logCycleStart,
} from "../logger.js";
import type {
  ExtractionContext,
  ExtractionMode,
  OutputPoint,
  PowerStateMap,
} from "../usage/index.js";
import {
  computeStopTime,
  extractDevicePoints,
  planBackfillWindows,
  shouldCollectDetails,
} from "../usage/index.js";
import type { CycleError } from "./errors.js";
import {
  formatCycleError,
  fromEmporiaError,
  fromSinkError,
  fromThrown,
} from "./errors.js";
import { createPause } from "./pause.js";
import type {
  AccountOutcome,
  Collector,
  CollectorDeps,
  CollectorState,
  CycleSummary,
} from "./schema.js";
import { summarizeOutcomes, toAccountStatus } from "./transform.js";

const log = createLogger("collector");

type AccountExtraction = Readonly<{
  points: OutputPoint[];
  powerStates: PowerStateMap;
  backfilled: boolean;
}>;

/**
 * Build a collector over the configured accounts. Nothing runs until
 * start() or runCycle() is called.
 */
export function createCollector(deps: CollectorDeps): Collector {
  const { settings, sink, login } = deps;
  const clock = deps.clock ?? (() => new Date());
  const pause = deps.pause ?? createPause();

  const accounts: Account[] = deps.accounts.map((config) =>
    createAccount(config, settings.historyDays > 0),
  );
  const lastOutcomes = new Map<string, AccountOutcome>();

  let isRunning = false;
  let cycle = 0;
  let lastCycleAt: Date | null = null;
  let detailedStart = clock();

  // ===========================================================================
  // Extraction
  // ===========================================================================

  function contextFor(
    account: Account,
    session: EmporiaSession,
    stopTime: Date,
    mode: ExtractionMode,
  ): ExtractionContext {
    return {
      accountName: account.config.name,
      session,
      resolveChannelName: (channel) => lookupChannelName(account, channel),
      thresholdWatts: settings.powerOnThresholdWatts,
      stopTime,
      mode,
    };
  }

  async function walkDevices(
    account: Account,
    usages: ReadonlyMap<number, UsageDevice>,
    context: ExtractionContext,
    powerStates: PowerStateMap,
    points: OutputPoint[],
  ): Promise<Result<PowerStateMap, CycleError>> {
    let states = powerStates;
    for (const device of usages.values()) {
      const result = await extractDevicePoints(device, context, states, points);
      if (result.isErr()) {
        if (result.error.type === "AUTH_FAILED") {
          invalidateSession(account);
        }
        return err(fromEmporiaError(context.accountName, result.error));
      }
      states = result.value;
    }
    return ok(states);
  }

  /**
   * Two half-day windows per day, newest first, each followed by a pause.
   * A stop request ends the pass before the next window; windows already
   * walked keep their points.
   */
  async function backfill(
    account: Account,
    session: EmporiaSession,
    usages: ReadonlyMap<number, UsageDevice>,
    stopTime: Date,
    powerStates: PowerStateMap,
    points: OutputPoint[],
  ): Promise<Result<PowerStateMap, CycleError>> {
    const windows = planBackfillWindows(stopTime, settings.historyDays);
    let states = powerStates;
    let currentDay = -1;

    for (const window of windows) {
      if (pause.isCancelled()) {
        log.info(
          { account: account.config.name, day: window.day + 1 },
          "Backfill cancelled",
        );
        break;
      }

      if (window.day !== currentDay) {
        currentDay = window.day;
        log.info(
          { account: account.config.name },
          `Backfilling day -${window.day + 1}`,
        );
      }

      const result = await walkDevices(
        account,
        usages,
        contextFor(account, session, stopTime, {
          kind: "history",
          start: window.start,
          end: window.end,
        }),
        states,
        points,
      );
      if (result.isErr()) {
        return err(result.error);
      }
      states = result.value;

      await pause.wait(settings.backfillPauseSecs * 1000);
    }

    return ok(states);
  }

  async function extractAccount(
    account: Account,
    stopTime: Date,
    detailedFrom: Date | null,
  ): Promise<Result<AccountExtraction, CycleError>> {
    const name = account.config.name;

    const sessionResult = await ensureSession(account, login);
    if (sessionResult.isErr()) {
      return err(fromEmporiaError(name, sessionResult.error));
    }
    const session = sessionResult.value;

    const usagesResult = await session.getUsage(
      [...account.deviceIndex.keys()],
      stopTime,
    );
    if (usagesResult.isErr()) {
      if (usagesResult.error.type === "AUTH_FAILED") {
        invalidateSession(account);
      }
      return err(fromEmporiaError(name, usagesResult.error));
    }
    const usages = usagesResult.value;

    const points: OutputPoint[] = [];
    const realtime = await walkDevices(
      account,
      usages,
      contextFor(account, session, stopTime, {
        kind: "realtime",
        detailedStart: detailedFrom,
      }),
      account.powerStates,
      points,
    );
    if (realtime.isErr()) {
      return err(realtime.error);
    }

    if (!account.backfillPending || settings.historyDays <= 0) {
      return ok({ points, powerStates: realtime.value, backfilled: false });
    }

    const history = await backfill(
      account,
      session,
      usages,
      stopTime,
      realtime.value,
      points,
    );
    return history.map((powerStates) => ({
      points,
      powerStates,
      backfilled: true,
    }));
  }

  /**
   * Extract and write one account. Power states and the backfill flag
   * are committed only once the batch has been written.
   */
  async function pollAccount(
    account: Account,
    stopTime: Date,
    detailedFrom: Date | null,
  ): Promise<AccountOutcome> {
    const name = account.config.name;

    try {
      const extraction = await extractAccount(account, stopTime, detailedFrom);
      if (extraction.isErr()) {
        return { account: name, status: "error", error: extraction.error };
      }

      const { points, powerStates, backfilled } = extraction.value;

      log.info(
        { account: name, points: points.length },
        "Submitting usage points",
      );

      const written = await sink.write(name, points);
      if (written.isErr()) {
        return {
          account: name,
          status: "error",
          error: fromSinkError(name, written.error),
        };
      }

      account.powerStates = powerStates;
      if (backfilled) {
        account.backfillPending = false;
      }

      return { account: name, status: "ok", points: points.length, backfilled };
    } catch (error) {
      return { account: name, status: "error", error: fromThrown(name, error) };
    }
  }

  // ===========================================================================
  // Cycle
  // ===========================================================================

  async function runCycle(): Promise<CycleSummary> {
    const startedAt = Date.now();
    const stopTime = computeStopTime(clock(), settings.lagSecs);
    const collectedDetails = shouldCollectDetails(
      settings,
      stopTime,
      detailedStart,
    );
    cycle++;

    logCycleStart(log, cycle, {
      stopTime: stopTime.toISOString(),
      collectDetails: collectedDetails,
    });

    const outcomes: AccountOutcome[] = [];
    for (const account of accounts) {
      if (pause.isCancelled()) {
        break;
      }

      const outcome = await pollAccount(
        account,
        stopTime,
        collectedDetails ? detailedStart : null,
      );
      if (outcome.status === "error") {
        log.error(
          { account: outcome.account, errorType: outcome.error.type },
          `Account cycle skipped: ${formatCycleError(outcome.error)}`,
        );
      }
      lastOutcomes.set(account.config.name, outcome);
      outcomes.push(outcome);
    }

    if (collectedDetails) {
      detailedStart = stopTime;
    }
    lastCycleAt = stopTime;

    logCycleComplete(log, cycle, startedAt, summarizeOutcomes(outcomes));

    return { cycle, stopTime, collectedDetails, outcomes };
  }

  // ===========================================================================
  // Loop Control
  // ===========================================================================

  async function start(): Promise<void> {
    if (isRunning) {
      log.warn("Collector already running");
      return;
    }

    log.info(
      {
        accounts: accounts.map((a) => a.config.name),
        updateIntervalSecs: settings.updateIntervalSecs,
        detailedEnabled: settings.detailedDataEnabled,
        detailedIntervalSecs: settings.detailedIntervalSecs,
        historyDays: settings.historyDays,
      },
      "Starting collector loop...",
    );
    isRunning = true;

    while (!pause.isCancelled()) {
      try {
        await runCycle();
      } catch (error) {
        logCycleFailed(log, cycle, error);
      }

      await pause.wait(settings.updateIntervalSecs * 1000);
    }

    isRunning = false;
    log.info("Collector loop stopped");
  }

  function stop(): void {
    log.info("Stopping collector loop...");
    pause.cancel();
  }

  function getState(): CollectorState {
    return {
      isRunning,
      cycle,
      lastCycleAt: lastCycleAt?.toISOString() ?? null,
      detailedStart: detailedStart.toISOString(),
      accounts: accounts.map((account) =>
        toAccountStatus(account, lastOutcomes.get(account.config.name)),
      ),
    };
  }

  return { start, stop, runCycle, getState };
}
