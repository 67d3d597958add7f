/**
 * Collector Module - Pure Transformations
 */
import type { Account } from "../accounts/index.js";
import type { PowerState } from "../usage/index.js";
import type { AccountOutcome, AccountStatus } from "./schema.js";
import { formatCycleError } from "./errors.js";

/**
 * Status API view of an account and its latest outcome.
 */
export function toAccountStatus(
  account: Account,
  lastOutcome: AccountOutcome | undefined,
): AccountStatus {
  const powerStates: Record<string, PowerState> = {};
  for (const [key, state] of account.powerStates) {
    powerStates[key] = state;
  }

  return {
    name: account.config.name,
    sessionActive: account.session !== null,
    deviceCount: account.deviceIndex.size,
    channelCount: account.channelIndex.size,
    backfillPending: account.backfillPending,
    lastPointCount:
      lastOutcome?.status === "ok" ? lastOutcome.points : null,
    lastError:
      lastOutcome?.status === "error"
        ? formatCycleError(lastOutcome.error)
        : null,
    powerStates,
  };
}

/**
 * One-line cycle summary for the log.
 */
export function summarizeOutcomes(
  outcomes: ReadonlyArray<AccountOutcome>,
): Readonly<{ succeeded: number; failed: number; points: number }> {
  let succeeded = 0;
  let failed = 0;
  let points = 0;
  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      succeeded++;
      points += outcome.points;
    } else {
      failed++;
    }
  }
  return { succeeded, failed, points };
}
