/**
 * Collector Module - Schemas and Types
 *
 * State exposed by the poll/backfill scheduler and its dependencies.
 */
import type { AccountConfig, LoginFn } from "../accounts/index.js";
import type { CollectorSettings } from "../config.js";
import type { Sink } from "../sink/index.js";
import type { PowerState } from "../usage/index.js";
import type { CycleError } from "./errors.js";
import type { Pause } from "./pause.js";

export type CollectorDeps = Readonly<{
  accounts: ReadonlyArray<AccountConfig>;
  login: LoginFn;
  sink: Pick<Sink, "write">;
  settings: CollectorSettings;
  clock?: () => Date;
  pause?: Pause;
}>;

/**
 * Result of one account within one cycle.
 */
export type AccountOutcome =
  | {
      readonly account: string;
      readonly status: "ok";
      readonly points: number;
      readonly backfilled: boolean;
    }
  | {
      readonly account: string;
      readonly status: "error";
      readonly error: CycleError;
    };

export type CycleSummary = Readonly<{
  cycle: number;
  stopTime: Date;
  collectedDetails: boolean;
  outcomes: ReadonlyArray<AccountOutcome>;
}>;

/**
 * Per-account view for the status API.
 */
export type AccountStatus = Readonly<{
  name: string;
  sessionActive: boolean;
  deviceCount: number;
  channelCount: number;
  backfillPending: boolean;
  lastPointCount: number | null;
  lastError: string | null;
  powerStates: Readonly<Record<string, PowerState>>;
}>;

export type CollectorState = Readonly<{
  isRunning: boolean;
  cycle: number;
  lastCycleAt: string | null;
  detailedStart: string;
  accounts: ReadonlyArray<AccountStatus>;
}>;

export type Collector = Readonly<{
  /** Runs cycles until stop(); resolves once the loop has exited. */
  start(): Promise<void>;
  /** Request a stop and wake any pending pause. */
  stop(): void;
  runCycle(): Promise<CycleSummary>;
  getState(): CollectorState;
}>;
