/**
 * Poller Module - Schemas and Types
 *
 * State carried between poll cycles and the reports each cycle produces.
 */
import type { Checkpoint } from "../status-api/index.js";
import type { CycleError } from "./errors.js";

// =============================================================================
// Poller State
// =============================================================================

/**
 * In-memory state shared by consecutive cycles. Lost on restart.
 */
export type PollerState = Readonly<{
  /** Query results after this point */
  checkpoint: Checkpoint;
  /** Last change notification delivered; null until the first one */
  lastNotification: string | null;
}>;

/**
 * Initial poller state for a checkpoint.
 */
export function createInitialState(checkpoint: Checkpoint): PollerState {
  return { checkpoint, lastNotification: null };
}

// =============================================================================
// Cycle Reports
// =============================================================================

/**
 * How a single cycle ended.
 * - no_updates: the page was empty
 * - unchanged: newest status equals the last notification
 * - notified: a change notification was delivered
 * - delivery_failed: a change was found but could not be delivered
 * - failed: fetching, validation or interpretation failed
 */
export type CycleOutcome =
  | "no_updates"
  | "unchanged"
  | "notified"
  | "delivery_failed"
  | "failed";

export type CycleReport = Readonly<{
  outcome: CycleOutcome;
  /** Checkpoint the next cycle will request */
  checkpoint: Checkpoint;
  /** Notification text produced by the cycle, if any */
  message?: string;
  error?: CycleError;
}>;

/**
 * Read-only view of the poller for the health API.
 */
export type PollerSnapshot = Readonly<{
  isRunning: boolean;
  checkpoint: Checkpoint;
  lastNotification: string | null;
  lastOutcome: CycleOutcome | null;
  lastPollTime: number | null;
  cycles: number;
}>;

// =============================================================================
// Scheduling
// =============================================================================

/**
 * Timer abstraction for the delay between cycles.
 * `schedule` returns a function that cancels the pending task.
 */
export type Scheduler = Readonly<{
  schedule: (task: () => void, delayMs: number) => () => void;
}>;

/**
 * Scheduler backed by setTimeout.
 */
export const timerScheduler: Scheduler = {
  schedule: (task, delayMs) => {
    const timer = setTimeout(task, delayMs);
    return () => clearTimeout(timer);
  },
};
