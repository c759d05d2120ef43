/**
 * Poller Module - Service Layer
 *
 * The poll-evaluate-notify loop: fetch statuses, validate the page,
 * interpret the newest item, notify on change, then wait a fixed delay.
 *
 * Every cycle error is caught at the cycle boundary and reported to the
 * chat; nothing but process termination stops the loop.
 */
import type { Result } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { Notifier } from "../notifications/index.js";
import { interpretStatus, selectLatestItem } from "../review/index.js";
import {
  type Checkpoint,
  type StatusApiError,
  type StatusClient,
  type StatusPage,
  validateResponse,
} from "../status-api/index.js";
import type { CycleError } from "./errors.js";
import { formatCycleError, unexpectedError } from "./errors.js";
import type {
  CycleOutcome,
  CycleReport,
  PollerSnapshot,
  PollerState,
  Scheduler,
} from "./schema.js";
import { createInitialState, timerScheduler } from "./schema.js";
import {
  advanceCheckpoint,
  checkpointFromTime,
  formatFailureMessage,
  isNovelMessage,
  recordNotification,
} from "./transform.js";

const log = createLogger("poller");

/**
 * Collaborators and settings for a poller.
 */
export type PollerDeps = Readonly<{
  statusClient: StatusClient;
  notifier: Notifier;
  /** Fixed delay between cycles */
  intervalMs: number;
  /** Clock in milliseconds (default Date.now) */
  now?: () => number;
  /** Timer used for the delay (default setTimeout) */
  scheduler?: Scheduler;
  /** First checkpoint (default: current time) */
  initialCheckpoint?: Checkpoint;
}>;

export type Poller = Readonly<{
  /** Run exactly one cycle without any delay */
  runCycle: () => Promise<CycleReport>;
  /** Run a cycle now, then one after every delay until stopped */
  start: () => Promise<void>;
  /** Cancel the pending cycle */
  stop: () => void;
  getSnapshot: () => PollerSnapshot;
}>;

/**
 * Create a poller. State lives in the closure and is touched only by the
 * cycle currently running; cycles never overlap.
 */
export function createPoller(deps: PollerDeps): Poller {
  const now = deps.now ?? Date.now;
  const scheduler = deps.scheduler ?? timerScheduler;

  let state: PollerState = createInitialState(
    deps.initialCheckpoint ?? checkpointFromTime(now()),
  );
  let isRunning = false;
  let cancelPending: (() => void) | null = null;
  // Set while a scheduled cycle runs; it re-arms the timer when it finishes
  let tickInFlight = false;
  let lastOutcome: CycleOutcome | null = null;
  let lastPollTime: number | null = null;
  let cycles = 0;

  // ===========================================================================
  // Failure Handling
  // ===========================================================================

  /**
   * Report a failed cycle to the chat. The checkpoint is left alone so the
   * same window is requested again next cycle.
   */
  const handleFailure = async (error: CycleError): Promise<CycleReport> => {
    const message = formatFailureMessage(error);
    log.error(
      { errorType: error.type, error: formatCycleError(error) },
      "Poll cycle failed",
    );

    await deps.notifier.notify(message);

    return { outcome: "failed", checkpoint: state.checkpoint, message, error };
  };

  // ===========================================================================
  // Cycle
  // ===========================================================================

  const fetchPage = async (
    checkpoint: Checkpoint,
  ): Promise<Result<StatusPage, StatusApiError>> => {
    const response = await deps.statusClient.fetchStatuses(checkpoint);
    return response.andThen(validateResponse);
  };

  const executeCycle = async (): Promise<CycleReport> => {
    const page = await fetchPage(state.checkpoint);
    if (page.isErr()) {
      return handleFailure(page.error);
    }

    const item = selectLatestItem(page.value.items);
    if (item === undefined) {
      log.debug({ checkpoint: state.checkpoint }, "No status updates");
      return { outcome: "no_updates", checkpoint: state.checkpoint };
    }

    const interpreted = interpretStatus(item);
    if (interpreted.isErr()) {
      return handleFailure(interpreted.error);
    }

    const message = interpreted.value;

    if (!isNovelMessage(state, message)) {
      log.debug({ message }, "Status unchanged since last notification");
      state = advanceCheckpoint(state, page.value.nextCheckpoint);
      return { outcome: "unchanged", checkpoint: state.checkpoint, message };
    }

    const delivery = await deps.notifier.notify(message);
    if (delivery.isErr()) {
      log.warn({ message }, "Change not delivered, retrying next cycle");
      return { outcome: "delivery_failed", checkpoint: state.checkpoint, message };
    }

    state = advanceCheckpoint(
      recordNotification(state, message),
      page.value.nextCheckpoint,
    );
    log.info({ message, checkpoint: state.checkpoint }, "Status change notified");
    return { outcome: "notified", checkpoint: state.checkpoint, message };
  };

  const runCycle = async (): Promise<CycleReport> => {
    const pollTime = now();
    const startTime = Date.now();
    cycles += 1;
    logOperationStart(log, "pollCycle", { checkpoint: state.checkpoint });

    let report: CycleReport;
    try {
      report = await executeCycle();
    } catch (error) {
      logOperationFailed(log, "pollCycle", error);
      report = await handleFailure(unexpectedError(error));
    }

    lastOutcome = report.outcome;
    lastPollTime = pollTime;
    logOperationComplete(log, "pollCycle", startTime, {
      outcome: report.outcome,
      checkpoint: report.checkpoint,
    });
    return report;
  };

  // ===========================================================================
  // Loop
  // ===========================================================================

  const tick = async (): Promise<void> => {
    tickInFlight = true;
    try {
      await runCycle();
    } catch (error) {
      logOperationFailed(log, "pollCycle", error);
    } finally {
      tickInFlight = false;
    }

    if (!isRunning) return;

    cancelPending = scheduler.schedule(() => {
      cancelPending = null;
      tick().catch((error: unknown) => {
        logOperationFailed(log, "pollCycle", error);
      });
    }, deps.intervalMs);
  };

  const start = async (): Promise<void> => {
    if (isRunning) {
      log.warn("Poller already running");
      return;
    }

    isRunning = true;
    if (tickInFlight) {
      log.info("Cycle in flight, loop resumes when it finishes");
      return;
    }

    log.info(
      { intervalMs: deps.intervalMs, checkpoint: state.checkpoint },
      "Starting poll loop...",
    );
    await tick();
  };

  const stop = (): void => {
    if (!isRunning) {
      log.warn("Poller not running");
      return;
    }

    log.info("Stopping poll loop...");
    isRunning = false;
    cancelPending?.();
    cancelPending = null;
  };

  const getSnapshot = (): PollerSnapshot => ({
    isRunning,
    checkpoint: state.checkpoint,
    lastNotification: state.lastNotification,
    lastOutcome,
    lastPollTime,
    cycles,
  });

  return { runCycle, start, stop, getSnapshot };
}
