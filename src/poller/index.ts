/**
 * Poller Module - Public API
 *
 * Exports types and service functions for the main poll loop.
 */

// Types
export type {
  CycleOutcome,
  CycleReport,
  PollerSnapshot,
  PollerState,
  Scheduler,
} from "./schema.js";
export type { CycleError } from "./errors.js";
export type { Poller, PollerDeps } from "./service.js";

export { createInitialState, timerScheduler } from "./schema.js";
export { formatCycleError } from "./errors.js";

// Service functions
export { createPoller } from "./service.js";

// Pure transformations
export {
  advanceCheckpoint,
  checkpointFromTime,
  formatFailureMessage,
  isNovelMessage,
  recordNotification,
} from "./transform.js";
