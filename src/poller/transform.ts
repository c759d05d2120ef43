/**
 * Poller Module - Pure Transformations
 *
 * Change tracking and checkpoint bookkeeping.
 * No side effects, no I/O - just data in, data out.
 */
import type { Checkpoint } from "../status-api/index.js";
import type { CycleError } from "./errors.js";
import { formatCycleError } from "./errors.js";
import type { PollerState } from "./schema.js";

// =============================================================================
// Change Tracking
// =============================================================================

/**
 * Check whether a message differs from the last delivered one.
 * Always true before the first delivery, including for "".
 */
export function isNovelMessage(state: PollerState, text: string): boolean {
  return state.lastNotification !== text;
}

/**
 * Remember a delivered message. Call only after delivery succeeded.
 */
export function recordNotification(
  state: PollerState,
  text: string,
): PollerState {
  return { ...state, lastNotification: text };
}

// =============================================================================
// Checkpoints
// =============================================================================

/**
 * Checkpoint for a wall-clock time in milliseconds.
 *
 * @example
 * checkpointFromTime(1_700_000_000_999) // 1700000000
 */
export function checkpointFromTime(timeMs: number): Checkpoint {
  return Math.floor(timeMs / 1000);
}

/**
 * Move the checkpoint to the server-provided one.
 * Missing or older checkpoints leave the state unchanged.
 */
export function advanceCheckpoint(
  state: PollerState,
  next: Checkpoint | undefined,
): PollerState {
  if (next === undefined || next <= state.checkpoint) {
    return state;
  }
  return { ...state, checkpoint: next };
}

// =============================================================================
// Failure Reports
// =============================================================================

/**
 * Format the chat message reporting a failed cycle.
 *
 * @example
 * formatFailureMessage({ type: "UNKNOWN_STATUS", status: "lost" })
 * // 'Program failure: Unknown review status: "lost"'
 */
export function formatFailureMessage(error: CycleError): string {
  return `Program failure: ${formatCycleError(error)}`;
}
