/**
 * Status API Module - Schemas and Types
 *
 * Defines the data shapes returned by the homework status endpoint.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Raw Response
// =============================================================================

/**
 * Key of the tracked-items list in the response body.
 */
export const ITEMS_KEY = "homeworks";

/**
 * Key of the next checkpoint in the response body.
 */
export const CHECKPOINT_KEY = "current_date";

/**
 * Any key-value body. Arrays and null are rejected.
 */
export const ResponseBodySchema = z.record(z.string(), z.unknown());

/**
 * A single entry of the items list. Field checks happen in the review module.
 */
export const TrackedItemSchema = z.record(z.string(), z.unknown());

export type TrackedItem = Readonly<z.infer<typeof TrackedItemSchema>>;

export const TrackedItemListSchema = z.array(TrackedItemSchema);

/**
 * Checkpoints are integer Unix timestamps (seconds).
 */
export const CheckpointSchema = z.number().int().finite();

export type Checkpoint = z.infer<typeof CheckpointSchema>;

// =============================================================================
// Validated Page
// =============================================================================

/**
 * A validated response: items in server order (newest first) and the
 * server-provided checkpoint, if any.
 */
export type StatusPage = Readonly<{
  items: ReadonlyArray<TrackedItem>;
  nextCheckpoint?: Checkpoint;
}>;
