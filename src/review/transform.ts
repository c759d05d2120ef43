/**
 * Review Module - Pure Transformations
 *
 * Turns a tracked item into notification text.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { TrackedItem } from "../status-api/index.js";
import type { ReviewError } from "./errors.js";
import { missingField, unknownStatus } from "./errors.js";
import {
  NAME_FIELD,
  REQUIRED_FIELDS,
  ReviewStatusSchema,
  STATUS_FIELD,
  VERDICTS,
} from "./schema.js";

/**
 * Pick the item to report on. The API lists items newest first.
 *
 * @returns The newest item, or undefined for an empty list
 */
export function selectLatestItem(
  items: ReadonlyArray<TrackedItem>,
): TrackedItem | undefined {
  return items[0];
}

/**
 * Format the change notification for a named item.
 *
 * @example
 * formatStatusMessage("hw1", "Placed under review by reviewer.")
 * // 'Changed review status for "hw1". Placed under review by reviewer.'
 */
export function formatStatusMessage(name: string, verdict: string): string {
  return `Changed review status for "${name}". ${verdict}`;
}

/**
 * Interpret a tracked item as notification text.
 *
 * @param item - A record from the status page
 * @returns Result with the message or MISSING_FIELD / UNKNOWN_STATUS
 */
export function interpretStatus(item: TrackedItem): Result<string, ReviewError> {
  const missing = REQUIRED_FIELDS.filter((field) => !(field in item));
  if (missing.length > 0) {
    return err(missingField(missing));
  }

  const status = ReviewStatusSchema.safeParse(item[STATUS_FIELD]);
  if (!status.success) {
    return err(unknownStatus(item[STATUS_FIELD]));
  }

  return ok(formatStatusMessage(String(item[NAME_FIELD]), VERDICTS[status.data]));
}
