/**
 * Status API Module - Pure Transformations
 *
 * Response validation. No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { StatusApiError } from "./errors.js";
import { schemaError } from "./errors.js";
import type { StatusPage } from "./schema.js";
import {
  CHECKPOINT_KEY,
  CheckpointSchema,
  ITEMS_KEY,
  ResponseBodySchema,
  TrackedItemListSchema,
} from "./schema.js";

/**
 * Describe the runtime type of a value for error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Validate a decoded response body and extract the status page.
 *
 * An absent items key is an error; an explicit empty list is a valid,
 * empty page. A missing or non-integer checkpoint leaves `nextCheckpoint`
 * unset so the caller keeps its own.
 *
 * @param payload - Decoded JSON body
 * @returns Result with StatusPage or SCHEMA_ERROR
 *
 * @example
 * validateResponse({ homeworks: [], current_date: 1000 })
 * // ok({ items: [], nextCheckpoint: 1000 })
 */
export function validateResponse(
  payload: unknown,
): Result<StatusPage, StatusApiError> {
  const body = ResponseBodySchema.safeParse(payload);
  if (!body.success) {
    return err(
      schemaError(
        `Expected a key-value object, received ${describeType(payload)}`,
        payload,
      ),
    );
  }

  if (!(ITEMS_KEY in body.data)) {
    return err(schemaError(`Response is missing the "${ITEMS_KEY}" key`, payload));
  }

  const rawItems = body.data[ITEMS_KEY];
  if (!Array.isArray(rawItems)) {
    return err(
      schemaError(
        `"${ITEMS_KEY}" must be a list, received ${describeType(rawItems)}`,
        payload,
      ),
    );
  }

  const items = TrackedItemListSchema.safeParse(rawItems);
  if (!items.success) {
    return err(
      schemaError(`"${ITEMS_KEY}" must contain only objects`, payload),
    );
  }

  const checkpoint = CheckpointSchema.safeParse(body.data[CHECKPOINT_KEY]);

  return ok(
    checkpoint.success
      ? { items: items.data, nextCheckpoint: checkpoint.data }
      : { items: items.data },
  );
}
