/**
 * Review Module - Error Types
 *
 * Typed error union for interpreting a tracked item.
 * Errors are values, not exceptions.
 */

/**
 * Union type of all possible interpretation errors.
 */
export type ReviewError =
  | { readonly type: "MISSING_FIELD"; readonly fields: ReadonlyArray<string> }
  | { readonly type: "UNKNOWN_STATUS"; readonly status: unknown };

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Create a MISSING_FIELD error.
 */
export function missingField(fields: ReadonlyArray<string>): ReviewError {
  return { type: "MISSING_FIELD", fields };
}

/**
 * Create an UNKNOWN_STATUS error.
 */
export function unknownStatus(status: unknown): ReviewError {
  return { type: "UNKNOWN_STATUS", status };
}

/**
 * Format a ReviewError for logging and failure reports.
 */
export function formatReviewError(error: ReviewError): string {
  switch (error.type) {
    case "MISSING_FIELD":
      return `Homework record is missing fields: ${error.fields.join(", ")}`;
    case "UNKNOWN_STATUS":
      return `Unknown review status: ${JSON.stringify(error.status) ?? String(error.status)}`;
  }
}
