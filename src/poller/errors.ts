/**
 * Poller Module - Error Types
 *
 * Every error a cycle can end with. All of them are recoverable:
 * the loop reports them and tries again after the usual delay.
 */
import { type ReviewError, formatReviewError } from "../review/index.js";
import {
  type StatusApiError,
  formatStatusApiError,
} from "../status-api/index.js";

export type CycleError =
  | StatusApiError
  | ReviewError
  | { readonly type: "UNEXPECTED"; readonly message: string; readonly cause?: Error };

/**
 * Wrap an exception thrown inside a cycle.
 */
export function unexpectedError(error: unknown): CycleError {
  if (error instanceof Error) {
    return { type: "UNEXPECTED", message: error.message, cause: error };
  }
  return { type: "UNEXPECTED", message: String(error) };
}

/**
 * Format a CycleError for logging and failure reports.
 */
export function formatCycleError(error: CycleError): string {
  switch (error.type) {
    case "TRANSPORT_FAILURE":
    case "PROTOCOL_FAILURE":
    case "SCHEMA_ERROR":
      return formatStatusApiError(error);
    case "MISSING_FIELD":
    case "UNKNOWN_STATUS":
      return formatReviewError(error);
    case "UNEXPECTED":
      return error.message;
  }
}
