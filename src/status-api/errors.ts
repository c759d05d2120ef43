/**
 * Status API Module - Error Types
 *
 * Typed error unions for status requests and response validation.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while fetching or validating a status page.
 *
 * TRANSPORT_FAILURE and PROTOCOL_FAILURE stay distinct so callers can
 * apply different retry policies to them.
 */
export type StatusApiError =
  | {
      readonly type: "TRANSPORT_FAILURE";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PROTOCOL_FAILURE";
      readonly message: string;
      readonly statusCode: number;
    }
  | {
      readonly type: "SCHEMA_ERROR";
      readonly message: string;
      readonly responseData?: unknown;
    };

/**
 * Create a TRANSPORT_FAILURE error.
 */
export function transportFailure(
  message: string,
  cause?: Error,
): StatusApiError {
  if (cause) {
    return { type: "TRANSPORT_FAILURE", message, cause };
  }
  return { type: "TRANSPORT_FAILURE", message };
}

/**
 * Create a PROTOCOL_FAILURE error.
 */
export function protocolFailure(
  message: string,
  statusCode: number,
): StatusApiError {
  return { type: "PROTOCOL_FAILURE", message, statusCode };
}

/**
 * Create a SCHEMA_ERROR.
 */
export function schemaError(
  message: string,
  responseData?: unknown,
): StatusApiError {
  return { type: "SCHEMA_ERROR", message, responseData };
}

/**
 * Format a StatusApiError for logging and failure reports.
 */
export function formatStatusApiError(error: StatusApiError): string {
  switch (error.type) {
    case "TRANSPORT_FAILURE":
      return `Status API unreachable: ${error.message}`;
    case "PROTOCOL_FAILURE":
      return `Status API request failed: ${error.message}`;
    case "SCHEMA_ERROR":
      return `Unexpected status API response: ${error.message}`;
  }
}
