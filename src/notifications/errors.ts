/**
 * Notifications Module - Error Types
 *
 * Typed error union for all delivery failures.
 * Errors are values, not exceptions.
 */

/**
 * Union type of all possible notification errors.
 */
export type NotificationError =
  | { type: "SEND_FAILED"; message: string; statusCode?: number }
  | { type: "NETWORK_ERROR"; message: string; cause?: Error };

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Create a SEND_FAILED error.
 */
export function sendFailed(
  message: string,
  statusCode?: number,
): NotificationError {
  return statusCode !== undefined
    ? { type: "SEND_FAILED", message, statusCode }
    : { type: "SEND_FAILED", message };
}

/**
 * Create a NETWORK_ERROR error.
 */
export function networkError(
  message: string,
  cause?: Error,
): NotificationError {
  return cause !== undefined
    ? { type: "NETWORK_ERROR", message, cause }
    : { type: "NETWORK_ERROR", message };
}

/**
 * Format a NotificationError for logging.
 */
export function formatNotificationError(error: NotificationError): string {
  switch (error.type) {
    case "SEND_FAILED":
      return `Telegram rejected the message: ${error.message}`;
    case "NETWORK_ERROR":
      return `Telegram unreachable: ${error.message}`;
  }
}
