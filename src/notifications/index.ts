/**
 * Notifications Module - Public API
 *
 * Exports types, service functions, and transformations for the notifications module.
 */

// Types
export type { NotifierConfig, SendMessageRequest } from "./schema.js";
export type { NotificationError } from "./errors.js";
export type { Notifier } from "./service.js";

export { formatNotificationError } from "./errors.js";

// Service functions
export { createTelegramNotifier, sendTelegramMessage } from "./service.js";

// Pure transformations (for testing and external use)
export { buildSendMessageRequest, buildSendMessageUrl } from "./transform.js";
