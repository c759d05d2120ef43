/**
 * Notifications Module - Pure Transformations
 *
 * Request building for the Telegram Bot API.
 */
import type { SendMessageRequest } from "./schema.js";

/**
 * Build the sendMessage endpoint URL for a bot.
 *
 * @example
 * buildSendMessageUrl("https://api.telegram.org/", "test-token")
 * // "https://api.telegram.org/bottest-token/sendMessage"
 */
export function buildSendMessageUrl(apiUrl: string, token: string): string {
  return `${apiUrl.replace(/\/+$/, "")}/bot${token}/sendMessage`;
}

/**
 * Build sendMessage request payload.
 */
export function buildSendMessageRequest(
  chatId: string,
  message: string,
): SendMessageRequest {
  return {
    chat_id: chatId,
    text: message,
  };
}
