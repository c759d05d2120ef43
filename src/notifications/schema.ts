/**
 * Notifications Module - Schemas and Types
 *
 * Defines the data shapes for Telegram Bot API notifications.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Telegram Bot API Schemas
// =============================================================================

/**
 * sendMessage request payload.
 */
const SendMessageRequestSchema = z.object({
  chat_id: z.string().describe("Destination chat ID or @channel name"),
  text: z.string().describe("Message text to send"),
});

export type SendMessageRequest = z.infer<typeof SendMessageRequestSchema>;

/**
 * Bot API response envelope. Errors come back with ok=false and a description.
 */
export const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

// =============================================================================
// Notifier Contract
// =============================================================================

/**
 * Settings the notifier needs from the application config.
 */
export type NotifierConfig = Readonly<{
  apiUrl: string;
  token: string;
  chatId: string;
  timeoutMs: number;
}>;
