/**
 * Notifications Module - Service Layer
 *
 * Telegram Bot API integration for sending notifications.
 *
 * Delivery never throws: failures are logged here and handed back as
 * values, so a broken chat cannot stop the poll loop that reports through it.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  formatNotificationError,
  networkError,
  sendFailed,
} from "./errors.js";
import type { NotificationError } from "./errors.js";
import type { NotifierConfig } from "./schema.js";
import { TelegramResponseSchema } from "./schema.js";
import { buildSendMessageRequest, buildSendMessageUrl } from "./transform.js";

const log = createLogger("notifications");

/**
 * Delivers messages to the configured chat.
 */
export type Notifier = Readonly<{
  notify: (message: string) => Promise<Result<void, NotificationError>>;
}>;

/**
 * Send a message through the Telegram Bot API.
 *
 * @param config - Bot credentials and destination
 * @param message - Message text to send
 * @returns Result with void on success or error
 */
export async function sendTelegramMessage(
  config: NotifierConfig,
  message: string,
): Promise<Result<void, NotificationError>> {
  const url = buildSendMessageUrl(config.apiUrl, config.token);
  const payload = buildSendMessageRequest(config.chatId, message);

  log.debug({ chatId: config.chatId }, "Sending Telegram notification...");

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    return err(
      networkError(message, error instanceof Error ? error : undefined),
    );
  }

  const body: unknown = await response.json().catch(() => null);
  const parsed = TelegramResponseSchema.safeParse(body);

  if (!response.ok || !parsed.success || !parsed.data.ok) {
    const description =
      (parsed.success ? parsed.data.description : undefined) ??
      response.statusText;
    return err(
      sendFailed(
        `Bot API returned ${response.status}: ${description}`,
        response.status,
      ),
    );
  }

  log.info({ chatId: config.chatId }, "Telegram notification sent successfully");
  return ok(undefined);
}

/**
 * Create a notifier bound to one bot and chat.
 * Delivery failures are logged and returned, never thrown.
 */
export function createTelegramNotifier(config: NotifierConfig): Notifier {
  const notify = async (
    message: string,
  ): Promise<Result<void, NotificationError>> => {
    try {
      const result = await sendTelegramMessage(config, message);
      if (result.isErr()) {
        log.error(
          { error: formatNotificationError(result.error) },
          "Failed to send Telegram notification",
        );
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ error: message }, "Failed to send Telegram notification");
      return err(
        networkError(message, error instanceof Error ? error : undefined),
      );
    }
  };

  return { notify };
}
