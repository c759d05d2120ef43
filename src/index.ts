/**
 * Review Status Watcher - Application Entry Point
 *
 * Sets up:
 * - Configuration (fail fast on missing credentials)
 * - Status API client and Telegram notifier
 * - Main poll loop
 * - Optional health server
 * - Graceful shutdown
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/index.js";
import { formatConfigError, loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createTelegramNotifier } from "./notifications/index.js";
import { createPoller } from "./poller/index.js";
import { createStatusClient } from "./status-api/index.js";

const log = createLogger("app");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  REVIEW STATUS WATCHER");
console.log("========================================");
console.log("");

// =============================================================================
// CONFIGURATION
// =============================================================================

const configResult = loadConfig(process.env);

if (configResult.isErr()) {
  const error = configResult.error;
  log.fatal({ missing: error.missing, issues: error.issues }, formatConfigError(error));
  console.error(`❌ ${formatConfigError(error)}`);
  process.exit(1);
}

const config = configResult.value;

// Log configuration summary (non-sensitive values only)
log.info(
  {
    endpoint: config.STATUS_ENDPOINT,
    chatId: config.TELEGRAM_CHAT_ID,
    retryPeriodSeconds: config.RETRY_PERIOD_SECONDS,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    healthPort: config.HEALTH_PORT ?? null,
  },
  "Configuration loaded",
);

// =============================================================================
// POLL LOOP
// =============================================================================

const poller = createPoller({
  statusClient: createStatusClient({
    endpoint: config.STATUS_ENDPOINT,
    token: config.PRACTICUM_TOKEN,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  }),
  notifier: createTelegramNotifier({
    apiUrl: config.TELEGRAM_API_URL,
    token: config.TELEGRAM_TOKEN,
    chatId: config.TELEGRAM_CHAT_ID,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  }),
  intervalMs: config.RETRY_PERIOD_SECONDS * 1000,
});

// =============================================================================
// HEALTH SERVER
// =============================================================================

const healthPort = config.HEALTH_PORT;
const server =
  healthPort === undefined
    ? null
    : serve({ fetch: createApp(poller.getSnapshot).fetch, port: healthPort }, (info) => {
        log.info({ port: info.port }, `🚀 Health server listening on port ${info.port}`);
      });

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  poller.stop();
  server?.close();

  log.info("Shutdown complete");
  process.exit(0);
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

// Runs until a signal stops it
poller.start().catch((error: unknown) => {
  log.error({ error }, "Poll loop crashed");
});
