/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * The watcher refuses to start on invalid config - fail fast.
 *
 * Review Status Watcher configuration covering:
 * - Status API credentials and endpoint
 * - Telegram bot credentials and destination chat
 * - Polling cadence
 * - Optional health server
 */
import "dotenv/config";
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

// =============================================================================
// Logging Configuration
// =============================================================================

/**
 * Logging settings are read eagerly so loggers can exist before the
 * full configuration has been validated. Invalid values fall back to defaults.
 */
const LoggingConfigSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .catch("production")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .catch("info")
    .describe("Pino log level"),
});

export const loggingConfig = LoggingConfigSchema.parse(process.env);

// =============================================================================
// Application Configuration
// =============================================================================

/**
 * Required secrets: empty strings count as missing.
 */
const requiredSecret = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

/**
 * Parse optional port - empty string becomes undefined
 */
const optionalPort = z.preprocess(
  (val) => (typeof val === "string" && val.trim() === "" ? undefined : val),
  z.coerce.number().int().positive().optional(),
);

const ConfigSchema = z.object({
  // ==========================================================================
  // Status API
  // ==========================================================================
  PRACTICUM_TOKEN: requiredSecret("PRACTICUM_TOKEN").describe(
    "OAuth token for the homework status API",
  ),
  STATUS_ENDPOINT: z
    .string()
    .url()
    .default("https://practicum.yandex.ru/api/user_api/homework_statuses/")
    .describe("Homework status endpoint"),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30000)
    .describe("HTTP timeout for a single status request (ms)"),

  // ==========================================================================
  // Telegram
  // ==========================================================================
  TELEGRAM_TOKEN: requiredSecret("TELEGRAM_TOKEN").describe(
    "Telegram bot token",
  ),
  TELEGRAM_CHAT_ID: requiredSecret("TELEGRAM_CHAT_ID").describe(
    "Chat that receives notifications",
  ),
  TELEGRAM_API_URL: z
    .string()
    .url()
    .default("https://api.telegram.org")
    .describe("Telegram Bot API base URL"),

  // ==========================================================================
  // Polling
  // ==========================================================================
  RETRY_PERIOD_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(600)
    .describe("Fixed delay between poll cycles (seconds)"),

  // ==========================================================================
  // Health Server
  // ==========================================================================
  HEALTH_PORT: optionalPort.describe(
    "Port for the health API; disabled when unset",
  ),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

/**
 * Variables the watcher cannot run without.
 */
export const REQUIRED_VARIABLES = [
  "PRACTICUM_TOKEN",
  "TELEGRAM_TOKEN",
  "TELEGRAM_CHAT_ID",
] as const;

// =============================================================================
// Config Errors
// =============================================================================

export type ConfigError = Readonly<{
  type: "CONFIG_ERROR";
  message: string;
  /** Variables that are absent or empty */
  missing: ReadonlyArray<string>;
  /** Every variable that failed validation, with its reason */
  issues: ReadonlyArray<string>;
}>;

/**
 * Format a ConfigError for logging.
 */
export function formatConfigError(error: ConfigError): string {
  return error.message;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Parse and validate configuration from an environment map.
 *
 * @param env - Environment variables (usually process.env)
 * @returns Result with the immutable Config or a CONFIG_ERROR
 *
 * @example
 * const result = loadConfig(process.env);
 * if (result.isErr()) process.exit(1);
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>>,
): Result<Config, ConfigError> {
  const parsed = ConfigSchema.safeParse(env);

  if (parsed.success) {
    return ok(Object.freeze(parsed.data));
  }

  const issues = parsed.error.issues.map(
    (issue) => `${issue.path.join(".")}: ${issue.message}`,
  );
  const missing = REQUIRED_VARIABLES.filter(
    (name) => (env[name] ?? "").trim() === "",
  );

  const message =
    missing.length > 0
      ? `Missing environment variables: ${missing.join(", ")}`
      : `Invalid configuration: ${issues.join("; ")}`;

  return err({ type: "CONFIG_ERROR", message, missing, issues });
}
