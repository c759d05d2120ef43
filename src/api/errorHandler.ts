/**
 * Global error boundary for the health server.
 * A failing route never touches the poll loop; it is logged and answered
 * with a fixed JSON body.
 */
import type { ErrorHandler } from "hono";

import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      operation: "healthRequest",
      requestId,
      error: err.message,
      path: c.req.path,
    },
    `✗ ${c.req.method} ${c.req.path} failed: ${err.message}`,
  );

  return c.json({ error: "Internal server error", requestId }, 500);
};
