/**
 * API Module - Public API
 *
 * Assembles the health server application.
 */
import { Hono } from "hono";

import type { PollerSnapshot } from "../poller/index.js";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { createRoutes } from "./routes.js";

/**
 * Create the health server app with request tracing and error handling.
 */
export function createApp(getSnapshot: () => PollerSnapshot): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(getSnapshot));
  app.notFound((c) => c.json({ error: "Not found", path: c.req.path }, 404));

  return app;
}
