/**
 * API routes for the Review Status Watcher health server.
 *
 * - /api/health - Liveness check
 * - /api/state - Poller snapshot
 */
import { Hono } from "hono";

import { createLogger } from "../logger.js";
import type { PollerSnapshot } from "../poller/index.js";

const log = createLogger("api");

/**
 * Build the health routes around a poller snapshot source.
 */
export function createRoutes(getSnapshot: () => PollerSnapshot): Hono {
  const routes = new Hono();

  /**
   * Health endpoint - used by container orchestration and monitoring.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
    });
  });

  /**
   * Current poller state.
   */
  routes.get("/api/state", (c) => {
    const snapshot = getSnapshot();

    return c.json({
      ...snapshot,
      lastPollTime:
        snapshot.lastPollTime === null
          ? null
          : new Date(snapshot.lastPollTime).toISOString(),
    });
  });

  return routes;
}
