/**
 * Status API Module - Service Layer
 *
 * Side effects happen here: HTTP calls to the homework status endpoint.
 * Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { StatusApiError } from "./errors.js";
import { protocolFailure, transportFailure } from "./errors.js";
import type { Checkpoint } from "./schema.js";

const log = createLogger("status");

/**
 * Settings the status client needs from the application config.
 */
export type StatusClientConfig = Readonly<{
  endpoint: string;
  token: string;
  timeoutMs: number;
}>;

/**
 * Issues status requests against the remote endpoint.
 */
export type StatusClient = Readonly<{
  /**
   * Fetch statuses changed after the checkpoint.
   * Returns the raw decoded body; schema validation is left to the caller.
   */
  fetchStatuses: (
    checkpoint: Checkpoint,
  ) => Promise<Result<unknown, StatusApiError>>;
}>;

/**
 * Build the request URL for a checkpoint.
 */
export function buildStatusUrl(endpoint: string, checkpoint: Checkpoint): string {
  const url = new URL(endpoint);
  url.searchParams.set("from_date", String(checkpoint));
  return url.toString();
}

/**
 * Create a status client bound to an endpoint and token.
 *
 * One request per call, no retries: the poll loop's fixed delay is the
 * retry mechanism.
 */
export function createStatusClient(config: StatusClientConfig): StatusClient {
  const fetchStatuses = async (
    checkpoint: Checkpoint,
  ): Promise<Result<unknown, StatusApiError>> => {
    const url = buildStatusUrl(config.endpoint, checkpoint);

    log.debug({ url, checkpoint }, "Requesting homework statuses...");

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          Authorization: `OAuth ${config.token}`,
        },
        signal: AbortSignal.timeout(config.timeoutMs),
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      // Handle timeout specifically
      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(
          transportFailure(`Request timed out after ${config.timeoutMs}ms`, cause),
        );
      }

      return err(transportFailure(cause.message, cause));
    }

    if (!response.ok) {
      log.warn({ statusCode: response.status }, "Status API returned an error");
      return err(
        protocolFailure(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
        ),
      );
    }

    try {
      const data: unknown = await response.json();
      log.debug("Statuses received");
      return ok(data);
    } catch {
      return err(
        protocolFailure("Response body is not valid JSON", response.status),
      );
    }
  };

  return { fetchStatuses };
}
