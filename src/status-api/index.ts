/**
 * Status API Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type { Checkpoint, StatusPage, TrackedItem } from "./schema.js";
export type { StatusApiError } from "./errors.js";
export type { StatusClient, StatusClientConfig } from "./service.js";

// Error utilities
export { formatStatusApiError } from "./errors.js";

// Service functions (side effects)
export { createStatusClient } from "./service.js";

// Pure transformations
export { validateResponse } from "./transform.js";
