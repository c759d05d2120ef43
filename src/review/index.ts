/**
 * Review Module - Public API
 */

// Types
export type { ReviewStatus } from "./schema.js";
export type { ReviewError } from "./errors.js";

export { VERDICTS } from "./schema.js";

// Error utilities
export { formatReviewError } from "./errors.js";

// Pure transformations
export {
  formatStatusMessage,
  interpretStatus,
  selectLatestItem,
} from "./transform.js";
