/**
 * Review Module - Schemas and Types
 *
 * Review statuses and the verdict phrase for each.
 */
import { z } from "zod";

// =============================================================================
// Review Status
// =============================================================================

export const ReviewStatusSchema = z
  .enum(["approved", "reviewing", "rejected"])
  .describe("Review status reported by the API");

export type ReviewStatus = z.infer<typeof ReviewStatusSchema>;

/**
 * Item fields required to build a notification.
 */
export const NAME_FIELD = "homework_name";
export const STATUS_FIELD = "status";

export const REQUIRED_FIELDS = [NAME_FIELD, STATUS_FIELD] as const;

// =============================================================================
// Verdicts
// =============================================================================

/**
 * Notification phrase for each review status.
 */
export const VERDICTS: Readonly<Record<ReviewStatus, string>> = Object.freeze({
  approved: "Reviewed: the reviewer liked everything. Hooray!",
  reviewing: "Placed under review by reviewer.",
  rejected: "Reviewed: the reviewer has comments.",
});
