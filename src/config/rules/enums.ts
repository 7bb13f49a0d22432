/**
 * Domain enumerations for policy filtering and quality scoring.
 *
 * These are closed sets. Every switch over them is exhaustive, so adding a
 * member is a compile error until each verdict/rating mapping handles it.
 */

import { z } from "zod";

/**
 * Category of a detected policy issue.
 */
export const PolicyCategory = z.enum([
  "profanity",
  "violence",
  "harassment",
  "hate_speech",
  "sponsor",
  "promotional",
  "misinformation",
  "spam",
  "copyright",
  "other",
]);
export type PolicyCategory = z.infer<typeof PolicyCategory>;

/**
 * Severity of a single flag, ordered low → critical.
 */
export const FlagSeverity = z.enum(["low", "medium", "high", "critical"]);
export type FlagSeverity = z.infer<typeof FlagSeverity>;

/** Rank of each severity, for ordering and comparison. */
export const SEVERITY_RANK: Readonly<Record<FlagSeverity, number>> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

/**
 * Compliance verdict for a filtering pass, and rating of the
 * article-level policy check.
 */
export const ComplianceStatus = z.enum(["compliant", "warning", "flagged", "blocked"]);
export type ComplianceStatus = z.infer<typeof ComplianceStatus>;

/**
 * Coarse bucket derived from the overall quality score.
 */
export const QualityRating = z.enum(["excellent", "good", "fair", "poor"]);
export type QualityRating = z.infer<typeof QualityRating>;

export const RecommendationCategory = z.enum(["content", "seo", "structure", "style"]);
export type RecommendationCategory = z.infer<typeof RecommendationCategory>;

export const RecommendationSeverity = z.enum(["info", "warning", "critical"]);
export type RecommendationSeverity = z.infer<typeof RecommendationSeverity>;

/**
 * Article-level policy dimensions scored by the quality check.
 * The promotional and sponsor dimensions read the analysis flags,
 * the rest read the article text.
 */
export const PolicyDimension = z.enum([
  "profanity",
  "violence",
  "harassment",
  "hate_speech",
  "misinformation",
]);
export type PolicyDimension = z.infer<typeof PolicyDimension>;
