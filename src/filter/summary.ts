/**
 * Verdicts and digests derived from a list of flags.
 */

import type { ComplianceStatus } from "../config/rules/enums.js";
import type { PolicyFlag } from "../types/results.js";

export const ALL_CLEAR_SUMMARY = "Content passed all policy checks. No issues detected.";

/**
 * Compliance verdict, by precedence: any critical flag blocks, any high
 * flag flags, any other flag warns.
 */
export function determineCompliance(flags: readonly PolicyFlag[]): ComplianceStatus {
  if (flags.some((f) => f.severity === "critical")) {
    return "blocked";
  }
  if (flags.some((f) => f.severity === "high")) {
    return "flagged";
  }
  if (flags.length > 0) {
    return "warning";
  }
  return "compliant";
}

/**
 * "hate_speech" → "Hate Speech"
 */
export function titleCase(category: string): string {
  return category
    .split("_")
    .map((word) => (word.length > 0 ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(" ");
}

/**
 * One line per high or critical flag.
 */
export function identifyQualityIssues(flags: readonly PolicyFlag[]): string[] {
  return flags
    .filter((f) => f.severity === "critical" || f.severity === "high")
    .map((f) => `${titleCase(f.category)}: ${f.message}`);
}

/**
 * Flag counts per category, in first-seen order.
 */
export function countByCategory(flags: readonly PolicyFlag[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const flag of flags) {
    counts.set(flag.category, (counts.get(flag.category) ?? 0) + 1);
  }
  return counts;
}

/**
 * Format a 0-1 score as a percentage with one decimal, e.g. "62.5%".
 */
export function formatPercent(score: number, decimals = 1): string {
  return `${(score * 100).toFixed(decimals)}%`;
}

export interface SummaryThresholds {
  /** Score at or below which a flag-free result is all clear */
  readonly allClearThreshold: number;
  /** Score above which the summary mentions the score */
  readonly summaryThreshold: number;
}

/**
 * Pipe-separated digest of a filtering pass.
 */
export function generateSummary(
  flags: readonly PolicyFlag[],
  promotionalScore: number,
  sponsorMentions: readonly string[],
  thresholds: SummaryThresholds
): string {
  if (
    flags.length === 0 &&
    promotionalScore <= thresholds.allClearThreshold &&
    sponsorMentions.length === 0
  ) {
    return ALL_CLEAR_SUMMARY;
  }

  const parts: string[] = [];

  const counts = countByCategory(flags);
  if (counts.size > 0) {
    const breakdown = [...counts].map(([category, count]) => `${count} ${category}`).join(", ");
    parts.push(`Issues detected: ${breakdown}`);
  }

  if (promotionalScore > thresholds.summaryThreshold) {
    parts.push(`Promotional content score: ${formatPercent(promotionalScore)}`);
  }

  if (sponsorMentions.length > 0) {
    parts.push(`Sponsor mentions: ${sponsorMentions.slice(0, 3).join(", ")}`);
  }

  return parts.length > 0 ? parts.join(" | ") : "Content review completed.";
}
