/**
 * Plain-text digests of filter results and assessments, for the CLI and logs.
 */

import type { RecommendationSeverity } from "../config/rules/enums.js";
import { titleCase } from "../filter/summary.js";
import type {
  ContentFilterResult,
  PolicyFlag,
  QualityAssessment,
  QualityRecommendation,
  StructureCheck,
} from "../types/results.js";

function percent(value: number): string {
  return `${(value * 100).toFixed(0)}%`;
}

function formatFlag(flag: PolicyFlag, withPosition: boolean): string[] {
  const lines = [
    `  [${flag.category.toUpperCase()}] ${flag.message}`,
    `    Text: ${flag.text}`,
  ];
  if (withPosition) {
    lines.push(`    Position: ${flag.position ?? "N/A"}`);
  }
  lines.push(`    Confidence: ${percent(flag.confidence)}`);
  return lines;
}

/**
 * Digest of a filtering pass. Flags are listed critical first, then high,
 * then everything else without positions.
 */
export function formatFilterResult(result: ContentFilterResult): string {
  const lines: string[] = [
    "=== Content Filter ===",
    `Compliance: ${result.overallCompliance.toUpperCase()}`,
    `Promotional score: ${percent(result.promotionalScore)}`,
    `Flags: ${result.flags.length}`,
    "",
    result.summary,
  ];

  if (result.isSponsorContent) {
    lines.push("");
    lines.push(`Sponsor mentions: ${result.sponsorMentions.join(", ")}`);
  }

  const critical = result.flags.filter((f) => f.severity === "critical");
  const high = result.flags.filter((f) => f.severity === "high");
  const other = result.flags.filter((f) => f.severity !== "critical" && f.severity !== "high");

  if (critical.length > 0) {
    lines.push("");
    lines.push("--- Critical Issues ---");
    critical.forEach((flag) => lines.push(...formatFlag(flag, true)));
  }

  if (high.length > 0) {
    lines.push("");
    lines.push("--- High Priority Issues ---");
    high.forEach((flag) => lines.push(...formatFlag(flag, true)));
  }

  if (other.length > 0) {
    lines.push("");
    lines.push("--- Other Issues ---");
    other.forEach((flag) => lines.push(...formatFlag(flag, false)));
  }

  if (result.qualityIssues.length > 0) {
    lines.push("");
    lines.push("--- Quality Issues ---");
    for (const issue of result.qualityIssues) {
      lines.push(`  - ${issue}`);
    }
  }

  return lines.join("\n");
}

const CHECK_LABELS: ReadonlyArray<readonly [keyof StructureCheck, string]> = [
  ["hasHeadline", "Headline"],
  ["hasIntroduction", "Introduction"],
  ["hasSections", "Body sections"],
  ["hasConclusion", "Conclusion"],
  ["minWordCountMet", "Minimum word count"],
  ["sectionsHaveContent", "Section content"],
  ["properFormatting", "Markdown formatting"],
];

const SEVERITY_ORDER: readonly RecommendationSeverity[] = ["critical", "warning", "info"];

function score(value: number): string {
  return value.toFixed(0);
}

/**
 * Digest of an assessment: scores, the structure checklist, and
 * recommendations grouped critical, warning, info.
 */
export function formatAssessment(assessment: QualityAssessment): string {
  const { structureCheck: structure, contentQuality: content, seoQuality: seo } = assessment;

  const lines: string[] = [
    "=== Quality Assessment ===",
    `Overall: ${assessment.overallScore.toFixed(1)}/100 (${assessment.qualityRating.toUpperCase()})`,
    "",
    "--- Content Quality ---",
    `Average: ${content.averageScore.toFixed(1)}/100`,
    `Readability: ${score(content.readabilityScore)}`,
    `Coherence: ${score(content.coherenceScore)}`,
    `Completeness: ${score(content.completenessScore)}`,
    `Relevance: ${score(content.relevanceScore)}`,
    `Uniqueness: ${score(content.uniquenessScore)}`,
    "",
    "--- SEO Quality ---",
    `Average: ${seo.averageScore.toFixed(1)}/100`,
    `Keyword optimization: ${score(seo.keywordOptimization)}`,
    `Meta tags: ${score(seo.metaTagQuality)}`,
    `Slug: ${score(seo.slugQuality)}`,
    `Schema markup: ${score(seo.schemaMarkupQuality)}`,
    `Social media: ${score(seo.socialMediaOptimization)}`,
  ];

  const policy = assessment.policyCompliance;
  if (policy) {
    lines.push("");
    lines.push("--- Policy Compliance ---");
    lines.push(`Overall: ${policy.overallPolicyCompliance.toFixed(1)}/100 (${policy.policyRating.toUpperCase()})`);
  }

  lines.push("");
  lines.push(`--- Structure (${structure.passedChecks}/${structure.totalChecks}) ---`);
  for (const [key, label] of CHECK_LABELS) {
    lines.push(`  [${structure[key] ? "x" : " "}] ${label}`);
  }

  if (assessment.recommendations.length > 0) {
    lines.push("");
    lines.push("--- Recommendations ---");
    for (const severity of SEVERITY_ORDER) {
      const group = assessment.recommendations.filter((r) => r.severity === severity);
      for (const rec of group) {
        lines.push(...formatRecommendation(rec));
      }
    }
  }

  return lines.join("\n");
}

function formatRecommendation(rec: QualityRecommendation): string[] {
  const lines = [`  ${rec.severity.toUpperCase()} (${titleCase(rec.category)}): ${rec.message}`];
  if (rec.action) {
    lines.push(`    -> ${rec.action}`);
  }
  return lines;
}
