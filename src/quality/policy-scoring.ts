/**
 * Article-level policy compliance.
 *
 * A lighter pass than the transcript filter: each text dimension scores
 * 100 when clean and a fixed penalty score on the first match, however
 * many matches there are. Promotional and sponsor dimensions come from
 * the analysis flags rather than the article text.
 */

import type { ComplianceStatus, PolicyDimension } from "../config/rules/enums.js";
import type { PolicyRatingBands, PolicyThresholds } from "../config/rules/index.js";
import type { Article } from "../types/article.js";
import type { ContentAnalysis } from "../types/analysis.js";
import type { PolicyComplianceScore } from "../types/results.js";
import { mean } from "../utils/text.js";
import { fullArticleText } from "./text.js";

export interface CompiledPolicyCheck {
  readonly patterns: readonly RegExp[];
  readonly penaltyScore: number;
}

export interface CompiledPolicyThresholds {
  readonly checks: Readonly<Record<PolicyDimension, CompiledPolicyCheck>>;
  readonly promotionalFlagScore: number;
  readonly sponsorFlagScore: number;
  readonly ratingBands: PolicyRatingBands;
}

/**
 * Compile the pattern tables once. Patterns are presence tests and carry
 * no flags; the text they run against is already lowercased.
 */
export function compilePolicyThresholds(policy: PolicyThresholds): CompiledPolicyThresholds {
  const compile = (dimension: PolicyDimension): CompiledPolicyCheck => {
    const check = policy.checks[dimension];
    return Object.freeze({
      patterns: Object.freeze(check.patterns.map((p) => new RegExp(p))),
      penaltyScore: check.penaltyScore,
    });
  };

  return Object.freeze({
    checks: Object.freeze({
      profanity: compile("profanity"),
      violence: compile("violence"),
      harassment: compile("harassment"),
      hate_speech: compile("hate_speech"),
      misinformation: compile("misinformation"),
    }),
    promotionalFlagScore: policy.promotionalFlagScore,
    sponsorFlagScore: policy.sponsorFlagScore,
    ratingBands: policy.ratingBands,
  });
}

export function scoreDimension(text: string, check: CompiledPolicyCheck): number {
  return check.patterns.some((pattern) => pattern.test(text)) ? check.penaltyScore : 100;
}

function hasContentFlag(analysis: ContentAnalysis, term: string): boolean {
  return analysis.contentFlags.some((flag) => flag.toLowerCase().includes(term));
}

export function ratePolicyCompliance(score: number, bands: PolicyRatingBands): ComplianceStatus {
  if (score >= bands.compliant) {
    return "compliant";
  }
  if (score >= bands.warning) {
    return "warning";
  }
  if (score >= bands.flagged) {
    return "flagged";
  }
  return "blocked";
}

export function scorePolicyCompliance(
  article: Article,
  analysis: ContentAnalysis,
  policy: CompiledPolicyThresholds
): PolicyComplianceScore {
  const text = fullArticleText(article);
  const { checks } = policy;

  const profanityFreeScore = scoreDimension(text, checks.profanity);
  const violenceFreeScore = scoreDimension(text, checks.violence);
  const harassmentFreeScore = scoreDimension(text, checks.harassment);
  const hateSpeechFreeScore = scoreDimension(text, checks.hate_speech);
  const promotionalContentScore = hasContentFlag(analysis, "promotional")
    ? policy.promotionalFlagScore
    : 100;
  const sponsorTransparencyScore = hasContentFlag(analysis, "sponsor")
    ? policy.sponsorFlagScore
    : 100;
  const misinformationFreeScore = scoreDimension(text, checks.misinformation);

  const overallPolicyCompliance = mean([
    profanityFreeScore,
    violenceFreeScore,
    harassmentFreeScore,
    hateSpeechFreeScore,
    promotionalContentScore,
    sponsorTransparencyScore,
    misinformationFreeScore,
  ]);

  return {
    profanityFreeScore,
    violenceFreeScore,
    harassmentFreeScore,
    hateSpeechFreeScore,
    promotionalContentScore,
    sponsorTransparencyScore,
    misinformationFreeScore,
    overallPolicyCompliance,
    policyRating: ratePolicyCompliance(overallPolicyCompliance, policy.ratingBands),
  };
}
