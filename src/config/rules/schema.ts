/**
 * Rule table and threshold schema definitions.
 *
 * IMMUTABILITY:
 * Rule tables are validated once, compiled, and frozen. A filter or
 * assessor built from them never changes its behaviour afterwards.
 *
 * Patterns are RegExp source strings plus flags; a rule table is plain JSON.
 */

import { z } from "zod";
import { FlagSeverity, PolicyCategory } from "./enums.js";

const Probability = z.number().min(0).max(1);
const Score = z.number().min(0).max(100);

/**
 * A single regex rule with the message attached to its matches.
 */
export const PatternRuleSchema = z
  .object({
    /** RegExp source (no slashes) */
    pattern: z.string().min(1),
    /** RegExp flags; "g" is added when scanning for every match */
    flags: z
      .string()
      .regex(/^[imsu]*$/, "only i, m, s and u flags are allowed")
      .default("i"),
    /** Explanation carried by every flag this rule emits */
    message: z.string().min(1),
  })
  .strict();

export type PatternRule = z.infer<typeof PatternRuleSchema>;

/**
 * A detector: a list of rules sharing a category, severity and confidence.
 * Each match of each rule becomes one flag.
 */
export const PatternDetectorSchema = z
  .object({
    category: PolicyCategory,
    severity: FlagSeverity,
    confidence: Probability,
    rules: z.array(PatternRuleSchema),
  })
  .strict();

export type PatternDetector = z.infer<typeof PatternDetectorSchema>;

export const SponsorKeywordSchema = z
  .object({
    keyword: z.string().min(1),
    priority: z.number().int().min(1).max(3),
  })
  .strict();

export type SponsorKeyword = z.infer<typeof SponsorKeywordSchema>;

/**
 * Sponsor and brand keyword detection.
 *
 * A keyword is always recorded as a mention when it matches. It is flagged
 * only when its priority is at least `flagMinPriority` and it matched no
 * more than `maxFlaggedMatches` times.
 */
export const SponsorRulesSchema = z
  .object({
    keywords: z.array(SponsorKeywordSchema),
    flagMinPriority: z.number().int().min(1).max(3).default(2),
    maxFlaggedMatches: z.number().int().min(1).default(3),
    /** Priority whose flags use `highPriorityConfidence` */
    highPriority: z.number().int().min(1).max(3).default(3),
    highPriorityConfidence: Probability.default(0.9),
    confidence: Probability.default(0.7),
    severity: FlagSeverity.default("low"),
  })
  .strict();

export type SponsorRules = z.infer<typeof SponsorRulesSchema>;

/**
 * Call-to-action counting. One flag when the combined match count of all
 * patterns exceeds `threshold`.
 */
export const SpamRulesSchema = z
  .object({
    patterns: z.array(z.string().min(1)).min(1),
    threshold: z.number().int().min(0).default(10),
    severity: FlagSeverity.default("low"),
    confidence: Probability.default(0.8),
  })
  .strict();

export type SpamRules = z.infer<typeof SpamRulesSchema>;

/**
 * Promotional score: fraction of indicator patterns present, saturating
 * once `saturation` of them match.
 */
export const PromotionalRulesSchema = z
  .object({
    indicators: z.array(z.string().min(1)).min(1),
    saturation: z.number().gt(0).max(1).default(0.5),
    /** Score above which a promotional flag is emitted */
    flagThreshold: Probability.default(0.6),
    /** Score above which the summary reports the score */
    summaryThreshold: Probability.default(0.4),
    /** Score at or below which a flag-free result is "all clear" */
    allClearThreshold: Probability.default(0.3),
    severity: FlagSeverity.default("low"),
    confidence: Probability.default(0.85),
  })
  .strict();

export type PromotionalRules = z.infer<typeof PromotionalRulesSchema>;

/**
 * Complete rule set for the transcript content filter.
 * Detectors run in key order: profanity, violence, harassment, then
 * sponsor keywords, misinformation, spam and the promotional score.
 */
export const FilterRulesSchema = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/, "version must be semver"),
    /** Maximum length of the matched text stored on a flag */
    snippetLength: z.number().int().min(1).max(200).default(50),
    profanity: PatternDetectorSchema,
    violence: PatternDetectorSchema,
    harassment: PatternDetectorSchema,
    sponsor: SponsorRulesSchema,
    misinformation: PatternDetectorSchema,
    spam: SpamRulesSchema,
    promotional: PromotionalRulesSchema,
  })
  .strict();

export type FilterRules = z.infer<typeof FilterRulesSchema>;

// ---------------------------------------------------------------------------
// Quality thresholds
// ---------------------------------------------------------------------------

export const StructureThresholdsSchema = z
  .object({
    minWordCount: z.number().int().min(0).default(200),
    /** Compared against each section's trimmed content length in characters */
    minSectionWordCount: z.number().int().min(0).default(50),
    minHeadlineLength: z.number().int().min(0).default(10),
    minIntroductionLength: z.number().int().min(0).default(100),
    minConclusionLength: z.number().int().min(0).default(100),
  })
  .strict();

export type StructureThresholds = z.infer<typeof StructureThresholdsSchema>;

/**
 * Sub-score levels below which a recommendation is emitted.
 */
export const RecommendationThresholdsSchema = z
  .object({
    readability: Score.default(50),
    coherence: Score.default(60),
    relevance: Score.default(70),
    uniqueness: Score.default(60),
    keywordOptimization: Score.default(70),
    metaTagQuality: Score.default(70),
    schemaMarkupQuality: Score.default(80),
    socialMediaOptimization: Score.default(80),
  })
  .strict();

export type RecommendationThresholds = z.infer<typeof RecommendationThresholdsSchema>;

export const ScoreWeightsSchema = z
  .object({
    content: Probability,
    seo: Probability,
    structure: Probability,
    policy: Probability,
  })
  .strict();

export type ScoreWeights = z.infer<typeof ScoreWeightsSchema>;

export const QualityRatingBandsSchema = z
  .object({
    excellent: Score,
    good: Score,
    fair: Score,
  })
  .strict();

export type QualityRatingBands = z.infer<typeof QualityRatingBandsSchema>;

/**
 * One article-level policy check: the score is `penaltyScore` as soon as
 * any pattern matches, otherwise 100.
 */
export const PolicyCheckSchema = z
  .object({
    patterns: z.array(z.string().min(1)),
    penaltyScore: Score,
  })
  .strict();

export type PolicyCheck = z.infer<typeof PolicyCheckSchema>;

export const PolicyRatingBandsSchema = z
  .object({
    compliant: Score,
    warning: Score,
    flagged: Score,
  })
  .strict();

export type PolicyRatingBands = z.infer<typeof PolicyRatingBandsSchema>;

export const PolicyThresholdsSchema = z
  .object({
    checks: z
      .object({
        profanity: PolicyCheckSchema,
        violence: PolicyCheckSchema,
        harassment: PolicyCheckSchema,
        hate_speech: PolicyCheckSchema,
        misinformation: PolicyCheckSchema,
      })
      .strict(),
    /** Score when an analysis content flag mentions "promotional" */
    promotionalFlagScore: Score.default(80),
    /** Score when an analysis content flag mentions "sponsor" */
    sponsorFlagScore: Score.default(85),
    ratingBands: PolicyRatingBandsSchema,
  })
  .strict();

export type PolicyThresholds = z.infer<typeof PolicyThresholdsSchema>;

/**
 * Complete threshold set for article quality assessment.
 */
export const QualityThresholdsSchema = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/, "version must be semver"),
    structure: StructureThresholdsSchema,
    /** Flesch Reading Ease the writer aims for. Informational only. */
    readabilityTarget: Score.default(60),
    recommendations: RecommendationThresholdsSchema,
    weights: ScoreWeightsSchema,
    ratingBands: QualityRatingBandsSchema,
    policy: PolicyThresholdsSchema,
  })
  .strict();

export type QualityThresholds = z.infer<typeof QualityThresholdsSchema>;
