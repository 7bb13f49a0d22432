/**
 * Filtering and assessment results.
 *
 * Results are built once per call and never edited afterwards; derived
 * fields (verdicts, ratings, averages) are computed from the fields they
 * summarise at construction time.
 */

import type {
  ComplianceStatus,
  FlagSeverity,
  PolicyCategory,
  QualityRating,
  RecommendationCategory,
  RecommendationSeverity,
} from "../config/rules/enums.js";

// ---------------------------------------------------------------------------
// Content filter
// ---------------------------------------------------------------------------

/**
 * One detected issue. A match of one rule produces exactly one flag;
 * flags from different rules over the same text are never merged.
 */
export interface PolicyFlag {
  readonly category: PolicyCategory;
  readonly severity: FlagSeverity;
  /** Matched snippet, or a short label for aggregate flags */
  readonly text: string;
  /** "paragraph N" or "word N"; absent for aggregate flags */
  readonly position?: string;
  readonly message: string;
  /** Fixed per rule, 0-1 */
  readonly confidence: number;
}

export interface ContentFilterResult {
  /** In detector order, not severity order */
  readonly flags: readonly PolicyFlag[];
  readonly hasCriticalIssues: boolean;
  readonly overallCompliance: ComplianceStatus;
  readonly summary: string;
  readonly isSponsorContent: boolean;
  /** Matched sponsor keywords, first-seen order, no duplicates */
  readonly sponsorMentions: readonly string[];
  /** 0-1 */
  readonly promotionalScore: number;
  /** One line per high or critical flag */
  readonly qualityIssues: readonly string[];
}

// ---------------------------------------------------------------------------
// Quality assessment
// ---------------------------------------------------------------------------

export interface StructureCheck {
  readonly hasHeadline: boolean;
  readonly hasIntroduction: boolean;
  readonly hasSections: boolean;
  readonly hasConclusion: boolean;
  readonly minWordCountMet: boolean;
  readonly sectionsHaveContent: boolean;
  readonly properFormatting: boolean;
  readonly allChecksPassed: boolean;
  readonly passedChecks: number;
  readonly totalChecks: number;
}

export interface ContentQualityScore {
  readonly readabilityScore: number;
  readonly coherenceScore: number;
  readonly completenessScore: number;
  readonly relevanceScore: number;
  readonly uniquenessScore: number;
  readonly averageScore: number;
}

export interface SEOQualityScore {
  readonly keywordOptimization: number;
  readonly metaTagQuality: number;
  readonly slugQuality: number;
  readonly schemaMarkupQuality: number;
  readonly socialMediaOptimization: number;
  readonly averageScore: number;
}

export interface PolicyComplianceScore {
  readonly profanityFreeScore: number;
  readonly violenceFreeScore: number;
  readonly harassmentFreeScore: number;
  readonly hateSpeechFreeScore: number;
  readonly promotionalContentScore: number;
  readonly sponsorTransparencyScore: number;
  readonly misinformationFreeScore: number;
  readonly overallPolicyCompliance: number;
  readonly policyRating: ComplianceStatus;
}

export interface QualityRecommendation {
  readonly category: RecommendationCategory;
  readonly severity: RecommendationSeverity;
  readonly message: string;
  readonly action?: string;
}

export interface QualityAssessment {
  readonly structureCheck: StructureCheck;
  readonly contentQuality: ContentQualityScore;
  readonly seoQuality: SEOQualityScore;
  readonly policyCompliance?: PolicyComplianceScore;
  /** 0-100 */
  readonly overallScore: number;
  readonly qualityRating: QualityRating;
  readonly recommendations: readonly QualityRecommendation[];
}
