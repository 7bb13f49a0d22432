/**
 * Article quality assessment.
 *
 * Scores a generated article and its SEO package on structure, content
 * quality, SEO quality and (optionally) policy compliance, then combines
 * them into one weighted score, a rating and a list of recommendations.
 *
 * USAGE:
 *   const qa = new QualityAssurance();
 *   const assessment = qa.assess(article, analysis, seo);
 *   console.log(assessment.overallScore, assessment.qualityRating);
 *
 * Weights default to content 0.45, SEO 0.25, structure 0.20, policy 0.10.
 * With the policy layer disabled, its weight is split evenly between
 * content and SEO.
 */

import {
  DEFAULT_QUALITY_THRESHOLDS,
  loadQualityThresholds,
  type QualityRatingBands,
  type QualityRating,
  type QualityThresholds,
  type ScoreWeights,
} from "../config/rules/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { Article } from "../types/article.js";
import type { ContentAnalysis } from "../types/analysis.js";
import type { SEOPackage } from "../types/seo.js";
import type {
  ContentQualityScore,
  PolicyComplianceScore,
  QualityAssessment,
  QualityRecommendation,
  SEOQualityScore,
  StructureCheck,
} from "../types/results.js";
import { parseArticle, parseContentAnalysis, parseSeoPackage } from "../types/validation.js";
import { scoreContentQuality } from "./content-scoring.js";
import {
  compilePolicyThresholds,
  scorePolicyCompliance,
  type CompiledPolicyThresholds,
} from "./policy-scoring.js";
import {
  generateRecommendations,
  policyRecommendation,
} from "./recommendations.js";
import { scoreSeoQuality } from "./seo-scoring.js";
import { checkArticleStructure } from "./structure.js";

export interface QualityAssuranceOptions {
  /** Thresholds; validated on construction. Defaults to DEFAULT_QUALITY_THRESHOLDS. */
  thresholds?: unknown;
  logger?: Logger;
  /** Score policy compliance and include it in the overall score. Default true. */
  includePolicy?: boolean;
}

export interface ScoreComponents {
  readonly structure: StructureCheck;
  readonly content: ContentQualityScore;
  readonly seo: SEOQualityScore;
  readonly policy?: PolicyComplianceScore;
}

/**
 * Structure contributes the share of passed checks, scaled to 100.
 */
export function structureScore(structure: StructureCheck): number {
  if (structure.totalChecks === 0) {
    return 0;
  }
  return (structure.passedChecks / structure.totalChecks) * 100;
}

/**
 * Weighted overall score. Without a policy score the policy weight moves to
 * content and SEO, half each.
 */
export function computeOverallScore(components: ScoreComponents, weights: ScoreWeights): number {
  const { structure, content, seo, policy } = components;

  if (policy) {
    return (
      content.averageScore * weights.content +
      seo.averageScore * weights.seo +
      structureScore(structure) * weights.structure +
      policy.overallPolicyCompliance * weights.policy
    );
  }

  const shifted = weights.policy / 2;
  return (
    content.averageScore * (weights.content + shifted) +
    seo.averageScore * (weights.seo + shifted) +
    structureScore(structure) * weights.structure
  );
}

export function rateQuality(score: number, bands: QualityRatingBands): QualityRating {
  if (score >= bands.excellent) {
    return "excellent";
  }
  if (score >= bands.good) {
    return "good";
  }
  if (score >= bands.fair) {
    return "fair";
  }
  return "poor";
}

export class QualityAssurance {
  private readonly thresholds: Readonly<QualityThresholds>;
  private readonly policy: CompiledPolicyThresholds;
  private readonly logger: Logger;
  private readonly includePolicy: boolean;

  constructor(options: QualityAssuranceOptions = {}) {
    this.thresholds = loadQualityThresholds(options.thresholds ?? DEFAULT_QUALITY_THRESHOLDS);
    this.policy = compilePolicyThresholds(this.thresholds.policy);
    this.logger = options.logger ?? createSilentLogger();
    this.includePolicy = options.includePolicy ?? true;
  }

  /** Version of the threshold set this instance was built from */
  get thresholdsVersion(): string {
    return this.thresholds.version;
  }

  checkStructure(article: unknown): StructureCheck {
    return checkArticleStructure(parseArticle(article), this.thresholds.structure);
  }

  scoreContent(article: unknown, analysis: unknown): ContentQualityScore {
    return scoreContentQuality(parseArticle(article), parseContentAnalysis(analysis));
  }

  scoreSeo(seo: unknown, article: unknown): SEOQualityScore {
    return scoreSeoQuality(parseSeoPackage(seo), parseArticle(article));
  }

  scorePolicy(article: unknown, analysis: unknown): PolicyComplianceScore {
    return scorePolicyCompliance(parseArticle(article), parseContentAnalysis(analysis), this.policy);
  }

  /**
   * Recommendations in rule order: structure, content, SEO, then policy
   * when a policy score is given and not compliant.
   */
  generateRecommendations(
    structure: StructureCheck,
    content: ContentQualityScore,
    seo: SEOQualityScore,
    article: unknown,
    policy?: PolicyComplianceScore
  ): QualityRecommendation[] {
    return this.recommend(structure, content, seo, parseArticle(article), policy);
  }

  private recommend(
    structure: StructureCheck,
    content: ContentQualityScore,
    seo: SEOQualityScore,
    article: Article,
    policy?: PolicyComplianceScore
  ): QualityRecommendation[] {
    const recommendations = generateRecommendations(structure, content, seo, article, this.thresholds);
    const extra = policy ? policyRecommendation(policy) : undefined;
    return extra ? [...recommendations, extra] : recommendations;
  }

  /**
   * Full assessment. All three inputs are validated before anything is scored.
   *
   * @throws InputValidationError if any input is malformed
   */
  assess(article: unknown, analysis: unknown, seo: unknown): QualityAssessment {
    const parsedArticle: Article = parseArticle(article);
    const parsedAnalysis: ContentAnalysis = parseContentAnalysis(analysis);
    const parsedSeo: SEOPackage = parseSeoPackage(seo);
    const log = this.logger.child({ slug: parsedSeo.slug });

    const structureCheck = checkArticleStructure(parsedArticle, this.thresholds.structure);
    const contentQuality = scoreContentQuality(parsedArticle, parsedAnalysis);
    const seoQuality = scoreSeoQuality(parsedSeo, parsedArticle);
    const policyCompliance = this.includePolicy
      ? scorePolicyCompliance(parsedArticle, parsedAnalysis, this.policy)
      : undefined;

    log.debug("Scores computed", {
      structure: `${structureCheck.passedChecks}/${structureCheck.totalChecks}`,
      content: Number(contentQuality.averageScore.toFixed(1)),
      seo: Number(seoQuality.averageScore.toFixed(1)),
      policy: policyCompliance ? Number(policyCompliance.overallPolicyCompliance.toFixed(1)) : null,
    });

    const overallScore = computeOverallScore(
      {
        structure: structureCheck,
        content: contentQuality,
        seo: seoQuality,
        policy: policyCompliance,
      },
      this.thresholds.weights
    );
    const qualityRating = rateQuality(overallScore, this.thresholds.ratingBands);

    const recommendations = this.recommend(
      structureCheck,
      contentQuality,
      seoQuality,
      parsedArticle,
      policyCompliance
    );

    log.info("Quality assessment complete", {
      overallScore: Number(overallScore.toFixed(1)),
      rating: qualityRating,
      recommendations: recommendations.length,
    });

    return {
      structureCheck,
      contentQuality,
      seoQuality,
      ...(policyCompliance ? { policyCompliance } : {}),
      overallScore,
      qualityRating,
      recommendations,
    };
  }
}
