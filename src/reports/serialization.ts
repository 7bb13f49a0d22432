/**
 * Report serialization.
 *
 * Filter results and assessments are written as snake_case JSON next to
 * the rest of a video's pipeline output:
 *
 *   {outputDir}/{videoId}/content_filter.json
 *   {outputDir}/{videoId}/quality_assessment.json
 *
 * Pipeline output files are read back through the wire schemas, so a file
 * on disk is validated exactly like a value built in code.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type {
  ContentFilterResult,
  PolicyComplianceScore,
  PolicyFlag,
  QualityAssessment,
  QualityRecommendation,
  StructureCheck,
} from "../types/results.js";
import { InputValidationError, parseInput } from "../types/validation.js";
import { PipelineOutputWireSchema, type PipelineOutput } from "../types/wire.js";

export const CONTENT_FILTER_FILENAME = "content_filter.json";
export const QUALITY_ASSESSMENT_FILENAME = "quality_assessment.json";

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

function flagToWire(flag: PolicyFlag): Json {
  return {
    category: flag.category,
    severity: flag.severity,
    text: flag.text,
    position: flag.position ?? null,
    message: flag.message,
    confidence: flag.confidence,
  };
}

export function filterResultToWire(result: ContentFilterResult): Json {
  return {
    flags: result.flags.map(flagToWire),
    has_critical_issues: result.hasCriticalIssues,
    overall_compliance: result.overallCompliance,
    summary: result.summary,
    is_sponsor_content: result.isSponsorContent,
    sponsor_mentions: [...result.sponsorMentions],
    promotional_score: result.promotionalScore,
    quality_issues: [...result.qualityIssues],
  };
}

function structureToWire(check: StructureCheck): Json {
  return {
    has_headline: check.hasHeadline,
    has_introduction: check.hasIntroduction,
    has_sections: check.hasSections,
    has_conclusion: check.hasConclusion,
    min_word_count_met: check.minWordCountMet,
    sections_have_content: check.sectionsHaveContent,
    proper_formatting: check.properFormatting,
    all_checks_passed: check.allChecksPassed,
    passed_checks: check.passedChecks,
    total_checks: check.totalChecks,
  };
}

function policyToWire(policy: PolicyComplianceScore): Json {
  return {
    profanity_free_score: policy.profanityFreeScore,
    violence_free_score: policy.violenceFreeScore,
    harassment_free_score: policy.harassmentFreeScore,
    hate_speech_free_score: policy.hateSpeechFreeScore,
    promotional_content_score: policy.promotionalContentScore,
    sponsor_transparency_score: policy.sponsorTransparencyScore,
    misinformation_free_score: policy.misinformationFreeScore,
    overall_policy_compliance: policy.overallPolicyCompliance,
    policy_rating: policy.policyRating,
  };
}

function recommendationToWire(rec: QualityRecommendation): Json {
  return {
    category: rec.category,
    severity: rec.severity,
    message: rec.message,
    action: rec.action ?? null,
  };
}

export function assessmentToWire(assessment: QualityAssessment): Json {
  const { contentQuality: content, seoQuality: seo } = assessment;
  return {
    structure_check: structureToWire(assessment.structureCheck),
    content_quality: {
      readability_score: content.readabilityScore,
      coherence_score: content.coherenceScore,
      completeness_score: content.completenessScore,
      relevance_score: content.relevanceScore,
      uniqueness_score: content.uniquenessScore,
      average_score: content.averageScore,
    },
    seo_quality: {
      keyword_optimization: seo.keywordOptimization,
      meta_tag_quality: seo.metaTagQuality,
      slug_quality: seo.slugQuality,
      schema_markup_quality: seo.schemaMarkupQuality,
      social_media_optimization: seo.socialMediaOptimization,
      average_score: seo.averageScore,
    },
    policy_compliance: assessment.policyCompliance
      ? policyToWire(assessment.policyCompliance)
      : null,
    overall_score: assessment.overallScore,
    quality_rating: assessment.qualityRating,
    recommendations: assessment.recommendations.map(recommendationToWire),
  };
}

export function serializeReport(report: Json, pretty = true): string {
  return JSON.stringify(report, null, pretty ? 2 : undefined);
}

/**
 * Parse a saved pipeline output (JSON text).
 *
 * @throws InputValidationError if the text is not JSON or fails validation
 */
export function parsePipelineOutput(json: string): PipelineOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new InputValidationError("Invalid pipeline output: not valid JSON", [
      {
        path: "(root)",
        message: err instanceof Error ? err.message : String(err),
        code: "invalid_json",
      },
    ]);
  }
  return parseInput(PipelineOutputWireSchema, parsed, "pipeline output");
}

export function loadPipelineOutput(filePath: string): PipelineOutput {
  return parsePipelineOutput(readFileSync(filePath, "utf-8"));
}

export interface SavedReports {
  readonly directory: string;
  readonly contentFilterPath: string;
  readonly qualityAssessmentPath?: string;
}

/** Path separators and parent references cannot appear in a report directory name */
const UNSAFE_VIDEO_ID = /[\\/]|\.\./;

/**
 * Write the filter result and, when given, the assessment for one video.
 *
 * @returns Paths of the files written
 * @throws InputValidationError if the video ID would leave `outputDir`
 */
export function saveReports(
  outputDir: string,
  videoId: string,
  filterResult: ContentFilterResult,
  assessment?: QualityAssessment
): SavedReports {
  if (UNSAFE_VIDEO_ID.test(videoId)) {
    throw new InputValidationError("Invalid video ID for a report directory", [
      { path: "videoId", message: `must not contain "/", "\\" or "..": ${videoId}` },
    ]);
  }

  const directory = join(outputDir, videoId);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  const contentFilterPath = join(directory, CONTENT_FILTER_FILENAME);
  writeFileSync(contentFilterPath, serializeReport(filterResultToWire(filterResult)), "utf-8");

  if (!assessment) {
    return { directory, contentFilterPath };
  }

  const qualityAssessmentPath = join(directory, QUALITY_ASSESSMENT_FILENAME);
  writeFileSync(qualityAssessmentPath, serializeReport(assessmentToWire(assessment)), "utf-8");

  return { directory, contentFilterPath, qualityAssessmentPath };
}
