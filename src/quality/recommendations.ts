/**
 * Improvement recommendations.
 *
 * A fixed rule list, evaluated in order: structure checks, then content
 * scores, then SEO scores, then policy. Output order follows the rules,
 * not severity.
 */

import type { QualityThresholds } from "../config/rules/index.js";
import type { Article } from "../types/article.js";
import type {
  ContentQualityScore,
  PolicyComplianceScore,
  QualityRecommendation,
  SEOQualityScore,
  StructureCheck,
} from "../types/results.js";

function score(value: number): string {
  return value.toFixed(0);
}

export function structureRecommendations(
  structure: StructureCheck,
  article: Article,
  thresholds: QualityThresholds["structure"]
): QualityRecommendation[] {
  const recommendations: QualityRecommendation[] = [];

  if (!structure.hasHeadline) {
    recommendations.push({
      category: "structure",
      severity: "critical",
      message: "Article headline is missing or too short",
      action: `Add a compelling headline (minimum ${thresholds.minHeadlineLength} characters)`,
    });
  }

  if (!structure.hasIntroduction) {
    recommendations.push({
      category: "structure",
      severity: "critical",
      message: "Introduction is missing or too short",
      action: `Add an introduction section (minimum ${thresholds.minIntroductionLength} characters)`,
    });
  }

  if (!structure.hasSections) {
    recommendations.push({
      category: "structure",
      severity: "critical",
      message: "Article lacks body sections",
      action: "Add at least 3-4 main content sections",
    });
  }

  if (!structure.hasConclusion) {
    recommendations.push({
      category: "structure",
      severity: "critical",
      message: "Conclusion is missing or too short",
      action: `Add a conclusion section (minimum ${thresholds.minConclusionLength} characters)`,
    });
  }

  if (!structure.minWordCountMet) {
    recommendations.push({
      category: "structure",
      severity: "warning",
      message: `Article word count (${article.wordCount}) is below minimum (${thresholds.minWordCount})`,
      action: "Expand sections with more detailed information",
    });
  }

  if (!structure.sectionsHaveContent) {
    recommendations.push({
      category: "content",
      severity: "warning",
      message: "Some sections lack sufficient content",
      action: `Ensure each section has at least ${thresholds.minSectionWordCount} words of meaningful content`,
    });
  }

  if (!structure.properFormatting) {
    recommendations.push({
      category: "structure",
      severity: "info",
      message: "Markdown formatting could be improved",
      action: "Ensure proper heading hierarchy and paragraph spacing",
    });
  }

  return recommendations;
}

export function contentRecommendations(
  content: ContentQualityScore,
  limits: QualityThresholds["recommendations"]
): QualityRecommendation[] {
  const recommendations: QualityRecommendation[] = [];

  if (content.readabilityScore < limits.readability) {
    recommendations.push({
      category: "style",
      severity: "warning",
      message: `Readability score is low (${score(content.readabilityScore)})`,
      action: "Use shorter sentences and simpler vocabulary",
    });
  }

  if (content.coherenceScore < limits.coherence) {
    recommendations.push({
      category: "content",
      severity: "warning",
      message: `Content coherence score is low (${score(content.coherenceScore)})`,
      action: "Add transition words between sections for better flow",
    });
  }

  if (content.relevanceScore < limits.relevance) {
    recommendations.push({
      category: "content",
      severity: "warning",
      message: `Content relevance to main topic is low (${score(content.relevanceScore)})`,
      action: "Ensure content directly addresses the main topic and subtopics",
    });
  }

  if (content.uniquenessScore < limits.uniqueness) {
    recommendations.push({
      category: "content",
      severity: "info",
      message: `Content uniqueness score is moderate (${score(content.uniquenessScore)})`,
      action: "Add original insights, examples, and analysis",
    });
  }

  return recommendations;
}

export function seoRecommendations(
  seo: SEOQualityScore,
  limits: QualityThresholds["recommendations"]
): QualityRecommendation[] {
  const recommendations: QualityRecommendation[] = [];

  if (seo.keywordOptimization < limits.keywordOptimization) {
    recommendations.push({
      category: "seo",
      severity: "warning",
      message: `Keyword optimization score is low (${score(seo.keywordOptimization)})`,
      action: "Ensure primary and secondary keywords appear naturally throughout the article",
    });
  }

  if (seo.metaTagQuality < limits.metaTagQuality) {
    recommendations.push({
      category: "seo",
      severity: "warning",
      message: `Meta tag quality score is low (${score(seo.metaTagQuality)})`,
      action: "Optimize meta title (50-60 chars) and description (150-160 chars)",
    });
  }

  if (seo.schemaMarkupQuality < limits.schemaMarkupQuality) {
    recommendations.push({
      category: "seo",
      severity: "info",
      message: `Schema markup could be more complete (${score(seo.schemaMarkupQuality)})`,
      action: "Add more optional schema.org fields (image, articleBody, keywords)",
    });
  }

  if (seo.socialMediaOptimization < limits.socialMediaOptimization) {
    recommendations.push({
      category: "seo",
      severity: "info",
      message: `Social media optimization could be improved (${score(seo.socialMediaOptimization)})`,
      action: "Ensure all Open Graph and Twitter Card tags are present",
    });
  }

  return recommendations;
}

/**
 * One recommendation unless the policy rating is compliant.
 */
export function policyRecommendation(
  policy: PolicyComplianceScore
): QualityRecommendation | null {
  if (policy.policyRating === "compliant") {
    return null;
  }

  return {
    category: "content",
    severity: policy.policyRating === "warning" ? "warning" : "critical",
    message: `Policy compliance rating: ${policy.policyRating.toUpperCase()}`,
    action: "Review content for policy violations and adjust as necessary",
  };
}

/**
 * Structure, content and SEO recommendations, in that order.
 */
export function generateRecommendations(
  structure: StructureCheck,
  content: ContentQualityScore,
  seo: SEOQualityScore,
  article: Article,
  thresholds: QualityThresholds
): QualityRecommendation[] {
  return [
    ...structureRecommendations(structure, article, thresholds.structure),
    ...contentRecommendations(content, thresholds.recommendations),
    ...seoRecommendations(seo, thresholds.recommendations),
  ];
}
