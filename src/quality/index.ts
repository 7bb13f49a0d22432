/**
 * Article quality assessment.
 */

export {
  QualityAssurance,
  computeOverallScore,
  rateQuality,
  structureScore,
  type QualityAssuranceOptions,
  type ScoreComponents,
} from "./assessment.js";
export {
  checkArticleStructure,
  checkMarkdownFormatting,
  inspectMarkdown,
  type MarkdownFormatting,
} from "./structure.js";
export {
  calculateReadability,
  countSentences,
  estimateSyllables,
  stripMarkdown,
  DEFAULT_READABILITY,
} from "./readability.js";
export {
  calculateCoherence,
  calculateCompleteness,
  calculateRelevance,
  calculateUniqueness,
  scoreContentQuality,
  TRANSITION_WORDS,
  BOILERPLATE_PHRASES,
} from "./content-scoring.js";
export {
  scoreKeywordOptimization,
  scoreMetaTags,
  scoreSlug,
  scoreSchemaMarkup,
  scoreSocialOptimization,
  scoreSeoQuality,
} from "./seo-scoring.js";
export {
  compilePolicyThresholds,
  ratePolicyCompliance,
  scorePolicyCompliance,
  type CompiledPolicyThresholds,
} from "./policy-scoring.js";
export {
  generateRecommendations,
  policyRecommendation,
} from "./recommendations.js";
