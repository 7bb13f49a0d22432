/**
 * Rule tables and thresholds for filtering and quality scoring.
 *
 * Usage:
 *   import { loadFilterRules, DEFAULT_FILTER_RULES } from "./config/rules/index.js";
 *
 *   // Load the shipped tables
 *   const rules = loadFilterRules(DEFAULT_FILTER_RULES);
 *
 *   // Or an edited copy
 *   const strict = loadFilterRules({
 *     ...DEFAULT_FILTER_RULES,
 *     spam: { ...DEFAULT_FILTER_RULES.spam, threshold: 5 },
 *   });
 */

// Domain enums
export {
  PolicyCategory,
  FlagSeverity,
  SEVERITY_RANK,
  ComplianceStatus,
  QualityRating,
  RecommendationCategory,
  RecommendationSeverity,
  PolicyDimension,
} from "./enums.js";

// Schema types
export type {
  PatternRule,
  PatternDetector,
  SponsorKeyword,
  SponsorRules,
  SpamRules,
  PromotionalRules,
  FilterRules,
  StructureThresholds,
  RecommendationThresholds,
  ScoreWeights,
  QualityRatingBands,
  PolicyCheck,
  PolicyRatingBands,
  PolicyThresholds,
  QualityThresholds,
} from "./schema.js";

// Schema objects
export {
  PatternRuleSchema,
  PatternDetectorSchema,
  SponsorRulesSchema,
  SpamRulesSchema,
  PromotionalRulesSchema,
  FilterRulesSchema,
  QualityThresholdsSchema,
} from "./schema.js";

// Loader and validation
export {
  loadFilterRules,
  loadQualityThresholds,
  loadFilterRulesFromFile,
  loadQualityThresholdsFromFile,
  validateFilterRules,
  validateQualityThresholds,
  deepFreeze,
  RulesConfigError,
  type RulesConfigIssue,
  type RulesValidationResult,
} from "./loader.js";

// Defaults
export { DEFAULT_FILTER_RULES, DEFAULT_QUALITY_THRESHOLDS } from "./defaults.js";
