/**
 * Transcript content filtering.
 */

export { ContentFilter, type ContentFilterOptions } from "./content-filter.js";
export {
  compileFilterRules,
  escapeRegExp,
  sponsorKeywordPattern,
  type CompiledFilterRules,
  type CompiledDetector,
} from "./patterns.js";
export {
  detectPatterns,
  detectSponsors,
  detectSpam,
  detectPromotional,
  countCallsToAction,
  calculatePromotionalScore,
  type SponsorDetection,
  type PromotionalDetection,
} from "./detectors.js";
export { getTextPosition } from "./position.js";
export {
  determineCompliance,
  generateSummary,
  identifyQualityIssues,
  countByCategory,
  formatPercent,
  titleCase,
  ALL_CLEAR_SUMMARY,
} from "./summary.js";
export { evaluateGate, type GateDecision, type GateOutcome, type GateOptions } from "./gate.js";
