/**
 * Detection layers for the transcript content filter.
 *
 * Each detector is a pure function of (lowercased text, compiled rules).
 * They are independent of one another; the filter runs them in a fixed
 * order and concatenates their flags.
 */

import type { PolicyFlag } from "../types/results.js";
import type {
  CompiledDetector,
  CompiledPromotionalRules,
  CompiledSpamRules,
  CompiledSponsorRules,
} from "./patterns.js";
import { getTextPosition } from "./position.js";

export interface SponsorDetection {
  readonly flags: PolicyFlag[];
  /** Matched keywords in table order */
  readonly mentions: string[];
}

export interface PromotionalDetection {
  /** 0-1 */
  readonly score: number;
  readonly flags: PolicyFlag[];
}

/**
 * One flag per match of each rule, in rule order then match order.
 */
export function detectPatterns(
  text: string,
  detector: CompiledDetector,
  snippetLength: number
): PolicyFlag[] {
  const flags: PolicyFlag[] = [];

  for (const rule of detector.rules) {
    for (const match of text.matchAll(rule.regex)) {
      const offset = match.index ?? 0;
      flags.push({
        category: detector.category,
        severity: detector.severity,
        text: [...match[0]].slice(0, snippetLength).join(""),
        message: rule.message,
        confidence: detector.confidence,
        position: getTextPosition(text, offset),
      });
    }
  }

  return flags;
}

/**
 * Record every matched sponsor keyword and flag the ones that qualify.
 *
 * A keyword is flagged when its priority is at least `flagMinPriority` and
 * it matched at most `maxFlaggedMatches` times. Terms repeated more often
 * than that are treated as ordinary vocabulary: still listed as mentions,
 * never flagged. Only the first match is reported.
 */
export function detectSponsors(text: string, rules: CompiledSponsorRules): SponsorDetection {
  const flags: PolicyFlag[] = [];
  const mentions: string[] = [];

  for (const entry of rules.keywords) {
    const matches = [...text.matchAll(entry.regex)];
    if (matches.length === 0) {
      continue;
    }

    if (!mentions.includes(entry.keyword)) {
      mentions.push(entry.keyword);
    }

    if (entry.priority >= rules.flagMinPriority && matches.length <= rules.maxFlaggedMatches) {
      const first = matches[0];
      flags.push({
        category: "sponsor",
        severity: rules.severity,
        text: entry.keyword,
        message: `Sponsor/promotional keyword: '${entry.keyword}' mentioned`,
        confidence:
          entry.priority === rules.highPriority ? rules.highPriorityConfidence : rules.confidence,
        position: getTextPosition(text, first.index ?? 0),
      });
    }
  }

  return { flags, mentions };
}

/**
 * Count call-to-action matches across all patterns.
 */
export function countCallsToAction(text: string, rules: CompiledSpamRules): number {
  let count = 0;
  for (const pattern of rules.patterns) {
    count += [...text.matchAll(pattern)].length;
  }
  return count;
}

/**
 * A single aggregate flag when calls-to-action exceed the threshold.
 */
export function detectSpam(text: string, rules: CompiledSpamRules): PolicyFlag[] {
  const ctaCount = countCallsToAction(text, rules);
  if (ctaCount <= rules.threshold) {
    return [];
  }

  return [
    {
      category: "spam",
      severity: rules.severity,
      text: "Multiple CTAs",
      message: `Excessive calls-to-action detected (${ctaCount} mentions) - indicates promotional content`,
      confidence: rules.confidence,
    },
  ];
}

/**
 * Share of promotional indicators present at least once, saturating at
 * `saturation` of the indicator count.
 */
export function calculatePromotionalScore(text: string, rules: CompiledPromotionalRules): number {
  const found = rules.indicators.filter((indicator) => indicator.test(text)).length;
  const denominator = Math.max(1, rules.indicators.length * rules.saturation);
  return Math.min(1, found / denominator);
}

export function detectPromotional(
  text: string,
  rules: CompiledPromotionalRules
): PromotionalDetection {
  const score = calculatePromotionalScore(text, rules);
  const flags: PolicyFlag[] = [];

  if (score > rules.flagThreshold) {
    flags.push({
      category: "promotional",
      severity: rules.severity,
      text: `Promotional score: ${score.toFixed(2)}`,
      message: "Content contains multiple promotional indicators",
      confidence: rules.confidence,
    });
  }

  return { score, flags };
}
