/**
 * Compiles validated filter rules into the RegExp tables the detectors scan
 * with.
 *
 * Scanning regexes carry the "g" flag and are only ever used through
 * `String.prototype.matchAll`, which works on a copy, so a compiled table
 * holds no per-scan state and can be shared between calls.
 */

import type {
  FilterRules,
  PatternDetector,
  PromotionalRules,
  SpamRules,
  SponsorRules,
} from "../config/rules/index.js";
import type { FlagSeverity, PolicyCategory } from "../config/rules/enums.js";

export interface CompiledPatternRule {
  readonly regex: RegExp;
  readonly message: string;
}

export interface CompiledDetector {
  readonly category: PolicyCategory;
  readonly severity: FlagSeverity;
  readonly confidence: number;
  readonly rules: readonly CompiledPatternRule[];
}

export interface CompiledSponsorKeyword {
  readonly keyword: string;
  readonly priority: number;
  readonly regex: RegExp;
}

export interface CompiledSponsorRules extends Omit<SponsorRules, "keywords"> {
  readonly keywords: readonly CompiledSponsorKeyword[];
}

export interface CompiledSpamRules extends Omit<SpamRules, "patterns"> {
  readonly patterns: readonly RegExp[];
}

export interface CompiledPromotionalRules extends Omit<PromotionalRules, "indicators"> {
  /** Presence tests only; compiled without "g" */
  readonly indicators: readonly RegExp[];
}

export interface CompiledFilterRules {
  readonly version: string;
  readonly snippetLength: number;
  readonly profanity: CompiledDetector;
  readonly violence: CompiledDetector;
  readonly harassment: CompiledDetector;
  readonly sponsor: CompiledSponsorRules;
  readonly misinformation: CompiledDetector;
  readonly spam: CompiledSpamRules;
  readonly promotional: CompiledPromotionalRules;
}

/**
 * Escape a literal string for use inside a RegExp.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function withGlobal(flags: string): string {
  return flags.includes("g") ? flags : `${flags}g`;
}

function compileDetector(detector: PatternDetector): CompiledDetector {
  return Object.freeze({
    category: detector.category,
    severity: detector.severity,
    confidence: detector.confidence,
    rules: Object.freeze(
      detector.rules.map((rule) =>
        Object.freeze({
          regex: new RegExp(rule.pattern, withGlobal(rule.flags)),
          message: rule.message,
        })
      )
    ),
  });
}

/**
 * Word-boundary, case-insensitive matcher for a sponsor keyword.
 */
export function sponsorKeywordPattern(keyword: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "gi");
}

/**
 * Compile a validated rule set.
 */
export function compileFilterRules(rules: Readonly<FilterRules>): CompiledFilterRules {
  return Object.freeze({
    version: rules.version,
    snippetLength: rules.snippetLength,
    profanity: compileDetector(rules.profanity),
    violence: compileDetector(rules.violence),
    harassment: compileDetector(rules.harassment),
    sponsor: Object.freeze({
      ...rules.sponsor,
      keywords: Object.freeze(
        rules.sponsor.keywords.map((entry) =>
          Object.freeze({
            keyword: entry.keyword,
            priority: entry.priority,
            regex: sponsorKeywordPattern(entry.keyword),
          })
        )
      ),
    }),
    misinformation: compileDetector(rules.misinformation),
    spam: Object.freeze({
      ...rules.spam,
      patterns: Object.freeze(rules.spam.patterns.map((p) => new RegExp(p, "gi"))),
    }),
    promotional: Object.freeze({
      ...rules.promotional,
      indicators: Object.freeze(rules.promotional.indicators.map((p) => new RegExp(p, "i"))),
    }),
  });
}
