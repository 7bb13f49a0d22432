/**
 * Transcript content filter.
 *
 * Scans transcript text for policy issues (profanity, violence,
 * harassment, misinformation), sponsor mentions, call-to-action spam and
 * promotional language, and condenses the flags into a compliance verdict.
 *
 * USAGE:
 *   const filter = new ContentFilter();
 *   const result = filter.filterTranscript(transcript);
 *   if (result.overallCompliance === "blocked") { ... }
 *
 * The rule tables are validated and compiled once in the constructor and
 * never change afterwards; one instance can serve any number of calls.
 */

import {
  DEFAULT_FILTER_RULES,
  loadFilterRules,
  type FilterRules,
} from "../config/rules/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { ContentFilterResult, PolicyFlag } from "../types/results.js";
import { parseTranscript, requireText } from "../types/validation.js";
import { compileFilterRules, type CompiledFilterRules } from "./patterns.js";
import {
  detectPatterns,
  detectPromotional,
  detectSpam,
  detectSponsors,
} from "./detectors.js";
import {
  determineCompliance,
  generateSummary,
  identifyQualityIssues,
} from "./summary.js";

export interface ContentFilterOptions {
  /** Rule tables; validated on construction. Defaults to DEFAULT_FILTER_RULES. */
  rules?: unknown;
  logger?: Logger;
}

export class ContentFilter {
  private readonly compiled: CompiledFilterRules;
  private readonly logger: Logger;

  constructor(options: ContentFilterOptions = {}) {
    const rules: Readonly<FilterRules> = loadFilterRules(options.rules ?? DEFAULT_FILTER_RULES);
    this.compiled = compileFilterRules(rules);
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Version of the rule set this filter was built from */
  get rulesVersion(): string {
    return this.compiled.version;
  }

  /**
   * Filter a transcript value. Validates it against the Transcript schema first.
   *
   * @throws InputValidationError if the transcript is malformed
   */
  filterTranscript(transcript: unknown): ContentFilterResult {
    const parsed = parseTranscript(transcript);
    const log = this.logger.child({ videoId: parsed.videoId });
    return this.run(parsed.transcript, log);
  }

  /**
   * Filter raw transcript text.
   *
   * @throws InputValidationError if `text` is not a string
   */
  filterText(text: unknown): ContentFilterResult {
    return this.run(requireText(text, "transcript text"), this.logger);
  }

  private run(rawText: string, log: Logger): ContentFilterResult {
    const rules = this.compiled;
    const text = rawText.toLowerCase();
    const flags: PolicyFlag[] = [];

    const profanity = detectPatterns(text, rules.profanity, rules.snippetLength);
    const violence = detectPatterns(text, rules.violence, rules.snippetLength);
    const harassment = detectPatterns(text, rules.harassment, rules.snippetLength);
    const sponsors = detectSponsors(text, rules.sponsor);
    const misinformation = detectPatterns(text, rules.misinformation, rules.snippetLength);
    const spam = detectSpam(text, rules.spam);
    const promotional = detectPromotional(text, rules.promotional);

    flags.push(
      ...profanity,
      ...violence,
      ...harassment,
      ...sponsors.flags,
      ...misinformation,
      ...spam,
      ...promotional.flags
    );

    log.debug("Detectors complete", {
      profanity: profanity.length,
      violence: violence.length,
      harassment: harassment.length,
      sponsor: sponsors.flags.length,
      misinformation: misinformation.length,
      spam: spam.length,
      promotional: promotional.flags.length,
    });

    const overallCompliance = determineCompliance(flags);
    const summary = generateSummary(flags, promotional.score, sponsors.mentions, rules.promotional);

    const result: ContentFilterResult = {
      flags,
      hasCriticalIssues: flags.some((f) => f.severity === "critical"),
      overallCompliance,
      summary,
      isSponsorContent: sponsors.mentions.length > 0,
      sponsorMentions: sponsors.mentions,
      promotionalScore: promotional.score,
      qualityIssues: identifyQualityIssues(flags),
    };

    log.info("Content filtering complete", {
      compliance: overallCompliance,
      flags: flags.length,
      promotionalScore: Number(promotional.score.toFixed(3)),
    });

    return result;
  }
}
