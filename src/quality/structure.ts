/**
 * Structural checklist for a generated article.
 */

import type { StructureThresholds } from "../config/rules/index.js";
import type { Article } from "../types/article.js";
import type { StructureCheck } from "../types/results.js";
import { charLength } from "../utils/text.js";

export interface MarkdownFormatting {
  readonly hasHeadings: boolean;
  readonly hasParagraphs: boolean;
  /** Detected, but not required */
  readonly hasLists: boolean;
}

export function inspectMarkdown(markdown: string): MarkdownFormatting {
  return {
    hasHeadings: /^#+\s/m.test(markdown),
    hasParagraphs: /\n\n/.test(markdown),
    hasLists: /^\s*[*\-+]\s/m.test(markdown),
  };
}

/**
 * Markdown needs at least one heading line and one blank-line paragraph break.
 */
export function checkMarkdownFormatting(markdown: string): boolean {
  const formatting = inspectMarkdown(markdown);
  return formatting.hasHeadings && formatting.hasParagraphs;
}

/**
 * Run the seven structure predicates.
 */
export function checkArticleStructure(
  article: Article,
  thresholds: StructureThresholds
): StructureCheck {
  const checks = {
    hasHeadline: charLength(article.headline.trim()) >= thresholds.minHeadlineLength,
    hasIntroduction: charLength(article.introduction.trim()) >= thresholds.minIntroductionLength,
    hasSections: article.sections.length > 0,
    hasConclusion: charLength(article.conclusion.trim()) >= thresholds.minConclusionLength,
    minWordCountMet: article.wordCount >= thresholds.minWordCount,
    sectionsHaveContent: article.sections.every(
      (s) => charLength(s.content.trim()) >= thresholds.minSectionWordCount
    ),
    properFormatting: checkMarkdownFormatting(article.markdown),
  };

  const values = Object.values(checks);
  const passedChecks = values.filter(Boolean).length;

  return {
    ...checks,
    allChecksPassed: passedChecks === values.length,
    passedChecks,
    totalChecks: values.length,
  };
}
