/**
 * Flesch Reading Ease approximation.
 *
 *   90-100 very easy · 60-69 standard · 30-49 difficult · 0-29 very difficult
 */

import { clamp, countWords } from "../utils/text.js";

/** Returned when there are no sentences or no words to measure */
export const DEFAULT_READABILITY = 50;

const VOWELS = "aeiouy";

/**
 * Strip Markdown punctuation that would skew word and sentence counts.
 */
export function stripMarkdown(text: string): string {
  return text.replace(/[#*_[\]()~`]/g, "");
}

export function countSentences(text: string): number {
  return text.split(/[.!?]+/).filter((s) => s.trim().length > 0).length;
}

/**
 * Estimate syllables over a whole text by counting vowel groups.
 * The silent-e and "-le" adjustments look at the end of the whole text.
 */
export function estimateSyllables(text: string): number {
  const lower = text.toLowerCase();
  let count = 0;
  let previousWasVowel = false;

  for (const char of lower) {
    const isVowel = VOWELS.includes(char);
    if (isVowel && !previousWasVowel) {
      count++;
    }
    previousWasVowel = isVowel;
  }

  if (lower.endsWith("e")) {
    count--;
  }
  if (lower.endsWith("le")) {
    count++;
  }

  return Math.max(1, count);
}

/**
 * Flesch Reading Ease of Markdown text, clamped to [0, 100].
 */
export function calculateReadability(markdown: string): number {
  const clean = stripMarkdown(markdown);
  const sentences = countSentences(clean);
  const words = countWords(clean);

  if (sentences === 0 || words === 0) {
    return DEFAULT_READABILITY;
  }

  const syllables = estimateSyllables(clean);
  const score = 206.835 - 1.015 * (words / sentences) - 84.6 * (syllables / words);
  return clamp(score, 0, 100);
}
