/**
 * Human-readable locators for a character offset in a transcript.
 */

import { countWords } from "../utils/text.js";

/**
 * Locate `charIndex` as "paragraph N" (1-based, newline-separated).
 *
 * Falls back to "word N" (1-based count of whitespace-separated words
 * before the offset) when the offset lies beyond the last paragraph.
 */
export function getTextPosition(text: string, charIndex: number): string {
  const paragraphs = text.split("\n");
  let charCount = 0;

  for (let i = 0; i < paragraphs.length; i++) {
    charCount += paragraphs[i].length + 1; // +1 for the newline
    if (charCount > charIndex) {
      return `paragraph ${i + 1}`;
    }
  }

  return `word ${countWords(text.slice(0, charIndex)) + 1}`;
}

