/**
 * Content quality sub-scores, each in [0, 100].
 */

import type { Article } from "../types/article.js";
import type { ContentAnalysis } from "../types/analysis.js";
import type { ContentQualityScore } from "../types/results.js";
import { charLength, mean, proportion } from "../utils/text.js";
import { calculateReadability } from "./readability.js";
import { bodyText, fullArticleText } from "./text.js";

export const TRANSITION_WORDS: readonly string[] = [
  "however",
  "therefore",
  "moreover",
  "furthermore",
  "additionally",
  "consequently",
  "meanwhile",
  "similarly",
  "contrast",
  "example",
  "specifically",
  "likewise",
  "otherwise",
  "instead",
  "yet",
  "also",
];

export const BOILERPLATE_PHRASES: readonly string[] = [
  "in this article",
  "in this post",
  "this article will",
  "we will discuss",
  "let us explore",
  "there are several",
  "in conclusion",
  "to summarize",
  "final thoughts",
];

/** Returned for an article with no sections */
export const DEFAULT_COHERENCE = 50;

/** Uniqueness never drops below this, however much boilerplate */
export const UNIQUENESS_FLOOR = 50;

/**
 * Transition vocabulary plus section count.
 * Counts how many distinct transition words appear, not how often.
 */
export function calculateCoherence(article: Article): number {
  if (article.sections.length === 0) {
    return DEFAULT_COHERENCE;
  }

  const text = bodyText(article);
  const transitions = TRANSITION_WORDS.filter((word) => text.includes(word)).length;
  const structureScore = Math.min(100, article.sections.length * 15);

  return Math.min(100, (transitions * 5 + structureScore) / 2);
}

function band(value: number, bands: ReadonlyArray<readonly [number, number]>, fallback: number): number {
  for (const [min, points] of bands) {
    if (value >= min) {
      return points;
    }
  }
  return fallback;
}

/**
 * Additive score over word count, section count, introduction and
 * conclusion length, plus a bonus when every section is substantial.
 */
export function calculateCompleteness(article: Article): number {
  let score = 0;

  score += band(article.wordCount, [[300, 30], [200, 20]], 10);

  const sectionCount = article.sections.length;
  if (sectionCount >= 4 && sectionCount <= 6) {
    score += 30;
  } else if (sectionCount >= 3) {
    score += 20;
  } else {
    score += 10;
  }

  score += band(charLength(article.introduction), [[200, 15], [100, 10]], 5);
  score += band(charLength(article.conclusion), [[200, 15], [100, 10]], 5);

  if (article.sections.every((s) => charLength(s.content) >= 100)) {
    score += 10;
  }

  return Math.min(100, score);
}

/**
 * 50 for the main topic appearing verbatim, up to 50 more for subtopics.
 */
export function calculateRelevance(article: Article, analysis: ContentAnalysis): number {
  const text = fullArticleText(article);
  const mainTopic = analysis.mainTopic.toLowerCase();
  const subtopics = analysis.subtopics.map((s) => s.toLowerCase());

  let score = text.includes(mainTopic) ? 50 : 0;
  score += proportion(subtopics, (subtopic) => text.includes(subtopic), 50);

  return Math.min(100, score);
}

/**
 * Penalises stock phrases, floored at UNIQUENESS_FLOOR.
 */
export function calculateUniqueness(article: Article): number {
  const text = fullArticleText(article);
  const boilerplate = BOILERPLATE_PHRASES.filter((phrase) => text.includes(phrase)).length;
  const uniqueness = 100 - (boilerplate / BOILERPLATE_PHRASES.length) * 100;
  return Math.max(UNIQUENESS_FLOOR, uniqueness);
}

export function scoreContentQuality(
  article: Article,
  analysis: ContentAnalysis
): ContentQualityScore {
  const readabilityScore = calculateReadability(article.markdown);
  const coherenceScore = calculateCoherence(article);
  const completenessScore = calculateCompleteness(article);
  const relevanceScore = calculateRelevance(article, analysis);
  const uniquenessScore = calculateUniqueness(article);

  return {
    readabilityScore,
    coherenceScore,
    completenessScore,
    relevanceScore,
    uniquenessScore,
    averageScore: mean([
      readabilityScore,
      coherenceScore,
      completenessScore,
      relevanceScore,
      uniquenessScore,
    ]),
  };
}
