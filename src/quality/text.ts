/**
 * Article text views used by the scorers. All are lowercased.
 */

import type { Article } from "../types/article.js";

function sectionText(article: Article): string {
  return article.sections.map((s) => s.content).join(" ");
}

/**
 * Headline, introduction, sections and conclusion.
 */
export function fullArticleText(article: Article): string {
  return [article.headline, article.introduction, sectionText(article), article.conclusion]
    .join(" ")
    .toLowerCase();
}

/**
 * Introduction, sections and conclusion (no headline).
 */
export function bodyText(article: Article): string {
  return [article.introduction, sectionText(article), article.conclusion].join(" ").toLowerCase();
}

/**
 * Headline, introduction and sections (no conclusion).
 */
export function keywordSearchText(article: Article): string {
  return [article.headline, article.introduction, sectionText(article)].join(" ").toLowerCase();
}
