/**
 * SEO quality sub-scores, each in [0, 100].
 */

import type { Article } from "../types/article.js";
import type { MetadataMap, SEOPackage } from "../types/seo.js";
import type { SEOQualityScore } from "../types/results.js";
import { charLength, mean, proportion } from "../utils/text.js";
import { keywordSearchText } from "./text.js";

export const SCHEMA_REQUIRED_FIELDS: readonly string[] = [
  "headline",
  "description",
  "author",
  "datePublished",
];
export const SCHEMA_OPTIONAL_FIELDS: readonly string[] = ["image", "articleBody", "keywords"];
export const OPEN_GRAPH_REQUIRED_TAGS: readonly string[] = ["og:title", "og:description", "og:type"];
export const TWITTER_CARD_REQUIRED_TAGS: readonly string[] = [
  "twitter:card",
  "twitter:title",
  "twitter:description",
];

function hasKey(map: MetadataMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/**
 * 50 for the primary keyword, up to 50 for secondary keywords, matched as
 * substrings of the headline, introduction and sections.
 */
export function scoreKeywordOptimization(seo: SEOPackage, article: Article): number {
  const text = keywordSearchText(article);

  let score = text.includes(seo.primaryKeyword.toLowerCase()) ? 50 : 0;
  score += proportion(seo.secondaryKeywords, (kw) => text.includes(kw.toLowerCase()), 50);

  return Math.min(100, score);
}

function lengthBand(
  length: number,
  optimal: readonly [number, number],
  acceptable: readonly [number, number]
): number {
  if (length >= optimal[0] && length <= optimal[1]) {
    return 50;
  }
  if (length >= acceptable[0] && length <= acceptable[1]) {
    return 40;
  }
  return 20;
}

/**
 * Title 50-60 chars and description 150-160 chars score best.
 */
export function scoreMetaTags(seo: SEOPackage): number {
  const title = lengthBand(charLength(seo.metaTitle), [50, 60], [40, 70]);
  const description = lengthBand(charLength(seo.metaDescription), [150, 160], [130, 170]);
  return Math.min(100, title + description);
}

export function scoreSlug(seo: SEOPackage): number {
  const slug = seo.slug.toLowerCase();
  const length = charLength(slug);
  let score = 50;

  if (slug.includes("-")) {
    score += 20;
  }
  if (length >= 5 && length <= 75) {
    score += 20;
  }
  if (!/[_@#$%]/.test(slug)) {
    score += 10;
  }

  return Math.min(100, score);
}

/**
 * Required schema.org fields are worth 70, optional ones 30.
 */
export function scoreSchemaMarkup(seo: SEOPackage): number {
  const schema = seo.schemaMarkup;
  const score =
    proportion(SCHEMA_REQUIRED_FIELDS, (field) => hasKey(schema, field), 70) +
    proportion(SCHEMA_OPTIONAL_FIELDS, (field) => hasKey(schema, field), 30);
  return Math.min(100, score);
}

/**
 * Open Graph and Twitter Card tags, 50 each.
 */
export function scoreSocialOptimization(seo: SEOPackage): number {
  const score =
    proportion(OPEN_GRAPH_REQUIRED_TAGS, (tag) => hasKey(seo.openGraph, tag), 50) +
    proportion(TWITTER_CARD_REQUIRED_TAGS, (tag) => hasKey(seo.twitterCard, tag), 50);
  return Math.min(100, score);
}

export function scoreSeoQuality(seo: SEOPackage, article: Article): SEOQualityScore {
  const keywordOptimization = scoreKeywordOptimization(seo, article);
  const metaTagQuality = scoreMetaTags(seo);
  const slugQuality = scoreSlug(seo);
  const schemaMarkupQuality = scoreSchemaMarkup(seo);
  const socialMediaOptimization = scoreSocialOptimization(seo);

  return {
    keywordOptimization,
    metaTagQuality,
    slugQuality,
    schemaMarkupQuality,
    socialMediaOptimization,
    averageScore: mean([
      keywordOptimization,
      metaTagQuality,
      slugQuality,
      schemaMarkupQuality,
      socialMediaOptimization,
    ]),
  };
}
