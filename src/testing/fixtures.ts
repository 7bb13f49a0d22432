/**
 * Sample pipeline values shared by the test suites.
 */

import type { ContentAnalysis } from "../types/analysis.js";
import type { Article, ArticleSection } from "../types/article.js";
import type { SEOPackage } from "../types/seo.js";
import type { Transcript } from "../types/transcript.js";
import { countWords } from "../utils/text.js";

const HEADLINE = "Homemade Pasta Guide for Busy Weeknight Cooks";

const INTRODUCTION =
  "Homemade pasta sounds like a weekend project, but fresh dough comes together in minutes. " +
  "This guide walks through flour choice, kneading, rolling by hand or with a pasta machine, and matching shapes to sauces.";

const SECTIONS: ReadonlyArray<readonly [string, string]> = [
  [
    "Choosing Your Flour",
    "Tipo 00 flour gives a silky texture, while semolina adds bite. Many cooks blend the two for fresh dough that is easy to roll and holds its shape.",
  ],
  [
    "Mixing and Kneading",
    "Make a well in the flour, crack in the eggs, and stir with a fork. Knead for eight to ten minutes until the dough is smooth; however, stop if it starts to tear.",
  ],
  [
    "Rolling and Cutting",
    "A pasta machine makes thin sheets quick work. Start at the widest setting and fold the sheet twice before moving down. A rolling pin also works with patience.",
  ],
  [
    "Pairing Shapes with Sauces",
    "Wide ribbons such as pappardelle suit rich ragu, and thin strands suit light oil sauces. For example, tagliatelle with butter and sage is a classic pairing.",
  ],
];

const CONCLUSION =
  "Once the basic method feels familiar, homemade pasta becomes a weeknight habit rather than a project. " +
  "Keep a bag of flour and a dozen eggs on hand, and a fresh batch is never more than half an hour away from the table.";

/**
 * A complete four-section article: every structure check passes.
 */
export function sampleArticle(overrides: Partial<Article> = {}): Article {
  const sections: ArticleSection[] = SECTIONS.map(([heading, content]) => ({
    heading,
    content,
    wordCount: countWords(content),
  }));

  const markdown = [
    `# ${HEADLINE}`,
    INTRODUCTION,
    ...SECTIONS.flatMap(([heading, content]) => [`## ${heading}`, content]),
    "## Wrapping Up",
    CONCLUSION,
  ].join("\n\n");

  return {
    headline: HEADLINE,
    introduction: INTRODUCTION,
    sections,
    conclusion: CONCLUSION,
    markdown,
    wordCount: 350,
    ...overrides,
  };
}

/**
 * An article with nothing in it.
 */
export function emptyArticle(): Article {
  return {
    headline: "",
    introduction: "short",
    sections: [],
    conclusion: "",
    markdown: "",
    wordCount: 10,
  };
}

export function sampleAnalysis(overrides: Partial<ContentAnalysis> = {}): ContentAnalysis {
  return {
    mainTopic: "Homemade Pasta",
    subtopics: ["fresh dough", "pasta machine"],
    keyQuotes: [{ text: "Knead until smooth.", timestamp: 95 }],
    dataPoints: ["Kneading takes eight to ten minutes"],
    suggestedSections: [],
    targetAudience: "home cooks",
    tone: "friendly",
    estimatedReadingTime: 2,
    contentFlags: [],
    ...overrides,
  };
}

/**
 * Meta title of 53 characters and description of 152, both in the
 * optimal ranges, with every schema, Open Graph and Twitter Card key.
 */
export function sampleSeo(overrides: Partial<SEOPackage> = {}): SEOPackage {
  return {
    metaTitle: "Homemade Pasta Guide: Fresh Dough on a Busy Weeknight",
    metaDescription:
      "Learn to make homemade pasta from scratch with fresh dough, a pasta machine or a rolling pin, " +
      "and pair each shape with the right sauce in under an hour.",
    slug: "homemade-pasta-guide",
    primaryKeyword: "homemade pasta",
    secondaryKeywords: ["fresh dough", "pasta machine"],
    schemaMarkup: {
      "@type": "Article",
      headline: HEADLINE,
      description: "How to make pasta at home",
      author: "Test Author",
      datePublished: "2024-01-15",
      image: "https://example.com/pasta.jpg",
      articleBody: "Full text",
      keywords: "homemade pasta, fresh dough",
    },
    openGraph: {
      "og:title": HEADLINE,
      "og:description": "How to make pasta at home",
      "og:type": "article",
    },
    twitterCard: {
      "twitter:card": "summary",
      "twitter:title": HEADLINE,
      "twitter:description": "How to make pasta at home",
    },
    internalLinkSuggestions: [],
    ...overrides,
  };
}

export function sampleTranscript(overrides: Partial<Transcript> = {}): Transcript {
  return {
    videoId: "vid-001",
    title: "Pasta night",
    channel: "Test Kitchen",
    durationSeconds: 600,
    transcript: "Tonight we make fresh pasta from flour and eggs.",
    segments: [{ start: 0, end: 4.5, text: "Tonight we make fresh pasta from flour and eggs." }],
    source: "captions",
    language: "en",
    ...overrides,
  };
}
