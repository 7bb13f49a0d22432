/**
 * Tests for input validation and the wire (snake_case) schemas.
 *
 * Run: node --import tsx --test src/types/validation.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import {
  InputValidationError,
  parseArticle,
  parseContentAnalysis,
  parseSeoPackage,
  parseTranscript,
  requireText,
} from "./validation.js";
import { ArticleWireSchema, ContentAnalysisWireSchema, TranscriptWireSchema } from "./wire.js";

function captureError(fn: () => unknown): InputValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InputValidationError) {
      return err;
    }
    throw err;
  }
  assert.fail("expected InputValidationError");
}

describe("requireText", () => {
  test("passes strings through, empty ones included", () => {
    assert.equal(requireText("hello"), "hello");
    assert.equal(requireText(""), "");
  });

  test("names what it received", () => {
    assert.equal(captureError(() => requireText(null)).issues[0].message, "Expected string, received null");
    assert.equal(captureError(() => requireText([])).issues[0].message, "Expected string, received array");
    assert.equal(
      captureError(() => requireText(undefined, "caption")).message,
      "Invalid caption: expected a string"
    );
  });
});

describe("parse functions", () => {
  test("parseContentAnalysis fills defaults", () => {
    const analysis = parseContentAnalysis({ mainTopic: "pasta", subtopics: ["sauce"] });
    assert.deepEqual(analysis, {
      mainTopic: "pasta",
      subtopics: ["sauce"],
      keyQuotes: [],
      dataPoints: [],
      suggestedSections: [],
      targetAudience: "",
      tone: "",
      estimatedReadingTime: 0,
      contentFlags: [],
    });
  });

  test("parseArticle lists every problem with its path", () => {
    const err = captureError(() =>
      parseArticle({
        headline: "Title",
        introduction: 3,
        sections: [{ heading: "A", content: "B", wordCount: -1 }],
        conclusion: "End",
        markdown: "",
        wordCount: 10,
      })
    );
    assert.equal(err.message, "Invalid article: 2 validation error(s)");
    assert.deepEqual(
      err.issues.map((i) => i.path),
      ["introduction", "sections.0.wordCount"]
    );
  });

  test("parseSeoPackage requires the metadata maps", () => {
    const err = captureError(() =>
      parseSeoPackage({
        metaTitle: "t",
        metaDescription: "d",
        slug: "s",
        primaryKeyword: "k",
        secondaryKeywords: [],
        schemaMarkup: {},
        openGraph: {},
      })
    );
    assert.deepEqual(
      err.issues.map((i) => i.path),
      ["twitterCard"]
    );
  });

  test("parseTranscript rejects a non-object", () => {
    const err = captureError(() => parseTranscript("just text"));
    assert.equal(err.issues[0].path, "(root)");
  });

  test("format lists the issues", () => {
    const err = new InputValidationError("Invalid article: 1 validation error(s)", [
      { path: "headline", message: "Required", code: "invalid_type" },
    ]);
    assert.equal(err.format(), "Invalid article: 1 validation error(s):\n  - headline: Required");
  });
});

describe("wire schemas", () => {
  test("transcript fields map to camelCase", () => {
    const transcript = TranscriptWireSchema.parse({
      video_id: "vid-002",
      title: "Bread",
      channel: "Test Kitchen",
      duration_seconds: 120,
      transcript: "Knead the dough.",
      segments: [{ start: 0, end: 2, text: "Knead the dough.", confidence: null }],
      source: "whisper",
      language: "en",
      thumbnail_url: null,
    });
    assert.equal(transcript.videoId, "vid-002");
    assert.equal(transcript.durationSeconds, 120);
    assert.equal(transcript.thumbnailUrl, undefined);
    assert.equal(transcript.segments[0].confidence, undefined);
  });

  test("analysis quotes and sections map to camelCase", () => {
    const analysis = ContentAnalysisWireSchema.parse({
      main_topic: "bread",
      subtopics: [],
      key_quotes: [{ text: "Let it rise.", timestamp: 30 }],
      suggested_sections: [{ title: "Rising", description: "Proofing", start_time: 25 }],
      content_flags: ["sponsor segment"],
    });
    assert.equal(analysis.mainTopic, "bread");
    assert.equal(analysis.keyQuotes[0].timestamp, 30);
    assert.equal(analysis.suggestedSections[0].startTime, 25);
    assert.deepEqual(analysis.contentFlags, ["sponsor segment"]);
    assert.equal(analysis.estimatedReadingTime, 0);
  });

  test("article section word counts map to camelCase", () => {
    const article = ArticleWireSchema.parse({
      headline: "H",
      introduction: "I",
      sections: [{ heading: "S", content: "C", word_count: 1 }],
      conclusion: "C",
      markdown: "# H",
      word_count: 4,
    });
    assert.equal(article.wordCount, 4);
    assert.equal(article.sections[0].wordCount, 1);
  });

  test("camelCase input is rejected on the wire", () => {
    const result = ArticleWireSchema.safeParse({
      headline: "H",
      introduction: "I",
      sections: [],
      conclusion: "C",
      markdown: "",
      wordCount: 4,
    });
    assert.equal(result.success, false);
  });
});
