/**
 * Run: node --import tsx --test src/quality/structure.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { DEFAULT_QUALITY_THRESHOLDS } from "../config/rules/index.js";
import { emptyArticle, sampleArticle } from "../testing/fixtures.js";
import { checkArticleStructure, checkMarkdownFormatting, inspectMarkdown } from "./structure.js";

const thresholds = DEFAULT_QUALITY_THRESHOLDS.structure;

describe("checkArticleStructure", () => {
  test("a complete article passes every check", () => {
    const check = checkArticleStructure(sampleArticle(), thresholds);
    assert.equal(check.allChecksPassed, true);
    assert.equal(check.passedChecks, 7);
    assert.equal(check.totalChecks, 7);
  });

  test("an empty article fails all but the section-content check", () => {
    const check = checkArticleStructure(emptyArticle(), thresholds);
    assert.deepEqual(check, {
      hasHeadline: false,
      hasIntroduction: false,
      hasSections: false,
      hasConclusion: false,
      minWordCountMet: false,
      sectionsHaveContent: true,
      properFormatting: false,
      allChecksPassed: false,
      passedChecks: 1,
      totalChecks: 7,
    });
  });

  test("lengths are measured after trimming", () => {
    const check = checkArticleStructure(
      sampleArticle({ headline: "   Short    " }),
      thresholds
    );
    assert.equal(check.hasHeadline, false);
  });

  test("a headline of nine emoji is too short", () => {
    const check = checkArticleStructure(sampleArticle({ headline: "🍝".repeat(9) }), thresholds);
    assert.equal(check.hasHeadline, false);
  });

  test("section content is measured in characters", () => {
    const article = sampleArticle();
    const thin = sampleArticle({
      sections: [...article.sections, { heading: "Extra", content: "   too thin   ", wordCount: 2 }],
    });
    assert.equal(checkArticleStructure(thin, thresholds).sectionsHaveContent, false);
  });

  test("the word count check uses the declared count", () => {
    const check = checkArticleStructure(sampleArticle({ wordCount: 199 }), thresholds);
    assert.equal(check.minWordCountMet, false);
    assert.equal(check.passedChecks, 6);
  });
});

describe("markdown formatting", () => {
  test("detects headings, paragraphs and lists", () => {
    assert.deepEqual(inspectMarkdown("# Title\n\nText\n- item"), {
      hasHeadings: true,
      hasParagraphs: true,
      hasLists: true,
    });
  });

  test("needs a heading", () => {
    assert.equal(checkMarkdownFormatting("Just text\n\nMore text"), false);
  });

  test("needs a paragraph break", () => {
    assert.equal(checkMarkdownFormatting("## Only a heading"), false);
  });

  test("a hash without a following space is not a heading", () => {
    assert.equal(checkMarkdownFormatting("#hashtag\n\ntext"), false);
  });

  test("heading and paragraph break together pass", () => {
    assert.equal(checkMarkdownFormatting("Intro\n## Part\n\nBody"), true);
  });
});
