/**
 * Run: node --import tsx --test src/quality/readability.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import {
  DEFAULT_READABILITY,
  calculateReadability,
  countSentences,
  estimateSyllables,
  stripMarkdown,
} from "./readability.js";

describe("stripMarkdown", () => {
  test("removes markdown punctuation", () => {
    assert.equal(stripMarkdown("# Title\n\n**bold** _it_ [link](url)"), " Title\n\nbold it linkurl");
  });
});

describe("countSentences", () => {
  test("splits on terminal punctuation", () => {
    assert.equal(countSentences("One. Two! Three? "), 3);
  });

  test("runs of punctuation end one sentence", () => {
    assert.equal(countSentences("Wait... what?!"), 2);
  });

  test("no text, no sentences", () => {
    assert.equal(countSentences("   "), 0);
  });
});

describe("estimateSyllables", () => {
  test("counts vowel groups", () => {
    assert.equal(estimateSyllables("The happy family visited the museum yesterday afternoon."), 18);
  });

  test("a trailing -le keeps its syllable", () => {
    assert.equal(estimateSyllables("table"), 2);
  });

  test("never below one", () => {
    assert.equal(estimateSyllables(""), 1);
    assert.equal(estimateSyllables("the"), 1);
  });
});

describe("calculateReadability", () => {
  test("Flesch formula over words, sentences and syllables", () => {
    const score = calculateReadability("The happy family visited the museum yesterday afternoon.");
    assert.ok(Math.abs(score - 8.365) < 1e-9);
  });

  test("clamped to 100", () => {
    assert.equal(calculateReadability("The cat sat. The dog ran."), 100);
  });

  test("clamped to 0", () => {
    assert.equal(calculateReadability("Understanding elementary university vocabulary."), 0);
  });

  test("empty text gets the default", () => {
    assert.equal(calculateReadability(""), DEFAULT_READABILITY);
    assert.equal(calculateReadability("## ** __"), DEFAULT_READABILITY);
  });
});
