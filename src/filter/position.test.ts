/**
 * Run: node --import tsx --test src/filter/position.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { getTextPosition } from "./position.js";

test("offset in the first paragraph", () => {
  assert.equal(getTextPosition("first line\nsecond line", 0), "paragraph 1");
});

test("newline belongs to the paragraph it ends", () => {
  assert.equal(getTextPosition("first line\nsecond line", 10), "paragraph 1");
});

test("offset in a later paragraph", () => {
  assert.equal(getTextPosition("first line\nsecond line", 12), "paragraph 2");
});

test("text without newlines is one paragraph", () => {
  assert.equal(getTextPosition("one two three four", 14), "paragraph 1");
});

test("offset past the end falls back to a word count", () => {
  assert.equal(getTextPosition("one two three", 20), "word 4");
});
