/**
 * Tests for the transcript content filter.
 *
 * Run: node --import tsx --test src/filter/content-filter.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { DEFAULT_FILTER_RULES, RulesConfigError } from "../config/rules/index.js";
import type { LogContext, Logger } from "../logging/index.js";
import { InputValidationError } from "../types/validation.js";
import { ContentFilter } from "./content-filter.js";
import { ALL_CLEAR_SUMMARY } from "./summary.js";

interface LogRecord {
  level: string;
  message: string;
  context: LogContext;
}

function recordingLogger(records: LogRecord[], base: LogContext = {}): Logger {
  const log = (level: string) => (message: string, context: LogContext = {}) => {
    records.push({ level, message, context: { ...base, ...context } });
  };
  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    child: (context) => recordingLogger(records, { ...base, ...context }),
  };
}

const filter = new ContentFilter();

describe("ContentFilter.filterText", () => {
  test("clean text is compliant", () => {
    const result = filter.filterText("This is a normal educational video about cooking pasta.");
    assert.equal(result.overallCompliance, "compliant");
    assert.deepEqual(result.flags, []);
    assert.equal(result.promotionalScore, 0);
    assert.equal(result.summary, ALL_CLEAR_SUMMARY);
    assert.equal(result.isSponsorContent, false);
    assert.equal(result.hasCriticalIssues, false);
    assert.deepEqual(result.qualityIssues, []);
  });

  test("sales pitch gets sponsor and promotional flags", () => {
    const result = filter.filterText(
      "Buy now! Don't miss this exclusive offer! Use promo code SAVE20 for 20% off. Act now before it's gone."
    );

    assert.deepEqual(
      result.flags.map((f) => [f.category, f.text]),
      [
        ["sponsor", "promo code"],
        ["promotional", "Promotional score: 1.00"],
      ]
    );
    assert.equal(result.flags[0].confidence, 0.7);
    assert.equal(result.flags[0].position, "paragraph 1");
    assert.equal(result.promotionalScore, 1);
    assert.equal(result.overallCompliance, "warning");
    assert.equal(result.isSponsorContent, true);
    assert.deepEqual(result.sponsorMentions, ["promo code", "buy now"]);
    assert.equal(
      result.summary,
      "Issues detected: 1 sponsor, 1 promotional | Promotional content score: 100.0% | Sponsor mentions: promo code, buy now"
    );
    assert.deepEqual(result.qualityIssues, []);
  });

  test("high severity flags the content", () => {
    const result = filter.filterText("You are an idiot");
    assert.equal(result.overallCompliance, "flagged");
    assert.equal(result.flags.length, 1);
    assert.equal(result.flags[0].text, "idiot");
    assert.deepEqual(result.qualityIssues, ["Profanity: Offensive language detected"]);
    assert.equal(result.summary, "Issues detected: 1 profanity");
  });

  test("matching is case-insensitive", () => {
    const result = filter.filterText("BUY NOW");
    assert.deepEqual(result.sponsorMentions, ["buy now"]);
  });

  test("empty text is compliant", () => {
    const result = filter.filterText("");
    assert.equal(result.overallCompliance, "compliant");
    assert.equal(result.summary, ALL_CLEAR_SUMMARY);
  });

  test("non-string text is rejected", () => {
    assert.throws(
      () => filter.filterText(42),
      (err: unknown) =>
        err instanceof InputValidationError &&
        err.message === "Invalid transcript text: expected a string" &&
        err.issues[0].message === "Expected string, received number"
    );
  });

  test("repeated calls give identical results", () => {
    const text = "a miracle cure, subscribe and like";
    assert.deepEqual(filter.filterText(text), filter.filterText(text));
  });
});

describe("ContentFilter with custom rules", () => {
  test("a critical rule blocks the content", () => {
    const strict = new ContentFilter({
      rules: {
        ...DEFAULT_FILTER_RULES,
        misinformation: { ...DEFAULT_FILTER_RULES.misinformation, severity: "critical" },
      },
    });
    const result = strict.filterText("They claim it cures cancer");

    assert.equal(result.overallCompliance, "blocked");
    assert.equal(result.hasCriticalIssues, true);
    assert.equal(result.flags.length, 1);
    assert.equal(result.flags[0].text, "cures cancer");
    assert.deepEqual(result.qualityIssues, ["Misinformation: Unverified medical claims"]);
  });

  test("a lower spam threshold", () => {
    const eager = new ContentFilter({
      rules: { ...DEFAULT_FILTER_RULES, spam: { ...DEFAULT_FILTER_RULES.spam, threshold: 1 } },
    });
    const result = eager.filterText("subscribe and share");
    assert.equal(result.flags.length, 1);
    assert.equal(result.flags[0].category, "spam");
  });

  test("invalid rules fail at construction", () => {
    assert.throws(() => new ContentFilter({ rules: { version: "1.0.0" } }), RulesConfigError);
  });

  test("exposes the rules version", () => {
    assert.equal(filter.rulesVersion, "1.0.0");
  });
});

describe("ContentFilter.filterTranscript", () => {
  const transcript = {
    videoId: "vid-001",
    title: "Pasta night",
    channel: "Test Kitchen",
    durationSeconds: 600,
    transcript: "Today we cook pasta. Subscribe for more!",
    segments: [{ start: 0, end: 4.5, text: "Today we cook pasta." }],
    source: "captions",
    language: "en",
  };

  test("filters the transcript text", () => {
    const result = filter.filterTranscript(transcript);
    assert.equal(result.overallCompliance, "compliant");
    assert.deepEqual(result.flags, []);
  });

  test("logs completion with the video id", () => {
    const records: LogRecord[] = [];
    const logged = new ContentFilter({ logger: recordingLogger(records) });
    logged.filterTranscript(transcript);

    const done = records.find((r) => r.message === "Content filtering complete");
    assert.ok(done);
    assert.equal(done.level, "info");
    assert.equal(done.context.videoId, "vid-001");
    assert.equal(done.context.compliance, "compliant");
  });

  test("rejects a malformed transcript", () => {
    assert.throws(
      () => filter.filterTranscript({ ...transcript, source: "radio", videoId: "" }),
      (err: unknown) =>
        err instanceof InputValidationError &&
        err.message === "Invalid transcript: 2 validation error(s)"
    );
  });
});
