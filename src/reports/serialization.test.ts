/**
 * Run: node --import tsx --test src/reports/serialization.test.ts
 */

import { after, describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { ContentFilterResult, QualityAssessment } from "../types/results.js";
import { InputValidationError } from "../types/validation.js";
import {
  CONTENT_FILTER_FILENAME,
  QUALITY_ASSESSMENT_FILENAME,
  assessmentToWire,
  filterResultToWire,
  loadPipelineOutput,
  parsePipelineOutput,
  saveReports,
  serializeReport,
} from "./serialization.js";

const filterResult: ContentFilterResult = {
  flags: [
    {
      category: "sponsor",
      severity: "low",
      text: "promo code",
      position: "word 4",
      message: "Potential sponsor mention detected: 'promo code'",
      confidence: 0.7,
    },
    {
      category: "promotional",
      severity: "high",
      text: "High promotional content",
      message: "Content has high promotional score: 100.0%",
      confidence: 1,
    },
  ],
  hasCriticalIssues: false,
  overallCompliance: "flagged",
  summary: "Issues detected: 1 sponsor, 1 promotional",
  isSponsorContent: true,
  sponsorMentions: ["promo code"],
  promotionalScore: 1,
  qualityIssues: ["Promotional: Content has high promotional score: 100.0%"],
};

const assessment: QualityAssessment = {
  structureCheck: {
    hasHeadline: true,
    hasIntroduction: true,
    hasSections: true,
    hasConclusion: true,
    minWordCountMet: true,
    sectionsHaveContent: true,
    properFormatting: false,
    allChecksPassed: false,
    passedChecks: 6,
    totalChecks: 7,
  },
  contentQuality: {
    readabilityScore: 60,
    coherenceScore: 50,
    completenessScore: 100,
    relevanceScore: 100,
    uniquenessScore: 90,
    averageScore: 80,
  },
  seoQuality: {
    keywordOptimization: 100,
    metaTagQuality: 80,
    slugQuality: 100,
    schemaMarkupQuality: 70,
    socialMediaOptimization: 100,
    averageScore: 90,
  },
  overallScore: 82.5,
  qualityRating: "good",
  recommendations: [
    { category: "structure", severity: "info", message: "Markdown formatting could be improved" },
  ],
};

describe("filterResultToWire", () => {
  test("snake_case keys with null for a missing position", () => {
    assert.deepEqual(filterResultToWire(filterResult), {
      flags: [
        {
          category: "sponsor",
          severity: "low",
          text: "promo code",
          position: "word 4",
          message: "Potential sponsor mention detected: 'promo code'",
          confidence: 0.7,
        },
        {
          category: "promotional",
          severity: "high",
          text: "High promotional content",
          position: null,
          message: "Content has high promotional score: 100.0%",
          confidence: 1,
        },
      ],
      has_critical_issues: false,
      overall_compliance: "flagged",
      summary: "Issues detected: 1 sponsor, 1 promotional",
      is_sponsor_content: true,
      sponsor_mentions: ["promo code"],
      promotional_score: 1,
      quality_issues: ["Promotional: Content has high promotional score: 100.0%"],
    });
  });
});

describe("assessmentToWire", () => {
  test("snake_case keys, null policy and action when absent", () => {
    assert.deepEqual(assessmentToWire(assessment), {
      structure_check: {
        has_headline: true,
        has_introduction: true,
        has_sections: true,
        has_conclusion: true,
        min_word_count_met: true,
        sections_have_content: true,
        proper_formatting: false,
        all_checks_passed: false,
        passed_checks: 6,
        total_checks: 7,
      },
      content_quality: {
        readability_score: 60,
        coherence_score: 50,
        completeness_score: 100,
        relevance_score: 100,
        uniqueness_score: 90,
        average_score: 80,
      },
      seo_quality: {
        keyword_optimization: 100,
        meta_tag_quality: 80,
        slug_quality: 100,
        schema_markup_quality: 70,
        social_media_optimization: 100,
        average_score: 90,
      },
      policy_compliance: null,
      overall_score: 82.5,
      quality_rating: "good",
      recommendations: [
        {
          category: "structure",
          severity: "info",
          message: "Markdown formatting could be improved",
          action: null,
        },
      ],
    });
  });

  test("policy scores are included when present", () => {
    const wire = assessmentToWire({
      ...assessment,
      policyCompliance: {
        profanityFreeScore: 70,
        violenceFreeScore: 100,
        harassmentFreeScore: 100,
        hateSpeechFreeScore: 100,
        promotionalContentScore: 100,
        sponsorTransparencyScore: 100,
        misinformationFreeScore: 100,
        overallPolicyCompliance: 670 / 7,
        policyRating: "compliant",
      },
    });
    assert.deepEqual(JSON.parse(serializeReport(wire)).policy_compliance, {
      profanity_free_score: 70,
      violence_free_score: 100,
      harassment_free_score: 100,
      hate_speech_free_score: 100,
      promotional_content_score: 100,
      sponsor_transparency_score: 100,
      misinformation_free_score: 100,
      overall_policy_compliance: 670 / 7,
      policy_rating: "compliant",
    });
  });
});

describe("serializeReport", () => {
  test("pretty by default, compact on request", () => {
    assert.equal(serializeReport({ a: 1 }), '{\n  "a": 1\n}');
    assert.equal(serializeReport({ a: 1 }, false), '{"a":1}');
  });
});

const transcriptWire = {
  video_id: "vid-003",
  title: "Soup basics",
  channel: "Test Kitchen",
  duration_seconds: 300,
  transcript: "Simmer the stock slowly.",
  segments: [],
  source: "captions",
  language: "en",
};

describe("parsePipelineOutput", () => {
  test("a transcript alone is enough", () => {
    const output = parsePipelineOutput(JSON.stringify({ transcript: transcriptWire }));
    assert.equal(output.transcript.videoId, "vid-003");
    assert.equal(output.analysis, undefined);
    assert.equal(output.article, undefined);
    assert.equal(output.seo, undefined);
  });

  test("null stages are accepted", () => {
    const output = parsePipelineOutput(
      JSON.stringify({ transcript: transcriptWire, analysis: null, article: null, seo: null })
    );
    assert.equal(output.article, null);
  });

  test("text that is not JSON", () => {
    assert.throws(
      () => parsePipelineOutput("{not json"),
      (err: unknown) =>
        err instanceof InputValidationError &&
        err.message === "Invalid pipeline output: not valid JSON" &&
        err.issues[0].code === "invalid_json"
    );
  });

  test("schema problems carry their paths", () => {
    assert.throws(
      () => parsePipelineOutput(JSON.stringify({ transcript: { ...transcriptWire, source: "tape" } })),
      (err: unknown) =>
        err instanceof InputValidationError &&
        err.message === "Invalid pipeline output: 1 validation error(s)" &&
        err.issues[0].path === "transcript.source"
    );
  });
});

describe("files", () => {
  const root = mkdtempSync(join(tmpdir(), "review-serialization-"));

  after(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("loadPipelineOutput reads a file", () => {
    const path = join(root, "pipeline.json");
    writeFileSync(path, JSON.stringify({ transcript: transcriptWire }), "utf-8");
    assert.equal(loadPipelineOutput(path).transcript.title, "Soup basics");
  });

  test("saveReports writes the filter result only", () => {
    const saved = saveReports(join(root, "out"), "vid-a", filterResult);
    assert.equal(saved.directory, join(root, "out", "vid-a"));
    assert.equal(saved.contentFilterPath, join(root, "out", "vid-a", CONTENT_FILTER_FILENAME));
    assert.equal(saved.qualityAssessmentPath, undefined);
    assert.equal(existsSync(join(saved.directory, QUALITY_ASSESSMENT_FILENAME)), false);

    const written = JSON.parse(readFileSync(saved.contentFilterPath, "utf-8"));
    assert.equal(written.overall_compliance, "flagged");
    assert.deepEqual(written.sponsor_mentions, ["promo code"]);
  });

  test("saveReports writes both reports", () => {
    const saved = saveReports(join(root, "out"), "vid-b", filterResult, assessment);
    assert.equal(
      saved.qualityAssessmentPath,
      join(root, "out", "vid-b", QUALITY_ASSESSMENT_FILENAME)
    );
    const written = JSON.parse(readFileSync(join(saved.directory, QUALITY_ASSESSMENT_FILENAME), "utf-8"));
    assert.equal(written.quality_rating, "good");
    assert.equal(written.structure_check.passed_checks, 6);
  });

  test("saveReports rejects video IDs that leave the output directory", () => {
    for (const videoId of ["../escape", "nested/id", "back\\slash", ".."]) {
      assert.throws(
        () => saveReports(join(root, "out"), videoId, filterResult),
        (err: unknown) =>
          err instanceof InputValidationError &&
          err.message === "Invalid video ID for a report directory" &&
          err.issues[0].path === "videoId"
      );
    }
    assert.equal(existsSync(join(root, "escape")), false);
  });
});
