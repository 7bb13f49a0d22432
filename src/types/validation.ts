/**
 * Input validation for values handed over by upstream stages.
 *
 * Scoring assumes well-formed values. Anything missing or ill-typed is
 * rejected here, before any detector or scorer runs, with every problem
 * listed at once.
 */

import type { ZodIssue, ZodTypeAny, output } from "zod";
import { TranscriptSchema, type Transcript } from "./transcript.js";
import { ContentAnalysisSchema, type ContentAnalysis } from "./analysis.js";
import { ArticleSchema, type Article } from "./article.js";
import { SEOPackageSchema, type SEOPackage } from "./seo.js";

export interface InputIssue {
  /** Dotted path to the offending field, "(root)" for the value itself */
  path: string;
  message: string;
  code: string;
}

export class InputValidationError extends Error {
  public readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[]) {
    super(message);
    this.name = "InputValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = [`${this.message}:`];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function toInputIssues(issues: ZodIssue[]): InputIssue[] {
  return issues.map((i) => ({
    path: i.path.join(".") || "(root)",
    message: i.message,
    code: i.code,
  }));
}

/**
 * Parse `input` with `schema`, throwing InputValidationError on failure.
 */
export function parseInput<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toInputIssues(result.error.issues);
    throw new InputValidationError(
      `Invalid ${label}: ${issues.length} validation error(s)`,
      issues
    );
  }
  return result.data;
}

/**
 * Require raw text. Empty strings are allowed; non-strings are not.
 */
export function requireText(input: unknown, label = "text"): string {
  if (typeof input !== "string") {
    const received = input === null ? "null" : Array.isArray(input) ? "array" : typeof input;
    throw new InputValidationError(`Invalid ${label}: expected a string`, [
      { path: "(root)", message: `Expected string, received ${received}`, code: "invalid_type" },
    ]);
  }
  return input;
}

export function parseTranscript(input: unknown): Transcript {
  return parseInput(TranscriptSchema, input, "transcript");
}

export function parseContentAnalysis(input: unknown): ContentAnalysis {
  return parseInput(ContentAnalysisSchema, input, "content analysis");
}

export function parseArticle(input: unknown): Article {
  return parseInput(ArticleSchema, input, "article");
}

export function parseSeoPackage(input: unknown): SEOPackage {
  return parseInput(SEOPackageSchema, input, "SEO package");
}
