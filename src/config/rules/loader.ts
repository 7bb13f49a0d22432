/**
 * Rule table and threshold loaders.
 *
 * Responsible for:
 * - Validating raw input (objects or JSON text) against the schemas
 * - Checking constraints zod can't express (patterns compile, weights
 *   sum to 1, rating bands are ordered)
 * - Producing structured errors
 * - Freezing the result so nothing downstream can mutate it
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import {
  FilterRulesSchema,
  QualityThresholdsSchema,
  type FilterRules,
  type QualityThresholds,
} from "./schema.js";

/**
 * Structured validation error for rule tables and thresholds.
 */
export class RulesConfigError extends Error {
  public readonly issues: RulesConfigIssue[];

  constructor(message: string, issues: RulesConfigIssue[]) {
    super(message);
    this.name = "RulesConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [`${this.message}:`];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface RulesConfigIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or one of our own constraint codes */
  code: string;
}

export interface RulesValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: RulesConfigIssue[];
}

function formatZodIssues(zodIssues: ZodIssue[]): RulesConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function parseJsonInput(input: unknown, label: string): unknown {
  if (typeof input !== "string") {
    return input;
  }
  try {
    return JSON.parse(input);
  } catch (err) {
    throw new RulesConfigError(`${label} is not valid JSON`, [
      {
        path: [],
        message: err instanceof Error ? err.message : String(err),
        code: "invalid_json",
      },
    ]);
  }
}

function checkPattern(
  source: string,
  flags: string,
  path: (string | number)[],
  issues: RulesConfigIssue[]
): void {
  try {
    new RegExp(source, flags);
  } catch (err) {
    issues.push({
      path,
      message: `pattern does not compile: ${err instanceof Error ? err.message : String(err)}`,
      code: "invalid_pattern",
    });
  }
}

/**
 * Validate filter rule constraints that the schema can't express.
 */
function validateFilterRulesConstraints(rules: FilterRules): RulesConfigIssue[] {
  const issues: RulesConfigIssue[] = [];

  const detectors = [
    ["profanity", rules.profanity],
    ["violence", rules.violence],
    ["harassment", rules.harassment],
    ["misinformation", rules.misinformation],
  ] as const;

  for (const [name, detector] of detectors) {
    detector.rules.forEach((rule, index) => {
      checkPattern(rule.pattern, rule.flags, [name, "rules", index, "pattern"], issues);
    });
  }

  rules.spam.patterns.forEach((pattern, index) => {
    checkPattern(pattern, "i", ["spam", "patterns", index], issues);
  });

  rules.promotional.indicators.forEach((pattern, index) => {
    checkPattern(pattern, "i", ["promotional", "indicators", index], issues);
  });

  const seen = new Set<string>();
  rules.sponsor.keywords.forEach((entry, index) => {
    const key = entry.keyword.toLowerCase();
    if (seen.has(key)) {
      issues.push({
        path: ["sponsor", "keywords", index, "keyword"],
        message: `duplicate sponsor keyword "${entry.keyword}"`,
        code: "duplicate",
      });
    }
    seen.add(key);
  });

  return issues;
}

/**
 * Validate threshold constraints that the schema can't express.
 */
function validateQualityThresholdsConstraints(thresholds: QualityThresholds): RulesConfigIssue[] {
  const issues: RulesConfigIssue[] = [];

  const { content, seo, structure, policy } = thresholds.weights;
  const total = content + seo + structure + policy;
  if (Math.abs(total - 1) > 1e-9) {
    issues.push({
      path: ["weights"],
      message: `weights must sum to 1, got ${total}`,
      code: "invalid_weights",
    });
  }

  const bands = thresholds.ratingBands;
  if (!(bands.excellent > bands.good && bands.good > bands.fair)) {
    issues.push({
      path: ["ratingBands"],
      message: "rating bands must satisfy excellent > good > fair",
      code: "invalid_range",
    });
  }

  const policyBands = thresholds.policy.ratingBands;
  if (!(policyBands.compliant > policyBands.warning && policyBands.warning > policyBands.flagged)) {
    issues.push({
      path: ["policy", "ratingBands"],
      message: "policy rating bands must satisfy compliant > warning > flagged",
      code: "invalid_range",
    });
  }

  for (const [dimension, check] of Object.entries(thresholds.policy.checks)) {
    check.patterns.forEach((pattern, index) => {
      checkPattern(pattern, "", ["policy", "checks", dimension, "patterns", index], issues);
    });
  }

  return issues;
}

/**
 * Validate and load filter rules.
 *
 * @param input - Raw rules object or JSON string
 * @returns Validated and frozen rules
 * @throws RulesConfigError if validation fails
 */
export function loadFilterRules(input: unknown): Readonly<FilterRules> {
  const data = parseJsonInput(input, "Filter rules");

  const result = FilterRulesSchema.safeParse(data);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new RulesConfigError(
      `Invalid filter rules: ${issues.length} validation error(s)`,
      issues
    );
  }

  const constraintIssues = validateFilterRulesConstraints(result.data);
  if (constraintIssues.length > 0) {
    throw new RulesConfigError("Filter rules constraint validation failed", constraintIssues);
  }

  return deepFreeze(result.data);
}

/**
 * Validate and load quality thresholds.
 *
 * @param input - Raw thresholds object or JSON string
 * @returns Validated and frozen thresholds
 * @throws RulesConfigError if validation fails
 */
export function loadQualityThresholds(input: unknown): Readonly<QualityThresholds> {
  const data = parseJsonInput(input, "Quality thresholds");

  const result = QualityThresholdsSchema.safeParse(data);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new RulesConfigError(
      `Invalid quality thresholds: ${issues.length} validation error(s)`,
      issues
    );
  }

  const constraintIssues = validateQualityThresholdsConstraints(result.data);
  if (constraintIssues.length > 0) {
    throw new RulesConfigError(
      "Quality thresholds constraint validation failed",
      constraintIssues
    );
  }

  return deepFreeze(result.data);
}

export function loadFilterRulesFromFile(filePath: string): Readonly<FilterRules> {
  return loadFilterRules(readFileSync(filePath, "utf-8"));
}

export function loadQualityThresholdsFromFile(filePath: string): Readonly<QualityThresholds> {
  return loadQualityThresholds(readFileSync(filePath, "utf-8"));
}

/**
 * Validate filter rules without throwing.
 */
export function validateFilterRules(input: unknown): RulesValidationResult<FilterRules> {
  try {
    return { success: true, data: loadFilterRules(input) };
  } catch (err) {
    if (err instanceof RulesConfigError) {
      return { success: false, errors: err.issues };
    }
    throw err;
  }
}

/**
 * Validate quality thresholds without throwing.
 */
export function validateQualityThresholds(
  input: unknown
): RulesValidationResult<QualityThresholds> {
  try {
    return { success: true, data: loadQualityThresholds(input) };
  } catch (err) {
    if (err instanceof RulesConfigError) {
      return { success: false, errors: err.issues };
    }
    throw err;
  }
}
