#!/usr/bin/env node
/**
 * Review a saved pipeline output: filter the transcript and, when the
 * article stages are present, assess the article.
 *
 * USAGE:
 *   npm run review -- --input output/abc123/pipeline.json
 *   npm run review -- --input pipeline.json --save --json
 *   npm run review -- --input pipeline.json --rules config/filter-rules.json --override
 *
 * Options:
 *   --input <path>        Pipeline output JSON (transcript, analysis, article, seo)
 *   --rules <path>        Filter rules JSON (default: built-in, or FILTER_RULES_PATH)
 *   --thresholds <path>   Quality thresholds JSON (default: built-in, or QUALITY_THRESHOLDS_PATH)
 *   --out <dir>           Write content_filter.json and quality_assessment.json under <dir>/<videoId>
 *   --save                Same as --out with OUTPUT_DIR
 *   --override            Continue past flagged content (warned content always continues)
 *   --no-policy           Leave policy compliance out of the assessment
 *   --json                Output as JSON
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (unreadable input, invalid rules or thresholds)
 *   2 - The content gate stopped the review (blocked, or flagged without --override)
 */

import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  resolveLogLevel,
  loadFilterRulesFromFile,
  loadQualityThresholdsFromFile,
  RulesConfigError,
  ConfigError,
  type AppConfig,
} from "../config/index.js";
import { ContentFilter, evaluateGate, type GateOutcome } from "../filter/index.js";
import { QualityAssurance } from "../quality/index.js";
import {
  assessmentToWire,
  filterResultToWire,
  formatAssessment,
  formatFilterResult,
  loadPipelineOutput,
  saveReports,
  serializeReport,
  type SavedReports,
} from "../reports/index.js";
import type { ContentFilterResult, QualityAssessment } from "../types/results.js";
import type { PipelineOutput } from "../types/wire.js";
import { InputValidationError } from "../types/validation.js";
import { createLogger, createSilentLogger, initRunId, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface ReviewArgs {
  input: string;
  rules?: string;
  thresholds?: string;
  out?: string;
  override: boolean;
  policy: boolean;
  json: boolean;
}

export interface ReviewOutcome {
  exitCode: 0 | 1 | 2;
  output: string;
  filterResult?: ContentFilterResult;
  assessment?: QualityAssessment;
  gate?: GateOutcome;
  saved?: SavedReports;
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `Usage: review --input <path> [options]

Options:
  --input <path>        Pipeline output JSON (transcript, analysis, article, seo)
  --rules <path>        Filter rules JSON
  --thresholds <path>   Quality thresholds JSON
  --out <dir>           Write report files under <dir>/<videoId>
  --save                Write report files under OUTPUT_DIR/<videoId>
  --override            Continue past flagged content (warned content always continues)
  --no-policy           Leave policy compliance out of the assessment
  --json                Output as JSON
  -h, --help            Show this help message`;

/**
 * Parse argv into review arguments. Returns null when help was requested.
 *
 * @throws Error on unknown options or a missing --input
 */
export function parseReviewArgs(argv: string[], appConfig: AppConfig = config): ReviewArgs | null {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string" },
      rules: { type: "string" },
      thresholds: { type: "string" },
      out: { type: "string" },
      save: { type: "boolean", default: false },
      override: { type: "boolean", default: false },
      "no-policy": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) {
    return null;
  }

  if (!values.input) {
    throw new Error("Missing required option --input");
  }

  return {
    input: values.input,
    rules: values.rules ?? appConfig.filterRulesPath,
    thresholds: values.thresholds ?? appConfig.qualityThresholdsPath,
    out: values.out ?? (values.save ? appConfig.outputDir : undefined),
    override: values.override,
    policy: !values["no-policy"],
    json: values.json,
  };
}

// ============================================================
// Review
// ============================================================

function describeError(err: unknown): string {
  if (err instanceof InputValidationError || err instanceof RulesConfigError) {
    return err.format();
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run one review. Never exits the process; the exit code is returned.
 */
export function runReview(args: ReviewArgs, logger: Logger = createSilentLogger()): ReviewOutcome {
  let filter: ContentFilter;
  let qa: QualityAssurance;
  let pipeline: PipelineOutput;

  try {
    filter = new ContentFilter({
      rules: args.rules ? loadFilterRulesFromFile(args.rules) : undefined,
      logger,
    });
    qa = new QualityAssurance({
      thresholds: args.thresholds ? loadQualityThresholdsFromFile(args.thresholds) : undefined,
      logger,
      includePolicy: args.policy,
    });
    pipeline = loadPipelineOutput(args.input);
  } catch (err) {
    const message = describeError(err);
    logger.error("Review setup failed", { input: args.input });
    return { exitCode: 1, output: `Error: ${message}` };
  }

  const { transcript, analysis, article, seo } = pipeline;
  const filterResult = filter.filterTranscript(transcript);
  const gate = evaluateGate(filterResult, { override: args.override });

  logger.info("Gate decision", { videoId: transcript.videoId, decision: gate.decision });

  let assessment: QualityAssessment | undefined;
  if (gate.canProceed && analysis && article && seo) {
    assessment = qa.assess(article, analysis, seo);
  } else if (gate.canProceed) {
    logger.info("Article stages missing; skipping quality assessment", {
      videoId: transcript.videoId,
    });
  }

  let saved: SavedReports | undefined;
  if (args.out) {
    try {
      saved = saveReports(args.out, transcript.videoId, filterResult, assessment);
    } catch (err) {
      logger.error("Failed to write reports", { out: args.out });
      return { exitCode: 1, output: `Error: ${describeError(err)}`, filterResult, assessment, gate };
    }
    logger.info("Reports written", { directory: saved.directory });
  }

  const exitCode = gate.canProceed ? 0 : 2;

  let output: string;
  if (args.json) {
    output = serializeReport({
      video_id: transcript.videoId,
      gate: {
        decision: gate.decision,
        can_proceed: gate.canProceed,
        requires_override: gate.requiresOverride,
        reason: gate.reason,
      },
      content_filter: filterResultToWire(filterResult),
      quality_assessment: assessment ? assessmentToWire(assessment) : null,
    });
  } else {
    const sections = [
      `Video: ${transcript.title} (${transcript.videoId})`,
      formatFilterResult(filterResult),
      `Gate: ${gate.decision.toUpperCase()} - ${gate.reason}`,
    ];
    if (assessment) {
      sections.push(formatAssessment(assessment));
    }
    if (saved) {
      sections.push(`Reports written to ${saved.directory}`);
    }
    output = sections.join("\n\n");
  }

  return { exitCode, output, filterResult, assessment, gate, saved };
}

// ============================================================
// Main
// ============================================================

function main(): void {
  let args: ReviewArgs | null;
  try {
    args = parseReviewArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(HELP);
    process.exit(1);
  }

  if (args === null) {
    console.log(HELP);
    process.exit(0);
  }

  try {
    validateConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const runId = initRunId();
  const logger = createLogger({
    level: resolveLogLevel(config),
    logDir: config.logDir,
    logFile: `${config.appName}.log`,
    file: config.logToFile,
    // Keep stdout clean for JSON consumers
    console: !args.json,
  });
  logger.info("Review starting", { runId, input: args.input });

  const outcome = runReview(args, logger);
  if (outcome.exitCode === 1) {
    console.error(outcome.output);
  } else {
    console.log(outcome.output);
  }
  process.exit(outcome.exitCode);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("review.ts") ||
   process.argv[1].endsWith("review.js"));

if (isDirectExecution) {
  main();
}
