/**
 * Transcript review: content filtering for video transcripts and quality
 * assessment for the articles generated from them.
 *
 * Usage:
 *   import { ContentFilter, QualityAssurance } from "transcript-review";
 *
 *   const filter = new ContentFilter();
 *   const result = filter.filterText(transcriptText);
 *
 *   const qa = new QualityAssurance();
 *   const assessment = qa.assess(article, analysis, seo);
 */

export * from "./config/rules/index.js";
export * from "./types/index.js";
export * from "./filter/index.js";
export * from "./quality/index.js";
export * from "./reports/index.js";
export {
  createLogger,
  createSilentLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogContext,
} from "./logging/index.js";
