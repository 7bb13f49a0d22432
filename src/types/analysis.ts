/**
 * Content analysis produced by the analysis stage.
 */

import { z } from "zod";

export const QuoteSchema = z.object({
  text: z.string(),
  /** When the quote appears, in seconds */
  timestamp: z.number().min(0),
  context: z.string().optional(),
});

export type Quote = z.infer<typeof QuoteSchema>;

export const SectionOutlineSchema = z.object({
  title: z.string(),
  description: z.string(),
  startTime: z.number().min(0).optional(),
  endTime: z.number().min(0).optional(),
});

export type SectionOutline = z.infer<typeof SectionOutlineSchema>;

export const ContentAnalysisSchema = z.object({
  mainTopic: z.string(),
  subtopics: z.array(z.string()),
  keyQuotes: z.array(QuoteSchema).default([]),
  dataPoints: z.array(z.string()).default([]),
  suggestedSections: z.array(SectionOutlineSchema).default([]),
  targetAudience: z.string().default(""),
  tone: z.string().default(""),
  /** Minutes */
  estimatedReadingTime: z.number().int().min(0).default(0),
  /**
   * Free-form notes raised during analysis. Entries mentioning
   * "promotional" or "sponsor" lower the article policy score.
   */
  contentFlags: z.array(z.string()).default([]),
});

export type ContentAnalysis = z.infer<typeof ContentAnalysisSchema>;
