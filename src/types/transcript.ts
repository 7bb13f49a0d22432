/**
 * Transcript values produced by the transcription stage.
 * The filter reads only `transcript`; the rest identifies the source video.
 */

import { z } from "zod";

export const TranscriptSegmentSchema = z.object({
  /** Start time in seconds */
  start: z.number().min(0),
  /** End time in seconds */
  end: z.number().min(0),
  text: z.string(),
  /** 0-1, when the source reports one */
  confidence: z.number().min(0).max(1).optional(),
});

export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

export const TranscriptSource = z.enum(["captions", "whisper"]);
export type TranscriptSource = z.infer<typeof TranscriptSource>;

export const TranscriptSchema = z.object({
  videoId: z.string().min(1),
  title: z.string(),
  channel: z.string(),
  durationSeconds: z.number().int().min(0),
  /** Full transcript as plain text */
  transcript: z.string(),
  segments: z.array(TranscriptSegmentSchema),
  source: TranscriptSource,
  /** Language code, e.g. "en" */
  language: z.string(),
  thumbnailUrl: z.string().optional(),
  uploadDate: z.string().optional(),
});

export type Transcript = z.infer<typeof TranscriptSchema>;
