/**
 * Article produced by the writing stage.
 */

import { z } from "zod";

export const ArticleSectionSchema = z.object({
  heading: z.string(),
  /** Section body in Markdown */
  content: z.string(),
  wordCount: z.number().int().min(0),
});

export type ArticleSection = z.infer<typeof ArticleSectionSchema>;

export const ArticleSchema = z.object({
  headline: z.string(),
  introduction: z.string(),
  sections: z.array(ArticleSectionSchema),
  conclusion: z.string(),
  /** The complete article rendered as Markdown */
  markdown: z.string(),
  wordCount: z.number().int().min(0),
});

export type Article = z.infer<typeof ArticleSchema>;
