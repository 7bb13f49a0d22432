/**
 * Wire (JSON) forms of the upstream values.
 *
 * Pipeline output files use snake_case field names. These schemas accept
 * that shape and map it onto the camelCase domain types, so JSON read from
 * disk goes through the same validation as values built in code.
 */

import { z } from "zod";
import { TranscriptSource, type Transcript } from "./transcript.js";
import type { ContentAnalysis } from "./analysis.js";
import type { Article } from "./article.js";
import { MetadataMapSchema, type SEOPackage } from "./seo.js";

const TranscriptSegmentWire = z.object({
  start: z.number().min(0),
  end: z.number().min(0),
  text: z.string(),
  confidence: z.number().min(0).max(1).nullish(),
});

export const TranscriptWireSchema = z
  .object({
    video_id: z.string().min(1),
    title: z.string(),
    channel: z.string(),
    duration_seconds: z.number().int().min(0),
    transcript: z.string(),
    segments: z.array(TranscriptSegmentWire),
    source: TranscriptSource,
    language: z.string(),
    thumbnail_url: z.string().nullish(),
    upload_date: z.string().nullish(),
  })
  .transform(
    (w): Transcript => ({
      videoId: w.video_id,
      title: w.title,
      channel: w.channel,
      durationSeconds: w.duration_seconds,
      transcript: w.transcript,
      segments: w.segments.map((s) => ({
        start: s.start,
        end: s.end,
        text: s.text,
        confidence: s.confidence ?? undefined,
      })),
      source: w.source,
      language: w.language,
      thumbnailUrl: w.thumbnail_url ?? undefined,
      uploadDate: w.upload_date ?? undefined,
    })
  );

export const ContentAnalysisWireSchema = z
  .object({
    main_topic: z.string(),
    subtopics: z.array(z.string()),
    key_quotes: z
      .array(
        z.object({
          text: z.string(),
          timestamp: z.number().min(0),
          context: z.string().nullish(),
        })
      )
      .default([]),
    data_points: z.array(z.string()).default([]),
    suggested_sections: z
      .array(
        z.object({
          title: z.string(),
          description: z.string(),
          start_time: z.number().min(0).nullish(),
          end_time: z.number().min(0).nullish(),
        })
      )
      .default([]),
    target_audience: z.string().default(""),
    tone: z.string().default(""),
    estimated_reading_time: z.number().int().min(0).default(0),
    content_flags: z.array(z.string()).default([]),
  })
  .transform(
    (w): ContentAnalysis => ({
      mainTopic: w.main_topic,
      subtopics: w.subtopics,
      keyQuotes: w.key_quotes.map((q) => ({
        text: q.text,
        timestamp: q.timestamp,
        context: q.context ?? undefined,
      })),
      dataPoints: w.data_points,
      suggestedSections: w.suggested_sections.map((s) => ({
        title: s.title,
        description: s.description,
        startTime: s.start_time ?? undefined,
        endTime: s.end_time ?? undefined,
      })),
      targetAudience: w.target_audience,
      tone: w.tone,
      estimatedReadingTime: w.estimated_reading_time,
      contentFlags: w.content_flags,
    })
  );

export const ArticleWireSchema = z
  .object({
    headline: z.string(),
    introduction: z.string(),
    sections: z.array(
      z.object({
        heading: z.string(),
        content: z.string(),
        word_count: z.number().int().min(0),
      })
    ),
    conclusion: z.string(),
    markdown: z.string(),
    word_count: z.number().int().min(0),
  })
  .transform(
    (w): Article => ({
      headline: w.headline,
      introduction: w.introduction,
      sections: w.sections.map((s) => ({
        heading: s.heading,
        content: s.content,
        wordCount: s.word_count,
      })),
      conclusion: w.conclusion,
      markdown: w.markdown,
      wordCount: w.word_count,
    })
  );

export const SEOPackageWireSchema = z
  .object({
    meta_title: z.string(),
    meta_description: z.string(),
    slug: z.string(),
    primary_keyword: z.string(),
    secondary_keywords: z.array(z.string()),
    schema_markup: MetadataMapSchema,
    open_graph: MetadataMapSchema,
    twitter_card: MetadataMapSchema,
    social_posts: z
      .object({
        twitter: z.string(),
        linkedin: z.string(),
        facebook: z.string().nullish(),
      })
      .nullish(),
    internal_link_suggestions: z.array(z.string()).default([]),
  })
  .transform(
    (w): SEOPackage => ({
      metaTitle: w.meta_title,
      metaDescription: w.meta_description,
      slug: w.slug,
      primaryKeyword: w.primary_keyword,
      secondaryKeywords: w.secondary_keywords,
      schemaMarkup: w.schema_markup,
      openGraph: w.open_graph,
      twitterCard: w.twitter_card,
      socialPosts: w.social_posts
        ? {
            twitter: w.social_posts.twitter,
            linkedin: w.social_posts.linkedin,
            facebook: w.social_posts.facebook ?? undefined,
          }
        : undefined,
      internalLinkSuggestions: w.internal_link_suggestions,
    })
  );

/**
 * A saved pipeline output. Only the transcript is required; the article
 * stages may not have run yet.
 */
export const PipelineOutputWireSchema = z.object({
  transcript: TranscriptWireSchema,
  analysis: ContentAnalysisWireSchema.nullish(),
  article: ArticleWireSchema.nullish(),
  seo: SEOPackageWireSchema.nullish(),
});

export type PipelineOutput = z.output<typeof PipelineOutputWireSchema>;
