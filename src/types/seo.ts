/**
 * SEO package produced by the optimisation stage.
 *
 * Schema markup, Open Graph and Twitter Card data are open maps; scoring
 * only checks which of a fixed set of keys are present.
 */

import { z } from "zod";

export const SocialPostsSchema = z.object({
  twitter: z.string(),
  linkedin: z.string(),
  facebook: z.string().optional(),
});

export type SocialPosts = z.infer<typeof SocialPostsSchema>;

export const MetadataMapSchema = z.record(z.string(), z.unknown());
export type MetadataMap = z.infer<typeof MetadataMapSchema>;

export const SEOPackageSchema = z.object({
  metaTitle: z.string(),
  metaDescription: z.string(),
  slug: z.string(),
  primaryKeyword: z.string(),
  secondaryKeywords: z.array(z.string()),
  schemaMarkup: MetadataMapSchema,
  openGraph: MetadataMapSchema,
  twitterCard: MetadataMapSchema,
  socialPosts: SocialPostsSchema.optional(),
  internalLinkSuggestions: z.array(z.string()).default([]),
});

export type SEOPackage = z.infer<typeof SEOPackageSchema>;
