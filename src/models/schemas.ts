/**
 * Data models with Zod validation schemas
 */

import { z } from 'zod';

/**
 * Section label stored when a listing carries no section of its own
 */
export const UNKNOWN_SECTION = 'unknown';

/**
 * Image or inline vector graphic found in an article body
 */
export const ImageDescriptorSchema = z.object({
  source_url: z.string().nullable(),
  width: z.number().int().nonnegative().nullable(),
  height: z.number().int().nonnegative().nullable(),
  kind: z.enum(['raster', 'vector']),
  raw_markup: z.string().nullable(),
});

export type ImageDescriptor = z.infer<typeof ImageDescriptorSchema>;

/**
 * Publish time found in page metadata: an ISO-8601 timestamp with a zone, or
 * a calendar date read as UTC midnight. Zoneless and free-form values depend
 * on the host time zone and are rejected.
 */
export const PublishedTimeSchema = z.union([z.string().datetime({ offset: true }), z.string().date()]);

/**
 * Article row, one per normalized URL
 */
export const ArticleRecordSchema = z
  .object({
    url: z.string().url(),
    section: z.string().min(1).default(UNKNOWN_SECTION),
    headline: z.string(),
    headline_word_count: z.number().int().nonnegative(),
    publish_date: z.string().datetime({ offset: true }).nullable(),
    body_text: z.string(),
    word_count: z.number().int().nonnegative(),
    link_count: z.number().int().nonnegative(),
    internal_link_count: z.number().int().nonnegative(),
    external_link_count: z.number().int().nonnegative(),
    image_count: z.number().int().nonnegative(),
    images: z.array(ImageDescriptorSchema),
    ad_count_estimate: z.number().int().nonnegative().nullable(),
    date_scraped: z.string().datetime({ offset: true }),
  })
  .refine((r) => r.internal_link_count + r.external_link_count === r.link_count, {
    message: 'internal_link_count + external_link_count must equal link_count',
    path: ['link_count'],
  })
  .refine((r) => r.images.length === r.image_count, {
    message: 'image_count must equal the number of images',
    path: ['image_count'],
  });

export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;

/**
 * Link classification fields re-derived by backfill
 */
export const LinkFieldsSchema = z.object({
  link_count: z.number().int().nonnegative(),
  internal_link_count: z.number().int().nonnegative(),
  external_link_count: z.number().int().nonnegative(),
});

export type LinkFields = z.infer<typeof LinkFieldsSchema>;

/**
 * (id, url) pair of an already stored article
 */
export const StoredArticleRefSchema = z.object({
  id: z.number().int(),
  url: z.string(),
});

export type StoredArticleRef = z.infer<typeof StoredArticleRefSchema>;

const RegexSourceSchema = z.string().refine(
  (pattern) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'articlePattern must be a valid regular expression' }
);

/**
 * Pagination strategy of a source's listing pages
 */
export const PaginationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('single') }),
  z.object({
    kind: z.literal('paged'),
    /** `{listing}` is replaced by the listing URL and `{page}` by the page number */
    pageTemplate: z.string().includes('{page}'),
    firstPage: z.number().int().positive().default(1),
    lastPage: z.number().int().positive(),
  }),
]);

export type Pagination = z.infer<typeof PaginationSchema>;

/**
 * Site-specific scraping profile. Sources are data, not code paths.
 */
export const SourceProfileSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/),
  name: z.string(),
  collection: z.string().min(1),
  fetchStrategy: z.enum(['fetch', 'crawlee']).default('fetch'),
  listings: z.record(z.string().url(), z.string().min(1).nullable()),
  discovery: z.object({
    anchorSelector: z.string().default('a[href]'),
    articlePattern: RegexSourceSchema,
  }),
  pagination: PaginationSchema.default({ kind: 'single' }),
  content: z.object({
    headlineSelector: z.string().default('h1.entry-title'),
    bodySelector: z.string(),
    paragraphSelector: z.string().default('p'),
    dateMetaField: z.string().default('article:published_time'),
  }),
  adEstimate: z
    .object({
      mode: z.enum(['none', 'markup', 'render']).default('none'),
      selectors: z.array(z.string()).default([]),
    })
    .default({ mode: 'none', selectors: [] }),
});

export type SourceProfile = z.infer<typeof SourceProfileSchema>;
export type SourceProfileInput = z.input<typeof SourceProfileSchema>;

export const SourceProfileListSchema = z.array(SourceProfileSchema).superRefine((profiles, ctx) => {
  const seen = new Set<string>();
  profiles.forEach((profile, index) => {
    if (seen.has(profile.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate source id: ${profile.id}`,
        path: [index, 'id'],
      });
    }
    seen.add(profile.id);
  });
});
