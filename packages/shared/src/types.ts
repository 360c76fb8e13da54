import { z } from 'zod';

/**
 * Supported publishing destinations
 */
export const PLATFORMS = ['devto', 'medium'] as const;

export type Platform = (typeof PLATFORMS)[number];

export const PlatformSchema = z.enum(PLATFORMS);

/**
 * Human-readable platform names used in messages
 */
export const PLATFORM_LABELS: Record<Platform, string> = {
  devto: 'dev.to',
  medium: 'Medium',
};

/**
 * Maximum tag count each platform accepts
 */
export const PLATFORM_TAG_LIMITS: Record<Platform, number> = {
  devto: 4,
  medium: 5,
};

/** Medium rejects post bodies above roughly one mebibyte */
export const MEDIUM_MAX_CONTENT_BYTES = 1024 * 1024;

/**
 * Default content size ceilings in bytes (undefined = no ceiling)
 */
export const PLATFORM_SIZE_LIMITS: Record<Platform, number | undefined> = {
  devto: undefined,
  medium: MEDIUM_MAX_CONTENT_BYTES,
};

/**
 * Canonical article schema. Validates the scratch record produced while parsing.
 */
export const ArticleSchema = z.object({
  title: z
    .string()
    .transform(title => title.trim())
    .pipe(z.string().min(1, 'Title is required')),
  tags: z.array(z.string()).default([]),
  canonicalUrl: z.string().url('Canonical URL must be a valid URL').optional(),
  published: z.boolean().default(true),
  coverImage: z.string().url('Cover image must be a valid URL').optional(),
  description: z.string().optional(),
  body: z.string(),
});

/**
 * Mutable scratch record used while an article is being assembled
 */
export type ArticleDraft = z.input<typeof ArticleSchema>;

/**
 * Canonical in-memory representation of one post. Frozen once constructed.
 */
export type Article = Readonly<Omit<z.output<typeof ArticleSchema>, 'tags'>> & {
  readonly tags: readonly string[];
};

/**
 * Lightweight listing record built from remote API responses
 */
export interface ArticleSummary {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  readonly publishedAt?: Date;
  readonly tags: readonly string[];
  /** Body as returned by the listing source, when it returns one */
  readonly content?: string;
  readonly contentFormat?: ContentFormat;
}

/**
 * Per-platform secret bundle supplied by the config layer
 */
export type PlatformCredentials =
  | { platform: 'devto'; apiKey: string }
  | { platform: 'medium'; accessToken: string };

export const CONTENT_FORMATS = ['markdown', 'html'] as const;

export type ContentFormat = (typeof CONTENT_FORMATS)[number];

export const ContentFormatSchema = z.enum(CONTENT_FORMATS);

/**
 * Options controlling how an article is formatted for a platform
 */
export interface FormatOptions {
  contentFormat: ContentFormat;
  /** Remove AI-generated typographic artifacts from the body */
  cleanAi: boolean;
  /** Overrides the platform's default size ceiling */
  sizeLimitBytes?: number;
}

export const DEFAULT_FORMAT_OPTIONS: FormatOptions = {
  contentFormat: 'markdown',
  cleanAi: false,
};

/**
 * Platform-ready content produced by the formatter
 */
export interface FormattedContent {
  platform: Platform;
  title: string;
  content: string;
  contentFormat: ContentFormat;
  byteLength: number;
  tags: string[];
  warnings: string[];
}

export const ARTICLE_STATES = ['published', 'unpublished', 'all'] as const;

export type ArticleState = (typeof ARTICLE_STATES)[number];

export const ListFilterSchema = z.object({
  state: z.enum(ARTICLE_STATES).default('published'),
  page: z.number().int().min(1, 'Page must be 1 or greater').default(1),
  perPage: z
    .number()
    .int()
    .min(1, 'Per-page must be between 1 and 1000')
    .max(1000, 'Per-page must be between 1 and 1000')
    .default(30),
});

export type ListFilter = z.output<typeof ListFilterSchema>;

export interface ListResult {
  articles: ArticleSummary[];
  /** Caveats about completeness of the listing */
  notices: string[];
}

/**
 * Content formatted for a platform together with the exact request payload
 */
export interface PreparedPost<TPayload = unknown> {
  platform: Platform;
  formatted: FormattedContent;
  payload: TPayload;
}

export interface PublishedPost {
  platform: Platform;
  url: string;
  id?: string;
  warnings: string[];
}

export interface PlatformCapabilities {
  fetch: boolean;
  pagination: boolean;
  stateFilter: boolean;
  listContentFormat: ContentFormat;
  /** Upper bound on entries a single listing can return */
  maxListSize?: number;
}
