import { z } from 'zod';
import { BasePlatformClient, type PlatformClientOptions } from './platform-client.js';
import { formatContent } from './content-formatter.js';
import { createArticle } from './article.js';
import { splitFrontMatter } from './front-matter.js';
import { fail, ok, type Result } from './result.js';
import type { RequestContext } from './errors.js';
import type {
  Article,
  ArticleState,
  ArticleSummary,
  FormatOptions,
  ListFilter,
  ListResult,
  Platform,
  PlatformCapabilities,
  PreparedPost,
  PublishedPost,
} from './types.js';

export const DEVTO_API_BASE = 'https://dev.to/api';
/** Forem rejects requests without a User-Agent (403) */
export const DEVTO_USER_AGENT = 'cross-poster/0.1.0';
/** Pins the Forem API version; unversioned requests get the deprecated v0 shape */
export const DEVTO_ACCEPT = 'application/vnd.forem.api-v1+json';

const LIST_ENDPOINTS: Record<ArticleState, string> = {
  published: '/articles/me/published',
  unpublished: '/articles/me/unpublished',
  all: '/articles/me/all',
};

/**
 * Request body for POST /articles
 */
export interface DevToArticlePayload {
  article: {
    title: string;
    body_markdown: string;
    published: boolean;
    tags: string[];
    canonical_url?: string;
    main_image?: string;
    description?: string;
  };
}

/** dev.to returns tags as an array on some endpoints and a comma-joined string on others */
const TagListSchema = z
  .union([z.array(z.string()), z.string()])
  .transform(value =>
    Array.isArray(value)
      ? value
      : value
          .split(',')
          .map(tag => tag.trim())
          .filter(Boolean)
  );

const PublishResponseSchema = z.object({
  id: z.number(),
  url: z.string(),
});

const ListedArticleSchema = z.object({
  id: z.number(),
  title: z.string(),
  url: z.string(),
  published_at: z.string().nullish(),
  tag_list: TagListSchema.optional(),
  body_markdown: z.string().nullish(),
});

const ArticleResponseSchema = z.object({
  id: z.number(),
  title: z.string(),
  body_markdown: z.string(),
  tags: TagListSchema.optional(),
  tag_list: TagListSchema.optional(),
  canonical_url: z.string().nullish(),
  cover_image: z.string().nullish(),
  description: z.string().nullish(),
  published: z.boolean().optional(),
  published_at: z.string().nullish(),
});

export interface DevToCredentials {
  apiKey: string;
}

/**
 * dev.to (Forem) API client
 */
export class DevToClient extends BasePlatformClient<DevToArticlePayload> {
  readonly platform: Platform = 'devto';
  readonly capabilities: PlatformCapabilities = {
    fetch: true,
    pagination: true,
    stateFilter: true,
    listContentFormat: 'markdown',
  };

  private readonly apiKey: string;

  constructor(credentials: DevToCredentials, options: PlatformClientOptions = {}) {
    super(options);
    this.apiKey = credentials.apiKey;
  }

  private get headers(): Record<string, string> {
    return {
      'api-key': this.apiKey,
      Accept: DEVTO_ACCEPT,
      'User-Agent': DEVTO_USER_AGENT,
    };
  }

  prepare(article: Article, options: FormatOptions): Result<PreparedPost<DevToArticlePayload>> {
    const formatted = formatContent(article, this.platform, options);
    if (!formatted.success) return formatted;

    const { content, tags } = formatted.data;
    const payload: DevToArticlePayload = {
      article: {
        title: article.title,
        body_markdown: content,
        published: article.published,
        tags,
        canonical_url: article.canonicalUrl,
        main_image: article.coverImage,
        description: article.description,
      },
    };

    return ok({ platform: this.platform, formatted: formatted.data, payload });
  }

  protected async dispatch(prepared: PreparedPost<DevToArticlePayload>): Promise<PublishedPost> {
    const { formatted } = prepared;
    const context: RequestContext = {
      title: formatted.title,
      tagCount: formatted.tags.length,
      tags: formatted.tags,
      contentLength: formatted.content.length,
      contentFormat: formatted.contentFormat,
      published: prepared.payload.article.published,
    };

    const response = await this.requestJson(`${DEVTO_API_BASE}/articles`, PublishResponseSchema, {
      method: 'POST',
      headers: this.headers,
      body: JSON.stringify(prepared.payload),
      context,
    });

    return {
      platform: this.platform,
      url: response.url,
      id: String(response.id),
      warnings: formatted.warnings,
    };
  }

  async list(filter: ListFilter): Promise<Result<ListResult>> {
    const params = new URLSearchParams({
      page: String(filter.page),
      per_page: String(filter.perPage),
    });
    const url = `${DEVTO_API_BASE}${LIST_ENDPOINTS[filter.state]}?${params.toString()}`;

    return this.capture(async () => {
      const articles = await this.requestJson(url, z.array(ListedArticleSchema), {
        headers: this.headers,
      });

      return {
        articles: articles.map(toSummary),
        notices: [],
      };
    });
  }

  async fetch(id: string): Promise<Result<Article>> {
    const path = id
      .split('/')
      .map(segment => encodeURIComponent(segment))
      .join('/');

    const response = await this.capture(() =>
      this.requestJson(`${DEVTO_API_BASE}/articles/${path}`, ArticleResponseSchema, {
        headers: this.headers,
      })
    );
    if (!response.success) return fail(response.error);

    const remote = response.data;
    // Posts written in the markdown editor keep their front-matter in body_markdown
    const document = splitFrontMatter(remote.body_markdown);
    if (!document.success) return document;
    const { meta, body } = document.data;

    const tags = remote.tags ?? remote.tag_list ?? [];
    return createArticle({
      title: remote.title,
      body,
      tags: tags.length > 0 ? tags : (meta.tags ?? []),
      canonicalUrl: remote.canonical_url ?? meta.canonical_url ?? undefined,
      coverImage: remote.cover_image ?? meta.cover_image ?? undefined,
      description: remote.description ?? meta.description ?? undefined,
      published: remote.published ?? meta.published ?? Boolean(remote.published_at),
    });
  }
}

function toSummary(article: z.infer<typeof ListedArticleSchema>): ArticleSummary {
  return {
    id: String(article.id),
    title: article.title,
    url: article.url,
    publishedAt: article.published_at ? new Date(article.published_at) : undefined,
    tags: article.tag_list ?? [],
    ...(article.body_markdown != null && {
      content: article.body_markdown,
      contentFormat: 'markdown' as const,
    }),
  };
}
