import { z } from 'zod';
import { BasePlatformClient, type PlatformClientOptions } from './platform-client.js';
import { formatContent } from './content-formatter.js';
import { parseRssFeed } from './rss-feed.js';
import { fail, ok, type Result } from './result.js';
import { CapabilityNotSupportedError, PlatformApiError, toErrorMessage, type RequestContext } from './errors.js';
import type {
  Article,
  ArticleSummary,
  ContentFormat,
  FormatOptions,
  ListFilter,
  ListResult,
  Platform,
  PlatformCapabilities,
  PreparedPost,
  PublishedPost,
} from './types.js';

export const MEDIUM_API_BASE = 'https://api.medium.com/v1';
export const MEDIUM_FEED_BASE = 'https://medium.com/feed';
/** The profile feed only ever carries the latest entries */
export const MEDIUM_FEED_LIMIT = 10;

export const MEDIUM_LIST_NOTICE =
  `Medium listing is best-effort: it reads the public RSS feed, which holds at most ` +
  `${MEDIUM_FEED_LIMIT} recent public posts, has no pagination, and returns HTML content`;

/**
 * Request body for POST /users/{userId}/posts
 */
export interface MediumPostPayload {
  title: string;
  contentFormat: ContentFormat;
  content: string;
  canonicalUrl?: string;
  tags: string[];
  publishStatus: 'public' | 'draft';
}

const UserResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    username: z.string(),
    name: z.string().optional(),
    url: z.string().optional(),
  }),
});

export type MediumIdentity = z.infer<typeof UserResponseSchema>['data'];

const PublishResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    url: z.string(),
  }),
});

export interface MediumCredentials {
  accessToken: string;
}

/**
 * Medium API client. Publishing resolves the acting user first (GET /me);
 * listing falls back to the user's public RSS feed.
 */
export class MediumClient extends BasePlatformClient<MediumPostPayload> {
  readonly platform: Platform = 'medium';
  readonly capabilities: PlatformCapabilities = {
    fetch: false,
    pagination: false,
    stateFilter: false,
    listContentFormat: 'html',
    maxListSize: MEDIUM_FEED_LIMIT,
  };

  private readonly accessToken: string;
  private identity: MediumIdentity | null = null;

  constructor(credentials: MediumCredentials, options: PlatformClientOptions = {}) {
    super(options);
    this.accessToken = credentials.accessToken;
  }

  private get headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.accessToken}`,
      Accept: 'application/json',
      'Accept-Charset': 'utf-8',
    };
  }

  /**
   * Look up the authenticated user, once per client instance
   */
  async getIdentity(context?: RequestContext): Promise<MediumIdentity> {
    if (this.identity) return this.identity;

    const response = await this.requestJson(`${MEDIUM_API_BASE}/me`, UserResponseSchema, {
      headers: this.headers,
      context,
    });

    this.identity = response.data;
    return this.identity;
  }

  prepare(article: Article, options: FormatOptions): Result<PreparedPost<MediumPostPayload>> {
    const formatted = formatContent(article, this.platform, options);
    if (!formatted.success) return formatted;

    const { content, contentFormat, tags } = formatted.data;
    const payload: MediumPostPayload = {
      title: article.title,
      contentFormat,
      content,
      canonicalUrl: article.canonicalUrl,
      tags,
      publishStatus: article.published ? 'public' : 'draft',
    };

    return ok({ platform: this.platform, formatted: formatted.data, payload });
  }

  protected async dispatch(prepared: PreparedPost<MediumPostPayload>): Promise<PublishedPost> {
    const { formatted, payload } = prepared;
    const context: RequestContext = {
      title: formatted.title,
      tagCount: formatted.tags.length,
      tags: formatted.tags,
      contentLength: formatted.content.length,
      contentFormat: formatted.contentFormat,
      published: payload.publishStatus === 'public',
    };

    const identity = await this.getIdentity(context);
    const response = await this.requestJson(
      `${MEDIUM_API_BASE}/users/${encodeURIComponent(identity.id)}/posts`,
      PublishResponseSchema,
      {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(payload),
        context,
      }
    );

    return {
      platform: this.platform,
      url: response.data.url,
      id: response.data.id,
      warnings: formatted.warnings,
    };
  }

  async list(filter: ListFilter): Promise<Result<ListResult>> {
    if (filter.state === 'unpublished') {
      return fail(
        new CapabilityNotSupportedError(
          this.platform,
          'listing unpublished posts',
          'The public RSS feed only contains published posts'
        )
      );
    }

    return this.capture(async () => {
      const notices = [MEDIUM_LIST_NOTICE];
      if (filter.page > 1) {
        notices.push(`Page ${filter.page} requested, but the feed has a single page`);
        return { articles: [], notices };
      }

      const identity = await this.getIdentity();
      const feedUrl = `${MEDIUM_FEED_BASE}/@${encodeURIComponent(identity.username)}`;
      const { status, text } = await this.requestText(feedUrl, {
        headers: { Accept: 'application/rss+xml, application/xml' },
      });

      let articles: ArticleSummary[];
      try {
        articles = parseRssFeed(text, Math.min(filter.perPage, MEDIUM_FEED_LIMIT));
      } catch (error) {
        throw new PlatformApiError(this.platform, status, `unreadable RSS feed: ${toErrorMessage(error)}`, undefined, {
          cause: error,
        });
      }

      return { articles, notices };
    });
  }

  async fetch(_id: string): Promise<Result<Article>> {
    return fail(
      new CapabilityNotSupportedError(
        this.platform,
        'fetching articles',
        'Medium provides no article fetch API; use dev.to as the source instead'
      )
    );
  }
}
