import {
  CapabilityNotSupportedError,
  PLATFORM_LABELS,
  PlatformApiError,
  fail,
  formatContent,
  toErrorMessage,
  withOverrides,
  type Article,
  type ArticleOverrides,
  type ArticleSummary,
  type CrossPosterError,
  type FormatOptions,
  type FormattedContent,
  type ListFilter,
  type ListResult,
  type Platform,
  type PlatformClient,
  type PreparedPost,
  type Result,
} from '@cross-poster/shared';
import { importFromDevTo, isRemoteSource } from './file-loader.js';
import { parseArticleFile } from './markdown-parser.js';
import { Logger } from './utils/logger.js';

/**
 * Builds (or refuses to build) the client for a platform
 */
export type ClientProvider = (platform: Platform) => Result<PlatformClient>;

export interface CrossPosterOptions {
  clients: ClientProvider;
  logger?: Logger;
}

export interface PostOptions extends FormatOptions {
  /** Stop after preparing the request payloads */
  dryRun?: boolean;
}

export type PlatformOutcome =
  | { platform: Platform; status: 'published'; url: string; id?: string; warnings: string[] }
  | { platform: Platform; status: 'prepared'; prepared: PreparedPost; warnings: string[] }
  | { platform: Platform; status: 'failed'; error: CrossPosterError; warnings: string[] };

export interface PostReport {
  title: string;
  outcomes: PlatformOutcome[];
  succeeded: number;
  failed: number;
}

export interface PreviewEntry {
  platform: Platform;
  result: Result<FormattedContent>;
}

export interface ValidationEntry {
  path: string;
  title?: string;
  valid: boolean;
  errors: CrossPosterError[];
  warnings: string[];
}

export interface ValidationReport {
  entries: ValidationEntry[];
  valid: number;
  invalid: number;
}

/**
 * Collapse repeated targets while keeping the order they were given in
 */
export function uniquePlatforms(targets: readonly Platform[]): Platform[] {
  return [...new Set(targets)];
}

/**
 * Main cross-poster class - orchestrates loading, formatting and publishing
 * an article across platforms
 */
export class CrossPoster {
  private readonly clients: ClientProvider;
  private readonly logger: Logger;

  constructor(options: CrossPosterOptions) {
    this.clients = options.clients;
    this.logger = options.logger ?? new Logger();
  }

  /**
   * Load an article from a local file or a dev.to URL, then apply overrides
   */
  async loadArticle(input: string, overrides: ArticleOverrides = {}): Promise<Result<Article>> {
    let article: Result<Article>;
    if (isRemoteSource(input)) {
      const client = this.clients('devto');
      if (!client.success) return client;
      this.logger.info(`Importing article from ${input}`);
      article = await importFromDevTo(input, client.data);
    } else {
      article = await parseArticleFile(input);
    }

    if (!article.success) return article;
    if (overrides.tags === undefined && overrides.canonicalUrl === undefined && overrides.body === undefined) {
      return article;
    }
    return withOverrides(article.data, overrides);
  }

  /**
   * Format the article for each target without contacting any platform
   */
  preview(article: Article, targets: readonly Platform[], options: FormatOptions): PreviewEntry[] {
    return uniquePlatforms(targets).map(platform => ({
      platform,
      result: formatContent(article, platform, options),
    }));
  }

  /**
   * Publish to every target concurrently. One failing target never stops another.
   */
  async post(article: Article, targets: readonly Platform[], options: PostOptions): Promise<PostReport> {
    const platforms = uniquePlatforms(targets);
    const labels = platforms.map(platform => PLATFORM_LABELS[platform]).join(', ');
    this.logger.info(
      options.dryRun
        ? `Dry run: preparing "${article.title}" for ${labels}`
        : `Publishing "${article.title}" to ${labels}`
    );

    const settled = await Promise.allSettled(
      platforms.map(platform => this.postTo(article, platform, options))
    );

    const outcomes = settled.map((result, index): PlatformOutcome => {
      if (result.status === 'fulfilled') return result.value;
      const platform = platforms[index];
      return {
        platform,
        status: 'failed',
        error: new PlatformApiError(platform, null, toErrorMessage(result.reason), undefined, {
          cause: result.reason,
        }),
        warnings: [],
      };
    });

    for (const outcome of outcomes) this.report(outcome);

    const failed = outcomes.filter(outcome => outcome.status === 'failed').length;
    return {
      title: article.title,
      outcomes,
      succeeded: outcomes.length - failed,
      failed,
    };
  }

  private async postTo(article: Article, platform: Platform, options: PostOptions): Promise<PlatformOutcome> {
    const client = this.clients(platform);
    if (!client.success) {
      return { platform, status: 'failed', error: client.error, warnings: [] };
    }

    if (options.dryRun) {
      const prepared = client.data.prepare(article, options);
      return prepared.success
        ? { platform, status: 'prepared', prepared: prepared.data, warnings: prepared.data.formatted.warnings }
        : { platform, status: 'failed', error: prepared.error, warnings: [] };
    }

    const published = await client.data.publish(article, options);
    if (!published.success) {
      return { platform, status: 'failed', error: published.error, warnings: [] };
    }
    const { url, id, warnings } = published.data;
    return { platform, status: 'published', url, id, warnings };
  }

  private report(outcome: PlatformOutcome): void {
    const label = PLATFORM_LABELS[outcome.platform];
    for (const warning of outcome.warnings) {
      this.logger.warn(warning, { platform: outcome.platform });
    }

    switch (outcome.status) {
      case 'published':
        this.logger.success(`Published to ${label}: ${outcome.url}`);
        break;
      case 'prepared':
        this.logger.success(
          `Prepared ${label} request (${outcome.prepared.formatted.byteLength} bytes, not sent)`
        );
        break;
      case 'failed':
        this.logger.error(`${label} failed: ${outcome.error.message}`, {
          code: outcome.error.code,
        });
        break;
    }
  }

  /**
   * List the authenticated user's articles on one platform
   */
  async list(platform: Platform, filter: ListFilter): Promise<Result<ListResult>> {
    const client = this.clients(platform);
    if (!client.success) return client;

    const result = await client.data.list(filter);
    if (result.success) {
      for (const notice of result.data.notices) this.logger.warn(notice);
    }
    return result;
  }

  /**
   * Fetch one article by platform-specific identifier
   */
  async fetch(platform: Platform, id: string): Promise<Result<Article>> {
    const client = this.clients(platform);
    if (!client.success) return client;
    if (!client.data.capabilities.fetch) {
      return fail(new CapabilityNotSupportedError(platform, 'fetching articles'));
    }
    return client.data.fetch(id);
  }

  /**
   * Parse and format each file for each target without any network access
   */
  async validate(
    paths: readonly string[],
    targets: readonly Platform[],
    options: FormatOptions
  ): Promise<ValidationReport> {
    const entries: ValidationEntry[] = [];

    for (const filePath of paths) {
      const article = await parseArticleFile(filePath);
      if (!article.success) {
        entries.push({ path: filePath, valid: false, errors: [article.error], warnings: [] });
        this.logger.error(`${filePath}: ${article.error.message}`);
        continue;
      }

      const errors: CrossPosterError[] = [];
      const warnings: string[] = [];
      for (const { result } of this.preview(article.data, targets, options)) {
        if (result.success) warnings.push(...result.data.warnings);
        else errors.push(result.error);
      }

      entries.push({
        path: filePath,
        title: article.data.title,
        valid: errors.length === 0,
        errors,
        warnings,
      });
    }

    const valid = entries.filter(entry => entry.valid).length;
    return { entries, valid, invalid: entries.length - valid };
  }
}

/**
 * One line per listed article, used by the CLI's human output
 */
export function formatSummary(summary: ArticleSummary): string {
  const date = summary.publishedAt ? summary.publishedAt.toISOString().slice(0, 10) : 'draft';
  const tags = summary.tags.length > 0 ? ` [${summary.tags.join(', ')}]` : '';
  return `${date}  ${summary.title}${tags}\n    ${summary.url} (id: ${summary.id})`;
}
