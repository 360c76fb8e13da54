import type { z } from 'zod';
import type {
  Article,
  FormatOptions,
  ListFilter,
  ListResult,
  Platform,
  PlatformCapabilities,
  PreparedPost,
  PublishedPost,
} from './types.js';
import { CrossPosterError, PlatformApiError, toErrorMessage, type RequestContext } from './errors.js';
import { fail, ok, type Result } from './result.js';

/**
 * Uniform contract every publishing destination implements
 */
export interface PlatformClient {
  readonly platform: Platform;
  readonly capabilities: PlatformCapabilities;

  /** Format the article and build the exact request payload without sending it */
  prepare(article: Article, options: FormatOptions): Result<PreparedPost>;
  publish(article: Article, options: FormatOptions): Promise<Result<PublishedPost>>;
  list(filter: ListFilter): Promise<Result<ListResult>>;
  fetch(id: string): Promise<Result<Article>>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PlatformClientOptions {
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  /** Attached to errors raised by a publish request */
  context?: RequestContext;
}

export abstract class BasePlatformClient<TPayload = unknown> implements PlatformClient {
  abstract readonly platform: Platform;
  abstract readonly capabilities: PlatformCapabilities;

  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: PlatformClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  abstract prepare(article: Article, options: FormatOptions): Result<PreparedPost<TPayload>>;
  abstract list(filter: ListFilter): Promise<Result<ListResult>>;
  abstract fetch(id: string): Promise<Result<Article>>;

  /** Send a prepared post and return its URL */
  protected abstract dispatch(prepared: PreparedPost<TPayload>): Promise<PublishedPost>;

  async publish(article: Article, options: FormatOptions): Promise<Result<PublishedPost>> {
    const prepared = this.prepare(article, options);
    if (!prepared.success) return prepared;

    return this.capture(() => this.dispatch(prepared.data));
  }

  /**
   * Run an operation and convert anything it throws into a failed result
   */
  protected async capture<T>(operation: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await operation());
    } catch (error) {
      if (error instanceof CrossPosterError) {
        return fail(error);
      }
      return fail(new PlatformApiError(this.platform, null, toErrorMessage(error), undefined, { cause: error }));
    }
  }

  protected async requestText(url: string, options: RequestOptions = {}): Promise<{ status: number; text: string }> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: options.method ?? 'GET',
        headers: options.headers,
        body: options.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `request timed out after ${this.timeoutMs}ms`
          : toErrorMessage(error);
      throw new PlatformApiError(this.platform, null, reason, options.context, { cause: error });
    }

    const text = await response.text();
    if (!response.ok) {
      throw new PlatformApiError(this.platform, response.status, text, options.context);
    }

    return { status: response.status, text };
  }

  /**
   * Issue a request and validate the JSON response against a schema
   */
  protected async requestJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const { status, text } = await this.requestText(url, {
      ...options,
      headers: { 'Content-Type': 'application/json', ...options.headers },
    });

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new PlatformApiError(this.platform, status, `invalid JSON response: ${text.slice(0, 200)}`, options.context, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new PlatformApiError(
        this.platform,
        status,
        `unexpected response shape: ${parsed.error.message}`,
        options.context,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }
}
