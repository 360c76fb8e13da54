import { readFileSync } from 'fs';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MediumClient, MEDIUM_LIST_NOTICE } from '../src/medium-client.js';
import { createArticle } from '../src/article.js';
import { CapabilityNotSupportedError, PlatformApiError } from '../src/errors.js';
import type { FetchLike } from '../src/platform-client.js';
import { DEFAULT_FORMAT_OPTIONS, type Article, type ArticleDraft } from '../src/types.js';

const feed = readFileSync(new URL('./fixtures/medium-feed.xml', import.meta.url), 'utf-8');

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const identity = { data: { id: 'user-1', username: 'janeexample', name: 'Jane Example' } };

function buildArticle(draft: Partial<ArticleDraft> = {}): Article {
  const result = createArticle({ title: 'Hello World', body: 'Body text\n', tags: ['typescript'], ...draft });
  if (!result.success) throw result.error;
  return result.data;
}

describe('MediumClient', () => {
  const fetchMock = vi.fn<FetchLike>();
  let client: MediumClient;

  beforeEach(() => {
    fetchMock.mockReset();
    client = new MediumClient({ accessToken: 'test-secret' }, { fetch: fetchMock });
  });

  describe('publish', () => {
    it('should resolve the user and create a post', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(identity))
        .mockResolvedValueOnce(
          jsonResponse({ data: { id: 'post-1', url: 'https://medium.com/@janeexample/hello-world-1' } }, 201)
        );

      const result = await client.publish(buildArticle(), DEFAULT_FORMAT_OPTIONS);

      expect(result).toEqual({
        success: true,
        data: {
          platform: 'medium',
          url: 'https://medium.com/@janeexample/hello-world-1',
          id: 'post-1',
          warnings: [],
        },
      });

      expect(fetchMock.mock.calls[0][0]).toBe('https://api.medium.com/v1/me');
      const [url, init] = fetchMock.mock.calls[1];
      expect(url).toBe('https://api.medium.com/v1/users/user-1/posts');
      expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
      expect(JSON.parse(String(init?.body))).toEqual({
        title: 'Hello World',
        contentFormat: 'markdown',
        content: '# Hello World\n\nBody text\n',
        tags: ['typescript'],
        publishStatus: 'public',
      });
    });

    it('should publish unpublished articles as drafts', () => {
      const prepared = client.prepare(buildArticle({ published: false }), DEFAULT_FORMAT_OPTIONS);

      expect(prepared.success && prepared.data.payload.publishStatus).toBe('draft');
    });

    it('should look up the user only once per client', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(identity))
        .mockResolvedValueOnce(jsonResponse({ data: { id: 'p1', url: 'https://medium.com/p/1' } }, 201))
        .mockResolvedValueOnce(jsonResponse({ data: { id: 'p2', url: 'https://medium.com/p/2' } }, 201));

      await client.publish(buildArticle(), DEFAULT_FORMAT_OPTIONS);
      await client.publish(buildArticle(), DEFAULT_FORMAT_OPTIONS);

      const urls = fetchMock.mock.calls.map(([url]) => url);
      expect(urls).toEqual([
        'https://api.medium.com/v1/me',
        'https://api.medium.com/v1/users/user-1/posts',
        'https://api.medium.com/v1/users/user-1/posts',
      ]);
    });

    it('should report an invalid token with the article details', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('{"errors":[{"message":"Token was invalid.","code":6003}]}', { status: 401 })
      );

      const result = await client.publish(buildArticle(), DEFAULT_FORMAT_OPTIONS);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(PlatformApiError);
      expect(result.error.message).toBe(
        'Medium API error (status 401): Invalid credentials - check your API key or access token\n\n' +
          'Server Response:\n{"errors":[{"message":"Token was invalid.","code":6003}]}\n\n' +
          'Article Details:\n' +
          "  Title: 'Hello World'\n" +
          '  Tags: 1 (typescript)\n' +
          '  Content length: 25 chars\n' +
          '  Format: markdown\n' +
          '  Published: true'
      );
      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual(['https://api.medium.com/v1/me']);
    });

    it('should not call the API when the content is too large', async () => {
      const result = await client.publish(
        buildArticle(),
        { ...DEFAULT_FORMAT_OPTIONS, sizeLimitBytes: 10 }
      );

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('CONTENT_TOO_LARGE');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('list', () => {
    it('should read the public feed of the authenticated user', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(identity)).mockResolvedValueOnce(new Response(feed));

      const result = await client.list({ state: 'published', page: 1, perPage: 1 });

      expect(fetchMock.mock.calls[1][0]).toBe('https://medium.com/feed/@janeexample');
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.notices).toEqual([MEDIUM_LIST_NOTICE]);
      expect(result.data.articles.map(article => article.id)).toEqual(['abc123def456']);
      expect(result.data.articles[0].contentFormat).toBe('html');
    });

    it('should refuse to list unpublished posts', async () => {
      const result = await client.list({ state: 'unpublished', page: 1, perPage: 30 });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(CapabilityNotSupportedError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should return an empty page beyond the first', async () => {
      const result = await client.list({ state: 'published', page: 2, perPage: 30 });

      expect(result).toEqual({
        success: true,
        data: {
          articles: [],
          notices: [MEDIUM_LIST_NOTICE, 'Page 2 requested, but the feed has a single page'],
        },
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should report a feed that cannot be parsed', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(identity)).mockResolvedValueOnce(new Response('<html></html>'));

      const result = await client.list({ state: 'all', page: 1, perPage: 30 });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toContain('unreadable RSS feed: Invalid RSS feed: missing rss/channel element');
    });
  });

  describe('fetch', () => {
    it('should report that fetching is unsupported', async () => {
      const result = await client.fetch('abc123');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe(
        'Medium does not support fetching articles. Medium provides no article fetch API; use dev.to as the source instead'
      );
    });
  });
});
