import { describe, it, expect } from 'vitest';
import { MetadataSyntaxError, MissingTitleError, TitleConsistencyError } from '@cross-poster/shared';
import { parseArticle, resolveTitle } from '../src/markdown-parser.js';

describe('parseArticle', () => {
  it('should parse recognized front-matter keys', () => {
    const raw = [
      '---',
      'title: Hello World',
      'tags: [typescript, node]',
      'canonical_url: https://example.com/hello',
      'published: false',
      'cover_image: https://images.example.com/cover.png',
      'description: A short summary',
      'series: ignored',
      '---',
      '',
      'Body text',
      '',
    ].join('\n');

    expect(parseArticle(raw)).toEqual({
      success: true,
      data: {
        title: 'Hello World',
        body: '\nBody text\n',
        tags: ['typescript', 'node'],
        canonicalUrl: 'https://example.com/hello',
        published: false,
        coverImage: 'https://images.example.com/cover.png',
        description: 'A short summary',
      },
    });
  });

  it('should accept comma-separated tags', () => {
    const result = parseArticle('---\ntitle: T\ntags: typescript, node , web-dev\n---\nBody');

    expect(result.success && result.data.tags).toEqual(['typescript', 'node', 'web-dev']);
  });

  it('should treat null values as absent', () => {
    const result = parseArticle('---\ntitle: T\ncanonical_url:\npublished:\n---\nBody');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.canonicalUrl).toBeUndefined();
    expect(result.data.published).toBe(true);
  });

  it('should infer the title from the first H1 when front-matter is absent', () => {
    const raw = '# Inferred Title\n\nSome text\n';

    expect(parseArticle(raw)).toEqual({
      success: true,
      data: { title: 'Inferred Title', body: raw, tags: [], published: true },
    });
  });

  it('should use the H1 when the front-matter title is blank', () => {
    const result = parseArticle('---\ntitle: "  "\n---\n# From Heading\n');

    expect(result.success && result.data.title).toBe('From Heading');
  });

  it('should keep the front-matter title when the H1 matches loosely', () => {
    const result = parseArticle('---\ntitle: Hello World\n---\n# hello   WORLD\n\nText');

    expect(result.success && result.data.title).toBe('Hello World');
  });

  it('should reject a title that disagrees with the H1', () => {
    const result = parseArticle('---\ntitle: Hello World\n---\n# Something Else\n');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(TitleConsistencyError);
    expect(result.error.message).toBe(
      "Title mismatch: frontmatter has 'Hello World' but content has '# Something Else'. " +
        'Update the title in one place only'
    );
  });

  it('should ignore headings inside code fences', () => {
    const result = parseArticle('---\ntitle: Real\n---\n```md\n# Not The Title\n```\n');

    expect(result.success && result.data.title).toBe('Real');
  });

  it('should fail when there is no title anywhere', () => {
    const result = parseArticle('---\ntags: [a]\n---\nNo heading here\n');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(MissingTitleError);
  });

  it('should report unquoted colons as a syntax error', () => {
    const result = parseArticle('---\ntitle: Testing: A Guide\n---\nBody\n');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(MetadataSyntaxError);
    expect(result.error.message.startsWith('Invalid front-matter: ')).toBe(true);
    expect(result.error.message.endsWith("Values containing ': ' must be quoted")).toBe(true);
  });

  it('should report recognized keys with the wrong type', () => {
    const result = parseArticle('---\ntitle: T\npublished: "yes"\n---\nBody\n');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      "Invalid front-matter: published: Expected boolean, received string. Values containing ': ' must be quoted"
    );
  });

  it('should read numeric titles as text', () => {
    const result = parseArticle('---\ntitle: 2024\n---\nBody\n');

    expect(result.success && result.data.title).toBe('2024');
  });
});

describe('resolveTitle', () => {
  it('should prefer the declared title when there is no heading', () => {
    expect(resolveTitle('Declared', 'Body')).toEqual({ success: true, data: 'Declared' });
  });

  it('should fall back to the heading', () => {
    expect(resolveTitle(undefined, 'Intro\n\n# Later Heading\n')).toEqual({
      success: true,
      data: 'Later Heading',
    });
  });
});
