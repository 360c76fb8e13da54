import { describe, it, expect } from 'vitest';
import { createArticle } from '../src/article.js';
import {
  ensureTitleHeading,
  formatContent,
  markdownToHtml,
  stripTitleHeading,
} from '../src/content-formatter.js';
import { ContentTooLargeError } from '../src/errors.js';
import { DEFAULT_FORMAT_OPTIONS, type Article, type ArticleDraft } from '../src/types.js';

function buildArticle(draft: Partial<ArticleDraft> = {}): Article {
  const result = createArticle({ title: 'Hello World', body: 'Some text.\n', ...draft });
  if (!result.success) throw result.error;
  return result.data;
}

const markdown = DEFAULT_FORMAT_OPTIONS;
const html = { ...DEFAULT_FORMAT_OPTIONS, contentFormat: 'html' as const };

describe('ensureTitleHeading', () => {
  it('should prepend the title when the body has no heading', () => {
    expect(ensureTitleHeading('Hello World', 'Intro paragraph.\n')).toBe('# Hello World\n\nIntro paragraph.\n');
  });

  it('should drop leading blank lines before prepending', () => {
    expect(ensureTitleHeading('Hello World', '\n\nIntro\n')).toBe('# Hello World\n\nIntro\n');
  });

  it('should keep a body that already opens with the title', () => {
    expect(ensureTitleHeading('Hello World', '# hello   world\n\nText')).toBe('# hello   world\n\nText');
  });

  it('should prepend when the opening H1 is a different heading', () => {
    expect(ensureTitleHeading('Hello World', '# Setup\n\nText')).toBe('# Hello World\n\n# Setup\n\nText');
  });
});

describe('stripTitleHeading', () => {
  it('should remove a leading H1 that repeats the title', () => {
    expect(stripTitleHeading('Hello World', '# Hello World\n\nText\n')).toBe('Text\n');
  });

  it('should keep unrelated headings', () => {
    expect(stripTitleHeading('Hello World', '# Setup\n\nText\n')).toBe('# Setup\n\nText\n');
  });
});

describe('markdownToHtml', () => {
  it('should render links with web, mail and relative targets', () => {
    expect(markdownToHtml('[site](https://example.com) [mail](mailto:jane@example.com) [doc](./a.md)\n')).toBe(
      '<p><a href="https://example.com">site</a> <a href="mailto:jane@example.com">mail</a> <a href="./a.md">doc</a></p>\n'
    );
  });

  it('should drop script and data link targets but keep the link text', () => {
    expect(markdownToHtml('[x](javascript:alert(1)) and [y](JavaScript:void(0)) [z](data:text/html,hi)\n')).toBe(
      '<p>x and y z</p>\n'
    );
  });

  it('should render GitHub-flavored markdown', () => {
    expect(markdownToHtml('# Hello World\n\nSome text.\n')).toBe('<h1>Hello World</h1>\n<p>Some text.</p>\n');
  });

  it('should escape raw HTML instead of passing it through', () => {
    const output = markdownToHtml('<script>alert(1)</script>\n\nInline <script>alert(2)</script> here.\n');

    expect(output).not.toContain('<script');
    expect(output).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
  });
});

describe('formatContent', () => {
  it('should inject the title into Medium markdown', () => {
    const result = formatContent(buildArticle(), 'medium', markdown);

    expect(result).toEqual({
      success: true,
      data: {
        platform: 'medium',
        title: 'Hello World',
        content: '# Hello World\n\nSome text.\n',
        contentFormat: 'markdown',
        byteLength: 26,
        tags: [],
        warnings: [],
      },
    });
  });

  it('should render Medium html when requested', () => {
    const result = formatContent(buildArticle(), 'medium', html);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.contentFormat).toBe('html');
    expect(result.data.content).toBe('<h1>Hello World</h1>\n<p>Some text.</p>\n');
  });

  it('should strip a repeated title heading for dev.to', () => {
    const result = formatContent(buildArticle({ body: '# Hello World\n\nSome text.\n' }), 'devto', markdown);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.content).toBe('Some text.\n');
  });

  it('should fall back to markdown for dev.to with a warning', () => {
    const result = formatContent(buildArticle(), 'devto', html);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.contentFormat).toBe('markdown');
    expect(result.data.content).toBe('Some text.\n');
    expect(result.data.warnings).toEqual(['dev.to only accepts markdown; sending markdown instead of html']);
  });

  it('should carry tag truncation warnings', () => {
    const article = buildArticle({ tags: ['a', 'b', 'c', 'd', 'e', 'f', 'g'] });
    const result = formatContent(article, 'devto', markdown);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.tags).toEqual(['a', 'b', 'c', 'd']);
    expect(result.data.warnings).toEqual([
      'dev.to only supports 4 tags. Truncating from 7 to 4 tags (included: a, b, c, d; excluded: e, f, g)',
    ]);
  });

  it('should warn about relative image paths', () => {
    const result = formatContent(buildArticle({ body: 'See ![diagram](./diagram.png)\n' }), 'medium', markdown);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.warnings).toEqual(['Medium cannot resolve relative image paths: ./diagram.png']);
  });

  it('should remove liquid tags for Medium only', () => {
    const article = buildArticle({ body: 'Before\n{% embed https://example.com %}\nAfter\n' });

    const medium = formatContent(article, 'medium', markdown);
    const devto = formatContent(article, 'devto', markdown);

    expect(medium.success && medium.data.content).toBe('# Hello World\n\nBefore\n\nAfter\n');
    expect(devto.success && devto.data.content).toBe('Before\n{% embed https://example.com %}\nAfter\n');
  });

  it('should clean AI artifacts when asked', () => {
    const article = buildArticle({ body: 'It’s done — ship it 🚀\n' });
    const result = formatContent(article, 'devto', { ...markdown, cleanAi: true });

    expect(result.success && result.data.content).toBe("It's done -- ship it \n");
  });

  it('should reject Medium content above one mebibyte', () => {
    const body = '# T\n\n' + 'a'.repeat(1048577 - 5);
    const result = formatContent(buildArticle({ title: 'T', body }), 'medium', markdown);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ContentTooLargeError);
    expect(result.error).toMatchObject({ actualBytes: 1048577, limitBytes: 1048576, platform: 'medium' });
  });

  it('should accept Medium content of exactly one mebibyte', () => {
    const body = '# T\n\n' + 'a'.repeat(1048576 - 5);
    const result = formatContent(buildArticle({ title: 'T', body }), 'medium', markdown);

    expect(result.success && result.data.byteLength).toBe(1048576);
  });

  it('should count bytes rather than characters', () => {
    const body = '日'.repeat(4);
    const result = formatContent(buildArticle({ body }), 'devto', { ...markdown, sizeLimitBytes: 11 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toMatchObject({ actualBytes: 12, limitBytes: 11, platform: 'devto' });
  });
});
