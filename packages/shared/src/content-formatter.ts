import { Marked } from 'marked';
import { encode } from 'html-entities';
import {
  PLATFORM_LABELS,
  PLATFORM_SIZE_LIMITS,
  type Article,
  type FormatOptions,
  type FormattedContent,
  type Platform,
} from './types.js';
import { ContentTooLargeError } from './errors.js';
import { fail, ok, type Result } from './result.js';
import { cleanAiArtifacts } from './artifact-cleaner.js';
import { findRelativeImages, removeLiquidTags, sanitizeTags } from './sanitizer.js';
import { findLeadingH1, titlesMatch } from './headings.js';

const URL_SCHEME = /^([a-z][a-z0-9+.-]*):/i;
const ALLOWED_LINK_SCHEMES = new Set(['http', 'https', 'mailto']);

/** Relative links have no scheme; absolute ones must use an allowed scheme */
function isAllowedHref(href: string): boolean {
  const scheme = URL_SCHEME.exec(href.replace(/[\u0000-\u0020]/g, ''));
  return scheme === null || ALLOWED_LINK_SCHEMES.has(scheme[1].toLowerCase());
}

/**
 * Markdown renderer with raw HTML passthrough disabled: any HTML written in
 * the source document is emitted as escaped text. Links with other schemes
 * (javascript:, data:) render as their plain text.
 */
const renderer = new Marked({
  gfm: true,
  renderer: {
    html({ text }) {
      return encode(text);
    },
    link({ href, tokens }) {
      if (isAllowedHref(href)) return false;
      return this.parser.parseInline(tokens);
    },
  },
});

export function markdownToHtml(markdown: string): string {
  return renderer.parse(markdown, { async: false });
}

/**
 * Prepend `# title` unless the body already opens with a matching H1
 */
export function ensureTitleHeading(title: string, body: string): string {
  const leading = findLeadingH1(body);
  if (leading && titlesMatch(leading.text, title)) {
    return body;
  }
  return `# ${title}\n\n${body.replace(/^(?:[ \t]*\r?\n)+/, '')}`;
}

/**
 * Remove a leading H1 that repeats the title (plus the blank lines after it)
 */
export function stripTitleHeading(title: string, body: string): string {
  const leading = findLeadingH1(body);
  if (!leading || !titlesMatch(leading.text, title)) {
    return body;
  }
  return body.slice(leading.end).replace(/^(?:[ \t]*\r?\n)+/, '');
}

export function byteLength(content: string): number {
  return Buffer.byteLength(content, 'utf8');
}

/**
 * Convert an article into the wire content one platform expects
 */
export function formatContent(
  article: Article,
  platform: Platform,
  options: FormatOptions
): Result<FormattedContent> {
  const warnings: string[] = [];
  let body = options.cleanAi ? cleanAiArtifacts(article.body) : article.body;

  const { tags, warnings: tagWarnings } = sanitizeTags(article.tags, platform);
  warnings.push(...tagWarnings);

  const relativeImages = findRelativeImages(body);
  if (relativeImages.length > 0) {
    warnings.push(
      `${PLATFORM_LABELS[platform]} cannot resolve relative image paths: ${relativeImages.join(', ')}`
    );
  }

  let content: string;
  let contentFormat = options.contentFormat;

  switch (platform) {
    case 'devto': {
      content = stripTitleHeading(article.title, body);
      if (contentFormat === 'html') {
        warnings.push('dev.to only accepts markdown; sending markdown instead of html');
        contentFormat = 'markdown';
      }
      break;
    }
    case 'medium': {
      body = removeLiquidTags(body);
      const withTitle = ensureTitleHeading(article.title, body);
      content = contentFormat === 'html' ? markdownToHtml(withTitle) : withTitle;
      break;
    }
  }

  const size = byteLength(content);
  const limit = options.sizeLimitBytes ?? PLATFORM_SIZE_LIMITS[platform];
  if (limit !== undefined && size > limit) {
    return fail(new ContentTooLargeError(size, limit, platform));
  }

  return ok({
    platform,
    title: article.title,
    content,
    contentFormat,
    byteLength: size,
    tags,
    warnings,
  });
}
