import { PLATFORM_LABELS, PLATFORM_TAG_LIMITS, type Platform } from './types.js';
import { InvalidSourceUrlError, PlaceholderCredentialError } from './errors.js';
import { fail, ok, type Result } from './result.js';
import { FenceTracker } from './headings.js';

/**
 * Strip non-alphanumerics from each tag, drop empties, and cap at the platform limit
 */
export function sanitizeTags(
  tags: readonly string[],
  platform: Platform
): { tags: string[]; warnings: string[] } {
  const cleaned = tags.map(tag => tag.replace(/[^A-Za-z0-9]/g, '')).filter(tag => tag !== '');
  const limit = PLATFORM_TAG_LIMITS[platform];

  if (cleaned.length <= limit) {
    return { tags: cleaned, warnings: [] };
  }

  const kept = cleaned.slice(0, limit);
  const dropped = cleaned.slice(limit);
  return {
    tags: kept,
    warnings: [
      `${PLATFORM_LABELS[platform]} only supports ${limit} tags. ` +
        `Truncating from ${cleaned.length} to ${limit} tags ` +
        `(included: ${kept.join(', ')}; excluded: ${dropped.join(', ')})`,
    ],
  };
}

/**
 * Values shipped in the config template, plus common stand-ins
 */
const PLACEHOLDER_VALUES = new Set([
  'your_dev_to_api_key_here',
  'your_devto_api_key_here',
  'your_medium_access_token_here',
  'changeme',
  'change_me',
  'placeholder',
  'todo',
  'api_key',
  'access_token',
]);

const PLACEHOLDER_PATTERNS = [/^your[_-].*[_-]here$/i, /^<.*>$/, /^\$\{.*\}$/, /^x{3,}$/i];

export function isPlaceholderCredential(value: string): boolean {
  const trimmed = value.trim();
  return (
    PLACEHOLDER_VALUES.has(trimmed.toLowerCase()) ||
    PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed))
  );
}

/**
 * Reject empty and template credentials before they reach a remote API
 */
export function validateCredential(
  platform: Platform,
  field: string,
  value: string | undefined
): Result<string, PlaceholderCredentialError> {
  const trimmed = value?.trim() ?? '';

  if (trimmed === '') {
    return fail(new PlaceholderCredentialError(platform, field, 'is not set'));
  }
  if (isPlaceholderCredential(trimmed)) {
    return fail(new PlaceholderCredentialError(platform, field, 'is still a template placeholder'));
  }

  return ok(trimmed);
}

const DEVTO_HOSTS = new Set(['dev.to', 'www.dev.to']);

/**
 * Extract the `<user>/<slug>` identifier from a dev.to article URL
 */
export function parseDevToUrl(url: string): Result<string, InvalidSourceUrlError> {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return fail(new InvalidSourceUrlError(url, 'not a valid URL'));
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    return fail(new InvalidSourceUrlError(url, `unsupported protocol "${parsed.protocol}"`));
  }
  if (!DEVTO_HOSTS.has(parsed.hostname.toLowerCase())) {
    return fail(new InvalidSourceUrlError(url, `host "${parsed.hostname}" is not dev.to`));
  }

  const segments = parsed.pathname.replace(/\/+$/, '').split('/').slice(1);
  if (segments.length !== 2 || segments.some(segment => segment === '')) {
    return fail(new InvalidSourceUrlError(url, 'path must have the form /<user>/<slug>'));
  }

  const [user, slug] = segments;
  return ok(`${user}/${slug}`);
}

/**
 * Remove dev.to liquid tags ({% ... %}) outside fenced code, which other platforms render literally
 */
export function removeLiquidTags(markdown: string): string {
  const fences = new FenceTracker();
  return markdown
    .split(/(?<=\n)/)
    .map(line => (fences.consume(line) ? line : line.replace(/\{%.*?%\}/g, '')))
    .join('');
}

/**
 * Markdown image targets that are not absolute http(s) URLs
 */
export function findRelativeImages(markdown: string): string[] {
  const images: string[] = [];
  const imageRegex = /!\[[^\]]*\]\(\s*<?([^)\s>]+)>?(?:\s+["'][^"']*["'])?\s*\)/g;
  let match;

  while ((match = imageRegex.exec(markdown)) !== null) {
    if (!/^https?:\/\//i.test(match[1])) {
      images.push(match[1]);
    }
  }

  return images;
}
