// Types
export * from './types.js';
export * from './errors.js';
export * from './result.js';

// Article model
export { createArticle, withOverrides, type ArticleOverrides } from './article.js';
export { findFirstH1, findLeadingH1, normalizeTitle, titlesMatch } from './headings.js';

// Content processing
export { splitFrontMatter, FrontMatterSchema, type FrontMatter, type SplitDocument } from './front-matter.js';
export { cleanAiArtifacts } from './artifact-cleaner.js';
export {
  sanitizeTags,
  validateCredential,
  isPlaceholderCredential,
  parseDevToUrl,
  removeLiquidTags,
  findRelativeImages,
} from './sanitizer.js';
export {
  formatContent,
  markdownToHtml,
  ensureTitleHeading,
  stripTitleHeading,
  byteLength,
} from './content-formatter.js';

// Platform clients
export {
  BasePlatformClient,
  DEFAULT_TIMEOUT_MS,
  type PlatformClient,
  type PlatformClientOptions,
  type FetchLike,
} from './platform-client.js';
export { DevToClient, DEVTO_API_BASE, DEVTO_ACCEPT, DEVTO_USER_AGENT, type DevToArticlePayload } from './devto-client.js';
export {
  MediumClient,
  MEDIUM_API_BASE,
  MEDIUM_FEED_BASE,
  MEDIUM_FEED_LIMIT,
  MEDIUM_LIST_NOTICE,
  type MediumPostPayload,
  type MediumIdentity,
} from './medium-client.js';
export { parseRssFeed } from './rss-feed.js';
export { createPlatformClient } from './client-factory.js';

/**
 * Mask a secret for display, keeping the last four characters of long values
 */
export function maskSecret(value: string): string {
  if (value.length <= 8) return '********';
  return `********${value.slice(-4)}`;
}
