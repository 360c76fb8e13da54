import { InvalidArgumentError } from 'commander';
import matter from 'gray-matter';
import {
  PLATFORMS,
  createPlatformClient,
  type Article,
  type CrossPosterError,
  type Platform,
  type Result,
} from '@cross-poster/shared';
import type { ClientProvider, PlatformOutcome, PreviewEntry } from './cross-poster.js';
import { credentialsFor, type AppConfig } from './config.js';

export const EXIT_INPUT_ERROR = 1;
export const EXIT_REMOTE_ERROR = 2;

const PLATFORM_ALIASES: Record<string, Platform> = {
  devto: 'devto',
  'dev.to': 'devto',
  medium: 'medium',
};

/**
 * Parse a comma-separated platform list such as "devto,medium"
 */
export function parsePlatforms(value: string): Platform[] {
  const names = value
    .split(',')
    .map(name => name.trim().toLowerCase())
    .filter(Boolean);
  if (names.length === 0) {
    throw new InvalidArgumentError(`Expected one or more of: ${PLATFORMS.join(', ')}`);
  }

  return names.map(name => {
    const platform = PLATFORM_ALIASES[name];
    if (!platform) {
      throw new InvalidArgumentError(`Unknown platform "${name}". Expected one of: ${PLATFORMS.join(', ')}`);
    }
    return platform;
  });
}

export function parsePlatform(value: string): Platform {
  const [platform, ...rest] = parsePlatforms(value);
  if (rest.length > 0) {
    throw new InvalidArgumentError('Expected a single platform');
  }
  return platform;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return parsed;
}

export function parsePerPage(value: string): number {
  const parsed = parsePositiveInt(value);
  if (parsed > 1000) {
    throw new InvalidArgumentError('Expected a number between 1 and 1000');
  }
  return parsed;
}

export function parseTagList(value: string): string[] {
  return value
    .split(',')
    .map(tag => tag.trim())
    .filter(Boolean);
}

export function exitCodeFor(error: CrossPosterError): number {
  return error.category === 'remote' ? EXIT_REMOTE_ERROR : EXIT_INPUT_ERROR;
}

/**
 * Clients are only built when a command needs one, so local-only commands
 * work without credentials or a readable config file.
 */
export function clientProvider(config: Result<AppConfig>): ClientProvider {
  return platform => {
    if (!config.success) return config;
    const credentials = credentialsFor(config.data, platform);
    if (!credentials.success) return credentials;
    return createPlatformClient(credentials.data);
  };
}

/**
 * Render an article as a markdown document with front-matter
 */
export function renderArticle(article: Article): string {
  const data: Record<string, unknown> = {
    title: article.title,
    tags: [...article.tags],
    published: article.published,
  };
  if (article.canonicalUrl !== undefined) data.canonical_url = article.canonicalUrl;
  if (article.coverImage !== undefined) data.cover_image = article.coverImage;
  if (article.description !== undefined) data.description = article.description;
  return matter.stringify(article.body, data);
}

export function serializeError(error: CrossPosterError): Record<string, unknown> {
  return { code: error.code, category: error.category, message: error.message };
}

export function serializeOutcome(outcome: PlatformOutcome): Record<string, unknown> {
  switch (outcome.status) {
    case 'published':
      return { ...outcome };
    case 'prepared':
      return {
        platform: outcome.platform,
        status: outcome.status,
        warnings: outcome.warnings,
        contentFormat: outcome.prepared.formatted.contentFormat,
        byteLength: outcome.prepared.formatted.byteLength,
        payload: outcome.prepared.payload,
      };
    case 'failed':
      return {
        platform: outcome.platform,
        status: outcome.status,
        warnings: outcome.warnings,
        error: serializeError(outcome.error),
      };
  }
}

/** Formatted content already names its platform; failures carry it alongside the error */
export function serializePreviewEntry({ platform, result }: PreviewEntry): Record<string, unknown> {
  return result.success ? { ...result.data } : { platform, error: serializeError(result.error) };
}
