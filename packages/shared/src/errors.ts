import { PLATFORM_LABELS, type ContentFormat, type Platform } from './types.js';

export type ErrorCategory = 'input' | 'policy' | 'remote' | 'config';

/**
 * Base class for every failure the publishing pipeline reports
 */
export abstract class CrossPosterError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingTitleError extends CrossPosterError {
  readonly code = 'MISSING_TITLE';
  readonly category = 'input';

  constructor() {
    super(
      "Missing required 'title'. Provide either a 'title' field in the frontmatter " +
        'or an H1 heading (# Title) in the content'
    );
  }
}

export class TitleConsistencyError extends CrossPosterError {
  readonly code = 'TITLE_MISMATCH';
  readonly category = 'input';

  constructor(
    readonly metadataTitle: string,
    readonly headingTitle: string
  ) {
    super(
      `Title mismatch: frontmatter has '${metadataTitle}' but content has '# ${headingTitle}'. ` +
        'Update the title in one place only'
    );
  }
}

export class MetadataSyntaxError extends CrossPosterError {
  readonly code = 'METADATA_SYNTAX';
  readonly category = 'input';

  constructor(
    readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Invalid front-matter: ${detail}. Values containing ': ' must be quoted`,
      options
    );
  }
}

export class InvalidSourceUrlError extends CrossPosterError {
  readonly code = 'INVALID_SOURCE_URL';
  readonly category = 'input';

  constructor(
    readonly url: string,
    reason: string
  ) {
    super(`Invalid dev.to URL "${url}": ${reason}. Expected https://dev.to/<user>/<slug>`);
  }
}

export class PlaceholderCredentialError extends CrossPosterError {
  readonly code = 'PLACEHOLDER_CREDENTIAL';
  readonly category = 'input';

  constructor(
    readonly platform: Platform,
    readonly field: string,
    reason: string
  ) {
    super(
      `${PLATFORM_LABELS[platform]} ${field} ${reason}. ` +
        'Run "crosspost config init" and replace the template values with real credentials'
    );
  }
}

export class ContentTooLargeError extends CrossPosterError {
  readonly code = 'CONTENT_TOO_LARGE';
  readonly category = 'policy';

  constructor(
    readonly actualBytes: number,
    readonly limitBytes: number,
    readonly platform: Platform
  ) {
    super(
      `Content too large for ${PLATFORM_LABELS[platform]}: ${actualBytes} bytes (max: ${limitBytes}). ` +
        'Shorten the article before publishing'
    );
  }
}

export class CapabilityNotSupportedError extends CrossPosterError {
  readonly code = 'CAPABILITY_NOT_SUPPORTED';
  readonly category = 'policy';

  constructor(
    readonly platform: Platform,
    readonly capability: string,
    hint?: string
  ) {
    super(
      `${PLATFORM_LABELS[platform]} does not support ${capability}` + (hint ? `. ${hint}` : '')
    );
  }
}

/**
 * Request details attached to a failed publish call
 */
export interface RequestContext {
  title: string;
  tagCount: number;
  tags: string[];
  contentLength: number;
  contentFormat: ContentFormat;
  published: boolean;
}

const STATUS_HINTS: Record<number, string> = {
  400: 'Request rejected - check title and content',
  401: 'Invalid credentials - check your API key or access token',
  403: 'Access forbidden - the credentials may lack write permission',
  404: 'Not found - check the article ID or account',
  422: 'Article validation failed - check title, content, and tags',
  429: 'Rate limit exceeded - try again later',
};

export class PlatformApiError extends CrossPosterError {
  readonly code = 'PLATFORM_API_ERROR';
  readonly category = 'remote';

  constructor(
    readonly platform: Platform,
    /** HTTP status, or null when no response was received */
    readonly status: number | null,
    readonly responseBody: string,
    readonly context?: RequestContext,
    options?: { cause?: unknown }
  ) {
    super(PlatformApiError.describe(platform, status, responseBody, context), options);
  }

  private static describe(
    platform: Platform,
    status: number | null,
    responseBody: string,
    context?: RequestContext
  ): string {
    const label = PLATFORM_LABELS[platform];
    const headline =
      status === null
        ? `${label} request failed: ${responseBody}`
        : `${label} API error (status ${status}): ${STATUS_HINTS[status] ?? 'API request failed'}`;

    const lines = [headline];
    if (status !== null) {
      lines.push('', 'Server Response:', responseBody.trim() || '(no response body)');
    }
    if (context) {
      lines.push(
        '',
        'Article Details:',
        `  Title: '${context.title}'`,
        `  Tags: ${context.tagCount} (${context.tags.join(', ')})`,
        `  Content length: ${context.contentLength} chars`,
        `  Format: ${context.contentFormat}`,
        `  Published: ${context.published}`
      );
    }
    return lines.join('\n');
  }
}

/**
 * Config file or environment problems (outer CLI layer)
 */
export class ConfigError extends CrossPosterError {
  readonly code = 'CONFIG_ERROR';
  readonly category = 'config';
}

/**
 * Local source file could not be loaded (outer CLI layer)
 */
export class SourceFileError extends CrossPosterError {
  readonly code = 'SOURCE_FILE_ERROR';
  readonly category = 'input';

  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load "${path}": ${reason}`, options);
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
