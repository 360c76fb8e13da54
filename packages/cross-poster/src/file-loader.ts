import path from 'path';
import fs from 'fs-extra';
import {
  SourceFileError,
  fail,
  ok,
  parseDevToUrl,
  toErrorMessage,
  type Article,
  type PlatformClient,
  type Result,
} from '@cross-poster/shared';

export const MARKDOWN_EXTENSIONS = ['.md', '.markdown'] as const;

/** Source files above this size are rejected before reading */
export const MAX_SOURCE_BYTES = 5 * 1024 * 1024;

export interface SourceFile {
  path: string;
  content: string;
}

/**
 * True when the CLI input names a remote article rather than a local file
 */
export function isRemoteSource(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

/**
 * Read a local markdown file after checking it exists, is a regular file,
 * has a markdown extension and holds text.
 */
export async function loadMarkdownFile(filePath: string): Promise<Result<SourceFile>> {
  const resolved = path.resolve(filePath);
  const extension = path.extname(resolved).toLowerCase();

  if (!MARKDOWN_EXTENSIONS.some(allowed => allowed === extension)) {
    return fail(
      new SourceFileError(filePath, `expected a ${MARKDOWN_EXTENSIONS.join(' or ')} file`)
    );
  }

  try {
    if (!(await fs.pathExists(resolved))) {
      return fail(new SourceFileError(filePath, 'file does not exist'));
    }

    const info = await fs.stat(resolved);
    if (!info.isFile()) {
      return fail(new SourceFileError(filePath, 'not a regular file'));
    }
    if (info.size > MAX_SOURCE_BYTES) {
      return fail(
        new SourceFileError(filePath, `file is ${info.size} bytes (max: ${MAX_SOURCE_BYTES})`)
      );
    }

    const content = await fs.readFile(resolved, 'utf-8');
    if (content.includes('\u0000')) {
      return fail(new SourceFileError(filePath, 'file looks binary'));
    }

    return ok({ path: resolved, content });
  } catch (error) {
    return fail(new SourceFileError(filePath, toErrorMessage(error), { cause: error }));
  }
}

/**
 * Import an article from a dev.to URL through the dev.to fetch endpoint
 */
export async function importFromDevTo(url: string, client: PlatformClient): Promise<Result<Article>> {
  const identifier = parseDevToUrl(url);
  if (!identifier.success) return identifier;
  return client.fetch(identifier.data);
}
