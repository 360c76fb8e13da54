import {
  MissingTitleError,
  TitleConsistencyError,
  createArticle,
  fail,
  findFirstH1,
  ok,
  splitFrontMatter,
  titlesMatch,
  type Article,
  type Result,
} from '@cross-poster/shared';
import { loadMarkdownFile } from './file-loader.js';

/**
 * Pick the article title from front-matter and the first H1 of the body
 */
export function resolveTitle(metadataTitle: string | undefined, body: string): Result<string> {
  const heading = findFirstH1(body);
  const declared = metadataTitle?.trim() ? metadataTitle.trim() : undefined;

  if (declared !== undefined && heading !== null) {
    if (!titlesMatch(declared, heading)) {
      return fail(new TitleConsistencyError(declared, heading));
    }
    return ok(declared);
  }
  if (declared !== undefined) return ok(declared);
  if (heading !== null) return ok(heading);
  return fail(new MissingTitleError());
}

/**
 * Parse a markdown document with optional YAML front-matter into an Article
 */
export function parseArticle(raw: string): Result<Article> {
  const document = splitFrontMatter(raw);
  if (!document.success) return document;

  const { meta, body } = document.data;
  const title = resolveTitle(meta.title ?? undefined, body);
  if (!title.success) return title;

  return createArticle({
    title: title.data,
    body,
    tags: meta.tags ?? [],
    canonicalUrl: meta.canonical_url ?? undefined,
    published: meta.published ?? true,
    coverImage: meta.cover_image ?? undefined,
    description: meta.description ?? undefined,
  });
}

/**
 * Load a local markdown file and parse it
 */
export async function parseArticleFile(filePath: string): Promise<Result<Article>> {
  const source = await loadMarkdownFile(filePath);
  if (!source.success) return source;
  return parseArticle(source.data.content);
}
