import { ArticleSchema, type Article, type ArticleDraft } from './types.js';
import { MetadataSyntaxError, MissingTitleError } from './errors.js';
import { fail, ok, type Result } from './result.js';

/**
 * Validate a scratch record and freeze it into an immutable Article
 */
export function createArticle(draft: ArticleDraft): Result<Article> {
  const parsed = ArticleSchema.safeParse(draft);

  if (!parsed.success) {
    const titleIssue = parsed.error.issues.find(issue => issue.path[0] === 'title');
    if (titleIssue && (draft.title === undefined || draft.title.trim() === '')) {
      return fail(new MissingTitleError());
    }
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'article'}: ${issue.message}`)
      .join('; ');
    return fail(new MetadataSyntaxError(detail));
  }

  const { tags, ...fields } = parsed.data;
  return ok(Object.freeze({ ...fields, tags: Object.freeze([...tags]) }));
}

/**
 * Field overrides applied on top of a parsed article (CLI flags)
 */
export interface ArticleOverrides {
  tags?: string[];
  canonicalUrl?: string;
  body?: string;
}

/**
 * Produce a new Article with the given fields replaced
 */
export function withOverrides(article: Article, overrides: ArticleOverrides): Result<Article> {
  return createArticle({
    ...article,
    tags: overrides.tags ?? [...article.tags],
    canonicalUrl: overrides.canonicalUrl ?? article.canonicalUrl,
    body: overrides.body ?? article.body,
  });
}
