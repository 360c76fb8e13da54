import matter from 'gray-matter';
import { z } from 'zod';
import { MetadataSyntaxError, toErrorMessage } from './errors.js';
import { fail, ok, type Result } from './result.js';

/** YAML turns bare numbers into numbers; titles and tags are always text */
const TextSchema = z.union([z.string(), z.number()]).transform(String);

/**
 * Recognized front-matter keys. Unknown keys are ignored and null counts as absent.
 */
export const FrontMatterSchema = z.object({
  title: TextSchema.nullish(),
  tags: z
    .union([
      z.array(TextSchema),
      // dev.to writes `tags: a, b, c`
      z.string().transform(value => value.split(',')),
    ])
    .transform(tags => tags.map(tag => tag.trim()).filter(Boolean))
    .nullish(),
  canonical_url: z.string().nullish(),
  published: z.boolean().nullish(),
  cover_image: z.string().nullish(),
  description: z.string().nullish(),
});

export type FrontMatter = z.output<typeof FrontMatterSchema>;

export interface SplitDocument {
  meta: FrontMatter;
  body: string;
}

/**
 * Separate the optional front-matter block from the body and validate its recognized keys
 */
export function splitFrontMatter(raw: string): Result<SplitDocument> {
  let data: unknown;
  let body: string;
  try {
    // Passing options bypasses gray-matter's content-keyed cache
    const parsed = matter(raw, {});
    data = parsed.data;
    body = parsed.content;
  } catch (error) {
    return fail(new MetadataSyntaxError(firstLine(toErrorMessage(error)), { cause: error }));
  }

  const frontMatter = FrontMatterSchema.safeParse(data);
  if (!frontMatter.success) {
    const detail = frontMatter.error.issues
      .map(issue => `${issue.path.join('.') || 'front-matter'}: ${issue.message}`)
      .join('; ');
    return fail(new MetadataSyntaxError(detail));
  }

  return ok({ meta: frontMatter.data, body });
}

function firstLine(message: string): string {
  return message.split('\n')[0].trim();
}
