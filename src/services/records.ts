import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import { SOURCE_IDS, type RawArticle, type RawArticleInput, type SkipRecord } from '../types.js';

const RawArticleSchema = z.object({
  title: z
    .string({ required_error: 'title is required', invalid_type_error: 'title must be a string' })
    .trim()
    .min(1, 'title must not be empty'),
  link: z
    .string({ required_error: 'link is required', invalid_type_error: 'link must be a string' })
    .trim()
    .min(1, 'link must not be empty'),
  source: z.enum(SOURCE_IDS),
  collectedAt: z.coerce.date({ invalid_type_error: 'collectedAt must be a valid timestamp' }),
});

/**
 * Construct an immutable RawArticle, failing with ValidationError on an empty
 * title or link, an unknown source or an unparseable timestamp.
 */
export function createRawArticle(input: RawArticleInput): RawArticle {
  const result = RawArticleSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    throw new ValidationError(`Invalid raw article: ${issues.join('; ')}`, issues);
  }
  const { title, link, source, collectedAt } = result.data;
  return Object.freeze({ title, link, source, collectedAt });
}

export interface ValidatedBatch {
  articles: RawArticle[];
  rejected: SkipRecord[];
}

/**
 * Validate every candidate; malformed ones are skipped and counted, never fatal.
 */
export function validateArticles(inputs: readonly RawArticleInput[]): ValidatedBatch {
  const articles: RawArticle[] = [];
  const rejected: SkipRecord[] = [];

  inputs.forEach((input, index) => {
    try {
      articles.push(createRawArticle(input));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      logger.warn({ index, issues: err.issues }, 'Skipping malformed article');
      rejected.push({ stage: 'validate', index, reason: err.message });
    }
  });

  return { articles, rejected };
}
