import { getConfig, MIN_TOKEN_LENGTH_FLOOR, type AppConfig } from '../config.js';
import { buildStopwords, type StopwordConfig } from '../constants/stopwords.js';
import { isLanguage } from '../constants/sources.js';
import { UnsupportedLanguageError } from '../errors.js';
import { logger } from '../logger.js';
import type { ProcessedArticle, RawArticle, SkipRecord, SourceId } from '../types.js';
import { collapseWhitespace, normalizeHeadline, stripMarkup } from '../utils/normalize.js';

export interface NormalizeOptions {
  stopwords: StopwordConfig;
  keepDigits: boolean;
  minTokenLength: number;
}

export interface NormalizedTitle {
  processedTitle: string;
  tokens: string[];
}

const APOSTROPHES = /['’`´]/gu;
const NON_WORD_KEEP_DIGITS = /[^\p{L}\p{N}\s]/gu;
const NON_WORD_STRIP_DIGITS = /[^\p{L}\s]/gu;

export function defaultNormalizeOptions(cfg: AppConfig = getConfig()): NormalizeOptions {
  return {
    stopwords: buildStopwords(cfg.text.customStopwords),
    keepDigits: cfg.text.keepDigits,
    minTokenLength: cfg.text.minTokenLength,
  };
}

/**
 * Normalize a title into its processed form and token list.
 * Deterministic for a given (title, language, options).
 */
export function normalize(title: string, language: string, options: NormalizeOptions): NormalizedTitle {
  if (!isLanguage(language)) {
    throw new UnsupportedLanguageError(language);
  }
  const stopwords = options.stopwords[language];
  const minLength = Math.max(MIN_TOKEN_LENGTH_FLOOR, options.minTokenLength);

  const lowered = normalizeHeadline(stripMarkup(title.normalize('NFC')));
  const cleaned = lowered
    .replace(APOSTROPHES, '')
    .replace(options.keepDigits ? NON_WORD_KEEP_DIGITS : NON_WORD_STRIP_DIGITS, ' ');

  const tokens = collapseWhitespace(cleaned)
    .split(' ')
    .filter((token) => token.length >= minLength)
    .filter((token) => !stopwords.has(token));

  return {
    processedTitle: tokens.join(' '),
    tokens,
  };
}

export function normalizeArticle(
  raw: RawArticle,
  rawIndex: number,
  language: string,
  options: NormalizeOptions,
): ProcessedArticle {
  if (!isLanguage(language)) {
    throw new UnsupportedLanguageError(language);
  }
  const { processedTitle, tokens } = normalize(raw.title, language, options);
  return Object.freeze({
    title: raw.title,
    link: raw.link,
    source: raw.source,
    collectedAt: raw.collectedAt,
    processedTitle,
    tokens: Object.freeze(tokens),
    language,
    rawIndex,
  });
}

export interface NormalizedBatch {
  processed: ProcessedArticle[];
  skipped: SkipRecord[];
}

/**
 * Normalize every article independently. An article whose language is not
 * supported is skipped with a warning; the rest of the batch proceeds.
 */
export function normalizeBatch(
  raw: readonly RawArticle[],
  languageFor: (source: SourceId) => string,
  options: NormalizeOptions,
): NormalizedBatch {
  const processed: ProcessedArticle[] = [];
  const skipped: SkipRecord[] = [];

  raw.forEach((article, index) => {
    const language = languageFor(article.source);
    try {
      processed.push(normalizeArticle(article, index, language, options));
    } catch (err) {
      if (!(err instanceof UnsupportedLanguageError)) throw err;
      logger.warn({ index, source: article.source, language }, 'Skipping article with unsupported language');
      skipped.push({ stage: 'normalize', index, reason: err.message });
    }
  });

  return { processed, skipped };
}
