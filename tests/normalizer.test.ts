import { describe, expect, it } from 'vitest';
import { buildStopwords } from '../src/constants/stopwords.js';
import { UnsupportedLanguageError } from '../src/errors.js';
import { normalize, normalizeArticle, normalizeBatch, type NormalizeOptions } from '../src/services/normalizer.js';
import type { RawArticle } from '../src/types.js';

const stopwords = buildStopwords();

function options(overrides: Partial<NormalizeOptions> = {}): NormalizeOptions {
  return { stopwords, keepDigits: false, minTokenLength: 2, ...overrides };
}

const collectedAt = new Date('2024-03-01T12:00:00Z');

function raw(title: string, source: RawArticle['source'] = 'hackernews'): RawArticle {
  return { title, link: `https://example.com/${encodeURIComponent(title)}`, source, collectedAt };
}

describe('normalize', () => {
  it('keeps digit tokens when configured to', () => {
    const result = normalize('The Rise of AI in 2024', 'english', options({ keepDigits: true }));
    expect(result.tokens).toEqual(['rise', 'ai', '2024']);
    expect(result.processedTitle).toBe('rise ai 2024');
  });

  it('drops digits by default', () => {
    const result = normalize('The Rise of AI in 2024', 'english', options());
    expect(result.tokens).toEqual(['rise', 'ai']);
    expect(result.processedTitle).toBe('rise ai');
  });

  it('removes apostrophes before matching stopwords', () => {
    const result = normalize("Don't panic: markets rally!", 'english', options());
    expect(result.tokens).toEqual(['panic', 'markets', 'rally']);
  });

  it('strips URLs, mentions and hashtags', () => {
    const result = normalize('Read https://example.com/x now @editor #breaking news', 'english', options());
    expect(result.tokens).toEqual(['read', 'news']);
  });

  it('drops tokens shorter than the minimum length', () => {
    expect(normalize('X marks the spot', 'english', options()).tokens).toEqual(['marks', 'spot']);
    expect(normalize('Rust compiler rewrite', 'english', options({ minTokenLength: 5 })).tokens).toEqual([
      'compiler',
      'rewrite',
    ]);
  });

  it('drops single-character tokens even when a lower minimum is passed', () => {
    expect(normalize('X marks the spot', 'english', options({ minTokenLength: 1 })).tokens).toEqual(['marks', 'spot']);
    expect(normalize('X marks the spot', 'english', options({ minTokenLength: 0 })).tokens).toEqual(['marks', 'spot']);
  });

  it('keeps accented Portuguese letters and removes Portuguese stopwords', () => {
    const result = normalize('Governo anuncia ação contra a chuva em São Paulo', 'portuguese', options());
    expect(result.tokens).toEqual(['governo', 'anuncia', 'ação', 'contra', 'chuva', 'paulo']);
  });

  it('composes decomposed characters before tokenizing', () => {
    const result = normalize('Ac\u0327a\u0303o do governo', 'portuguese', options());
    expect(result.tokens).toEqual(['ação', 'governo']);
  });

  it('applies custom stopwords on top of the base list', () => {
    const custom = buildStopwords({ english: ['Panic'] });
    const result = normalize("Don't panic: markets rally!", 'english', options({ stopwords: custom }));
    expect(result.tokens).toEqual(['markets', 'rally']);
  });

  it('never emits stopwords or short tokens', () => {
    const titles = [
      'The quick brown fox jumps over the lazy dog',
      'Show HN: I built a database in a weekend',
      'Is it time to rewrite it in Rust?',
    ];
    for (const title of titles) {
      for (const token of normalize(title, 'english', options()).tokens) {
        expect(stopwords.english.has(token)).toBe(false);
        expect(token.length).toBeGreaterThanOrEqual(2);
      }
    }
  });

  it('is idempotent on its own output', () => {
    const titles = ['The Rise of AI in 2024', "Don't panic: markets rally!", 'Governo anuncia ação contra a chuva'];
    for (const title of titles) {
      const language = title.startsWith('Governo') ? 'portuguese' : 'english';
      const once = normalize(title, language, options());
      const twice = normalize(once.processedTitle, language, options());
      expect(twice).toEqual(once);
    }
  });

  it('returns an empty token list when nothing survives', () => {
    expect(normalize('The of and in', 'english', options())).toEqual({ processedTitle: '', tokens: [] });
  });

  it('rejects unsupported languages', () => {
    expect(() => normalize('Hello world', 'klingon', options())).toThrow(UnsupportedLanguageError);
    expect(() => normalize('Hello world', 'klingon', options())).toThrow('Unsupported language: klingon');
  });
});

describe('normalizeArticle', () => {
  it('carries the raw fields and the raw index', () => {
    const article = normalizeArticle(raw('The Rise of AI in 2024'), 4, 'english', options());
    expect(article.title).toBe('The Rise of AI in 2024');
    expect(article.source).toBe('hackernews');
    expect(article.collectedAt).toEqual(collectedAt);
    expect(article.language).toBe('english');
    expect(article.rawIndex).toBe(4);
    expect(article.tokens).toEqual(['rise', 'ai']);
    expect(Object.isFrozen(article)).toBe(true);
    expect(Object.isFrozen(article.tokens)).toBe(true);
  });
});

describe('normalizeBatch', () => {
  it('skips articles whose source maps to an unsupported language', () => {
    const batch = [raw('Rust compiler rewrite'), raw('Mars rover finds water', 'bbc'), raw('Climate talks resume')];
    const result = normalizeBatch(batch, (source) => (source === 'bbc' ? 'klingon' : 'english'), options());

    expect(result.processed.map((article) => article.rawIndex)).toEqual([0, 2]);
    expect(result.skipped).toEqual([{ stage: 'normalize', index: 1, reason: 'Unsupported language: klingon' }]);
  });

  it('handles an empty batch', () => {
    expect(normalizeBatch([], () => 'english', options())).toEqual({ processed: [], skipped: [] });
  });
});
