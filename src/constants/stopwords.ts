import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { LANGUAGES, type Language } from '../types.js';

/**
 * Stopword lists per language. The base lists live in resources/stopwords/*.json
 * (standard lists plus a few extra high-frequency words) and are read once.
 */

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/constants and dist/constants both sit two levels below the project root
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const STOPWORDS_DIR = path.join(PROJECT_ROOT, 'resources', 'stopwords');

const StopwordFileSchema = z.object({
  language: z.enum(LANGUAGES),
  words: z.array(z.string()),
});

export type StopwordConfig = Readonly<Record<Language, ReadonlySet<string>>>;

const baseLists = new Map<Language, readonly string[]>();

export function loadBaseStopwords(language: Language): readonly string[] {
  const cached = baseLists.get(language);
  if (cached) return cached;

  const file = path.join(STOPWORDS_DIR, `${language}.json`);
  const parsed = StopwordFileSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
  if (parsed.language !== language) {
    throw new Error(`Stopword file ${file} declares language ${parsed.language}`);
  }
  const words = Object.freeze([...parsed.words]);
  baseLists.set(language, words);
  return words;
}

/**
 * Build the immutable stopword configuration: base list plus the caller's custom
 * extension, per language. Each word is stored both as written (lowercased) and
 * without apostrophes, since titles lose their apostrophes during normalization.
 */
export function buildStopwords(
  custom: Partial<Record<Language, readonly string[]>> = {},
): StopwordConfig {
  const build = (language: Language): ReadonlySet<string> => {
    const set = new Set<string>();
    for (const word of [...loadBaseStopwords(language), ...(custom[language] ?? [])]) {
      const lower = word.trim().toLowerCase();
      if (!lower) continue;
      set.add(lower);
      set.add(lower.replace(/['’]/g, ''));
    }
    return set;
  };

  return Object.freeze({
    english: build('english'),
    portuguese: build('portuguese'),
  });
}
