import { LANGUAGES, SOURCE_IDS, type Language, type SourceId } from '../types.js';

export interface SourceDescriptor {
  id: SourceId;
  name: string;
  url: string;
  language: Language;
}

/**
 * Fixed news origins. Each source has exactly one language; the normalizer
 * trusts this mapping.
 */
export const SOURCE_CATALOG: Readonly<Record<SourceId, SourceDescriptor>> = {
  hackernews: {
    id: 'hackernews',
    name: 'Hacker News',
    url: 'https://news.ycombinator.com',
    language: 'english',
  },
  bbc: {
    id: 'bbc',
    name: 'BBC News',
    url: 'https://www.bbc.com/news',
    language: 'english',
  },
  g1: {
    id: 'g1',
    name: 'G1',
    url: 'https://g1.globo.com',
    language: 'portuguese',
  },
  folha: {
    id: 'folha',
    name: 'Folha de S.Paulo',
    url: 'https://www.folha.uol.com.br',
    language: 'portuguese',
  },
};

export const SOURCE_LANGUAGE: Readonly<Record<SourceId, Language>> = {
  hackernews: SOURCE_CATALOG.hackernews.language,
  bbc: SOURCE_CATALOG.bbc.language,
  g1: SOURCE_CATALOG.g1.language,
  folha: SOURCE_CATALOG.folha.language,
};

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some((id) => id === value);
}

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((language) => language === value);
}
