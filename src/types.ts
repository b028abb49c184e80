/**
 * Shared types for News Lexicon.
 * Records are immutable once created; timestamps are UTC instants.
 */

export const LANGUAGES = ['english', 'portuguese'] as const;

export type Language = (typeof LANGUAGES)[number];

export const SOURCE_IDS = ['hackernews', 'bbc', 'g1', 'folha'] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

export interface RawArticle {
  readonly title: string;
  readonly link: string;
  readonly source: SourceId;
  readonly collectedAt: Date;
}

/**
 * Unvalidated candidate handed over by the collector (or any other producer).
 */
export interface RawArticleInput {
  title?: string | null;
  link?: string | null;
  source: string;
  collectedAt: Date | string;
}

export interface ProcessedArticle extends RawArticle {
  readonly processedTitle: string;
  readonly tokens: readonly string[];
  readonly language: Language;
  readonly rawIndex: number; // position of the source RawArticle within the run
}

export interface WordFrequencyEntry {
  word: string;
  frequency: number; // >= 1
}

export interface AnalysisSummary {
  totalArticles: number;
  totalTokens: number;
  vocabularySize: number;
  lexicalRichness: number; // vocabularySize / totalTokens, 0 when no tokens
  averageTokensPerArticle: number;
  topWords: WordFrequencyEntry[];
}

export type StorageKind = 'sqlite' | 'csv' | 'parquet' | 'json';

export interface PersistBatch {
  runId: string;
  source: SourceId;
  language: Language;
  runAt: Date;
  raw: readonly RawArticle[];
  processed: readonly ProcessedArticle[];
  summary: AnalysisSummary;
}

export interface PersistResult {
  kind: StorageKind;
  location: string; // file path or database path
  artifacts: string[];
  records: number;
}

export type SkipStage = 'collect' | 'validate' | 'normalize';

export interface SkipRecord {
  stage: SkipStage;
  index?: number;
  reason: string;
}

export type RunStatus = 'succeeded' | 'partial' | 'failed';
