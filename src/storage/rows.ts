import type { AnalysisSummary, PersistBatch, ProcessedArticle, SourceId } from '../types.js';

/**
 * Flat article row shared by the tabular formats: one row per raw article,
 * joined with its processed fields (null when normalization skipped it).
 */
export interface ArticleRow {
  title: string;
  processed_title: string | null;
  tokens: string[] | null;
  link: string;
  source: SourceId;
  collected_at: Date;
}

export type FrequencyRow = {
  rank: number;
  word: string;
  frequency: number;
};

export function indexProcessed(processed: readonly ProcessedArticle[]): Map<number, ProcessedArticle> {
  return new Map(processed.map((article) => [article.rawIndex, article]));
}

export function toArticleRows(batch: PersistBatch): ArticleRow[] {
  const byIndex = indexProcessed(batch.processed);
  return batch.raw.map((article, index) => {
    const processed = byIndex.get(index);
    return {
      title: article.title,
      processed_title: processed ? processed.processedTitle : null,
      tokens: processed ? [...processed.tokens] : null,
      link: article.link,
      source: article.source,
      collected_at: article.collectedAt,
    };
  });
}

export function toFrequencyRows(summary: AnalysisSummary): FrequencyRow[] {
  return summary.topWords.map((entry, index) => ({
    rank: index + 1,
    word: entry.word,
    frequency: entry.frequency,
  }));
}
