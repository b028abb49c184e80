import type { AnalysisSummary, ProcessedArticle, WordFrequencyEntry } from '../types.js';

export interface AnalyzeOptions {
  topN?: number;
}

export const DEFAULT_TOP_WORDS = 20;

/**
 * Count tokens across the whole batch. Map insertion order doubles as the
 * first-seen order used to break frequency ties.
 */
export function countTokens(batch: readonly ProcessedArticle[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const article of batch) {
    for (const token of article.tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Rank counted tokens by descending frequency; equal frequencies keep first-seen order.
 */
export function rankWords(counts: Map<string, number>): WordFrequencyEntry[] {
  return Array.from(counts, ([word, frequency]) => ({ word, frequency })).sort(
    (a, b) => b.frequency - a.frequency,
  );
}

/**
 * Build the frequency summary of a batch. Pure: no state survives between calls.
 * top words are truncated to topN; every other field reflects the full batch.
 */
export function analyze(batch: readonly ProcessedArticle[], opts: AnalyzeOptions = {}): AnalysisSummary {
  const topN = Math.max(0, Math.floor(opts.topN ?? DEFAULT_TOP_WORDS));
  const counts = countTokens(batch);

  let totalTokens = 0;
  for (const frequency of counts.values()) totalTokens += frequency;

  const vocabularySize = counts.size;

  return {
    totalArticles: batch.length,
    totalTokens,
    vocabularySize,
    lexicalRichness: totalTokens > 0 ? vocabularySize / totalTokens : 0,
    averageTokensPerArticle: batch.length > 0 ? totalTokens / batch.length : 0,
    topWords: rankWords(counts).slice(0, topN),
  };
}
