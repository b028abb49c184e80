import { promises as fs } from 'node:fs';
import path from 'node:path';
import { SOURCE_CATALOG } from '../constants/sources.js';
import { PersistenceError } from '../errors.js';
import { logger } from '../logger.js';
import { RunDocumentSchema, type RunDocument } from '../schemas/document.js';
import type { AnalysisSummary, PersistBatch, PersistResult, ProcessedArticle, RawArticle } from '../types.js';
import { toIsoUtc } from '../utils/date.js';
import { artifactStem, writeNewFile } from './files.js';
import { toArticleRows } from './rows.js';
import type { StorageAdapter } from './types.js';

export interface JsonAdapterOptions {
  dataDir: string;
  indent: number;
}

export function buildRunDocument(batch: PersistBatch): RunDocument {
  const { summary } = batch;
  return {
    metadata: {
      run_id: batch.runId,
      source: batch.source,
      source_name: SOURCE_CATALOG[batch.source].name,
      language: batch.language,
      run_at: toIsoUtc(batch.runAt),
      total_news: batch.raw.length,
      processed_news: batch.processed.length,
      skipped_news: batch.raw.length - batch.processed.length,
    },
    news: toArticleRows(batch).map((row) => ({
      title: row.title,
      processed_title: row.processed_title,
      tokens: row.tokens,
      link: row.link,
      source: row.source,
      collected_at: toIsoUtc(row.collected_at),
    })),
    analysis: {
      total_articles: summary.totalArticles,
      total_tokens: summary.totalTokens,
      vocabulary_size: summary.vocabularySize,
      lexical_richness: summary.lexicalRichness,
      average_tokens_per_article: summary.averageTokensPerArticle,
      top_words: summary.topWords.map(({ word, frequency }) => ({ word, frequency })),
    },
  };
}

/**
 * Structured document output: `metadata`, `news` and `analysis` sections in
 * one file per run.
 */
export class JsonAdapter implements StorageAdapter {
  readonly kind = 'json' as const;
  readonly dir: string;
  private readonly indent: number;

  constructor(opts: JsonAdapterOptions) {
    this.dir = path.resolve(opts.dataDir);
    this.indent = opts.indent;
  }

  async persist(batch: PersistBatch): Promise<PersistResult> {
    try {
      const document = buildRunDocument(batch);
      const file = await writeNewFile(
        this.dir,
        artifactStem('news_analysis', batch.source, batch.runAt),
        '.json',
        `${JSON.stringify(document, null, this.indent)}\n`,
      );
      logger.info({ adapter: this.kind, file, news: document.news.length }, 'Persisted run to JSON');
      return {
        kind: this.kind,
        location: file,
        artifacts: [file],
        records: document.news.length,
      };
    } catch (err) {
      throw new PersistenceError(this.kind, err);
    }
  }
}

export interface LoadedRun {
  document: RunDocument;
  raw: RawArticle[];
  processed: ProcessedArticle[];
  summary: AnalysisSummary;
}

/**
 * Read a run document back and rebuild the in-memory records.
 */
export async function loadRunDocument(file: string): Promise<LoadedRun> {
  const document = RunDocumentSchema.parse(JSON.parse(await fs.readFile(file, 'utf-8')));
  const { metadata, analysis } = document;

  const raw: RawArticle[] = [];
  const processed: ProcessedArticle[] = [];

  document.news.forEach((entry, index) => {
    const article: RawArticle = Object.freeze({
      title: entry.title,
      link: entry.link,
      source: entry.source,
      collectedAt: new Date(entry.collected_at),
    });
    raw.push(article);

    if (entry.processed_title !== null && entry.tokens !== null) {
      processed.push(
        Object.freeze({
          ...article,
          processedTitle: entry.processed_title,
          tokens: Object.freeze([...entry.tokens]),
          language: metadata.language,
          rawIndex: index,
        }),
      );
    }
  });

  return {
    document,
    raw,
    processed,
    summary: {
      totalArticles: analysis.total_articles,
      totalTokens: analysis.total_tokens,
      vocabularySize: analysis.vocabulary_size,
      lexicalRichness: analysis.lexical_richness,
      averageTokensPerArticle: analysis.average_tokens_per_article,
      topWords: analysis.top_words,
    },
  };
}
