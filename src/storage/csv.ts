import csv from 'csv-parser';
import { stringify } from 'csv-stringify/sync';
import { createReadStream } from 'node:fs';
import path from 'node:path';
import { PersistenceError } from '../errors.js';
import { logger } from '../logger.js';
import type { PersistBatch, PersistResult } from '../types.js';
import { toIsoUtc } from '../utils/date.js';
import { artifactStem, writeNewFile } from './files.js';
import { toArticleRows, toFrequencyRows } from './rows.js';
import type { StorageAdapter } from './types.js';

export const ARTICLE_COLUMNS = ['title', 'processed_title', 'tokens', 'link', 'source', 'collected_at'] as const;
export const FREQUENCY_COLUMNS = ['rank', 'word', 'frequency'] as const;

export interface CsvAdapterOptions {
  dataDir: string;
}

/**
 * Flat tabular output: one articles file and one word-frequency file per run.
 * Files are always new; an existing file is never overwritten.
 */
export class CsvAdapter implements StorageAdapter {
  readonly kind = 'csv' as const;
  readonly dir: string;

  constructor(opts: CsvAdapterOptions) {
    this.dir = path.resolve(opts.dataDir);
  }

  async persist(batch: PersistBatch): Promise<PersistResult> {
    try {
      const articles = toArticleRows(batch).map((row) => ({
        ...row,
        processed_title: row.processed_title ?? '',
        tokens: row.tokens ? row.tokens.join(' ') : '',
        collected_at: toIsoUtc(row.collected_at),
      }));
      const frequencies = toFrequencyRows(batch.summary);

      const articlesFile = await writeNewFile(
        this.dir,
        artifactStem('news', batch.source, batch.runAt),
        '.csv',
        stringify(articles, { header: true, columns: [...ARTICLE_COLUMNS] }),
      );
      const frequencyFile = await writeNewFile(
        this.dir,
        artifactStem('word_frequency', batch.source, batch.runAt),
        '.csv',
        stringify(frequencies, { header: true, columns: [...FREQUENCY_COLUMNS] }),
      );

      logger.info({ adapter: this.kind, articlesFile, frequencyFile, rows: articles.length }, 'Persisted run to CSV');
      return {
        kind: this.kind,
        location: articlesFile,
        artifacts: [articlesFile, frequencyFile],
        records: articles.length,
      };
    } catch (err) {
      throw new PersistenceError(this.kind, err);
    }
  }
}

/**
 * Read a CSV file back as header-keyed string records.
 */
export function readCsv(file: string): Promise<Record<string, string>[]> {
  return new Promise((resolve, reject) => {
    const rows: Record<string, string>[] = [];
    createReadStream(file)
      .on('error', reject)
      .pipe(csv())
      .on('data', (row: Record<string, string>) => rows.push(row))
      .on('end', () => resolve(rows))
      .on('error', reject);
  });
}
