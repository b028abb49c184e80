import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import path from 'node:path';
import { z } from 'zod';
import type { ParquetCodec } from '../config.js';
import { PersistenceError } from '../errors.js';
import { logger } from '../logger.js';
import { SOURCE_IDS, type PersistBatch, type PersistResult } from '../types.js';
import { artifactStem, reserveFile } from './files.js';
import { toArticleRows, toFrequencyRows, type ArticleRow } from './rows.js';
import type { StorageAdapter } from './types.js';

export interface ParquetAdapterOptions {
  dataDir: string;
  compression: ParquetCodec;
}

function articleSchema(compression: ParquetCodec): ParquetSchema {
  return new ParquetSchema({
    title: { type: 'UTF8', compression },
    processed_title: { type: 'UTF8', optional: true, compression },
    tokens: { type: 'UTF8', repeated: true, compression },
    link: { type: 'UTF8', compression },
    source: { type: 'UTF8', compression },
    collected_at: { type: 'TIMESTAMP_MILLIS', compression },
  });
}

function frequencySchema(compression: ParquetCodec): ParquetSchema {
  return new ParquetSchema({
    rank: { type: 'INT32', compression },
    word: { type: 'UTF8', compression },
    frequency: { type: 'INT32', compression },
  });
}

async function writeRows(
  schema: ParquetSchema,
  file: string,
  rows: readonly Record<string, unknown>[],
): Promise<void> {
  const writer = await ParquetWriter.openFile(schema, file);
  try {
    for (const row of rows) {
      await writer.appendRow(row);
    }
  } finally {
    await writer.close();
  }
}

/**
 * Columnar output: the same two datasets as the CSV adapter, compressed
 * per column. Timestamps are stored as TIMESTAMP_MILLIS.
 */
export class ParquetAdapter implements StorageAdapter {
  readonly kind = 'parquet' as const;
  readonly dir: string;
  private readonly compression: ParquetCodec;

  constructor(opts: ParquetAdapterOptions) {
    this.dir = path.resolve(opts.dataDir);
    this.compression = opts.compression;
  }

  async persist(batch: PersistBatch): Promise<PersistResult> {
    try {
      const articles = toArticleRows(batch).map((row) => ({
        title: row.title,
        // optional and repeated columns are omitted rather than null
        ...(row.processed_title !== null ? { processed_title: row.processed_title } : {}),
        ...(row.tokens !== null && row.tokens.length > 0 ? { tokens: row.tokens } : {}),
        link: row.link,
        source: row.source,
        collected_at: row.collected_at,
      }));
      const frequencies = toFrequencyRows(batch.summary);

      const articlesFile = await reserveFile(this.dir, artifactStem('news', batch.source, batch.runAt), '.parquet');
      await writeRows(articleSchema(this.compression), articlesFile, articles);

      const frequencyFile = await reserveFile(
        this.dir,
        artifactStem('word_frequency', batch.source, batch.runAt),
        '.parquet',
      );
      await writeRows(frequencySchema(this.compression), frequencyFile, frequencies);

      logger.info(
        { adapter: this.kind, articlesFile, frequencyFile, rows: articles.length, compression: this.compression },
        'Persisted run to Parquet',
      );
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
 * Read every record of a Parquet file. Records are returned unvalidated.
 */
export async function readParquet(file: string): Promise<unknown[]> {
  const reader = await ParquetReader.openFile(file);
  try {
    const cursor = reader.getCursor();
    const records: unknown[] = [];
    let record: unknown = await cursor.next();
    while (record) {
      records.push(record);
      record = await cursor.next();
    }
    return records;
  } finally {
    await reader.close();
  }
}

const ParquetArticleSchema = z.object({
  title: z.string(),
  processed_title: z.string().nullish(),
  tokens: z.array(z.string()).nullish(),
  link: z.string(),
  source: z.enum(SOURCE_IDS),
  collected_at: z.date(),
});

/**
 * Read an articles file back as article rows.
 *
 * Optional and repeated columns are omitted on write when null or empty, so
 * an absent `processed_title` means the article was skipped (tokens `null`),
 * while a present one with absent tokens means a processed title with no
 * tokens (tokens `[]`).
 */
export async function readParquetArticles(file: string): Promise<ArticleRow[]> {
  const records = await readParquet(file);
  return records.map((record) => {
    const row = ParquetArticleSchema.parse(record);
    const processedTitle = row.processed_title ?? null;
    return {
      title: row.title,
      processed_title: processedTitle,
      tokens: processedTitle === null ? null : (row.tokens ?? []),
      link: row.link,
      source: row.source,
      collected_at: row.collected_at,
    };
  });
}
