import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ParquetAdapter, readParquet, readParquetArticles } from '../src/storage/parquet.js';
import { makeBatch, makeTempDir, removeDir, RUN_AT } from './fixtures.js';

describe('ParquetAdapter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes both datasets with Snappy compression', async () => {
    const result = await new ParquetAdapter({ dataDir: dir, compression: 'SNAPPY' }).persist(makeBatch());

    const articlesFile = path.join(dir, 'news_hackernews_20240301_120000.parquet');
    const frequencyFile = path.join(dir, 'word_frequency_hackernews_20240301_120000.parquet');
    expect(result).toEqual({
      kind: 'parquet',
      location: articlesFile,
      artifacts: [articlesFile, frequencyFile],
      records: 3,
    });

    const articles = await readParquet(articlesFile);
    expect(articles).toHaveLength(3);
    expect(articles[0]).toMatchObject({
      title: 'Rust compiler rewrite',
      processed_title: 'rust compiler rewrite',
      tokens: ['rust', 'compiler', 'rewrite'],
      link: 'https://example.com/rust-1',
      source: 'hackernews',
      collected_at: RUN_AT,
    });

    const frequencies = await readParquet(frequencyFile);
    expect(frequencies.slice(0, 2)).toEqual([
      { rank: 1, word: 'rust', frequency: 3 },
      { rank: 2, word: 'compiler', frequency: 2 },
    ]);
    expect(frequencies).toHaveLength(6);
  });

  it('keeps the title of an article that was not processed', async () => {
    const result = await new ParquetAdapter({ dataDir: dir, compression: 'GZIP' }).persist(makeBatch({ skip: [1] }));

    const articles = await readParquet(result.location);
    expect(articles).toHaveLength(3);
    expect(articles[1]).toMatchObject({ title: 'Rust release notes', link: 'https://example.com/rust-2' });
    expect(articles[2]).toMatchObject({ processed_title: 'compiler bugs rust', tokens: ['compiler', 'bugs', 'rust'] });
  });

  it('reads back empty token lists and skipped articles distinctly', async () => {
    const batch = makeBatch({ skip: [1] });
    const [first, ...rest] = batch.processed;
    const result = await new ParquetAdapter({ dataDir: dir, compression: 'SNAPPY' }).persist({
      ...batch,
      processed: [{ ...first, processedTitle: '', tokens: [] }, ...rest],
    });

    const rows = await readParquetArticles(result.location);
    expect(rows).toEqual([
      {
        title: 'Rust compiler rewrite',
        processed_title: '',
        tokens: [],
        link: 'https://example.com/rust-1',
        source: 'hackernews',
        collected_at: RUN_AT,
      },
      {
        title: 'Rust release notes',
        processed_title: null,
        tokens: null,
        link: 'https://example.com/rust-2',
        source: 'hackernews',
        collected_at: RUN_AT,
      },
      {
        title: 'Compiler bugs in Rust',
        processed_title: 'compiler bugs rust',
        tokens: ['compiler', 'bugs', 'rust'],
        link: 'https://example.com/rust-3',
        source: 'hackernews',
        collected_at: RUN_AT,
      },
    ]);
  });

  it('writes an empty batch as two empty datasets', async () => {
    const result = await new ParquetAdapter({ dataDir: dir, compression: 'SNAPPY' }).persist(makeBatch({ empty: true }));

    expect(result.records).toBe(0);
    expect(result.artifacts).toHaveLength(2);
    expect(await readParquet(result.artifacts[0])).toEqual([]);
    expect(await readParquet(result.artifacts[1])).toEqual([]);
  });
});
