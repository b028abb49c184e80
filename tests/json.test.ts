import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildRunDocument, JsonAdapter, loadRunDocument } from '../src/storage/json.js';
import { makeBatch, makeTempDir, removeDir } from './fixtures.js';

describe('buildRunDocument', () => {
  it('joins every raw article with its processed fields', () => {
    const document = buildRunDocument(makeBatch({ skip: [1] }));

    expect(document.metadata).toEqual({
      run_id: 'hackernews_20240301_120000_test',
      source: 'hackernews',
      source_name: 'Hacker News',
      language: 'english',
      run_at: '2024-03-01T12:00:00.000Z',
      total_news: 3,
      processed_news: 2,
      skipped_news: 1,
    });
    expect(document.news[1]).toEqual({
      title: 'Rust release notes',
      processed_title: null,
      tokens: null,
      link: 'https://example.com/rust-2',
      source: 'hackernews',
      collected_at: '2024-03-01T12:00:00.000Z',
    });
    expect(document.analysis).toEqual({
      total_articles: 2,
      total_tokens: 6,
      vocabulary_size: 4,
      lexical_richness: 4 / 6,
      average_tokens_per_article: 3,
      top_words: [
        { word: 'rust', frequency: 2 },
        { word: 'compiler', frequency: 2 },
        { word: 'rewrite', frequency: 1 },
        { word: 'bugs', frequency: 1 },
      ],
    });
  });
});

describe('JsonAdapter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes one indented document per run', async () => {
    const result = await new JsonAdapter({ dataDir: dir, indent: 2 }).persist(makeBatch());
    const file = path.join(dir, 'news_analysis_hackernews_20240301_120000.json');

    expect(result).toEqual({ kind: 'json', location: file, artifacts: [file], records: 3 });
    const text = await readFile(file, 'utf-8');
    expect(text.startsWith('{\n  "metadata": {\n')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
  });

  it('loads back the records it wrote', async () => {
    const batch = makeBatch({ skip: [1] });
    const result = await new JsonAdapter({ dataDir: dir, indent: 2 }).persist(batch);

    const loaded = await loadRunDocument(result.location);
    expect(loaded.raw).toEqual(batch.raw);
    expect(loaded.processed).toEqual(batch.processed);
    expect(loaded.summary).toEqual(batch.summary);
  });

  it('persists an empty batch', async () => {
    const result = await new JsonAdapter({ dataDir: dir, indent: 0 }).persist(makeBatch({ empty: true }));
    const loaded = await loadRunDocument(result.location);

    expect(result.records).toBe(0);
    expect(loaded.document.news).toEqual([]);
    expect(loaded.summary.totalArticles).toBe(0);
  });

  it('rejects documents that do not match the schema', async () => {
    const document = buildRunDocument(makeBatch());
    const tampered = path.join(dir, 'tampered.json');
    await writeFile(tampered, JSON.stringify({ ...document, metadata: { ...document.metadata, language: 'klingon' } }));

    await expect(loadRunDocument(tampered)).rejects.toThrow(/language/);
  });
});
