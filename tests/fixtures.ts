import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { analyze } from '../src/services/frequency.js';
import type { PersistBatch, ProcessedArticle, RawArticle } from '../src/types.js';

export const RUN_AT = new Date('2024-03-01T12:00:00.000Z');

const HEADLINES = [
  { title: 'Rust compiler rewrite', link: 'https://example.com/rust-1', tokens: ['rust', 'compiler', 'rewrite'] },
  { title: 'Rust release notes', link: 'https://example.com/rust-2', tokens: ['rust', 'release', 'notes'] },
  { title: 'Compiler bugs in Rust', link: 'https://example.com/rust-3', tokens: ['compiler', 'bugs', 'rust'] },
];

export interface BatchOptions {
  runId?: string;
  runAt?: Date;
  /** Raw indexes left without a processed counterpart. */
  skip?: number[];
  empty?: boolean;
}

/**
 * Three Hacker News headlines; without skips the summary is
 * rust 3, compiler 2, then rewrite, release, notes, bugs at 1.
 */
export function makeBatch(opts: BatchOptions = {}): PersistBatch {
  const runAt = opts.runAt ?? RUN_AT;
  const headlines = opts.empty ? [] : HEADLINES;
  const skip = new Set(opts.skip ?? []);

  const raw: RawArticle[] = headlines.map(({ title, link }) => ({
    title,
    link,
    source: 'hackernews',
    collectedAt: RUN_AT,
  }));
  const processed: ProcessedArticle[] = [];
  headlines.forEach(({ tokens }, rawIndex) => {
    if (skip.has(rawIndex)) return;
    processed.push({
      ...raw[rawIndex],
      processedTitle: tokens.join(' '),
      tokens,
      language: 'english',
      rawIndex,
    });
  });

  return {
    runId: opts.runId ?? 'hackernews_20240301_120000_test',
    source: 'hackernews',
    language: 'english',
    runAt,
    raw,
    processed,
    summary: analyze(processed),
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'news-lexicon-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
