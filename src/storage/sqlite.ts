import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { PersistenceError } from '../errors.js';
import { logger } from '../logger.js';
import type { PersistBatch, PersistResult } from '../types.js';
import { toIsoUtc } from '../utils/date.js';
import { indexProcessed, toFrequencyRows } from './rows.js';
import type { StorageAdapter } from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS runs (
    run_id           TEXT    PRIMARY KEY,
    source           TEXT    NOT NULL,
    language         TEXT    NOT NULL,
    run_at           TEXT    NOT NULL,
    total_articles   INTEGER NOT NULL,
    total_tokens     INTEGER NOT NULL,
    vocabulary_size  INTEGER NOT NULL,
    lexical_richness REAL    NOT NULL,
    created_at       TEXT    NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS raw_articles (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id       TEXT    NOT NULL REFERENCES runs(run_id),
    source       TEXT    NOT NULL,
    run_at       TEXT    NOT NULL,
    title        TEXT    NOT NULL,
    link         TEXT    NOT NULL,
    collected_at TEXT    NOT NULL
  );

  CREATE TABLE IF NOT EXISTS processed_articles (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    raw_article_id  INTEGER NOT NULL UNIQUE REFERENCES raw_articles(id),
    run_id          TEXT    NOT NULL REFERENCES runs(run_id),
    source          TEXT    NOT NULL,
    run_at          TEXT    NOT NULL,
    language        TEXT    NOT NULL,
    processed_title TEXT    NOT NULL,
    tokens          TEXT    NOT NULL
  );

  CREATE TABLE IF NOT EXISTS word_frequency (
    id        INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id    TEXT    NOT NULL REFERENCES runs(run_id),
    source    TEXT    NOT NULL,
    run_at    TEXT    NOT NULL,
    rank      INTEGER NOT NULL,
    word      TEXT    NOT NULL,
    frequency INTEGER NOT NULL CHECK (frequency >= 1)
  );

  CREATE INDEX IF NOT EXISTS idx_raw_articles_batch ON raw_articles (source, run_at);
  CREATE INDEX IF NOT EXISTS idx_word_frequency_batch ON word_frequency (source, run_at);
`;

export interface SqliteAdapterOptions {
  dataDir: string;
  filename: string;
}

export interface StoredArticleRow {
  id: number;
  run_id: string;
  source: string;
  title: string;
  link: string;
  collected_at: string;
  processed_title: string | null;
}

export interface StoreStatistics {
  totalArticles: number;
  articlesBySource: Record<string, number>;
  uniqueWordsAnalyzed: number;
  runs: number;
}

/**
 * Relational store. Every persist appends one run inside a single transaction;
 * earlier runs are never touched.
 */
export class SqliteAdapter implements StorageAdapter {
  readonly kind = 'sqlite' as const;
  readonly dbPath: string;

  constructor(opts: SqliteAdapterOptions) {
    this.dbPath = path.resolve(opts.dataDir, opts.filename);
  }

  private open(): Database.Database {
    mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA);
    return db;
  }

  private withDb<T>(fn: (db: Database.Database) => T): T {
    const db = this.open();
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }

  async persist(batch: PersistBatch): Promise<PersistResult> {
    try {
      const inserted = this.withDb((db) => this.insertBatch(db, batch));
      logger.info({ adapter: this.kind, db: this.dbPath, runId: batch.runId, ...inserted }, 'Persisted run to SQLite');
      return {
        kind: this.kind,
        location: this.dbPath,
        artifacts: [this.dbPath],
        records: inserted.raw,
      };
    } catch (err) {
      throw new PersistenceError(this.kind, err);
    }
  }

  private insertBatch(db: Database.Database, batch: PersistBatch): { raw: number; processed: number; words: number } {
    const runAt = toIsoUtc(batch.runAt);
    const { summary } = batch;

    const insertRun = db.prepare(
      `INSERT INTO runs (run_id, source, language, run_at, total_articles, total_tokens, vocabulary_size, lexical_richness)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const insertRaw = db.prepare(
      `INSERT INTO raw_articles (run_id, source, run_at, title, link, collected_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    const insertProcessed = db.prepare(
      `INSERT INTO processed_articles (raw_article_id, run_id, source, run_at, language, processed_title, tokens)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );
    const insertWord = db.prepare(
      `INSERT INTO word_frequency (run_id, source, run_at, rank, word, frequency)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );

    const tx = db.transaction(() => {
      insertRun.run(
        batch.runId,
        batch.source,
        batch.language,
        runAt,
        summary.totalArticles,
        summary.totalTokens,
        summary.vocabularySize,
        summary.lexicalRichness,
      );

      const rawIds: number[] = [];
      for (const article of batch.raw) {
        const result = insertRaw.run(
          batch.runId,
          article.source,
          runAt,
          article.title,
          article.link,
          toIsoUtc(article.collectedAt),
        );
        rawIds.push(Number(result.lastInsertRowid));
      }

      let processed = 0;
      for (const [rawIndex, article] of indexProcessed(batch.processed)) {
        const rawId = rawIds[rawIndex];
        if (rawId === undefined) {
          throw new Error(`Processed article points at missing raw index ${rawIndex}`);
        }
        insertProcessed.run(
          rawId,
          batch.runId,
          article.source,
          runAt,
          article.language,
          article.processedTitle,
          JSON.stringify(article.tokens),
        );
        processed++;
      }

      const words = toFrequencyRows(summary);
      for (const row of words) {
        insertWord.run(batch.runId, batch.source, runAt, row.rank, row.word, row.frequency);
      }

      return { raw: rawIds.length, processed, words: words.length };
    });

    return tx();
  }

  /**
   * Most recently stored raw articles across all runs, newest first.
   */
  recentArticles(limit = 100): StoredArticleRow[] {
    return this.withDb((db) =>
      db
        .prepare<[number], StoredArticleRow>(
          `SELECT r.id, r.run_id, r.source, r.title, r.link, r.collected_at, p.processed_title
           FROM raw_articles r
           LEFT JOIN processed_articles p ON p.raw_article_id = r.id
           ORDER BY r.id DESC
           LIMIT ?`,
        )
        .all(limit),
    );
  }

  statistics(): StoreStatistics {
    return this.withDb((db) => {
      const total = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM raw_articles').get();
      const bySource = db
        .prepare<[], { source: string; count: number }>(
          'SELECT source, COUNT(*) AS count FROM raw_articles GROUP BY source ORDER BY source',
        )
        .all();
      const words = db
        .prepare<[], { count: number }>('SELECT COUNT(DISTINCT word) AS count FROM word_frequency')
        .get();
      const runs = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM runs').get();

      const articlesBySource: Record<string, number> = {};
      for (const row of bySource) articlesBySource[row.source] = row.count;

      return {
        totalArticles: total?.count ?? 0,
        articlesBySource,
        uniqueWordsAnalyzed: words?.count ?? 0,
        runs: runs?.count ?? 0,
      };
    });
  }
}
