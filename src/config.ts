/**
 * Centralized configuration loader for News Lexicon.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (see .env.example):
 * - LOG_LEVEL (default: info), LOG_FILE (optional, mirrors logs to a file)
 * - DATA_DIR (default: ./data)
 * - SQLITE_DB_NAME (default: news_data.db)
 * - STORAGE=sqlite,csv,parquet,json|all (default: all)
 * - TOP_WORDS (default: 20)
 * - KEEP_DIGITS=1|0 (default: 0)
 * - MIN_TOKEN_LENGTH (default: 2, never below 2)
 * - CUSTOM_STOPWORDS_EN / CUSTOM_STOPWORDS_PT (comma separated, optional)
 * - PARQUET_COMPRESSION=UNCOMPRESSED|GZIP|SNAPPY|BROTLI (default: SNAPPY)
 * - JSON_INDENT (default: 2)
 * - SCRAPE_TIMEOUT_MS (default: 10000), SCRAPE_MAX_ITEMS (default: 30), USER_AGENT
 */

import { config } from 'dotenv';
import type { Language, StorageKind } from './types.js';

config();

export const STORAGE_KINDS: readonly StorageKind[] = ['sqlite', 'csv', 'parquet', 'json'];

export type ParquetCodec = 'UNCOMPRESSED' | 'GZIP' | 'SNAPPY' | 'BROTLI';

/** Tokens shorter than this are always dropped. */
export const MIN_TOKEN_LENGTH_FLOOR = 2;

const PARQUET_CODECS: readonly ParquetCodec[] = ['UNCOMPRESSED', 'GZIP', 'SNAPPY', 'BROTLI'];

export interface AppConfig {
  logLevel: string;
  logFile?: string;
  dataDir: string;
  /** Raw STORAGE value; resolved by `resolveStorage` only when no explicit selection is given. */
  storageSelection?: string;
  sqlite: {
    filename: string;
  };
  parquet: {
    compression: ParquetCodec;
  };
  json: {
    indent: number;
  };
  text: {
    keepDigits: boolean;
    minTokenLength: number;
    customStopwords: Record<Language, string[]>;
  };
  analysis: {
    topWords: number;
  };
  scraper: {
    timeoutMs: number;
    maxItems: number;
    userAgent: string;
  };
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function isStorageKind(value: string): value is StorageKind {
  return STORAGE_KINDS.some((kind) => kind === value);
}

/**
 * Resolve a storage selection ("all" or a comma-separated list of kinds).
 * Unknown kinds throw; duplicates collapse.
 */
export function parseStorageSelection(value: string | undefined): StorageKind[] {
  const entries = parseList(value?.toLowerCase());
  if (!entries.length || entries.includes('all')) return [...STORAGE_KINDS];

  const kinds: StorageKind[] = [];
  for (const entry of entries) {
    if (!isStorageKind(entry)) {
      throw new Error(`Unknown storage kind: ${entry} (expected ${STORAGE_KINDS.join(', ')} or all)`);
    }
    if (!kinds.includes(entry)) kinds.push(entry);
  }
  return kinds;
}

/**
 * Storage kinds selected through the environment.
 */
export function resolveStorage(cfg: AppConfig = getConfig()): StorageKind[] {
  return parseStorageSelection(cfg.storageSelection);
}

function parseCodec(value: string | undefined): ParquetCodec {
  const upper = value?.trim().toUpperCase();
  const match = PARQUET_CODECS.find((codec) => codec === upper);
  return match ?? 'SNAPPY';
}

export function getConfig(): AppConfig {
  const logLevel = process.env.LOG_LEVEL?.trim() || 'info';
  const logFile = process.env.LOG_FILE?.trim() || undefined;
  const dataDir = process.env.DATA_DIR?.trim() || './data';

  return {
    logLevel,
    logFile,
    dataDir,
    storageSelection: process.env.STORAGE?.trim() || undefined,
    sqlite: {
      filename: process.env.SQLITE_DB_NAME?.trim() || 'news_data.db',
    },
    parquet: {
      compression: parseCodec(process.env.PARQUET_COMPRESSION),
    },
    json: {
      indent: parseNumber(process.env.JSON_INDENT) ?? 2,
    },
    text: {
      keepDigits: parseFlag(process.env.KEEP_DIGITS),
      minTokenLength: Math.max(
        MIN_TOKEN_LENGTH_FLOOR,
        parseNumber(process.env.MIN_TOKEN_LENGTH) ?? MIN_TOKEN_LENGTH_FLOOR,
      ),
      customStopwords: {
        english: parseList(process.env.CUSTOM_STOPWORDS_EN),
        portuguese: parseList(process.env.CUSTOM_STOPWORDS_PT),
      },
    },
    analysis: {
      topWords: parseNumber(process.env.TOP_WORDS) ?? 20,
    },
    scraper: {
      timeoutMs: parseNumber(process.env.SCRAPE_TIMEOUT_MS) ?? 10_000,
      maxItems: parseNumber(process.env.SCRAPE_MAX_ITEMS) ?? 30,
      userAgent:
        process.env.USER_AGENT?.trim() || 'Mozilla/5.0 (compatible; news-lexicon/0.1)',
    },
  };
}
