import { getConfig, type AppConfig } from '../config.js';
import { PersistenceError } from '../errors.js';
import { logger } from '../logger.js';
import type { PersistBatch, StorageKind } from '../types.js';
import { CsvAdapter } from './csv.js';
import { JsonAdapter } from './json.js';
import { ParquetAdapter } from './parquet.js';
import { SqliteAdapter } from './sqlite.js';
import type { AdapterOutcome, StorageAdapter } from './types.js';

export type { AdapterOutcome, StorageAdapter } from './types.js';
export { CsvAdapter, readCsv } from './csv.js';
export { JsonAdapter, buildRunDocument, loadRunDocument } from './json.js';
export { ParquetAdapter, readParquet, readParquetArticles } from './parquet.js';
export { SqliteAdapter } from './sqlite.js';

export function createAdapter(kind: StorageKind, cfg: AppConfig = getConfig()): StorageAdapter {
  switch (kind) {
    case 'sqlite':
      return new SqliteAdapter({ dataDir: cfg.dataDir, filename: cfg.sqlite.filename });
    case 'csv':
      return new CsvAdapter({ dataDir: cfg.dataDir });
    case 'parquet':
      return new ParquetAdapter({ dataDir: cfg.dataDir, compression: cfg.parquet.compression });
    case 'json':
      return new JsonAdapter({ dataDir: cfg.dataDir, indent: cfg.json.indent });
  }
}

/**
 * Explicit adapter list for the configured selection, in selection order.
 */
export function createAdapters(kinds: readonly StorageKind[], cfg: AppConfig = getConfig()): StorageAdapter[] {
  return kinds.map((kind) => createAdapter(kind, cfg));
}

/**
 * Run every adapter concurrently, each behind its own error boundary.
 * Never rejects: one outcome per adapter, in adapter order.
 */
export async function persistAll(
  adapters: readonly StorageAdapter[],
  batch: PersistBatch,
): Promise<AdapterOutcome[]> {
  return Promise.all(
    adapters.map(async (adapter): Promise<AdapterOutcome> => {
      try {
        const result = await adapter.persist(batch);
        return { kind: adapter.kind, ok: true, result };
      } catch (err) {
        const error = err instanceof PersistenceError ? err : new PersistenceError(adapter.kind, err);
        logger.error({ adapter: adapter.kind, err: error.cause }, 'Adapter failed to persist run');
        return { kind: adapter.kind, ok: false, error };
      }
    }),
  );
}
