import type { PersistenceError } from '../errors.js';
import type { PersistBatch, PersistResult, StorageKind } from '../types.js';

/**
 * One durable format. Adapters only read the batch; they never mutate records.
 * Failures surface as PersistenceError; an empty batch is never a failure.
 */
export interface StorageAdapter {
  readonly kind: StorageKind;
  persist(batch: PersistBatch): Promise<PersistResult>;
}

export type AdapterOutcome =
  | { kind: StorageKind; ok: true; result: PersistResult }
  | { kind: StorageKind; ok: false; error: PersistenceError };
