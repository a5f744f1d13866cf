/**
 * @fileoverview Record storage interface
 *
 * The entity index keeps its working set in memory and persists every
 * mutation through a RecordStore:
 * - SQLite (default, embedded)
 * - In-memory (tests and throwaway indexes)
 */

import type { IndexWriteError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import type { IndexRecord } from '../types.js';

export type StorageBackend = 'sqlite' | 'memory';

/**
 * Durable home of index records. Implementations throw {@link StorageError}
 * from lifecycle, read and delete methods; writes report through a Result
 * because a partial write is meaningful to the caller.
 */
export interface RecordStore {
  readonly backend: StorageBackend;

  initialize(): Promise<void>;
  close(): Promise<void>;
  isInitialized(): boolean;

  /** Every record, in insertion order. */
  loadAll(): Promise<IndexRecord[]>;
  listIdsByCanonical(canonical: string): Promise<string[]>;
  /** Returns how many records were removed; `0` when the canonical is unknown. */
  deleteByCanonical(canonical: string): Promise<number>;
  /**
   * Insert or replace records by id. On failure the error lists the ids that
   * were committed before it.
   */
  putRecords(records: readonly IndexRecord[]): Promise<Result<number, IndexWriteError>>;
  count(): Promise<number>;
}
