/**
 * @fileoverview SQLite record store
 *
 * Uses better-sqlite3 for synchronous, fast operations. Vectors are stored as
 * little-endian Float32 BLOBs and round-trip bit for bit. A proper-lockfile
 * lock next to the database keeps a second process from opening it for
 * writing at the same time.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import lockfile from 'proper-lockfile';
import { IndexWriteError, StorageError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { IndexMetadata, IndexRecord } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type { RecordStore } from './types.js';

const LOCK_STALE_TIMEOUT_MS = 15 * 60_000; // 15 minutes
const LOCK_UPDATE_INTERVAL_MS = 60_000; // 1 minute
const LOCK_MAX_RETRIES = 12;
const DEFAULT_WRITE_BATCH_SIZE = 256;
const SCHEMA_VERSION = 1;
const IN_MEMORY_PATH = ':memory:';

export interface SqliteRecordStoreOptions {
  /** Lock acquisition attempts before giving up. */
  lockRetries?: number;
  /** Records committed per transaction in `putRecords`. */
  writeBatchSize?: number;
}

interface RecordRow {
  id: string;
  canonical: string;
  alias: string;
  entity_group: string;
  record_type: string;
  related_record_types: string;
  vector: Buffer;
  dimension: number;
}

// ============================================================================
// VECTOR ENCODING
// ============================================================================

export function encodeVector(vector: Float32Array): Buffer {
  const buffer = Buffer.allocUnsafe(vector.length * 4);
  for (let i = 0; i < vector.length; i += 1) {
    buffer.writeFloatLE(vector[i] ?? 0, i * 4);
  }
  return buffer;
}

export function decodeVector(blob: Buffer, dimension: number): Float32Array {
  if (blob.length !== dimension * 4) {
    throw new Error(`vector blob holds ${blob.length} bytes, expected ${dimension * 4}`);
  }
  const vector = new Float32Array(dimension);
  for (let i = 0; i < dimension; i += 1) {
    vector[i] = blob.readFloatLE(i * 4);
  }
  return vector;
}

function rowToRecord(row: RecordRow): IndexRecord {
  const metadata: IndexMetadata = {
    canonical: row.canonical,
    alias: row.alias,
    group: row.entity_group,
    recordType: row.record_type,
    relatedRecordTypes: row.related_record_types,
  };
  return { id: row.id, vector: decodeVector(row.vector, row.dimension), metadata };
}

// ============================================================================
// SQLITE RECORD STORE
// ============================================================================

export class SqliteRecordStore implements RecordStore {
  readonly backend = 'sqlite' as const;
  private db: Database.Database | null = null;
  private readonly lockPath: string;
  private readonly lockRetries: number;
  private readonly writeBatchSize: number;
  private releaseLock: (() => Promise<void>) | null = null;
  private lockCompromisedError: Error | null = null;
  private initialized = false;

  constructor(
    private readonly dbPath: string,
    options: SqliteRecordStoreOptions = {}
  ) {
    this.lockPath = `${dbPath}.lock`;
    this.lockRetries = options.lockRetries ?? LOCK_MAX_RETRIES;
    this.writeBatchSize = Math.max(1, options.writeBatchSize ?? DEFAULT_WRITE_BATCH_SIZE);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    // An in-memory database is private to this connection; nothing to lock.
    if (this.dbPath !== IN_MEMORY_PATH) {
      try {
        await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
        await fs.writeFile(this.dbPath, '', { flag: 'a' });
      } catch (error) {
        throw new StorageError('open', false, `cannot create ${this.dbPath}: ${getErrorMessage(error)}`, toError(error));
      }
      await this.acquireLock();
    }

    try {
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('busy_timeout = 5000');
      this.migrate(this.db);
      this.initialized = true;
      logDebug('Opened SQLite record store', { path: this.dbPath });
    } catch (error) {
      if (this.db) {
        this.db.close();
        this.db = null;
      }
      await this.release('initialization cleanup');
      throw error instanceof StorageError
        ? error
        : new StorageError('open', false, getErrorMessage(error), toError(error));
    }
  }

  async close(): Promise<void> {
    try {
      if (this.db) {
        this.db.close();
        this.db = null;
      }
    } finally {
      this.initialized = false;
      await this.release('close');
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async loadAll(): Promise<IndexRecord[]> {
    const db = this.ensureDb('read');
    const rows = db.prepare<[], RecordRow>('SELECT * FROM entity_records ORDER BY rowid').all();
    return rows.map(rowToRecord);
  }

  async listIdsByCanonical(canonical: string): Promise<string[]> {
    const db = this.ensureDb('read');
    return db
      .prepare<[string], { id: string }>('SELECT id FROM entity_records WHERE canonical = ? ORDER BY rowid')
      .all(canonical)
      .map((row) => row.id);
  }

  async deleteByCanonical(canonical: string): Promise<number> {
    const db = this.ensureDb('delete');
    try {
      return db.prepare<[string]>('DELETE FROM entity_records WHERE canonical = ?').run(canonical).changes;
    } catch (error) {
      throw new StorageError('delete', true, getErrorMessage(error), toError(error));
    }
  }

  async putRecords(records: readonly IndexRecord[]): Promise<Result<number, IndexWriteError>> {
    let db: Database.Database;
    try {
      db = this.ensureDb('write');
    } catch (error) {
      return Err(new IndexWriteError(getErrorMessage(error), [], records.map((r) => r.id), toError(error)));
    }

    const insert = db.prepare<[string, string, string, string, string, string, Buffer, number]>(`
      INSERT OR REPLACE INTO entity_records
        (id, canonical, alias, entity_group, record_type, related_record_types, vector, dimension)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertMany = db.transaction((batch: readonly IndexRecord[]) => {
      for (const { id, vector, metadata } of batch) {
        insert.run(
          id,
          metadata.canonical,
          metadata.alias,
          metadata.group,
          metadata.recordType,
          metadata.relatedRecordTypes,
          encodeVector(vector),
          vector.length
        );
      }
    });

    const writtenIds: string[] = [];
    for (let offset = 0; offset < records.length; offset += this.writeBatchSize) {
      const batch = records.slice(offset, offset + this.writeBatchSize);
      try {
        insertMany(batch);
      } catch (error) {
        const failedIds = records.slice(offset).map((r) => r.id);
        logWarning('SQLite record write failed', { written: writtenIds.length, failed: failedIds.length });
        return Err(new IndexWriteError(getErrorMessage(error), writtenIds, failedIds, toError(error)));
      }
      writtenIds.push(...batch.map((r) => r.id));
    }
    return Ok(writtenIds.length);
  }

  async count(): Promise<number> {
    const db = this.ensureDb('read');
    const row = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM entity_records').get();
    return row?.total ?? 0;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private migrate(db: Database.Database): void {
    const version = db.pragma('user_version', { simple: true });
    if (version === SCHEMA_VERSION) return;
    if (typeof version === 'number' && version > SCHEMA_VERSION) {
      throw new StorageError('migrate', false, `database schema v${version} is newer than supported v${SCHEMA_VERSION}`);
    }
    db.exec(`
      CREATE TABLE IF NOT EXISTS entity_records (
        id TEXT PRIMARY KEY,
        canonical TEXT NOT NULL,
        alias TEXT NOT NULL,
        entity_group TEXT NOT NULL,
        record_type TEXT NOT NULL DEFAULT '',
        related_record_types TEXT NOT NULL DEFAULT '',
        vector BLOB NOT NULL,
        dimension INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_entity_records_canonical ON entity_records(canonical);
      CREATE INDEX IF NOT EXISTS idx_entity_records_group ON entity_records(entity_group);
    `);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  }

  private async acquireLock(): Promise<void> {
    try {
      // proper-lockfile throws an uncaught exception when a lock is compromised
      // unless onCompromised is provided.
      this.releaseLock = await lockfile.lock(this.dbPath, {
        lockfilePath: this.lockPath,
        stale: LOCK_STALE_TIMEOUT_MS,
        update: LOCK_UPDATE_INTERVAL_MS,
        onCompromised: (err) => {
          this.lockCompromisedError = err;
          logWarning('SQLite lock compromised; treating storage as unsafe', {
            path: this.lockPath,
            error: err.message,
          });
          try {
            if (this.db) {
              this.db.close();
              this.db = null;
            }
          } catch (closeError) {
            logWarning('Failed to close DB after lock compromise', { path: this.dbPath, error: getErrorMessage(closeError) });
          }
          this.release('compromise').catch((releaseError: unknown) => {
            logWarning('Failed to release lock after compromise', { error: getErrorMessage(releaseError) });
          });
        },
        retries: {
          retries: this.lockRetries,
          factor: 1.5,
          minTimeout: 200,
          maxTimeout: 10_000,
        },
      });
    } catch (error) {
      throw new StorageError('lock', true, `database is locked (${this.lockPath}): ${getErrorMessage(error)}`, toError(error));
    }
  }

  private async release(reason: string): Promise<void> {
    const release = this.releaseLock;
    this.releaseLock = null;
    if (!release) return;
    await release().catch((lockError: unknown) => {
      logWarning(`Failed to release lock during ${reason}`, { path: this.lockPath, error: getErrorMessage(lockError) });
    });
  }

  private ensureDb(operation: 'read' | 'write' | 'delete'): Database.Database {
    if (this.lockCompromisedError) {
      throw new StorageError(operation, false, `lock compromised: ${this.lockCompromisedError.message}`);
    }
    if (!this.db) {
      throw new StorageError(operation, false, 'Storage not initialized. Call initialize() first.');
    }
    return this.db;
  }
}
