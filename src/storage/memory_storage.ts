/**
 * @fileoverview Map-backed RecordStore. Nothing survives the process.
 */

import { StorageError, type IndexWriteError } from '../core/errors.js';
import { Ok, type Result } from '../core/result.js';
import type { IndexRecord } from '../types.js';
import type { RecordStore } from './types.js';

export class MemoryRecordStore implements RecordStore {
  readonly backend = 'memory' as const;
  private readonly records = new Map<string, IndexRecord>();
  private initialized = false;

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async close(): Promise<void> {
    this.initialized = false;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async loadAll(): Promise<IndexRecord[]> {
    this.ensureInitialized('read');
    return Array.from(this.records.values());
  }

  async listIdsByCanonical(canonical: string): Promise<string[]> {
    this.ensureInitialized('read');
    const ids: string[] = [];
    for (const record of this.records.values()) {
      if (record.metadata.canonical === canonical) ids.push(record.id);
    }
    return ids;
  }

  async deleteByCanonical(canonical: string): Promise<number> {
    const ids = await this.listIdsByCanonical(canonical);
    for (const id of ids) {
      this.records.delete(id);
    }
    return ids.length;
  }

  async putRecords(records: readonly IndexRecord[]): Promise<Result<number, IndexWriteError>> {
    this.ensureInitialized('write');
    for (const record of records) {
      this.records.set(record.id, { ...record, vector: new Float32Array(record.vector) });
    }
    return Ok(records.length);
  }

  async count(): Promise<number> {
    this.ensureInitialized('read');
    return this.records.size;
  }

  private ensureInitialized(operation: 'read' | 'write'): void {
    if (!this.initialized) {
      throw new StorageError(operation, false, 'Storage not initialized. Call initialize() first.');
    }
  }
}
