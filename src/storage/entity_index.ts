/**
 * @fileoverview Entity Vector Index
 *
 * Holds one record per (group, canonical, alias) and answers group-filtered
 * nearest-alias queries. The working set lives in memory; every mutation is
 * written through to a {@link RecordStore} first.
 *
 * Derived structures (group index, alias text index, vector index) are marked
 * dirty on mutation and rebuilt before the next read.
 *
 * Concurrency: `sync`, `delete`, `refresh` and `close` take the write lock;
 * `search`, `stats` and `inspect` share the read lock.
 */

import type { EmbeddingService } from '../api/embeddings.js';
import { DeleteError, IndexNotOpenError, type EmbeddingError, type IndexWriteError, type ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import type { EntitySnapshot, IndexRecord, IndexStats, SearchMatch } from '../types.js';
import { ReadWriteLock } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { buildPendingRecords, prepareEntity } from './entity_records.js';
import type { RecordStore } from './types.js';
import { VectorIndex, type HNSWConfig } from './vector_index.js';

export interface SyncReport {
  canonical: string;
  aliases: string[];
  groups: string[];
  recordIds: string[];
  /** Records removed for this canonical (and a renamed predecessor) before writing. */
  staleRemoved: number;
  /** The stale cleanup failed and was skipped; old records may linger. */
  staleCleanupFailed: boolean;
}

export interface DeleteReport {
  canonical: string;
  removed: number;
}

export interface InspectSample {
  id: string;
  canonical: string;
  alias: string;
  group: string;
  recordType: string;
}

export interface InspectReport {
  totalRecords: number;
  sample: InspectSample[];
}

export type SyncError = ValidationError | EmbeddingError | IndexWriteError;

export interface EntityVectorIndexOptions {
  store: RecordStore;
  embeddings: EmbeddingService;
  /** Pool size at and above which search goes through HNSW. */
  approximateThreshold?: number;
  useApproximate?: 'auto' | 'never';
  hnsw?: Partial<HNSWConfig>;
}

export class EntityVectorIndex {
  private readonly store: RecordStore;
  private readonly embeddings: EmbeddingService;
  private readonly vectorIndex: VectorIndex;
  private readonly lock = new ReadWriteLock();

  private records = new Map<string, IndexRecord>();
  private groupIndex = new Map<string, Set<string>>();
  private textIndex = new Map<string, string[]>();
  private dirty = true;
  private opened = false;

  constructor(options: EntityVectorIndexOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.vectorIndex = new VectorIndex({
      useApproximate: options.useApproximate,
      approximateThreshold: options.approximateThreshold,
      hnswConfig: options.hnsw,
    });
  }

  isOpen(): boolean {
    return this.opened;
  }

  /**
   * Load every record from the store and build the derived indices.
   */
  async open(): Promise<this> {
    await this.lock.write(async () => {
      if (!this.store.isInitialized()) {
        await this.store.initialize();
      }
      await this.reload();
      this.opened = true;
    });
    logInfo('Entity index opened', { records: this.records.size, backend: this.store.backend });
    return this;
  }

  /**
   * Reload from the store. Readers queued behind the refresh see the new set.
   */
  async refresh(): Promise<void> {
    this.ensureOpen('refresh');
    await this.lock.write(() => this.reload());
  }

  async close(): Promise<void> {
    await this.lock.write(async () => {
      this.opened = false;
      this.records.clear();
      this.dirty = true;
      await this.store.close();
    });
  }

  // --------------------------------------------------------------------------
  // Mutations
  // --------------------------------------------------------------------------

  /**
   * Replace every record of `snapshot.canonicalName` with freshly embedded
   * ones. When `previous` carries a different canonical name (a rename), its
   * records are removed as well.
   *
   * Stale records are deleted before embedding; an embedding or write failure
   * after that point does not restore them.
   */
  async sync(snapshot: EntitySnapshot, previous?: EntitySnapshot): Promise<Result<SyncReport, SyncError>> {
    this.ensureOpen('sync');
    const prepared = prepareEntity(snapshot);
    if (!prepared.ok) return prepared;
    const entity = prepared.value;

    const staleCanonicals = [entity.canonical];
    const previousCanonical = previous?.canonicalName?.trim();
    if (previousCanonical && previousCanonical !== entity.canonical) {
      staleCanonicals.push(previousCanonical);
    }

    return this.lock.write(async (): Promise<Result<SyncReport, SyncError>> => {
      let staleRemoved = 0;
      let staleCleanupFailed = false;
      for (const canonical of staleCanonicals) {
        try {
          staleRemoved += await this.removeCanonical(canonical);
        } catch (error) {
          staleCleanupFailed = true;
          logWarning('Error deleting stale entity records; continuing', { canonical, error: getErrorMessage(error) });
        }
      }

      const embedded = await this.embeddings.embedAll(entity.aliases);
      if (!embedded.ok) {
        logWarning('Entity sync aborted: embedding failed', { canonical: entity.canonical, error: embedded.error.message });
        return embedded;
      }
      const vectorByAlias = new Map<string, Float32Array>();
      entity.aliases.forEach((alias, i) => {
        const vector = embedded.value[i];
        if (vector) vectorByAlias.set(alias, vector);
      });

      const records: IndexRecord[] = [];
      for (const pending of buildPendingRecords(entity)) {
        const vector = vectorByAlias.get(pending.alias);
        if (vector) records.push({ id: pending.id, vector, metadata: pending.metadata });
      }

      const written = await this.store.putRecords(records);
      if (!written.ok) {
        const committed = new Set(written.error.writtenIds);
        this.addRecords(records.filter((record) => committed.has(record.id)));
        logWarning('Entity sync failed while writing records', {
          canonical: entity.canonical,
          written: written.error.writtenIds.length,
          failed: written.error.failedIds.length,
        });
        return written;
      }
      this.addRecords(records);

      logInfo(`Synced entity '${entity.canonical}'`, {
        aliases: entity.aliases.length,
        groups: entity.groups.length,
        records: records.length,
      });
      return Ok({
        canonical: entity.canonical,
        aliases: entity.aliases,
        groups: entity.groups,
        recordIds: records.map((record) => record.id),
        staleRemoved,
        staleCleanupFailed,
      });
    });
  }

  /**
   * Remove every record of a canonical name. Unknown names are not an error.
   */
  async delete(canonicalName: string): Promise<Result<DeleteReport, DeleteError>> {
    this.ensureOpen('delete');
    const canonical = canonicalName.trim();
    if (!canonical) {
      logWarning('Cannot delete entity without a canonical name');
      return Ok({ canonical, removed: 0 });
    }
    return this.lock.write(async (): Promise<Result<DeleteReport, DeleteError>> => {
      try {
        const removed = await this.removeCanonical(canonical);
        if (removed === 0) {
          logDebug(`Entity '${canonical}' not found in index`);
        } else {
          logInfo(`Deleted entity '${canonical}'`, { records: removed });
        }
        return Ok({ canonical, removed });
      } catch (error) {
        return Err(new DeleteError(canonical, getErrorMessage(error), toError(error)));
      }
    });
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  /**
   * Nearest aliases for each query, restricted to records whose group is in
   * `groupFilter`. A query equal (case-insensitively) to an alias in the pool
   * returns those records at distance 0 and skips embedding.
   */
  async search(
    queries: readonly string[],
    groupFilter: Iterable<string>,
    topK: number,
    maxDistance: number
  ): Promise<Result<SearchMatch[][], EmbeddingError>> {
    this.ensureOpen('search');
    const groups = new Set(groupFilter);
    const limit = Math.max(0, Math.floor(topK));

    return this.lock.read(async (): Promise<Result<SearchMatch[][], EmbeddingError>> => {
      this.rebuild();
      const results: SearchMatch[][] = queries.map(() => []);

      const pool = new Set<string>();
      for (const group of groups) {
        for (const id of this.groupIndex.get(group) ?? []) pool.add(id);
      }
      if (pool.size === 0 || limit === 0) return Ok(results);

      const pendingTexts: string[] = [];
      const pendingSlots: number[] = [];
      queries.forEach((query, i) => {
        const key = query.trim().toLowerCase();
        if (!key) return;
        const exact = (this.textIndex.get(key) ?? []).filter((id) => pool.has(id));
        if (exact.length > 0) {
          results[i] = exact.slice(0, limit).flatMap((id) => this.toMatch(id, 0, true));
          return;
        }
        pendingTexts.push(query);
        pendingSlots.push(i);
      });

      if (pendingTexts.length === 0) return Ok(results);

      const embedded = await this.embeddings.embedAll(pendingTexts);
      if (!embedded.ok) return embedded;

      embedded.value.forEach((vector, j) => {
        const slot = pendingSlots[j];
        if (slot === undefined) return;
        results[slot] = this.vectorIndex
          .search(vector, { limit, maxDistance, pool })
          .flatMap((hit) => this.toMatch(hit.recordId, hit.distance, false));
      });

      logDebug('Entity search', {
        queries: queries.length,
        embedded: pendingTexts.length,
        pool: pool.size,
        approximate: this.vectorIndex.isUsingApproximate(pool.size),
      });
      return Ok(results);
    });
  }

  async stats(): Promise<IndexStats> {
    this.ensureOpen('stats');
    return this.lock.read(() => {
      this.rebuild();
      const perGroupCounts: Record<string, number> = {};
      for (const [group, ids] of this.groupIndex) {
        perGroupCounts[group] = ids.size;
      }
      const first = this.records.values().next();
      return {
        totalRecords: this.records.size,
        vectorDimension: first.done ? 0 : first.value.vector.length,
        perGroupCounts,
        usingApproximate: this.vectorIndex.isUsingApproximate(),
      };
    });
  }

  /**
   * A sample of stored records for debugging.
   */
  async inspect(limit: number = 5): Promise<InspectReport> {
    this.ensureOpen('inspect');
    return this.lock.read(() => {
      const sample: InspectSample[] = [];
      for (const record of this.records.values()) {
        if (sample.length >= limit) break;
        const { canonical, alias, group, recordType } = record.metadata;
        sample.push({ id: record.id, canonical, alias, group, recordType });
      }
      return { totalRecords: this.records.size, sample };
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private ensureOpen(operation: string): void {
    if (!this.opened) throw new IndexNotOpenError(operation);
  }

  private async reload(): Promise<void> {
    const loaded = await this.store.loadAll();
    this.records = new Map(loaded.map((record) => [record.id, record]));
    this.dirty = true;
    this.rebuild();
  }

  /** Store first, then memory; a store failure leaves memory untouched. */
  private async removeCanonical(canonical: string): Promise<number> {
    const removed = await this.store.deleteByCanonical(canonical);
    for (const [id, record] of this.records) {
      if (record.metadata.canonical === canonical) {
        this.records.delete(id);
        this.dirty = true;
      }
    }
    return removed;
  }

  private addRecords(records: readonly IndexRecord[]): void {
    for (const record of records) {
      this.records.set(record.id, record);
    }
    if (records.length > 0) this.dirty = true;
  }

  private rebuild(): void {
    if (!this.dirty) return;
    const groupIndex = new Map<string, Set<string>>();
    const textIndex = new Map<string, string[]>();
    for (const record of this.records.values()) {
      const { group, alias } = record.metadata;
      const groupIds = groupIndex.get(group) ?? new Set<string>();
      groupIds.add(record.id);
      groupIndex.set(group, groupIds);

      const key = alias.toLowerCase();
      const textIds = textIndex.get(key) ?? [];
      textIds.push(record.id);
      textIndex.set(key, textIds);
    }
    this.groupIndex = groupIndex;
    this.textIndex = textIndex;
    this.vectorIndex.load(Array.from(this.records.values(), (record) => ({ recordId: record.id, vector: record.vector })));
    this.dirty = false;
  }

  private toMatch(recordId: string, distance: number, exact: boolean): SearchMatch[] {
    const record = this.records.get(recordId);
    if (!record) return [];
    return [{ recordId, alias: record.metadata.alias, metadata: record.metadata, distance, exact }];
  }
}
