/**
 * @fileoverview Storage module exports
 */

export type { StorageBackend, RecordStore } from './types.js';

export { SqliteRecordStore, encodeVector, decodeVector } from './sqlite_storage.js';
export type { SqliteRecordStoreOptions } from './sqlite_storage.js';
export { MemoryRecordStore } from './memory_storage.js';

export {
  RECORD_ID_SEPARATOR,
  recordId,
  normalizeAliases,
  normalizeGroups,
  prepareEntity,
  buildPendingRecords,
} from './entity_records.js';
export type { PreparedEntity, PendingRecord } from './entity_records.js';

export { EntityVectorIndex } from './entity_index.js';
export type {
  SyncReport,
  SyncError,
  DeleteReport,
  InspectSample,
  InspectReport,
  EntityVectorIndexOptions,
} from './entity_index.js';

// Vector Index with HNSW Support
export type {
  VectorIndexItem,
  VectorIndexConfig,
  VectorSearchOptions,
  VectorHit,
  HNSWConfig,
} from './vector_index.js';

export {
  VectorIndex,
  HNSWIndex,
  DEFAULT_HNSW_CONFIG,
  HNSW_AUTO_THRESHOLD,
} from './vector_index.js';
