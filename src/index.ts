/**
 * @fileoverview Entity Resolver - map natural-language query fragments to business entities
 *
 * Entities (a canonical name, comma-separated aliases, the groups they belong
 * to and their record types) are embedded alias by alias into a persistent
 * vector index. A query is split into phrase, word and vocabulary-expanded
 * candidates; each candidate is matched against the index and scored by
 * exact, fuzzy and semantic similarity.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createEntityResolver } from 'entity-resolver';
 *
 * const resolver = await createEntityResolver();
 * await resolver.sync({
 *   canonicalName: 'Sales Order',
 *   aliases: 'sales, order, so',
 *   groups: ['Sales'],
 *   recordType: 'Sales Order',
 * });
 *
 * const result = await resolver.resolve('most sold product in orders', { entityGroups: ['Sales'] });
 * if (result.ok) console.log(result.value.entityMappings);
 * await resolver.close();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PRIMARY ENTRY POINT
// ============================================================================

export { EntityResolver, createEntityResolver } from './api/resolver.js';
export type { EntityResolverOptions } from './api/resolver.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  ResolverConfigSchema,
  DEFAULT_CONFIG,
  EMBEDDING_MODEL_IDS,
  loadConfig,
  parseConfig,
} from './config/index.js';
export type { ResolverConfig, ResolverConfigInput, LoadConfigOptions } from './config/index.js';

// ============================================================================
// EMBEDDINGS
// ============================================================================

export { EmbeddingService } from './api/embeddings.js';
export type { EmbeddingServiceOptions, EmbeddingRetryConfig } from './api/embeddings.js';
export {
  XenovaEmbeddingProvider,
  EMBEDDING_MODELS,
  DEFAULT_EMBEDDING_MODEL,
  isXenovaAvailable,
} from './api/embedding_providers/real_embeddings.js';
export type { EmbeddingProvider, EmbeddingModelId } from './api/embedding_providers/real_embeddings.js';

// ============================================================================
// STORAGE AND INDEX
// ============================================================================

export * from './storage/index.js';

// ============================================================================
// QUERY RESOLUTION
// ============================================================================

export { ResolutionPipeline } from './query/pipeline.js';
export type {
  ResolveOptions,
  ResolutionResult,
  ResolutionDiagnostics,
  ResolutionError,
  ResolutionPipelineOptions,
} from './query/pipeline.js';
export {
  CandidateGenerator,
  generateCandidates,
  normalizeQuery,
  tokenize,
} from './query/candidate_generator.js';
export type { CandidateGeneration, CandidateGeneratorOptions, GenerateOptions } from './query/candidate_generator.js';
export { matchCandidates, scoreMatch, vectorSimilarity, DEFAULT_MATCH_OPTIONS } from './query/candidate_matcher.js';
export type { EntitySearcher, MatchOptions, MatchOutcome } from './query/candidate_matcher.js';
export { BusinessVocabularyExpander, loadBusinessVocabulary, DEFAULT_BUSINESS_DOMAIN } from './query/business_vocabulary.js';
export type { BusinessVocabulary, ExpansionMap, VocabularyExpander } from './query/business_vocabulary.js';
export { StaticSchemaGraph, buildSchemaContext } from './query/schema_context.js';
export type { SchemaContext, SchemaGraphProvider, RelatedRecordType } from './query/schema_context.js';
export { fuzzyRatio } from './query/fuzzy.js';

// ============================================================================
// ENTITY LIFECYCLE EVENTS
// ============================================================================

export {
  EntityEventBus,
  createEntityCreatedEvent,
  createEntityUpdatedEvent,
  createEntityDeletedEvent,
} from './events.js';
export type { EntityEvent, EntityEventType, EntityEventListener } from './events.js';
export { EntityEventHandler } from './ingest/entity_events.js';
export type { EntityEventOutcome } from './ingest/entity_events.js';
export { parseSnapshots, readSnapshotFile } from './ingest/snapshot_file.js';

// ============================================================================
// ERRORS AND RESULTS
// ============================================================================

export {
  ResolverError,
  ValidationError,
  EmbeddingError,
  StorageError,
  IndexWriteError,
  DeleteError,
  IndexNotOpenError,
  ResolutionTimeoutError,
  isResolverError,
  isRetryableError,
} from './core/errors.js';
export type { ErrorJSON, StorageOperation } from './core/errors.js';
export { Ok, Err, unwrap } from './core/result.js';
export type { Result } from './core/result.js';

// ============================================================================
// TYPES
// ============================================================================

export type {
  EntitySnapshot,
  EntityGroupRow,
  IndexMetadata,
  IndexRecord,
  IndexStats,
  SearchMatch,
  Candidate,
  CandidateType,
  CandidatePriority,
  EntityMapping,
  ResolutionContext,
} from './types.js';
export { CANDIDATE_PRIORITY, DEFAULT_ENTITY_GROUP } from './types.js';

export { setLogLevel, getLogLevel } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';

export { RESOLVER_VERSION } from './version.js';
