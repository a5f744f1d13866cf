/**
 * @fileoverview Entity resolver facade
 *
 * Wires configuration, embeddings, the record store, the entity index and
 * the resolution pipeline into one handle.
 *
 * @example
 * ```typescript
 * const resolver = await createEntityResolver({ config });
 * await resolver.sync({ canonicalName: 'Customer', aliases: 'client, account', groups: ['CRM'] });
 * const result = await resolver.resolve('client', { entityGroups: ['CRM'] });
 * await resolver.close();
 * ```
 */

import { DEFAULT_CONFIG, type ResolverConfig } from '../config/index.js';
import type { DeleteError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import { EntityEventBus } from '../events.js';
import { EntityEventHandler } from '../ingest/entity_events.js';
import { BusinessVocabularyExpander } from '../query/business_vocabulary.js';
import { CandidateGenerator } from '../query/candidate_generator.js';
import {
  ResolutionPipeline,
  type ResolutionError,
  type ResolutionResult,
  type ResolveOptions,
} from '../query/pipeline.js';
import type { SchemaGraphProvider } from '../query/schema_context.js';
import {
  EntityVectorIndex,
  type DeleteReport,
  type InspectReport,
  type SyncError,
  type SyncReport,
} from '../storage/entity_index.js';
import { SqliteRecordStore } from '../storage/sqlite_storage.js';
import type { RecordStore } from '../storage/types.js';
import { setLogLevel } from '../telemetry/logger.js';
import type { EntitySnapshot, IndexStats } from '../types.js';
import { XenovaEmbeddingProvider, type EmbeddingProvider } from './embedding_providers/real_embeddings.js';
import { EmbeddingService } from './embeddings.js';

export interface EntityResolverOptions {
  config?: ResolverConfig;
  /** Defaults to the local model named by `config.embedding.model`. */
  provider?: EmbeddingProvider;
  /** Defaults to a SQLite store at `config.dbPath`. */
  store?: RecordStore;
  schemaGraph?: SchemaGraphProvider;
  vocabulary?: BusinessVocabularyExpander;
}

export class EntityResolver {
  readonly events = new EntityEventBus();
  private readonly detach: () => void;

  constructor(
    readonly index: EntityVectorIndex,
    readonly pipeline: ResolutionPipeline,
    readonly config: ResolverConfig
  ) {
    this.detach = new EntityEventHandler(index).attach(this.events);
  }

  resolve(query: string, options: ResolveOptions): Promise<Result<ResolutionResult, ResolutionError>> {
    return this.pipeline.resolve(query, options);
  }

  sync(snapshot: EntitySnapshot, previous?: EntitySnapshot): Promise<Result<SyncReport, SyncError>> {
    return this.index.sync(snapshot, previous);
  }

  delete(canonicalName: string): Promise<Result<DeleteReport, DeleteError>> {
    return this.index.delete(canonicalName);
  }

  stats(): Promise<IndexStats> {
    return this.index.stats();
  }

  inspect(limit?: number): Promise<InspectReport> {
    return this.index.inspect(limit);
  }

  async close(): Promise<void> {
    this.detach();
    await this.index.close();
  }
}

/**
 * Build and open a resolver. The index is loaded from the store before this
 * resolves.
 */
export async function createEntityResolver(options: EntityResolverOptions = {}): Promise<EntityResolver> {
  const config = options.config ?? DEFAULT_CONFIG;
  setLogLevel(config.logLevel);

  const provider = options.provider ?? new XenovaEmbeddingProvider(config.embedding.model);
  const embeddings = new EmbeddingService(provider, {
    maxBatchSize: config.embedding.maxBatchSize,
    retryConfig: {
      maxRetries: config.embedding.maxRetries,
      initialDelayMs: config.embedding.retryDelayMs,
    },
  });

  const index = new EntityVectorIndex({
    store: options.store ?? new SqliteRecordStore(config.dbPath),
    embeddings,
    approximateThreshold: config.index.approximateThreshold,
    useApproximate: config.index.useApproximate,
    hnsw: config.index.hnsw,
  });
  await index.open();

  const vocabulary = options.vocabulary ?? new BusinessVocabularyExpander();
  const pipeline = new ResolutionPipeline({
    index,
    generator: new CandidateGenerator({
      maxChunkGap: config.generator.maxChunkGap,
      minWordLength: config.generator.minWordLength,
      expander: vocabulary.asExpander(),
    }),
    schemaGraph: options.schemaGraph,
    matching: config.matching,
    defaultBusinessDomain: config.resolution.defaultBusinessDomain,
    searchBudgetMs: config.resolution.searchBudgetMs,
  });

  return new EntityResolver(index, pipeline, config);
}
