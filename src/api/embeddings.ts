/**
 * @fileoverview Embedding Service
 *
 * Wraps an {@link EmbeddingProvider} with batching, bounded retries and
 * output validation. Every call resolves to a Result; provider failures
 * surface as {@link EmbeddingError}, never as a thrown exception.
 *
 * Batches within one call may run concurrently, but the call only resolves
 * once every batch has finished, so callers never consume partial output.
 */

import { EmbeddingError } from '../core/errors.js';
import { Err, Ok, withRetry, type Result } from '../core/result.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { normalizeVector } from '../utils/math.js';
import type { EmbeddingProvider } from './embedding_providers/real_embeddings.js';

export interface EmbeddingRetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  nonRetryableErrors: string[];
}

export interface EmbeddingServiceOptions {
  maxBatchSize?: number;
  maxConcurrentBatches?: number;
  retryConfig?: Partial<EmbeddingRetryConfig>;
  /** Re-normalize vectors whose L2 norm drifts from 1. */
  autoNormalize?: boolean;
  normTolerance?: number;
}

const DEFAULT_BATCH_SIZE = 32;
const DEFAULT_MAX_CONCURRENT_BATCHES = 2;
const DEFAULT_NORM_TOLERANCE = 1e-3;

const DEFAULT_EMBEDDING_RETRY_CONFIG: EmbeddingRetryConfig = {
  maxRetries: 2,
  initialDelayMs: 250,
  maxDelayMs: 5_000,
  backoffMultiplier: 2,
  nonRetryableErrors: ['invalid_input', 'does not match', 'Unknown model'],
};

export class EmbeddingService {
  private readonly maxBatchSize: number;
  private readonly maxConcurrentBatches: number;
  private readonly retryConfig: EmbeddingRetryConfig;
  private readonly autoNormalize: boolean;
  private readonly normTolerance: number;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: EmbeddingServiceOptions = {}
  ) {
    this.maxBatchSize = Math.max(1, options.maxBatchSize ?? DEFAULT_BATCH_SIZE);
    this.maxConcurrentBatches = Math.max(1, options.maxConcurrentBatches ?? DEFAULT_MAX_CONCURRENT_BATCHES);
    this.retryConfig = { ...DEFAULT_EMBEDDING_RETRY_CONFIG, ...options.retryConfig };
    this.autoNormalize = options.autoNormalize ?? true;
    this.normTolerance = options.normTolerance ?? DEFAULT_NORM_TOLERANCE;
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  get dimension(): number {
    return this.provider.dimension;
  }

  /**
   * Embed all texts, preserving input order.
   */
  async embedAll(texts: readonly string[]): Promise<Result<Float32Array[], EmbeddingError>> {
    if (texts.length === 0) return Ok([]);

    const invalidIndex = texts.findIndex((text) => text.trim().length === 0);
    if (invalidIndex >= 0) {
      return Err(new EmbeddingError(this.modelId, false, `invalid_input: text at ${invalidIndex} is empty`, texts.length));
    }

    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      batches.push(texts.slice(i, i + this.maxBatchSize));
    }

    const vectors: Float32Array[] = [];
    for (let i = 0; i < batches.length; i += this.maxConcurrentBatches) {
      const window = batches.slice(i, i + this.maxConcurrentBatches);
      const results = await Promise.all(window.map((batch) => this.embedBatch(batch)));
      for (const result of results) {
        if (!result.ok) return result;
        vectors.push(...result.value);
      }
    }

    logDebug('Embedded texts', { count: texts.length, batches: batches.length, model: this.modelId });
    return Ok(vectors);
  }

  private async embedBatch(batch: string[]): Promise<Result<Float32Array[], EmbeddingError>> {
    const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier, nonRetryableErrors } = this.retryConfig;
    const isRetryable = (error: Error): boolean =>
      !nonRetryableErrors.some((marker) => error.message.includes(marker));
    const result = await withRetry(() => this.provider.embed(batch), {
      maxRetries,
      delayMs: initialDelayMs,
      maxDelayMs,
      backoffMultiplier,
      shouldRetry: isRetryable,
      onRetry: (error, attempt) => {
        logWarning('Embedding batch failed, retrying', { attempt, size: batch.length, error: error.message });
      },
    });
    if (!result.ok) {
      return Err(new EmbeddingError(this.modelId, isRetryable(result.error), result.error.message, batch.length));
    }
    return this.validate(batch, result.value);
  }

  private validate(batch: string[], vectors: Float32Array[]): Result<Float32Array[], EmbeddingError> {
    if (vectors.length !== batch.length) {
      return Err(new EmbeddingError(
        this.modelId,
        false,
        `provider returned ${vectors.length} vectors for ${batch.length} inputs`,
        batch.length
      ));
    }
    const checked: Float32Array[] = [];
    for (const vector of vectors) {
      if (vector.length !== this.dimension) {
        return Err(new EmbeddingError(
          this.modelId,
          false,
          `expected dimension ${this.dimension}, got ${vector.length}`,
          batch.length
        ));
      }
      let norm = 0;
      for (const value of vector) {
        if (!Number.isFinite(value)) {
          return Err(new EmbeddingError(this.modelId, false, 'vector contains non-finite values', batch.length));
        }
        norm += value * value;
      }
      const drift = Math.abs(Math.sqrt(norm) - 1);
      checked.push(this.autoNormalize && drift > this.normTolerance ? normalizeVector(vector) : vector);
    }
    return Ok(checked);
  }
}
