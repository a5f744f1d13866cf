/**
 * @fileoverview Real Embedding Providers
 *
 * Sentence embeddings from a dedicated model run locally through
 * @xenova/transformers (pure JS, works offline once the model is cached).
 *
 * Available Models:
 * - all-MiniLM-L6-v2: General NLP (384 dimensions), the default
 * - bge-small-en-v1.5: BGE small (384 dimensions)
 * - jina-embeddings-v2-base-en: Large context (768 dimensions)
 */

import { logInfo, logWarning } from '../../telemetry/logger.js';

export const EMBEDDING_MODELS = {
  'all-MiniLM-L6-v2': {
    xenovaId: 'Xenova/all-MiniLM-L6-v2',
    dimension: 384,
    quantized: true,
  },
  'bge-small-en-v1.5': {
    xenovaId: 'Xenova/bge-small-en-v1.5',
    dimension: 384,
    quantized: false,
  },
  'jina-embeddings-v2-base-en': {
    xenovaId: 'Xenova/jina-embeddings-v2-base-en',
    dimension: 768,
    quantized: false,
  },
} as const;

export type EmbeddingModelId = keyof typeof EMBEDDING_MODELS;

export const DEFAULT_EMBEDDING_MODEL: EmbeddingModelId = 'all-MiniLM-L6-v2';

/**
 * Converts text to fixed-dimension dense vectors. Implementations must return
 * exactly one vector per input, in input order.
 */
export interface EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;
  embed(texts: readonly string[]): Promise<Float32Array[]>;
}

interface ExtractorOutput {
  data: ArrayLike<number>;
  dims: number[];
}

function isExtractorOutput(value: unknown): value is ExtractorOutput {
  if (typeof value !== 'object' || value === null) return false;
  if (!('data' in value) || !('dims' in value)) return false;
  const { data, dims } = value;
  return (
    typeof data === 'object' &&
    data !== null &&
    'length' in data &&
    Array.isArray(dims) &&
    dims.every((d) => typeof d === 'number')
  );
}

type Extractor = (texts: string[], options: { pooling: 'mean'; normalize: boolean }) => Promise<unknown>;

// Lazy-loaded transformers pipelines (one per model)
const pipelineLoadings = new Map<string, Promise<Extractor>>();

async function loadExtractor(modelId: EmbeddingModelId): Promise<Extractor> {
  const model = EMBEDDING_MODELS[modelId];
  const { pipeline: createPipeline } = await import('@xenova/transformers');

  logInfo(`Loading embedding model (${modelId})...`);
  const pipe: unknown = await createPipeline('feature-extraction', model.xenovaId, {
    quantized: model.quantized,
  });
  if (typeof pipe !== 'function') {
    throw new Error(`feature-extraction pipeline for ${modelId} is not callable`);
  }
  logInfo(`Embedding model ${modelId} loaded`);
  return async (texts, options) => {
    const output: unknown = await pipe(texts, options);
    return output;
  };
}

/**
 * Initialize the @xenova/transformers pipeline for a specific model.
 * Lazy-loaded on first use; a failed load is forgotten so the next call retries.
 */
function getExtractor(modelId: EmbeddingModelId): Promise<Extractor> {
  const cached = pipelineLoadings.get(modelId);
  if (cached) return cached;

  const loading = loadExtractor(modelId).catch((error: unknown) => {
    logWarning(`Failed to load @xenova/transformers model ${modelId}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    pipelineLoadings.delete(modelId);
    throw error;
  });
  pipelineLoadings.set(modelId, loading);
  return loading;
}

/**
 * Split a `[n, dim]` tensor payload into one vector per input.
 */
export function splitRows(output: unknown, expectedRows: number): Float32Array[] {
  if (!isExtractorOutput(output)) {
    throw new Error('feature-extraction output has no tensor data');
  }
  const dimension = output.dims[output.dims.length - 1] ?? 0;
  if (dimension <= 0 || output.data.length !== expectedRows * dimension) {
    throw new Error(
      `feature-extraction output shape [${output.dims.join(', ')}] does not match ${expectedRows} inputs`
    );
  }
  const rows: Float32Array[] = [];
  for (let row = 0; row < expectedRows; row += 1) {
    const vector = new Float32Array(dimension);
    for (let col = 0; col < dimension; col += 1) {
      vector[col] = output.data[row * dimension + col] ?? 0;
    }
    rows.push(vector);
  }
  return rows;
}

export class XenovaEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: EmbeddingModelId;
  readonly dimension: number;

  constructor(modelId: EmbeddingModelId = DEFAULT_EMBEDDING_MODEL) {
    if (!Object.hasOwn(EMBEDDING_MODELS, modelId)) {
      throw new Error(`Unknown model: ${modelId}. Available: ${Object.keys(EMBEDDING_MODELS).join(', ')}`);
    }
    this.modelId = modelId;
    this.dimension = EMBEDDING_MODELS[modelId].dimension;
  }

  async embed(texts: readonly string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    const extractor = await getExtractor(this.modelId);
    const output = await extractor([...texts], { pooling: 'mean', normalize: true });
    return splitRows(output, texts.length);
  }
}

/**
 * Check if @xenova/transformers can be loaded.
 */
export async function isXenovaAvailable(): Promise<boolean> {
  try {
    await import('@xenova/transformers');
    return true;
  } catch {
    return false;
  }
}
