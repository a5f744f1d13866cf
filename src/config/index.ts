/**
 * @fileoverview Resolver configuration
 *
 * Resolution order (later wins): built-in defaults, YAML file
 * (`ENTITY_RESOLVER_CONFIG` or an explicit path), environment overrides.
 */

import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import { z, type ZodError } from 'zod';
import { ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { getErrorMessage } from '../utils/errors.js';

export const EMBEDDING_MODEL_IDS = ['all-MiniLM-L6-v2', 'bge-small-en-v1.5', 'jina-embeddings-v2-base-en'] as const;

const HnswSchema = z.object({
  M: z.coerce.number().int().min(2).default(16),
  efConstruction: z.coerce.number().int().min(1).default(200),
  efSearch: z.coerce.number().int().min(1).default(50),
});

export const ResolverConfigSchema = z.object({
  dbPath: z.string().min(1).default('.entity-resolver/entities.db'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  embedding: z
    .object({
      model: z.enum(EMBEDDING_MODEL_IDS).default('all-MiniLM-L6-v2'),
      maxBatchSize: z.coerce.number().int().min(1).max(512).default(32),
      maxRetries: z.coerce.number().int().min(0).max(10).default(2),
      retryDelayMs: z.coerce.number().int().min(0).default(250),
    })
    .default({}),
  index: z
    .object({
      /** Pool size at and above which the approximate (HNSW) path is used. */
      approximateThreshold: z.coerce.number().int().min(1).default(1000),
      useApproximate: z.enum(['auto', 'never']).default('auto'),
      hnsw: HnswSchema.default({}),
    })
    .default({}),
  matching: z
    .object({
      maxDistance: z.coerce.number().min(0).max(2).default(1.3),
      fuzzyThreshold: z.coerce.number().min(0).max(100).default(80),
      minConfidence: z.coerce.number().min(0).max(1).default(0.5),
      expandedTermPenalty: z.coerce.number().min(0).max(1).default(0.8),
    })
    .default({}),
  generator: z
    .object({
      maxChunkGap: z.coerce.number().int().min(0).default(1),
      minWordLength: z.coerce.number().int().min(1).default(3),
    })
    .default({}),
  resolution: z
    .object({
      defaultBusinessDomain: z.string().min(1).default('general'),
      /** Wall-clock budget per resolve call; 0 disables it. */
      searchBudgetMs: z.coerce.number().int().min(0).default(0),
    })
    .default({}),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>;

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ResolverConfigInput;
}

type RawConfig = Record<string, unknown>;

const ENV_OVERRIDES: Array<{ env: string; path: [string] | [string, string] }> = [
  { env: 'ENTITY_RESOLVER_DB_PATH', path: ['dbPath'] },
  { env: 'ENTITY_RESOLVER_LOG_LEVEL', path: ['logLevel'] },
  { env: 'ENTITY_RESOLVER_MODEL', path: ['embedding', 'model'] },
  { env: 'ENTITY_RESOLVER_MAX_DISTANCE', path: ['matching', 'maxDistance'] },
  { env: 'ENTITY_RESOLVER_APPROXIMATE_THRESHOLD', path: ['index', 'approximateThreshold'] },
  { env: 'ENTITY_RESOLVER_SEARCH_BUDGET_MS', path: ['resolution', 'searchBudgetMs'] },
  { env: 'ENTITY_RESOLVER_BUSINESS_DOMAIN', path: ['resolution', 'defaultBusinessDomain'] },
];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDeep(base: RawConfig, patch: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? mergeDeep(existing, value) : value;
  }
  return merged;
}

function readConfigFile(configPath: string): Result<RawConfig, ValidationError> {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf8');
  } catch (error) {
    return Err(new ValidationError('configPath', 'a readable YAML file', `${configPath} (${getErrorMessage(error)})`));
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    return Err(new ValidationError('config', 'valid YAML', getErrorMessage(error)));
  }
  if (parsed === null || parsed === undefined) return Ok({});
  if (!isRecord(parsed)) {
    return Err(new ValidationError('config', 'a YAML mapping', typeof parsed));
  }
  return Ok(parsed);
}

function readEnvOverrides(env: NodeJS.ProcessEnv): RawConfig {
  let raw: RawConfig = {};
  for (const { env: name, path } of ENV_OVERRIDES) {
    const value = env[name]?.trim();
    if (!value) continue;
    const [head, leaf] = path;
    raw = mergeDeep(raw, leaf === undefined ? { [head]: value } : { [head]: { [leaf]: value } });
  }
  return raw;
}

function describeZodError(error: ZodError): { field: string; received: string } {
  const issue = error.issues[0];
  if (!issue) return { field: 'config', received: 'invalid value' };
  return { field: issue.path.join('.') || 'config', received: issue.message };
}

/**
 * Parse a raw object into a complete config, filling defaults.
 */
export function parseConfig(raw: unknown): Result<ResolverConfig, ValidationError> {
  const parsed = ResolverConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const { field, received } = describeZodError(parsed.error);
    return Err(new ValidationError(field, 'a valid configuration value', received));
  }
  return Ok(parsed.data);
}

export function loadConfig(options: LoadConfigOptions = {}): Result<ResolverConfig, ValidationError> {
  const env = options.env ?? process.env;
  let raw: RawConfig = {};

  const configPath = options.configPath ?? env.ENTITY_RESOLVER_CONFIG?.trim();
  if (configPath) {
    const fileResult = readConfigFile(configPath);
    if (!fileResult.ok) return fileResult;
    raw = mergeDeep(raw, fileResult.value);
  }

  raw = mergeDeep(raw, readEnvOverrides(env));
  if (options.overrides) {
    raw = mergeDeep(raw, options.overrides);
  }
  return parseConfig(raw);
}

export const DEFAULT_CONFIG: ResolverConfig = ResolverConfigSchema.parse({});
