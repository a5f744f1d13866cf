import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { DEFAULT_CONFIG, loadConfig, parseConfig } from '../index.js';

describe('resolver config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'entity-resolver-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('fills every default', () => {
    expect(DEFAULT_CONFIG.dbPath).toBe('.entity-resolver/entities.db');
    expect(DEFAULT_CONFIG.matching).toEqual({
      maxDistance: 1.3,
      fuzzyThreshold: 80,
      minConfidence: 0.5,
      expandedTermPenalty: 0.8,
    });
    expect(DEFAULT_CONFIG.index.approximateThreshold).toBe(1000);
    expect(DEFAULT_CONFIG.index.hnsw).toEqual({ M: 16, efConstruction: 200, efSearch: 50 });
    expect(DEFAULT_CONFIG.generator).toEqual({ maxChunkGap: 1, minWordLength: 3 });
    expect(DEFAULT_CONFIG.resolution).toEqual({ defaultBusinessDomain: 'general', searchBudgetMs: 0 });
  });

  it('layers file, environment and explicit overrides in that order', () => {
    const configPath = path.join(dir, 'resolver.yaml');
    writeFileSync(
      configPath,
      ['dbPath: /data/file.db', 'matching:', '  maxDistance: 0.9', '  fuzzyThreshold: 70', ''].join('\n')
    );

    const result = loadConfig({
      configPath,
      env: { ENTITY_RESOLVER_MAX_DISTANCE: '1.1', ENTITY_RESOLVER_BUSINESS_DOMAIN: 'retail' },
      overrides: { dbPath: '/data/override.db' },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.dbPath).toBe('/data/override.db');
    expect(result.value.matching.maxDistance).toBe(1.1);
    expect(result.value.matching.fuzzyThreshold).toBe(70);
    expect(result.value.matching.minConfidence).toBe(0.5);
    expect(result.value.resolution.defaultBusinessDomain).toBe('retail');
  });

  it('reads the config path from the environment', () => {
    const configPath = path.join(dir, 'env.yaml');
    writeFileSync(configPath, 'logLevel: warn\n');

    const result = loadConfig({ env: { ENTITY_RESOLVER_CONFIG: configPath } });

    expect(result.ok && result.value.logLevel).toBe('warn');
  });

  it('treats an empty file as no settings', () => {
    const configPath = path.join(dir, 'empty.yaml');
    writeFileSync(configPath, '');

    const result = loadConfig({ configPath, env: {} });

    expect(result).toEqual({ ok: true, value: DEFAULT_CONFIG });
  });

  it('rejects out-of-range values with the offending field', () => {
    const result = loadConfig({ env: { ENTITY_RESOLVER_MAX_DISTANCE: '3' } });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.field).toBe('matching.maxDistance');
  });

  it('rejects a missing file and a non-mapping document', () => {
    const missing = loadConfig({ configPath: path.join(dir, 'absent.yaml'), env: {} });
    expect(!missing.ok && missing.error.field).toBe('configPath');

    const listPath = path.join(dir, 'list.yaml');
    writeFileSync(listPath, '- a\n- b\n');
    const list = loadConfig({ configPath: listPath, env: {} });
    expect(!list.ok && list.error.received).toBe('object');
  });

  it('rejects unknown embedding models', () => {
    const result = parseConfig({ embedding: { model: 'gpt-embedder' } });
    expect(!result.ok && result.error.field).toBe('embedding.model');
  });
});
