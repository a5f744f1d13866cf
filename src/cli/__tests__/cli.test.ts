import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createEntityResolver } from '../../api/resolver.js';
import type { ResolverConfig } from '../../config/index.js';
import { MemoryRecordStore } from '../../storage/memory_storage.js';
import { FakeEmbeddingProvider } from '../../test/fake_embeddings.js';
import { getCommandHelp } from '../help.js';
import { runCli } from '../main.js';

const SNAPSHOTS = [
  {
    canonicalName: 'Customer',
    aliases: 'client, account',
    groups: ['CRM'],
    recordType: 'Customer',
    relatedRecordTypes: ['Sales Order', 'Sales Invoice'],
  },
  { canonical_name: 'Sales Order', aliases: 'sales, so', groups: [{ entity_group: 'Sales' }], doc_type: 'Sales Order' },
];

describe('entity-resolver CLI', () => {
  let dir: string;
  let snapshotFile: string;
  let store: MemoryRecordStore;
  let provider: FakeEmbeddingProvider;
  let configs: ResolverConfig[];
  let log: string[];
  let errors: string[];

  const run = (...argv: string[]) =>
    runCli(argv, {
      out: { log: (line) => log.push(line), error: (line) => errors.push(line) },
      env: { ENTITY_RESOLVER_LOG_LEVEL: 'silent' },
      cwd: '/work',
      createResolver: (config) => {
        configs.push(config);
        return createEntityResolver({ config, provider, store });
      },
    });

  // Each run closes the resolver, and with it the store.
  const storedCount = async () => {
    await store.initialize();
    return store.count();
  };

  const runFresh = async (...argv: string[]) => {
    log = [];
    errors = [];
    return run(...argv);
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'entity-cli-'));
    snapshotFile = path.join(dir, 'entities.json');
    await fs.writeFile(snapshotFile, JSON.stringify(SNAPSHOTS));
    store = new MemoryRecordStore();
    provider = new FakeEmbeddingProvider();
    configs = [];
    log = [];
    errors = [];
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('help and version', () => {
    it('prints the version', async () => {
      expect(await run('--version')).toBe(0);
      expect(log).toEqual(['entity-resolver 1.0.0']);
    });

    it('prints general help without a command', async () => {
      expect(await run()).toBe(0);
      expect(log).toEqual([getCommandHelp()]);
    });

    it('prints command help', async () => {
      await run('help', 'sync');
      await run('resolve', '--help');

      expect(log).toEqual([getCommandHelp('sync'), getCommandHelp('resolve')]);
      expect(configs).toEqual([]);
    });

    it('rejects unknown commands', async () => {
      expect(await run('frobnicate')).toBe(2);
      expect(errors).toEqual([
        'Error [INVALID_ARGUMENT]: Unknown command: frobnicate\n\n' +
          'Suggestion: Run `entity-resolver help <command>` for usage information.',
      ]);
    });
  });

  describe('sync', () => {
    it('indexes every snapshot in the file', async () => {
      expect(await run('sync', snapshotFile)).toBe(0);

      expect(log.slice(0, 4)).toEqual([
        'Entity      | Aliases | Groups | Records | Stale removed',
        '------------+---------+--------+---------+--------------',
        'Customer    | 3       | CRM    | 3       | 0',
        'Sales Order | 3       | Sales  | 3       | 0',
      ]);
      expect(log[4]).toMatch(/^Synced 2 of 2 entities in \d+ms$/);
      expect(await storedCount()).toBe(6);
    });

    it('resolves the database path against the working directory', async () => {
      await run('sync', snapshotFile);

      expect(configs[0]?.dbPath).toBe(path.resolve('/work', '.entity-resolver/entities.db'));
      expect(configs[0]?.logLevel).toBe('silent');
    });

    it('reports failed snapshots and exits non-zero', async () => {
      await fs.writeFile(snapshotFile, JSON.stringify([{ canonicalName: 'Item' }, { aliases: 'orphan' }]));

      expect(await run('sync', snapshotFile)).toBe(40);
      expect(errors).toEqual([
        '  [FAIL] (unnamed): Validation failed for canonicalName: expected a non-empty string, got ""',
        'Error [SYNC_FAILED]: 1 of 2 entities failed to sync\n\n' +
          'Suggestion: Fix the entities listed above and run sync again; sync is idempotent.',
      ]);
      expect(await storedCount()).toBe(1);
    });

    it('prints JSON reports', async () => {
      expect(await run('sync', snapshotFile, '--json')).toBe(0);

      const output: unknown = JSON.parse(log.join('\n'));
      expect(output).toMatchObject({ failed: [], synced: [{ canonical: 'Customer' }, { canonical: 'Sales Order' }] });
    });

    it('requires a file', async () => {
      expect(await run('sync')).toBe(2);
      expect(errors[0]).toMatch(/^Error \[INVALID_ARGUMENT\]: A snapshot file is required/);
    });

    it('reports an unreadable file as a validation failure', async () => {
      expect(await run('sync', path.join(dir, 'missing.json'))).toBe(3);
      expect(errors[0]).toMatch(/^Error \[VALIDATION_FAILED\]: Validation failed for file: expected a readable JSON file/);
    });
  });

  describe('resolve', () => {
    beforeEach(async () => {
      await runFresh('sync', snapshotFile);
      log = [];
      errors = [];
    });

    it('prints a table of matched entities', async () => {
      expect(await run('resolve', 'show client invoices', '--groups', 'CRM')).toBe(0);

      expect(log).toEqual([
        'Query: show client invoices',
        'Normalized: show client invoices',
        '',
        'Text                 | Entity   | Type          | Confidence | Distance',
        '---------------------+----------+---------------+------------+---------',
        'client               | Customer | word          | 1.000      | 0.000',
        'customer             | Customer | expanded_term | 0.800      | 0.000',
        'account              | Customer | expanded_term | 0.800      | 0.000',
        'show client invoices | Customer | chunk         | 0.552      | 0.423',
        '',
        'Record types: Customer',
        'Related record types: Sales Order, Sales Invoice',
      ]);
    });

    it('joins unquoted query words', async () => {
      await run('resolve', 'most', 'sold', 'products', '--groups', 'Sales,', '--json');

      const output: unknown = JSON.parse(log.join('\n'));
      expect(output).toMatchObject({
        originalQuery: 'most sold products',
        entityMappings: [{ text: 'sales', entity: 'Sales Order' }, { text: 'sales order', entity: 'Sales Order' }],
        context: { dt: ['Sales Order'], rdt: [] },
      });
    });

    it('says so when nothing matches', async () => {
      await run('resolve', 'warehouse stock', '--groups', 'CRM');

      expect(log).toEqual(['Query: warehouse stock', 'Normalized: warehouse stock', '', 'No entities matched.']);
    });

    it('appends the trace in debug mode', async () => {
      await run('resolve', 'client', '--groups', 'CRM', '--debug');

      expect(log).toContain("  normalized query: 'client'");
      expect(log.at(-1)).toBe('  found 3 entity mappings');
    });

    it('requires a query and groups', async () => {
      expect(await run('resolve', '--groups', 'CRM')).toBe(2);
      expect(await run('resolve', 'client')).toBe(2);

      expect(errors[1]).toBe(
        'Error [INVALID_ARGUMENT]: --groups must name at least one entity group\n\n' +
          'Suggestion: Run `entity-resolver help <command>` for usage information.'
      );
    });

    it('applies matching settings from a config file', async () => {
      const configFile = path.join(dir, 'resolver.yaml');
      await fs.writeFile(configFile, 'matching:\n  minConfidence: 0.9\n');

      await run('resolve', 'client', '--groups', 'CRM', '--config', configFile, '--json');

      const output: unknown = JSON.parse(log.join('\n'));
      expect(output).toMatchObject({ entityMappings: [{ text: 'client' }] });
      expect(configs.at(-1)?.matching.minConfidence).toBe(0.9);
    });

    it('reports a missing config file', async () => {
      expect(await run('resolve', 'client', '--groups', 'CRM', '--config', path.join(dir, 'nope.yaml'))).toBe(3);
      expect(errors[0]).toMatch(/^Error \[VALIDATION_FAILED\]: Validation failed for configPath/);
    });
  });

  describe('index maintenance', () => {
    beforeEach(async () => {
      await runFresh('sync', snapshotFile);
      log = [];
      errors = [];
    });

    it('shows statistics', async () => {
      expect(await run('stats')).toBe(0);

      expect(log).toEqual([
        'Entity Index',
        '  Records           : 6',
        '  Vector dimension  : 128',
        '  Approximate search: exact',
        '',
        'Group | Records',
        '------+--------',
        'CRM   | 3',
        'Sales | 3',
      ]);
    });

    it('shows statistics as JSON', async () => {
      await run('stats', '--json');

      expect(JSON.parse(log.join('\n'))).toEqual({
        totalRecords: 6,
        vectorDimension: 128,
        perGroupCounts: { CRM: 3, Sales: 3 },
        usingApproximate: false,
      });
    });

    it('deletes an entity by its full canonical name', async () => {
      expect(await run('delete', 'Sales', 'Order')).toBe(0);

      expect(log).toEqual(['Removed 3 records for "Sales Order"']);
      expect(await storedCount()).toBe(3);
    });

    it('samples records', async () => {
      expect(await run('inspect', '--limit', '1')).toBe(0);

      expect(log).toEqual([
        'Total records: 6',
        '',
        'Id                    | Canonical | Alias  | Group | Record type',
        '----------------------+-----------+--------+-------+------------',
        'CRM::Customer::client | Customer  | client | CRM   | Customer',
      ]);
    });

    it('validates the sample size', async () => {
      expect(await run('inspect', '--limit', '0')).toBe(2);
      expect(errors[0]).toMatch(/^Error \[INVALID_ARGUMENT\]: --limit must be a positive integer, got "0"/);
    });

    it('rejects unknown options', async () => {
      expect(await run('stats', '--bogus')).toBe(2);
      expect(errors[0]).toMatch(/^Error \[INVALID_ARGUMENT\]: Unknown option '--bogus'/);
    });

    it('reports errors as JSON in JSON mode', async () => {
      expect(await run('delete', '--json')).toBe(2);

      expect(JSON.parse(errors.join('\n'))).toEqual({
        error: {
          code: 'INVALID_ARGUMENT',
          message: 'A canonical entity name is required. Usage: entity-resolver delete <canonical>',
          suggestion: 'Run `entity-resolver help <command>` for usage information.',
        },
      });
    });
  });
});
