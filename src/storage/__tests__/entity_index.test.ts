import { describe, it, expect, beforeEach } from 'vitest';
import { EmbeddingService } from '../../api/embeddings.js';
import {
  DeleteError,
  EmbeddingError,
  IndexNotOpenError,
  IndexWriteError,
  StorageError,
  ValidationError,
} from '../../core/errors.js';
import { Err, type Result } from '../../core/result.js';
import { FakeEmbeddingProvider } from '../../test/fake_embeddings.js';
import type { IndexRecord, SearchMatch } from '../../types.js';
import { EntityVectorIndex } from '../entity_index.js';
import { MemoryRecordStore } from '../memory_storage.js';

const CUSTOMER = { canonicalName: 'Customer', aliases: 'client, account', groups: ['CRM'] };

/** Commits the first record of each write, then fails the rest. */
class HalfWritingStore extends MemoryRecordStore {
  async putRecords(records: readonly IndexRecord[]): Promise<Result<number, IndexWriteError>> {
    const [first, ...rest] = records;
    if (!first) return super.putRecords(records);
    await super.putRecords([first]);
    return Err(new IndexWriteError('disk full', [first.id], rest.map((record) => record.id)));
  }
}

/** Fails every canonical delete with a storage error. */
class LockedDeleteStore extends MemoryRecordStore {
  async deleteByCanonical(): Promise<number> {
    throw new StorageError('delete', true, 'database is locked');
  }
}

/** Holds the next `embed` call until released. */
class GatedEmbeddingProvider extends FakeEmbeddingProvider {
  private held: { entered: () => void; gate: Promise<void> } | null = null;

  hold(): { entered: Promise<void>; release: () => void } {
    let release = (): void => undefined;
    let entered = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const enteredPromise = new Promise<void>((resolve) => {
      entered = resolve;
    });
    this.held = { entered, gate };
    return { entered: enteredPromise, release };
  }

  async embed(texts: readonly string[]): Promise<Float32Array[]> {
    const held = this.held;
    if (held) {
      this.held = null;
      held.entered();
      await held.gate;
    }
    return super.embed(texts);
  }
}

function aliasesOf(matches: readonly SearchMatch[] | undefined): string[] {
  return (matches ?? []).map((match) => match.alias).sort();
}

function createIndex(store = new MemoryRecordStore(), provider = new FakeEmbeddingProvider()) {
  const embeddings = new EmbeddingService(provider, { retryConfig: { maxRetries: 0, initialDelayMs: 0 } });
  return { index: new EntityVectorIndex({ store, embeddings }), store, provider };
}

describe('EntityVectorIndex', () => {
  let index: EntityVectorIndex;
  let store: MemoryRecordStore;
  let provider: FakeEmbeddingProvider;

  beforeEach(async () => {
    ({ index, store, provider } = createIndex());
    await index.open();
  });

  describe('sync', () => {
    it('stores one record per group and alias', async () => {
      const result = await index.sync({ ...CUSTOMER, groups: ['CRM', 'Sales'] });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.aliases).toEqual(['client', 'account', 'customer']);
      expect(result.value.recordIds).toEqual([
        'CRM::Customer::client',
        'CRM::Customer::account',
        'CRM::Customer::customer',
        'Sales::Customer::client',
        'Sales::Customer::account',
        'Sales::Customer::customer',
      ]);
      expect(result.value.staleRemoved).toBe(0);
      expect(result.value.staleCleanupFailed).toBe(false);

      expect(await index.stats()).toEqual({
        totalRecords: 6,
        vectorDimension: 128,
        perGroupCounts: { CRM: 3, Sales: 3 },
        usingApproximate: false,
      });
      expect(await store.count()).toBe(6);
    });

    it('embeds each alias once regardless of group count', async () => {
      await index.sync({ ...CUSTOMER, groups: ['CRM', 'Sales'] });

      expect(provider.calls).toEqual([['client', 'account', 'customer']]);
    });

    it('is idempotent', async () => {
      await index.sync(CUSTOMER);
      const again = await index.sync(CUSTOMER);

      expect(again.ok && again.value.staleRemoved).toBe(3);
      expect((await index.stats()).totalRecords).toBe(3);
      expect(await store.count()).toBe(3);
    });

    it('drops aliases that were removed from the snapshot', async () => {
      await index.sync(CUSTOMER);
      await index.sync({ ...CUSTOMER, aliases: 'client' });

      const report = await index.inspect(10);
      expect(report.sample.map((sample) => sample.alias)).toEqual(['client', 'customer']);
    });

    it('removes the previous canonical on rename', async () => {
      await index.sync({ canonicalName: 'Customer', aliases: 'client' });

      const result = await index.sync(
        { canonicalName: 'Client Account', aliases: 'client' },
        { canonicalName: 'Customer' }
      );

      expect(result.ok && result.value.staleRemoved).toBe(2);
      const report = await index.inspect(10);
      expect(report.sample.map((sample) => sample.id)).toEqual([
        'Default::Client Account::client',
        'Default::Client Account::client account',
      ]);
    });

    it('rejects a snapshot without a canonical name and leaves the index unchanged', async () => {
      await index.sync(CUSTOMER);

      const result = await index.sync({ canonicalName: '  ', aliases: 'orphan' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect((await index.stats()).totalRecords).toBe(3);
      expect(provider.calls).toHaveLength(1);
    });

    it('reports embedding failures without writing records', async () => {
      provider.failNext(new Error('invalid_input: alias rejected'));

      const result = await index.sync(CUSTOMER);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(EmbeddingError);
      expect(result.error.message).toBe('Embedding with fake-words failed: invalid_input: alias rejected');
      expect(result.error.retryable).toBe(false);
      expect((await index.stats()).totalRecords).toBe(0);
    });

    it('keeps the committed part of a partial write', async () => {
      ({ index } = createIndex(new HalfWritingStore()));
      await index.open();

      const result = await index.sync(CUSTOMER);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(IndexWriteError);
      if (!(result.error instanceof IndexWriteError)) return;
      expect(result.error.partial).toBe(true);
      expect(result.error.writtenIds).toEqual(['CRM::Customer::client']);
      expect(result.error.failedIds).toEqual(['CRM::Customer::account', 'CRM::Customer::customer']);

      const report = await index.inspect(10);
      expect(report.sample.map((sample) => sample.id)).toEqual(['CRM::Customer::client']);
    });

    it('continues when the stale cleanup fails', async () => {
      ({ index } = createIndex(new LockedDeleteStore()));
      await index.open();

      const result = await index.sync(CUSTOMER);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.staleCleanupFailed).toBe(true);
      expect(result.value.staleRemoved).toBe(0);
      expect((await index.stats()).totalRecords).toBe(3);
    });
  });

  describe('delete', () => {
    it('removes every record of the canonical', async () => {
      await index.sync({ ...CUSTOMER, groups: ['CRM', 'Sales'] });
      await index.sync({ canonicalName: 'Item', aliases: 'product', groups: ['Sales'] });

      const result = await index.delete(' Customer ');

      expect(result).toEqual({ ok: true, value: { canonical: 'Customer', removed: 6 } });
      expect((await index.stats()).perGroupCounts).toEqual({ Sales: 2 });
      expect(await store.listIdsByCanonical('Customer')).toEqual([]);
    });

    it('treats unknown and blank names as a no-op', async () => {
      expect(await index.delete('Nobody')).toEqual({ ok: true, value: { canonical: 'Nobody', removed: 0 } });
      expect(await index.delete('   ')).toEqual({ ok: true, value: { canonical: '', removed: 0 } });
    });

    it('wraps store failures in a DeleteError', async () => {
      ({ index } = createIndex(new LockedDeleteStore()));
      await index.open();

      const result = await index.delete('Customer');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DeleteError);
      expect(result.error.message).toBe('Delete of Customer failed: Storage delete failed: database is locked');
      expect(result.error.retryable).toBe(true);
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await index.sync(CUSTOMER);
      await index.sync({
        canonicalName: 'Sales Invoice',
        aliases: 'invoice, bill',
        groups: ['Finance'],
        recordType: 'Sales Invoice',
        relatedRecordTypes: ['Customer'],
      });
    });

    it('answers alias hits exactly without embedding', async () => {
      const callsBefore = provider.calls.length;

      const result = await index.search(['  Client '], ['CRM'], 5, 1.3);

      expect(provider.calls).toHaveLength(callsBefore);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual([[
        {
          recordId: 'CRM::Customer::client',
          alias: 'client',
          metadata: { canonical: 'Customer', alias: 'client', group: 'CRM', recordType: '', relatedRecordTypes: '' },
          distance: 0,
          exact: true,
        },
      ]]);
    });

    it('ranks by cosine distance within the group filter', async () => {
      const result = await index.search(['client invoices'], ['CRM'], 1, 1.3);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const [matches] = result.value;
      expect(matches).toHaveLength(1);
      expect(matches?.[0]?.recordId).toBe('CRM::Customer::client');
      expect(matches?.[0]?.exact).toBe(false);
      expect(matches?.[0]?.distance).toBeCloseTo(1 - Math.SQRT1_2, 5);
    });

    it('never returns records outside the requested groups', async () => {
      const result = await index.search(['invoice', 'client'], ['Finance'], 5, 2);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const [invoice, client] = result.value;
      expect(invoice?.map((match) => match.recordId)).toEqual(['Finance::Sales Invoice::invoice']);
      expect(client?.every((match) => match.metadata.group === 'Finance')).toBe(true);
    });

    it('returns empty results for unknown groups', async () => {
      const result = await index.search(['client'], ['Nowhere'], 5, 1.3);

      expect(result).toEqual({ ok: true, value: [[]] });
    });

    it('filters by maximum distance', async () => {
      const result = await index.search(['client invoices'], ['CRM'], 5, 0.5);

      expect(result.ok && result.value[0]?.map((match) => match.alias)).toEqual(['client']);
    });
  });

  describe('lifecycle', () => {
    it('rejects operations before open', async () => {
      const { index: closed } = createIndex();

      await expect(closed.search(['client'], ['CRM'], 5, 1.3)).rejects.toBeInstanceOf(IndexNotOpenError);
      await expect(closed.sync(CUSTOMER)).rejects.toBeInstanceOf(IndexNotOpenError);
      await expect(closed.stats()).rejects.toThrow('Entity index is not open (stats). Call open() first.');
    });

    it('rejects operations after close', async () => {
      await index.close();

      expect(index.isOpen()).toBe(false);
      await expect(index.delete('Customer')).rejects.toBeInstanceOf(IndexNotOpenError);
    });

    it('reloads persisted records on open', async () => {
      await index.sync(CUSTOMER);
      await index.close();

      const { index: reopened } = createIndex(store);
      await reopened.open();

      expect((await reopened.stats()).totalRecords).toBe(3);
      const result = await reopened.search(['account'], ['CRM'], 5, 1.3);
      expect(result.ok && result.value[0]?.[0]?.metadata.canonical).toBe('Customer');
    });

    it('samples records in insertion order', async () => {
      await index.sync(CUSTOMER);

      const report = await index.inspect(2);

      expect(report).toEqual({
        totalRecords: 3,
        sample: [
          { id: 'CRM::Customer::client', canonical: 'Customer', alias: 'client', group: 'CRM', recordType: '' },
          { id: 'CRM::Customer::account', canonical: 'Customer', alias: 'account', group: 'CRM', recordType: '' },
        ],
      });
    });
  });

  describe('concurrency', () => {
    let gated: GatedEmbeddingProvider;
    let guarded: EntityVectorIndex;

    beforeEach(async () => {
      gated = new GatedEmbeddingProvider();
      ({ index: guarded } = createIndex(new MemoryRecordStore(), gated));
      await guarded.open();
      await guarded.sync(CUSTOMER);
    });

    it('shows a search issued during a sync the complete new alias set', async () => {
      const { entered, release } = gated.hold();
      const syncing = guarded.sync({ ...CUSTOMER, aliases: 'client, buyer' });
      await entered;

      const searching = guarded.search(['client ledger'], ['CRM'], 10, 2);
      release();
      const [synced, searched] = await Promise.all([syncing, searching]);

      expect(synced.ok).toBe(true);
      expect(searched.ok).toBe(true);
      if (!searched.ok) return;
      expect(aliasesOf(searched.value[0])).toEqual(['buyer', 'client', 'customer']);
    });

    it('lets a search already in flight finish on the complete old alias set', async () => {
      const { entered, release } = gated.hold();
      const searching = guarded.search(['client ledger'], ['CRM'], 10, 2);
      await entered;

      const syncing = guarded.sync({ ...CUSTOMER, aliases: 'client, buyer' });
      release();
      const [searched, synced] = await Promise.all([searching, syncing]);

      expect(searched.ok).toBe(true);
      if (!searched.ok) return;
      expect(aliasesOf(searched.value[0])).toEqual(['account', 'client', 'customer']);
      expect(synced.ok && synced.value.staleRemoved).toBe(3);
      expect((await guarded.stats()).totalRecords).toBe(3);
    });
  });
});
