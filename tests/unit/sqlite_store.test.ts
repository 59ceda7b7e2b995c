import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteObjectStore } from '@/storage/sqlite_store';
import { chunkResultKey, chunkStatusKey, manifestKey, runIdFromKey, runPrefix } from '@/storage/keys';
import { ChunkResultPublisher } from '@/run/publisher';
import { validateChunkResult, validateChunkStatus } from '@/validation/ajv_instance';
import { FlakyStore, testConfig } from '../helpers/fixtures';

const layout = testConfig().storage;
const fixedNow = () => new Date('2026-03-02T14:30:00.000Z');

let store: SqliteObjectStore;

beforeEach(() => {
  store = new SqliteObjectStore(':memory:');
});

afterEach(() => {
  store.close();
});

describe('SqliteObjectStore', () => {
  it('puts, overwrites, reads and deletes objects', async () => {
    await store.put('a/1.json', 'one');
    await store.put('a/1.json', 'uno');
    expect(await store.get('a/1.json')).toBe('uno');

    await store.delete('a/1.json');
    expect(await store.get('a/1.json')).toBeNull();
  });

  it('lists by prefix in key order, treating LIKE wildcards literally', async () => {
    await store.put('p/run_1/b.json', '');
    await store.put('p/run_1/a.json', '');
    await store.put('p/runX1/c.json', '');
    await store.put('q/run_1/d.json', '');

    expect(await store.list('p/run_1/')).toEqual(['p/run_1/a.json', 'p/run_1/b.json']);
    expect(await store.list('p/')).toHaveLength(3);
  });

  it('creates a key only once with putIfAbsent', async () => {
    expect(await store.putIfAbsent('claim', 'first')).toBe(true);
    expect(await store.putIfAbsent('claim', 'second')).toBe(false);
    expect(await store.get('claim')).toBe('first');
  });
});

describe('storage keys', () => {
  it('lays out chunk, status and manifest objects per run', () => {
    expect(chunkResultKey(layout, 'r1', 'chunk_1_abcd1234')).toBe(
      'stock-analysis/chunks/r1/chunk_1_abcd1234.json'
    );
    expect(chunkStatusKey(layout, 'r1', 'chunk_1_abcd1234')).toBe(
      'stock-analysis/status/r1/chunk_1_abcd1234.json'
    );
    expect(manifestKey(layout, 'r1')).toBe('stock-analysis/runs/r1/manifest.json');
    expect(runPrefix(layout.chunkPrefix)).toBe('stock-analysis/chunks/');
    expect(runIdFromKey(layout.chunkPrefix, 'stock-analysis/chunks/r9/chunk_2_x.json')).toBe('r9');
    expect(runIdFromKey(layout.chunkPrefix, 'stock-analysis/chunks/flat.json')).toBeNull();
  });
});

describe('ChunkResultPublisher', () => {
  it('writes a schema-valid chunk document', async () => {
    const publisher = new ChunkResultPublisher(store, layout, fixedNow);
    const key = await publisher.publish(
      [{ symbol: 'AAPL', sector: 'Tech', buyScore: 7, reasonsToBuy: 'a; b', provenance: 'primary' }],
      'chunk_1_abcd1234',
      'r1'
    );

    expect(key).toBe('stock-analysis/chunks/r1/chunk_1_abcd1234.json');
    const stored = await store.get('stock-analysis/chunks/r1/chunk_1_abcd1234.json');
    const result = validateChunkResult(JSON.parse(stored ?? 'null'));
    expect(result.valid).toBe(true);
    expect(result.data).toEqual({
      chunk_id: 'chunk_1_abcd1234',
      run_id: 'r1',
      created_at: '2026-03-02T14:30:00.000Z',
      rows: [{ Symbol: 'AAPL', Sector: 'Tech', BuyScore: 7, ReasonsToBuy: 'a; b', Provenance: 'primary' }],
    });
  });

  it('returns null instead of throwing when the write fails', async () => {
    const publisher = new ChunkResultPublisher(new FlakyStore(store, () => true), layout, fixedNow);
    await expect(publisher.publish([], 'chunk_2_abcd1234', 'r1')).resolves.toBeNull();
    expect(await publisher.recordStatus('r1', 'chunk_2_abcd1234', 'failed', 0)).toBe(false);
  });

  it('records a status marker', async () => {
    const publisher = new ChunkResultPublisher(store, layout, fixedNow);
    expect(await publisher.recordStatus('r1', 'chunk_3_abcd1234', 'empty', 0)).toBe(true);

    const body = await store.get('stock-analysis/status/r1/chunk_3_abcd1234.json');
    expect(validateChunkStatus(JSON.parse(body ?? 'null')).data).toEqual({
      run_id: 'r1',
      chunk_id: 'chunk_3_abcd1234',
      status: 'empty',
      result_count: 0,
      finished_at: '2026-03-02T14:30:00.000Z',
    });
  });
});
