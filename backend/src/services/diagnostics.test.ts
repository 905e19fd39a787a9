import { describe, expect, it, vi } from 'vitest';
import { MemoryDocumentStore } from '../store/memoryDocumentStore.js';
import { describeStore } from './diagnostics.js';

describe('describeStore', () => {
  it('reports an unconfigured database', async () => {
    const store = new MemoryDocumentStore({ available: false });
    expect(await describeStore(store, { mongoUri: null, databaseName: null })).toEqual({
      backend: 'running',
      database: 'not configured',
      databaseUrl: 'not set',
      databaseName: 'not set',
      connectionStatus: 'not connected',
      collections: [],
    });
    expect(store.operations).toBe(0);
  });

  it('truncates a listing error to 50 characters', async () => {
    const store = new MemoryDocumentStore();
    vi.spyOn(store, 'listCollections').mockRejectedValue(new Error('e'.repeat(80)));
    const report = await describeStore(store, { mongoUri: 'mongodb://db', databaseName: null });
    expect(report.connectionStatus).toBe('connected');
    expect(report.database).toBe(`connected with error: ${'e'.repeat(50)}`);
    expect(report.collections).toEqual([]);
  });

  it('lists at most ten collections', async () => {
    const store = new MemoryDocumentStore();
    const names = Array.from({ length: 12 }, (_, i) => `c${i}`);
    vi.spyOn(store, 'listCollections').mockResolvedValue(names);
    const report = await describeStore(store, { mongoUri: 'mongodb://db', databaseName: 'schedule' });
    expect(report.collections).toEqual(names.slice(0, 10));
  });
});
