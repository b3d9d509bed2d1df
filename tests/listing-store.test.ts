import { describe, it, expect, beforeEach } from 'vitest';
import { ListingStore } from '../src/store/listing-store';
import { DuplicateKeyViolation, PersistenceError } from '../src/utils/errors';
import { captureLogger, listing, MemoryBackend } from './helpers';

describe('ListingStore', () => {
  let backend: MemoryBackend;
  let store: ListingStore;

  beforeEach(() => {
    backend = new MemoryBackend();
    store = new ListingStore(backend, captureLogger().logger);
  });

  it('loads an empty sequence on first run', async () => {
    expect(await store.load()).toEqual([]);
    expect(store.existingKeys().size).toBe(0);
  });

  it('refuses to be used before load', async () => {
    expect(() => store.existingKeys()).toThrow('load()');
    await expect(store.appendAll([listing()])).rejects.toThrow('load()');
  });

  it('appends to the tail and extends the key set', async () => {
    const first = listing({ link: 'https://acme.io/jobs/1' });
    backend.rows = [first];
    await store.load();

    const second = listing({ link: 'https://acme.io/jobs/2' });
    const third = listing({ link: '', company: 'Beta', role: 'Data Intern', location: 'Berlin' });
    await store.appendAll([second, third]);

    expect(backend.rows).toEqual([first, second, third]);
    expect(store.snapshot()).toEqual([first, second, third]);
    expect([...store.existingKeys()]).toEqual([
      'link:https://acme.io/jobs/1',
      'link:https://acme.io/jobs/2',
      'fallback:beta|data intern|berlin',
    ]);
  });

  it('rejects appending a key that is already stored without writing', async () => {
    backend.rows = [listing()];
    await store.load();

    const duplicate = listing({ company: 'Someone Else', source: 'linkedin' });
    await expect(store.appendAll([duplicate])).rejects.toBeInstanceOf(DuplicateKeyViolation);
    expect(backend.commits).toBe(0);
    expect(store.snapshot()).toHaveLength(1);
  });

  it('rejects a batch that repeats a key', async () => {
    await store.load();

    const error = await store
      .appendAll([listing(), listing({ source: 'glassdoor' })])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DuplicateKeyViolation);
    expect(error instanceof DuplicateKeyViolation && error.keys).toEqual(['link:https://acme.io/jobs/1']);
    expect(backend.commits).toBe(0);
  });

  it('surfaces a failed commit and keeps its previous state', async () => {
    await store.load();
    backend.failCommit = new Error('disk full');

    await expect(store.appendAll([listing()])).rejects.toBeInstanceOf(PersistenceError);
    expect(store.snapshot()).toEqual([]);
    expect(store.existingKeys().size).toBe(0);
    expect(backend.rows).toEqual([]);
  });

  it('wraps read failures as persistence errors', async () => {
    backend.failRead = new Error('permission denied');
    await expect(store.load()).rejects.toThrow('Store load failed: permission denied');
  });

  it('does not write for an empty batch', async () => {
    await store.load();
    await store.appendAll([]);
    expect(backend.commits).toBe(0);
  });

  it('refuses persisted state that already repeats a key', async () => {
    backend.rows = [listing(), listing({ source: 'wellfound' })];
    await expect(store.load()).rejects.toBeInstanceOf(DuplicateKeyViolation);
  });

  it('hands out copies of its key set', async () => {
    await store.load();
    const keys = store.existingKeys();
    expect(keys).not.toBe(store.existingKeys());
  });
});
