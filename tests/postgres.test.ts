import { describe, it, expect } from 'vitest';
import { PostgresBackend } from '../src/store/postgres';
import { ListingStore } from '../src/store/listing-store';
import type { ConnectionSource, ReleasableClient } from '../src/db/client';
import { PersistenceError } from '../src/utils/errors';
import { captureLogger, listing } from './helpers';

interface RecordedQuery {
  text: string;
  values?: unknown[];
}

/**
 * In-process stand-in for a pg pool
 */
class FakeConnections implements ConnectionSource {
  queries: RecordedQuery[] = [];
  released = 0;
  selectRows: unknown[] = [];
  failInsertAt: number | null = null;
  private inserts = 0;

  async connect(): Promise<ReleasableClient> {
    return {
      query: async (text: string, values?: unknown[]) => {
        const command = text.trim().split(/\s+/)[0];
        this.queries.push({ text: command, values });
        if (command === 'INSERT') {
          this.inserts++;
          if (this.inserts === this.failInsertAt) {
            throw new Error('duplicate key value violates unique constraint');
          }
        }
        return { rows: command === 'SELECT' ? this.selectRows : [] };
      },
      release: () => {
        this.released++;
      },
    };
  }
}

describe('PostgresBackend', () => {
  it('reads rows in position order into listings', async () => {
    const connections = new FakeConnections();
    connections.selectRows = [
      {
        identity_key: 'link:https://acme.io/jobs/1',
        company: 'Acme',
        role: 'Software Intern',
        location: 'Remote',
        link: 'https://acme.io/jobs/1',
        source: 'internshala',
        date_found: new Date('2026-03-01T09:00:00.000Z'),
      },
    ];

    const listings = await new PostgresBackend(connections).read();

    expect(listings).toEqual([listing()]);
    expect(connections.released).toBe(1);
  });

  it('rejects rows with an unknown source', async () => {
    const connections = new FakeConnections();
    connections.selectRows = [
      {
        identity_key: 'k',
        company: 'Acme',
        role: 'Intern',
        location: '',
        link: '',
        source: 'monster',
        date_found: '2026-03-01T09:00:00.000Z',
      },
    ];

    await expect(new PostgresBackend(connections).read()).rejects.toThrow();
  });

  it('inserts the batch inside one transaction', async () => {
    const connections = new FakeConnections();
    const first = listing({ link: 'https://acme.io/jobs/1' });
    const second = listing({ link: '', company: 'Beta', role: 'Data Intern', location: 'Berlin' });

    await new PostgresBackend(connections).commit([first, second]);

    expect(connections.queries.map(q => q.text)).toEqual(['BEGIN', 'INSERT', 'INSERT', 'COMMIT']);
    expect(connections.queries[2].values).toEqual([
      'fallback:beta|data intern|berlin',
      'Beta',
      'Data Intern',
      'Berlin',
      '',
      'internshala',
      new Date('2026-03-01T09:00:00.000Z'),
    ]);
    expect(connections.released).toBe(1);
  });

  it('rolls back the whole batch when an insert fails', async () => {
    const connections = new FakeConnections();
    connections.failInsertAt = 2;
    const store = new ListingStore(new PostgresBackend(connections), captureLogger().logger);
    await store.load();

    await expect(
      store.appendAll([listing({ link: 'https://acme.io/jobs/1' }), listing({ link: 'https://acme.io/jobs/2' })])
    ).rejects.toBeInstanceOf(PersistenceError);

    expect(connections.queries.map(q => q.text)).toEqual(['SELECT', 'BEGIN', 'INSERT', 'INSERT', 'ROLLBACK']);
    expect(store.snapshot()).toEqual([]);
    expect(connections.released).toBe(2);
  });
});
