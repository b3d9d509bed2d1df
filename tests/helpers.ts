import type { Listing, RawListing, SourceTag } from '../src/types/listing';
import type { ListingBackend } from '../src/store/listing-store';
import type { ListingProducer } from '../src/sources/base';
import type { PageFetcher, PageResponse } from '../src/sources/http';
import { createLogger, LogLevel } from '../src/utils/logger';
import type { LogEntry, Logger } from '../src/utils/logger';

export function captureLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level, sink: entry => entries.push(entry) });
  return { logger, entries };
}

/**
 * In-process stand-in for a persisted listings sheet
 */
export class MemoryBackend implements ListingBackend {
  readonly description = 'memory';
  rows: Listing[] = [];
  commits = 0;
  failCommit: Error | null = null;
  failRead: Error | null = null;

  async read(): Promise<Listing[]> {
    if (this.failRead) throw this.failRead;
    return [...this.rows];
  }

  async commit(_appended: readonly Listing[], all: readonly Listing[]): Promise<void> {
    this.commits++;
    if (this.failCommit) throw this.failCommit;
    this.rows = [...all];
  }
}

export function staticProducer(name: SourceTag, batch: RawListing[]): ListingProducer {
  return {
    name,
    fetch: async () => batch.map(raw => ({ ...raw })),
  };
}

export function failingProducer(name: SourceTag, error: unknown = new Error('connection reset')): ListingProducer {
  return {
    name,
    fetch: async () => {
      throw error;
    },
  };
}

export function listing(overrides: Partial<Listing> = {}): Listing {
  const value: Listing = {
    company: 'Acme',
    role: 'Software Intern',
    location: 'Remote',
    link: 'https://acme.io/jobs/1',
    source: 'internshala',
    dateFound: new Date('2026-03-01T09:00:00.000Z'),
    ...overrides,
  };
  return Object.freeze(value);
}

/**
 * Serves canned pages by URL and records every request
 */
export class FakePageFetcher implements PageFetcher {
  requests: { url: string; headers?: Record<string, string> }[] = [];

  constructor(private readonly pages: Record<string, PageResponse | Error>) {}

  async get(url: string, headers?: Record<string, string>): Promise<PageResponse> {
    this.requests.push({ url, headers });
    const page = this.pages[url];
    if (page === undefined) {
      return { status: 404, ok: false, body: '' };
    }
    if (page instanceof Error) throw page;
    return page;
  }
}

export function htmlPage(body: string): PageResponse {
  return { status: 200, ok: true, body };
}
