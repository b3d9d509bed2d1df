import { mkdir, open, readFile, rename, rm } from 'fs/promises';
import { dirname } from 'path';
import type { Listing } from '../types/listing';
import { isSourceTag } from '../types/listing';
import { PersistenceError } from '../utils/errors';
import type { ListingBackend } from './listing-store';
import { formatCsvRow, parseCsv } from './csv';

export const CSV_HEADER = ['Company', 'Role', 'Location', 'Link', 'Date Found', 'Source'] as const;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Listings sheet kept as a CSV file
 * Commits rewrite the whole sheet to a temp file and rename it over the original
 */
export class CsvFileBackend implements ListingBackend {
  constructor(private readonly filePath: string) {}

  get description(): string {
    return `csv:${this.filePath}`;
  }

  async read(): Promise<Listing[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    let rows: string[][];
    try {
      rows = parseCsv(content.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new PersistenceError('load', error);
    }

    const [header, ...body] = rows;
    if (!header) return [];

    if (header.join(',') !== CSV_HEADER.join(',')) {
      throw new PersistenceError(
        'load',
        new Error(`Unexpected header in ${this.filePath}: ${header.join(',')}`)
      );
    }

    const listings: Listing[] = [];
    body.forEach((row, index) => {
      if (row.length === 1 && row[0] === '') return;
      listings.push(this.toListing(row, index + 2));
    });
    return listings;
  }

  async commit(_appended: readonly Listing[], all: readonly Listing[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });

    const lines = [formatCsvRow(CSV_HEADER), ...all.map(listing => formatCsvRow(this.toRow(listing)))];
    const tempPath = `${this.filePath}.tmp-${process.pid}-${Date.now()}`;

    const handle = await open(tempPath, 'w');
    try {
      try {
        await handle.writeFile(`${lines.join('\n')}\n`, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  private toRow(listing: Listing): string[] {
    return [
      listing.company,
      listing.role,
      listing.location,
      listing.link,
      listing.dateFound.toISOString(),
      listing.source,
    ];
  }

  private toListing(row: string[], line: number): Listing {
    if (row.length !== CSV_HEADER.length) {
      throw new PersistenceError(
        'load',
        new Error(`Row ${line} of ${this.filePath} has ${row.length} fields, expected ${CSV_HEADER.length}`)
      );
    }

    const [company, role, location, link, dateFound, source] = row;
    const found = new Date(dateFound);
    if (isNaN(found.getTime())) {
      throw new PersistenceError('load', new Error(`Row ${line} has an invalid Date Found: ${dateFound}`));
    }
    if (!isSourceTag(source)) {
      throw new PersistenceError('load', new Error(`Row ${line} has an unknown Source: ${source}`));
    }

    return Object.freeze({ company, role, location, link, source, dateFound: found });
  }
}
