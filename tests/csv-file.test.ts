import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CsvFileBackend } from '../src/store/csv-file';
import { formatCsvField, parseCsv } from '../src/store/csv';
import { ListingStore } from '../src/store/listing-store';
import { PersistenceError } from '../src/utils/errors';
import { captureLogger, listing } from './helpers';

describe('parseCsv', () => {
  it('handles CRLF, quoted fields and escaped quotes', () => {
    expect(parseCsv('a,b\r\n"c ""d""",e\n')).toEqual([
      ['a', 'b'],
      ['c "d"', 'e'],
    ]);
  });

  it('keeps newlines inside quoted fields', () => {
    expect(parseCsv('x,"multi\nline"\n')).toEqual([['x', 'multi\nline']]);
  });

  it('reads a last row without a trailing newline', () => {
    expect(parseCsv('a,b\nc,')).toEqual([
      ['a', 'b'],
      ['c', ''],
    ]);
  });

  it('throws on an unterminated quote', () => {
    expect(() => parseCsv('a,"b\n')).toThrow('Unterminated quoted field');
  });
});

describe('formatCsvField', () => {
  it('quotes only when needed', () => {
    expect(formatCsvField('plain')).toBe('plain');
    expect(formatCsvField('Acme, Inc.')).toBe('"Acme, Inc."');
    expect(formatCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvField(' padded')).toBe('" padded"');
  });
});

describe('CsvFileBackend', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'internship-sweep-'));
    filePath = join(dir, 'data', 'internships.csv');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads nothing when the file does not exist', async () => {
    expect(await new CsvFileBackend(filePath).read()).toEqual([]);
  });

  it('writes the header and rows in column order', async () => {
    const backend = new CsvFileBackend(filePath);
    const row = listing({
      company: 'Acme, Inc.',
      role: 'SWE Intern',
      location: 'Remote',
      link: 'https://acme.io/jobs/7',
      source: 'wellfound',
      dateFound: new Date('2026-01-05T10:00:00.000Z'),
    });

    await backend.commit([row], [row]);

    const content = await readFile(filePath, 'utf-8');
    expect(content).toBe(
      'Company,Role,Location,Link,Date Found,Source\n' +
        '"Acme, Inc.",SWE Intern,Remote,https://acme.io/jobs/7,2026-01-05T10:00:00.000Z,wellfound\n'
    );
    expect(await readdir(join(dir, 'data'))).toEqual(['internships.csv']);
  });

  it('reads back what it wrote, in order', async () => {
    const backend = new CsvFileBackend(filePath);
    const rows = [
      listing({ role: 'Intern "Data"', link: 'https://acme.io/jobs/1' }),
      listing({ company: 'Beta', location: 'Line one\nLine two', link: '', source: 'email-alerts' }),
    ];

    await backend.commit(rows, rows);

    expect(await backend.read()).toEqual(rows);
  });

  it('keeps earlier rows ahead of appended ones across store runs', async () => {
    const logger = captureLogger().logger;
    const first = listing({ link: 'https://acme.io/jobs/1' });
    const second = listing({ link: 'https://acme.io/jobs/2', source: 'linkedin' });

    const run1 = new ListingStore(new CsvFileBackend(filePath), logger);
    await run1.load();
    await run1.appendAll([first]);

    const run2 = new ListingStore(new CsvFileBackend(filePath), logger);
    expect(await run2.load()).toEqual([first]);
    await run2.appendAll([second]);

    expect(await new CsvFileBackend(filePath).read()).toEqual([first, second]);
  });

  it('leaves the previous sheet untouched when a commit fails', async () => {
    // Room for the sheet name but not for the temp-file suffix
    const longPath = join(dir, `${'s'.repeat(240)}.csv`);
    const previous =
      'Company,Role,Location,Link,Date Found,Source\n' +
      'Acme,Software Intern,Remote,https://acme.io/jobs/1,2026-03-01T09:00:00.000Z,internshala\n';
    await writeFile(longPath, previous);
    const before = await readdir(dir);

    const backend = new CsvFileBackend(longPath);
    const existing = await backend.read();
    const added = listing({ link: 'https://acme.io/jobs/2' });

    await expect(backend.commit([added], [...existing, added])).rejects.toThrow();

    expect(await readFile(longPath, 'utf-8')).toBe(previous);
    expect(await readdir(dir)).toEqual(before);
    expect(await backend.read()).toEqual([listing()]);
  });

  it('removes its temp file when the final rename fails', async () => {
    const blocked = join(dir, 'blocked.csv');
    await mkdir(join(blocked, 'inner'), { recursive: true });
    const before = await readdir(dir);

    await expect(new CsvFileBackend(blocked).commit([listing()], [listing()])).rejects.toThrow();

    expect(await readdir(dir)).toEqual(before);
    expect(await readdir(blocked)).toEqual(['inner']);
  });

  it('rejects a file with an unexpected header', async () => {
    await writeFile(join(dir, 'bad.csv'), 'Name,Title\nAcme,Intern\n');
    await expect(new CsvFileBackend(join(dir, 'bad.csv')).read()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('rejects a torn final record', async () => {
    await writeFile(
      join(dir, 'torn.csv'),
      'Company,Role,Location,Link,Date Found,Source\n"Acme,Intern,Remote,'
    );
    await expect(new CsvFileBackend(join(dir, 'torn.csv')).read()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('rejects rows with an unknown source', async () => {
    await writeFile(
      join(dir, 'source.csv'),
      'Company,Role,Location,Link,Date Found,Source\nAcme,Intern,Remote,,2026-01-05T10:00:00.000Z,Unknown\n'
    );
    await expect(new CsvFileBackend(join(dir, 'source.csv')).read()).rejects.toThrow('unknown Source: Unknown');
  });
});
