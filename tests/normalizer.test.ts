import { describe, it, expect } from 'vitest';
import { cleanText, normalizeLink, normalizeListing } from '../src/services/normalizer';
import { MalformedListingError } from '../src/utils/errors';

const FOUND = new Date('2026-03-01T09:00:00.000Z');

describe('cleanText', () => {
  it('trims and collapses internal whitespace', () => {
    expect(cleanText('  Acme   Corp \n Ltd\t')).toBe('Acme Corp Ltd');
  });

  it('turns missing values into empty text', () => {
    expect(cleanText(undefined)).toBe('');
    expect(cleanText(null)).toBe('');
  });
});

describe('normalizeLink', () => {
  it('lower-cases scheme and host and drops the trailing slash', () => {
    expect(normalizeLink('HTTPS://G.CO/jobs/1/')).toBe('https://g.co/jobs/1');
  });

  it('ignores surrounding whitespace', () => {
    expect(normalizeLink('https://g.co/jobs/1 ')).toBe('https://g.co/jobs/1');
  });

  it('drops default ports and fragments but keeps the query', () => {
    expect(normalizeLink('https://example.com:443/a/?x=1#apply')).toBe('https://example.com/a?x=1');
  });

  it('keeps a non-default port', () => {
    expect(normalizeLink('http://example.com:8080/jobs/')).toBe('http://example.com:8080/jobs');
  });

  it('reduces a bare root path to the origin', () => {
    expect(normalizeLink('https://example.com/')).toBe('https://example.com');
  });

  it('does not rewrite the path case', () => {
    expect(normalizeLink('https://Example.com/Jobs/ABC')).toBe('https://example.com/Jobs/ABC');
  });

  it('maps placeholder values to empty', () => {
    expect(normalizeLink('No Link')).toBe('');
    expect(normalizeLink(' n/a ')).toBe('');
    expect(normalizeLink('#')).toBe('');
  });

  it('keeps relative or non-http values as cleaned text', () => {
    expect(normalizeLink(' www.example.com/job ')).toBe('www.example.com/job');
    expect(normalizeLink('mailto:jobs@acme.io')).toBe('mailto:jobs@acme.io');
  });

  it('drops trailing slashes from links without a scheme', () => {
    expect(normalizeLink('www.acme.io/jobs/1/')).toBe('www.acme.io/jobs/1');
    expect(normalizeLink('www.acme.io/jobs/1//')).toBe(normalizeLink('www.acme.io/jobs/1'));
    expect(normalizeLink('/')).toBe('/');
  });
});

describe('normalizeListing', () => {
  it('produces total, cleaned fields', () => {
    const listing = normalizeListing(
      { company: '  Acme   Corp ', role: 'SWE\n Intern', location: undefined, link: null },
      'internshala',
      FOUND
    );

    expect(listing).toEqual({
      company: 'Acme Corp',
      role: 'SWE Intern',
      location: '',
      link: '',
      source: 'internshala',
      dateFound: FOUND,
    });
  });

  it('returns a frozen listing with its own date instance', () => {
    const listing = normalizeListing({ company: 'Acme', role: 'Intern' }, 'glassdoor', FOUND);

    expect(Object.isFrozen(listing)).toBe(true);
    expect(listing.dateFound).not.toBe(FOUND);
    expect(listing.dateFound.getTime()).toBe(FOUND.getTime());
  });

  it('rejects a record with neither company nor role', () => {
    expect(() =>
      normalizeListing({ company: '   ', role: '', link: 'https://acme.io/jobs/1' }, 'wellfound', FOUND)
    ).toThrow(MalformedListingError);
  });

  it('accepts a record with a company but no role', () => {
    const listing = normalizeListing({ company: 'Acme' }, 'wellfound', FOUND);
    expect(listing.company).toBe('Acme');
    expect(listing.role).toBe('');
  });
});
