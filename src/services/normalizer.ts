import type { Listing, RawListing, SourceTag } from '../types/listing';
import { MalformedListingError } from '../utils/errors';

/**
 * Values scrapers emit when a card has no usable link
 */
const PLACEHOLDER_LINKS = new Set(['no link', 'n/a', '#']);

/**
 * Trims and collapses runs of whitespace to a single space
 */
export function cleanText(value: string | null | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).replace(/\s+/g, ' ').trim();
}

/**
 * Normalizes an application URL so formatting differences
 * (scheme/host casing, default port, trailing slash, fragment)
 * do not produce distinct keys.
 */
export function normalizeLink(value: string | null | undefined): string {
  const cleaned = cleanText(value);
  if (!cleaned || PLACEHOLDER_LINKS.has(cleaned.toLowerCase())) {
    return '';
  }

  let url: URL;
  try {
    url = new URL(cleaned);
  } catch {
    // Not an absolute URL; keep the cleaned text, minus trailing slashes
    return cleaned.replace(/\/+$/, '') || cleaned;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return cleaned;
  }

  const path = url.pathname.replace(/\/+$/, '');
  return `${url.protocol}//${url.host}${path}${url.search}`;
}

/**
 * Maps a raw producer record to a canonical, frozen listing.
 * Throws MalformedListingError when neither company nor role survives cleaning.
 */
export function normalizeListing(raw: RawListing, source: SourceTag, dateFound: Date): Listing {
  const company = cleanText(raw.company);
  const role = cleanText(raw.role);

  if (!company && !role) {
    throw new MalformedListingError(raw, source);
  }

  return Object.freeze({
    company,
    role,
    location: cleanText(raw.location),
    link: normalizeLink(raw.link),
    source,
    dateFound: new Date(dateFound.getTime()),
  });
}
