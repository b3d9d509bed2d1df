import type { IdentityKey, Listing } from '../types/listing';

export type KeyedFields = Pick<Listing, 'company' | 'role' | 'location' | 'link'>;

function escapePart(value: string): string {
  return value.toLowerCase().replace(/\\/g, '\\\\').replace(/\|/g, '\\|');
}

/**
 * Derives the deduplication key for a listing:
 * - the normalized link when there is one
 * - otherwise company, role and location, lower-cased
 *
 * Source and discovery date never take part, so the same posting found by
 * two producers collapses to one entry.
 */
export function keyOf(listing: KeyedFields): IdentityKey {
  if (listing.link) {
    return `link:${listing.link}`;
  }
  return `fallback:${escapePart(listing.company)}|${escapePart(listing.role)}|${escapePart(listing.location)}`;
}
