import { z } from 'zod';
import type { Listing } from '../types/listing';
import { SOURCE_TAGS } from '../types/listing';
import { keyOf } from '../utils/identity';
import type { QueryClient } from './client';

const listingRowSchema = z.object({
  identity_key: z.string(),
  company: z.string(),
  role: z.string(),
  location: z.string(),
  link: z.string(),
  source: z.enum(SOURCE_TAGS),
  date_found: z.coerce.date(),
});

/**
 * Database operations for internship listings
 */
export class ListingsRepository {
  /**
   * Gets every stored listing in insertion order
   */
  async getAllListings(client: QueryClient): Promise<Listing[]> {
    const result = await client.query(
      `SELECT identity_key, company, role, location, link, source, date_found
       FROM internship_listings
       ORDER BY position ASC`
    );

    return result.rows.map(raw => {
      const row = listingRowSchema.parse(raw);
      return Object.freeze({
        company: row.company,
        role: row.role,
        location: row.location,
        link: row.link,
        source: row.source,
        dateFound: row.date_found,
      });
    });
  }

  /**
   * Inserts listings in order
   * No ON CONFLICT clause: an existing key aborts the surrounding transaction
   */
  async insertListings(client: QueryClient, listings: readonly Listing[]): Promise<number> {
    for (const listing of listings) {
      await client.query(
        `INSERT INTO internship_listings (
          identity_key, company, role, location, link, source, date_found
        ) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          keyOf(listing),
          listing.company,
          listing.role,
          listing.location,
          listing.link,
          listing.source,
          listing.dateFound,
        ]
      );
    }
    return listings.length;
  }
}
