import type { Listing } from '../types/listing';
import type { ConnectionSource } from '../db/client';
import { withClient, withTransaction } from '../db/client';
import { ListingsRepository } from '../db/listings';
import type { ListingBackend } from './listing-store';

/**
 * Listing backend on the internship_listings table
 * Each commit is a single transaction
 */
export class PostgresBackend implements ListingBackend {
  readonly description = 'postgres:internship_listings';

  constructor(
    private readonly connections: ConnectionSource,
    private readonly repo: ListingsRepository = new ListingsRepository()
  ) {}

  async read(): Promise<Listing[]> {
    return withClient(this.connections, client => this.repo.getAllListings(client));
  }

  async commit(appended: readonly Listing[]): Promise<void> {
    await withTransaction(this.connections, client => this.repo.insertListings(client, appended));
  }
}
