import type { IdentityKey, Listing } from '../types/listing';
import { keyOf } from '../utils/identity';
import { DuplicateKeyViolation, PersistenceError } from '../utils/errors';
import type { Logger } from '../utils/logger';

/**
 * Storage medium behind the listing store
 * Implementations only read and write; key bookkeeping lives in ListingStore
 */
export interface ListingBackend {
  readonly description: string;

  /**
   * Returns every persisted listing in insertion order.
   * A backend with no persisted state yet returns an empty array.
   */
  read(): Promise<Listing[]>;

  /**
   * Durably records `appended` after the already persisted listings.
   * `all` is the full resulting sequence for backends that rewrite everything.
   * Must be all-or-nothing.
   */
  commit(appended: readonly Listing[], all: readonly Listing[]): Promise<void>;
}

/**
 * Append-only, key-unique collection of every listing ever accepted
 */
export class ListingStore {
  private listings: Listing[] | null = null;
  private keys = new Set<IdentityKey>();

  constructor(
    private backend: ListingBackend,
    private logger: Logger
  ) {}

  async load(): Promise<readonly Listing[]> {
    let persisted: Listing[];
    try {
      persisted = await this.backend.read();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError('load', error);
    }

    const keys = new Set<IdentityKey>();
    const repeated: IdentityKey[] = [];
    for (const listing of persisted) {
      const key = keyOf(listing);
      if (keys.has(key)) {
        repeated.push(key);
      }
      keys.add(key);
    }

    if (repeated.length > 0) {
      const violation = new DuplicateKeyViolation(repeated);
      this.logger.error(`Persisted listings contain repeated identity keys`, violation, {
        backend: this.backend.description,
        keys: repeated,
      });
      throw violation;
    }

    this.listings = persisted;
    this.keys = keys;

    this.logger.info(`Loaded ${persisted.length} existing listings`, {
      backend: this.backend.description,
    });
    return [...persisted];
  }

  existingKeys(): ReadonlySet<IdentityKey> {
    this.requireLoaded();
    return new Set(this.keys);
  }

  /**
   * Appends listings to the tail and commits them in one step.
   * Rejects the whole batch if any key is already stored or repeated in it.
   */
  async appendAll(newListings: readonly Listing[]): Promise<void> {
    const current = this.requireLoaded();
    if (newListings.length === 0) {
      return;
    }

    const batchKeys = new Set<IdentityKey>();
    const conflicts: IdentityKey[] = [];
    for (const listing of newListings) {
      const key = keyOf(listing);
      if (this.keys.has(key) || batchKeys.has(key)) {
        conflicts.push(key);
      }
      batchKeys.add(key);
    }

    if (conflicts.length > 0) {
      const violation = new DuplicateKeyViolation(conflicts);
      this.logger.error(`Append rejected: identity keys already present`, violation, {
        backend: this.backend.description,
        keys: conflicts,
        batchSize: newListings.length,
      });
      throw violation;
    }

    const next = [...current, ...newListings];
    try {
      await this.backend.commit(newListings, next);
    } catch (error) {
      throw new PersistenceError('commit', error);
    }

    this.listings = next;
    for (const key of batchKeys) {
      this.keys.add(key);
    }

    this.logger.info(`Committed ${newListings.length} new listings`, {
      backend: this.backend.description,
      total: next.length,
    });
  }

  /**
   * Listings currently held, in insertion order
   */
  snapshot(): readonly Listing[] {
    return [...this.requireLoaded()];
  }

  private requireLoaded(): Listing[] {
    if (!this.listings) {
      throw new Error('ListingStore.load() must be called before use');
    }
    return this.listings;
  }
}
