import type { RawListing, SourceTag } from '../types/listing';

/**
 * Base interface for all listing producers
 * Each source adapter must implement this interface
 */
export interface ListingProducer {
  /**
   * Source tag stamped on every listing this producer yields
   */
  readonly name: SourceTag;

  /**
   * Fetches raw listings matching the skills query
   * @param skillsQuery - Free-form skills/interests, e.g. "Python, Machine Learning"
   * @returns The producer's complete batch; throws if the source is unavailable
   */
  fetch(skillsQuery: string): Promise<RawListing[]>;

  /**
   * Called once the batch from the last fetch has been committed to the store.
   * Producers that consume their input (e.g. mark mail read) do it here, so a
   * failed or cancelled run leaves that input for the next one.
   */
  acknowledge?(): Promise<void>;
}

/**
 * Splits a skills query into words, dropping separators
 */
export function queryWords(skillsQuery: string): string[] {
  return skillsQuery
    .split(/[\s,]+/)
    .map(word => word.trim())
    .filter(word => word.length > 0);
}
