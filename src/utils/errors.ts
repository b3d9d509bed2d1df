import type { IdentityKey, RawListing, SourceTag } from '../types/listing';

/**
 * Base class for every error the sweep raises on purpose
 */
export class SweepError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A single producer failed. The run skips that source and continues.
 */
export class ProducerError extends SweepError {
  constructor(
    readonly source: SourceTag,
    cause: unknown
  ) {
    super(`Producer ${source} failed: ${describeCause(cause)}`, { cause });
  }
}

/**
 * A raw record carried neither a company nor a role.
 */
export class MalformedListingError extends SweepError {
  constructor(
    readonly raw: RawListing,
    readonly source: SourceTag
  ) {
    super(`Listing from ${source} has neither company nor role`);
  }
}

/**
 * The store could not read or durably commit listings.
 */
export class PersistenceError extends SweepError {
  constructor(
    readonly operation: 'load' | 'commit',
    cause: unknown
  ) {
    super(`Store ${operation} failed: ${describeCause(cause)}`, { cause });
  }
}

/**
 * An append tried to introduce a key the store already holds.
 */
export class DuplicateKeyViolation extends SweepError {
  constructor(readonly keys: IdentityKey[]) {
    super(`Refusing to append ${keys.length} listing(s) with existing identity keys: ${keys.join(', ')}`);
  }
}

export class RunCancelledError extends SweepError {
  constructor(stage: string) {
    super(`Run cancelled ${stage}`);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
