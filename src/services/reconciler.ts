import type { IdentityKey, Listing, RawListing, SourceTag } from '../types/listing';
import type { ListingProducer } from '../sources/base';
import type { ListingStore } from '../store/listing-store';
import type { ListingFilter } from '../filters/listing-filter';
import { normalizeListing } from './normalizer';
import { keyOf } from '../utils/identity';
import { MalformedListingError, ProducerError, RunCancelledError } from '../utils/errors';
import type { Logger } from '../utils/logger';

export interface SourceStats {
  fetched: number;
  filtered: number;
  malformed: number;
  duplicates: number;
  accepted: number;
  failed: boolean;
}

export interface ReconcileReport {
  startedAt: Date;
  sources: Partial<Record<SourceTag, SourceStats>>;
  warnings: number;
}

export interface ReconcileResult {
  newListings: Listing[];
  allListings: Listing[];
  report: ReconcileReport;
}

export interface ReconcilerOptions {
  store: ListingStore;
  logger: Logger;
  filter?: ListingFilter;
  producerTimeoutMs?: number;
  clock?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Pulls every producer in order, keeps the first listing seen for each
 * identity key, and commits the new ones to the store in one append.
 */
export class Reconciler {
  private readonly clock: () => Date;

  constructor(private readonly options: ReconcilerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async run(
    producers: readonly ListingProducer[],
    skillsQuery: string,
    runOptions: RunOptions = {}
  ): Promise<ReconcileResult> {
    const { store, logger, filter } = this.options;
    const { signal } = runOptions;
    const startedAt = this.clock();

    const existing = await store.load();
    const seen = new Set<IdentityKey>(store.existingKeys());
    const newListings: Listing[] = [];
    const delivered: ListingProducer[] = [];
    const report: ReconcileReport = { startedAt, sources: {}, warnings: 0 };

    for (const producer of producers) {
      if (signal?.aborted) {
        throw new RunCancelledError('before all sources were read');
      }

      // Producers sharing a tag report into one entry
      const stats: SourceStats = report.sources[producer.name] ?? {
        fetched: 0,
        filtered: 0,
        malformed: 0,
        duplicates: 0,
        accepted: 0,
        failed: false,
      };
      report.sources[producer.name] = stats;

      logger.info(`Fetching from source: ${producer.name}`);

      let batch: RawListing[];
      try {
        batch = await this.invoke(producer, skillsQuery);
      } catch (error) {
        const failure = error instanceof ProducerError ? error : new ProducerError(producer.name, error);
        stats.failed = true;
        report.warnings++;
        logger.warn(`Source ${producer.name} failed, continuing without it`, {
          error: failure.message,
        });
        continue;
      }

      stats.fetched += batch.length;
      delivered.push(producer);

      for (const raw of batch) {
        if (filter && !filter.matches(raw, startedAt)) {
          stats.filtered++;
          continue;
        }

        let listing: Listing;
        try {
          listing = normalizeListing(raw, producer.name, startedAt);
        } catch (error) {
          if (!(error instanceof MalformedListingError)) throw error;
          stats.malformed++;
          report.warnings++;
          logger.warn(`Dropping malformed listing from ${producer.name}`, {
            link: raw.link ?? null,
            location: raw.location ?? null,
          });
          continue;
        }

        const key = keyOf(listing);
        if (seen.has(key)) {
          stats.duplicates++;
          continue;
        }

        seen.add(key);
        newListings.push(listing);
        stats.accepted++;
      }

      logger.info(`Source ${producer.name} completed`, { ...stats });
    }

    if (signal?.aborted) {
      throw new RunCancelledError('before committing new listings');
    }

    await store.appendAll(newListings);
    await this.acknowledge(delivered);

    logger.info(`Reconciliation complete`, {
      existing: existing.length,
      new: newListings.length,
      warnings: report.warnings,
    });

    return {
      newListings,
      allListings: [...existing, ...newListings],
      report,
    };
  }

  /**
   * Lets producers consume their input once the commit is durable.
   * A failed acknowledgement only means the input is offered again next run.
   */
  private async acknowledge(producers: readonly ListingProducer[]): Promise<void> {
    for (const producer of producers) {
      if (!producer.acknowledge) continue;
      try {
        await producer.acknowledge();
      } catch (error) {
        this.options.logger.warn(`Could not acknowledge batch from ${producer.name}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  /**
   * Calls a producer, bounded by the configured timeout
   */
  private async invoke(producer: ListingProducer, skillsQuery: string): Promise<RawListing[]> {
    const timeoutMs = this.options.producerTimeoutMs;
    if (!timeoutMs || timeoutMs <= 0) {
      return producer.fetch(skillsQuery);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new ProducerError(producer.name, new Error(`timed out after ${timeoutMs}ms`))),
        timeoutMs
      );
    });

    try {
      return await Promise.race([producer.fetch(skillsQuery), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
