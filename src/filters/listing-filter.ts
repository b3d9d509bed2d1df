import type { RawListing } from '../types/listing';
import type { Logger } from '../utils/logger';

export interface ListingFilterOptions {
  excludedKeywords: string[];
  maxPostingAgeHours: number;
}

/**
 * Screens raw records before normalization
 * Records without a usable posting date are never dropped for age
 */
export class ListingFilter {
  constructor(
    private options: ListingFilterOptions,
    private logger: Logger
  ) {}

  /**
   * Checks if a raw listing passes the configured filters
   */
  matches(raw: RawListing, now: Date): boolean {
    if (this.options.excludedKeywords.length > 0) {
      const text = `${raw.role ?? ''} ${raw.company ?? ''}`.toLowerCase();
      const hasExcluded = this.options.excludedKeywords.some(keyword =>
        text.includes(keyword.toLowerCase())
      );
      if (hasExcluded) {
        this.logger.debug(`Listing filtered out: contains excluded keyword`, { role: raw.role });
        return false;
      }
    }

    if (this.options.maxPostingAgeHours > 0 && raw.postedAt) {
      const postedAt = raw.postedAt instanceof Date ? raw.postedAt : new Date(raw.postedAt);
      if (!isNaN(postedAt.getTime())) {
        const cutoff = now.getTime() - this.options.maxPostingAgeHours * 60 * 60 * 1000;
        if (postedAt.getTime() < cutoff) {
          this.logger.debug(`Listing filtered out: posted before cutoff`, {
            role: raw.role,
            postedAt: postedAt.toISOString(),
          });
          return false;
        }
      }
    }

    return true;
  }
}
