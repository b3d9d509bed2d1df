/**
 * Canonical internship listing.
 * Every producer's output is normalized into this shape before it reaches
 * deduplication or storage.
 */
export interface Listing {
  readonly company: string;
  readonly role: string;
  readonly location: string;
  readonly link: string;
  readonly source: SourceTag;
  readonly dateFound: Date;
}

/**
 * Producer tags, in the default invocation order.
 */
export const SOURCE_TAGS = [
  'internshala',
  'wellfound',
  'glassdoor',
  'career-pages',
  'linkedin',
  'email-alerts',
] as const;

export type SourceTag = (typeof SOURCE_TAGS)[number];

export function isSourceTag(value: string): value is SourceTag {
  return SOURCE_TAGS.some(tag => tag === value);
}

/**
 * Raw listing data from a producer (before normalization)
 */
export interface RawListing {
  company?: string | null;
  role?: string | null;
  location?: string | null;
  link?: string | null;
  postedAt?: string | Date | null;
}

/**
 * Deduplication key derived from a canonical listing.
 * Either `link:<url>` or `fallback:<company>|<role>|<location>`.
 */
export type IdentityKey = string;

export interface ListingAnnotation {
  score: number;
  rationale: string;
}

/**
 * Listing with optional relevance annotation for display
 */
export interface AnnotatedListing {
  listing: Listing;
  annotation?: ListingAnnotation;
}
