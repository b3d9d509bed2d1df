import { parse } from 'node-html-parser';
import type { HTMLElement } from 'node-html-parser';
import type { RawListing, SourceTag } from '../types/listing';
import type { Logger } from '../utils/logger';
import type { ListingProducer } from './base';
import { queryWords } from './base';
import type { PageFetcher } from './http';

/**
 * Describes where a job board keeps its internship cards
 * Each field lists selectors tried in order
 */
export interface BoardLayout {
  name: SourceTag;
  origin: string;
  searchUrl(words: string[]): string;
  cardSelectors: string[];
  companySelectors: string[];
  roleSelectors: string[];
  locationSelectors: string[];
  defaultLocation: string;
}

export interface HtmlBoardOptions {
  fetcher: PageFetcher;
  logger: Logger;
  maxListings: number;
}

export function firstMatch(root: HTMLElement, selectors: string[]): HTMLElement | null {
  for (const selector of selectors) {
    const element = root.querySelector(selector);
    if (element) return element;
  }
  return null;
}

export function resolveLink(href: string | undefined, origin: string): string {
  if (!href) return '';
  try {
    return new URL(href, origin).toString();
  } catch {
    return href;
  }
}

/**
 * Scrapes one server-rendered job board search page
 */
export class HtmlBoardSource implements ListingProducer {
  readonly name: SourceTag;

  constructor(
    private readonly board: BoardLayout,
    private readonly options: HtmlBoardOptions
  ) {
    this.name = board.name;
  }

  async fetch(skillsQuery: string): Promise<RawListing[]> {
    const { fetcher, logger } = this.options;
    const url = this.board.searchUrl(queryWords(skillsQuery));

    logger.info(`Scraping ${this.name}`, { url });

    const page = await fetcher.get(url, { Referer: `${this.board.origin}/` });
    if (!page.ok) {
      throw new Error(`${this.name} returned ${page.status}`);
    }

    const listings = this.extractListings(page.body);
    logger.info(`Scraped ${listings.length} internships from ${this.name}`);
    return listings;
  }

  extractListings(html: string): RawListing[] {
    const root = parse(html);
    const cards = this.findCards(root).slice(0, this.options.maxListings);
    const listings: RawListing[] = [];

    for (const card of cards) {
      const company = firstMatch(card, this.board.companySelectors)?.text.trim();
      const role = firstMatch(card, this.board.roleSelectors)?.text.trim();

      if (!company || !role) {
        this.options.logger.debug(`Skipping ${this.name} card without company or role`);
        continue;
      }

      const location = firstMatch(card, this.board.locationSelectors)?.text.trim();
      const href = card.querySelector('a[href]')?.getAttribute('href');

      listings.push({
        company,
        role,
        location: location || this.board.defaultLocation,
        link: resolveLink(href, this.board.origin),
      });
    }

    return listings;
  }

  private findCards(root: HTMLElement): HTMLElement[] {
    for (const selector of this.board.cardSelectors) {
      const cards = root.querySelectorAll(selector);
      if (cards.length > 0) return cards;
    }
    return [];
  }
}
