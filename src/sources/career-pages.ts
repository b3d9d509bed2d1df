import { parse } from 'node-html-parser';
import type { HTMLElement } from 'node-html-parser';
import type { RawListing } from '../types/listing';
import type { Logger } from '../utils/logger';
import type { ListingProducer } from './base';
import { resolveLink } from './html-board';
import type { PageFetcher } from './http';

export interface CareerPage {
  company: string;
  url: string;
}

export const DEFAULT_CAREER_PAGES: CareerPage[] = [
  { company: 'Google', url: 'https://careers.google.com/jobs/results/' },
  { company: 'Microsoft', url: 'https://careers.microsoft.com/us/en/search-results' },
  { company: 'Amazon', url: 'https://amazon.jobs/en/search?offset=0&result_limit=100&sort=recent' },
  { company: 'Meta', url: 'https://www.metacareers.com/jobs/' },
  { company: 'Apple', url: 'https://jobs.apple.com/en-us/search' },
  { company: 'Netflix', url: 'https://jobs.netflix.com/search' },
  { company: 'Intel', url: 'https://jobs.intel.com/en/search-jobs' },
  { company: 'IBM', url: 'https://www.ibm.com/careers/search/' },
  { company: 'Oracle', url: 'https://careers.oracle.com/' },
  { company: 'Salesforce', url: 'https://www.salesforce.com/company/careers/search-jobs/' },
];

const MAX_ROLE_LENGTH = 80;

export interface CareerPagesOptions {
  fetcher: PageFetcher;
  logger: Logger;
  pages?: CareerPage[];
  maxPerCompany?: number;
  delayMs?: number;
}

function classOf(element: HTMLElement): string {
  return (element.getAttribute('class') ?? '').toLowerCase();
}

function findByClass(root: HTMLElement, tags: string, matches: (className: string) => boolean): HTMLElement | undefined {
  return root.querySelectorAll(tags).find(element => matches(classOf(element)));
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Scans big-company career pages for postings with "intern" in the title
 * Markup differs per company, so cards are found by class-name patterns
 */
export class CareerPagesSource implements ListingProducer {
  readonly name = 'career-pages';
  private readonly pages: CareerPage[];
  private readonly maxPerCompany: number;
  private readonly delayMs: number;

  constructor(private readonly options: CareerPagesOptions) {
    this.pages = options.pages ?? DEFAULT_CAREER_PAGES;
    this.maxPerCompany = options.maxPerCompany ?? 5;
    this.delayMs = options.delayMs ?? 1000;
  }

  async fetch(_skillsQuery: string): Promise<RawListing[]> {
    const { fetcher, logger } = this.options;
    const listings: RawListing[] = [];

    for (const [index, page] of this.pages.entries()) {
      if (index > 0 && this.delayMs > 0) {
        await sleep(this.delayMs);
      }

      try {
        logger.debug(`Checking ${page.company} careers...`);
        const response = await fetcher.get(page.url);

        if (response.status !== 200) {
          logger.debug(`Could not access ${page.company} careers page`, { status: response.status });
          continue;
        }

        listings.push(...this.extractInternships(page, response.body));
      } catch (error) {
        logger.debug(`Error checking ${page.company}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info(`Scraped ${listings.length} internships from major company career pages`);
    return listings;
  }

  extractInternships(page: CareerPage, html: string): RawListing[] {
    const root = parse(html);
    const listings: RawListing[] = [];

    const jobElements = root
      .querySelectorAll('div, article')
      .filter(element => {
        const className = classOf(element);
        return className.includes('job') || className.includes('posting');
      })
      .slice(0, this.maxPerCompany);

    for (const job of jobElements) {
      const titleElement = findByClass(job, 'h2, h3, a', className =>
        className.includes('title') || className.includes('job')
      );
      const title = titleElement?.text.trim();

      if (!title || !title.toLowerCase().includes('intern')) continue;

      const locationElement = findByClass(job, 'span, div', className => className.includes('location'));
      const href = job.querySelector('a[href]')?.getAttribute('href');

      listings.push({
        company: page.company,
        role: title.slice(0, MAX_ROLE_LENGTH),
        location: locationElement?.text.trim() || 'Check website',
        link: href ? resolveLink(href, page.url) : page.url,
      });
    }

    return listings;
  }
}
