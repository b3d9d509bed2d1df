import puppeteer from 'puppeteer-core';
import type { Browser, Page } from 'puppeteer-core';
import chromium from '@sparticuz/chromium';
import type { RawListing } from '../types/listing';
import type { Logger } from '../utils/logger';
import type { ListingProducer } from './base';
import { queryWords } from './base';
import { BROWSER_USER_AGENT } from './http';

export interface LinkedInOptions {
  logger: Logger;
  email?: string;
  password?: string;
  maxListings: number;
  executablePath?: string;
  serverless: boolean;
  launch?: () => Promise<Browser>;
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * The parts of a DOM element the card reader touches
 */
export interface CardNode {
  textContent: string | null;
  getAttribute(name: string): string | null | undefined;
}

export interface CardElement {
  querySelector(selectors: string): CardNode | null;
}

/**
 * Reads search result cards. Runs inside the page, so it must not reference
 * anything outside its own body.
 */
export function readBaseCards(cards: CardElement[], max: number): RawListing[] {
  const text = (card: CardElement, selector: string): string =>
    card.querySelector(selector)?.textContent?.trim() ?? '';

  return cards.slice(0, max).map(card => ({
    company: text(card, '.hidden-nested-link'),
    role: text(card, '.base-search-card__title'),
    location: text(card, '.job-search-card__location'),
    link: card.querySelector('a')?.getAttribute('href') ?? '',
    postedAt: card.querySelector('time[datetime]')?.getAttribute('datetime') ?? null,
  }));
}

/**
 * LinkedIn job search adapter
 * Logs in with a headless browser and reads the internship search results
 */
export class LinkedInSource implements ListingProducer {
  readonly name = 'linkedin';
  private readonly baseUrl = 'https://www.linkedin.com';

  constructor(private readonly options: LinkedInOptions) {}

  async fetch(skillsQuery: string): Promise<RawListing[]> {
    const { logger, email, password } = this.options;

    if (!email || !password) {
      logger.warn('LinkedIn credentials not found. Skipping LinkedIn scraping.');
      return [];
    }

    let browser: Browser | null = null;

    try {
      logger.info('Scraping LinkedIn via headless browser...');
      browser = await (this.options.launch ?? (() => this.launchBrowser()))();
      const page = await browser.newPage();

      await page.setViewport({ width: 1920, height: 1080 });
      await page.setUserAgent(BROWSER_USER_AGENT);
      page.setDefaultNavigationTimeout(30000);

      await this.login(page, email, password);

      const keywords = queryWords(skillsQuery).slice(0, 3).join(' ');
      const searchUrl = `${this.baseUrl}/jobs/search/?keywords=${encodeURIComponent(keywords)}&f_jt=INT`;
      logger.info(`Navigating to ${searchUrl}`);
      await page.goto(searchUrl, { waitUntil: 'domcontentloaded' });
      await sleep(3000);

      // Scroll to load more jobs
      for (let i = 0; i < 3; i++) {
        await page.mouse.wheel({ deltaY: 500 });
        await sleep(1000);
      }

      const listings = await this.extractListings(page);
      logger.info(`Scraped ${listings.length} internships from LinkedIn`);
      return listings;
    } finally {
      if (browser) {
        await browser.close();
      }
    }
  }

  private async login(page: Page, email: string, password: string): Promise<void> {
    this.options.logger.info('Logging into LinkedIn...');
    await page.goto(`${this.baseUrl}/login`, { waitUntil: 'domcontentloaded' });
    await page.waitForSelector('#username', { timeout: 20000 });
    await page.type('#username', email);
    await page.type('#password', password);
    await Promise.all([
      page.waitForNavigation({ waitUntil: 'domcontentloaded', timeout: 30000 }),
      page.click('button[type="submit"]'),
    ]);
  }

  private async extractListings(page: Page): Promise<RawListing[]> {
    return page.$$eval('.base-card', readBaseCards, this.options.maxListings);
  }

  private async launchBrowser(): Promise<Browser> {
    if (this.options.serverless) {
      // Use serverless-optimized Chromium
      return puppeteer.launch({
        args: chromium.args,
        defaultViewport: chromium.defaultViewport,
        executablePath: await chromium.executablePath(),
        headless: chromium.headless,
      });
    }

    if (!this.options.executablePath) {
      throw new Error('CHROME_EXECUTABLE_PATH is required to run LinkedIn scraping locally');
    }

    return puppeteer.launch({
      executablePath: this.options.executablePath,
      headless: 'new',
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
    });
  }
}
