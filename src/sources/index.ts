import type { ListingProducer } from './base';
import { HtmlBoardSource } from './html-board';
import { GLASSDOOR, INTERNSHALA, WELLFOUND } from './boards';
import { CareerPagesSource } from './career-pages';
import { LinkedInSource } from './linkedin';
import { EmailAlertsSource, ImapAlertMailbox } from './email-alerts';
import { createPageFetcher } from './http';
import type { Config } from '../config';
import type { Logger } from '../utils/logger';

/**
 * Creates the enabled producers in their fixed invocation order:
 * internshala, wellfound, glassdoor, career-pages, linkedin, email-alerts.
 *
 * When two sources yield the same posting in one run, the earlier source in
 * this list is the one recorded.
 */
export function createListingProducers(config: Config, logger: Logger): ListingProducer[] {
  const producers: ListingProducer[] = [];
  const fetcher = createPageFetcher(config.requestTimeoutMs);
  const boardOptions = { fetcher, logger, maxListings: config.maxListingsPerSource };

  if (config.enableInternshala) {
    producers.push(new HtmlBoardSource(INTERNSHALA, boardOptions));
  }

  if (config.enableWellfound) {
    producers.push(new HtmlBoardSource(WELLFOUND, boardOptions));
  }

  if (config.enableGlassdoor) {
    producers.push(new HtmlBoardSource(GLASSDOOR, boardOptions));
  }

  if (config.enableCareerPages) {
    producers.push(new CareerPagesSource({ fetcher, logger }));
  }

  if (config.enableLinkedIn) {
    producers.push(
      new LinkedInSource({
        logger,
        email: config.linkedin.email,
        password: config.linkedin.password,
        executablePath: config.linkedin.chromeExecutablePath,
        maxListings: config.maxListingsPerSource,
        serverless: config.serverless,
      })
    );
  }

  if (config.enableEmailAlerts) {
    const { address, password, imapHost, imapPort } = config.email;
    const openMailbox =
      address && password
        ? () => new ImapAlertMailbox({ host: imapHost, port: imapPort, user: address, password }, logger)
        : null;
    producers.push(new EmailAlertsSource({ logger, openMailbox }));
  }

  return producers;
}
