import type { Config } from '../config';
import type { ListingProducer } from '../sources/base';
import { createListingProducers } from '../sources';
import { ListingStore } from '../store/listing-store';
import type { ListingBackend } from '../store/listing-store';
import { CsvFileBackend } from '../store/csv-file';
import { PostgresBackend } from '../store/postgres';
import { createPool } from '../db/client';
import { ListingFilter } from '../filters/listing-filter';
import { Reconciler } from './reconciler';
import type { ReconcileReport, RunOptions } from './reconciler';
import type { ListingEnricher } from './enrichment';
import { GeminiEnricher, NoopEnricher, createGeminiModel } from './enrichment';
import type { Notifier } from './notification-dispatcher';
import { NotifierGroup, TelegramNotifier, createTelegramSender } from './notification-dispatcher';
import { EmailNotifier, createSmtpTransport } from './email-notifier';
import type { AnnotatedListing } from '../types/listing';
import type { Logger } from '../utils/logger';

export interface ScanDependencies {
  config: Config;
  logger: Logger;
  producers: ListingProducer[];
  store: ListingStore;
  enricher: ListingEnricher;
  notifier: Notifier | null;
  filter?: ListingFilter;
}

export interface ScanSummary {
  newListings: AnnotatedListing[];
  totalListings: number;
  report: ReconcileReport;
  notified: boolean;
  notificationError?: string;
}

/**
 * One full sweep: reconcile all sources, score the new listings, announce them.
 * Store or invariant failures reject before anything is announced.
 */
export async function runInternshipScan(
  deps: ScanDependencies,
  options: RunOptions = {}
): Promise<ScanSummary> {
  const { config, logger, producers, store, enricher, notifier, filter } = deps;

  logger.info(`Searching ${producers.length} source(s) for internships`, {
    sources: producers.map(p => p.name),
    skillsQuery: config.skillsQuery,
  });

  const reconciler = new Reconciler({
    store,
    logger,
    filter,
    producerTimeoutMs: config.producerTimeoutMs,
  });

  const { newListings, allListings, report } = await reconciler.run(producers, config.skillsQuery, options);

  if (newListings.length === 0) {
    logger.info('No new internships found', { warnings: report.warnings });
    return { newListings: [], totalListings: allListings.length, report, notified: false };
  }

  const annotated = await enricher.annotate(newListings, config.skillsQuery);

  if (!notifier) {
    logger.warn('No notifier configured; new internships were stored but not announced', {
      count: newListings.length,
    });
    return { newListings: annotated, totalListings: allListings.length, report, notified: false };
  }

  try {
    await notifier.notify(annotated);
    return { newListings: annotated, totalListings: allListings.length, report, notified: true };
  } catch (error) {
    logger.error('Notification delivery failed', error, { count: newListings.length });
    return {
      newListings: annotated,
      totalListings: allListings.length,
      report,
      notified: false,
      notificationError: error instanceof Error ? error.message : String(error),
    };
  }
}

export interface ScanEnvironment extends ScanDependencies {
  close(): Promise<void>;
}

/**
 * Builds production dependencies from configuration
 */
export function createScanEnvironment(config: Config, logger: Logger): ScanEnvironment {
  let backend: ListingBackend;
  let close = async (): Promise<void> => {};

  if (config.storeBackend === 'postgres') {
    if (!config.databaseUrl) {
      throw new Error('DATABASE_URL is required for the postgres store');
    }
    const pool = createPool({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl });
    pool.on('error', err => {
      logger.error('Unexpected error on idle database client', err);
    });
    backend = new PostgresBackend(pool);
    close = () => pool.end();
  } else {
    backend = new CsvFileBackend(config.listingsFile);
  }

  const { apiKey, model, timeoutMs } = config.gemini;
  const enricher: ListingEnricher = apiKey
    ? new GeminiEnricher(createGeminiModel(apiKey, model, timeoutMs), {
        logger,
        maxListings: config.maxEnrichedListings,
      })
    : new NoopEnricher();

  const notifiers: Notifier[] = [];

  const { botToken, chatId } = config.telegram;
  if (botToken && chatId) {
    notifiers.push(
      new TelegramNotifier(createTelegramSender(botToken), {
        chatId,
        maxMessages: config.maxNotificationsPerRun,
        logger,
      })
    );
  }

  const { address, password, smtpHost, smtpPort } = config.email;
  if (config.enableEmailNotifications && address && password) {
    notifiers.push(
      new EmailNotifier(createSmtpTransport({ host: smtpHost, port: smtpPort, user: address, password }), {
        address,
        logger,
      })
    );
  }

  const notifier: Notifier | null =
    notifiers.length === 0 ? null : notifiers.length === 1 ? notifiers[0] : new NotifierGroup(notifiers, logger);

  return {
    config,
    logger,
    producers: createListingProducers(config, logger),
    store: new ListingStore(backend, logger),
    enricher,
    notifier,
    filter: new ListingFilter(
      { excludedKeywords: config.excludedKeywords, maxPostingAgeHours: config.maxPostingAgeHours },
      logger
    ),
    close,
  };
}
