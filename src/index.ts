export * from './types/listing';
export * from './utils/errors';
export { createLogger, LogLevel } from './utils/logger';
export type { Logger, LogEntry, LogSink } from './utils/logger';
export { keyOf } from './utils/identity';
export { cleanText, normalizeLink, normalizeListing } from './services/normalizer';
export { Reconciler } from './services/reconciler';
export type { ReconcileReport, ReconcileResult, SourceStats } from './services/reconciler';
export { ListingStore } from './store/listing-store';
export type { ListingBackend } from './store/listing-store';
export { CsvFileBackend, CSV_HEADER } from './store/csv-file';
export { PostgresBackend } from './store/postgres';
export type { ListingProducer } from './sources/base';
export { createListingProducers } from './sources';
export type { Notifier } from './services/notification-dispatcher';
export { NotifierGroup, TelegramNotifier } from './services/notification-dispatcher';
export { EmailNotifier } from './services/email-notifier';
export type { ListingEnricher } from './services/enrichment';
export { GeminiEnricher, NoopEnricher } from './services/enrichment';
export { runInternshipScan, createScanEnvironment } from './services/internship-scan';
export { loadConfig } from './config';
export type { Config } from './config';
