#!/usr/bin/env node
import { loadConfig } from '../config';
import { createScanEnvironment, runInternshipScan } from '../services/internship-scan';
import type { ScanEnvironment } from '../services/internship-scan';
import { createLogger, parseLogLevel } from '../utils/logger';

/**
 * Runs one internship sweep from the command line
 * Exit code 1 means nothing was stored or announced
 */
async function main(): Promise<number> {
  const logger = createLogger({ level: parseLogLevel(process.env.LOG_LEVEL) });
  const startTime = Date.now();

  let environment: ScanEnvironment;
  try {
    const config = loadConfig();
    environment = createScanEnvironment(config, logger);
  } catch (error) {
    logger.error('Invalid configuration', error);
    return 1;
  }

  const controller = new AbortController();
  const cancel = () => {
    logger.warn('Cancellation requested; nothing will be committed');
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    logger.info('Starting internship sweep');
    const summary = await runInternshipScan(environment, { signal: controller.signal });

    logger.info('Internship sweep completed', {
      duration: `${Date.now() - startTime}ms`,
      newListings: summary.newListings.length,
      totalListings: summary.totalListings,
      warnings: summary.report.warnings,
      notified: summary.notified,
    });
    return 0;
  } catch (error) {
    logger.error('Internship sweep failed', error, { duration: `${Date.now() - startTime}ms` });
    return 1;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
    await environment.close();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });
