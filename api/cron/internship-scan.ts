import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../../src/config';
import { createScanEnvironment, runInternshipScan } from '../../src/services/internship-scan';
import type { ScanEnvironment } from '../../src/services/internship-scan';
import { createLogger, parseLogLevel } from '../../src/utils/logger';

/**
 * Internship sweep cron endpoint
 * Runs on the Vercel Cron schedule; only one run should be in flight per store
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const logger = createLogger({ level: parseLogLevel(process.env.LOG_LEVEL) });

  // Verify this is a cron request
  const authHeader = req.headers.authorization;
  const cronSecret = process.env.CRON_SECRET;

  if (cronSecret && authHeader !== `Bearer ${cronSecret}`) {
    logger.warn('Unauthorized cron request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  const startTime = Date.now();
  logger.info('Internship sweep cron started');

  let environment: ScanEnvironment;
  try {
    environment = createScanEnvironment(loadConfig(), logger);
  } catch (error) {
    logger.error('Invalid configuration', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return;
  }

  try {
    const summary = await runInternshipScan(environment);
    const duration = Date.now() - startTime;

    logger.info('Internship sweep cron completed', {
      duration: `${duration}ms`,
      newListings: summary.newListings.length,
      warnings: summary.report.warnings,
    });

    res.status(200).json({
      success: true,
      stats: {
        newListings: summary.newListings.length,
        totalListings: summary.totalListings,
        warnings: summary.report.warnings,
        notified: summary.notified,
        notificationError: summary.notificationError ?? null,
        duration: `${duration}ms`,
      },
      sourceStats: summary.report.sources,
    });
  } catch (error) {
    const duration = Date.now() - startTime;
    logger.error('Internship sweep cron failed', error, { duration: `${duration}ms` });

    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  } finally {
    await environment.close();
  }
}
