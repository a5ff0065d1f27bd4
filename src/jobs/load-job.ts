import type { Logger } from 'pino';
import { loadLoaderConfig } from '../config.js';
import type { ConnectionOpener } from '../db.js';
import { NotConnectedError } from '../errors.js';
import { DatabaseManager } from '../services/database-manager.js';
import { listFiles } from '../services/file-discovery.js';
import { TableLoader } from '../services/table-loader.js';
import type { LoadReport } from '../types.js';

type LoadJobOptions = {
  logger: Logger;
  openConnection?: ConnectionOpener;
};

/**
 * Loads every CSV in the external-data directory, sorted by path so that a
 * rerun processes files in the same order. Only configuration errors and a
 * failed connection are thrown; per-table problems end up in the report.
 */
export async function runLoadJob(
  env: Record<string, string | undefined>,
  options: LoadJobOptions
): Promise<LoadReport> {
  const { logger } = options;
  const config = loadLoaderConfig(env);

  const files = (await listFiles(config.externalDataDir, config.extension, logger)).sort((a, b) =>
    a.localeCompare(b)
  );

  const db = await DatabaseManager.connect(config.database, logger, options.openConnection);
  if (!db.isConnected) {
    throw new NotConnectedError(`could not connect to database "${config.database.database}"`);
  }

  try {
    const loader = new TableLoader(db, config.tableNameRule, logger);
    const report = await loader.loadAll(files);
    const summary = { loaded: report.loaded, skipped: report.skipped, failed: report.failed };
    if (report.failed > 0 || report.skipped > 0) {
      logger.warn(summary, 'Load finished with skipped or failed files.');
    } else {
      logger.info(summary, 'Load finished.');
    }
    return report;
  } finally {
    await db.close();
  }
}
