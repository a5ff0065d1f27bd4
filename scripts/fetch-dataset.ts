import 'dotenv/config';
import { loadLoggingConfig } from '../src/config.js';
import { describeError } from '../src/errors.js';
import { runFetchJob } from '../src/jobs/fetch-job.js';
import { createLogger } from '../src/logger.js';

const logger = createLogger(import.meta.url, loadLoggingConfig(process.env));

runFetchJob(process.env, { logger })
  .then((result) => {
    logger.info({ destination: result.destination, files: result.files }, `Fetched ${result.files.length} file(s).`);
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, `An error occurred: ${describeError(error)}`);
    process.exitCode = 1;
  });
