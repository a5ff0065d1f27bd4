import 'dotenv/config';
import { loadLoggingConfig } from '../src/config.js';
import { describeError } from '../src/errors.js';
import { runLoadJob } from '../src/jobs/load-job.js';
import { createLogger } from '../src/logger.js';

const logger = createLogger(import.meta.url, loadLoggingConfig(process.env));

runLoadJob(process.env, { logger }).catch((error: unknown) => {
  logger.error({ err: error }, `An error occurred: ${describeError(error)}`);
  process.exitCode = 1;
});
