import type { Logger } from 'pino';
import { loadFetcherConfig } from '../config.js';
import { authenticate, fetchDataset } from '../services/dataset-fetcher.js';

type FetchJobOptions = {
  logger: Logger;
  fetchImpl?: typeof fetch;
};

export type FetchJobResult = {
  datasetId: string;
  destination: string;
  files: string[];
};

export async function runFetchJob(
  env: Record<string, string | undefined>,
  options: FetchJobOptions
): Promise<FetchJobResult> {
  const config = loadFetcherConfig(env);
  const client = await authenticate(config.credentials, {
    apiBase: config.apiBase,
    logger: options.logger,
    fetchImpl: options.fetchImpl,
  });
  const files = await fetchDataset(client, config.datasetId, config.externalDataDir);
  return { datasetId: config.datasetId, destination: config.externalDataDir, files };
}
