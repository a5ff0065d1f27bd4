import path from 'node:path';
import { promises as fsp } from 'node:fs';
import extract from 'extract-zip';
import type { Logger } from 'pino';
import type { KaggleCredentials } from '../config.js';
import { AuthenticationError, ConfigurationError, describeError, FetchError } from '../errors.js';

type FetchImpl = typeof fetch;

type ClientOptions = {
  apiBase: string;
  logger: Logger;
  fetchImpl?: FetchImpl;
};

/** Authenticated handle on the dataset-hosting REST API. */
export class DatasetClient {
  readonly apiBase: string;
  private readonly authorization: string;
  private readonly fetchImpl: FetchImpl;
  readonly logger: Logger;

  constructor(credentials: KaggleCredentials, options: ClientOptions) {
    this.apiBase = options.apiBase.replace(/\/+$/, '');
    this.authorization = `Basic ${Buffer.from(`${credentials.username}:${credentials.key}`).toString('base64')}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger.child({ component: 'dataset-fetcher' });
  }

  async request(pathname: string, query?: Record<string, string | number>): Promise<Response> {
    const params = new URLSearchParams();
    if (query) {
      Object.entries(query).forEach(([key, value]) => params.append(key, String(value)));
    }
    const queryString = params.toString();
    const url = queryString ? `${this.apiBase}${pathname}?${queryString}` : `${this.apiBase}${pathname}`;
    try {
      return await this.fetchImpl(url, { headers: { Authorization: this.authorization } });
    } catch (error) {
      throw new FetchError(`Request to ${url} failed: ${describeError(error)}`, { cause: error });
    }
  }
}

function requireCredentials(credentials: Partial<KaggleCredentials>): KaggleCredentials {
  const username = credentials.username?.trim();
  const key = credentials.key?.trim();
  if (!username || !key) {
    throw new ConfigurationError('Kaggle credentials are missing.');
  }
  return { username, key };
}

/**
 * Checks the credentials against the API and returns a client bound to them.
 * A 401/403 is an `AuthenticationError`; anything else that fails is a
 * `FetchError`.
 */
export async function authenticate(
  credentials: Partial<KaggleCredentials>,
  options: ClientOptions
): Promise<DatasetClient> {
  const client = new DatasetClient(requireCredentials(credentials), options);
  const response = await client.request('/datasets/list', { page: 1 });

  if (response.status === 401 || response.status === 403) {
    client.logger.error({ status: response.status }, 'Kaggle API authentication failed.');
    throw new AuthenticationError(`Kaggle API rejected the credentials (HTTP ${response.status})`, {
      details: { status: response.status },
    });
  }
  if (!response.ok) {
    throw new FetchError(`Kaggle API authentication check failed with HTTP ${response.status}`, {
      details: { status: response.status },
    });
  }

  client.logger.info('Kaggle API authentication successful.');
  return client;
}

export function parseDatasetId(datasetId: string): { owner: string; slug: string } {
  const trimmed = datasetId.trim();
  if (!trimmed) {
    throw new ConfigurationError('Dataset ID is missing.');
  }
  const match = /^([A-Za-z0-9][\w.-]*)\/([A-Za-z0-9][\w.-]*)$/.exec(trimmed);
  if (!match) {
    throw new ConfigurationError(`Dataset ID "${trimmed}" must look like "owner/dataset-slug".`);
  }
  return { owner: match[1], slug: match[2] };
}

/**
 * Downloads the dataset archive into `destinationDir`, extracts it there
 * (replacing files of the same name) and removes the archive. Returns the
 * names of the extracted entries.
 */
export async function fetchDataset(
  client: DatasetClient,
  datasetId: string,
  destinationDir: string
): Promise<string[]> {
  const { owner, slug } = parseDatasetId(datasetId);
  const targetDir = path.resolve(destinationDir);
  const archivePath = path.join(targetDir, `${slug}.zip`);
  const log = client.logger;

  log.info({ datasetId, destination: targetDir }, `Downloading dataset: ${owner}/${slug}`);
  const response = await client.request(
    `/datasets/download/${encodeURIComponent(owner)}/${encodeURIComponent(slug)}`
  );
  if (!response.ok) {
    throw new FetchError(`Failed to download dataset ${owner}/${slug}: HTTP ${response.status}`, {
      details: { status: response.status },
    });
  }

  const entries: string[] = [];
  try {
    const archive = Buffer.from(await response.arrayBuffer());
    await fsp.mkdir(targetDir, { recursive: true });
    await fsp.writeFile(archivePath, archive);
    await extract(archivePath, {
      dir: targetDir,
      onEntry: (entry) => {
        if (!entry.fileName.endsWith('/')) entries.push(entry.fileName);
      },
    });
  } catch (error) {
    throw new FetchError(`Failed to download dataset ${owner}/${slug}: ${describeError(error)}`, { cause: error });
  } finally {
    await fsp.rm(archivePath, { force: true });
  }

  log.info({ datasetId, files: entries.length }, 'Dataset downloaded and extracted successfully.');
  return entries;
}
