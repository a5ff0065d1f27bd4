import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_EXTERNAL_DATA_DIR = 'data/external';
export const DEFAULT_KAGGLE_API_BASE = 'https://www.kaggle.com/api/v1';
export const DEFAULT_TABLE_SUFFIX_PATTERN = '_[^_]*$';

type Env = Record<string, string | undefined>;

const required = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

const optional = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : fallback));

const loggingSchema = z.object({
  LOG_DIR: optional('logs'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const fetcherSchema = z.object({
  KAGGLE_USERNAME: required('KAGGLE_USERNAME'),
  KAGGLE_KEY: required('KAGGLE_KEY'),
  KAGGLE_DATA_ID: z.string().trim().default(''),
  KAGGLE_API_BASE: optional(DEFAULT_KAGGLE_API_BASE).pipe(z.string().url('KAGGLE_API_BASE must be a URL')),
  EXTERNAL_DATA_DIR: optional(DEFAULT_EXTERNAL_DATA_DIR),
});

const loaderSchema = z.object({
  POSTGRES_HOST: required('POSTGRES_HOST'),
  POSTGRES_PORT: z.coerce.number().int().positive().max(65535).default(5432),
  POSTGRES_USER: required('POSTGRES_USER'),
  POSTGRES_PASSWORD: required('POSTGRES_PASSWORD'),
  POSTGRES_DB: required('POSTGRES_DB'),
  EXTERNAL_DATA_DIR: optional(DEFAULT_EXTERNAL_DATA_DIR),
  CSV_EXTENSION: optional('csv'),
  TABLE_SUFFIX_PATTERN: optional(DEFAULT_TABLE_SUFFIX_PATTERN),
  TABLE_SUFFIX_LENGTH: z.coerce.number().int().positive().optional(),
});

export type LoggingConfig = {
  logDir: string;
  level: z.infer<typeof loggingSchema>['LOG_LEVEL'];
};

export type KaggleCredentials = {
  username: string;
  key: string;
};

export type FetcherConfig = {
  credentials: KaggleCredentials;
  datasetId: string;
  apiBase: string;
  externalDataDir: string;
};

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

/**
 * How a table name is cut out of a file stem. `suffix-pattern` strips the
 * last match of the expression, `suffix-length` a fixed number of characters.
 */
export type TableNameRule =
  | { kind: 'suffix-pattern'; pattern: RegExp }
  | { kind: 'suffix-length'; length: number };

export type LoaderConfig = {
  database: DatabaseConfig;
  externalDataDir: string;
  extension: string;
  tableNameRule: TableNameRule;
};

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env, label: string): z.infer<T> {
  const parsed = schema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(`invalid ${label} configuration: ${problems.join('; ')}`, {
      details: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

// Empty assignments in .env files (`KEY=`) count as unset.
function blankToUndefined(env: Env): Env {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value === undefined || value.trim() === '' ? undefined : value;
  }
  return result;
}

export function loadLoggingConfig(env: Env): LoggingConfig {
  const parsed = parseEnv(loggingSchema, env, 'logging');
  return { logDir: path.resolve(parsed.LOG_DIR), level: parsed.LOG_LEVEL };
}

export function loadFetcherConfig(env: Env): FetcherConfig {
  const parsed = parseEnv(fetcherSchema, env, 'fetcher');
  return {
    credentials: { username: parsed.KAGGLE_USERNAME, key: parsed.KAGGLE_KEY },
    datasetId: parsed.KAGGLE_DATA_ID,
    apiBase: parsed.KAGGLE_API_BASE.replace(/\/+$/, ''),
    externalDataDir: path.resolve(parsed.EXTERNAL_DATA_DIR),
  };
}

export function buildTableNameRule(pattern: string, length?: number): TableNameRule {
  if (length !== undefined) {
    return { kind: 'suffix-length', length };
  }
  try {
    return { kind: 'suffix-pattern', pattern: new RegExp(pattern) };
  } catch (error) {
    throw new ConfigurationError(`TABLE_SUFFIX_PATTERN is not a valid regular expression: ${pattern}`, {
      cause: error,
    });
  }
}

export function loadLoaderConfig(env: Env): LoaderConfig {
  const parsed = parseEnv(loaderSchema, env, 'loader');
  return {
    database: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
    },
    externalDataDir: path.resolve(parsed.EXTERNAL_DATA_DIR),
    extension: parsed.CSV_EXTENSION.replace(/^\./, ''),
    tableNameRule: buildTableNameRule(parsed.TABLE_SUFFIX_PATTERN, parsed.TABLE_SUFFIX_LENGTH),
  };
}
