export type PipelineErrorCode =
  | 'configuration'
  | 'authentication'
  | 'fetch'
  | 'not_connected'
  | 'schema'
  | 'insert';

type PipelineErrorOptions = {
  details?: unknown;
  cause?: unknown;
};

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details?: unknown;

  constructor(code: PipelineErrorCode, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('configuration', message, options);
  }
}

export class AuthenticationError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('authentication', message, options);
  }
}

export class FetchError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('fetch', message, options);
  }
}

export class NotConnectedError extends PipelineError {
  constructor(message = 'database connection is not available') {
    super('not_connected', message);
  }
}

export class SchemaError extends PipelineError {
  readonly table: string;

  constructor(table: string, message: string, options?: PipelineErrorOptions) {
    super('schema', message, options);
    this.table = table;
  }
}

export class InsertError extends PipelineError {
  readonly table: string;
  readonly row: number | null;

  constructor(table: string, row: number | null, message: string, options?: PipelineErrorOptions) {
    super('insert', message, options);
    this.table = table;
    this.row = row;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** The `code` of a Node system error (`ENOENT`, `EACCES`, ...). */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
