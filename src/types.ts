import type { InsertError, SchemaError } from './errors.js';

export type TabularData = {
  columns: string[];
  rows: string[][];
};

export type ColumnSpec = {
  name: string;
  type: string;
};

export type ColumnDefinition = ColumnSpec[];

export type OperationResult<E extends Error> =
  | { ok: true; rows: number }
  | { ok: false; error: E };

export type CreateTableResult = OperationResult<SchemaError>;
export type InsertResult = OperationResult<InsertError>;

export type CsvReadFailure = 'not-found' | 'empty' | 'malformed';

export type LoadCsvResult =
  | { ok: true; data: TabularData }
  | { ok: false; reason: CsvReadFailure; message: string };

export type SkipReason = CsvReadFailure | 'invalid-table-name' | 'duplicate-table';

export type TableOutcome =
  | { status: 'loaded'; file: string; table: string; rows: number }
  | { status: 'skipped'; file: string; table: string | null; reason: SkipReason; message: string }
  | { status: 'failed'; file: string; table: string; stage: 'read' | 'create' | 'insert'; message: string };

export type LoadReport = {
  outcomes: TableOutcome[];
  loaded: number;
  skipped: number;
  failed: number;
};
