import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import type { Logger } from 'pino';
import type { TableNameRule } from '../config.js';
import { describeError, errorCode } from '../errors.js';
import type {
  ColumnDefinition,
  LoadCsvResult,
  LoadReport,
  TableOutcome,
  TabularData,
} from '../types.js';
import type { DatabaseManager } from './database-manager.js';

/** Every column is stored as capped variable-length text; no type inference. */
export const TEXT_COLUMN_TYPE = 'varchar(255)';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const MAX_IDENTIFIER_LENGTH = 63;

export type TableNameResult =
  | { ok: true; table: string }
  | { ok: false; message: string };

export function deriveTableName(filePath: string, rule: TableNameRule): TableNameResult {
  const stem = path.parse(filePath).name;
  let table: string;

  if (rule.kind === 'suffix-length') {
    if (stem.length <= rule.length) {
      return {
        ok: false,
        message: `file stem "${stem}" is not longer than the ${rule.length}-character suffix`,
      };
    }
    table = stem.slice(0, stem.length - rule.length);
  } else {
    const match = rule.pattern.exec(stem);
    if (!match || match[0] === '') {
      return { ok: false, message: `file stem "${stem}" does not end with a suffix matching ${rule.pattern}` };
    }
    table = stem.slice(0, match.index);
  }

  if (!IDENTIFIER.test(table) || table.length > MAX_IDENTIFIER_LENGTH) {
    return { ok: false, message: `"${table}" (from "${stem}") is not a valid table name` };
  }
  return { ok: true, table };
}

/**
 * Blank header cells become `Unnamed: <index>` and repeated names get a
 * `.1`, `.2`, ... suffix, so every column is a distinct non-empty identifier.
 */
export function normalizeHeader(header: string[]): string[] {
  const used = new Set<string>();
  const counts = new Map<string, number>();
  return header.map((raw, index) => {
    const name = raw.trim() === '' ? `Unnamed: ${index}` : raw;
    let count = counts.get(name) ?? 0;
    let candidate = name;
    while (used.has(candidate)) {
      count += 1;
      candidate = `${name}.${count}`;
    }
    counts.set(name, count);
    used.add(candidate);
    return candidate;
  });
}

export function deriveColumnDefinition(data: TabularData): ColumnDefinition {
  return data.columns.map((name) => ({ name, type: TEXT_COLUMN_TYPE }));
}

export function summarize(outcomes: TableOutcome[]): LoadReport {
  return {
    outcomes,
    loaded: outcomes.filter((outcome) => outcome.status === 'loaded').length,
    skipped: outcomes.filter((outcome) => outcome.status === 'skipped').length,
    failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
  };
}

export class TableLoader {
  private readonly db: DatabaseManager;
  private readonly rule: TableNameRule;
  private readonly logger: Logger;

  constructor(db: DatabaseManager, rule: TableNameRule, logger: Logger) {
    this.db = db;
    this.rule = rule;
    this.logger = logger.child({ component: 'table-loader' });
  }

  /**
   * Reads a CSV file. Missing, empty and unparseable files come back as
   * failures; any other I/O error is thrown.
   */
  async loadCsv(filePath: string): Promise<LoadCsvResult> {
    let content: string;
    try {
      content = await fsp.readFile(filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        const message = `CSV file "${filePath}" not found.`;
        this.logger.error({ file: filePath }, message);
        return { ok: false, reason: 'not-found', message };
      }
      throw error;
    }

    let records: string[][];
    try {
      records = parse(content, { bom: true, skip_empty_lines: true, relax_column_count_less: true });
    } catch (error) {
      if (error instanceof CsvError) {
        const message = `Error parsing CSV file "${filePath}": ${error.message}`;
        this.logger.error({ file: filePath, code: error.code }, message);
        return { ok: false, reason: 'malformed', message };
      }
      throw error;
    }

    const [header, ...rows] = records;
    if (!header || header.every((column) => column.trim() === '')) {
      const message = `CSV file "${filePath}" is empty.`;
      this.logger.error({ file: filePath }, message);
      return { ok: false, reason: 'empty', message };
    }

    const columns = normalizeHeader(header);
    if (columns.some((column, index) => column !== header[index])) {
      this.logger.warn({ file: filePath, header, columns }, `Renamed blank or repeated columns in "${filePath}".`);
    }

    // short rows are padded; the missing cells load as NULL
    const padded = rows.map((row) =>
      row.length < columns.length ? [...row, ...new Array<string>(columns.length - row.length).fill('')] : row
    );

    this.logger.info({ file: filePath, rows: padded.length }, `Loaded data from "${filePath}".`);
    return { ok: true, data: { columns, rows: padded } };
  }

  async loadAll(files: string[]): Promise<LoadReport> {
    const outcomes: TableOutcome[] = [];
    const seen = new Map<string, string>();

    for (const file of files) {
      const outcome = await this.loadFile(file, seen);
      outcomes.push(outcome);
    }

    return summarize(outcomes);
  }

  private async loadFile(file: string, seen: Map<string, string>): Promise<TableOutcome> {
    const name = deriveTableName(file, this.rule);
    if (!name.ok) {
      this.logger.error({ file }, `Skipping "${file}": ${name.message}.`);
      return { status: 'skipped', file, table: null, reason: 'invalid-table-name', message: name.message };
    }
    const { table } = name;

    const previous = seen.get(table);
    if (previous !== undefined) {
      const message = `table "${table}" was already created from "${previous}"`;
      this.logger.error({ file, table }, `Skipping "${file}": ${message}.`);
      return { status: 'skipped', file, table, reason: 'duplicate-table', message };
    }

    let loaded: LoadCsvResult;
    try {
      loaded = await this.loadCsv(file);
    } catch (error) {
      const message = `Error reading "${file}": ${describeError(error)}`;
      this.logger.error({ file, err: error }, message);
      return { status: 'failed', file, table, stage: 'read', message };
    }
    if (!loaded.ok) {
      return { status: 'skipped', file, table, reason: loaded.reason, message: loaded.message };
    }

    const created = await this.db.createTable(table, deriveColumnDefinition(loaded.data));
    if (!created.ok) {
      return { status: 'failed', file, table, stage: 'create', message: created.error.message };
    }
    seen.set(table, file);

    const inserted = await this.db.insertData(table, loaded.data);
    if (!inserted.ok) {
      return { status: 'failed', file, table, stage: 'insert', message: inserted.error.message };
    }

    return { status: 'loaded', file, table, rows: inserted.rows };
  }
}
