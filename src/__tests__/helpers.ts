import { createWriteStream, promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import archiver from 'archiver';
import pino, { type Logger } from 'pino';
import type { ConnectionOpener, QueryParam, SqlConnection } from '../db.js';

export type LogEntry = {
  level: string;
  msg: string;
  [key: string]: unknown;
};

/** A real pino logger whose lines are parsed into `entries`. */
export function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino(
    {
      level: 'debug',
      base: undefined,
      formatters: { level: (label) => ({ level: label }) },
    },
    {
      write(line: string) {
        entries.push(JSON.parse(line));
      },
    }
  );
  return { logger, entries };
}

export async function makeTempDir(prefix = 'ingest-test-'): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function createZipArchive(files: Record<string, string>, destination: string): Promise<Buffer> {
  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(destination);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', resolve);
    output.on('error', reject);
    archive.on('error', reject);

    archive.pipe(output);
    for (const [name, content] of Object.entries(files)) {
      archive.append(content, { name });
    }
    void archive.finalize();
  });
  return fsp.readFile(destination);
}

type FakeTable = {
  columns: { name: string; type: string }[];
  rows: QueryParam[][];
};

type Statement = {
  text: string;
  params?: QueryParam[];
};

const CREATE = /^create table if not exists "((?:[^"]|"")+)" \((.*)\)$/;
const COLUMN = /"((?:[^"]|"")*)" ([^,]+)/g;
const INSERT = /^insert into "((?:[^"]|"")+)" \(/;

function unquote(identifier: string): string {
  return identifier.replace(/""/g, '"');
}

/**
 * In-process stand-in for PostgreSQL that understands the statements the
 * database manager issues: `create table if not exists`, `insert`, and
 * `begin`/`commit`/`rollback`.
 */
export class FakeDatabase {
  readonly tables = new Map<string, FakeTable>();
  readonly statements: Statement[] = [];
  endCalls = 0;
  failWith: ((statement: Statement) => Error | undefined) | null = null;
  private pending: { table: string; row: QueryParam[] }[] | null = null;

  readonly open: ConnectionOpener = async () => this.connection();

  connection(): SqlConnection {
    return {
      query: async (text, params) => this.execute({ text, params }),
      end: async () => {
        this.endCalls += 1;
      },
    };
  }

  private async execute(statement: Statement): Promise<void> {
    this.statements.push(statement);
    const injected = this.failWith?.(statement);
    if (injected) throw injected;

    const { text, params = [] } = statement;
    if (text === 'begin') {
      this.pending = [];
      return;
    }
    if (text === 'commit') {
      for (const { table, row } of this.pending ?? []) {
        this.tables.get(table)?.rows.push(row);
      }
      this.pending = null;
      return;
    }
    if (text === 'rollback') {
      this.pending = null;
      return;
    }

    const create = CREATE.exec(text);
    if (create) {
      const name = unquote(create[1]);
      if (!this.tables.has(name)) {
        const columns = [...create[2].matchAll(COLUMN)].map((match) => ({
          name: unquote(match[1]),
          type: match[2],
        }));
        const names = new Set<string>();
        for (const column of columns) {
          if (column.name === '') throw new Error('zero-length delimited identifier at or near """"');
          if (names.has(column.name)) throw new Error(`column "${column.name}" specified more than once`);
          names.add(column.name);
        }
        this.tables.set(name, { columns, rows: [] });
      }
      return;
    }

    const insert = INSERT.exec(text);
    if (insert) {
      const name = unquote(insert[1]);
      const table = this.tables.get(name);
      if (!table) throw new Error(`relation "${name}" does not exist`);
      if (params.length !== table.columns.length) {
        throw new Error(`INSERT has ${params.length} values for ${table.columns.length} columns`);
      }
      if (this.pending) {
        this.pending.push({ table: name, row: params });
      } else {
        table.rows.push(params);
      }
      return;
    }

    throw new Error(`unsupported statement: ${text}`);
  }
}
