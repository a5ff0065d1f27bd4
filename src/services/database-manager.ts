import type { Logger } from 'pino';
import type { DatabaseConfig } from '../config.js';
import {
  openConnection as openPgConnection,
  quoteIdentifier,
  withTransaction,
  type ConnectionOpener,
  type QueryParam,
  type SqlConnection,
} from '../db.js';
import { describeError, InsertError, NotConnectedError, SchemaError } from '../errors.js';
import type { ColumnDefinition, CreateTableResult, InsertResult, TabularData } from '../types.js';

type ConnectionState = 'disconnected' | 'connected' | 'closed';

class RowInsertFailure extends Error {
  readonly row: number;
  readonly original: unknown;

  constructor(row: number, original: unknown) {
    super(describeError(original));
    this.row = row;
    this.original = original;
  }
}

/**
 * Owns the single database connection of a loader run.
 *
 * `connect` never throws: when the connection cannot be opened the manager
 * stays disconnected and `isConnected` is false. Table operations on a
 * manager that is not connected throw `NotConnectedError`.
 */
export class DatabaseManager {
  private connection: SqlConnection | null;
  private state: ConnectionState;
  private readonly logger: Logger;

  private constructor(connection: SqlConnection | null, logger: Logger) {
    this.connection = connection;
    this.state = connection ? 'connected' : 'disconnected';
    this.logger = logger;
  }

  static async connect(
    config: DatabaseConfig,
    logger: Logger,
    open: ConnectionOpener = openPgConnection
  ): Promise<DatabaseManager> {
    const log = logger.child({ component: 'database-manager' });
    try {
      const connection = await open(config);
      log.info({ host: config.host, database: config.database }, 'Successfully connected to the database.');
      return new DatabaseManager(connection, log);
    } catch (error) {
      log.error({ host: config.host, database: config.database, err: error }, `Error connecting to the database: ${describeError(error)}`);
      return new DatabaseManager(null, log);
    }
  }

  get isConnected(): boolean {
    return this.state === 'connected';
  }

  private requireConnection(): SqlConnection {
    if (this.state !== 'connected' || !this.connection) {
      throw new NotConnectedError(
        this.state === 'closed' ? 'database connection is already closed' : 'database connection is not available'
      );
    }
    return this.connection;
  }

  async createTable(table: string, columns: ColumnDefinition): Promise<CreateTableResult> {
    const connection = this.requireConnection();
    const definition = columns.map((column) => `${quoteIdentifier(column.name)} ${column.type}`).join(', ');
    try {
      await connection.query(`create table if not exists ${quoteIdentifier(table)} (${definition})`);
      this.logger.info({ table }, `Table "${table}" created or exists already.`);
      return { ok: true, rows: 0 };
    } catch (error) {
      const failure = new SchemaError(table, `Error creating table ${table}: ${describeError(error)}`, { cause: error });
      this.logger.error({ table, err: error }, failure.message);
      return { ok: false, error: failure };
    }
  }

  async insertData(table: string, data: TabularData): Promise<InsertResult> {
    const connection = this.requireConnection();
    const columns = data.columns.map(quoteIdentifier).join(', ');
    const placeholders = data.columns.map((_, index) => `$${index + 1}`).join(', ');
    const statement = `insert into ${quoteIdentifier(table)} (${columns}) values (${placeholders})`;

    try {
      const inserted = await withTransaction(connection, async (tx) => {
        let count = 0;
        for (const row of data.rows) {
          const values: QueryParam[] = row.map((value) => (value === '' ? null : value));
          try {
            await tx.query(statement, values);
          } catch (error) {
            throw new RowInsertFailure(count + 1, error);
          }
          count += 1;
        }
        return count;
      }, this.logger);
      this.logger.info({ table, rows: inserted }, `Data inserted into "${table}".`);
      return { ok: true, rows: inserted };
    } catch (error) {
      const row = error instanceof RowInsertFailure ? error.row : null;
      const cause = error instanceof RowInsertFailure ? error.original : error;
      const where = row === null ? '' : ` (row ${row})`;
      const failure = new InsertError(table, row, `Error inserting data into ${table}${where}: ${describeError(cause)}`, {
        cause,
      });
      this.logger.error({ table, row, err: cause }, failure.message);
      return { ok: false, error: failure };
    }
  }

  async close(): Promise<void> {
    if (this.state !== 'connected' || !this.connection) {
      this.state = 'closed';
      return;
    }
    const connection = this.connection;
    this.connection = null;
    this.state = 'closed';
    try {
      await connection.end();
      this.logger.info('Database connection closed.');
    } catch (error) {
      this.logger.error({ err: error }, `Error closing the database connection: ${describeError(error)}`);
    }
  }
}
