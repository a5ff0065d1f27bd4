import { Client } from 'pg';
import type { Logger } from 'pino';
import type { DatabaseConfig } from './config.js';
import { describeError } from './errors.js';

export type QueryParam = string | null;

export interface SqlConnection {
  query(text: string, params?: QueryParam[]): Promise<void>;
  end(): Promise<void>;
}

export type ConnectionOpener = (config: DatabaseConfig) => Promise<SqlConnection>;

export const openConnection: ConnectionOpener = async (config) => {
  const client = new Client({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
  });
  await client.connect();
  return {
    async query(text, params) {
      await client.query(text, params);
    },
    end: () => client.end(),
  };
};

/**
 * Runs `fn` between begin and commit. On failure the transaction is rolled
 * back and the original error is rethrown; a failed rollback is only logged.
 */
export async function withTransaction<T>(
  connection: SqlConnection,
  fn: (connection: SqlConnection) => Promise<T>,
  logger?: Logger
): Promise<T> {
  await connection.query('begin');
  try {
    const result = await fn(connection);
    await connection.query('commit');
    return result;
  } catch (error) {
    try {
      await connection.query('rollback');
    } catch (rollbackError) {
      logger?.error({ err: rollbackError }, `Rollback failed: ${describeError(rollbackError)}`);
    }
    throw error;
  }
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
