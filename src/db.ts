import { Pool, type PoolClient, type QueryResultRow } from 'pg';
import type { DbConfig } from './config.js';
import { StoreUnavailableError } from './errors.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('db');

// Server shutdown codes and socket errors; class 08 (connection exception) is matched by prefix.
const CONNECTION_ERROR_CODES: ReadonlySet<string> = new Set([
  '57P01',
  '57P02',
  '57P03',
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
]);

export type QueryRows = { rows: QueryResultRow[] };

export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<QueryRows>;
}

export interface Database extends SqlClient {
  withTransaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && typeof error.code === 'string') {
    if (error.code.startsWith('08') || CONNECTION_ERROR_CODES.has(error.code)) return true;
  }
  return /connection terminated|server closed the connection/i.test(error.message);
}

function toStoreError(error: unknown): unknown {
  return isConnectionError(error) ? new StoreUnavailableError(error) : error;
}

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function asSqlClient(client: PoolClient): SqlClient {
  return {
    query: (text: string, params?: unknown[]) => client.query(text, params),
  };
}

export function createDatabase(config: DbConfig): Database {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: 1,
  });

  async function connect(): Promise<PoolClient> {
    try {
      return await pool.connect();
    } catch (error) {
      throw new StoreUnavailableError(error);
    }
  }

  return {
    async query(text: string, params?: unknown[]) {
      const client = await connect();
      let broken: Error | undefined;
      try {
        return await client.query(text, params);
      } catch (error) {
        if (isConnectionError(error)) broken = asError(error);
        throw toStoreError(error);
      } finally {
        client.release(broken);
      }
    },

    /**
     * Runs `fn` inside begin/commit. On failure the transaction is rolled back
     * and the original error is rethrown; a client whose rollback fails is
     * discarded instead of returned to the pool.
     */
    async withTransaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
      const client = await connect();
      let broken: Error | undefined;
      try {
        await client.query('begin');
        const result = await fn(asSqlClient(client));
        await client.query('commit');
        return result;
      } catch (error) {
        try {
          await client.query('rollback');
        } catch (rollbackError) {
          broken = asError(rollbackError);
          log.error({ err: rollbackError, cause: error }, 'rollback failed; discarding connection');
        }
        throw toStoreError(error);
      } finally {
        client.release(broken);
      }
    },

    async close() {
      await pool.end();
    },
  };
}

export async function withDatabase<T>(
  config: DbConfig,
  fn: (db: Database) => Promise<T>,
  open: (config: DbConfig) => Database = createDatabase
): Promise<T> {
  const db = open(config);
  try {
    return await fn(db);
  } finally {
    await db.close();
  }
}
