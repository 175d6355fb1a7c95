/**
 * Database Connection Pool
 * Provides a shared pg Pool, a transaction helper, health checking and
 * graceful shutdown. Every pg failure surfaces as a StateStoreError.
 */

import pg from 'pg';
import { config } from '../config/index.js';
import { logger, errorMessage } from '../utils/logger.js';
import { StateStoreError, ConfigurationError } from '../utils/errors.js';

const { Pool } = pg;

// ============================================================================
// Types
// ============================================================================

/** Anything that can run a parameterised statement: the pool or a transaction. */
export type Executor = <T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<pg.QueryResult<T>>;

export interface TransactionClient {
  query: Executor;
  release(err?: Error): void;
}

export interface Database {
  query: Executor;
  transaction<T>(fn: (tx: Executor) => Promise<T>): Promise<T>;
}

// ============================================================================
// Pool Singleton
// ============================================================================

let pool: pg.Pool | null = null;

/**
 * Get or create the shared database pool.
 * The pool is lazy-initialized on first call.
 */
export function getPool(): pg.Pool {
  if (!pool) {
    // A full connection string wins; mixing it with host/port is ambiguous in pg.
    const connectionConfig: pg.PoolConfig = config.database.url
      ? { connectionString: config.database.url }
      : {
          host: config.database.host,
          port: config.database.port,
          database: config.database.name,
          user: config.database.user,
          password: config.database.password,
        };

    pool = new Pool({
      ...connectionConfig,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });

    pool.on('error', (err) => {
      logger.error('[DB] Unexpected pool error', { error: err.message });
    });

    pool.on('connect', () => {
      logger.debug('[DB] New client connected');
    });
  }

  return pool;
}

function toStateStoreError(error: unknown, text: string): StateStoreError {
  if (error instanceof StateStoreError) return error;
  return new StateStoreError(`Query failed (${text.trim().slice(0, 40)}): ${errorMessage(error)}`, {
    cause: error,
  });
}

/**
 * Run a single query (convenience wrapper).
 */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  const p = getPool();
  const start = Date.now();

  let result: pg.QueryResult<T>;
  try {
    result = await p.query<T>(text, params);
  } catch (error) {
    throw toStateStoreError(error, text);
  }

  logger.debug('[DB] Query executed', {
    text: text.trim().slice(0, 80),
    duration: Date.now() - start,
    rows: result.rowCount,
  });

  return result;
}

async function checkoutClient(): Promise<TransactionClient> {
  let client: pg.PoolClient;
  try {
    client = await getPool().connect();
  } catch (error) {
    throw toStateStoreError(error, 'connect');
  }

  return {
    query: async <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) => {
      try {
        return await client.query<T>(text, params);
      } catch (error) {
        throw toStateStoreError(error, text);
      }
    },
    release: (err?: Error) => client.release(err),
  };
}

/**
 * Run `fn` inside BEGIN/COMMIT on one client. Any error rolls back and is
 * rethrown; configuration errors keep their type so callers can report them.
 */
export async function withTransaction<T>(
  fn: (tx: Executor) => Promise<T>,
  connect: () => Promise<TransactionClient> = checkoutClient,
): Promise<T> {
  const client = await connect();
  let releaseError: Error | undefined;

  try {
    await client.query('BEGIN');
    const result = await fn(client.query);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      // A client that cannot roll back is not returned to the pool
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      logger.error('[DB] Rollback failed', { error: releaseError.message });
    }

    if (error instanceof ConfigurationError || error instanceof StateStoreError) {
      throw error;
    }
    throw new StateStoreError(`Transaction failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    client.release(releaseError);
  }
}

export const database: Database = {
  query,
  transaction: fn => withTransaction(fn),
};

/**
 * Test database connectivity.
 */
export async function testConnection(): Promise<boolean> {
  try {
    const result = await query<{ time: Date }>('SELECT NOW() AS time');
    logger.info('[DB] Connection verified', { serverTime: result.rows[0]?.time });
    return true;
  } catch (error) {
    logger.error('[DB] Connection failed', { error: errorMessage(error) });
    return false;
  }
}

/**
 * Gracefully close the pool.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('[DB] Pool closed');
  }
}
