import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { config } from '../../config';
import { logger } from '../logging/logger';
import { PersistenceError, isAppError } from '../../shared/errors';

// Connection pool with production-ready settings
export const db = new Pool({
  connectionString: config.databaseUrl,
  max: 20,                          // Max connections per instance
  min: 2,                           // Keep warm connections
  idleTimeoutMillis: 30000,         // Close after 30s idle
  connectionTimeoutMillis: 5000,    // Fail fast on connection
  maxUses: 10000,                   // Refresh connections periodically
  allowExitOnIdle: false,
});

db.on('connect', () => {
  logger.debug('New database connection established');
});

db.on('error', (err) => {
  logger.error({ error: err.message }, 'Unexpected database pool error');
});

// Health check
export async function checkDatabaseHealth(): Promise<{
  healthy: boolean;
  latencyMs: number;
  connections: {
    total: number;
    idle: number;
    waiting: number;
  };
}> {
  const start = Date.now();
  let healthy = true;

  try {
    await db.query('SELECT 1');
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Database health check failed');
    healthy = false;
  }

  return {
    healthy,
    latencyMs: Date.now() - start,
    connections: {
      total: db.totalCount,
      idle: db.idleCount,
      waiting: db.waitingCount,
    },
  };
}

// ============================================================================
// Query Helpers
// ============================================================================

/** Pool or a checked-out transaction client. */
export type Queryable = Pick<PoolClient, 'query'>;

function toPersistenceError(error: unknown, text: string): PersistenceError {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error({ query: text.substring(0, 100), error: err.message }, 'Query failed');
  return new PersistenceError(err.message, err);
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  executor: Queryable = db
): Promise<QueryResult<T>> {
  const start = Date.now();

  try {
    const result = await executor.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > 1000) {
      logger.warn({ query: text.substring(0, 100), duration }, 'Slow query detected');
    }

    return result;
  } catch (error) {
    throw toPersistenceError(error, text);
  }
}

export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  executor: Queryable = db
): Promise<T | null> {
  const result = await query<T>(text, params, executor);
  return result.rows[0] ?? null;
}

export async function queryMany<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  executor: Queryable = db
): Promise<T[]> {
  const result = await query<T>(text, params, executor);
  return result.rows;
}

// ============================================================================
// Transaction Support
// ============================================================================

export async function withTransaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  let client: PoolClient;
  try {
    client = await db.connect();
  } catch (error) {
    throw toPersistenceError(error, 'CONNECT');
  }

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error(
        { error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError) },
        'Rollback failed'
      );
    });
    if (isAppError(error)) throw error;
    throw toPersistenceError(error, 'TRANSACTION');
  } finally {
    client.release();
  }
}

// ============================================================================
// Idempotency Support
// ============================================================================

export async function checkIdempotencyKey(key: string): Promise<boolean> {
  const row = await queryOne<{ key: string }>(
    'SELECT key FROM idempotency_keys WHERE key = $1 AND expires_at > NOW()',
    [key]
  );
  return row !== null;
}

/**
 * Claim an idempotency key. Returns false when the key was already claimed
 * and has not expired (e.g. a WhatsApp webhook redelivery).
 */
export async function claimIdempotencyKey(key: string, ttlHours: number = 24): Promise<boolean> {
  const result = await query(
    `INSERT INTO idempotency_keys (key, expires_at)
     VALUES ($1, NOW() + INTERVAL '1 hour' * $2)
     ON CONFLICT (key) DO UPDATE
       SET expires_at = EXCLUDED.expires_at
       WHERE idempotency_keys.expires_at <= NOW()`,
    [key, ttlHours]
  );

  return (result.rowCount ?? 0) > 0;
}

export async function purgeExpiredIdempotencyKeys(): Promise<number> {
  const result = await query('DELETE FROM idempotency_keys WHERE expires_at <= NOW()');
  return result.rowCount ?? 0;
}

export async function closeDatabase(): Promise<void> {
  await db.end();
  logger.info('Database pool closed');
}
