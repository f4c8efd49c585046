import { Pool, QueryResult, QueryResultRow } from 'pg';
import { config } from '../../config';
import { logger } from '../logging/logger';
import { DatabaseError } from '../../shared/errors';

// The pool connects lazily on first query
export const db = new Pool({
  connectionString: config.databaseUrl,
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
  maxUses: 10000,
});

db.on('connect', () => {
  logger.debug('New database connection established');
});

db.on('error', (err) => {
  logger.error({ error: err.message }, 'Unexpected database pool error');
});

export async function checkDatabaseHealth(): Promise<{
  healthy: boolean;
  latencyMs: number;
  connections: { total: number; idle: number; waiting: number };
}> {
  const start = Date.now();
  const connections = () => ({
    total: db.totalCount,
    idle: db.idleCount,
    waiting: db.waitingCount,
  });

  try {
    await db.query('SELECT 1');
    return { healthy: true, latencyMs: Date.now() - start, connections: connections() };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Database health check failed');
    return { healthy: false, latencyMs: Date.now() - start, connections: connections() };
  }
}

// ============================================================================
// Query Helpers
// ============================================================================

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();

  try {
    const result = await db.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > 1000) {
      logger.warn({ query: text.substring(0, 100), duration }, 'Slow query detected');
    }

    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({ query: text.substring(0, 100), error: err.message }, 'Query failed');
    throw new DatabaseError(err.message, err);
  }
}

export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<T | null> {
  const result = await query<T>(text, params);
  return result.rows[0] ?? null;
}

// ============================================================================
// Idempotency Support
// ============================================================================

/**
 * Postgres-backed idempotency keys, used to send each doctor alert once.
 */
export const idempotencyKeys = {
  async check(key: string): Promise<boolean> {
    const row = await queryOne<{ key: string }>(
      `SELECT key FROM idempotency_keys
       WHERE key = $1 AND expires_at > NOW()`,
      [key]
    );
    return row !== null;
  },

  async set(key: string, result: unknown, ttlHours: number = 24 * 30): Promise<void> {
    await query(
      `INSERT INTO idempotency_keys (key, result, expires_at)
       VALUES ($1, $2, NOW() + INTERVAL '1 hour' * $3)
       ON CONFLICT (key) DO NOTHING`,
      [key, JSON.stringify(result), ttlHours]
    );
  },
};

export async function closeDatabase(): Promise<void> {
  await db.end();
  logger.info('Database pool closed');
}
