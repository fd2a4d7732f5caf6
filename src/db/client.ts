import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';
import { z } from 'zod/v4';

const envConfigSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  PGHOST: z.string().optional(),
  PGPORT: z.coerce.number().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  PGDATABASE: z.string().optional(),
  PGSSLMODE: z.enum(['disable', 'require']).optional(),
  PGPOOL_MAX: z.coerce.number().int().positive().optional(),
  PGCONNECT_TIMEOUT_MS: z.coerce.number().int().positive().optional()
});

export type ResolvedDatabaseConfig = PoolConfig & { connectionString?: string };

export function resolveDatabaseConfig(
  overrides: Partial<PoolConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedDatabaseConfig {
  const parsed = envConfigSchema.parse(env);
  const shared: PoolConfig = {
    ssl: parsed.PGSSLMODE === 'require' ? { rejectUnauthorized: false } : undefined,
    max: parsed.PGPOOL_MAX ?? 10,
    connectionTimeoutMillis: parsed.PGCONNECT_TIMEOUT_MS ?? 5_000,
    application_name: 'qa-session-backend'
  };
  if (parsed.DATABASE_URL) {
    return {
      connectionString: parsed.DATABASE_URL,
      ...shared,
      ...overrides
    };
  }
  return {
    host: parsed.PGHOST,
    port: parsed.PGPORT,
    user: parsed.PGUSER,
    password: parsed.PGPASSWORD,
    database: parsed.PGDATABASE,
    ...shared,
    ...overrides
  };
}

export type PoolErrorHandler = (error: Error) => void;

const logIdleClientError: PoolErrorHandler = (error) => {
  console.error('待機中のデータベース接続でエラーが発生しました', error);
};

/** Idle clients that lose their connection are reported to `onIdleError` and discarded by the pool. */
export function createPool(overrides: Partial<PoolConfig> = {}, onIdleError: PoolErrorHandler = logIdleClientError): Pool {
  const config = resolveDatabaseConfig(overrides);
  const pool = new Pool(config);
  pool.on('error', onIdleError);
  return pool;
}

export interface TransactionOptions {
  /** Per-statement deadline applied with `SET LOCAL statement_timeout`. */
  statementTimeoutMs?: number;
}

export async function withTransaction<T>(
  pool: DatabasePool,
  callback: (client: DatabaseClient) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const client = await pool.connect();
  let brokenConnection: Error | undefined;
  try {
    await client.query('BEGIN');
    if (options.statementTimeoutMs !== undefined) {
      await client.query(`SELECT set_config('statement_timeout', $1, true)`, [String(options.statementTimeoutMs)]);
    }
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      // Releasing with an error makes the pool destroy the client.
      brokenConnection = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw error;
  } finally {
    client.release(brokenConnection);
  }
}

export interface DatabaseClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  release(err?: Error | boolean): void;
}

export interface DatabasePool {
  connect(): Promise<DatabaseClient>;
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  end(): Promise<void>;
}
