import type { DatabasePool } from '../db/client.js';
import { HEALTH_CHECK_TABLE } from '../db/migrations.js';

export interface DatabasePingResult {
  insertedId: number;
  totalRows: number;
}

export interface HealthStatus {
  status: 'ok';
  message: string;
}

export function getHealthStatus(message = 'Q&A session API is running'): HealthStatus {
  return { status: 'ok', message };
}

/** Writes an audit row and reports the table size, exercising a real round-trip. */
export async function recordDatabasePing(pool: Pick<DatabasePool, 'query'>): Promise<DatabasePingResult> {
  const inserted = await pool.query<{ id: number }>(
    `INSERT INTO ${HEALTH_CHECK_TABLE} DEFAULT VALUES RETURNING id`
  );
  const [insertedRow] = inserted.rows;
  if (!insertedRow) {
    throw new Error(`INSERT into ${HEALTH_CHECK_TABLE} returned no id`);
  }
  const counted = await pool.query<{ total: number }>(
    `SELECT COUNT(*)::int AS total FROM ${HEALTH_CHECK_TABLE}`
  );
  return {
    insertedId: insertedRow.id,
    totalRows: counted.rows[0]?.total ?? 0
  };
}
