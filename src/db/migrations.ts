import { type DatabaseClient, type DatabasePool, withTransaction } from './client.js';

export const HEALTH_CHECK_TABLE = 'app_health_checks';

const schemaStatements = [
  `CREATE TABLE IF NOT EXISTS users (
    id SERIAL PRIMARY KEY,
    display_name TEXT NOT NULL UNIQUE CHECK (char_length(display_name) BETWEEN 1 AND 100),
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS sessions (
    id SERIAL PRIMARY KEY,
    host_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE RESTRICT,
    code TEXT NOT NULL UNIQUE,
    title TEXT NOT NULL CHECK (char_length(title) BETWEEN 1 AND 200),
    status TEXT NOT NULL DEFAULT 'draft' CHECK (status IN ('draft','active','ended')),
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    started_at TIMESTAMPTZ,
    ended_at TIMESTAMPTZ
  )`,
  `CREATE TABLE IF NOT EXISTS session_participants (
    id SERIAL PRIMARY KEY,
    session_id INTEGER NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    role TEXT NOT NULL CHECK (role IN ('host','participant')),
    joined_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
    UNIQUE (session_id, user_id)
  )`,
  `CREATE TABLE IF NOT EXISTS questions (
    id SERIAL PRIMARY KEY,
    session_id INTEGER NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    author_user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
    body TEXT NOT NULL CHECK (char_length(body) BETWEEN 1 AND 280),
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending','answered')),
    likes INTEGER NOT NULL DEFAULT 0 CHECK (likes >= 0),
    created_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
    answered_at TIMESTAMPTZ
  )`,
  `CREATE TABLE IF NOT EXISTS ${HEALTH_CHECK_TABLE} (
    id SERIAL PRIMARY KEY,
    checked_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS sessions_host_status_idx ON sessions (host_user_id, status)`,
  `CREATE INDEX IF NOT EXISTS sessions_status_created_idx ON sessions (status, created_at DESC)`,
  `CREATE INDEX IF NOT EXISTS questions_session_status_idx ON questions (session_id, status)`,
  `CREATE INDEX IF NOT EXISTS questions_session_likes_idx ON questions (session_id, likes DESC)`
];

async function runStatements(client: DatabaseClient): Promise<void> {
  for (const statement of schemaStatements) {
    await client.query(statement);
  }
}

export async function applyMigrations(pool: DatabasePool): Promise<void> {
  await withTransaction(pool, runStatements);
}
