import { type DatabaseClient, type DatabasePool, withTransaction } from '../db/client.js';
import {
  isParticipantRole,
  isQuestionStatus,
  isSessionStatus,
  type ParticipantRecord,
  type QuestionRecord,
  type QuestionStatus,
  type QuestionWithAuthor,
  type RosterEntry,
  type SessionRecord
} from '../domain/session.js';
import type { UserRecord } from '../domain/user.js';
import { StoreTimeoutError } from './errors.js';
import type {
  FindParticipantOptions,
  InsertQuestionInput,
  InsertSessionInput,
  SessionStore,
  SessionStoreTransaction,
  UnitOfWorkOptions,
  UpsertParticipantInput
} from './sessionStore.js';

const PG_QUERY_CANCELED = '57014';
const PG_CONNECT_TIMEOUT_MESSAGE = 'timeout exceeded when trying to connect';

interface UserRow {
  [column: string]: unknown;
  id: number;
  display_name: string;
  created_at: Date;
}

interface SessionRow {
  [column: string]: unknown;
  id: number;
  host_user_id: number;
  title: string;
  code: string;
  status: string;
  created_at: Date;
  started_at: Date | null;
  ended_at: Date | null;
}

interface ParticipantRow {
  [column: string]: unknown;
  id: number;
  session_id: number;
  user_id: number;
  role: string;
  joined_at: Date;
}

interface RosterRow extends ParticipantRow {
  display_name: string;
}

interface QuestionRow {
  [column: string]: unknown;
  id: number;
  session_id: number;
  author_user_id: number | null;
  body: string;
  status: string;
  likes: number;
  created_at: Date;
  answered_at: Date | null;
}

interface QuestionWithAuthorRow extends QuestionRow {
  author_display_name: string | null;
}

interface CountRow {
  [column: string]: unknown;
  count: number;
}

const USER_COLUMNS = 'id, display_name, created_at';
const SESSION_COLUMNS = 'id, host_user_id, title, code, status, created_at, started_at, ended_at';
const PARTICIPANT_COLUMNS = 'id, session_id, user_id, role, joined_at';
const QUESTION_COLUMNS = 'id, session_id, author_user_id, body, status, likes, created_at, answered_at';

function mapUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    displayName: row.display_name,
    createdAt: row.created_at
  };
}

function mapSession(row: SessionRow): SessionRecord {
  if (!isSessionStatus(row.status)) {
    throw new Error(`session ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    hostUserId: row.host_user_id,
    title: row.title,
    code: row.code,
    status: row.status,
    createdAt: row.created_at,
    startedAt: row.started_at,
    endedAt: row.ended_at
  };
}

function mapParticipant(row: ParticipantRow): ParticipantRecord {
  if (!isParticipantRole(row.role)) {
    throw new Error(`participant ${row.id} has unknown role "${row.role}"`);
  }
  return {
    id: row.id,
    sessionId: row.session_id,
    userId: row.user_id,
    role: row.role,
    joinedAt: row.joined_at
  };
}

function mapQuestion(row: QuestionRow): QuestionRecord {
  if (!isQuestionStatus(row.status)) {
    throw new Error(`question ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    sessionId: row.session_id,
    authorUserId: row.author_user_id,
    body: row.body,
    status: row.status,
    likes: row.likes,
    createdAt: row.created_at,
    answeredAt: row.answered_at
  };
}

function firstRow<R>(rows: R[], statement: string): R {
  const [row] = rows;
  if (row === undefined) {
    throw new Error(`${statement} returned no rows`);
  }
  return row;
}

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isStoreTimeout(error: unknown): boolean {
  if (pgErrorCode(error) === PG_QUERY_CANCELED) return true;
  return error instanceof Error && error.message === PG_CONNECT_TIMEOUT_MESSAGE;
}

export class PgSessionStoreTransaction implements SessionStoreTransaction {
  constructor(private readonly client: DatabaseClient) {}

  async findUserByDisplayName(displayName: string): Promise<UserRecord | null> {
    const result = await this.client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE display_name = $1`,
      [displayName]
    );
    const [row] = result.rows;
    return row ? mapUser(row) : null;
  }

  async findUserById(id: number): Promise<UserRecord | null> {
    const result = await this.client.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    const [row] = result.rows;
    return row ? mapUser(row) : null;
  }

  async findUsersByIds(ids: readonly number[]): Promise<UserRecord[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await this.client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = ANY($1::int[])`,
      [[...ids]]
    );
    return result.rows.map(mapUser);
  }

  async insertUser(displayName: string): Promise<UserRecord | null> {
    const result = await this.client.query<UserRow>(
      `INSERT INTO users (display_name)
       VALUES ($1)
       ON CONFLICT (display_name) DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [displayName]
    );
    const [row] = result.rows;
    return row ? mapUser(row) : null;
  }

  async lockUser(id: number): Promise<void> {
    await this.client.query(`SELECT id FROM users WHERE id = $1 FOR UPDATE`, [id]);
  }

  async countOpenSessionsForHost(hostUserId: number): Promise<number> {
    const result = await this.client.query<CountRow>(
      `SELECT COUNT(*)::int AS count
       FROM sessions
       WHERE host_user_id = $1 AND status IN ('draft', 'active')`,
      [hostUserId]
    );
    return firstRow(result.rows, 'countOpenSessionsForHost').count;
  }

  async sessionCodeExists(code: string): Promise<boolean> {
    const result = await this.client.query(`SELECT 1 FROM sessions WHERE code = $1`, [code]);
    return result.rows.length > 0;
  }

  async insertSession(input: InsertSessionInput): Promise<SessionRecord | null> {
    const result = await this.client.query<SessionRow>(
      `INSERT INTO sessions (host_user_id, title, code, status)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (code) DO NOTHING
       RETURNING ${SESSION_COLUMNS}`,
      [input.hostUserId, input.title, input.code, input.status ?? 'draft']
    );
    const [row] = result.rows;
    return row ? mapSession(row) : null;
  }

  async findSessionByCode(code: string): Promise<SessionRecord | null> {
    const result = await this.client.query<SessionRow>(`SELECT ${SESSION_COLUMNS} FROM sessions WHERE code = $1`, [code]);
    const [row] = result.rows;
    return row ? mapSession(row) : null;
  }

  async listRecentSessions(limit: number): Promise<SessionRecord[]> {
    const result = await this.client.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS}
       FROM sessions
       WHERE status IN ('draft', 'active')
       ORDER BY created_at DESC, id DESC
       LIMIT $1`,
      [limit]
    );
    return result.rows.map(mapSession);
  }

  async upsertParticipant(input: UpsertParticipantInput): Promise<ParticipantRecord> {
    const result = await this.client.query<ParticipantRow>(
      `INSERT INTO session_participants (session_id, user_id, role)
       VALUES ($1, $2, $3)
       ON CONFLICT (session_id, user_id) DO UPDATE SET role = EXCLUDED.role
       RETURNING ${PARTICIPANT_COLUMNS}`,
      [input.sessionId, input.userId, input.role]
    );
    return mapParticipant(firstRow(result.rows, 'upsertParticipant'));
  }

  async findParticipant(sessionId: number, userId: number, options: FindParticipantOptions = {}): Promise<ParticipantRecord | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const result = await this.client.query<ParticipantRow>(
      `SELECT ${PARTICIPANT_COLUMNS}
       FROM session_participants
       WHERE session_id = $1 AND user_id = $2${lock}`,
      [sessionId, userId]
    );
    const [row] = result.rows;
    return row ? mapParticipant(row) : null;
  }

  async listParticipants(sessionId: number): Promise<RosterEntry[]> {
    const result = await this.client.query<RosterRow>(
      `SELECT p.id, p.session_id, p.user_id, p.role, p.joined_at, u.display_name
       FROM session_participants p
       JOIN users u ON u.id = p.user_id
       WHERE p.session_id = $1
       ORDER BY (p.role = 'host') DESC, p.joined_at ASC, p.id ASC`,
      [sessionId]
    );
    return result.rows.map((row) => ({ ...mapParticipant(row), displayName: row.display_name }));
  }

  async countPendingQuestions(sessionId: number, authorUserId: number): Promise<number> {
    const result = await this.client.query<CountRow>(
      `SELECT COUNT(*)::int AS count
       FROM questions
       WHERE session_id = $1 AND author_user_id = $2 AND status = 'pending'`,
      [sessionId, authorUserId]
    );
    return firstRow(result.rows, 'countPendingQuestions').count;
  }

  async insertQuestion(input: InsertQuestionInput): Promise<QuestionRecord> {
    const result = await this.client.query<QuestionRow>(
      `INSERT INTO questions (session_id, author_user_id, body)
       VALUES ($1, $2, $3)
       RETURNING ${QUESTION_COLUMNS}`,
      [input.sessionId, input.authorUserId, input.body]
    );
    return mapQuestion(firstRow(result.rows, 'insertQuestion'));
  }

  async listQuestions(sessionId: number, status?: QuestionStatus): Promise<QuestionWithAuthor[]> {
    const values: unknown[] = [sessionId];
    let filter = '';
    if (status) {
      values.push(status);
      filter = ' AND q.status = $2';
    }
    const result = await this.client.query<QuestionWithAuthorRow>(
      `SELECT q.id, q.session_id, q.author_user_id, q.body, q.status, q.likes, q.created_at, q.answered_at,
              u.display_name AS author_display_name
       FROM questions q
       LEFT JOIN users u ON u.id = q.author_user_id
       WHERE q.session_id = $1${filter}
       ORDER BY q.created_at DESC, q.id DESC`,
      values
    );
    return result.rows.map((row) => ({ ...mapQuestion(row), authorDisplayName: row.author_display_name }));
  }
}

export class PgSessionStore implements SessionStore {
  constructor(private readonly pool: DatabasePool, private readonly defaults: UnitOfWorkOptions = {}) {}

  async transaction<T>(work: (tx: SessionStoreTransaction) => Promise<T>, options: UnitOfWorkOptions = {}): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    try {
      return await withTransaction(
        this.pool,
        (client) => work(new PgSessionStoreTransaction(client)),
        { statementTimeoutMs: timeoutMs }
      );
    } catch (error) {
      if (isStoreTimeout(error)) {
        throw new StoreTimeoutError(undefined, { cause: error });
      }
      throw error;
    }
  }
}
