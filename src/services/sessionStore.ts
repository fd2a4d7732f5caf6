import type {
  ParticipantRecord,
  ParticipantRole,
  QuestionRecord,
  QuestionStatus,
  QuestionWithAuthor,
  RosterEntry,
  SessionRecord,
  SessionStatus
} from '../domain/session.js';
import type { UserRecord } from '../domain/user.js';

export interface InsertSessionInput {
  hostUserId: number;
  title: string;
  code: string;
  status?: SessionStatus;
}

export interface UpsertParticipantInput {
  sessionId: number;
  userId: number;
  role: ParticipantRole;
}

export interface InsertQuestionInput {
  sessionId: number;
  authorUserId: number | null;
  body: string;
}

export interface FindParticipantOptions {
  /** Hold a row lock on the participant until the unit of work ends. */
  forUpdate?: boolean;
}

/**
 * Row operations available inside one unit of work. Every call made through
 * the same handle commits or rolls back together.
 */
export interface SessionStoreTransaction {
  findUserByDisplayName(displayName: string): Promise<UserRecord | null>;
  findUserById(id: number): Promise<UserRecord | null>;
  findUsersByIds(ids: readonly number[]): Promise<UserRecord[]>;
  /** Returns `null` when the display name already exists. */
  insertUser(displayName: string): Promise<UserRecord | null>;
  /** Serializes concurrent units of work acting on behalf of the same user. */
  lockUser(id: number): Promise<void>;

  countOpenSessionsForHost(hostUserId: number): Promise<number>;
  sessionCodeExists(code: string): Promise<boolean>;
  /** Returns `null` when the code was claimed by a concurrent insert. */
  insertSession(input: InsertSessionInput): Promise<SessionRecord | null>;
  findSessionByCode(code: string): Promise<SessionRecord | null>;
  listRecentSessions(limit: number): Promise<SessionRecord[]>;

  /** Insert, or on `(session_id, user_id)` conflict overwrite the role, in one statement. */
  upsertParticipant(input: UpsertParticipantInput): Promise<ParticipantRecord>;
  findParticipant(sessionId: number, userId: number, options?: FindParticipantOptions): Promise<ParticipantRecord | null>;
  listParticipants(sessionId: number): Promise<RosterEntry[]>;

  countPendingQuestions(sessionId: number, authorUserId: number): Promise<number>;
  insertQuestion(input: InsertQuestionInput): Promise<QuestionRecord>;
  listQuestions(sessionId: number, status?: QuestionStatus): Promise<QuestionWithAuthor[]>;
}

export interface UnitOfWorkOptions {
  /** Deadline for each statement; exceeding it fails with `StoreTimeoutError`. */
  timeoutMs?: number;
}

export interface SessionStore {
  transaction<T>(work: (tx: SessionStoreTransaction) => Promise<T>, options?: UnitOfWorkOptions): Promise<T>;
}
