import {
  compareQuestionsNewestFirst,
  compareRosterEntries,
  hasReachedLimit,
  HOST_SESSION_LIMIT,
  isJoinable,
  normalizeQuestionBody,
  normalizeTitle,
  PENDING_QUESTION_LIMIT,
  type QuestionStatus,
  resolveParticipantRole,
  type SessionRecord
} from '../domain/session.js';
import {
  type ParticipantSummary,
  type QuestionSummary,
  type SessionSummary,
  toParticipantSummary,
  toQuestionSummary,
  toSessionSummary
} from '../domain/summaries.js';
import { type CodeGeneratorOptions, insertWithUniqueCode } from './codeGenerator.js';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from './errors.js';
import { requireDisplayName, resolveUser } from './identityResolver.js';
import type { SessionStore, SessionStoreTransaction } from './sessionStore.js';

export const DEFAULT_RECENT_SESSIONS_LIMIT = 10;

export interface SessionServiceOptions {
  hostSessionLimit?: number;
  pendingQuestionLimit?: number;
  /** Statement deadline for every unit of work. */
  timeoutMs?: number;
  code?: CodeGeneratorOptions;
}

export interface CreateSessionInput {
  title: string;
  hostDisplayName: string | null | undefined;
}

export interface JoinSessionInput {
  code: string;
  displayName: string;
}

export interface SubmitQuestionInput {
  code: string;
  userId: number;
  body: string;
}

async function requireSession(tx: SessionStoreTransaction, code: string): Promise<SessionRecord> {
  const session = await tx.findSessionByCode(code);
  if (!session) {
    throw new NotFoundError('SESSION_NOT_FOUND', 'セッションが見つかりません。');
  }
  return session;
}

async function summarizeSession(tx: SessionStoreTransaction, session: SessionRecord): Promise<SessionSummary> {
  const host = await tx.findUserById(session.hostUserId);
  if (!host) {
    throw new Error(`host user ${session.hostUserId} of session ${session.code} is missing`);
  }
  return toSessionSummary(session, host);
}

/**
 * Session lifecycle workflows. Stateless between calls: every operation runs
 * as a single unit of work against the injected store.
 */
export class SessionService {
  private readonly hostSessionLimit: number;
  private readonly pendingQuestionLimit: number;
  private readonly timeoutMs: number | undefined;
  private readonly codeOptions: CodeGeneratorOptions;

  constructor(private readonly store: SessionStore, options: SessionServiceOptions = {}) {
    this.hostSessionLimit = options.hostSessionLimit ?? HOST_SESSION_LIMIT;
    this.pendingQuestionLimit = options.pendingQuestionLimit ?? PENDING_QUESTION_LIMIT;
    this.timeoutMs = options.timeoutMs;
    this.codeOptions = options.code ?? {};
  }

  private run<T>(work: (tx: SessionStoreTransaction) => Promise<T>): Promise<T> {
    return this.store.transaction(work, { timeoutMs: this.timeoutMs });
  }

  async createSession(input: CreateSessionInput): Promise<SessionSummary> {
    const hostName = requireDisplayName(input.hostDisplayName, 'INVALID_HOST_DISPLAY_NAME');
    const title = normalizeTitle(input.title);
    if (!title.ok) {
      throw new ValidationError('INVALID_TITLE', title.reason);
    }
    return this.run(async (tx) => {
      const host = await resolveUser(tx, hostName);
      // Held until commit so that concurrent creates for one host count sequentially.
      await tx.lockUser(host.id);
      const openSessions = await tx.countOpenSessionsForHost(host.id);
      if (hasReachedLimit(openSessions, this.hostSessionLimit)) {
        throw new ConflictError(
          'HOST_SESSION_LIMIT_EXCEEDED',
          `同時に開催できるセッションは${this.hostSessionLimit}件までです。`
        );
      }
      const session = await insertWithUniqueCode(
        tx,
        (code) => tx.insertSession({ hostUserId: host.id, title: title.value, code, status: 'draft' }),
        this.codeOptions
      );
      await tx.upsertParticipant({ sessionId: session.id, userId: host.id, role: 'host' });
      return toSessionSummary(session, host);
    });
  }

  async getRecentSessions(limit: number = DEFAULT_RECENT_SESSIONS_LIMIT): Promise<SessionSummary[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('INVALID_LIMIT', '取得件数は1以上の整数で指定してください。');
    }
    return this.run(async (tx) => {
      const sessions = await tx.listRecentSessions(limit);
      const hostIds = [...new Set(sessions.map((session) => session.hostUserId))];
      const hosts = new Map((await tx.findUsersByIds(hostIds)).map((user) => [user.id, user] as const));
      return sessions.flatMap((session) => {
        const host = hosts.get(session.hostUserId);
        return host ? [toSessionSummary(session, host)] : [];
      });
    });
  }

  async getSessionDetails(code: string): Promise<SessionSummary> {
    return this.run(async (tx) => summarizeSession(tx, await requireSession(tx, code)));
  }

  async getSessionParticipants(code: string): Promise<ParticipantSummary[]> {
    return this.run(async (tx) => {
      const session = await requireSession(tx, code);
      const roster = await tx.listParticipants(session.id);
      return [...roster].sort(compareRosterEntries).map(toParticipantSummary);
    });
  }

  async getSessionQuestions(code: string, status?: QuestionStatus): Promise<QuestionSummary[]> {
    return this.run(async (tx) => {
      const session = await requireSession(tx, code);
      const questions = await tx.listQuestions(session.id, status);
      return [...questions].sort(compareQuestionsNewestFirst).map(toQuestionSummary);
    });
  }

  async joinSession(input: JoinSessionInput): Promise<SessionSummary> {
    const displayName = requireDisplayName(input.displayName);
    return this.run(async (tx) => {
      const session = await requireSession(tx, input.code);
      if (!isJoinable(session)) {
        throw new ConflictError('SESSION_NOT_JOINABLE', 'このセッションは終了しているため参加できません。');
      }
      const user = await resolveUser(tx, displayName);
      await tx.upsertParticipant({
        sessionId: session.id,
        userId: user.id,
        role: resolveParticipantRole(session, user.id)
      });
      return summarizeSession(tx, session);
    });
  }

  async submitQuestion(input: SubmitQuestionInput): Promise<QuestionSummary> {
    const body = normalizeQuestionBody(input.body);
    if (!body.ok) {
      throw new ValidationError('INVALID_QUESTION_BODY', body.reason);
    }
    const { userId } = input;
    return this.run(async (tx) => {
      const session = await requireSession(tx, input.code);
      if (!isJoinable(session)) {
        throw new ConflictError('SESSION_NOT_JOINABLE', 'このセッションは終了しているため質問を受け付けていません。');
      }
      // The row lock makes count-then-insert exact for concurrent submissions by one user.
      const participant = await tx.findParticipant(session.id, userId, { forUpdate: true });
      if (!participant) {
        throw new ForbiddenError('NOT_PARTICIPANT', 'セッションの参加者のみ質問を投稿できます。');
      }
      const author = await tx.findUserById(userId);
      if (!author) {
        throw new ForbiddenError('NOT_PARTICIPANT', 'ユーザーが見つかりません。');
      }
      const pending = await tx.countPendingQuestions(session.id, userId);
      if (hasReachedLimit(pending, this.pendingQuestionLimit)) {
        throw new ConflictError(
          'QUESTION_LIMIT_EXCEEDED',
          `未回答の質問は${this.pendingQuestionLimit}件までです。回答されるまでお待ちください。`
        );
      }
      const question = await tx.insertQuestion({ sessionId: session.id, authorUserId: userId, body: body.value });
      return toQuestionSummary({ ...question, authorDisplayName: author.displayName });
    });
  }
}
