/**
 * Q&A セッション・参加者・質問に関するドメインルール。
 */

import { textLength, type TextValidation } from './user.js';

export type SessionStatus = 'draft' | 'active' | 'ended';
export type ParticipantRole = 'host' | 'participant';
export type QuestionStatus = 'pending' | 'answered';

export const SESSION_STATUSES = ['draft', 'active', 'ended'] as const satisfies readonly SessionStatus[];
export const OPEN_SESSION_STATUSES = ['draft', 'active'] as const satisfies readonly SessionStatus[];
export const PARTICIPANT_ROLES = ['host', 'participant'] as const satisfies readonly ParticipantRole[];
export const QUESTION_STATUSES = ['pending', 'answered'] as const satisfies readonly QuestionStatus[];

export const HOST_SESSION_LIMIT = 3;
export const PENDING_QUESTION_LIMIT = 3;
export const TITLE_MAX_LENGTH = 200;
export const QUESTION_BODY_MAX_LENGTH = 280;

export interface SessionRecord {
  id: number;
  hostUserId: number;
  title: string;
  code: string;
  status: SessionStatus;
  createdAt: Date;
  startedAt: Date | null;
  endedAt: Date | null;
}

export interface ParticipantRecord {
  id: number;
  sessionId: number;
  userId: number;
  role: ParticipantRole;
  joinedAt: Date;
}

export interface RosterEntry extends ParticipantRecord {
  displayName: string;
}

export interface QuestionRecord {
  id: number;
  sessionId: number;
  authorUserId: number | null;
  body: string;
  status: QuestionStatus;
  likes: number;
  createdAt: Date;
  answeredAt: Date | null;
}

export interface QuestionWithAuthor extends QuestionRecord {
  authorDisplayName: string | null;
}

export function isSessionStatus(value: string): value is SessionStatus {
  return SESSION_STATUSES.some((status) => status === value);
}

export function isParticipantRole(value: string): value is ParticipantRole {
  return PARTICIPANT_ROLES.some((role) => role === value);
}

export function isQuestionStatus(value: string): value is QuestionStatus {
  return QUESTION_STATUSES.some((status) => status === value);
}

/** `ended` is terminal for joins and question submission. */
export function isJoinable(session: Pick<SessionRecord, 'status'>): boolean {
  return session.status !== 'ended';
}

/**
 * The role is derived from the session's host on every join, so a host
 * re-joining under their own name can never be demoted.
 */
export function resolveParticipantRole(session: Pick<SessionRecord, 'hostUserId'>, userId: number): ParticipantRole {
  return session.hostUserId === userId ? 'host' : 'participant';
}

export function hasReachedLimit(count: number, limit: number): boolean {
  return count >= limit;
}

export function normalizeTitle(raw: string): TextValidation {
  const value = raw.trim();
  if (value === '') {
    return { ok: false, reason: 'タイトルを入力してください。' };
  }
  if (textLength(value) > TITLE_MAX_LENGTH) {
    return { ok: false, reason: `タイトルは${TITLE_MAX_LENGTH}文字以内で入力してください。` };
  }
  return { ok: true, value };
}

export function normalizeQuestionBody(raw: string): TextValidation {
  const value = raw.trim();
  if (value === '') {
    return { ok: false, reason: '質問内容を入力してください。' };
  }
  if (textLength(value) > QUESTION_BODY_MAX_LENGTH) {
    return { ok: false, reason: `質問は${QUESTION_BODY_MAX_LENGTH}文字以内で入力してください。` };
  }
  return { ok: true, value };
}

/** Host first, then join order. */
export function compareRosterEntries(a: ParticipantRecord, b: ParticipantRecord): number {
  if (a.role !== b.role) return a.role === 'host' ? -1 : 1;
  const joined = a.joinedAt.getTime() - b.joinedAt.getTime();
  if (joined !== 0) return joined;
  return a.id - b.id;
}

/** Newest first. */
export function compareQuestionsNewestFirst(a: QuestionRecord, b: QuestionRecord): number {
  const created = b.createdAt.getTime() - a.createdAt.getTime();
  if (created !== 0) return created;
  return b.id - a.id;
}
