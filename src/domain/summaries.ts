/**
 * ストレージのレコードを API レスポンス形状へ射影する。副作用なし。
 */

import type {
  ParticipantRole,
  QuestionStatus,
  QuestionWithAuthor,
  RosterEntry,
  SessionRecord,
  SessionStatus
} from './session.js';
import type { UserRecord } from './user.js';

export interface UserSummary {
  id: number;
  display_name: string;
}

export interface SessionSummary {
  id: number;
  code: string;
  title: string;
  status: SessionStatus;
  host: UserSummary;
  created_at: string;
}

export interface ParticipantSummary {
  user: UserSummary;
  role: ParticipantRole;
  joined_at: string;
}

export interface QuestionSummary {
  id: number;
  session_id: number;
  body: string;
  status: QuestionStatus;
  likes: number;
  author: UserSummary | null;
  created_at: string;
}

export function toUserSummary(user: Pick<UserRecord, 'id' | 'displayName'>): UserSummary {
  return {
    id: user.id,
    display_name: user.displayName
  };
}

export function toSessionSummary(session: SessionRecord, host: Pick<UserRecord, 'id' | 'displayName'>): SessionSummary {
  return {
    id: session.id,
    code: session.code,
    title: session.title,
    status: session.status,
    host: toUserSummary(host),
    created_at: session.createdAt.toISOString()
  };
}

export function toParticipantSummary(entry: RosterEntry): ParticipantSummary {
  return {
    user: toUserSummary({ id: entry.userId, displayName: entry.displayName }),
    role: entry.role,
    joined_at: entry.joinedAt.toISOString()
  };
}

export function toQuestionSummary(question: QuestionWithAuthor): QuestionSummary {
  const author = question.authorUserId !== null && question.authorDisplayName !== null
    ? toUserSummary({ id: question.authorUserId, displayName: question.authorDisplayName })
    : null;
  return {
    id: question.id,
    session_id: question.sessionId,
    body: question.body,
    status: question.status,
    likes: question.likes,
    author,
    created_at: question.createdAt.toISOString()
  };
}
