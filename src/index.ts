export type {
  DatabaseClient,
  DatabasePool,
  ResolvedDatabaseConfig,
  TransactionOptions
} from './db/client.js';
export {
  createPool,
  resolveDatabaseConfig,
  withTransaction
} from './db/client.js';
export { applyMigrations } from './db/migrations.js';
export type { RandomIndex } from './domain/joinCode.js';
export {
  generateJoinCode,
  isJoinCode,
  JOIN_CODE_ALPHABET,
  JOIN_CODE_LENGTH
} from './domain/joinCode.js';
export type {
  ParticipantRecord,
  ParticipantRole,
  QuestionRecord,
  QuestionStatus,
  QuestionWithAuthor,
  RosterEntry,
  SessionRecord,
  SessionStatus
} from './domain/session.js';
export {
  compareQuestionsNewestFirst,
  compareRosterEntries,
  HOST_SESSION_LIMIT,
  isJoinable,
  normalizeQuestionBody,
  normalizeTitle,
  PENDING_QUESTION_LIMIT,
  resolveParticipantRole
} from './domain/session.js';
export type {
  ParticipantSummary,
  QuestionSummary,
  SessionSummary,
  UserSummary
} from './domain/summaries.js';
export {
  toParticipantSummary,
  toQuestionSummary,
  toSessionSummary,
  toUserSummary
} from './domain/summaries.js';
export type { TextValidation, UserRecord } from './domain/user.js';
export { normalizeDisplayName } from './domain/user.js';
export { buildServer } from './server/buildServer.js';
export { getServerConfig } from './server/config.js';
export type { ServerConfig } from './server/config.js';
export { createDependencies } from './server/dependencies.js';
export type { ServerDependencies } from './server/dependencies.js';
export type { CodeGeneratorOptions } from './services/codeGenerator.js';
export { insertWithUniqueCode, MAX_CODE_ATTEMPTS } from './services/codeGenerator.js';
export type { ErrorCode, ErrorKind } from './services/errors.js';
export {
  ConflictError,
  ForbiddenError,
  isSessionServiceError,
  NotFoundError,
  SessionServiceError,
  StoreTimeoutError,
  ValidationError
} from './services/errors.js';
export { resolveUser } from './services/identityResolver.js';
export { PgSessionStore } from './services/pgSessionStore.js';
export type {
  SessionStore,
  SessionStoreTransaction,
  UnitOfWorkOptions
} from './services/sessionStore.js';
export type {
  CreateSessionInput,
  JoinSessionInput,
  SessionServiceOptions,
  SubmitQuestionInput
} from './services/sessionService.js';
export { SessionService } from './services/sessionService.js';
