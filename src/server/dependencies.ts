import { createPool, type DatabasePool } from '../db/client.js';
import { PgSessionStore } from '../services/pgSessionStore.js';
import { SessionService } from '../services/sessionService.js';
import type { ServerConfig } from './config.js';

export interface ServerDependencies {
  pool: DatabasePool;
  sessions: SessionService;
}

export function createDependencies(config: ServerConfig, pool: DatabasePool = createPool()): ServerDependencies {
  const store = new PgSessionStore(pool, { timeoutMs: config.storeTimeoutMs });
  const sessions = new SessionService(store, {
    hostSessionLimit: config.hostSessionLimit,
    pendingQuestionLimit: config.pendingQuestionLimit
  });
  return { pool, sessions };
}
