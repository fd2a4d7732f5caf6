import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import { HOST_SESSION_LIMIT, PENDING_QUESTION_LIMIT } from '../domain/session.js';

loadEnv();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().optional(),
  HOST_SESSION_LIMIT: z.coerce.number().int().min(1).default(HOST_SESSION_LIMIT),
  PENDING_QUESTION_LIMIT: z.coerce.number().int().min(1).default(PENDING_QUESTION_LIMIT),
  STORE_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000)
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface ServerConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  host: string;
  logLevel: LogLevel;
  corsOrigins: string[] | undefined;
  hostSessionLimit: number;
  pendingQuestionLimit: number;
  storeTimeoutMs: number;
}

function parseOrigins(value?: string): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map((item) => item.trim()).filter(Boolean);
}

export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    corsOrigins: parseOrigins(parsed.CORS_ORIGIN),
    hostSessionLimit: parsed.HOST_SESSION_LIMIT,
    pendingQuestionLimit: parsed.PENDING_QUESTION_LIMIT,
    storeTimeoutMs: parsed.STORE_STATEMENT_TIMEOUT_MS
  };
}
