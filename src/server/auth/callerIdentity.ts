import type { FastifyReply, FastifyRequest } from 'fastify';

/** Header carrying the numeric id of the calling user. */
export const CALLER_ID_HEADER = 'x-user-id';

export type CallerIdentity = {
  userId: number;
};

export function normalizeCallerIdentity(raw: unknown): CallerIdentity | null {
  const candidate = Array.isArray(raw) ? raw[0] : raw;
  let userId: number | null = null;
  if (typeof candidate === 'number') {
    userId = candidate;
  } else if (typeof candidate === 'string' && /^\d+$/.test(candidate.trim())) {
    userId = Number(candidate.trim());
  }
  if (userId === null || !Number.isSafeInteger(userId) || userId < 1) {
    return null;
  }
  return { userId } satisfies CallerIdentity;
}

export function getCallerIdentity(request: FastifyRequest): CallerIdentity | null {
  if (request.caller) {
    return request.caller;
  }
  const normalized = normalizeCallerIdentity(request.headers[CALLER_ID_HEADER]);
  request.caller = normalized;
  return normalized;
}

export async function ensureCallerIdentity(
  request: FastifyRequest,
  reply: FastifyReply,
  message = 'ユーザーIDを x-user-id ヘッダーで指定してください。'
): Promise<CallerIdentity | null> {
  const caller = getCallerIdentity(request);
  if (caller) {
    return caller;
  }
  request.log.warn({
    msg: 'ensureCallerIdentity: missing or malformed caller id',
    headerPresent: request.headers[CALLER_ID_HEADER] !== undefined
  });
  if (!reply.sent) {
    await reply.code(401).send({ message, code: 'CALLER_IDENTITY_REQUIRED' });
  }
  return null;
}
