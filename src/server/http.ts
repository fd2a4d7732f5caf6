import type {
  FastifyBaseLogger,
  FastifyInstance,
  FastifyPluginAsync,
  FastifyPluginOptions,
  FastifyReply,
  FastifyRequest,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault
} from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import { type ErrorKind, isSessionServiceError, type SessionServiceError } from '../services/errors.js';

export type FastifyZodPlugin<Options extends FastifyPluginOptions = Record<never, never>> =
  FastifyPluginAsync<Options, RawServerDefault, ZodTypeProvider>;

export type FastifyZodInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  FastifyBaseLogger,
  ZodTypeProvider
>;

export const errorResponseSchema = z.object({
  message: z.string(),
  code: z.string()
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;

export const errorResponses = {
  400: errorResponseSchema,
  403: errorResponseSchema,
  404: errorResponseSchema,
  409: errorResponseSchema,
  503: errorResponseSchema,
  504: errorResponseSchema
} as const;

export type ErrorStatus = 400 | 403 | 404 | 409 | 503 | 504;

const STATUS_BY_KIND: Record<ErrorKind, ErrorStatus> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  forbidden: 403,
  timeout: 504
};

export function statusForError(error: SessionServiceError): ErrorStatus {
  if (error.code === 'CODE_COLLISION_EXHAUSTED') {
    return 503;
  }
  return STATUS_BY_KIND[error.kind];
}

export type HandledServiceError = { status: ErrorStatus; body: ErrorResponse; retryable: boolean };

export function handleServiceError(error: unknown): HandledServiceError | null {
  if (!isSessionServiceError(error)) {
    return null;
  }
  return {
    status: statusForError(error),
    body: { message: error.message, code: error.code },
    retryable: error.retryable
  };
}

/** Logs a rejected request and sets `retry-after` for retryable failures. */
export function prepareRejection(request: FastifyRequest, reply: FastifyReply, handled: HandledServiceError): void {
  const entry = { msg: 'service request rejected', code: handled.body.code, status: handled.status, url: request.url };
  if (handled.status >= 500) {
    request.log.error(entry);
  } else if (handled.status === 403 || handled.status === 409) {
    request.log.warn(entry);
  } else {
    request.log.info(entry);
  }
  if (handled.retryable) {
    reply.header('retry-after', '1');
  }
}
