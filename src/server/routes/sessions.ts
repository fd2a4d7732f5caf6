import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import {
  PARTICIPANT_ROLES,
  QUESTION_BODY_MAX_LENGTH,
  QUESTION_STATUSES,
  SESSION_STATUSES,
  TITLE_MAX_LENGTH
} from '../../domain/session.js';
import { DISPLAY_NAME_MAX_LENGTH, textLength } from '../../domain/user.js';
import { DEFAULT_RECENT_SESSIONS_LIMIT } from '../../services/sessionService.js';
import { getCallerIdentity } from '../auth/callerIdentity.js';
import { errorResponses, type FastifyZodPlugin, handleServiceError, prepareRejection } from '../http.js';

const MAX_RECENT_SESSIONS_LIMIT = 100;

/** Length in code points after trimming, the same measure the service and the table checks apply. */
function boundedText(max: number) {
  return z.string().min(1).refine((value) => textLength(value.trim()) <= max, `${max}文字以内で入力してください。`);
}

const userSummarySchema = z.object({
  id: z.number().int(),
  display_name: z.string()
});

const sessionSummarySchema = z.object({
  id: z.number().int(),
  code: z.string(),
  title: z.string(),
  status: z.enum(SESSION_STATUSES),
  host: userSummarySchema,
  created_at: z.string()
});

const participantSummarySchema = z.object({
  user: userSummarySchema,
  role: z.enum(PARTICIPANT_ROLES),
  joined_at: z.string()
});

const questionSummarySchema = z.object({
  id: z.number().int(),
  session_id: z.number().int(),
  body: z.string(),
  status: z.enum(QUESTION_STATUSES),
  likes: z.number().int().nonnegative(),
  author: userSummarySchema.nullable(),
  created_at: z.string()
});

const createSessionBodySchema = z.object({
  title: boundedText(TITLE_MAX_LENGTH),
  host_display_name: boundedText(DISPLAY_NAME_MAX_LENGTH).nullish()
});

const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_RECENT_SESSIONS_LIMIT).default(DEFAULT_RECENT_SESSIONS_LIMIT)
});

const sessionCodeParamsSchema = z.object({
  code: z.string().min(1).max(10)
});

const listQuestionsQuerySchema = z.object({
  status: z.enum(QUESTION_STATUSES).optional()
});

const joinSessionBodySchema = z.object({
  display_name: boundedText(DISPLAY_NAME_MAX_LENGTH)
});

const submitQuestionBodySchema = z.object({
  body: boundedText(QUESTION_BODY_MAX_LENGTH)
});

export const registerSessionRoutes: FastifyZodPlugin = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { sessions } = fastify.deps;

  app.post('/sessions', {
    schema: {
      body: createSessionBodySchema,
      response: {
        201: sessionSummarySchema,
        ...errorResponses
      }
    }
  }, async (request, reply) => {
    try {
      const summary = await sessions.createSession({
        title: request.body.title,
        hostDisplayName: request.body.host_display_name
      });
      request.log.info({ msg: 'sessions:create', sessionId: summary.id, code: summary.code, hostId: summary.host.id });
      return reply.code(201).send(summary);
    } catch (error) {
      const handled = handleServiceError(error);
      if (handled) {
        prepareRejection(request, reply, handled);
        return reply.code(handled.status).send(handled.body);
      }
      throw error;
    }
  });

  app.get('/sessions', {
    schema: {
      querystring: listSessionsQuerySchema,
      response: {
        200: z.array(sessionSummarySchema),
        ...errorResponses
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send(await sessions.getRecentSessions(request.query.limit));
    } catch (error) {
      const handled = handleServiceError(error);
      if (handled) {
        prepareRejection(request, reply, handled);
        return reply.code(handled.status).send(handled.body);
      }
      throw error;
    }
  });

  app.get('/sessions/:code', {
    schema: {
      params: sessionCodeParamsSchema,
      response: {
        200: sessionSummarySchema,
        ...errorResponses
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send(await sessions.getSessionDetails(request.params.code));
    } catch (error) {
      const handled = handleServiceError(error);
      if (handled) {
        prepareRejection(request, reply, handled);
        return reply.code(handled.status).send(handled.body);
      }
      throw error;
    }
  });

  app.get('/sessions/:code/participants', {
    schema: {
      params: sessionCodeParamsSchema,
      response: {
        200: z.array(participantSummarySchema),
        ...errorResponses
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send(await sessions.getSessionParticipants(request.params.code));
    } catch (error) {
      const handled = handleServiceError(error);
      if (handled) {
        prepareRejection(request, reply, handled);
        return reply.code(handled.status).send(handled.body);
      }
      throw error;
    }
  });

  app.get('/sessions/:code/questions', {
    schema: {
      params: sessionCodeParamsSchema,
      querystring: listQuestionsQuerySchema,
      response: {
        200: z.array(questionSummarySchema),
        ...errorResponses
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send(await sessions.getSessionQuestions(request.params.code, request.query.status));
    } catch (error) {
      const handled = handleServiceError(error);
      if (handled) {
        prepareRejection(request, reply, handled);
        return reply.code(handled.status).send(handled.body);
      }
      throw error;
    }
  });

  app.post('/sessions/:code/join', {
    schema: {
      params: sessionCodeParamsSchema,
      body: joinSessionBodySchema,
      response: {
        200: sessionSummarySchema,
        ...errorResponses
      }
    }
  }, async (request, reply) => {
    try {
      const summary = await sessions.joinSession({
        code: request.params.code,
        displayName: request.body.display_name
      });
      request.log.info({ msg: 'sessions:join', sessionId: summary.id, code: summary.code });
      return reply.send(summary);
    } catch (error) {
      const handled = handleServiceError(error);
      if (handled) {
        prepareRejection(request, reply, handled);
        return reply.code(handled.status).send(handled.body);
      }
      throw error;
    }
  });

  app.post('/sessions/:code/questions', {
    preHandler: fastify.identifyCaller,
    schema: {
      params: sessionCodeParamsSchema,
      body: submitQuestionBodySchema,
      response: {
        201: questionSummarySchema,
        401: errorResponses[400],
        ...errorResponses
      }
    }
  }, async (request, reply) => {
    // Set by the identifyCaller preHandler, which replies 401 when it is missing.
    const caller = getCallerIdentity(request);
    if (!caller) {
      throw new Error('caller identity missing after identifyCaller');
    }
    try {
      const question = await sessions.submitQuestion({
        code: request.params.code,
        userId: caller.userId,
        body: request.body.body
      });
      request.log.info({ msg: 'questions:submit', questionId: question.id, sessionId: question.session_id, userId: caller.userId });
      return reply.code(201).send(question);
    } catch (error) {
      const handled = handleServiceError(error);
      if (handled) {
        prepareRejection(request, reply, handled);
        return reply.code(handled.status).send(handled.body);
      }
      throw error;
    }
  });
};
