import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import Fastify, { type FastifyError, type FastifyReply, type FastifyRequest } from 'fastify';
import { serializerCompiler, validatorCompiler, type ZodTypeProvider } from 'fastify-type-provider-zod';

import { ensureCallerIdentity } from './auth/callerIdentity.js';
import type { ServerConfig } from './config.js';
import type { ServerDependencies } from './dependencies.js';
import type { FastifyZodInstance } from './http.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerSessionRoutes } from './routes/sessions.js';

function decorateCallerIdentity(fastify: FastifyZodInstance): void {
  fastify.decorateRequest('caller', null);
  fastify.decorate('identifyCaller', async (request: FastifyRequest, reply: FastifyReply) => {
    const caller = await ensureCallerIdentity(request, reply);
    if (!caller) {
      return reply;
    }
    request.log.debug({ msg: 'identifyCaller: caller resolved', userId: caller.userId });
    return undefined;
  });
}

export interface BuildServerOptions {
  config: ServerConfig;
  dependencies: ServerDependencies;
}

export async function buildServer({ config, dependencies }: BuildServerOptions): Promise<FastifyZodInstance> {
  const fastify = Fastify({
    logger: config.env === 'test' ? false : { level: config.logLevel }
  }).withTypeProvider<ZodTypeProvider>();

  fastify.setValidatorCompiler(validatorCompiler);
  fastify.setSerializerCompiler(serializerCompiler);

  fastify.decorate('deps', dependencies);
  fastify.decorate('config', config);

  await fastify.register(cors, {
    origin: config.corsOrigins ?? true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-User-Id', 'X-Requested-With'],
    preflightContinue: false
  });
  await fastify.register(helmet, {
    contentSecurityPolicy: false
  });
  // Decorated on the root instance so every route plugin sees it.
  decorateCallerIdentity(fastify);

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      request.log.info({ msg: 'request validation failed', context: error.validationContext, url: request.url });
      return reply.status(422).send({
        message: error.message,
        code: 'REQUEST_VALIDATION_FAILED'
      });
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error(error, 'unhandled error');
      return reply.status(statusCode).send({ message: '予期せぬエラーが発生しました。', code: 'INTERNAL_ERROR' });
    }
    return reply.status(statusCode).send({ message: error.message, code: error.code ?? 'REQUEST_ERROR' });
  });

  await fastify.register(registerHealthRoutes);
  await fastify.register(registerSessionRoutes, { prefix: '/api/v1' });

  fastify.addHook('onClose', async () => {
    await dependencies.pool.end();
  });

  return fastify;
}
