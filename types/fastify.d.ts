import type { FastifyReply, FastifyRequest } from 'fastify';
import type { CallerIdentity } from '../src/server/auth/callerIdentity.js';
import type { ServerConfig } from '../src/server/config.js';
import type { ServerDependencies } from '../src/server/dependencies.js';

declare module 'fastify' {
  interface FastifyInstance {
    deps: ServerDependencies;
    config: ServerConfig;
    identifyCaller: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;
  }

  interface FastifyRequest {
    caller: CallerIdentity | null;
  }
}
