import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import { getHealthStatus, recordDatabasePing } from '../../services/databaseHealth.js';
import type { FastifyZodPlugin } from '../http.js';

const healthResponseSchema = z.object({
  status: z.literal('ok'),
  message: z.string()
});

const databasePingResponseSchema = z.object({
  inserted_id: z.number().int(),
  total_rows: z.number().int().nonnegative()
});

export const registerHealthRoutes: FastifyZodPlugin = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get('/health', {
    schema: {
      response: { 200: healthResponseSchema }
    }
  }, async () => getHealthStatus());

  app.post('/db/ping', {
    schema: {
      response: { 200: databasePingResponseSchema }
    }
  }, async (request) => {
    const result = await recordDatabasePing(fastify.deps.pool);
    request.log.debug({ msg: 'db:ping', insertedId: result.insertedId, totalRows: result.totalRows });
    return { inserted_id: result.insertedId, total_rows: result.totalRows };
  });
};
