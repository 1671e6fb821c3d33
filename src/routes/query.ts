/**
 * Query endpoint for natural language analytics questions.
 */

import type { FastifyInstance } from 'fastify';
import type { QueryPipeline } from '../services/pipeline.js';
import { parseQueryRequest } from '../types/models.js';

export interface QueryRoutesOptions {
  pipeline: QueryPipeline;
}

export async function queryRoutes(fastify: FastifyInstance, options: QueryRoutesOptions) {
  const { pipeline } = options;

  // POST /query - Main query endpoint
  // The body is validated by parseQueryRequest so that the HTTP surface and
  // the CLI report the same messages.
  fastify.post(
    '/query',
    {
      schema: {
        description: 'Answer an analytics question with a bounded, read-only query',
        tags: ['query'],
      },
    },
    async (request, reply) => {
      const body = parseQueryRequest(request.body);
      const envelope = await pipeline.run(body, { requestId: request.id });
      return reply.status(envelope.status === 'ok' ? 200 : 400).send(envelope);
    }
  );
}
