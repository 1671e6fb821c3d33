/**
 * Fastify application factory.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { Knex } from 'knex';
import type { QueryPipeline } from './services/pipeline.js';
import { queryRoutes } from './routes/query.js';
import { utilityRoutes } from './routes/utility.js';
import { InputError } from './types/errors.js';
import { errorEnvelope } from './types/models.js';
import { loggerOptions } from './utils/logger.js';

export interface ServerOptions {
  pipeline: QueryPipeline;
  /** Enables the database check in GET /health */
  db?: Knex;
  /** Serve OpenAPI docs at /docs */
  docs?: boolean;
}

/**
 * Create and configure the Fastify server. Does not listen.
 */
export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerOptions,
  });

  /**
   * Register CORS plugin.
   */
  await fastify.register(cors, {
    origin: '*',
  });

  /**
   * Register Swagger documentation.
   */
  if (options.docs ?? true) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'sqlgate',
          description: 'Ask analytics questions in plain language; get bounded, read-only query results',
          version: '1.0.0',
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  /**
   * Everything that escapes a handler ends up here. Pipeline failures never
   * do: they are returned as error envelopes by the route.
   * Must be set before the routes are registered: child contexts copy the
   * handler at registration time.
   */
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof InputError) {
      return reply.status(400).send(errorEnvelope(error.message, 'request'));
    }

    if (
      error instanceof SyntaxError ||
      error.code === 'FST_ERR_CTP_EMPTY_JSON_BODY' ||
      error.statusCode === 400
    ) {
      return reply.status(400).send(errorEnvelope('Invalid JSON payload.', 'request'));
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send(errorEnvelope('Internal server error.', 'server'));
  });

  /**
   * Register route handlers.
   */
  await fastify.register(queryRoutes, { pipeline: options.pipeline });
  await fastify.register(utilityRoutes, { db: options.db });

  return fastify;
}
