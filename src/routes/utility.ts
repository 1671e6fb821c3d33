/**
 * Utility endpoints (health, service info).
 */

import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';
import { pingDb } from '../services/database.js';

export interface UtilityRoutesOptions {
  db?: Knex;
}

export async function utilityRoutes(fastify: FastifyInstance, options: UtilityRoutesOptions) {
  // GET /health - Health check
  fastify.get('/health', async (_request, reply) => {
    if (!options.db) {
      return { status: 'ok', database: 'unconfigured' };
    }
    const up = await pingDb(options.db);
    return reply.status(up ? 200 : 503).send({ status: up ? 'ok' : 'degraded', database: up ? 'up' : 'down' });
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'sqlgate',
      version: '1.0.0',
      description: 'Natural-language analytics gateway',
      endpoints: {
        query: 'POST /query',
        health: 'GET /health',
      },
      docs: '/docs',
    };
  });
}
