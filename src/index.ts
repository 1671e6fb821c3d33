/**
 * sqlgate HTTP server - main entry point
 */

import { fileURLToPath } from 'url';
import { getConfig } from './config.js';
import { buildServer } from './server.js';
import { closeDb, getDb } from './services/database.js';
import { getQueryPipeline, resetQueryPipeline } from './services/pipeline.js';
import { ConfigError } from './types/errors.js';
import { logger } from './utils/logger.js';

export interface StartOptions {
  port?: number;
  host?: string;
}

/**
 * Build the pipeline, open the database and listen.
 */
export async function startServer(options: StartOptions = {}): Promise<void> {
  const config = getConfig();
  logger.info('Starting sqlgate API server...');

  const pipeline = await getQueryPipeline();
  const fastify = await buildServer({ pipeline, db: getDb() });

  /**
   * Lifecycle hooks.
   */
  fastify.addHook('onClose', async () => {
    logger.info('Shutting down sqlgate API server...');
    resetQueryPipeline();
    await closeDb();
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}`);
    fastify.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const port = options.port ?? config.PORT;
  const host = options.host ?? config.HOST;
  await fastify.listen({ port, host });
  logger.info(`Server running at http://localhost:${port}`);
  logger.info(`API docs at http://localhost:${port}/docs`);
}

/**
 * Start the server.
 */
export function main(): void {
  startServer().catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else {
      logger.fatal({ err: error }, 'Failed to start server');
    }
    process.exit(1);
  });
}

// Started directly (node dist/index.js) rather than imported by the CLI
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main();
}
