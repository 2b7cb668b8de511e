import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import fastifyCors from '@fastify/cors';
import { sql } from 'drizzle-orm';
import type { ApiErrorResponse } from '@office-duties/shared';
import configPlugin from './plugins/config.js';
import dbPlugin from './plugins/db.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import dutyRoutes from './routes/duties.js';
import memberRoutes from './routes/members.js';
import { StoreError } from './errors/AppError.js';
import type { DatabaseUrlResolver } from './services/databaseUrlService.js';

export interface BuildAppOptions {
  /** Overrides how the database location is resolved (defaults to configuration). */
  databaseUrlResolver?: DatabaseUrlResolver;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: process.env.LOG_LEVEL || 'info',
    },
    trustProxy: process.env.TRUST_PROXY === 'true',
    // Report every violated field, not just the first
    ajv: {
      customOptions: { allErrors: true },
    },
  });

  // Configuration (must be first)
  await app.register(configPlugin);

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  await app.register(fastifyCors, { origin: app.config.corsOrigin });

  // Compression (gzip/deflate/brotli)
  await app.register(fastifyCompress);

  // Database connection & migrations
  await app.register(dbPlugin, { databaseUrlResolver: options.databaseUrlResolver });

  await app.register(dutyRoutes, { prefix: '/api/duties' });
  await app.register(memberRoutes, { prefix: '/api/members' });

  // Health check endpoint (liveness)
  app.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Readiness probe: verifies the database answers
  app.get('/api/health/ready', async () => {
    try {
      app.db.run(sql`SELECT 1`);
    } catch (err) {
      throw new StoreError('Database is not reachable', err);
    }
    return { status: 'ready', timestamp: new Date().toISOString() };
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiErrorResponse = request.url.startsWith('/api/')
      ? {
          error: {
            code: 'ROUTE_NOT_FOUND',
            message: `Route ${request.method} ${request.url} not found`,
          },
        }
      : {
          error: {
            code: 'NOT_FOUND',
            message: 'Not found',
          },
        };
    return reply.status(404).send(response);
  });

  return app;
}
