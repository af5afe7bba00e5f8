import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import { registerRoutes, type ApiDependencies } from './api/index.js';
import { globalErrorHandler } from './api/middleware/error-handler.js';
import { getLogger } from './shared/logger.js';

const logger = getLogger('server');

export interface ServerOptions {
  /** Allowed CORS origin; `true` reflects any origin. Default true. */
  corsOrigin?: boolean | string;
}

/**
 * Creates and configures the Fastify server for the run control surface.
 *
 * - CORS
 * - API routes under /api/v1
 * - Global error handler with structured JSON responses
 * - JSON 404 for everything else
 *
 * Listening and shutdown belong to the caller.
 */
export async function createServer(deps: ApiDependencies, options: ServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own pino logger
    requestTimeout: 30_000,
    bodyLimit: 65_536,
  });

  // ---------------------------------------------------------------------------
  // CORS
  // ---------------------------------------------------------------------------
  await app.register(fastifyCors, {
    origin: options.corsOrigin ?? true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  // ---------------------------------------------------------------------------
  // Global error handler
  // ---------------------------------------------------------------------------
  app.setErrorHandler(globalErrorHandler);

  // ---------------------------------------------------------------------------
  // Request logging
  // ---------------------------------------------------------------------------
  app.addHook('onRequest', (request, _reply, done) => {
    logger.debug({ method: request.method, url: request.url, id: request.id }, 'Incoming request');
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
    done();
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await registerRoutes(app, deps);

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({
      error: { code: 'NOT_FOUND', message: 'Resource not found' },
    });
  });

  return app;
}
