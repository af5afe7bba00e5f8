import type { FastifyInstance } from 'fastify';
import { healthRoutes } from './routes/health.routes.js';
import { logRoutes } from './routes/logs.routes.js';
import { profileRoutes } from './routes/profiles.routes.js';
import { runRoutes } from './routes/run.routes.js';
import type { ApiDependencies } from './routes/types.js';

export type { ApiDependencies, RunController } from './routes/types.js';

/**
 * Registers all API route modules under the /api/v1 prefix.
 */
export async function registerRoutes(app: FastifyInstance, deps: ApiDependencies): Promise<void> {
  await app.register(healthRoutes, { prefix: '/api/v1/health', runner: deps.runner });
  await app.register(runRoutes, { prefix: '/api/v1/run', runner: deps.runner });
  await app.register(profileRoutes, { prefix: '/api/v1/profiles', catalog: deps.catalog });
  await app.register(logRoutes, {
    prefix: '/api/v1/logs',
    logChannel: deps.logChannel,
    events: deps.events,
  });
}
