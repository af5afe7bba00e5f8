import type { FastifyInstance } from 'fastify';
import type { RunController } from './types.js';

const startedAt = Date.now();

export interface HealthRoutesOptions {
  runner: RunController;
}

/**
 * Health check route. Reports process uptime and the run status.
 */
export async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  app.get('/', async (_request, reply) => {
    const uptimeMs = Date.now() - startedAt;
    const run = opts.runner.snapshot();

    return reply.send({
      status: 'ok',
      uptime: uptimeMs,
      uptimeHuman: formatUptime(uptimeMs),
      run: run.status,
      timestamp: new Date().toISOString(),
    });
  });
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
