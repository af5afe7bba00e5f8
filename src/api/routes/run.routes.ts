import type { FastifyInstance } from 'fastify';
import { validateBody } from '../middleware/validator.js';
import {
  configureRunSchema,
  openUrlSchema,
  startRunSchema,
  type ConfigureRunInput,
  type OpenUrlInput,
  type StartRunInput,
} from '../schemas/run.schema.js';
import type { RunController } from './types.js';

export interface RunRoutesOptions {
  runner: RunController;
}

/**
 * Run control routes: the operator's start, pause, stop, open-page and
 * settings buttons.
 */
export async function runRoutes(app: FastifyInstance, opts: RunRoutesOptions): Promise<void> {
  const { runner } = opts;

  // GET / - Current run snapshot
  app.get('/', async (_request, reply) => {
    return reply.send({ data: runner.snapshot() });
  });

  // POST /start - Start, or resume a paused run
  app.post<{ Body: StartRunInput }>(
    '/start',
    { preHandler: validateBody(startRunSchema) },
    async (request, reply) => {
      const snapshot = await runner.start(request.body);
      return reply.status(202).send({ data: snapshot });
    },
  );

  // POST /pause
  app.post('/pause', async (_request, reply) => {
    return reply.send({ data: runner.pause() });
  });

  // POST /stop - Stop the worker and close the browser
  app.post('/stop', async (_request, reply) => {
    const snapshot = await runner.stop();
    return reply.send({ data: snapshot });
  });

  // POST /open - Open a page without starting
  app.post<{ Body: OpenUrlInput }>(
    '/open',
    { preHandler: validateBody(openUrlSchema) },
    async (request, reply) => {
      const snapshot = await runner.openUrl(request.body.url);
      return reply.send({ data: snapshot });
    },
  );

  // PUT /config - Swap delay window and/or profile
  app.put<{ Body: ConfigureRunInput }>(
    '/config',
    { preHandler: validateBody(configureRunSchema) },
    async (request, reply) => {
      return reply.send({ data: runner.configure(request.body) });
    },
  );
}
