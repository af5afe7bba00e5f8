/**
 * Run log routes: the recent lines of the log channel, the lines not yet
 * fetched by a polling client, and an SSE stream that pushes each new line
 * and every run event as it happens.
 */

import type { FastifyInstance } from 'fastify';
import type { TypedEventEmitter, AppEvents } from '../../shared/events.js';
import type { LogChannel, LogLine } from '../../runner/log-channel.js';
import { getLogger } from '../../shared/logger.js';
import { validateQuery } from '../middleware/validator.js';
import { logsQuerySchema, type LogsQuery } from '../schemas/run.schema.js';

const logger = getLogger('server', { component: 'logs' });

const HEARTBEAT_MS = 15_000;

const FORWARDED_EVENTS = [
  'run:status',
  'run:answer',
  'run:advanced',
  'run:challenge',
  'run:error',
] as const satisfies ReadonlyArray<keyof AppEvents>;

export interface LogRoutesOptions {
  logChannel: LogChannel;
  events: TypedEventEmitter;
}

export function formatSseMessage(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export async function logRoutes(app: FastifyInstance, opts: LogRoutesOptions): Promise<void> {
  const { logChannel, events } = opts;

  // GET / - Most recent log lines, oldest first
  app.get<{ Querystring: LogsQuery }>(
    '/',
    { preHandler: validateQuery(logsQuerySchema) },
    async (request, reply) => {
      return reply.send({ data: logChannel.recent(request.query.limit) });
    },
  );

  // GET /pending - Lines logged since the previous call; each line is served once
  app.get('/pending', async (_request, reply) => {
    return reply.send({ data: logChannel.drain() });
  });

  // GET /stream - SSE endpoint for live lines and run events
  app.get('/stream', async (request, reply) => {
    reply.hijack();
    reply.raw.writeHead(200, {
      ...reply.getHeaders(),
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });

    const send = (event: string, data: unknown): void => {
      if (!reply.raw.writableEnded) {
        reply.raw.write(formatSseMessage(event, data));
      }
    };

    for (const line of logChannel.recent()) {
      send('log', line);
    }

    const unsubscribe = logChannel.subscribe((line: LogLine) => send('log', line));
    const forwarders = FORWARDED_EVENTS.map((name) => {
      const listener = (payload: unknown): void => send(name, payload);
      events.on(name, listener);
      return () => {
        events.off(name, listener);
      };
    });

    const heartbeat = setInterval(() => {
      send('heartbeat', { timestamp: new Date().toISOString() });
    }, HEARTBEAT_MS);

    request.raw.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
      for (const off of forwarders) {
        off();
      }
      logger.debug('SSE client disconnected');
    });
  });
}
