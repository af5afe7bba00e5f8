import type { FastifyInstance } from 'fastify';
import type { ProfileCatalog } from '../../profile/profile-catalog.js';

export interface ProfileRoutesOptions {
  catalog: ProfileCatalog;
}

/**
 * Response profile routes (read-only; profiles come from the profile file).
 */
export async function profileRoutes(app: FastifyInstance, opts: ProfileRoutesOptions): Promise<void> {
  // GET / - Profile summaries
  app.get('/', async (_request, reply) => {
    const data = opts.catalog.list().map((profile) => ({
      name: profile.name,
      description: profile.description,
      shortAnswers: profile.shortAnswers.length,
      longAnswers: profile.longAnswers.length,
    }));
    return reply.send({ data });
  });

  // GET /:name - One profile with its answer pools
  app.get<{ Params: { name: string } }>('/:name', async (request, reply) => {
    return reply.send({ data: opts.catalog.get(request.params.name) });
  });
}
