import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import type { AppServices } from '../container';

export default async function catalogRoutes(fastify: FastifyInstance, opts: { services: AppServices }) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { catalog } = opts.services;

  app.get(
    '/units',
    {
      schema: {
        response: {
          200: z.object({ units: z.array(z.string()) }),
        },
      },
    },
    async () => ({ units: Array.from(catalog.current().unitVocabulary()).sort() })
  );

  // Rebuilds from the catalog repository; on failure the previous snapshot stays in service
  app.post(
    '/refresh',
    {
      schema: {
        response: {
          200: z.object({ entries: z.number(), units: z.number(), builtAt: z.string() }),
        },
      },
    },
    async () => {
      const index = await catalog.rebuild();
      return { entries: index.size, units: index.unitVocabulary().size, builtAt: index.builtAt.toISOString() };
    }
  );
}
