import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import type { AppServices } from '../container';

export default async function stockRoutes(fastify: FastifyInstance, opts: { services: AppServices }) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { pipeline } = opts.services;

  app.get(
    '/:productId',
    {
      schema: {
        params: z.object({ productId: z.string().min(1) }),
        response: {
          200: z.object({
            productId: z.string(),
            unit: z.string(),
            availableQuantity: z.number(),
            reservedQuantity: z.number(),
            lotCount: z.number(),
          }),
        },
      },
    },
    async (request) => pipeline.getStockPosition(request.params.productId)
  );
}
