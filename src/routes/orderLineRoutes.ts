import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { OrderLineController } from '../controllers/orderLineController';
import {
  ConfirmMatchRequest,
  OrderLineParams,
  ResolveInvoiceLineRequest,
  ResolveLineRequest,
} from '../dtos/orderLineDtos';
import type { AppServices } from '../container';

export default async function orderLineRoutes(fastify: FastifyInstance, opts: { services: AppServices }) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const controller = new OrderLineController(opts.services.pipeline);

  app.post('/resolve', { schema: { body: ResolveLineRequest } }, async (request) => controller.resolve(request.body));

  app.post('/resolve-invoice-line', { schema: { body: ResolveInvoiceLineRequest } }, async (request) =>
    controller.resolveInvoiceLine(request.body)
  );

  app.post('/confirm', { schema: { body: ConfirmMatchRequest } }, async (request, reply) => {
    const line = await controller.confirm(request.body);
    return reply.status(201).send(line);
  });

  app.post('/:lineId/commit', { schema: { params: OrderLineParams } }, async (request) =>
    controller.commit(request.params.lineId)
  );

  app.post('/:lineId/cancel', { schema: { params: OrderLineParams } }, async (request) =>
    controller.cancel(request.params.lineId)
  );
}
