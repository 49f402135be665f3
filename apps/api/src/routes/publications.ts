import type { FastifyInstance } from 'fastify';

import type { DispatchCoordinator } from '@domain/publishing/application/DispatchCoordinator';
import { createRouteErrorHandler } from '@errors';

import { inRequestContext } from '../middleware/requestContext';
import { serializeDispatchAck } from './serializers';
import { IdParamsSchema, parseRequest } from './validation';

const handleError = createRouteErrorHandler({ logger: 'routes:publications' });

export async function publicationRoutes(app: FastifyInstance, dispatcher: DispatchCoordinator): Promise<void> {
  // POST /api/publications/:id/retry - Re-dispatch one failed publication
  app.post('/api/publications/:id/retry', async (req, reply) => inRequestContext(req, async () => {
    try {
      const { id } = parseRequest(IdParamsSchema, req.params);
      const ack = await dispatcher.retry(id);
      return reply.send({
        success: true,
        message: 'Publication re-enqueued for processing',
        data: serializeDispatchAck(ack),
      });
    } catch (error) {
      return handleError(reply, error, 'retry publication');
    }
  }));
}
