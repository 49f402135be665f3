import Fastify, { type FastifyInstance } from 'fastify';

import { serverConfig } from '@config';
import { createRouteErrorHandler, ErrorCodes } from '@errors';
import type { HealthCheck } from '@kernel/health-check';
import { getRequestId } from '@kernel/request-context';

import type { PublishingServices } from './container';
import { generateRequestId, inRequestContext, registerRequestIdHeader } from './middleware/requestContext';
import { healthRoutes } from './routes/health';
import { postRoutes } from './routes/posts';
import { publicationRoutes } from './routes/publications';

export interface AppDependencies {
  services: PublishingServices;
  healthChecks?: readonly HealthCheck[];
}

const handleError = createRouteErrorHandler({ logger: 'http' });

/**
 * Build the HTTP app without listening, so tests can drive it with inject()
 */
export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const app = Fastify({
    // Logging goes through @kernel/logger
    logger: false,
    bodyLimit: serverConfig.bodyLimit,
    requestTimeout: 30_000,
    connectionTimeout: 5_000,
    genReqId: generateRequestId,
  });

  registerRequestIdHeader(app);

  // Errors Fastify raises before a handler runs (malformed JSON, body too large)
  app.setErrorHandler((error, req, reply) => inRequestContext(req, async () => handleError(reply, error, `${req.method} ${req.url}`)));

  app.setNotFoundHandler((req, reply) => inRequestContext(req, async () => reply.status(404).send({
    error: `Route ${req.method} ${req.url} not found`,
    code: ErrorCodes.NOT_FOUND,
    requestId: getRequestId(),
  })));

  const { contents, adapter, dispatcher, aggregator, images } = deps.services;

  await healthRoutes(app, deps.healthChecks ?? []);
  await postRoutes(app, { contents, adapter, dispatcher, aggregator, images });
  await publicationRoutes(app, dispatcher);

  return app;
}
