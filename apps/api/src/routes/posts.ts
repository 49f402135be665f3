import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { ContentAdapter } from '@domain/publishing/application/ContentAdapter';
import { ListContentItemsSchema, type ContentService } from '@domain/publishing/application/ContentService';
import type { DispatchCoordinator } from '@domain/publishing/application/DispatchCoordinator';
import type { ImageService } from '@domain/publishing/application/ImageService';
import type { StatusAggregator } from '@domain/publishing/application/StatusAggregator';
import { DEFAULT_ADAPT_NETWORKS } from '@domain/publishing/domain/networks';
import { createRouteErrorHandler } from '@errors';
import { getLogger } from '@kernel/logger';

import { inRequestContext } from '../middleware/requestContext';
import {
  serializeAdaptOutcome,
  serializeContentItem,
  serializeImageOutcome,
  serializePublication,
  serializePublishSummary,
  serializeStatus,
} from './serializers';
import { IdParamsSchema, parseRequest } from './validation';

const logger = getLogger('routes:posts');
const handleError = createRouteErrorHandler({ logger });

const CreatePostBodySchema = z.object({
  title: z.string({ required_error: 'Title is required' }),
  content: z.string({ required_error: 'Content is required' }),
});

const ListPostsQuerySchema = ListContentItemsSchema
  .omit({ offset: true })
  .extend({ skip: ListContentItemsSchema.shape.offset });

const AdaptBodySchema = z.object({
  networks: z.array(z.string()).optional(),
  preview_only: z.boolean().optional(),
}).optional();

const PublishBodySchema = z.object({
  image_url: z.string().url().optional(),
}).optional();

const GenerateImageBodySchema = z.object({
  network: z.string({ required_error: 'Network is required' }),
  adapted_text: z.string().optional(),
});

export interface PostRouteDeps {
  contents: ContentService;
  adapter: ContentAdapter;
  dispatcher: DispatchCoordinator;
  aggregator: StatusAggregator;
  images: ImageService;
}

/**
 * Content item routes: CRUD, adaptation, image generation, publish fan-out
 * and status polling
 */
export async function postRoutes(app: FastifyInstance, deps: PostRouteDeps): Promise<void> {
  const { contents, adapter, dispatcher, aggregator, images } = deps;

  // POST /api/posts - Create a draft content item
  app.post('/api/posts', async (req, reply) => inRequestContext(req, async () => {
    try {
      const body = parseRequest(CreatePostBodySchema, req.body);
      const item = await contents.create({ title: body.title, body: body.content });
      return reply.status(201).send({
        success: true,
        message: 'Content item created',
        data: serializeContentItem(item, 0),
      });
    } catch (error) {
      return handleError(reply, error, 'create content item');
    }
  }));

  // GET /api/posts - List content items, newest first
  app.get('/api/posts', async (req, reply) => inRequestContext(req, async () => {
    try {
      const { skip, limit, status } = parseRequest(ListPostsQuerySchema, req.query);
      const items = await contents.list({ offset: skip, limit, status });
      return reply.send({
        success: true,
        count: items.length,
        data: items.map(item => serializeContentItem(item)),
      });
    } catch (error) {
      return handleError(reply, error, 'list content items');
    }
  }));

  // GET /api/posts/:id - One content item with its publications
  app.get('/api/posts/:id', async (req, reply) => inRequestContext(req, async () => {
    try {
      const { id } = parseRequest(IdParamsSchema, req.params);
      const { item, attempts } = await contents.get(id);
      return reply.send({
        success: true,
        data: {
          ...serializeContentItem(item, attempts.length),
          publications: attempts.map(serializePublication),
        },
      });
    } catch (error) {
      return handleError(reply, error, 'get content item');
    }
  }));

  // DELETE /api/posts/:id - Delete a content item and its publications
  app.delete('/api/posts/:id', async (req, reply) => inRequestContext(req, async () => {
    try {
      const { id } = parseRequest(IdParamsSchema, req.params);
      await contents.delete(id);
      return reply.status(204).send();
    } catch (error) {
      return handleError(reply, error, 'delete content item');
    }
  }));

  // POST /api/posts/:id/adapt - Generate per-network variants
  app.post('/api/posts/:id/adapt', async (req, reply) => inRequestContext(req, async () => {
    try {
      const { id } = parseRequest(IdParamsSchema, req.params);
      const body = parseRequest(AdaptBodySchema, req.body);
      const outcome = await adapter.adapt(id, {
        networks: body?.networks ?? [...DEFAULT_ADAPT_NETWORKS],
        previewOnly: body?.preview_only ?? false,
      });
      return reply.send({
        success: true,
        message: outcome.previewOnly ? 'Preview generated' : 'Content adapted',
        data: serializeAdaptOutcome(outcome),
      });
    } catch (error) {
      return handleError(reply, error, 'adapt content item');
    }
  }));

  // POST /api/posts/:id/generate-image - Illustrate one network's adapted text
  app.post('/api/posts/:id/generate-image', async (req, reply) => inRequestContext(req, async () => {
    try {
      const { id } = parseRequest(IdParamsSchema, req.params);
      const body = parseRequest(GenerateImageBodySchema, req.body);
      const outcome = await images.generate(id, { network: body.network, adaptedText: body.adapted_text });
      return reply.send({
        success: true,
        message: 'Image generated',
        data: serializeImageOutcome(outcome),
      });
    } catch (error) {
      return handleError(reply, error, 'generate image');
    }
  }));

  // POST /api/posts/:id/publish - Enqueue every pending publication
  app.post('/api/posts/:id/publish', async (req, reply) => inRequestContext(req, async () => {
    try {
      const { id } = parseRequest(IdParamsSchema, req.params);
      const body = parseRequest(PublishBodySchema, req.body);
      const summary = await dispatcher.publish(id, body?.image_url);
      return reply.send({
        success: true,
        message: summary.totalPublications > 0
          ? 'Publications enqueued for processing'
          : 'No pending publications to enqueue',
        data: serializePublishSummary(summary),
      });
    } catch (error) {
      return handleError(reply, error, 'publish content item');
    }
  }));

  // GET /api/posts/:id/status - Point-in-time publication summary
  app.get('/api/posts/:id/status', async (req, reply) => inRequestContext(req, async () => {
    try {
      const { id } = parseRequest(IdParamsSchema, req.params);
      const summary = await aggregator.status(id);
      return reply.send({ success: true, data: serializeStatus(summary) });
    } catch (error) {
      return handleError(reply, error, 'get publication status');
    }
  }));
}
