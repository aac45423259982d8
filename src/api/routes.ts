import type { FastifyInstance } from 'fastify';
import type { Services } from '../bootstrap.js';
import { createHealthHandler } from './handlers/health.handler.js';
import { createRouteHandler, createChunkHandler, type RouteBody, type ChunkBody } from './handlers/routing.handler.js';
import {
  createExtractHandler,
  createEmbeddingsHandler,
  type ExtractBody,
  type EmbeddingsBody,
} from './handlers/extract.handler.js';
import { createEntityHandler } from './handlers/entity.handler.js';
import { errorResponseSchema } from './schemas/common.schema.js';
import { routeRequestSchema, chunkRequestSchema } from './schemas/routing.schema.js';
import { extractRequestSchema, embeddingsRequestSchema, entityParamsSchema } from './schemas/extract.schema.js';

export async function registerRoutes(fastify: FastifyInstance, services: Services) {
  fastify.get('/health', createHealthHandler(services));

  fastify.post<{ Body: RouteBody }>('/route', {
    schema: { body: routeRequestSchema },
    handler: createRouteHandler(services.router),
  });

  fastify.post<{ Body: ChunkBody }>('/chunk', {
    schema: {
      body: chunkRequestSchema,
      response: { 400: errorResponseSchema },
    },
    handler: createChunkHandler(services.chunker),
  });

  fastify.post<{ Body: ExtractBody }>('/extract', {
    schema: {
      body: extractRequestSchema,
      response: { 413: errorResponseSchema, 503: errorResponseSchema },
    },
    handler: createExtractHandler(services.orchestrator, services.store),
  });

  fastify.post<{ Body: EmbeddingsBody }>('/embeddings', {
    schema: {
      body: embeddingsRequestSchema,
      response: { 503: errorResponseSchema },
    },
    handler: createEmbeddingsHandler(services.client),
  });

  fastify.get<{ Params: { id: string } }>('/entities/:id', {
    schema: {
      params: entityParamsSchema,
      response: { 404: errorResponseSchema, 503: errorResponseSchema },
    },
    handler: createEntityHandler(services.store),
  });
}
