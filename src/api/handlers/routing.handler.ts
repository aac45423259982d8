import type { FastifyRequest, FastifyReply } from 'fastify';
import type { DocumentRouter } from '../../services/routing/DocumentRouter.js';
import type { ChunkingEngine } from '../../services/chunking/ChunkingEngine.js';
import type { RouteOptions } from '../../services/routing/types.js';
import type { ChunkingStrategyName } from '../../config/index.js';
import { sendError } from './errors.js';

export interface RouteBody extends RouteOptions {
  text?: string;
  chars?: number;
}

export interface ChunkBody {
  text: string;
  strategy: ChunkingStrategyName;
  maxSize: number;
  overlap: number;
  documentId?: string;
}

export function createRouteHandler(router: DocumentRouter) {
  return async (request: FastifyRequest<{ Body: RouteBody }>, reply: FastifyReply) => {
    const { text, chars, ...options } = request.body;
    const decision = text !== undefined ? router.route(text, options) : router.routeSize(chars ?? 0, options);

    return reply.code(200).send({ decision, warnings: router.validateDecision(decision) });
  };
}

export function createChunkHandler(chunker: ChunkingEngine) {
  return async (request: FastifyRequest<{ Body: ChunkBody }>, reply: FastifyReply) => {
    const { text, strategy, maxSize, overlap, documentId } = request.body;
    try {
      const chunks = chunker.split(text, strategy, maxSize, overlap, { documentId });
      return reply.code(200).send({ count: chunks.length, chunks });
    } catch (error) {
      return sendError(reply, error, 'Chunking');
    }
  };
}
