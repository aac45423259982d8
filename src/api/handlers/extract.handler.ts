import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { generateDocumentId } from '../../utils/ids.js';
import { PersistenceError } from '../../utils/errors.js';
import type { ExtractionOrchestrator } from '../../services/extraction/ExtractionOrchestrator.js';
import type { ExtractionResult } from '../../services/extraction/types.js';
import type { ExtractionStore } from '../../services/storage/ExtractionStore.interface.js';
import type { RouteOptions } from '../../services/routing/types.js';
import type { InferenceClient } from '../../services/inference/InferenceClient.interface.js';
import { sendError } from './errors.js';

export interface ExtractBody extends RouteOptions {
  documentId?: string;
  text: string;
  metadata?: Record<string, unknown>;
  persist?: boolean;
}

export interface EmbeddingsBody {
  texts: string[];
}

export function createExtractHandler(orchestrator: ExtractionOrchestrator, store: ExtractionStore | null) {
  return async (request: FastifyRequest<{ Body: ExtractBody }>, reply: FastifyReply) => {
    const { documentId = generateDocumentId(), text, metadata, persist = true, ...route } = request.body;

    let result: ExtractionResult;
    try {
      result = await orchestrator.extract({ id: documentId, text, metadata }, { route });
    } catch (error) {
      return sendError(reply, error, 'Extraction');
    }

    if (!persist || !store) {
      return reply.code(200).send({ ...result, stored: null });
    }

    try {
      const stored = await store.storeChunksAndEntities(documentId, result.chunks, result.entities, metadata);
      const relationships = await store.storeRelationships(documentId, result.relationships);
      return reply.code(200).send({ ...result, stored: { ...stored, relationships } });
    } catch (error) {
      logger.error({ documentId, error }, 'Persisting extraction failed');
      const failure =
        error instanceof PersistenceError ? error : new PersistenceError('Failed to persist extraction', error);
      return reply.code(500).send({
        error: failure.code,
        message: failure.message,
        details: { result },
      });
    }
  };
}

export function createEmbeddingsHandler(client: InferenceClient) {
  return async (request: FastifyRequest<{ Body: EmbeddingsBody }>, reply: FastifyReply) => {
    try {
      return reply.code(200).send(await client.embed(request.body.texts));
    } catch (error) {
      return sendError(reply, error, 'Embedding');
    }
  };
}
