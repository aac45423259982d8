import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ExtractionStore } from '../../services/storage/ExtractionStore.interface.js';
import { sendError } from './errors.js';

interface EntityParams {
  id: string;
}

export function createEntityHandler(store: ExtractionStore | null) {
  return async (request: FastifyRequest<{ Params: EntityParams }>, reply: FastifyReply) => {
    if (!store) {
      return reply.code(503).send({ error: 'STORAGE_DISABLED', message: 'No extraction store is configured' });
    }

    try {
      const entity = await store.getEntity(request.params.id);
      if (!entity) {
        return reply.code(404).send({ error: 'NOT_FOUND', message: `Entity ${request.params.id} not found` });
      }
      return reply.code(200).send(entity);
    } catch (error) {
      return sendError(reply, error, 'Entity lookup');
    }
  };
}
