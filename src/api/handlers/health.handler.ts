import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Services } from '../../bootstrap.js';

export function createHealthHandler({ config, client, store }: Services) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const storageOk = store ? await store.testConnection() : true;

    return reply.code(200).send({
      status: storageOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      services: {
        inference: client.transport,
        storage: store ? { backend: store.backend, ok: storageOk } : null,
      },
      inference: client.getStats(),
    });
  };
}
