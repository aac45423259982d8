import Fastify, { type FastifyInstance } from 'fastify';
import { loggerOptions, logger } from '../utils/logger.js';
import type { Services } from '../bootstrap.js';
import { registerRoutes } from './routes.js';

export async function buildApp(services: Services): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerOptions(services.config.server),
    bodyLimit: 20 * 1024 * 1024,
  });

  await registerRoutes(fastify, services);

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ error: 'VALIDATION_ERROR', message: error.message });
    }
    const status = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    logger.error({ error, url: request.url }, 'Request error');
    return reply.code(status).send({
      error: status === 500 ? 'INTERNAL_ERROR' : error.code,
      message: error.message,
    });
  });

  return fastify;
}
