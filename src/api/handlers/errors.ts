import type { FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import {
  AcceleratorMemoryError,
  BackendUnavailableError,
  ContextOverflowError,
  InferenceConnectionError,
  ValidationError,
} from '../../utils/errors.js';

const statusFor = (error: unknown): number => {
  if (error instanceof ValidationError) return 400;
  if (error instanceof ContextOverflowError) return 413;
  if (
    error instanceof BackendUnavailableError ||
    error instanceof InferenceConnectionError ||
    error instanceof AcceleratorMemoryError
  ) {
    return 503;
  }
  return 500;
};

const codeOf = (error: unknown): string =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : 'INTERNAL_ERROR';

export function sendError(reply: FastifyReply, error: unknown, context: string) {
  const status = statusFor(error);
  logger.error({ error, status }, `${context} failed`);

  return reply.code(status).send({
    error: codeOf(error),
    message: error instanceof Error ? error.message : 'Unknown error',
    details: error instanceof Error && 'details' in error ? error.details : undefined,
  });
}
