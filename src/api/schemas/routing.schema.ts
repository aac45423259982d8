import { routeOptionsProperties } from './common.schema.js';

export const routeRequestSchema = {
  type: 'object',
  properties: {
    text: { type: 'string' },
    chars: { type: 'integer' },
    ...routeOptionsProperties,
  },
  anyOf: [{ required: ['text'] }, { required: ['chars'] }],
  additionalProperties: false,
} as const;

export const chunkRequestSchema = {
  type: 'object',
  properties: {
    text: { type: 'string' },
    strategy: { type: 'string', enum: ['fixed', 'recursive', 'structure', 'semantic'] },
    maxSize: { type: 'integer', minimum: 1 },
    overlap: { type: 'integer', minimum: 0 },
    documentId: { type: 'string', minLength: 1 },
  },
  required: ['text', 'strategy', 'maxSize', 'overlap'],
  additionalProperties: false,
} as const;
