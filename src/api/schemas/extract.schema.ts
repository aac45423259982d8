import { routeOptionsProperties } from './common.schema.js';

export const extractRequestSchema = {
  type: 'object',
  properties: {
    documentId: { type: 'string', minLength: 1 },
    text: { type: 'string', minLength: 1 },
    metadata: { type: 'object' },
    persist: { type: 'boolean' },
    ...routeOptionsProperties,
  },
  required: ['text'],
  additionalProperties: false,
} as const;

export const embeddingsRequestSchema = {
  type: 'object',
  properties: {
    texts: { type: 'array', items: { type: 'string' }, minItems: 1, maxItems: 256 },
  },
  required: ['texts'],
  additionalProperties: false,
} as const;

export const entityParamsSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', pattern: '^[0-9a-f]{16}$' },
  },
  required: ['id'],
} as const;
