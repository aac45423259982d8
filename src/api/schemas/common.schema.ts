export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    details: {},
  },
  required: ['error', 'message'],
} as const;

export const routeOptionsProperties = {
  strategyOverride: { type: 'string' },
  extractRelationships: { type: 'boolean' },
  deep: { type: 'boolean' },
} as const;
