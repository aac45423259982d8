import { z } from 'zod';
import { ResponseParseError } from '../../utils/errors.js';
import type { ResponseSchema } from '../../types/extraction.types.js';
import { parseJsonLenient } from './jsonRepair.js';

export interface RawEntity {
  type: string;
  text: string;
  confidence: number;
}

export interface RawRelationship {
  sourceEntityId: string;
  targetEntityId: string;
  type: string;
  confidence: number;
  context?: string;
}

export interface ParsedResponse<T> {
  items: T[];
  repaired: boolean;
  /** Items present in the response that failed validation. */
  skipped: number;
}

const entityEnvelope = z.object({ entities: z.array(z.unknown()) });
const relationshipEnvelope = z.object({ relationships: z.array(z.unknown()) });

const entityItem = z
  .object({
    type: z.string().min(1).optional(),
    entity_type: z.string().min(1).optional(),
    text: z.string().trim().min(1),
    confidence: z.number().min(0).max(1),
  })
  .transform((item, ctx) => {
    const type = item.type ?? item.entity_type;
    if (!type) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'entity type missing' });
      return z.NEVER;
    }
    return { type: type.trim().toUpperCase(), text: item.text, confidence: item.confidence };
  });

const relationshipItem = z
  .object({
    source_entity_id: z.string().min(1),
    target_entity_id: z.string().min(1),
    relationship_type: z.string().min(1),
    confidence: z.number().min(0).max(1),
    context: z.string().optional(),
  })
  .transform(
    (item): RawRelationship => ({
      sourceEntityId: item.source_entity_id,
      targetEntityId: item.target_entity_id,
      type: item.relationship_type.trim().toUpperCase(),
      confidence: item.confidence,
      context: item.context,
    })
  );

/**
 * Parses an entity wave response. A response without an `entities` array is
 * a hard failure; individual malformed entities, and entities whose type is
 * outside `allowedTypes`, are skipped.
 */
export function parseEntityResponse(text: string, allowedTypes: readonly string[]): ParsedResponse<RawEntity> {
  const { value, repaired } = parseJsonLenient(text);
  const envelope = entityEnvelope.safeParse(value);
  if (!envelope.success) {
    throw new ResponseParseError('Response is missing the "entities" array', {
      issues: envelope.error.issues.map((issue) => issue.message),
    });
  }

  const allowed = new Set(allowedTypes);
  const items: RawEntity[] = [];
  for (const candidate of envelope.data.entities) {
    const parsed = entityItem.safeParse(candidate);
    if (parsed.success && allowed.has(parsed.data.type)) {
      items.push(parsed.data);
    }
  }

  return { items, repaired, skipped: envelope.data.entities.length - items.length };
}

export function parseRelationshipResponse(text: string): ParsedResponse<RawRelationship> {
  const { value, repaired } = parseJsonLenient(text);
  const envelope = relationshipEnvelope.safeParse(value);
  if (!envelope.success) {
    throw new ResponseParseError('Response is missing the "relationships" array', {
      issues: envelope.error.issues.map((issue) => issue.message),
    });
  }

  const items: RawRelationship[] = [];
  for (const candidate of envelope.data.relationships) {
    const parsed = relationshipItem.safeParse(candidate);
    if (parsed.success) {
      items.push(parsed.data);
    }
  }

  return { items, repaired, skipped: envelope.data.relationships.length - items.length };
}

export const entityResponseSchema = (types: readonly string[]): ResponseSchema => ({
  name: 'entity_extraction',
  schema: {
    type: 'object',
    properties: {
      entities: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            type: { type: 'string', enum: [...types] },
            text: { type: 'string' },
            confidence: { type: 'number', minimum: 0, maximum: 1 },
          },
          required: ['type', 'text', 'confidence'],
          additionalProperties: false,
        },
      },
    },
    required: ['entities'],
    additionalProperties: false,
  },
});

export const relationshipResponseSchema = (types: readonly string[]): ResponseSchema => ({
  name: 'relationship_extraction',
  schema: {
    type: 'object',
    properties: {
      relationships: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            source_entity_id: { type: 'string' },
            target_entity_id: { type: 'string' },
            relationship_type: { type: 'string', enum: [...types] },
            confidence: { type: 'number', minimum: 0, maximum: 1 },
            context: { type: 'string' },
          },
          required: ['source_entity_id', 'target_entity_id', 'relationship_type', 'confidence', 'context'],
          additionalProperties: false,
        },
      },
    },
    required: ['relationships'],
    additionalProperties: false,
  },
});
