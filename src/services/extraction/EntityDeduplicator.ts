import type { ExtractedEntity, Relationship, WaveName } from '../../types/extraction.types.js';
import { entityId, entityKey } from './entityIdentity.js';
import type { RawEntity, RawRelationship } from './ResponseParser.js';

const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const sortedUnique = (values: string[]): string[] => [...new Set(values)].sort(compareStrings);

/** The mention that survives a merge; ties break on text, then wave, so order never matters. */
const preferEntity = (a: ExtractedEntity, b: ExtractedEntity): ExtractedEntity => {
  if (a.confidence !== b.confidence) return a.confidence > b.confidence ? a : b;
  const byText = compareStrings(a.text, b.text);
  if (byText !== 0) return byText < 0 ? a : b;
  return compareStrings(a.wave, b.wave) <= 0 ? a : b;
};

export const toEntity = (raw: RawEntity, wave: WaveName, chunkId?: string): ExtractedEntity => ({
  id: entityId(raw.type, raw.text),
  type: raw.type.trim().toUpperCase(),
  text: raw.text.trim(),
  confidence: raw.confidence,
  wave,
  chunkIds: chunkId ? [chunkId] : [],
});

/**
 * Merges mentions with the same type and case/whitespace-normalized text.
 * Keeps the highest-confidence mention and the union of chunk ids. The
 * merge is commutative and idempotent; output is ordered by identity key.
 */
export function deduplicateEntities(entities: ExtractedEntity[]): ExtractedEntity[] {
  const merged = new Map<string, ExtractedEntity>();

  for (const entity of entities) {
    const key = entityKey(entity.type, entity.text);
    const existing = merged.get(key);
    const type = entity.type.trim().toUpperCase();

    if (!existing) {
      merged.set(key, { ...entity, type, id: entityId(type, entity.text), chunkIds: sortedUnique(entity.chunkIds) });
      continue;
    }

    const winner = preferEntity(existing, { ...entity, type });
    merged.set(key, {
      ...winner,
      id: existing.id,
      type: existing.type,
      chunkIds: sortedUnique([...existing.chunkIds, ...entity.chunkIds]),
    });
  }

  return [...merged.entries()].sort(([a], [b]) => compareStrings(a, b)).map(([, entity]) => entity);
}

export interface RelationshipValidation {
  valid: Relationship[];
  rejected: number;
}

/**
 * Keeps relationships whose endpoints are known entities, that do not point
 * at themselves and that reach `minConfidence`.
 */
export function validateRelationships(
  relationships: RawRelationship[],
  knownEntityIds: ReadonlySet<string>,
  minConfidence: number
): RelationshipValidation {
  const valid = relationships.filter(
    (relationship) =>
      knownEntityIds.has(relationship.sourceEntityId) &&
      knownEntityIds.has(relationship.targetEntityId) &&
      relationship.sourceEntityId !== relationship.targetEntityId &&
      relationship.confidence >= minConfidence
  );
  return { valid, rejected: relationships.length - valid.length };
}

const relationshipKey = (relationship: Relationship): string =>
  `${relationship.sourceEntityId}|${relationship.type}|${relationship.targetEntityId}`;

const preferRelationship = (a: Relationship, b: Relationship): Relationship => {
  if (a.confidence !== b.confidence) return a.confidence > b.confidence ? a : b;
  return compareStrings(a.context ?? '', b.context ?? '') <= 0 ? a : b;
};

export function deduplicateRelationships(relationships: Relationship[]): Relationship[] {
  const merged = new Map<string, Relationship>();
  for (const relationship of relationships) {
    const key = relationshipKey(relationship);
    const existing = merged.get(key);
    merged.set(key, existing ? preferRelationship(existing, relationship) : relationship);
  }
  return [...merged.entries()].sort(([a], [b]) => compareStrings(a, b)).map(([, relationship]) => relationship);
}
