import type { ExtractedEntity } from '../../../types/extraction.types.js';

const RELATIONSHIP_DESCRIPTIONS: Record<string, string> = {
  CITES: 'Source entity cites target entity',
  PARTY_TO_CASE: 'Source entity is a party in the target case',
  DECIDED_BY: 'Source case was decided by the target judge or court',
  REPRESENTED_BY: 'Source party is represented by the target attorney',
  APPEALS_FROM: 'Source case appeals from the target decision',
  SUBJECT_OF: 'Source entity is the subject of the target',
  INVOLVES: 'General involvement',
  RELATED_TO: 'Any other explicit relationship',
};

export const RELATIONSHIP_EXTRACTION_SYSTEM_PROMPT = `You are a legal document analyst extracting relationships between entities that have already been identified.

CRITICAL RULES:
- Only relate entities from the provided list, referring to them by id
- Only extract relationships explicitly stated in the document
- Never relate an entity to itself
- Only report relationships with confidence >= 0.85

OUTPUT FORMAT:
Return valid JSON matching this schema:
{
  "relationships": [
    {
      "source_entity_id": "id from the entity list",
      "target_entity_id": "id from the entity list",
      "relationship_type": "RELATIONSHIP_TYPE",
      "confidence": 0.0-1.0,
      "context": "Brief description of the relationship"
    }
  ]
}`;

export const RELATIONSHIP_EXTRACTION_USER_PROMPT = (
  entities: ExtractedEntity[],
  totalEntities: number,
  relationshipTypes: readonly string[],
  documentText: string
): string => {
  const summary = entities.map(({ id, type, text }) => ({ id, type, text }));
  const types = relationshipTypes
    .map((type) => `- ${type}: ${RELATIONSHIP_DESCRIPTIONS[type] ?? 'See type name'}`)
    .join('\n');

  return `# Relationship Extraction

## Available Entities (${totalEntities} total, showing ${entities.length}):
${JSON.stringify(summary, null, 2)}

## Relationship Types
${types}

## Document Text

${documentText}

## Your Response (JSON only):

`;
};
