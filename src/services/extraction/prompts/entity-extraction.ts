import type { ExtractedEntity } from '../../../types/extraction.types.js';
import type { WaveDefinition } from '../waves.js';

const TYPE_DESCRIPTIONS: Record<string, string> = {
  PERSON: 'A named individual',
  JUDGE: 'A judge or justice, with title where given',
  ATTORNEY: 'A lawyer appearing for a party',
  PARTY: 'A plaintiff, defendant, appellant, respondent or other named party',
  COURT: 'A named court or tribunal',
  CASE_CITATION: 'A citation to a reported or docketed case',
  STATUTE_CITATION: 'A citation to a statute or code section',
  REGULATION: 'A citation to an administrative regulation',
  LEGAL_DOCTRINE: 'A named doctrine, test or principle of law',
  PROCEDURAL_TERM: 'A motion, ruling, standard of review or other procedural step',
  LEGAL_CONCEPT: 'Any other legal concept central to the text',
};

export const ENTITY_EXTRACTION_SYSTEM_PROMPT = `You are an expert legal analyst extracting entities from legal documents.

CRITICAL RULES:
- Extract only entities explicitly present in the text, using the exact wording
- Use only the entity types listed in the request
- Assign confidence scores (0.0-1.0) based on how clearly the text supports the entity
- Never invent or infer entities that are not in the text

OUTPUT FORMAT:
Return valid JSON matching this schema:
{
  "entities": [
    { "type": "ENTITY_TYPE", "text": "exact text from the document", "confidence": 0.0-1.0 }
  ]
}`;

export interface EntityPromptContext {
  metadata?: Record<string, unknown>;
  /** Entities found by earlier waves on the same text. */
  previousEntities?: ExtractedEntity[];
}

export const ENTITY_EXTRACTION_USER_PROMPT = (
  wave: WaveDefinition,
  documentText: string,
  context: EntityPromptContext = {}
): string => {
  const typeList = wave.entityTypes
    .map((type) => `- ${type}: ${TYPE_DESCRIPTIONS[type] ?? 'See type name'}`)
    .join('\n');

  const contextParts: string[] = [];
  if (context.metadata && Object.keys(context.metadata).length > 0) {
    contextParts.push(`Document Metadata: ${JSON.stringify(context.metadata, null, 2)}`);
  }
  if (context.previousEntities && context.previousEntities.length > 0) {
    const summary = context.previousEntities.map(({ type, text }) => ({ type, text }));
    contextParts.push(
      `Previously Extracted Entities (do not repeat them): ${JSON.stringify(summary, null, 2)}`
    );
  }

  let prompt = `# Entity Extraction: ${wave.label}

Identify ${wave.focus}.

## Entity Types
${typeList}

`;
  if (contextParts.length > 0) {
    prompt += `## Context\n\n${contextParts.join('\n\n')}\n\n`;
  }
  prompt += `## Document Text\n\n${documentText}\n\n## Your Response (JSON only):\n\n`;
  return prompt;
};
