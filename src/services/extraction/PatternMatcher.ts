import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import type { ExtractedEntity } from '../../types/extraction.types.js';
import { toEntity } from './EntityDeduplicator.js';

export interface PatternMatcher {
  match(text: string, chunkId?: string): ExtractedEntity[];
}

const patternSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).optional(),
  confidence: z.number().min(0).max(1),
});

const patternFileSchema = z.object({
  version: z.number().int(),
  patterns: z.array(patternSchema),
});

export type PatternDefinition = z.infer<typeof patternSchema>;

export const DEFAULT_PATTERNS_FILE = fileURLToPath(new URL('../../../data/patterns.json', import.meta.url));

interface CompiledPattern {
  definition: PatternDefinition;
  regex: RegExp;
}

export class RegexPatternMatcher implements PatternMatcher {
  private readonly patterns: CompiledPattern[];

  constructor(definitions: PatternDefinition[]) {
    this.patterns = definitions.map((definition) => {
      try {
        return { definition, regex: new RegExp(definition.pattern, `g${definition.flags ?? ''}`) };
      } catch (error) {
        throw new ConfigurationError(`Invalid pattern ${definition.name}: ${errorMessage(error)}`);
      }
    });
  }

  static fromFile(path: string = DEFAULT_PATTERNS_FILE): RegexPatternMatcher {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read pattern file ${path}`, errorMessage(error));
    }

    const parsed = patternFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid pattern file ${path}`, parsed.error.issues);
    }

    logger.info({ path, patterns: parsed.data.patterns.length }, 'Loaded extraction patterns');
    return new RegexPatternMatcher(parsed.data.patterns);
  }

  get size(): number {
    return this.patterns.length;
  }

  match(text: string, chunkId?: string): ExtractedEntity[] {
    const entities: ExtractedEntity[] = [];
    for (const { definition, regex } of this.patterns) {
      for (const match of text.matchAll(regex)) {
        if (!match[0].trim()) continue;
        entities.push(
          toEntity({ type: definition.type, text: match[0], confidence: definition.confidence }, 'pattern', chunkId)
        );
      }
    }
    return entities;
  }
}
