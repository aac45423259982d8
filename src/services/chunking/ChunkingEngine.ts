import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import type { Chunk } from '../../types/extraction.types.js';
import type { TokenEstimator } from '../tokens/TokenEstimator.js';
import type { ChunkingStrategy, ChunkingStrategyName, SplitOptions } from './types.js';
import { FixedSizeStrategy } from './strategies/FixedSizeStrategy.js';
import { RecursiveStrategy } from './strategies/RecursiveStrategy.js';
import { StructureAwareStrategy } from './strategies/StructureAwareStrategy.js';
import { SemanticStrategy } from './strategies/SemanticStrategy.js';

export const chunkId = (documentId: string, index: number): string => `${documentId}_chunk_${index}`;

/**
 * Inverse of `split`: drops each chunk's overlap prefix and concatenates.
 */
export const reassemble = (chunks: Chunk[]): string =>
  chunks.map((chunk) => chunk.content.slice(chunk.overlapSize)).join('');

export class ChunkingEngine {
  private strategies: Map<ChunkingStrategyName, ChunkingStrategy>;

  constructor(private readonly estimator: TokenEstimator, strategies?: ChunkingStrategy[]) {
    const all = strategies ?? [
      new FixedSizeStrategy(),
      new RecursiveStrategy(),
      new StructureAwareStrategy(),
      new SemanticStrategy(),
    ];
    this.strategies = new Map(
      all.map((strategy): [ChunkingStrategyName, ChunkingStrategy] => [strategy.name, strategy])
    );
  }

  /**
   * Splits `text` into chunks of at most `maxSize` characters where each chunk
   * after the first repeats exactly the last `overlap` characters of its
   * predecessor.
   */
  split(
    text: string,
    strategyName: ChunkingStrategyName,
    maxSize: number,
    overlap: number,
    options: SplitOptions = {}
  ): Chunk[] {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new ValidationError('maxSize must be a positive integer', { maxSize });
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
      throw new ValidationError('overlap must be a non-negative integer smaller than maxSize', {
        maxSize,
        overlap,
      });
    }

    const strategy = this.strategies.get(strategyName);
    if (!strategy) {
      throw new ValidationError(`Unknown chunking strategy: ${strategyName}`, {
        available: [...this.strategies.keys()],
      });
    }

    const documentId = options.documentId ?? 'document';
    if (text.length === 0) return [];

    const pick = strategy.prepare(text);
    const chunks: Chunk[] = [];
    let start = 0;

    for (;;) {
      const maxEnd = Math.min(start + maxSize, text.length);
      let end = maxEnd;

      if (maxEnd < text.length) {
        const minEnd = start + overlap + 1;
        const picked = pick({ start, minEnd, maxEnd });
        end = Number.isInteger(picked) && picked >= minEnd && picked <= maxEnd ? picked : maxEnd;
      }

      const content = text.slice(start, end);
      const index = chunks.length;
      chunks.push({
        id: chunkId(documentId, index),
        documentId,
        index,
        content,
        startChar: start,
        endChar: end,
        tokenCount: this.estimator.estimate(content),
        overlapSize: index === 0 ? 0 : overlap,
        strategy: strategyName,
      });

      if (end >= text.length) break;
      start = end - overlap;
    }

    logger.debug(
      {
        documentId,
        strategy: strategyName,
        chunkCount: chunks.length,
        maxSize,
        overlap,
      },
      'Document split into chunks'
    );

    return chunks;
  }

  strategyNames(): ChunkingStrategyName[] {
    return [...this.strategies.keys()];
  }
}
