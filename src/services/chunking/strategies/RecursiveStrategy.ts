import type { BoundaryPicker, ChunkingStrategy } from '../types.js';
import { DEFAULT_SEPARATORS, pickBySeparators } from './separators.js';

/**
 * Cuts after the highest-priority separator found in the window, falling
 * through paragraph, line, sentence and word breaks before a hard cut.
 */
export class RecursiveStrategy implements ChunkingStrategy {
  readonly name = 'recursive' as const;

  constructor(private readonly separators: readonly string[] = DEFAULT_SEPARATORS) {}

  prepare(text: string): BoundaryPicker {
    return (window) => pickBySeparators(text, window, this.separators);
  }
}
