import type { BoundaryPicker, ChunkingStrategy } from '../types.js';

export class FixedSizeStrategy implements ChunkingStrategy {
  readonly name = 'fixed' as const;

  prepare(): BoundaryPicker {
    return (window) => window.maxEnd;
  }
}
