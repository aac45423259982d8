import type { ChunkingStrategyName } from '../../config/index.js';

export type { ChunkingStrategyName };

export interface BoundaryWindow {
  /** Offset where the current chunk starts. */
  start: number;
  /** Smallest end that still moves past the overlap. */
  minEnd: number;
  /** `start + maxSize`, never past the text. */
  maxEnd: number;
}

/** Picks the end offset of the next chunk inside `[minEnd, maxEnd]`. */
export type BoundaryPicker = (window: BoundaryWindow) => number;

export interface ChunkingStrategy {
  readonly name: ChunkingStrategyName;
  prepare(text: string): BoundaryPicker;
}

export interface SplitOptions {
  documentId?: string;
}
