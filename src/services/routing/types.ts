import type { ChunkingStrategyName } from '../../config/index.js';

export const PROCESSING_STRATEGIES = ['single_pass', 'three_wave', 'four_wave', 'three_wave_chunked'] as const;

export type ProcessingStrategy = (typeof PROCESSING_STRATEGIES)[number];

export type SizeCategory = 'very_small' | 'small' | 'medium' | 'large';

/** `empty` and `binary` documents are never sent to extraction. */
export type DocumentContent = 'text' | 'fragment' | 'empty' | 'binary';

export interface ChunkPlan {
  strategy: ChunkingStrategyName;
  chunkSizeTokens: number;
  overlapTokens: number;
  numChunks: number;
}

export interface RoutingDecision {
  strategy: ProcessingStrategy;
  sizeCategory: SizeCategory;
  content: DocumentContent;
  documentChars: number;
  documentTokens: number;
  estimatedTokens: number;
  estimatedDurationSeconds: number;
  estimatedCost: number;
  expectedAccuracy: number;
  extractRelationships: boolean;
  rationale: string;
  /** Present when the document is processed chunk by chunk. */
  chunking: ChunkPlan | null;
}

export interface RouteOptions {
  /** Strategy name that wins over every other rule; unknown names are ignored. */
  strategyOverride?: string;
  extractRelationships?: boolean;
  /** Maximum-recall processing: richest strategy with relationships. */
  deep?: boolean;
}

export const isProcessingStrategy = (value: string): value is ProcessingStrategy =>
  PROCESSING_STRATEGIES.some((strategy) => strategy === value);
