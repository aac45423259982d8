import type { BackendName, ChunkingStrategyName } from '../config/index.js';

export interface Document {
  id: string;
  text: string;
  metadata?: Record<string, unknown>;
}

export interface Chunk {
  /** `{documentId}_chunk_{index}` */
  id: string;
  documentId: string;
  index: number;
  content: string;
  startChar: number;
  endChar: number;
  tokenCount: number;
  /** Characters shared with the previous chunk; 0 for the first one. */
  overlapSize: number;
  strategy: ChunkingStrategyName;
}

export type WaveName = 'single_pass' | 'actors' | 'citations' | 'concepts' | 'relationships' | 'pattern';

export interface ExtractedEntity {
  /** Content-derived identifier, see `entityId`. */
  id: string;
  type: string;
  text: string;
  confidence: number;
  wave: WaveName;
  chunkIds: string[];
}

export interface Relationship {
  sourceEntityId: string;
  targetEntityId: string;
  type: string;
  confidence: number;
  context?: string;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ResponseSchema {
  name: string;
  schema: Record<string, unknown>;
}

export interface InferenceRequest {
  messages: ChatMessage[];
  backend?: BackendName;
  temperature?: number;
  maxTokens?: number;
  seed?: number;
  responseSchema?: ResponseSchema;
  /** Set to false to keep caller temperature and seed. */
  reproducible?: boolean;
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface InferenceResponse {
  text: string;
  usage: TokenUsage;
  latencyMs: number;
  backend: BackendName;
  model: string;
  transport: TransportKind;
  finishReason?: string;
}

export interface EmbeddingResponse {
  embeddings: number[][];
  model: string;
  usage: TokenUsage;
}

export type TransportKind = 'http' | 'direct';
