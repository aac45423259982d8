import type { Chunk, ExtractedEntity, Relationship } from '../../types/extraction.types.js';

export interface StoredEntity {
  id: string;
  type: string;
  text: string;
  /** Highest confidence seen across documents. */
  confidence: number;
  documentIds: string[];
  documentCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface StoredChunk {
  id: string;
  documentId: string;
  index: number;
  content: string;
  startChar: number;
  endChar: number;
  tokenCount: number;
  overlapSize: number;
  strategy: string;
}

export interface StoreResult {
  chunkIds: string[];
  entityIds: string[];
}

/**
 * Content-addressed persistence for extraction output. Writes for one
 * document are atomic: chunks and entities land together or not at all.
 */
export interface ExtractionStore {
  readonly backend: 'sqlite' | 'neo4j';
  storeChunksAndEntities(
    documentId: string,
    chunks: Chunk[],
    entities: ExtractedEntity[],
    metadata?: Record<string, unknown>
  ): Promise<StoreResult>;
  /** Returns the number of relationships written. */
  storeRelationships(documentId: string, relationships: Relationship[]): Promise<number>;
  getEntity(id: string): Promise<StoredEntity | null>;
  getDocumentEntities(documentId: string): Promise<StoredEntity[]>;
  getChunks(documentId: string): Promise<StoredChunk[]>;
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}
