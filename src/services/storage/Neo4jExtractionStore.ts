import neo4j, { type Driver, type Session } from 'neo4j-driver';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { PersistenceError } from '../../utils/errors.js';
import type { Chunk, ExtractedEntity, Relationship } from '../../types/extraction.types.js';
import type { ExtractionStore, StoreResult, StoredChunk, StoredEntity } from './ExtractionStore.interface.js';
import {
  CONSTRAINTS,
  GET_CHUNKS,
  GET_DOCUMENT_ENTITIES,
  GET_ENTITY,
  MERGE_CHUNKS,
  MERGE_DOCUMENT,
  MERGE_ENTITIES,
  MERGE_RELATIONSHIPS,
} from './neo4j-queries.js';

export interface Neo4jCredentials {
  uri: string;
  user: string;
  password: string;
}

const entityRecord = z.object({
  id: z.string(),
  type: z.string(),
  text: z.string(),
  confidence: z.number(),
  documentIds: z.array(z.string()),
  documentCount: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const chunkRecord = z.object({
  id: z.string(),
  documentId: z.string(),
  index: z.number(),
  content: z.string(),
  startChar: z.number(),
  endChar: z.number(),
  tokenCount: z.number(),
  overlapSize: z.number(),
  strategy: z.string(),
});

export class Neo4jExtractionStore implements ExtractionStore {
  readonly backend = 'neo4j' as const;
  private driver: Driver | null = null;

  constructor(private readonly credentials: Neo4jCredentials) {}

  async connect(): Promise<void> {
    try {
      this.driver = neo4j.driver(
        this.credentials.uri,
        neo4j.auth.basic(this.credentials.user, this.credentials.password),
        {
          maxConnectionPoolSize: 50,
          connectionAcquisitionTimeout: 30 * 1000,
          disableLosslessIntegers: true,
        }
      );
      await this.driver.verifyConnectivity();

      const session = this.driver.session();
      try {
        for (const statement of CONSTRAINTS) {
          await session.run(statement);
        }
      } finally {
        await session.close();
      }
      logger.info({ uri: this.credentials.uri }, 'Connected to Neo4j extraction store');
    } catch (error) {
      logger.error({ error }, 'Failed to connect to Neo4j');
      throw new PersistenceError('Neo4j connection failed', error);
    }
  }

  private getSession(): Session {
    if (!this.driver) {
      throw new PersistenceError('Neo4j driver not initialized');
    }
    return this.driver.session();
  }

  async storeChunksAndEntities(
    documentId: string,
    chunks: Chunk[],
    entities: ExtractedEntity[],
    metadata: Record<string, unknown> = {}
  ): Promise<StoreResult> {
    const session = this.getSession();
    const now = new Date().toISOString();
    try {
      await session.executeWrite(async (tx) => {
        await tx.run(MERGE_DOCUMENT, {
          documentId,
          metadata: JSON.stringify(metadata),
          chunkCount: chunks.length,
          entityCount: entities.length,
          now,
        });
        await tx.run(MERGE_CHUNKS, { documentId, chunks: chunks.map((chunk) => ({ ...chunk })) });
        await tx.run(MERGE_ENTITIES, {
          documentId,
          now,
          entities: entities.map(({ id, type, text, confidence, chunkIds }) => ({ id, type, text, confidence, chunkIds })),
        });
      });
      logger.info({ documentId, chunks: chunks.length, entities: entities.length }, 'Stored chunks and entities');
      return { chunkIds: chunks.map((chunk) => chunk.id), entityIds: entities.map((entity) => entity.id) };
    } catch (error) {
      logger.error({ documentId, error }, 'Failed to store chunks and entities');
      throw new PersistenceError(`Failed to store extraction for document ${documentId}`, error);
    } finally {
      await session.close();
    }
  }

  async storeRelationships(documentId: string, relationships: Relationship[]): Promise<number> {
    if (relationships.length === 0) return 0;
    const session = this.getSession();
    try {
      const result = await session.executeWrite((tx) =>
        tx.run(MERGE_RELATIONSHIPS, {
          documentId,
          relationships: relationships.map((relationship) => ({
            ...relationship,
            context: relationship.context ?? null,
          })),
        })
      );
      return z.number().parse(result.records[0]?.get('written') ?? 0);
    } catch (error) {
      logger.error({ documentId, error }, 'Failed to store relationships');
      throw new PersistenceError(`Failed to store relationships for document ${documentId}`, error);
    } finally {
      await session.close();
    }
  }

  async getEntity(id: string): Promise<StoredEntity | null> {
    const records = await this.read(GET_ENTITY, { id });
    return records.length > 0 ? entityRecord.parse(records[0]) : null;
  }

  async getDocumentEntities(documentId: string): Promise<StoredEntity[]> {
    const records = await this.read(GET_DOCUMENT_ENTITIES, { documentId });
    return records.map((record) => entityRecord.parse(record));
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    const records = await this.read(GET_CHUNKS, { documentId });
    return records.map((record) => chunkRecord.parse(record));
  }

  private async read(query: string, params: Record<string, unknown>): Promise<Record<string, unknown>[]> {
    const session = this.getSession();
    try {
      const result = await session.executeRead((tx) => tx.run(query, params));
      return result.records.map((record) => record.toObject());
    } catch (error) {
      throw new PersistenceError('Neo4j read failed', error);
    } finally {
      await session.close();
    }
  }

  async testConnection(): Promise<boolean> {
    if (!this.driver) return false;
    try {
      await this.driver.verifyConnectivity();
      return true;
    } catch (error) {
      logger.warn({ error }, 'Neo4j connection check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
      logger.info('Disconnected from Neo4j');
    }
  }
}
