import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { PersistenceError } from '../../utils/errors.js';
import type { Chunk, ExtractedEntity, Relationship } from '../../types/extraction.types.js';
import type { ExtractionStore, StoreResult, StoredChunk, StoredEntity } from './ExtractionStore.interface.js';

interface EntityRow {
  id: string;
  type: string;
  text: string;
  confidence: number;
  document_ids: string;
  document_count: number;
  created_at: string;
  updated_at: string;
}

interface ChunkRow {
  id: string;
  document_id: string;
  chunk_index: number;
  content: string;
  start_char: number;
  end_char: number;
  token_count: number;
  overlap_size: number;
  strategy: string;
}

const documentIdsSchema = z.array(z.string());

const toStoredEntity = (row: EntityRow): StoredEntity => ({
  id: row.id,
  type: row.type,
  text: row.text,
  confidence: row.confidence,
  documentIds: documentIdsSchema.parse(JSON.parse(row.document_ids)),
  documentCount: row.document_count,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const toStoredChunk = (row: ChunkRow): StoredChunk => ({
  id: row.id,
  documentId: row.document_id,
  index: row.chunk_index,
  content: row.content,
  startChar: row.start_char,
  endChar: row.end_char,
  tokenCount: row.token_count,
  overlapSize: row.overlap_size,
  strategy: row.strategy,
});

export class SQLiteExtractionStore implements ExtractionStore {
  readonly backend = 'sqlite' as const;
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initSchema();
    logger.info({ dbPath }, 'SQLite extraction store initialized');
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        metadata TEXT NOT NULL DEFAULT '{}',
        chunk_count INTEGER NOT NULL DEFAULT 0,
        entity_count INTEGER NOT NULL DEFAULT 0,
        stored_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chunks (
        id TEXT PRIMARY KEY,
        document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        start_char INTEGER NOT NULL,
        end_char INTEGER NOT NULL,
        token_count INTEGER NOT NULL,
        overlap_size INTEGER NOT NULL,
        strategy TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS entities (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        text TEXT NOT NULL,
        confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
        document_ids TEXT NOT NULL DEFAULT '[]',
        document_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS relationships (
        source_entity_id TEXT NOT NULL REFERENCES entities(id),
        target_entity_id TEXT NOT NULL REFERENCES entities(id),
        type TEXT NOT NULL,
        confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
        context TEXT,
        document_id TEXT NOT NULL,
        PRIMARY KEY (source_entity_id, type, target_entity_id)
      );
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_chunks_document_id ON chunks(document_id)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_entities_type ON entities(type)`);
  }

  async storeChunksAndEntities(
    documentId: string,
    chunks: Chunk[],
    entities: ExtractedEntity[],
    metadata: Record<string, unknown> = {}
  ): Promise<StoreResult> {
    const now = new Date().toISOString();

    const upsertDocument = this.db.prepare(`
      INSERT INTO documents (id, metadata, chunk_count, entity_count, stored_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        metadata = excluded.metadata,
        chunk_count = excluded.chunk_count,
        entity_count = excluded.entity_count,
        stored_at = excluded.stored_at
    `);
    const deleteChunks = this.db.prepare(`DELETE FROM chunks WHERE document_id = ?`);
    const insertChunk = this.db.prepare(`
      INSERT INTO chunks (id, document_id, chunk_index, content, start_char, end_char, token_count, overlap_size, strategy)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const selectMembership = this.db.prepare<[string], Pick<EntityRow, 'document_ids'>>(
      `SELECT document_ids FROM entities WHERE id = ?`
    );
    const insertEntity = this.db.prepare(`
      INSERT INTO entities (id, type, text, confidence, document_ids, document_count, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, 1, ?, ?)
    `);
    const appendMembership = this.db.prepare(`
      UPDATE entities
      SET document_ids = ?, document_count = document_count + 1, confidence = MAX(confidence, ?), updated_at = ?
      WHERE id = ?
    `);
    const refreshEntity = this.db.prepare(`
      UPDATE entities SET confidence = MAX(confidence, ?), updated_at = ? WHERE id = ?
    `);

    const write = this.db.transaction(() => {
      upsertDocument.run(documentId, JSON.stringify(metadata), chunks.length, entities.length, now);
      deleteChunks.run(documentId);
      for (const chunk of chunks) {
        insertChunk.run(
          chunk.id,
          documentId,
          chunk.index,
          chunk.content,
          chunk.startChar,
          chunk.endChar,
          chunk.tokenCount,
          chunk.overlapSize,
          chunk.strategy
        );
      }

      for (const entity of entities) {
        const existing = selectMembership.get(entity.id);
        if (!existing) {
          insertEntity.run(entity.id, entity.type, entity.text, entity.confidence, JSON.stringify([documentId]), now, now);
          continue;
        }
        const members = documentIdsSchema.parse(JSON.parse(existing.document_ids));
        if (members.includes(documentId)) {
          refreshEntity.run(entity.confidence, now, entity.id);
        } else {
          appendMembership.run(JSON.stringify([...members, documentId]), entity.confidence, now, entity.id);
        }
      }
    });

    try {
      write();
    } catch (error) {
      logger.error({ documentId, error }, 'Failed to store chunks and entities');
      throw new PersistenceError(`Failed to store extraction for document ${documentId}`, error);
    }

    logger.info({ documentId, chunks: chunks.length, entities: entities.length }, 'Stored chunks and entities');
    return { chunkIds: chunks.map((chunk) => chunk.id), entityIds: entities.map((entity) => entity.id) };
  }

  async storeRelationships(documentId: string, relationships: Relationship[]): Promise<number> {
    const upsert = this.db.prepare(`
      INSERT INTO relationships (source_entity_id, target_entity_id, type, confidence, context, document_id)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(source_entity_id, type, target_entity_id) DO UPDATE SET
        confidence = MAX(confidence, excluded.confidence),
        context = COALESCE(excluded.context, context),
        document_id = excluded.document_id
    `);

    const write = this.db.transaction(() => {
      for (const relationship of relationships) {
        upsert.run(
          relationship.sourceEntityId,
          relationship.targetEntityId,
          relationship.type,
          relationship.confidence,
          relationship.context ?? null,
          documentId
        );
      }
    });

    try {
      write();
    } catch (error) {
      logger.error({ documentId, error }, 'Failed to store relationships');
      throw new PersistenceError(`Failed to store relationships for document ${documentId}`, error);
    }

    return relationships.length;
  }

  async getEntity(id: string): Promise<StoredEntity | null> {
    const row = this.db.prepare<[string], EntityRow>(`SELECT * FROM entities WHERE id = ?`).get(id);
    return row ? toStoredEntity(row) : null;
  }

  async getDocumentEntities(documentId: string): Promise<StoredEntity[]> {
    const rows = this.db
      .prepare<[string], EntityRow>(
        `SELECT e.* FROM entities e, json_each(e.document_ids) m WHERE m.value = ? ORDER BY e.type, e.text`
      )
      .all(documentId);
    return rows.map(toStoredEntity);
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    return this.db
      .prepare<[string], ChunkRow>(`SELECT * FROM chunks WHERE document_id = ? ORDER BY chunk_index`)
      .all(documentId)
      .map(toStoredChunk);
  }

  async testConnection(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      logger.warn({ error }, 'SQLite connection check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
