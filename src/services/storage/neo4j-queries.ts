export const CONSTRAINTS = [
  'CREATE CONSTRAINT document_id IF NOT EXISTS FOR (d:Document) REQUIRE d.id IS UNIQUE',
  'CREATE CONSTRAINT chunk_id IF NOT EXISTS FOR (c:Chunk) REQUIRE c.id IS UNIQUE',
  'CREATE CONSTRAINT entity_id IF NOT EXISTS FOR (e:Entity) REQUIRE e.id IS UNIQUE',
];

export const MERGE_DOCUMENT = `
  MERGE (d:Document {id: $documentId})
  SET d.metadata = $metadata, d.chunkCount = $chunkCount, d.entityCount = $entityCount, d.storedAt = $now
  WITH d
  OPTIONAL MATCH (d)-[:HAS_CHUNK]->(old:Chunk)
  DETACH DELETE old
`;

export const MERGE_CHUNKS = `
  MATCH (d:Document {id: $documentId})
  UNWIND $chunks AS chunk
  MERGE (c:Chunk {id: chunk.id})
  SET c += chunk
  MERGE (d)-[:HAS_CHUNK]->(c)
`;

// documentCount is set before documentIds so the membership test sees the old list.
export const MERGE_ENTITIES = `
  MATCH (d:Document {id: $documentId})
  UNWIND $entities AS entity
  MERGE (e:Entity {id: entity.id})
  ON CREATE SET
    e.type = entity.type,
    e.text = entity.text,
    e.confidence = entity.confidence,
    e.documentIds = [$documentId],
    e.documentCount = 1,
    e.createdAt = $now
  ON MATCH SET
    e.confidence = CASE WHEN entity.confidence > e.confidence THEN entity.confidence ELSE e.confidence END,
    e.documentCount = CASE WHEN $documentId IN e.documentIds THEN e.documentCount ELSE e.documentCount + 1 END,
    e.documentIds = CASE WHEN $documentId IN e.documentIds THEN e.documentIds ELSE e.documentIds + $documentId END
  SET e.updatedAt = $now
  MERGE (d)-[:MENTIONS]->(e)
  WITH e, entity
  UNWIND entity.chunkIds AS chunkId
  MATCH (c:Chunk {id: chunkId})
  MERGE (c)-[:CONTAINS]->(e)
`;

export const MERGE_RELATIONSHIPS = `
  UNWIND $relationships AS rel
  MATCH (source:Entity {id: rel.sourceEntityId})
  MATCH (target:Entity {id: rel.targetEntityId})
  MERGE (source)-[r:RELATES_TO {type: rel.type}]->(target)
  ON CREATE SET r.confidence = rel.confidence
  ON MATCH SET r.confidence = CASE WHEN rel.confidence > r.confidence THEN rel.confidence ELSE r.confidence END
  SET r.context = coalesce(rel.context, r.context), r.documentId = $documentId
  RETURN count(r) AS written
`;

const ENTITY_FIELDS = `
  e.id AS id, e.type AS type, e.text AS text, e.confidence AS confidence,
  e.documentIds AS documentIds, e.documentCount AS documentCount,
  e.createdAt AS createdAt, e.updatedAt AS updatedAt
`;

export const GET_ENTITY = `
  MATCH (e:Entity {id: $id})
  RETURN ${ENTITY_FIELDS}
`;

export const GET_DOCUMENT_ENTITIES = `
  MATCH (:Document {id: $documentId})-[:MENTIONS]->(e:Entity)
  RETURN ${ENTITY_FIELDS}
  ORDER BY e.type, e.text
`;

export const GET_CHUNKS = `
  MATCH (:Document {id: $documentId})-[:HAS_CHUNK]->(c:Chunk)
  RETURN c.id AS id, c.documentId AS documentId, c.index AS index, c.content AS content,
    c.startChar AS startChar, c.endChar AS endChar, c.tokenCount AS tokenCount,
    c.overlapSize AS overlapSize, c.strategy AS strategy
  ORDER BY c.index
`;
