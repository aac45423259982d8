import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Neo4jExtractionStore } from './Neo4jExtractionStore.js';
import { CONSTRAINTS, GET_ENTITY, MERGE_CHUNKS, MERGE_DOCUMENT, MERGE_ENTITIES } from './neo4j-queries.js';
import { PersistenceError } from '../../utils/errors.js';

const { txRun, sessionRun, verifyConnectivity } = vi.hoisted(() => ({
  txRun: vi.fn(),
  sessionRun: vi.fn(),
  verifyConnectivity: vi.fn(),
}));

vi.mock('neo4j-driver', () => {
  const session = () => ({
    run: sessionRun,
    executeWrite: <T>(work: (tx: { run: typeof txRun }) => Promise<T>) => work({ run: txRun }),
    executeRead: <T>(work: (tx: { run: typeof txRun }) => Promise<T>) => work({ run: txRun }),
    close: vi.fn(async () => undefined),
  });
  const driver = vi.fn(() => ({ verifyConnectivity, session, close: vi.fn(async () => undefined) }));
  return { default: { driver, auth: { basic: vi.fn(() => ({})) } } };
});

const record = (values: Record<string, unknown>) => ({
  toObject: () => values,
  get: (key: string) => values[key],
});

describe('Neo4jExtractionStore', () => {
  let store: Neo4jExtractionStore;

  beforeEach(async () => {
    txRun.mockReset();
    sessionRun.mockReset();
    verifyConnectivity.mockReset();
    verifyConnectivity.mockResolvedValue(undefined);
    sessionRun.mockResolvedValue({ records: [] });
    txRun.mockResolvedValue({ records: [] });
    store = new Neo4jExtractionStore({ uri: 'bolt://graph.test:7687', user: 'neo4j', password: 'test-secret' });
    await store.connect();
  });

  it('creates constraints on connect', () => {
    expect(sessionRun.mock.calls.map(([statement]) => statement)).toEqual(CONSTRAINTS);
  });

  it('fails to connect when the server is unreachable', async () => {
    verifyConnectivity.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const unreachable = new Neo4jExtractionStore({ uri: 'bolt://graph.test:7687', user: 'neo4j', password: 'test-secret' });

    await expect(unreachable.connect()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('writes document, chunks and entities in one transaction', async () => {
    const result = await store.storeChunksAndEntities(
      'doc-a',
      [],
      [{ id: 'abc', type: 'COURT', text: 'Supreme Court', confidence: 0.9, wave: 'actors', chunkIds: ['doc-a_chunk_0'] }]
    );

    expect(result).toEqual({ chunkIds: [], entityIds: ['abc'] });
    expect(txRun.mock.calls.map(([query]) => query)).toEqual([MERGE_DOCUMENT, MERGE_CHUNKS, MERGE_ENTITIES]);
    expect(txRun.mock.calls[2][1]).toMatchObject({
      documentId: 'doc-a',
      entities: [{ id: 'abc', type: 'COURT', text: 'Supreme Court', confidence: 0.9, chunkIds: ['doc-a_chunk_0'] }],
    });
  });

  it('wraps write failures', async () => {
    txRun.mockRejectedValueOnce(new Error('constraint violated'));

    await expect(store.storeChunksAndEntities('doc-a', [], [])).rejects.toBeInstanceOf(PersistenceError);
  });

  it('reads an entity back', async () => {
    const stored = {
      id: 'abc',
      type: 'COURT',
      text: 'Supreme Court',
      confidence: 0.9,
      documentIds: ['doc-a', 'doc-b'],
      documentCount: 2,
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-02T00:00:00.000Z',
    };
    txRun.mockResolvedValueOnce({ records: [record(stored)] });

    expect(await store.getEntity('abc')).toEqual(stored);
    expect(txRun).toHaveBeenCalledWith(GET_ENTITY, { id: 'abc' });
  });

  it('skips the round trip for an empty relationship list', async () => {
    expect(await store.storeRelationships('doc-a', [])).toBe(0);
    expect(txRun).not.toHaveBeenCalled();
  });

  it('returns the written relationship count', async () => {
    txRun.mockResolvedValueOnce({ records: [record({ written: 1 })] });

    expect(
      await store.storeRelationships('doc-a', [{ sourceEntityId: 'a', targetEntityId: 'b', type: 'CITES', confidence: 0.9 }])
    ).toBe(1);
  });
});
