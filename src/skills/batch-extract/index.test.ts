import { describe, it, expect, beforeAll, vi } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { BatchExtractor, documentIdFor } from './index.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import type { BatchConfig } from './types.js';
import { buildConfig } from '../../config/index.js';
import { DocumentRouter } from '../../services/routing/DocumentRouter.js';
import { ChunkingEngine } from '../../services/chunking/ChunkingEngine.js';
import { TokenEstimator } from '../../services/tokens/TokenEstimator.js';
import { ExtractionOrchestrator } from '../../services/extraction/ExtractionOrchestrator.js';
import { SQLiteExtractionStore } from '../../services/storage/SQLiteExtractionStore.js';
import { entityId } from '../../services/extraction/entityIdentity.js';
import { GenerationError } from '../../utils/errors.js';
import { ScriptedInferenceClient, documentTextOf, entitiesJson } from '../../test/ScriptedInferenceClient.js';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return { ...actual, readFile: vi.fn(actual.readFile) };
});

const OPINION = 'Jane Roe appealed the ruling.';
const BROKEN = 'This one FAILS every wave.';

describe('BatchExtractor', () => {
  const config = buildConfig();
  const router = new DocumentRouter(config.routing, config.chunking);
  const reporter = new ProgressReporter(false);
  let folder: string;

  const batch = (overrides: Partial<BatchConfig> = {}): BatchConfig => ({
    folder,
    dryRun: false,
    format: 'json',
    concurrency: 2,
    persist: true,
    route: {},
    ...overrides,
  });

  beforeAll(() => {
    folder = mkdtempSync(join(tmpdir(), 'batch-extract-'));
    writeFileSync(join(folder, 'a-opinion.txt'), OPINION);
    writeFileSync(join(folder, 'b-broken.md'), BROKEN);
    writeFileSync(join(folder, 'c-scan.pdf'), 'binary');
  });

  it('routes every supported file on a dry run', async () => {
    const result = await new BatchExtractor({ router }).run(batch({ dryRun: true }), reporter);

    expect(result.files.map((file) => [file.name, file.documentId, file.chars, file.decision.strategy])).toEqual([
      ['a-opinion.txt', documentIdFor(OPINION), OPINION.length, 'single_pass'],
      ['b-broken.md', documentIdFor(BROKEN), BROKEN.length, 'single_pass'],
    ]);
    expect(result.documents).toEqual([]);
    expect(result.summary.byStrategy).toEqual({ single_pass: 2 });
    expect(result.summary.estimatedCost).toBeCloseTo(0.0076);
  });

  it('keeps going when one document fails and persists the rest', async () => {
    const client = new ScriptedInferenceClient((_request, prompt) => {
      if (documentTextOf(prompt).includes('FAILS')) {
        throw new GenerationError('server error', 'extraction', 500, true);
      }
      return entitiesJson(['PERSON', 'Jane Roe', 0.9]);
    });
    const orchestrator = new ExtractionOrchestrator(
      {
        client,
        router,
        chunker: new ChunkingEngine(new TokenEstimator({ charsPerToken: 4, accurate: false, minCompletionTokens: 100 })),
      },
      config.extraction,
      config.routing.charsPerToken
    );
    const store = new SQLiteExtractionStore(':memory:');

    const result = await new BatchExtractor({ router, orchestrator, store }).run(batch(), reporter);

    expect(result.documents.map((document) => [document.fileName, document.status, document.entityCount])).toEqual([
      ['a-opinion.txt', 'processed', 1],
      ['b-broken.md', 'failed', 0],
    ]);
    expect(result.documents[1].error).toBe('All 1 extraction waves failed');
    expect(result.summary).toMatchObject({ total: 2, processed: 1, failed: 1, entities: 1 });

    const stored = await store.getEntity(entityId('PERSON', 'Jane Roe'));
    expect(stored?.documentIds).toEqual([documentIdFor(OPINION)]);
    await store.close();
  });

  it('records a file that cannot be read and routes the rest', async () => {
    vi.mocked(readFile).mockRejectedValueOnce(new Error('EACCES: permission denied'));

    const result = await new BatchExtractor({ router }).run(batch({ dryRun: true }), reporter);

    expect(result.unreadable).toEqual([
      { path: join(folder, 'a-opinion.txt'), name: 'a-opinion.txt', error: 'EACCES: permission denied' },
    ]);
    expect(result.files.map((file) => file.name)).toEqual(['b-broken.md']);
    expect(result.summary).toMatchObject({ total: 2, processed: 0, failed: 1, byStrategy: { single_pass: 1 } });
  });
});
