import { describe, it, expect } from 'vitest';
import { ExtractionOrchestrator } from './ExtractionOrchestrator.js';
import { RegexPatternMatcher } from './PatternMatcher.js';
import { entityId } from './entityIdentity.js';
import { DocumentRouter } from '../routing/DocumentRouter.js';
import { ChunkingEngine } from '../chunking/ChunkingEngine.js';
import { TokenEstimator } from '../tokens/TokenEstimator.js';
import { buildConfig, type Config } from '../../config/index.js';
import type { RawConfig } from '../../config/validation.js';
import { ConfigurationError, GenerationError } from '../../utils/errors.js';
import type { RoutingDecision } from '../routing/types.js';
import {
  ScriptedInferenceClient,
  documentTextOf,
  entitiesJson as entities,
  waveOf,
  type ScriptHandler as Handler,
} from '../../test/ScriptedInferenceClient.js';

const NO_ENTITIES = entities();
const NO_RELATIONSHIPS = JSON.stringify({ relationships: [] });

const makeConfig = (extraction: RawConfig['extraction'] = {}): Config => buildConfig({ extraction });

const setup = (handler: Handler, config: Config = makeConfig(), withPatterns?: RegexPatternMatcher) => {
  const estimator = new TokenEstimator({ charsPerToken: 4, accurate: false, minCompletionTokens: 100 });
  const router = new DocumentRouter(config.routing, config.chunking);
  const client = new ScriptedInferenceClient(handler);
  const orchestrator = new ExtractionOrchestrator(
    { client, router, chunker: new ChunkingEngine(estimator), patternMatcher: withPatterns },
    config.extraction,
    config.routing.charsPerToken
  );
  return { orchestrator, router, client };
};

const filler = (length: number): string => 'The court heard argument. '.repeat(Math.ceil(length / 26)).slice(0, length);

describe('ExtractionOrchestrator', () => {
  it('makes one call for a single-pass document', async () => {
    const { orchestrator, client } = setup(() => entities(['PERSON', 'Jane Roe', 0.9]));

    const result = await orchestrator.extract(
      { id: 'doc-1', text: filler(3_000) },
      { route: { strategyOverride: 'single_pass' } }
    );

    expect(client.requests).toHaveLength(1);
    expect(result.decision.strategy).toBe('single_pass');
    expect(result.waves).toEqual([
      {
        wave: 'single_pass',
        chunkId: null,
        status: 'ok',
        entityCount: 1,
        usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      },
    ]);
    expect(result.entities).toEqual([
      { id: entityId('PERSON', 'Jane Roe'), type: 'PERSON', text: 'Jane Roe', confidence: 0.9, wave: 'single_pass', chunkIds: [] },
    ]);
    expect(result.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
    expect(result.diagnostics).toEqual([]);
    expect(result.timedOut).toBe(false);
  });

  it('keeps the other waves when one response cannot be parsed', async () => {
    const { orchestrator } = setup((_request, prompt) => {
      switch (waveOf(prompt)) {
        case 'Actors and Parties':
          return entities(['PARTY', 'Acme Corp', 0.9]);
        case 'Legal Citations':
          return JSON.stringify({ result: 'none' });
        default:
          return entities(['LEGAL_DOCTRINE', 'res judicata', 0.8]);
      }
    });

    const result = await orchestrator.extract(
      { id: 'doc-2', text: filler(3_000) },
      { route: { strategyOverride: 'three_wave' } }
    );

    expect(result.waves.map((outcome) => [outcome.wave, outcome.status])).toEqual([
      ['actors', 'ok'],
      ['citations', 'parse_failed'],
      ['concepts', 'ok'],
    ]);
    expect(result.entities.map((entity) => entity.text)).toEqual(['res judicata', 'Acme Corp']);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({ code: 'PARSE_FAILED', wave: 'citations', chunkId: null });
  });

  it('flags repaired responses', async () => {
    const { orchestrator } = setup(() => '```json\n{"entities": [{"type": "PERSON", "text": "Jane Roe", "confidence": 0.9},');

    const result = await orchestrator.extract(
      { id: 'doc-3', text: filler(1_000) },
      { route: { strategyOverride: 'single_pass' } }
    );

    expect(result.waves[0].status).toBe('repaired');
    expect(result.entities.map((entity) => entity.text)).toEqual(['Jane Roe']);
  });

  it('treats a relationship wave failure as non-fatal', async () => {
    const { orchestrator } = setup((_request, prompt) => {
      switch (waveOf(prompt)) {
        case 'Actors and Parties':
          return entities(['PARTY', 'Acme Corp', 0.9], ['PARTY', 'Beta LLC', 0.9]);
        case 'relationships':
          throw new GenerationError('server error', 'reasoning', 500, false);
        default:
          return NO_ENTITIES;
      }
    });

    const result = await orchestrator.extract(
      { id: 'doc-4', text: filler(3_000) },
      { route: { strategyOverride: 'four_wave' } }
    );

    expect(result.decision.extractRelationships).toBe(true);
    expect(result.entities).toHaveLength(2);
    expect(result.relationships).toEqual([]);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['RELATIONSHIP_WAVE_FAILED']);
    expect(result.waves[result.waves.length - 1]).toMatchObject({ wave: 'relationships', status: 'failed' });
  });

  it('falls back to the extraction backend and validates relationships', async () => {
    const acme = entityId('PARTY', 'Acme Corp');
    const beta = entityId('PARTY', 'Beta LLC');
    const relationship = (source: string, target: string, type: string, confidence: number) => ({
      source_entity_id: source,
      target_entity_id: target,
      relationship_type: type,
      confidence,
      context: 'stated in the caption',
    });

    const { orchestrator, client } = setup((request, prompt) => {
      switch (waveOf(prompt)) {
        case 'Actors and Parties':
          return entities(['PARTY', 'Acme Corp', 0.9], ['PARTY', 'Beta LLC', 0.9]);
        case 'relationships':
          if (request.backend === 'reasoning') {
            throw new ConfigurationError('Inference backend "reasoning" is not configured');
          }
          return JSON.stringify({
            relationships: [
              relationship(acme, beta, 'CITES', 0.9),
              relationship(acme, acme, 'CITES', 0.9),
              relationship(acme, beta, 'DECIDED_BY', 0.5),
              relationship(acme, 'missing', 'CITES', 0.9),
              relationship(acme, beta, 'cites', 0.95),
            ],
          });
        default:
          return NO_ENTITIES;
      }
    });

    const result = await orchestrator.extract(
      { id: 'doc-5', text: filler(3_000) },
      { route: { strategyOverride: 'four_wave' } }
    );

    const relationshipCalls = client.requests.filter((request) => waveOf(request.messages[1].content) === 'relationships');
    expect(relationshipCalls.map((request) => request.backend)).toEqual(['reasoning', 'extraction']);
    expect(result.relationships).toEqual([
      { sourceEntityId: acme, targetEntityId: beta, type: 'CITES', confidence: 0.95, context: 'stated in the caption' },
    ]);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['RELATIONSHIPS_REJECTED']);
    expect(result.diagnostics[0].message).toMatch(/^3 relationships/);
  });

  it('skips the relationship wave with fewer than two entities', async () => {
    const { orchestrator, client } = setup((_request, prompt) =>
      waveOf(prompt) === 'Actors and Parties' ? entities(['PARTY', 'Acme Corp', 0.9]) : NO_ENTITIES
    );

    const result = await orchestrator.extract(
      { id: 'doc-6', text: filler(3_000) },
      { route: { strategyOverride: 'four_wave' } }
    );

    expect(client.requests).toHaveLength(3);
    expect(result.waves[result.waves.length - 1]).toEqual({
      wave: 'relationships',
      chunkId: null,
      status: 'skipped',
      entityCount: 0,
    });
  });

  it('returns partial results when the document times out', async () => {
    const { orchestrator } = setup(
      (request, prompt) => {
        if (waveOf(prompt) === 'Actors and Parties') {
          return entities(['PARTY', 'Acme Corp', 0.9]);
        }
        return new Promise<string>((_resolve, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      },
      makeConfig({ documentTimeoutMs: 50 })
    );

    const result = await orchestrator.extract(
      { id: 'doc-7', text: filler(3_000) },
      { route: { strategyOverride: 'three_wave' } }
    );

    expect(result.timedOut).toBe(true);
    expect(result.entities.map((entity) => entity.text)).toEqual(['Acme Corp']);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['DOCUMENT_TIMEOUT']);
  });

  it('reports ALL_WAVES_FAILED instead of throwing when nothing succeeds', async () => {
    const { orchestrator } = setup(() => {
      throw new GenerationError('server error', 'extraction', 503, true);
    });

    const result = await orchestrator.extract(
      { id: 'doc-8', text: filler(3_000) },
      { route: { strategyOverride: 'three_wave' } }
    );

    expect(result.entities).toEqual([]);
    expect(result.relationships).toEqual([]);
    expect(result.waves.map((outcome) => outcome.status)).toEqual(['failed', 'failed', 'failed']);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      'WAVE_FAILED',
      'WAVE_FAILED',
      'WAVE_FAILED',
      'ALL_WAVES_FAILED',
    ]);
  });

  it('finds more entities in a larger document than in its prefix', async () => {
    const handler: Handler = (_request, prompt) => {
      const wave = waveOf(prompt);
      if (wave === 'relationships') return NO_RELATIONSHIPS;
      if (wave !== 'Actors and Parties' && wave !== 'All Entity Types') return NO_ENTITIES;
      const names = documentTextOf(prompt).match(/Witness \d+/g) ?? [];
      return entities(...names.map((name): [string, string, number] => ['PERSON', name, 0.9]));
    };
    const text = Array.from({ length: 1_000 }, (_, index) => `Witness ${index} testified. `).join('').slice(0, 25_000);

    const full = await setup(handler).orchestrator.extract({ id: 'full', text });
    const prefix = await setup(handler).orchestrator.extract({ id: 'prefix', text: text.slice(0, 3_000) });

    expect(full.decision.strategy).toBe('four_wave');
    expect(prefix.decision.strategy).toBe('single_pass');
    expect(prefix.entities.length).toBeGreaterThan(0);
    expect(full.entities.length).toBeGreaterThan(prefix.entities.length);
  });

  it('skips extraction for an empty document', async () => {
    const { orchestrator, client } = setup(() => entities(['PERSON', 'Jane Roe', 0.9]));

    const result = await orchestrator.extract({ id: 'doc-empty', text: '  \n\t ' });

    expect(client.requests).toHaveLength(0);
    expect(result.decision.rationale).toBe('Empty document: no extraction needed');
    expect(result.waves).toEqual([]);
    expect(result.entities).toEqual([]);
    expect(result.diagnostics).toEqual([
      { code: 'DOCUMENT_SKIPPED', message: 'Document is empty; no extraction ran', details: { content: 'empty' } },
    ]);
  });

  it('skips extraction for binary content even with a size-only decision', async () => {
    const { orchestrator, router, client } = setup(() => entities(['PERSON', 'Jane Roe', 0.9]));
    const text = '\u0000'.repeat(100) + 'x'.repeat(29_900);

    const routed = await orchestrator.extract({ id: 'doc-bin-1', text }, { route: { deep: true } });
    const sized = await orchestrator.extract({ id: 'doc-bin-2', text }, { decision: router.routeSize(text.length) });

    expect(client.requests).toHaveLength(0);
    expect(routed.decision).toMatchObject({ strategy: 'single_pass', content: 'binary' });
    for (const result of [routed, sized]) {
      expect(result.chunks).toEqual([]);
      expect(result.diagnostics).toEqual([
        {
          code: 'DOCUMENT_SKIPPED',
          message: 'Document contains binary data; no extraction ran',
          details: { content: 'binary' },
        },
      ]);
    }
  });

  it('merges chunk ids for an entity found in several chunks', async () => {
    const { orchestrator, router } = setup((_request, prompt) =>
      waveOf(prompt) === 'Actors and Parties' ? entities(['JUDGE', 'Judge Smith', 0.9]) : NO_ENTITIES
    );
    const text = filler(150);
    const decision: RoutingDecision = {
      ...router.route(text, { strategyOverride: 'three_wave_chunked' }),
      chunking: { strategy: 'fixed', chunkSizeTokens: 25, overlapTokens: 5, numChunks: 2 },
    };

    const result = await orchestrator.extract({ id: 'doc-9', text }, { decision });

    expect(result.chunks.map((chunk) => chunk.id)).toEqual(['doc-9_chunk_0', 'doc-9_chunk_1']);
    expect(result.entities).toHaveLength(1);
    expect(result.entities[0].chunkIds).toEqual(['doc-9_chunk_0', 'doc-9_chunk_1']);
    expect(result.waves.filter((outcome) => outcome.chunkId === 'doc-9_chunk_1')).toHaveLength(3);
  });

  it('bounds the number of chunks processed at once', async () => {
    let inFlight = 0;
    let peak = 0;
    const { orchestrator, router, client } = setup(
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return NO_ENTITIES;
      },
      makeConfig({ concurrency: 2 })
    );
    const text = filler(500);
    const decision: RoutingDecision = {
      ...router.route(text, { strategyOverride: 'three_wave_chunked' }),
      chunking: { strategy: 'fixed', chunkSizeTokens: 25, overlapTokens: 0, numChunks: 5 },
    };

    const result = await orchestrator.extract({ id: 'doc-10', text }, { decision });

    expect(result.chunks).toHaveLength(5);
    expect(client.requests).toHaveLength(15);
    expect(peak).toBe(2);
  });

  it('runs pattern matching alone when LLM extraction is disabled', async () => {
    const matcher = new RegexPatternMatcher([
      { name: 'usc', type: 'STATUTE_CITATION', pattern: '\\d+ U\\.S\\.C\\. § \\d+', confidence: 0.95 },
    ]);
    const { orchestrator, client } = setup(() => NO_ENTITIES, makeConfig({ llmEnabled: false }), matcher);

    const result = await orchestrator.extract({ id: 'doc-11', text: 'Relief is sought under 42 U.S.C. § 1983.' });

    expect(client.requests).toHaveLength(0);
    expect(result.waves).toEqual([{ wave: 'pattern', chunkId: null, status: 'ok', entityCount: 1 }]);
    expect(result.entities).toEqual([
      {
        id: entityId('STATUTE_CITATION', '42 U.S.C. § 1983'),
        type: 'STATUTE_CITATION',
        text: '42 U.S.C. § 1983',
        confidence: 0.95,
        wave: 'pattern',
        chunkIds: [],
      },
    ]);
  });
});
