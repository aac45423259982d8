import pLimit from 'p-limit';
import type { Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import {
  BackendUnavailableError,
  ConfigurationError,
  InferenceConnectionError,
  errorMessage,
} from '../../utils/errors.js';
import type {
  Chunk,
  Document,
  ExtractedEntity,
  InferenceRequest,
  InferenceResponse,
  TokenUsage,
  WaveName,
} from '../../types/extraction.types.js';
import type { InferenceClient } from '../inference/InferenceClient.interface.js';
import type { ChunkingEngine } from '../chunking/ChunkingEngine.js';
import { inspectContent, type DocumentRouter } from '../routing/DocumentRouter.js';
import type { RoutingDecision } from '../routing/types.js';
import type { PatternMatcher } from './PatternMatcher.js';
import { wavesFor, type WaveDefinition } from './waves.js';
import {
  entityResponseSchema,
  parseEntityResponse,
  parseRelationshipResponse,
  relationshipResponseSchema,
  type RawRelationship,
} from './ResponseParser.js';
import {
  deduplicateEntities,
  deduplicateRelationships,
  toEntity,
  validateRelationships,
} from './EntityDeduplicator.js';
import { ENTITY_EXTRACTION_SYSTEM_PROMPT, ENTITY_EXTRACTION_USER_PROMPT } from './prompts/entity-extraction.js';
import {
  RELATIONSHIP_EXTRACTION_SYSTEM_PROMPT,
  RELATIONSHIP_EXTRACTION_USER_PROMPT,
} from './prompts/relationship-extraction.js';
import type {
  ExtractOptions,
  ExtractionDiagnostic,
  ExtractionResult,
  WaveOutcome,
} from './types.js';

interface WorkUnit {
  chunkId: string | null;
  text: string;
}

interface RunState {
  documentId: string;
  metadata?: Record<string, unknown>;
  entities: ExtractedEntity[];
  relationships: RawRelationship[];
  outcomes: WaveOutcome[];
  diagnostics: ExtractionDiagnostic[];
  usage: TokenUsage;
  signal: AbortSignal;
}

const FAILED_STATUSES = new Set<WaveOutcome['status']>(['failed', 'parse_failed']);

export interface OrchestratorDependencies {
  client: InferenceClient;
  router: DocumentRouter;
  chunker: ChunkingEngine;
  patternMatcher?: PatternMatcher;
}

/**
 * Runs the extraction waves a routing decision calls for and merges their
 * output. Failures stay local to the wave or chunk they happen in; the
 * document call itself only throws on programming errors.
 */
export class ExtractionOrchestrator {
  private readonly client: InferenceClient;
  private readonly router: DocumentRouter;
  private readonly chunker: ChunkingEngine;
  private readonly patternMatcher?: PatternMatcher;

  constructor(
    dependencies: OrchestratorDependencies,
    private readonly settings: Config['extraction'],
    private readonly charsPerToken: number
  ) {
    this.client = dependencies.client;
    this.router = dependencies.router;
    this.chunker = dependencies.chunker;
    this.patternMatcher = dependencies.patternMatcher;
  }

  async extract(document: Document, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const startTime = Date.now();
    const decision = options.decision ?? this.router.route(document.text, options.route);

    const content = inspectContent(document.text);
    if (content === 'empty' || content === 'binary') {
      return this.skipped(document, decision, content, startTime);
    }

    const chunks = this.split(document, decision);

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const state: RunState = {
      documentId: document.id,
      metadata: document.metadata,
      entities: [],
      relationships: [],
      outcomes: [],
      diagnostics: [],
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      signal: controller.signal,
    };

    logger.info(
      {
        documentId: document.id,
        strategy: decision.strategy,
        chunkCount: chunks.length,
        extractRelationships: decision.extractRelationships,
      },
      'Starting extraction'
    );

    const units: WorkUnit[] =
      chunks.length > 0
        ? chunks.map((chunk) => ({ chunkId: chunk.id, text: chunk.content }))
        : [{ chunkId: null, text: document.text }];
    const waves = wavesFor(decision.strategy, this.settings.waves);
    const limit = pLimit(this.settings.concurrency);

    const work = Promise.all(
      units.map((unit) => limit(() => this.runUnit(unit, waves, decision.extractRelationships, state)))
    );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.settings.documentTimeoutMs);
    });

    let timedOut = false;
    try {
      timedOut = (await Promise.race([work.then(() => 'done' as const), timeout])) === 'timeout';
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }

    if (timedOut) {
      controller.abort();
      limit.clearQueue();
      work.catch((error: unknown) => {
        logger.warn({ documentId: document.id, error: errorMessage(error) }, 'Extraction work failed after timeout');
      });
      state.diagnostics.push({
        code: 'DOCUMENT_TIMEOUT',
        message: `Document timed out after ${this.settings.documentTimeoutMs}ms; returning partial results`,
      });
      logger.warn({ documentId: document.id, timeoutMs: this.settings.documentTimeoutMs }, 'Document extraction timed out');
    }

    const result = this.buildResult(document, decision, chunks, state, timedOut, startTime);

    logger.info(
      {
        documentId: document.id,
        entityCount: result.entities.length,
        relationshipCount: result.relationships.length,
        diagnostics: result.diagnostics.length,
        timedOut,
        processingTimeMs: result.processingTimeMs,
      },
      'Extraction complete'
    );

    return result;
  }

  private skipped(
    document: Document,
    decision: RoutingDecision,
    content: 'empty' | 'binary',
    startTime: number
  ): ExtractionResult {
    logger.warn({ documentId: document.id, content, chars: document.text.length }, 'Skipping extraction');
    return {
      documentId: document.id,
      decision,
      entities: [],
      relationships: [],
      chunks: [],
      waves: [],
      diagnostics: [
        {
          code: 'DOCUMENT_SKIPPED',
          message:
            content === 'empty'
              ? 'Document is empty; no extraction ran'
              : 'Document contains binary data; no extraction ran',
          details: { content },
        },
      ],
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      processingTimeMs: Date.now() - startTime,
      timedOut: false,
    };
  }

  private split(document: Document, decision: RoutingDecision): Chunk[] {
    const plan = decision.chunking;
    if (!plan || document.text.length === 0) return [];
    return this.chunker.split(
      document.text,
      plan.strategy,
      Math.max(1, Math.floor(plan.chunkSizeTokens * this.charsPerToken)),
      Math.floor(plan.overlapTokens * this.charsPerToken),
      { documentId: document.id }
    );
  }

  private async runUnit(
    unit: WorkUnit,
    waves: WaveDefinition[],
    withRelationships: boolean,
    state: RunState
  ): Promise<void> {
    const found: ExtractedEntity[] = [];

    if (this.patternMatcher && this.settings.patternMatching) {
      const matches = this.patternMatcher.match(unit.text, unit.chunkId ?? undefined);
      found.push(...matches);
      state.entities.push(...matches);
      state.outcomes.push({ wave: 'pattern', chunkId: unit.chunkId, status: 'ok', entityCount: matches.length });
    }

    if (!this.settings.llmEnabled) return;

    for (const wave of waves) {
      if (state.signal.aborted) return;
      const entities = await this.runWave(wave, unit, found, state);
      found.push(...entities);
      state.entities.push(...entities);
    }

    if (withRelationships && !state.signal.aborted) {
      await this.runRelationshipWave(unit, found, state);
    }
  }

  private async runWave(
    wave: WaveDefinition,
    unit: WorkUnit,
    previous: ExtractedEntity[],
    state: RunState
  ): Promise<ExtractedEntity[]> {
    const prompt = ENTITY_EXTRACTION_USER_PROMPT(wave, unit.text, {
      metadata: state.metadata,
      previousEntities: deduplicateEntities(previous).slice(0, this.settings.previousEntitiesInPrompt),
    });

    let response: InferenceResponse;
    try {
      response = await this.client.complete({
        messages: [
          { role: 'system', content: ENTITY_EXTRACTION_SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        backend: 'extraction',
        responseSchema: entityResponseSchema(wave.entityTypes),
        signal: state.signal,
      });
    } catch (error) {
      this.recordFailure(state, wave.name, unit, 'failed', 'WAVE_FAILED', error);
      return [];
    }

    this.addUsage(state.usage, response);

    try {
      const parsed = parseEntityResponse(response.text, wave.entityTypes);
      const entities = parsed.items.map((raw) => toEntity(raw, wave.name, unit.chunkId ?? undefined));
      state.outcomes.push({
        wave: wave.name,
        chunkId: unit.chunkId,
        status: parsed.repaired ? 'repaired' : 'ok',
        entityCount: entities.length,
        usage: response.usage,
      });
      logger.debug(
        { documentId: state.documentId, wave: wave.name, chunkId: unit.chunkId, entities: entities.length, skipped: parsed.skipped },
        'Wave complete'
      );
      return entities;
    } catch (error) {
      this.recordFailure(state, wave.name, unit, 'parse_failed', 'PARSE_FAILED', error, response.usage);
      return [];
    }
  }

  private async runRelationshipWave(unit: WorkUnit, found: ExtractedEntity[], state: RunState): Promise<void> {
    const candidates = deduplicateEntities(found).filter(
      (entity) => entity.confidence >= this.settings.minConfidence
    );
    if (candidates.length < 2) {
      state.outcomes.push({ wave: 'relationships', chunkId: unit.chunkId, status: 'skipped', entityCount: 0 });
      return;
    }

    const listed = candidates.slice(0, this.settings.relationshipEntityLimit);
    const request: InferenceRequest = {
      messages: [
        { role: 'system', content: RELATIONSHIP_EXTRACTION_SYSTEM_PROMPT },
        {
          role: 'user',
          content: RELATIONSHIP_EXTRACTION_USER_PROMPT(
            listed,
            candidates.length,
            this.settings.relationshipTypes,
            unit.text
          ),
        },
      ],
      backend: 'reasoning',
      responseSchema: relationshipResponseSchema(this.settings.relationshipTypes),
      signal: state.signal,
    };

    let response: InferenceResponse;
    try {
      response = await this.completeOnReasoningBackend(request);
    } catch (error) {
      this.recordFailure(state, 'relationships', unit, 'failed', 'RELATIONSHIP_WAVE_FAILED', error);
      return;
    }

    this.addUsage(state.usage, response);

    try {
      const parsed = parseRelationshipResponse(response.text);
      state.relationships.push(...parsed.items);
      state.outcomes.push({
        wave: 'relationships',
        chunkId: unit.chunkId,
        status: parsed.repaired ? 'repaired' : 'ok',
        entityCount: 0,
        relationshipCount: parsed.items.length,
        usage: response.usage,
      });
    } catch (error) {
      this.recordFailure(state, 'relationships', unit, 'parse_failed', 'RELATIONSHIP_WAVE_FAILED', error, response.usage);
    }
  }

  private async completeOnReasoningBackend(request: InferenceRequest): Promise<InferenceResponse> {
    try {
      return await this.client.complete(request);
    } catch (error) {
      const unavailable =
        error instanceof ConfigurationError ||
        error instanceof BackendUnavailableError ||
        error instanceof InferenceConnectionError;
      if (!unavailable || request.signal?.aborted) {
        throw error;
      }
      logger.warn({ error: errorMessage(error) }, 'Reasoning backend unavailable, using extraction backend for relationships');
      return this.client.complete({ ...request, backend: 'extraction' });
    }
  }

  private recordFailure(
    state: RunState,
    wave: WaveName,
    unit: WorkUnit,
    status: 'failed' | 'parse_failed',
    code: ExtractionDiagnostic['code'],
    error: unknown,
    usage?: TokenUsage
  ): void {
    const message = errorMessage(error);
    state.outcomes.push({ wave, chunkId: unit.chunkId, status, entityCount: 0, usage, error: message });
    state.diagnostics.push({
      code,
      message,
      wave,
      chunkId: unit.chunkId,
      details: error instanceof Error && 'details' in error ? error.details : undefined,
    });
    logger.warn({ documentId: state.documentId, wave, chunkId: unit.chunkId, status, error: message }, 'Wave failed');
  }

  private addUsage(total: TokenUsage, response: InferenceResponse): void {
    total.promptTokens += response.usage.promptTokens;
    total.completionTokens += response.usage.completionTokens;
    total.totalTokens += response.usage.totalTokens;
  }

  private buildResult(
    document: Document,
    decision: RoutingDecision,
    chunks: Chunk[],
    state: RunState,
    timedOut: boolean,
    startTime: number
  ): ExtractionResult {
    const outcomes = [...state.outcomes];
    const diagnostics = [...state.diagnostics];
    const entityOutcomes = outcomes.filter((outcome) => outcome.wave !== 'relationships');
    const allFailed =
      entityOutcomes.length > 0 && entityOutcomes.every((outcome) => FAILED_STATUSES.has(outcome.status));

    const base = {
      documentId: document.id,
      decision,
      chunks,
      waves: outcomes,
      usage: { ...state.usage },
      processingTimeMs: Date.now() - startTime,
      timedOut,
    };

    if (allFailed) {
      diagnostics.push({
        code: 'ALL_WAVES_FAILED',
        message: `All ${entityOutcomes.length} extraction waves failed`,
      });
      return { ...base, entities: [], relationships: [], diagnostics };
    }

    const entities = deduplicateEntities([...state.entities]).filter(
      (entity) => entity.confidence >= this.settings.minConfidence
    );
    const known = new Set(entities.map((entity) => entity.id));
    const { valid, rejected } = validateRelationships(
      [...state.relationships],
      known,
      this.settings.minRelationshipConfidence
    );
    if (rejected > 0) {
      diagnostics.push({
        code: 'RELATIONSHIPS_REJECTED',
        message: `${rejected} relationships referenced unknown entities, pointed at themselves or fell below confidence ${this.settings.minRelationshipConfidence}`,
      });
    }

    return { ...base, entities, relationships: deduplicateRelationships(valid), diagnostics };
  }
}
