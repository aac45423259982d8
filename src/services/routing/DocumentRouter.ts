import { logger } from '../../utils/logger.js';
import type { Config } from '../../config/index.js';
import {
  isProcessingStrategy,
  type ChunkPlan,
  type DocumentContent,
  type ProcessingStrategy,
  type RouteOptions,
  type RoutingDecision,
  type SizeCategory,
} from './types.js';

interface SizeInfo {
  chars: number;
  tokens: number;
  category: SizeCategory;
}

type FourWaveTrigger = 'deep' | 'relationships' | 'large';

const OVERRIDE_SUFFIX = ' (manual override)';

const FRAGMENT_MAX_CHARS = 50;
const BINARY_SAMPLE_CHARS = 1_000;
const BINARY_CONTROL_RATIO = 0.05;
const HUGE_DOCUMENT_CHARS = 1_000_000;

/**
 * Classifies raw text before routing. Binary detection samples the first
 * 1,000 characters for control characters other than tab, CR and LF.
 */
export const inspectContent = (text: string): DocumentContent => {
  if (text.trim().length === 0) return 'empty';

  const sample = text.slice(0, BINARY_SAMPLE_CHARS);
  let control = 0;
  for (let i = 0; i < sample.length; i++) {
    const code = sample.charCodeAt(i);
    if (code < 32 && code !== 9 && code !== 10 && code !== 13) control++;
  }
  if (control / sample.length > BINARY_CONTROL_RATIO) return 'binary';

  return text.length < FRAGMENT_MAX_CHARS ? 'fragment' : 'text';
};

/**
 * Chooses how a document is processed from its content and size. Pure and
 * synchronous: no I/O, no exceptions for any string input.
 */
export class DocumentRouter {
  constructor(
    private readonly routing: Config['routing'],
    private readonly chunking: Config['chunking']
  ) {}

  route(documentText: string, options: RouteOptions = {}): RoutingDecision {
    const content = inspectContent(documentText);
    if (content === 'empty' || content === 'binary') {
      return this.unprocessable(this.sizeInfo(documentText.length), content);
    }

    const decision = this.routeSize(documentText.length, options);
    return content === 'fragment' ? { ...decision, content } : decision;
  }

  /** Routes by size alone; the content is assumed to be text. */
  routeSize(chars: number, options: RouteOptions = {}): RoutingDecision {
    if (!Number.isFinite(chars) || chars <= 0) {
      logger.warn({ chars }, 'Empty or malformed document size, using single pass');
      return this.unprocessable(this.sizeInfo(0), 'empty');
    }

    const size = this.sizeInfo(Math.floor(chars));
    if (size.chars > HUGE_DOCUMENT_CHARS) {
      logger.warn({ chars: size.chars }, 'Extremely large document, processing may be slow');
    }
    const decision = this.decide(size, options);

    logger.info(
      {
        strategy: decision.strategy,
        sizeCategory: size.category,
        chars: size.chars,
        estimatedTokens: decision.estimatedTokens,
        estimatedCost: decision.estimatedCost,
        estimatedDurationSeconds: decision.estimatedDurationSeconds,
        extractRelationships: decision.extractRelationships,
        numChunks: decision.chunking?.numChunks ?? 0,
      },
      'Routing decision'
    );

    return decision;
  }

  /**
   * Sanity warnings for a decision; an empty list means nothing looks off.
   */
  validateDecision(decision: RoutingDecision): string[] {
    const warnings: string[] = [];
    const available = this.routing.maxContextTokens - this.routing.safetyMarginTokens;

    switch (decision.content) {
      case 'empty':
        warnings.push('Document is empty; no extraction will run');
        break;
      case 'binary':
        warnings.push('Document contains binary data; no extraction will run');
        break;
      case 'fragment':
        warnings.push(`Document is shorter than ${FRAGMENT_MAX_CHARS} characters; likely a fragment`);
        break;
    }
    if (decision.documentChars > HUGE_DOCUMENT_CHARS) {
      warnings.push(`Extremely large document (${decision.documentChars} chars); processing may be slow`);
    }

    if (!decision.chunking && decision.documentTokens > available) {
      warnings.push(
        `Document (${decision.documentTokens} tokens) exceeds the ${available}-token request budget without chunking`
      );
    }
    if (decision.estimatedCost > 1.0) {
      warnings.push(`Estimated cost ($${decision.estimatedCost.toFixed(2)}) is very high`);
    }
    if (decision.estimatedDurationSeconds > 60) {
      warnings.push(`Estimated duration (${decision.estimatedDurationSeconds.toFixed(1)}s) is very long`);
    }
    if (decision.documentTokens === 0) {
      warnings.push('Zero document tokens');
    }

    return warnings;
  }

  private decide(size: SizeInfo, options: RouteOptions): RoutingDecision {
    if (options.strategyOverride) {
      if (isProcessingStrategy(options.strategyOverride)) {
        return this.applyOverride(options.strategyOverride, size);
      }
      logger.warn({ override: options.strategyOverride }, 'Unknown strategy override ignored');
    }

    if (options.deep) {
      return this.routeFourWave(size, 'deep');
    }
    if (options.extractRelationships && size.chars > this.routing.relationshipMinChars) {
      return this.routeFourWave(size, 'relationships');
    }
    if (size.chars > this.routing.largeDocumentChars) {
      return this.routeFourWave(size, 'large');
    }

    return this.routeByBand(size);
  }

  private routeByBand(size: SizeInfo): RoutingDecision {
    switch (size.category) {
      case 'very_small':
        return this.routeVerySmall(size);
      case 'small':
        return this.routeSmall(size);
      case 'medium':
        return this.routeMedium(size);
      case 'large':
        return this.routeLarge(size);
    }
  }

  private applyOverride(strategy: ProcessingStrategy, size: SizeInfo): RoutingDecision {
    logger.info({ strategy }, 'Applying strategy override');
    const decision = this.overrideDecision(strategy, size);
    return { ...decision, rationale: decision.rationale + OVERRIDE_SUFFIX };
  }

  private overrideDecision(strategy: ProcessingStrategy, size: SizeInfo): RoutingDecision {
    switch (strategy) {
      case 'single_pass':
        return this.routeVerySmall(size);
      case 'three_wave':
        return this.threeWave(size, 'Three-wave extraction');
      case 'four_wave':
        return this.routeFourWave(size, 'relationships');
      case 'three_wave_chunked':
        if (size.category === 'medium') return this.routeMedium(size);
        if (size.category === 'large') return this.routeLarge(size);
        return this.chunkedSmall(size, 'Chunked three-wave extraction');
    }
  }

  private unprocessable(size: SizeInfo, content: 'empty' | 'binary'): RoutingDecision {
    logger.warn({ chars: size.chars, content }, 'Document has no extractable text');
    return {
      ...this.base(size),
      content,
      strategy: 'single_pass',
      estimatedTokens: 0,
      estimatedDurationSeconds: 0,
      estimatedCost: 0,
      expectedAccuracy: 0,
      rationale:
        content === 'empty'
          ? 'Empty document: no extraction needed'
          : 'Document contains binary data or is malformed: no extraction',
    };
  }

  private routeVerySmall(size: SizeInfo): RoutingDecision {
    const profile = this.routing.calibration.singlePass;
    return {
      ...this.base(size),
      strategy: 'single_pass',
      estimatedTokens: profile.promptTokens + size.tokens + profile.responseTokens,
      estimatedDurationSeconds: profile.durationSeconds,
      estimatedCost: profile.cost,
      expectedAccuracy: profile.accuracy,
      rationale: 'Very small document: single consolidated pass',
    };
  }

  private routeSmall(size: SizeInfo): RoutingDecision {
    const profile = this.routing.calibration.threeWave;
    const estimatedTokens = profile.promptTokens + size.tokens + profile.responseTokens;

    if (estimatedTokens <= this.availableContext()) {
      return this.threeWave(size, 'Small document: three-wave extraction');
    }
    return this.chunkedSmall(size, 'Small document near the context limit: chunked three-wave extraction');
  }

  private threeWave(size: SizeInfo, rationale: string): RoutingDecision {
    const profile = this.routing.calibration.threeWave;
    return {
      ...this.base(size),
      strategy: 'three_wave',
      estimatedTokens: profile.promptTokens + size.tokens + profile.responseTokens,
      estimatedDurationSeconds: profile.durationSeconds,
      estimatedCost: profile.cost,
      expectedAccuracy: profile.accuracy,
      rationale,
    };
  }

  private chunkedSmall(size: SizeInfo, rationale: string): RoutingDecision {
    const profile = this.routing.calibration.threeWave;
    const chunked = this.routing.calibration.chunked;
    const plan = this.chunkPlan(size, 'recursive', this.chunking.overlapTokens);
    return {
      ...this.base(size),
      strategy: 'three_wave_chunked',
      estimatedTokens: profile.promptTokens + size.tokens + profile.responseTokens,
      estimatedDurationSeconds: plan.numChunks * chunked.perChunkDurationSeconds,
      estimatedCost: plan.numChunks * chunked.perChunkCost,
      expectedAccuracy: profile.chunkedAccuracy,
      rationale,
      chunking: plan,
    };
  }

  private routeMedium(size: SizeInfo): RoutingDecision {
    const chunked = this.routing.calibration.chunked;
    const plan = this.chunkPlan(size, 'recursive', this.chunking.overlapTokens);
    return {
      ...this.base(size),
      strategy: 'three_wave_chunked',
      estimatedTokens: size.tokens,
      estimatedDurationSeconds: plan.numChunks * chunked.perChunkDurationSeconds,
      estimatedCost: plan.numChunks * chunked.perChunkCost,
      expectedAccuracy: chunked.mediumAccuracy,
      rationale: `Medium document: chunked three-wave extraction (${plan.numChunks} chunks)`,
      chunking: plan,
    };
  }

  private routeLarge(size: SizeInfo): RoutingDecision {
    const chunked = this.routing.calibration.chunked;
    const plan = this.chunkPlan(size, 'structure', this.chunking.largeDocumentOverlapTokens);
    return {
      ...this.base(size),
      strategy: 'three_wave_chunked',
      estimatedTokens: size.tokens,
      estimatedDurationSeconds: plan.numChunks * chunked.largePerChunkDurationSeconds,
      estimatedCost: plan.numChunks * chunked.perChunkCost,
      expectedAccuracy: chunked.largeAccuracy,
      rationale: `Large document: chunked three-wave extraction with section boundaries (${plan.numChunks} chunks)`,
      chunking: plan,
    };
  }

  private routeFourWave(size: SizeInfo, trigger: FourWaveTrigger): RoutingDecision {
    const profile = this.routing.calibration.fourWave;
    const estimatedTokens = profile.promptTokens + size.tokens + profile.responseTokens;
    const { durationSeconds, accuracy } = profile[trigger];

    const perWaveTokens = Math.ceil(profile.promptTokens / profile.waves) + size.tokens + profile.responseTokens;
    const chunking =
      perWaveTokens > this.availableContext()
        ? size.category === 'large'
          ? this.chunkPlan(size, 'structure', this.chunking.largeDocumentOverlapTokens)
          : this.chunkPlan(size, 'recursive', this.chunking.overlapTokens)
        : null;

    const rationales: Record<FourWaveTrigger, string> = {
      deep: 'Deep processing: four-wave extraction with relationships',
      relationships: 'Relationships requested: four-wave extraction with relationships',
      large: 'Large document: four-wave extraction with relationships',
    };

    return {
      ...this.base(size),
      strategy: 'four_wave',
      estimatedTokens,
      estimatedDurationSeconds: durationSeconds,
      estimatedCost: (estimatedTokens / 1000) * profile.pricePer1kTokens,
      expectedAccuracy: accuracy,
      extractRelationships: true,
      rationale: chunking ? `${rationales[trigger]} (${chunking.numChunks} chunks)` : rationales[trigger],
      chunking,
    };
  }

  private chunkPlan(size: SizeInfo, strategy: ChunkPlan['strategy'], overlapTokens: number): ChunkPlan {
    const chunkSizeTokens = this.chunking.chunkSizeTokens;
    return {
      strategy,
      chunkSizeTokens,
      overlapTokens,
      numChunks: numChunks(size.tokens, chunkSizeTokens, overlapTokens),
    };
  }

  private base(size: SizeInfo) {
    return {
      sizeCategory: size.category,
      content: 'text' as const,
      documentChars: size.chars,
      documentTokens: size.tokens,
      extractRelationships: false,
      chunking: null,
    };
  }

  private availableContext(): number {
    return this.routing.maxContextTokens - this.routing.safetyMarginTokens;
  }

  private sizeInfo(chars: number): SizeInfo {
    const { verySmallMaxChars, smallMaxChars, mediumMaxChars, charsPerToken } = this.routing;
    const category: SizeCategory =
      chars <= verySmallMaxChars
        ? 'very_small'
        : chars <= smallMaxChars
          ? 'small'
          : chars <= mediumMaxChars
            ? 'medium'
            : 'large';
    return { chars, tokens: Math.floor(chars / charsPerToken), category };
  }
}

export const numChunks = (totalTokens: number, chunkSizeTokens: number, overlapTokens: number): number => {
  if (totalTokens <= chunkSizeTokens) return 1;
  return Math.floor(totalTokens / Math.max(1, chunkSizeTokens - overlapTokens)) + 1;
};
