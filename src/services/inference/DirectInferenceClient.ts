import type { Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import {
  AcceleratorMemoryError,
  ConfigurationError,
  GenerationError,
  TelemetryError,
  errorMessage,
} from '../../utils/errors.js';
import { withRetry } from '../../utils/retry.js';
import type {
  EmbeddingResponse,
  InferenceRequest,
  InferenceResponse,
  TokenUsage,
} from '../../types/extraction.types.js';
import type { TokenEstimator } from '../tokens/TokenEstimator.js';
import type { AcceleratorMonitor } from '../monitoring/AcceleratorMonitor.js';
import type { ClientStats, InferenceClient } from './InferenceClient.interface.js';
import { ClientStatsTracker } from './ClientStatsTracker.js';
import { RequestPreparer } from './RequestPreparer.js';
import { moduleEngineLoader, type EngineLoader, type InferenceEngine } from './InferenceEngine.interface.js';

export interface DirectClientOptions {
  engineLoader?: EngineLoader;
  monitor?: AcceleratorMonitor;
  requiredMemoryGB: number;
  waitTimeoutSeconds: number;
}

/**
 * In-process transport: requests go straight to a loaded engine, batches are
 * handed over whole.
 */
export class DirectInferenceClient implements InferenceClient {
  readonly transport = 'direct' as const;
  private readonly stats = new ClientStatsTracker('direct');
  private readonly preparer: RequestPreparer;
  private readonly loader: EngineLoader | undefined;
  private engine: InferenceEngine | null = null;

  constructor(
    private readonly settings: Config['inference'],
    private readonly estimator: TokenEstimator,
    private readonly options: DirectClientOptions
  ) {
    this.preparer = new RequestPreparer(estimator, settings);
    this.loader =
      options.engineLoader ??
      (settings.direct.engineModule
        ? moduleEngineLoader(settings.direct.engineModule, settings.direct.model)
        : undefined);
  }

  async initialize(): Promise<void> {
    if (this.engine) return;
    if (!this.loader) {
      throw new ConfigurationError('No in-process inference engine configured');
    }
    this.engine = await this.loader();
    logger.info({ model: this.engine.modelName }, 'In-process inference engine loaded');
  }

  async complete(request: InferenceRequest): Promise<InferenceResponse> {
    const [response] = await this.generate([request]);
    return response;
  }

  async completeBatch(requests: InferenceRequest[]): Promise<InferenceResponse[]> {
    if (requests.length === 0) return [];
    this.stats.recordBatch();
    return this.generate(requests);
  }

  async embed(texts: string[]): Promise<EmbeddingResponse> {
    const engine = this.requireEngine();
    if (!engine.embed) {
      throw new ConfigurationError(`Engine ${engine.modelName} does not support embeddings`);
    }
    const embeddings = await engine.embed(texts);
    const promptTokens = texts.reduce((sum, text) => sum + this.estimator.estimate(text), 0);
    return {
      embeddings,
      model: engine.modelName,
      usage: { promptTokens, completionTokens: 0, totalTokens: promptTokens },
    };
  }

  getStats(): ClientStats {
    return this.stats.snapshot();
  }

  async close(): Promise<void> {
    await this.engine?.close?.();
    this.engine = null;
  }

  private async generate(requests: InferenceRequest[]): Promise<InferenceResponse[]> {
    const engine = this.requireEngine();
    const prepared = requests.map((request) => this.preparer.prepare(request, this.settings.maxContextTokens));

    await this.ensureMemory();

    const signals = prepared.map((request) => request.signal);
    const startTime = Date.now();

    try {
      const generations = await withRetry(
        async () => {
          if (signals.some((signal) => signal?.aborted)) {
            throw new GenerationError('Request aborted', 'direct', undefined, false);
          }
          try {
            return await engine.generate(
              prepared.map((request) => request.messages),
              prepared.map((request) => ({
                temperature: request.temperature,
                seed: request.seed,
                maxTokens: request.maxTokens,
                responseSchema: request.responseSchema,
              }))
            );
          } catch (error) {
            throw new GenerationError(`Engine generation failed: ${errorMessage(error)}`, 'direct', undefined, true);
          }
        },
        {
          maxAttempts: this.settings.maxRetries,
          backoffMs: this.settings.retryBackoffMs,
          onRetry: (error, attempt) => {
            this.stats.recordRetry();
            logger.warn({ attempt, error: error.message }, 'Retrying in-process generation');
          },
        }
      );

      if (generations.length !== prepared.length) {
        throw new GenerationError(
          `Engine returned ${generations.length} generations for ${prepared.length} prompts`,
          'direct',
          undefined,
          false
        );
      }

      const latencyMs = Date.now() - startTime;
      return generations.map((generation, i) => {
        const request = prepared[i];
        const completionTokens = generation.completionTokens ?? this.estimator.estimate(generation.text);
        const promptTokens = generation.promptTokens ?? request.promptTokens;
        const usage: TokenUsage = { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
        this.stats.recordSuccess(usage, latencyMs);
        return {
          text: generation.text,
          usage,
          latencyMs,
          backend: request.backend,
          model: engine.modelName,
          transport: this.transport,
          finishReason: generation.finishReason,
        };
      });
    } catch (error) {
      this.stats.recordFailure();
      throw error;
    }
  }

  private async ensureMemory(): Promise<void> {
    const monitor = this.options.monitor;
    if (!monitor) return;

    const required = this.options.requiredMemoryGB;
    let available: boolean;
    try {
      available = await monitor.waitForMemory(required, this.options.waitTimeoutSeconds);
    } catch (error) {
      if (error instanceof TelemetryError) {
        logger.warn({ error: error.message }, 'Accelerator telemetry unavailable, generating without memory check');
        return;
      }
      throw error;
    }

    if (!available) {
      const freeMB = monitor.lastReading?.memoryFreeMB;
      throw new AcceleratorMemoryError(
        `Accelerator memory below ${required} GB after ${this.options.waitTimeoutSeconds}s`,
        required,
        freeMB === undefined ? undefined : freeMB / 1024
      );
    }
  }

  private requireEngine(): InferenceEngine {
    if (!this.engine) {
      throw new ConfigurationError('In-process inference client used before initialize()');
    }
    return this.engine;
  }
}
