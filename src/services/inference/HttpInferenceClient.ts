import type OpenAI from 'openai';
import { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import pLimit from 'p-limit';
import type { BackendName, Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import {
  ConfigurationError,
  GenerationError,
  InferenceConnectionError,
} from '../../utils/errors.js';
import { withRetry } from '../../utils/retry.js';
import type {
  ChatMessage,
  EmbeddingResponse,
  InferenceRequest,
  InferenceResponse,
  TokenUsage,
} from '../../types/extraction.types.js';
import type { TokenEstimator } from '../tokens/TokenEstimator.js';
import type { InferenceClient, ClientStats } from './InferenceClient.interface.js';
import { ClientStatsTracker } from './ClientStatsTracker.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';
import { RequestPreparer, type PreparedRequest } from './RequestPreparer.js';

const toMessageParam = (message: ChatMessage) => {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
    case 'user':
      return { role: 'user' as const, content: message.content };
  }
};

/**
 * Talks to OpenAI-compatible chat completion servers, one per named backend.
 */
export class HttpInferenceClient implements InferenceClient {
  readonly transport = 'http' as const;
  private readonly stats = new ClientStatsTracker('http');
  private readonly preparer: RequestPreparer;

  constructor(
    private readonly settings: Config['inference'],
    private readonly estimator: TokenEstimator
  ) {
    this.preparer = new RequestPreparer(estimator, settings);
  }

  async initialize(): Promise<void> {
    const backend = this.settings.backends.extraction;
    try {
      await OpenAIClientFactory.getClient(backend, this.settings).models.list();
    } catch (error) {
      throw this.mapError(error, 'extraction', backend.baseUrl);
    }
    logger.info({ baseUrl: backend.baseUrl, model: backend.model }, 'HTTP inference backend reachable');
  }

  async complete(request: InferenceRequest): Promise<InferenceResponse> {
    const backendName = request.backend ?? 'extraction';
    const backend = this.backend(backendName);
    const prepared = this.preparer.prepare(request, this.preparer.contextLimit(backendName));
    const client = OpenAIClientFactory.getClient(backend, this.settings);

    const startTime = Date.now();
    try {
      const completion = await withRetry(() => this.send(client, backend.baseUrl, backend.model, prepared), {
        maxAttempts: this.settings.maxRetries,
        backoffMs: this.settings.retryBackoffMs,
        signal: prepared.signal,
        onRetry: (error, attempt) => {
          this.stats.recordRetry();
          logger.warn({ backend: backendName, attempt, error: error.message }, 'Retrying inference request');
        },
      });

      const text = completion.choices[0]?.message?.content ?? '';
      const usage: TokenUsage = completion.usage
        ? {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : this.estimateUsage(prepared.promptTokens, text);
      const latencyMs = Date.now() - startTime;

      this.stats.recordSuccess(usage, latencyMs);
      logger.debug(
        { backend: backendName, latencyMs, promptTokens: usage.promptTokens, completionTokens: usage.completionTokens },
        'Inference request completed'
      );

      return {
        text,
        usage,
        latencyMs,
        backend: backendName,
        model: backend.model,
        transport: this.transport,
        finishReason: completion.choices[0]?.finish_reason ?? undefined,
      };
    } catch (error) {
      this.stats.recordFailure();
      throw error;
    }
  }

  /**
   * Dispatches the batch concurrently so the server can batch the requests
   * itself; responses keep request order.
   */
  async completeBatch(requests: InferenceRequest[]): Promise<InferenceResponse[]> {
    this.stats.recordBatch();
    const limit = pLimit(this.settings.batchConcurrency);
    return Promise.all(requests.map((request) => limit(() => this.complete(request))));
  }

  async embed(texts: string[]): Promise<EmbeddingResponse> {
    const backend = this.backend('embeddings');
    if (texts.length === 0) {
      return { embeddings: [], model: backend.model, usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 } };
    }

    const client = OpenAIClientFactory.getClient(backend, this.settings);
    const response = await withRetry(
      async () => {
        try {
          return await client.embeddings.create({ model: backend.model, input: texts });
        } catch (error) {
          throw this.mapError(error, 'embeddings', backend.baseUrl);
        }
      },
      { maxAttempts: this.settings.maxRetries, backoffMs: this.settings.retryBackoffMs }
    );

    logger.debug({ count: texts.length, dimension: response.data[0]?.embedding.length }, 'Generated embeddings');

    return {
      embeddings: response.data.map((item) => item.embedding),
      model: backend.model,
      usage: {
        promptTokens: response.usage.prompt_tokens,
        completionTokens: 0,
        totalTokens: response.usage.total_tokens,
      },
    };
  }

  getStats(): ClientStats {
    return this.stats.snapshot();
  }

  async close(): Promise<void> {
    OpenAIClientFactory.reset();
  }

  private async send(client: OpenAI, baseUrl: string, model: string, prepared: PreparedRequest) {
    try {
      return await client.chat.completions.create(
        {
          model,
          messages: prepared.messages.map(toMessageParam),
          temperature: prepared.temperature,
          seed: prepared.seed,
          max_tokens: prepared.maxTokens,
          response_format: prepared.responseSchema
            ? {
                type: 'json_schema',
                json_schema: {
                  name: prepared.responseSchema.name,
                  schema: prepared.responseSchema.schema,
                  strict: true,
                },
              }
            : undefined,
        },
        { signal: prepared.signal }
      );
    } catch (error) {
      throw this.mapError(error, prepared.backend, baseUrl);
    }
  }

  private backend(name: BackendName) {
    const backend = this.settings.backends[name];
    if (!backend) {
      throw new ConfigurationError(`Inference backend '${name}' is not configured`, { backend: name });
    }
    return backend;
  }

  private estimateUsage(promptTokens: number, text: string): TokenUsage {
    const completionTokens = this.estimator.estimate(text);
    return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
  }

  private mapError(error: unknown, backend: BackendName, baseUrl: string): Error {
    if (error instanceof APIUserAbortError) {
      return new GenerationError(`Request to ${backend} backend aborted`, backend, undefined, false, error.message);
    }
    if (error instanceof APIConnectionError) {
      return new InferenceConnectionError(
        `Cannot reach ${backend} backend at ${baseUrl}`,
        backend,
        baseUrl,
        error.message
      );
    }
    if (error instanceof APIError) {
      const status = error.status;
      const retryable = status === undefined || status === 429 || status >= 500;
      return new GenerationError(
        `${backend} backend returned ${status ?? 'an error'}: ${error.message}`,
        backend,
        status,
        retryable,
        error.error
      );
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
