import type { BackendName, Config } from '../../config/index.js';
import type { ChatMessage, InferenceRequest, ResponseSchema } from '../../types/extraction.types.js';
import type { TokenEstimator } from '../tokens/TokenEstimator.js';

export interface PreparedRequest {
  backend: BackendName;
  messages: ChatMessage[];
  temperature: number;
  seed: number | undefined;
  maxTokens: number;
  promptTokens: number;
  responseSchema?: ResponseSchema;
  signal?: AbortSignal;
}

/**
 * Shared by both transports so that reproducibility and the context guard
 * apply before any request leaves the process.
 */
export class RequestPreparer {
  constructor(
    private readonly estimator: TokenEstimator,
    private readonly settings: Config['inference']
  ) {}

  prepare(request: InferenceRequest, contextLimit: number): PreparedRequest {
    const reproducible = request.reproducible !== false;
    const promptTokens = this.estimator.estimateMessages(request.messages);
    const budget = this.estimator.fitCompletion(
      promptTokens,
      request.maxTokens ?? this.settings.maxCompletionTokens,
      contextLimit
    );

    return {
      backend: request.backend ?? 'extraction',
      messages: request.messages,
      temperature: reproducible ? this.settings.temperature : request.temperature ?? this.settings.temperature,
      seed: reproducible ? this.settings.seed : request.seed,
      maxTokens: budget.completionTokens,
      promptTokens,
      responseSchema: request.responseSchema,
      signal: request.signal,
    };
  }

  contextLimit(backend: BackendName): number {
    return this.settings.backends[backend]?.maxContextTokens ?? this.settings.maxContextTokens;
  }
}
