import type {
  EmbeddingResponse,
  InferenceRequest,
  InferenceResponse,
  TransportKind,
} from '../../types/extraction.types.js';

export interface ClientStats {
  transport: TransportKind;
  requests: number;
  batches: number;
  failures: number;
  retries: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  averageLatencyMs: number;
}

export interface InferenceClient {
  readonly transport: TransportKind;
  initialize(): Promise<void>;
  complete(request: InferenceRequest): Promise<InferenceResponse>;
  /** Responses come back in request order. */
  completeBatch(requests: InferenceRequest[]): Promise<InferenceResponse[]>;
  embed(texts: string[]): Promise<EmbeddingResponse>;
  getStats(): ClientStats;
  close(): Promise<void>;
}
