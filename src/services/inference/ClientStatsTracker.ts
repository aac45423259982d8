import type { TokenUsage, TransportKind } from '../../types/extraction.types.js';
import type { ClientStats } from './InferenceClient.interface.js';

export class ClientStatsTracker {
  private requests = 0;
  private batches = 0;
  private failures = 0;
  private retries = 0;
  private promptTokens = 0;
  private completionTokens = 0;
  private totalLatencyMs = 0;

  constructor(private readonly transport: TransportKind) {}

  recordSuccess(usage: TokenUsage, latencyMs: number): void {
    this.requests++;
    this.promptTokens += usage.promptTokens;
    this.completionTokens += usage.completionTokens;
    this.totalLatencyMs += latencyMs;
  }

  recordBatch(): void {
    this.batches++;
  }

  recordFailure(): void {
    this.failures++;
  }

  recordRetry(): void {
    this.retries++;
  }

  snapshot(): ClientStats {
    return {
      transport: this.transport,
      requests: this.requests,
      batches: this.batches,
      failures: this.failures,
      retries: this.retries,
      promptTokens: this.promptTokens,
      completionTokens: this.completionTokens,
      totalTokens: this.promptTokens + this.completionTokens,
      averageLatencyMs: this.requests > 0 ? this.totalLatencyMs / this.requests : 0,
    };
  }
}
