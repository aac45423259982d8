import { logger } from '../../utils/logger.js';
import { BackendUnavailableError, InferenceConnectionError, errorMessage } from '../../utils/errors.js';
import type {
  EmbeddingResponse,
  InferenceRequest,
  InferenceResponse,
  TransportKind,
} from '../../types/extraction.types.js';
import type { ClientStats, InferenceClient } from './InferenceClient.interface.js';

/**
 * Routes calls to the active transport and switches to the standby one when
 * the active transport cannot be reached.
 *
 * Only failures of the extraction and embeddings backends switch transports.
 * An unreachable reasoning backend is reported to the caller, which falls back
 * to the extraction backend on the same transport.
 */
export class FailoverInferenceClient implements InferenceClient {
  private readonly initializations = new Map<InferenceClient, Promise<void>>();

  /** `active` must already be initialized. */
  constructor(
    private active: InferenceClient,
    private standby: InferenceClient | null
  ) {
    this.initializations.set(active, Promise.resolve());
  }

  get transport(): TransportKind {
    return this.active.transport;
  }

  async initialize(): Promise<void> {
    await this.ensureInitialized(this.active);
  }

  complete(request: InferenceRequest): Promise<InferenceResponse> {
    return this.withFailover((client) => client.complete(request));
  }

  completeBatch(requests: InferenceRequest[]): Promise<InferenceResponse[]> {
    return this.withFailover((client) => client.completeBatch(requests));
  }

  embed(texts: string[]): Promise<EmbeddingResponse> {
    return this.withFailover((client) => client.embed(texts));
  }

  getStats(): ClientStats {
    return this.active.getStats();
  }

  async close(): Promise<void> {
    await this.active.close();
    if (this.standby && this.initializations.has(this.standby)) {
      await this.standby.close();
    }
  }

  private async withFailover<T>(call: (client: InferenceClient) => Promise<T>): Promise<T> {
    const used = this.active;
    try {
      return await call(used);
    } catch (error) {
      if (!(error instanceof InferenceConnectionError) || error.backend === 'reasoning') {
        throw error;
      }

      const target = await this.switchFrom(used, error);
      try {
        return await call(target);
      } catch (retryError) {
        if (retryError instanceof InferenceConnectionError) {
          throw new BackendUnavailableError(retryError.message, retryError.backend, {
            transports: [used.transport, target.transport],
          });
        }
        throw retryError;
      }
    }
  }

  /**
   * Returns the transport to retry on after `used` failed. Requests that were
   * in flight on `used` when another request already switched retry on the
   * current active transport.
   */
  private async switchFrom(used: InferenceClient, error: InferenceConnectionError): Promise<InferenceClient> {
    if (this.active !== used) {
      return this.active;
    }

    const standby = this.standby;
    if (!standby) {
      throw new BackendUnavailableError(error.message, error.backend, { transport: used.transport });
    }

    try {
      await this.ensureInitialized(standby);
    } catch (initError) {
      throw new BackendUnavailableError(
        `No inference transport available: ${error.message}; standby: ${errorMessage(initError)}`,
        error.backend,
        { transports: [used.transport, standby.transport] }
      );
    }

    if (this.active === used) {
      logger.warn(
        { from: used.transport, to: standby.transport, backend: error.backend, error: error.message },
        'Inference transport unreachable, switching to standby'
      );
      this.active = standby;
      this.standby = used;
    }
    return this.active;
  }

  /** Concurrent callers share one initialization; a failed one is retried next time. */
  private async ensureInitialized(client: InferenceClient): Promise<void> {
    let pending = this.initializations.get(client);
    if (!pending) {
      pending = client.initialize();
      this.initializations.set(client, pending);
    }

    try {
      await pending;
    } catch (error) {
      if (this.initializations.get(client) === pending) {
        this.initializations.delete(client);
      }
      throw error;
    }
  }
}
