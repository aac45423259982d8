import OpenAI from 'openai';
import type { Config } from '../../config/index.js';

type BackendConfig = Config['inference']['backends']['extraction'];

/**
 * One SDK client per backend base URL. Retries are handled by
 * `HttpInferenceClient`, so the SDK's own retry loop is disabled.
 */
export class OpenAIClientFactory {
  private static instances = new Map<string, OpenAI>();

  static getClient(backend: BackendConfig, settings: Config['inference']): OpenAI {
    const existing = this.instances.get(backend.baseUrl);
    if (existing) {
      return existing;
    }

    const client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: backend.baseUrl,
      timeout: settings.requestTimeoutMs,
      maxRetries: 0,
    });

    this.instances.set(backend.baseUrl, client);
    return client;
  }

  static reset(): void {
    this.instances.clear();
  }
}
