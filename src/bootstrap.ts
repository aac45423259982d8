import type { Config } from './config/index.js';
import { logger } from './utils/logger.js';
import { TokenEstimator } from './services/tokens/TokenEstimator.js';
import { ChunkingEngine } from './services/chunking/ChunkingEngine.js';
import { DocumentRouter } from './services/routing/DocumentRouter.js';
import { InferenceClientFactory } from './services/inference/InferenceClientFactory.js';
import type { InferenceClient } from './services/inference/InferenceClient.interface.js';
import { ExtractionOrchestrator } from './services/extraction/ExtractionOrchestrator.js';
import { RegexPatternMatcher } from './services/extraction/PatternMatcher.js';
import { createExtractionStore } from './services/storage/ExtractionStoreFactory.js';
import type { ExtractionStore } from './services/storage/ExtractionStore.interface.js';

export interface Services {
  config: Config;
  estimator: TokenEstimator;
  router: DocumentRouter;
  chunker: ChunkingEngine;
  client: InferenceClient;
  orchestrator: ExtractionOrchestrator;
  store: ExtractionStore | null;
}

export interface ServiceOptions {
  withStore?: boolean;
  /** Replaces the factory-built client. */
  client?: InferenceClient;
}

/**
 * Wires every component from one immutable config. Entry points call this
 * once and own the returned resources.
 */
export async function createServices(config: Config, options: ServiceOptions = {}): Promise<Services> {
  const estimator = new TokenEstimator({
    charsPerToken: config.tokens.charsPerToken,
    accurate: config.tokens.accurate,
    minCompletionTokens: config.inference.minCompletionTokens,
  });
  const router = new DocumentRouter(config.routing, config.chunking);
  const chunker = new ChunkingEngine(estimator);

  const client = options.client ?? (await InferenceClientFactory.create(config, estimator));

  const patternMatcher = config.extraction.patternMatching
    ? RegexPatternMatcher.fromFile(config.extraction.patternsFile)
    : undefined;

  const orchestrator = new ExtractionOrchestrator(
    { client, router, chunker, patternMatcher },
    config.extraction,
    config.routing.charsPerToken
  );

  const store = options.withStore === false ? null : await createExtractionStore(config.storage);

  logger.info(
    { transport: client.transport, storage: store?.backend ?? 'none', patterns: patternMatcher?.size ?? 0 },
    'Services initialized'
  );

  return { config, estimator, router, chunker, client, orchestrator, store };
}

export async function closeServices(services: Services): Promise<void> {
  await services.client.close();
  await services.store?.close();
}
