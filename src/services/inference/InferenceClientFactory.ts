import type { Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { BackendUnavailableError, errorMessage } from '../../utils/errors.js';
import type { TransportKind } from '../../types/extraction.types.js';
import type { TokenEstimator } from '../tokens/TokenEstimator.js';
import { AcceleratorMonitor } from '../monitoring/AcceleratorMonitor.js';
import { NvidiaSmiTelemetrySource } from '../monitoring/TelemetrySource.js';
import type { InferenceClient } from './InferenceClient.interface.js';
import type { EngineLoader } from './InferenceEngine.interface.js';
import { HttpInferenceClient } from './HttpInferenceClient.js';
import { DirectInferenceClient } from './DirectInferenceClient.js';
import { FailoverInferenceClient } from './FailoverInferenceClient.js';

export interface InferenceClientFactoryOptions {
  engineLoader?: EngineLoader;
  monitor?: AcceleratorMonitor;
}

export class InferenceClientFactory {
  /**
   * Initializes the preferred transport, falling back to the other one when
   * that fails and fallback is enabled. The returned client keeps the other
   * transport as a lazily initialized standby.
   */
  static async create(
    config: Config,
    estimator: TokenEstimator,
    options: InferenceClientFactoryOptions = {}
  ): Promise<InferenceClient> {
    const settings = config.inference;
    const monitor =
      options.monitor ??
      (config.accelerator.enabled ? new AcceleratorMonitor(new NvidiaSmiTelemetrySource(), config.accelerator) : undefined);

    const clients: Record<TransportKind, InferenceClient> = {
      http: new HttpInferenceClient(settings, estimator),
      direct: new DirectInferenceClient(settings, estimator, {
        engineLoader: options.engineLoader,
        monitor,
        requiredMemoryGB: config.accelerator.requiredMemoryGB,
        waitTimeoutSeconds: config.accelerator.waitTimeoutSeconds,
      }),
    };

    const preferred = settings.preferredTransport;
    const alternate: TransportKind = preferred === 'http' ? 'direct' : 'http';

    try {
      await clients[preferred].initialize();
      logger.info({ transport: preferred }, 'Inference client initialized');
      return new FailoverInferenceClient(clients[preferred], settings.enableFallback ? clients[alternate] : null);
    } catch (error) {
      if (!settings.enableFallback) {
        throw error;
      }
      logger.warn(
        { preferred, fallback: alternate, error: errorMessage(error) },
        'Preferred inference transport failed to initialize, falling back'
      );

      try {
        await clients[alternate].initialize();
      } catch (fallbackError) {
        throw new BackendUnavailableError(
          `No inference transport could be initialized: ${errorMessage(error)}; ${errorMessage(fallbackError)}`,
          'extraction',
          { transports: [preferred, alternate] }
        );
      }

      logger.info({ transport: alternate }, 'Inference client initialized');
      return new FailoverInferenceClient(clients[alternate], clients[preferred]);
    }
  }
}
