import { pathToFileURL } from 'url';
import { resolve } from 'path';
import { ConfigurationError } from '../../utils/errors.js';
import type { ChatMessage, ResponseSchema } from '../../types/extraction.types.js';

export interface GenerationParams {
  temperature: number;
  seed: number | undefined;
  maxTokens: number;
  responseSchema?: ResponseSchema;
}

export interface Generation {
  text: string;
  promptTokens?: number;
  completionTokens?: number;
  finishReason?: string;
}

/**
 * A model loaded into this process. `generate` receives the whole batch so
 * the engine can schedule it natively.
 */
export interface InferenceEngine {
  readonly modelName: string;
  generate(prompts: ChatMessage[][], params: GenerationParams[]): Promise<Generation[]>;
  embed?(texts: string[]): Promise<number[][]>;
  close?(): Promise<void>;
}

export type EngineLoader = () => Promise<InferenceEngine>;

export const isInferenceEngine = (value: unknown): value is InferenceEngine =>
  typeof value === 'object' &&
  value !== null &&
  'modelName' in value &&
  typeof value.modelName === 'string' &&
  'generate' in value &&
  typeof value.generate === 'function';

/**
 * Loads an engine from a module exporting `createEngine({ model })`.
 */
export function moduleEngineLoader(modulePath: string, model: string): EngineLoader {
  return async () => {
    const loaded: unknown = await import(pathToFileURL(resolve(modulePath)).href);
    if (
      typeof loaded !== 'object' ||
      loaded === null ||
      !('createEngine' in loaded) ||
      typeof loaded.createEngine !== 'function'
    ) {
      throw new ConfigurationError(`Engine module ${modulePath} does not export createEngine`);
    }

    const engine: unknown = await loaded.createEngine({ model });
    if (!isInferenceEngine(engine)) {
      throw new ConfigurationError(`createEngine in ${modulePath} did not return an inference engine`);
    }
    return engine;
  };
}
