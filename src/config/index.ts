import { readFileSync } from 'fs';
import { ZodError } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { configSchema, type Config, type RawConfig } from './validation.js';

export type { Config, BackendName, ChunkingStrategyName, RoutingCalibration } from './validation.js';

type Env = Record<string, string | undefined>;

const int = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const float = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

const bool = (value: string | undefined): boolean | undefined =>
  value === undefined || value === '' ? undefined : ['1', 'true', 'yes'].includes(value.toLowerCase());

const list = (value: string | undefined): string[] | undefined =>
  value
    ? value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean)
    : undefined;

const intList = (value: string | undefined): number[] | undefined =>
  list(value)?.map((item) => parseInt(item, 10));

const backend = (prefix: string, env: Env) => {
  const baseUrl = env[`${prefix}_BASE_URL`];
  if (!baseUrl) return undefined;
  return {
    baseUrl,
    model: env[`${prefix}_MODEL`] ?? '',
    maxContextTokens: int(env[`${prefix}_MAX_CONTEXT_TOKENS`]),
  };
};

const readCalibration = (path: string | undefined): unknown => {
  if (!path) return undefined;
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read routing calibration file ${path}`, error);
  }
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
};

/**
 * Builds the immutable process configuration from environment variables.
 * Called once by each entry point; components receive the result through
 * their constructors.
 */
export function loadConfig(env: Env = process.env): Config {
  const waves =
    env.WAVE_ACTOR_TYPES || env.WAVE_CITATION_TYPES || env.WAVE_CONCEPT_TYPES
      ? {
          actors: list(env.WAVE_ACTOR_TYPES) ?? ['PERSON', 'JUDGE', 'ATTORNEY', 'PARTY', 'COURT'],
          citations: list(env.WAVE_CITATION_TYPES) ?? ['CASE_CITATION', 'STATUTE_CITATION', 'REGULATION'],
          concepts: list(env.WAVE_CONCEPT_TYPES) ?? ['LEGAL_DOCTRINE', 'PROCEDURAL_TERM', 'LEGAL_CONCEPT'],
        }
      : undefined;

  const rawConfig = {
    server: {
      nodeEnv: env.NODE_ENV,
      host: env.HOST,
      port: int(env.PORT),
      logLevel: env.LOG_LEVEL,
    },
    tokens: {
      charsPerToken: float(env.CHARS_PER_TOKEN),
      accurate: bool(env.ACCURATE_TOKEN_COUNT),
    },
    inference: {
      preferredTransport: env.INFERENCE_TRANSPORT,
      enableFallback: bool(env.INFERENCE_FALLBACK),
      apiKey: env.INFERENCE_API_KEY,
      seed: int(env.INFERENCE_SEED),
      temperature: float(env.INFERENCE_TEMPERATURE),
      maxContextTokens: int(env.MAX_CONTEXT_TOKENS),
      maxCompletionTokens: int(env.MAX_COMPLETION_TOKENS),
      minCompletionTokens: int(env.MIN_COMPLETION_TOKENS),
      requestTimeoutMs: int(env.INFERENCE_TIMEOUT_MS),
      maxRetries: int(env.INFERENCE_MAX_RETRIES),
      retryBackoffMs: intList(env.INFERENCE_RETRY_BACKOFF_MS),
      batchConcurrency: int(env.INFERENCE_BATCH_CONCURRENCY),
      backends: {
        extraction: backend('EXTRACTION', env) ?? {
          baseUrl: 'http://localhost:8080/v1',
          model: 'extraction-model',
        },
        reasoning: backend('REASONING', env),
        embeddings: backend('EMBEDDINGS', env),
      },
      direct: {
        engineModule: env.DIRECT_ENGINE_MODULE,
        model: env.DIRECT_ENGINE_MODEL,
      },
    },
    accelerator: {
      enabled: bool(env.ACCELERATOR_MONITOR),
      deviceIndex: int(env.ACCELERATOR_DEVICE),
      warningThreshold: float(env.ACCELERATOR_WARNING_THRESHOLD),
      pollIntervalMs: int(env.ACCELERATOR_POLL_MS),
      waitTimeoutSeconds: float(env.ACCELERATOR_WAIT_TIMEOUT_SECONDS),
      requiredMemoryGB: float(env.ACCELERATOR_REQUIRED_GB),
    },
    chunking: {
      defaultStrategy: env.CHUNKING_STRATEGY,
      chunkSizeTokens: int(env.CHUNK_SIZE_TOKENS),
      overlapTokens: int(env.CHUNK_OVERLAP_TOKENS),
      largeDocumentOverlapTokens: int(env.LARGE_DOC_OVERLAP_TOKENS),
    },
    routing: {
      charsPerToken: float(env.ROUTING_CHARS_PER_TOKEN),
      verySmallMaxChars: int(env.ROUTING_VERY_SMALL_CHARS),
      smallMaxChars: int(env.ROUTING_SMALL_CHARS),
      mediumMaxChars: int(env.ROUTING_MEDIUM_CHARS),
      relationshipMinChars: int(env.ROUTING_RELATIONSHIP_MIN_CHARS),
      largeDocumentChars: int(env.ROUTING_LARGE_DOCUMENT_CHARS),
      maxContextTokens: int(env.MAX_CONTEXT_TOKENS),
      safetyMarginTokens: int(env.ROUTING_SAFETY_MARGIN_TOKENS),
      calibration: readCalibration(env.ROUTING_CALIBRATION_FILE),
    },
    extraction: {
      concurrency: int(env.EXTRACTION_CONCURRENCY),
      documentTimeoutMs: int(env.DOCUMENT_TIMEOUT_MS),
      minConfidence: float(env.MIN_ENTITY_CONFIDENCE),
      minRelationshipConfidence: float(env.MIN_RELATIONSHIP_CONFIDENCE),
      llmEnabled: bool(env.LLM_EXTRACTION),
      patternMatching: bool(env.PATTERN_MATCHING),
      patternsFile: env.PATTERNS_FILE,
      previousEntitiesInPrompt: int(env.PREVIOUS_ENTITIES_IN_PROMPT),
      relationshipEntityLimit: int(env.RELATIONSHIP_ENTITY_LIMIT),
      waves,
      relationshipTypes: list(env.RELATIONSHIP_TYPES),
    },
    storage: {
      backend: env.STORAGE_BACKEND,
      sqlitePath: env.SQLITE_PATH,
      neo4j: env.NEO4J_URI
        ? {
            uri: env.NEO4J_URI,
            user: env.NEO4J_USER ?? '',
            password: env.NEO4J_PASSWORD ?? '',
          }
        : undefined,
    },
  };

  try {
    const parsed = configSchema.parse(rawConfig);
    return deepFreeze(parsed);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError('Invalid configuration', issues);
    }
    throw error;
  }
}

/**
 * Test and tooling helper: validates a partial raw shape with every other
 * setting at its default.
 */
export function buildConfig(overrides: Partial<RawConfig> = {}): Config {
  const base: RawConfig = {
    server: { nodeEnv: 'test' },
    tokens: {},
    inference: {
      backends: { extraction: { baseUrl: 'http://localhost:8080/v1', model: 'extraction-model' } },
      direct: {},
    },
    accelerator: {},
    chunking: {},
    routing: {},
    extraction: {},
    storage: {},
  };
  return deepFreeze(configSchema.parse({ ...base, ...overrides }));
}
