import { z } from 'zod';

const backendSchema = z.object({
  baseUrl: z.string().url(),
  model: z.string().min(1),
  maxContextTokens: z.number().int().positive().optional(),
});

const bandProfileSchema = z.object({
  promptTokens: z.number().int().nonnegative(),
  responseTokens: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative(),
  cost: z.number().nonnegative(),
  accuracy: z.number().min(0).max(1),
});

export const calibrationSchema = z.object({
  singlePass: bandProfileSchema.default({
    promptTokens: 5_000,
    responseTokens: 1_000,
    durationSeconds: 0.5,
    cost: 0.0038,
    accuracy: 0.87,
  }),
  threeWave: bandProfileSchema
    .extend({ chunkedAccuracy: z.number().min(0).max(1) })
    .default({
      promptTokens: 17_500,
      responseTokens: 4_096,
      durationSeconds: 1.0,
      cost: 0.0159,
      accuracy: 0.9,
      chunkedAccuracy: 0.89,
    }),
  fourWave: z
    .object({
      promptTokens: z.number().int().nonnegative(),
      responseTokens: z.number().int().nonnegative(),
      waves: z.number().int().positive(),
      pricePer1kTokens: z.number().nonnegative(),
      deep: z.object({ durationSeconds: z.number().nonnegative(), accuracy: z.number().min(0).max(1) }),
      relationships: z.object({ durationSeconds: z.number().nonnegative(), accuracy: z.number().min(0).max(1) }),
      large: z.object({ durationSeconds: z.number().nonnegative(), accuracy: z.number().min(0).max(1) }),
    })
    .default({
      promptTokens: 45_000,
      responseTokens: 6_000,
      waves: 4,
      pricePer1kTokens: 0.00075,
      deep: { durationSeconds: 180, accuracy: 0.95 },
      relationships: { durationSeconds: 150, accuracy: 0.92 },
      large: { durationSeconds: 200, accuracy: 0.95 },
    }),
  chunked: z
    .object({
      perChunkDurationSeconds: z.number().nonnegative(),
      largePerChunkDurationSeconds: z.number().nonnegative(),
      perChunkCost: z.number().nonnegative(),
      mediumAccuracy: z.number().min(0).max(1),
      largeAccuracy: z.number().min(0).max(1),
    })
    .default({
      perChunkDurationSeconds: 0.85,
      largePerChunkDurationSeconds: 1.0,
      perChunkCost: 0.0159,
      mediumAccuracy: 0.91,
      largeAccuracy: 0.92,
    }),
});

export const chunkingStrategySchema = z.enum(['fixed', 'recursive', 'structure', 'semantic']);

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().positive().default(3000),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  }),
  tokens: z.object({
    charsPerToken: z.number().positive().default(4),
    accurate: z.boolean().default(false),
  }),
  inference: z.object({
    preferredTransport: z.enum(['http', 'direct']).default('http'),
    enableFallback: z.boolean().default(true),
    apiKey: z.string().min(1).default('EMPTY'),
    seed: z.number().int().default(42),
    temperature: z.number().min(0).max(2).default(0),
    maxContextTokens: z.number().int().positive().default(32_768),
    maxCompletionTokens: z.number().int().positive().default(4_096),
    minCompletionTokens: z.number().int().positive().default(100),
    requestTimeoutMs: z.number().int().positive().default(120_000),
    maxRetries: z.number().int().positive().default(3),
    retryBackoffMs: z.array(z.number().int().nonnegative()).default([1_000, 2_000, 4_000]),
    batchConcurrency: z.number().int().positive().default(8),
    backends: z.object({
      extraction: backendSchema,
      reasoning: backendSchema.optional(),
      embeddings: backendSchema.optional(),
    }),
    direct: z.object({
      engineModule: z.string().min(1).optional(),
      model: z.string().min(1).default('local-engine'),
    }),
  }),
  accelerator: z.object({
    enabled: z.boolean().default(false),
    deviceIndex: z.number().int().nonnegative().default(0),
    warningThreshold: z.number().min(0).max(1).default(0.9),
    pollIntervalMs: z.number().int().positive().default(5_000),
    waitTimeoutSeconds: z.number().positive().default(300),
    requiredMemoryGB: z.number().nonnegative().default(2),
  }),
  chunking: z.object({
    defaultStrategy: chunkingStrategySchema.default('recursive'),
    chunkSizeTokens: z.number().int().positive().default(8_000),
    overlapTokens: z.number().int().nonnegative().default(500),
    largeDocumentOverlapTokens: z.number().int().nonnegative().default(1_000),
  }),
  routing: z.object({
    charsPerToken: z.number().positive().default(4),
    verySmallMaxChars: z.number().int().positive().default(5_000),
    smallMaxChars: z.number().int().positive().default(50_000),
    mediumMaxChars: z.number().int().positive().default(150_000),
    relationshipMinChars: z.number().int().nonnegative().default(5_000),
    largeDocumentChars: z.number().int().positive().default(20_000),
    maxContextTokens: z.number().int().positive().default(32_768),
    safetyMarginTokens: z.number().int().nonnegative().default(2_000),
    calibration: calibrationSchema.default({}),
  }),
  extraction: z.object({
    concurrency: z.number().int().positive().default(5),
    documentTimeoutMs: z.number().int().positive().default(600_000),
    minConfidence: z.number().min(0).max(1).default(0.7),
    minRelationshipConfidence: z.number().min(0).max(1).default(0.85),
    llmEnabled: z.boolean().default(true),
    patternMatching: z.boolean().default(true),
    patternsFile: z.string().min(1).optional(),
    previousEntitiesInPrompt: z.number().int().nonnegative().default(10),
    relationshipEntityLimit: z.number().int().positive().default(50),
    waves: z
      .object({
        actors: z.array(z.string().min(1)).min(1),
        citations: z.array(z.string().min(1)).min(1),
        concepts: z.array(z.string().min(1)).min(1),
      })
      .default({
        actors: ['PERSON', 'JUDGE', 'ATTORNEY', 'PARTY', 'COURT'],
        citations: ['CASE_CITATION', 'STATUTE_CITATION', 'REGULATION'],
        concepts: ['LEGAL_DOCTRINE', 'PROCEDURAL_TERM', 'LEGAL_CONCEPT'],
      }),
    relationshipTypes: z
      .array(z.string().min(1))
      .min(1)
      .default([
        'CITES',
        'PARTY_TO_CASE',
        'DECIDED_BY',
        'REPRESENTED_BY',
        'APPEALS_FROM',
        'SUBJECT_OF',
        'INVOLVES',
        'RELATED_TO',
      ]),
  }),
  storage: z.object({
    backend: z.enum(['sqlite', 'neo4j']).default('sqlite'),
    sqlitePath: z.string().min(1).default('data/extractions.db'),
    neo4j: z
      .object({
        uri: z.string().min(1),
        user: z.string().min(1),
        password: z.string().min(1),
      })
      .optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type RawConfig = z.input<typeof configSchema>;
export type RoutingCalibration = z.infer<typeof calibrationSchema>;
export type ChunkingStrategyName = z.infer<typeof chunkingStrategySchema>;
export type BackendName = keyof Config['inference']['backends'];
