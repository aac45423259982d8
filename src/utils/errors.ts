export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  readonly retryable = false;
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InferenceConnectionError extends Error {
  code = 'INFERENCE_CONNECTION_ERROR';
  readonly retryable = true;
  constructor(
    message: string,
    public readonly backend: string,
    public readonly baseUrl?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'InferenceConnectionError';
  }
}

export class GenerationError extends Error {
  code = 'GENERATION_ERROR';
  constructor(
    message: string,
    public readonly backend: string,
    public readonly status: number | undefined,
    public readonly retryable: boolean,
    public details?: unknown
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}

export interface ContextOverflowDetails {
  estimatedTokens: number;
  maxTokens: number;
  excessTokens: number;
  recommendedChunkSizeTokens: number;
  recommendedChunkCount: number;
}

export class ContextOverflowError extends Error {
  code = 'CONTEXT_OVERFLOW';
  readonly retryable = false;
  constructor(message: string, public readonly details: ContextOverflowDetails) {
    super(message);
    this.name = 'ContextOverflowError';
  }
}

export class AcceleratorMemoryError extends Error {
  code = 'ACCELERATOR_MEMORY_EXHAUSTED';
  readonly retryable = true;
  constructor(
    message: string,
    public readonly requiredGB: number,
    public readonly freeGB?: number
  ) {
    super(message);
    this.name = 'AcceleratorMemoryError';
  }
}

export class TelemetryError extends Error {
  code = 'ACCELERATOR_TELEMETRY_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'TelemetryError';
  }
}

export class BackendUnavailableError extends Error {
  code = 'BACKEND_UNAVAILABLE';
  readonly retryable = false;
  constructor(message: string, public readonly backend: string, public details?: unknown) {
    super(message);
    this.name = 'BackendUnavailableError';
  }
}

export class ResponseParseError extends Error {
  code = 'RESPONSE_PARSE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

export class PersistenceError extends Error {
  code = 'PERSISTENCE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export const isRetryable = (error: unknown): boolean =>
  error instanceof Error && 'retryable' in error && error.retryable === true;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
