import type {
  Chunk,
  ExtractedEntity,
  Relationship,
  TokenUsage,
  WaveName,
} from '../../types/extraction.types.js';
import type { RouteOptions, RoutingDecision } from '../routing/types.js';

export type WaveStatus = 'ok' | 'repaired' | 'parse_failed' | 'failed' | 'skipped';

export interface WaveOutcome {
  wave: WaveName;
  /** Null when the document was processed whole. */
  chunkId: string | null;
  status: WaveStatus;
  entityCount: number;
  relationshipCount?: number;
  usage?: TokenUsage;
  error?: string;
}

export type DiagnosticCode =
  | 'WAVE_FAILED'
  | 'PARSE_FAILED'
  | 'RELATIONSHIP_WAVE_FAILED'
  | 'RELATIONSHIPS_REJECTED'
  | 'DOCUMENT_TIMEOUT'
  | 'DOCUMENT_SKIPPED'
  | 'ALL_WAVES_FAILED';

export interface ExtractionDiagnostic {
  code: DiagnosticCode;
  message: string;
  wave?: WaveName;
  chunkId?: string | null;
  details?: unknown;
}

export interface ExtractionResult {
  documentId: string;
  decision: RoutingDecision;
  entities: ExtractedEntity[];
  relationships: Relationship[];
  chunks: Chunk[];
  waves: WaveOutcome[];
  diagnostics: ExtractionDiagnostic[];
  usage: TokenUsage;
  processingTimeMs: number;
  timedOut: boolean;
}

export interface ExtractOptions {
  route?: RouteOptions;
  /** Skips routing when the caller already has a decision. */
  decision?: RoutingDecision;
  signal?: AbortSignal;
}
