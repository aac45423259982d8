import type { ProcessingStrategy, RouteOptions, RoutingDecision } from '../../services/routing/types.js';

export type OutputFormat = 'table' | 'json';

export interface BatchConfig {
  folder: string;
  dryRun: boolean;
  format: OutputFormat;
  concurrency: number;
  persist: boolean;
  route: RouteOptions;
}

export interface FileInfo {
  path: string;
  name: string;
  size: number;
  extension: string;
}

export interface PlannedFile extends FileInfo {
  documentId: string;
  chars: number;
  decision: RoutingDecision;
  warnings: string[];
}

export interface UnreadableFile {
  path: string;
  name: string;
  error: string;
}

export interface BatchProgress {
  phase: 'scanning' | 'routing' | 'extracting';
  current: number;
  total: number;
  currentFile?: string;
}

export interface DocumentSummary {
  documentId: string;
  fileName: string;
  strategy: ProcessingStrategy;
  status: 'processed' | 'failed';
  entityCount: number;
  relationshipCount: number;
  diagnostics: string[];
  timedOut: boolean;
  processingTimeMs: number;
  error?: string;
}

export interface BatchResult {
  config: BatchConfig;
  files: PlannedFile[];
  /** Scanned files that could not be read; each counts as failed. */
  unreadable: UnreadableFile[];
  documents: DocumentSummary[];
  summary: {
    total: number;
    processed: number;
    failed: number;
    entities: number;
    relationships: number;
    estimatedCost: number;
    byStrategy: Partial<Record<ProcessingStrategy, number>>;
  };
}
