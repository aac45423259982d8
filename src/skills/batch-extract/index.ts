import { readdir, readFile, stat } from 'fs/promises';
import { join, extname } from 'path';
import { createHash } from 'crypto';
import pLimit from 'p-limit';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { DocumentRouter } from '../../services/routing/DocumentRouter.js';
import type { ExtractionOrchestrator } from '../../services/extraction/ExtractionOrchestrator.js';
import type { ExtractionStore } from '../../services/storage/ExtractionStore.interface.js';
import type { ProgressReporter } from './reporters/ProgressReporter.js';
import type { BatchConfig, BatchResult, DocumentSummary, FileInfo, PlannedFile, UnreadableFile } from './types.js';

const SUPPORTED_EXTENSIONS = new Set(['.txt', '.md']);

export interface BatchExtractorDependencies {
  router: DocumentRouter;
  /** Absent for routing-only runs. */
  orchestrator?: ExtractionOrchestrator;
  store?: ExtractionStore | null;
}

/** Identical content always maps to the same document id, so re-runs overwrite. */
export const documentIdFor = (content: string): string =>
  `doc-${createHash('sha256').update(content).digest('hex').slice(0, 16)}`;

export class BatchExtractor {
  constructor(private readonly deps: BatchExtractorDependencies) {}

  async run(config: BatchConfig, reporter: ProgressReporter): Promise<BatchResult> {
    reporter.update({ phase: 'scanning', current: 0, total: 0 });
    const files = await this.scanFolder(config.folder);
    reporter.complete(`Found ${files.length} files`);

    const planned: PlannedFile[] = [];
    const unreadable: UnreadableFile[] = [];
    const texts = new Map<string, string>();
    for (let i = 0; i < files.length; i++) {
      reporter.update({ phase: 'routing', current: i + 1, total: files.length, currentFile: files[i].name });

      let text: string;
      try {
        text = await readFile(files[i].path, 'utf-8');
      } catch (error) {
        logger.error({ file: files[i].name, error: errorMessage(error) }, 'Failed to read document');
        reporter.warn(`${files[i].name}: ${errorMessage(error)}`);
        unreadable.push({ path: files[i].path, name: files[i].name, error: errorMessage(error) });
        continue;
      }
      const decision = this.deps.router.route(text, config.route);
      const documentId = documentIdFor(text);
      texts.set(documentId, text);
      planned.push({
        ...files[i],
        documentId,
        chars: text.length,
        decision,
        warnings: this.deps.router.validateDecision(decision),
      });
    }
    reporter.complete(`Routed ${planned.length} files`);

    const result: BatchResult = {
      config,
      files: planned,
      unreadable,
      documents: [],
      summary: {
        total: files.length,
        processed: 0,
        failed: unreadable.length,
        entities: 0,
        relationships: 0,
        estimatedCost: planned.reduce((sum, file) => sum + file.decision.estimatedCost, 0),
        byStrategy: {},
      },
    };

    for (const file of planned) {
      const strategy = file.decision.strategy;
      result.summary.byStrategy[strategy] = (result.summary.byStrategy[strategy] ?? 0) + 1;
    }

    const orchestrator = this.deps.orchestrator;
    if (config.dryRun || !orchestrator) {
      return result;
    }

    const limit = pLimit(config.concurrency);
    let done = 0;
    const summaries = await Promise.all(
      planned.map((file) =>
        limit(async () => {
          const summary = await this.extractFile(orchestrator, file, texts.get(file.documentId) ?? '', config.persist);
          done++;
          reporter.update({ phase: 'extracting', current: done, total: planned.length, currentFile: file.name });
          if (summary.status === 'failed') {
            reporter.warn(`${file.name}: ${summary.error ?? 'failed'}`);
          }
          return summary;
        })
      )
    );

    result.documents = summaries;
    for (const summary of summaries) {
      if (summary.status === 'processed') {
        result.summary.processed++;
      } else {
        result.summary.failed++;
      }
      result.summary.entities += summary.entityCount;
      result.summary.relationships += summary.relationshipCount;
    }

    reporter.complete(
      `Extraction complete: ${result.summary.processed} processed, ${result.summary.failed} failed`
    );
    return result;
  }

  private async extractFile(
    orchestrator: ExtractionOrchestrator,
    file: PlannedFile,
    text: string,
    persist: boolean
  ): Promise<DocumentSummary> {
    const base = {
      documentId: file.documentId,
      fileName: file.name,
      strategy: file.decision.strategy,
    };

    try {
      const extraction = await orchestrator.extract(
        { id: file.documentId, text, metadata: { fileName: file.name } },
        { decision: file.decision }
      );
      const diagnostics = extraction.diagnostics.map((diagnostic) => diagnostic.code);
      const allFailed = extraction.diagnostics.find((diagnostic) => diagnostic.code === 'ALL_WAVES_FAILED');

      if (!allFailed && persist && this.deps.store) {
        await this.deps.store.storeChunksAndEntities(file.documentId, extraction.chunks, extraction.entities, {
          fileName: file.name,
        });
        await this.deps.store.storeRelationships(file.documentId, extraction.relationships);
      }

      return {
        ...base,
        status: allFailed ? 'failed' : 'processed',
        entityCount: extraction.entities.length,
        relationshipCount: extraction.relationships.length,
        diagnostics,
        timedOut: extraction.timedOut,
        processingTimeMs: extraction.processingTimeMs,
        error: allFailed?.message,
      };
    } catch (error) {
      logger.error({ file: file.name, error: errorMessage(error) }, 'Document extraction failed');
      return {
        ...base,
        status: 'failed',
        entityCount: 0,
        relationshipCount: 0,
        diagnostics: [],
        timedOut: false,
        processingTimeMs: 0,
        error: errorMessage(error),
      };
    }
  }

  private async scanFolder(folder: string): Promise<FileInfo[]> {
    const files: FileInfo[] = [];
    const entries = await readdir(folder, { withFileTypes: true });

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const ext = extname(entry.name).toLowerCase();
      if (!SUPPORTED_EXTENSIONS.has(ext)) continue;

      const fullPath = join(folder, entry.name);
      const stats = await stat(fullPath);
      files.push({ path: fullPath, name: entry.name, size: stats.size, extension: ext });
    }

    return files.sort((a, b) => a.name.localeCompare(b.name));
  }
}
