import { BaseOrchestrator, DefaultPerformanceTracker } from '@core/orchestration';
import type { PipelineStage } from '@core/orchestration';
import type { ExtractionService } from '@services/extraction';
import type { KnowledgeStore } from '@services/knowledge';
import type { IngestContext, IngestInput, IngestResult } from './types';
import * as ops from './operations';

/**
 * Ingest Orchestrator
 *
 * Saves a batch of documents, extracts them, and merges the results into the
 * knowledge base. In fail-fast mode a failed extraction stops the run before
 * save-results, so no topic index sees a partial batch.
 */
export class IngestOrchestrator extends BaseOrchestrator<IngestContext, IngestResult, IngestInput> {
  constructor(
    private readonly store: KnowledgeStore,
    private readonly extraction: ExtractionService
  ) {
    super({
      name: 'IngestOrchestrator',
      timeout: 0,
      enableMetrics: true,
      logErrors: true,
    });
  }

  protected async initializeContext(input: IngestInput, signal: AbortSignal): Promise<IngestContext> {
    return {
      documents: input.documents,
      topic: input.topic,
      maxConcurrent: input.maxConcurrent,
      mode: input.mode ?? 'fail-fast',
      store: this.store,
      extraction: this.extraction,
      documentsSaved: 0,
      failed: [],
      discoveredTopics: [],
      requestId: this.createRequestId(),
      startTime: Date.now(),
      perfTracker: new DefaultPerformanceTracker(),
      results: {},
      errors: [],
      metadata: {
        orchestrator: this.getName(),
        documentCount: input.documents.length,
        mode: input.mode ?? 'fail-fast',
      },
      reasonCodes: [],
      signal,
    };
  }

  protected getPipeline(): PipelineStage<IngestContext>[] {
    return [
      { name: 'validate-input', operation: ops.validateInput, critical: true },
      { name: 'save-documents', operation: ops.saveDocuments, critical: true },
      { name: 'extract-batch', operation: ops.extractBatch, critical: true },
      { name: 'save-results', operation: ops.saveResults, critical: true },
    ];
  }

  protected buildResult(ctx: IngestContext): IngestResult {
    if (!ctx.extracted || !ctx.stats) {
      throw new Error('Pipeline incomplete: missing ingest output');
    }

    return {
      documentsSaved: ctx.documentsSaved,
      extracted: ctx.extracted.length,
      failed: ctx.failed,
      discoveredTopics: ctx.discoveredTopics,
      stats: ctx.stats,
    };
  }
}
