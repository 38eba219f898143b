import { BaseOrchestrator, DefaultPerformanceTracker } from '@core/orchestration';
import type { PipelineStage } from '@core/orchestration';
import type { ExtractionResult } from '@services/knowledge/types';
import type { Extractors } from './extractors';
import type { ExtractionContext, ExtractionInput } from './types';
import * as ops from './operations';

/**
 * Extraction Orchestrator
 *
 * Turns one document into one ExtractionResult. Every stage is critical: a
 * gateway failure in any extractor fails the document, and the shared signal
 * stops the sibling extractor still in flight.
 */
export class ExtractionOrchestrator extends BaseOrchestrator<ExtractionContext, ExtractionResult, ExtractionInput> {
  constructor(
    private readonly extractors: Extractors,
    timeout = 0
  ) {
    super({
      name: 'ExtractionOrchestrator',
      timeout,
      enableMetrics: true,
      logErrors: false,
    });
  }

  protected async initializeContext(input: ExtractionInput, signal: AbortSignal): Promise<ExtractionContext> {
    return {
      document: input.document,
      topicOverride: input.topic,
      extractors: this.extractors,
      requestId: this.createRequestId(),
      startTime: Date.now(),
      perfTracker: new DefaultPerformanceTracker(),
      results: {},
      errors: [],
      metadata: {
        orchestrator: this.getName(),
        documentId: input.document.id,
      },
      reasonCodes: [],
      signal,
    };
  }

  protected getPipeline(): PipelineStage<ExtractionContext>[] {
    return [
      { name: 'validate-document', operation: ops.validateDocument, critical: true },
      { name: 'extract-entities-topics', operation: ops.extractEntitiesTopics, critical: true },
      { name: 'extract-events-statements', operation: ops.extractEventsStatements, critical: true },
    ];
  }

  protected buildResult(ctx: ExtractionContext): ExtractionResult {
    const { entities, topics, events, statements } = ctx;
    if (!entities || !topics || !events || !statements) {
      throw new Error('Pipeline incomplete: missing extraction output');
    }

    return {
      documentId: ctx.document.id,
      events,
      statements,
      entities,
      topics,
    };
  }
}
