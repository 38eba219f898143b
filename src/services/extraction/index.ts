import { Semaphore } from '@core/concurrency';
import { ExtractionError } from '@utils/errors';
import { createLogger } from '@utils/logger';
import type { GenerationGateway } from '@services/generation';
import type { Document, ExtractionResult } from '@services/knowledge/types';
import { createExtractors } from './extractors';
import { ExtractionOrchestrator } from './orchestrator';
import type { BatchOptions, BatchOutcome, ExtractOptions } from './types';

export type { BatchOptions, BatchOutcome, ExtractOptions } from './types';
export { documentText } from './helpers';

const logger = createLogger('extraction');

export interface ExtractionServiceOptions {
  /** Default cap on in-flight documents per batch */
  maxConcurrent: number;
  /** Per-document timeout in ms; 0 disables */
  timeoutMs: number;
}

function linkSignal(controller: AbortController, external?: AbortSignal): () => void {
  if (!external) return () => {};
  const onAbort = (): void => controller.abort(external.reason);
  if (external.aborted) onAbort();
  else external.addEventListener('abort', onAbort, { once: true });
  return () => external.removeEventListener('abort', onAbort);
}

export class ExtractionService {
  private readonly orchestrator: ExtractionOrchestrator;

  constructor(
    gateway: GenerationGateway,
    private readonly options: ExtractionServiceOptions
  ) {
    this.orchestrator = new ExtractionOrchestrator(createExtractors(gateway), options.timeoutMs);
  }

  async extractOne(document: Document, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const result = await this.orchestrator.execute({ document, topic: options.topic }, { signal: options.signal });
    if (!result.success) {
      throw new ExtractionError(document.id, result.error);
    }

    logger.debug({ documentId: document.id, metrics: result.metrics }, 'Document extracted');
    return result.data;
  }

  /**
   * Fail-fast batch. Results follow input order. The first failure aborts the
   * batch: queued documents never start and in-flight ones stop at their next
   * gateway call. The error names the document that failed first.
   */
  async extractBatch(documents: Document[], options: BatchOptions = {}): Promise<ExtractionResult[]> {
    const controller = new AbortController();
    const unlink = linkSignal(controller, options.signal);
    const semaphore = new Semaphore(options.maxConcurrent ?? this.options.maxConcurrent);
    let firstFailure: ExtractionError | undefined;

    logger.info({ documents: documents.length, maxConcurrent: options.maxConcurrent ?? this.options.maxConcurrent }, 'Batch started');

    try {
      const results = await Promise.all(
        documents.map((document) =>
          semaphore.use(async () => {
            try {
              return await this.extractOne(document, { topic: options.topic, signal: controller.signal });
            } catch (error) {
              if (!controller.signal.aborted && error instanceof ExtractionError) {
                firstFailure = error;
                controller.abort(error);
              }
              throw error;
            }
          }, controller.signal)
        )
      );
      logger.info({ documents: results.length }, 'Batch completed');
      return results;
    } catch (error) {
      logger.error({ err: firstFailure ?? error }, 'Batch aborted');
      throw firstFailure ?? error;
    } finally {
      unlink();
    }
  }

  /** Partial batch: one outcome per input document, in input order. Never rejects. */
  async extractBatchSettled(documents: Document[], options: BatchOptions = {}): Promise<BatchOutcome[]> {
    const semaphore = new Semaphore(options.maxConcurrent ?? this.options.maxConcurrent);

    const outcomes = await Promise.all(
      documents.map(async (document): Promise<BatchOutcome> => {
        try {
          const result = await semaphore.use(
            () => this.extractOne(document, { topic: options.topic, signal: options.signal }),
            options.signal
          );
          return { documentId: document.id, status: 'fulfilled', result };
        } catch (error) {
          const failure = error instanceof ExtractionError ? error : new ExtractionError(document.id, error);
          return { documentId: document.id, status: 'rejected', error: failure };
        }
      })
    );

    const failed = outcomes.filter((outcome) => outcome.status === 'rejected').length;
    logger.info({ documents: documents.length, failed }, 'Partial batch completed');
    return outcomes;
  }
}
