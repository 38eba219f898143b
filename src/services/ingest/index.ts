import { AppError } from '@utils/errors';
import { createLogger } from '@utils/logger';
import type { ExtractionService } from '@services/extraction';
import type { KnowledgeStore } from '@services/knowledge';
import type { NewsSourceClient } from '@services/sources';
import { IngestOrchestrator } from './orchestrator';
import type { IngestInput, IngestMode, IngestResult, RecentSearch } from './types';

export type { FailedDocument, IngestInput, IngestMode, IngestResult, RecentSearch } from './types';

const logger = createLogger('ingest');

export interface IngestCallOptions {
  signal?: AbortSignal;
}

export class IngestService {
  private readonly orchestrator: IngestOrchestrator;

  constructor(
    private readonly store: KnowledgeStore,
    extraction: ExtractionService,
    private readonly source?: NewsSourceClient
  ) {
    this.orchestrator = new IngestOrchestrator(store, extraction);
  }

  get hasSource(): boolean {
    return this.source !== undefined;
  }

  async ingest(input: IngestInput, options: IngestCallOptions = {}): Promise<IngestResult> {
    const result = await this.orchestrator.execute(input, { signal: options.signal });
    if (!result.success) {
      throw result.error;
    }

    logger.info(
      {
        documents: result.data.documentsSaved,
        extracted: result.data.extracted,
        failed: result.data.failed.length,
        topics: result.data.discoveredTopics.length,
        durationMs: result.metrics?.durationMs,
      },
      'Ingest completed'
    );
    return result.data;
  }

  /** Pull recent documents from the news source, then ingest them. */
  async ingestRecent(
    search: RecentSearch,
    batch: { topic?: string; maxConcurrent?: number; mode?: IngestMode } = {},
    options: IngestCallOptions = {}
  ): Promise<IngestResult> {
    if (!this.source) {
      throw new AppError('News source is not configured. Set NYT_API_KEY in .env', 503);
    }

    const documents = await this.source.searchRecent(
      search.query,
      search.days,
      search.maxDocuments,
      search.sections,
      { signal: options.signal }
    );
    logger.info({ query: search.query, found: documents.length }, 'Documents pulled from source');
    if (documents.length === 0) {
      return { documentsSaved: 0, extracted: 0, failed: [], discoveredTopics: [], stats: await this.store.aggregateStats() };
    }
    return this.ingest({ ...batch, documents }, options);
  }
}
