import type { OperationContext } from '@core/orchestration';
import type { ExtractionService } from '@services/extraction';
import type { KnowledgeStore } from '@services/knowledge';
import type { Document, ExtractionResult, StoreStats } from '@services/knowledge/types';

/**
 * Ingest Service Types
 */

/** `fail-fast` merges nothing if any document fails; `partial` merges the successes. */
export type IngestMode = 'fail-fast' | 'partial';

export interface IngestInput {
  documents: Document[];
  /** File every document under this topic as well as the ones discovered */
  topic?: string;
  maxConcurrent?: number;
  mode?: IngestMode;
}

export interface FailedDocument {
  documentId: string;
  message: string;
  statusCode: number;
}

export interface IngestResult {
  documentsSaved: number;
  extracted: number;
  failed: FailedDocument[];
  /** Topics touched by this run, in first-merge order */
  discoveredTopics: string[];
  stats: StoreStats;
}

export interface IngestContext extends OperationContext {
  documents: Document[];
  topic?: string;
  maxConcurrent?: number;
  mode: IngestMode;
  store: KnowledgeStore;
  extraction: ExtractionService;

  // Pipeline outputs
  documentsSaved: number;
  extracted?: ExtractionResult[];
  failed: FailedDocument[];
  discoveredTopics: string[];
  stats?: StoreStats;
}

export interface RecentSearch {
  query?: string;
  days?: number;
  maxDocuments?: number;
  sections?: string[];
}
