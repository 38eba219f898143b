import type { OperationContext } from '@core/orchestration';
import type { ExtractionError } from '@utils/errors';
import type { Document, Entity, Event, ExtractionResult, Statement, TopicRef } from '@services/knowledge/types';
import type { Extractors } from '../extractors';

/**
 * Extraction Service Types
 */

export interface ExtractionInput {
  document: Document;
  /** Skip topic discovery and file the document under this topic */
  topic?: string;
}

export interface ExtractionContext extends OperationContext {
  document: Document;
  topicOverride?: string;
  extractors: Extractors;

  // Pipeline outputs
  entities?: Entity[];
  topics?: TopicRef[];
  events?: Event[];
  statements?: Statement[];
}

export interface ExtractOptions {
  topic?: string;
  signal?: AbortSignal;
}

export interface BatchOptions extends ExtractOptions {
  maxConcurrent?: number;
}

export type BatchOutcome =
  | { documentId: string; status: 'fulfilled'; result: ExtractionResult }
  | { documentId: string; status: 'rejected'; error: ExtractionError };
