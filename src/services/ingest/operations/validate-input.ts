import type { IngestContext } from '../types';
import { ValidationError } from '@utils/errors';

/**
 * ValidateInput Operation
 *
 * Checks the batch as a whole before anything is written. Per-document
 * checks happen in the store and the extraction pipeline.
 */
export async function validateInput(ctx: IngestContext): Promise<IngestContext> {
  if (ctx.documents.length === 0) {
    throw new ValidationError('No documents to ingest');
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const document of ctx.documents) {
    if (seen.has(document.id)) duplicates.add(document.id);
    seen.add(document.id);
  }
  if (duplicates.size > 0) {
    throw new ValidationError('Duplicate document ids in batch', { documentIds: [...duplicates] });
  }

  if (ctx.topic !== undefined && !ctx.topic.trim()) {
    throw new ValidationError('topic must not be blank');
  }

  if (ctx.maxConcurrent !== undefined && (!Number.isInteger(ctx.maxConcurrent) || ctx.maxConcurrent < 1)) {
    throw new ValidationError(`maxConcurrent must be a positive integer, got ${ctx.maxConcurrent}`);
  }

  ctx.reasonCodes.push('input_valid');
  return ctx;
}
