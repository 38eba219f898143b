import type { ExtractionContext } from '../types';
import { ValidationError } from '@utils/errors';
import { parseTimestamp } from '../helpers';

/**
 * ValidateDocument Operation
 *
 * Rejects documents that cannot anchor facts: no id, no text, or no usable
 * publication time.
 */
export async function validateDocument(ctx: ExtractionContext): Promise<ExtractionContext> {
  const { document } = ctx;

  if (!document.id.trim()) {
    throw new ValidationError('document id is required');
  }

  if (!document.headline.trim() && !document.abstract?.trim()) {
    throw new ValidationError('document has neither headline nor abstract', { documentId: document.id });
  }

  if (parseTimestamp(document.observedAt) === null) {
    throw new ValidationError('document observedAt is not an ISO-8601 timestamp', {
      documentId: document.id,
      observedAt: document.observedAt,
    });
  }

  if (ctx.topicOverride !== undefined && !ctx.topicOverride.trim()) {
    throw new ValidationError('topic must not be blank', { documentId: document.id });
  }

  ctx.reasonCodes.push('document_valid');
  return ctx;
}
