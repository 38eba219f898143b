import type { IngestContext } from '../types';

/**
 * ExtractBatch Operation
 *
 * Fail-fast mode lets the first ExtractionError fail the run. Partial mode
 * keeps the successes and records each failure.
 */
export async function extractBatch(ctx: IngestContext): Promise<IngestContext> {
  const options = { topic: ctx.topic?.trim(), maxConcurrent: ctx.maxConcurrent, signal: ctx.signal };

  if (ctx.mode === 'fail-fast') {
    ctx.extracted = await ctx.extraction.extractBatch(ctx.documents, options);
    return ctx;
  }

  const outcomes = await ctx.extraction.extractBatchSettled(ctx.documents, options);
  ctx.extracted = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') {
      ctx.extracted.push(outcome.result);
    } else {
      ctx.failed.push({
        documentId: outcome.documentId,
        message: outcome.error.message,
        statusCode: outcome.error.statusCode,
      });
    }
  }
  if (ctx.failed.length > 0) ctx.reasonCodes.push('partial_batch');
  return ctx;
}
