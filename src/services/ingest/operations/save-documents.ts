import { throwIfAborted } from '@core/concurrency';
import type { IngestContext } from '../types';

/**
 * SaveDocuments Operation
 */
export async function saveDocuments(ctx: IngestContext): Promise<IngestContext> {
  for (const document of ctx.documents) {
    throwIfAborted(ctx.signal);
    await ctx.store.saveDocument(document);
    ctx.documentsSaved++;
  }
  return ctx;
}
