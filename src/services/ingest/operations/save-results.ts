import { throwIfAborted } from '@core/concurrency';
import type { IngestContext } from '../types';

/**
 * SaveResults Operation
 *
 * Merges each result into its topics in input order, then snapshots the
 * store statistics.
 */
export async function saveResults(ctx: IngestContext): Promise<IngestContext> {
  const discovered = new Set<string>();

  for (const result of ctx.extracted ?? []) {
    throwIfAborted(ctx.signal);
    const indices = await ctx.store.saveExtractionResult(result, ctx.topic?.trim());
    for (const index of indices) discovered.add(index.name);
  }

  ctx.discoveredTopics = [...discovered];
  ctx.stats = await ctx.store.aggregateStats();
  return ctx;
}
