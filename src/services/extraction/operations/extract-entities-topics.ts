import { OVERRIDE_TOPIC_CATEGORY } from '@services/knowledge/types';
import type { ExtractionContext } from '../types';

/**
 * ExtractEntitiesTopics Operation
 *
 * Entities and topics are independent reads of the same text and run
 * together. A topic override replaces topic discovery with a single
 * full-relevance reference.
 */
export async function extractEntitiesTopics(ctx: ExtractionContext): Promise<ExtractionContext> {
  const { document, extractors, signal } = ctx;
  const override = ctx.topicOverride?.trim();

  if (override) {
    ctx.entities = await extractors.entities.extract(document, { signal });
    ctx.topics = [{ name: override, category: OVERRIDE_TOPIC_CATEGORY, relevance: 1 }];
    ctx.reasonCodes.push('topic_override');
    return ctx;
  }

  const [entities, topics] = await Promise.all([
    extractors.entities.extract(document, { signal }),
    extractors.topics.extract(document, { signal }),
  ]);
  ctx.entities = entities;
  ctx.topics = topics;
  ctx.reasonCodes.push(`discovered_${topics.length}_topics`);
  return ctx;
}
