import { prompts } from '@services/generation';
import { readNumber, readString, readText } from '@utils/guards';
import type { JsonRecord } from '@utils/guards';
import type { Document, TopicRef } from '@services/knowledge/types';
import { clampUnit } from '../helpers';
import { BaseExtractor } from './base';

export const MAX_TOPICS_PER_DOCUMENT = 5;

/**
 * Topics index facts rather than being facts themselves, so they carry no id
 * or provenance of their own.
 */
export class TopicExtractor extends BaseExtractor<TopicRef> {
  readonly kind = 'topics';

  protected buildPrompt(document: Document): string {
    return prompts.topicPrompt(document.headline, document.abstract ?? document.snippet ?? '');
  }

  protected mapItem(item: JsonRecord): TopicRef | null {
    const name = (readString(item, 'name') ?? 'Unknown').trim();
    if (!name) return null;

    return {
      name,
      category: readText(item, 'category') ?? 'other',
      relevance: clampUnit(readNumber(item, 'relevance')),
    };
  }

  protected finalize(items: TopicRef[]): TopicRef[] {
    return items.slice(0, MAX_TOPICS_PER_DOCUMENT);
  }
}
