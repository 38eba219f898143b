import { randomUUID } from 'node:crypto';
import { prompts } from '@services/generation';
import { readNumber, readString, readStringArray, readText } from '@utils/guards';
import type { JsonRecord } from '@utils/guards';
import type { Document, Event } from '@services/knowledge/types';
import { clampUnit, documentText, parseTimestamp } from '../helpers';
import { BaseExtractor } from './base';

export class EventExtractor extends BaseExtractor<Event> {
  readonly kind = 'events';

  protected buildPrompt(document: Document): string {
    return prompts.eventPrompt(documentText(document));
  }

  protected mapItem(item: JsonRecord, document: Document): Event {
    return {
      id: randomUUID(),
      description: readString(item, 'description') ?? '',
      eventType: readText(item, 'event_type', 'eventType') ?? 'unknown',
      validTime: parseTimestamp(item.valid_time ?? item.validTime),
      observationTime: parseTimestamp(document.observedAt) ?? document.observedAt,
      participants: readStringArray(item, 'participants'),
      location: readText(item, 'location'),
      sourceDocumentId: document.id,
      sourceUrl: document.webUrl,
      confidence: clampUnit(readNumber(item, 'confidence')),
    };
  }
}
