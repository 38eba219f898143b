import { randomUUID } from 'node:crypto';
import { prompts } from '@services/generation';
import { readString, readText } from '@utils/guards';
import type { JsonRecord } from '@utils/guards';
import type { Document, Stance, Statement } from '@services/knowledge/types';
import { documentText, parseTimestamp } from '../helpers';
import { BaseExtractor } from './base';

const STANCES: readonly Stance[] = ['pro', 'con', 'neutral'];

function parseStance(value: string | null): Stance | null {
  const normalized = value?.toLowerCase();
  return STANCES.find((stance) => stance === normalized) ?? null;
}

export class StatementExtractor extends BaseExtractor<Statement> {
  readonly kind = 'statements';

  protected buildPrompt(document: Document): string {
    return prompts.statementPrompt(documentText(document));
  }

  protected mapItem(item: JsonRecord, document: Document): Statement {
    return {
      id: randomUUID(),
      content: readString(item, 'content', 'quote') ?? '',
      speaker: readText(item, 'speaker') ?? 'Unknown',
      speakerRole: readText(item, 'speaker_role', 'speakerRole'),
      stance: parseStance(readText(item, 'stance')),
      target: readText(item, 'target'),
      validTime: parseTimestamp(item.valid_time ?? item.validTime),
      observationTime: parseTimestamp(document.observedAt) ?? document.observedAt,
      sourceDocumentId: document.id,
      sourceUrl: document.webUrl,
    };
  }
}
