import { randomUUID } from 'node:crypto';
import { prompts } from '@services/generation';
import { readStringArray, readText } from '@utils/guards';
import type { JsonRecord } from '@utils/guards';
import type { Document, Entity } from '@services/knowledge/types';
import { documentText } from '../helpers';
import { BaseExtractor } from './base';

export class EntityExtractor extends BaseExtractor<Entity> {
  readonly kind = 'entities';

  protected buildPrompt(document: Document): string {
    return prompts.entityPrompt(documentText(document));
  }

  // An entity without a name carries nothing worth keeping
  protected mapItem(item: JsonRecord): Entity | null {
    const name = readText(item, 'name');
    if (name === null) return null;

    return {
      id: randomUUID(),
      name,
      entityType: readText(item, 'entity_type', 'entityType', 'type') ?? 'unknown',
      aliases: readStringArray(item, 'aliases'),
      description: readText(item, 'description'),
    };
  }
}
