import type { GenerationGateway } from '@services/generation';
import { EntityExtractor } from './entity';
import { EventExtractor } from './event';
import { StatementExtractor } from './statement';
import { TopicExtractor } from './topic';

export { BaseExtractor } from './base';
export { EntityExtractor, EventExtractor, StatementExtractor, TopicExtractor };

export interface Extractors {
  events: EventExtractor;
  statements: StatementExtractor;
  entities: EntityExtractor;
  topics: TopicExtractor;
}

export function createExtractors(gateway: GenerationGateway): Extractors {
  return {
    events: new EventExtractor(gateway),
    statements: new StatementExtractor(gateway),
    entities: new EntityExtractor(gateway),
    topics: new TopicExtractor(gateway),
  };
}
