import { toInstant } from '@utils/time';
import type { Event, Statement, TimeClock, TopicIndex, TopicSummary } from '@services/knowledge/types';
import type { DualTimeline, TimelineItem } from './types';

function resolveTime(fact: Event | Statement, clock: TimeClock): string | null {
  const chosen = clock === 'valid' ? fact.validTime : fact.observationTime;
  return chosen ?? fact.observationTime;
}

// null sorts before every present instant
function compareInstants(a: number | null, b: number | null): number {
  if (a === null || b === null) return a === b ? 0 : a === null ? -1 : 1;
  return a - b;
}

/**
 * Events and statements of one topic on a single axis, ascending by the
 * parsed instant. Ties keep insertion order: events before statements,
 * each in merge order. Times that do not parse sort with the nulls.
 */
export function buildTimeline(index: Pick<TopicIndex, 'events' | 'statements'>, clock: TimeClock): TimelineItem[] {
  const items: TimelineItem[] = [
    ...index.events.map(
      (event): TimelineItem => ({
        time: resolveTime(event, clock),
        kind: 'event',
        factId: event.id,
        sourceDocumentId: event.sourceDocumentId,
        description: event.description,
        location: event.location,
      })
    ),
    ...index.statements.map(
      (statement): TimelineItem => ({
        time: resolveTime(statement, clock),
        kind: 'statement',
        factId: statement.id,
        sourceDocumentId: statement.sourceDocumentId,
        content: statement.content,
        speaker: statement.speaker,
        stance: statement.stance,
      })
    ),
  ];

  return items
    .map((item, position) => ({ item, position, instant: toInstant(item.time) }))
    .sort((a, b) => compareInstants(a.instant, b.instant) || a.position - b.position)
    .map(({ item }) => item);
}

export function dualTimeline(index: Pick<TopicIndex, 'events' | 'statements'>): DualTimeline {
  return {
    validTime: buildTimeline(index, 'valid'),
    observationTime: buildTimeline(index, 'observation'),
  };
}

export function summarizeTopic(index: TopicIndex): TopicSummary {
  return {
    name: index.name,
    category: index.category,
    documentCount: index.documentIds.length,
    eventCount: index.events.length,
    statementCount: index.statements.length,
  };
}

const coverage = (topic: TopicSummary): number => topic.documentCount + topic.eventCount + topic.statementCount;

/** Coverage ranking: documents + events + statements, highest first, ties by name. */
export function rankTopics(indices: TopicIndex[]): TopicSummary[] {
  return indices
    .map(summarizeTopic)
    .sort((a, b) => coverage(b) - coverage(a) || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
