import { Type } from '@sinclair/typebox';
import type { Static } from '@sinclair/typebox';

/**
 * Persisted models. Optional values are stored as null rather than omitted so
 * that a JSON round trip reproduces every field.
 */

const NullableString = () => Type.Union([Type.String(), Type.Null()]);

export const Stance = Type.Union([Type.Literal('pro'), Type.Literal('con'), Type.Literal('neutral')]);
export type Stance = Static<typeof Stance>;

export const DocumentSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  webUrl: NullableString(),
  headline: Type.String(),
  abstract: NullableString(),
  snippet: NullableString(),
  leadParagraph: NullableString(),
  byline: NullableString(),
  source: Type.String(),
  sectionName: NullableString(),
  keywords: Type.Array(Type.String()),
  wordCount: Type.Integer({ minimum: 0 }),
  /** Publication time; the default observation time of every fact drawn from the document */
  observedAt: Type.String({ minLength: 1 }),
});
export type Document = Static<typeof DocumentSchema>;

export const EntitySchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  entityType: Type.String(),
  aliases: Type.Array(Type.String()),
  description: NullableString(),
});
export type Entity = Static<typeof EntitySchema>;

export const EventSchema = Type.Object({
  id: Type.String(),
  description: Type.String(),
  eventType: Type.String(),
  validTime: NullableString(),
  observationTime: Type.String(),
  participants: Type.Array(Type.String()),
  location: NullableString(),
  sourceDocumentId: Type.String(),
  sourceUrl: NullableString(),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
});
export type Event = Static<typeof EventSchema>;

export const StatementSchema = Type.Object({
  id: Type.String(),
  content: Type.String(),
  speaker: Type.String(),
  speakerRole: NullableString(),
  stance: Type.Union([Stance, Type.Null()]),
  target: NullableString(),
  validTime: NullableString(),
  observationTime: Type.String(),
  sourceDocumentId: Type.String(),
  sourceUrl: NullableString(),
});
export type Statement = Static<typeof StatementSchema>;

export const TopicRefSchema = Type.Object({
  name: Type.String(),
  category: Type.String(),
  relevance: Type.Number({ minimum: 0, maximum: 1 }),
});
export type TopicRef = Static<typeof TopicRefSchema>;

/** Category given to a caller-supplied topic override. */
export const OVERRIDE_TOPIC_CATEGORY = 'other';

export const ExtractionResultSchema = Type.Object({
  documentId: Type.String(),
  events: Type.Array(EventSchema),
  statements: Type.Array(StatementSchema),
  entities: Type.Array(EntitySchema),
  topics: Type.Array(TopicRefSchema),
});
export type ExtractionResult = Static<typeof ExtractionResultSchema>;

export const TopicIndexSchema = Type.Object({
  name: Type.String(),
  slug: Type.String(),
  category: Type.String(),
  documentIds: Type.Array(Type.String()),
  events: Type.Array(EventSchema),
  statements: Type.Array(StatementSchema),
  createdAt: Type.String(),
  updatedAt: Type.String(),
});
export type TopicIndex = Static<typeof TopicIndexSchema>;

export interface TopicSummary {
  name: string;
  category: string;
  documentCount: number;
  eventCount: number;
  statementCount: number;
}

export interface StoreStats {
  documents: number;
  extractions: number;
  topics: number;
  events: number;
  statements: number;
}

export type TimeClock = 'valid' | 'observation';
