import { Type } from '@sinclair/typebox';
import type { Static, TSchema } from '@sinclair/typebox';
import { Stance } from '@services/knowledge/types';
import type { Document } from '@services/knowledge/types';

/**
 * Request and response schemas shared across route modules.
 */

export const Ok = <T extends TSchema>(data: T) =>
  Type.Object({
    success: Type.Literal(true),
    data,
  });

export const ErrorBody = Type.Object({
  success: Type.Literal(false),
  error: Type.Object({
    message: Type.String(),
    code: Type.String(),
    statusCode: Type.Number(),
    details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
    timestamp: Type.String(),
    path: Type.Optional(Type.String()),
    requestId: Type.Optional(Type.String()),
  }),
});

const OptionalText = Type.Optional(Type.Union([Type.String(), Type.Null()]));

/** Documents as clients send them: only id, headline and observedAt are required. */
export const DocumentInput = Type.Object({
  id: Type.String({ minLength: 1, maxLength: 512 }),
  headline: Type.String(),
  observedAt: Type.String({ minLength: 1, description: 'ISO-8601 publication time' }),
  webUrl: OptionalText,
  abstract: OptionalText,
  snippet: OptionalText,
  leadParagraph: OptionalText,
  byline: OptionalText,
  source: Type.Optional(Type.String()),
  sectionName: OptionalText,
  keywords: Type.Optional(Type.Array(Type.String())),
  wordCount: Type.Optional(Type.Integer({ minimum: 0 })),
});
export type DocumentInput = Static<typeof DocumentInput>;

export function toDocument(input: DocumentInput): Document {
  return {
    id: input.id,
    webUrl: input.webUrl ?? null,
    headline: input.headline,
    abstract: input.abstract ?? null,
    snippet: input.snippet ?? null,
    leadParagraph: input.leadParagraph ?? null,
    byline: input.byline ?? null,
    source: input.source ?? 'unknown',
    sectionName: input.sectionName ?? null,
    keywords: input.keywords ?? [],
    wordCount: input.wordCount ?? 0,
    observedAt: input.observedAt,
  };
}

export const IngestMode = Type.Union([Type.Literal('fail-fast'), Type.Literal('partial')]);

export const BatchOptions = {
  topic: Type.Optional(Type.String({ minLength: 1, description: 'File every document under this topic too' })),
  maxConcurrent: Type.Optional(Type.Integer({ minimum: 1, maximum: 50 })),
  mode: Type.Optional(IngestMode),
};

export const StoreStats = Type.Object({
  documents: Type.Integer(),
  extractions: Type.Integer(),
  topics: Type.Integer(),
  events: Type.Integer(),
  statements: Type.Integer(),
});

export const IngestResult = Type.Object({
  documentsSaved: Type.Integer(),
  extracted: Type.Integer(),
  failed: Type.Array(
    Type.Object({
      documentId: Type.String(),
      message: Type.String(),
      statusCode: Type.Integer(),
    })
  ),
  discoveredTopics: Type.Array(Type.String()),
  stats: StoreStats,
});

export const TopicSummary = Type.Object({
  name: Type.String(),
  category: Type.String(),
  documentCount: Type.Integer(),
  eventCount: Type.Integer(),
  statementCount: Type.Integer(),
});

export const TimelineItem = Type.Object({
  time: Type.Union([Type.String(), Type.Null()]),
  kind: Type.Union([Type.Literal('event'), Type.Literal('statement')]),
  factId: Type.String(),
  sourceDocumentId: Type.String(),
  description: Type.Optional(Type.String()),
  location: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  content: Type.Optional(Type.String()),
  speaker: Type.Optional(Type.String()),
  stance: Type.Optional(Type.Union([Stance, Type.Null()])),
});

const TimelineJsText = Type.Object({ headline: Type.String(), text: Type.String() });

export const TimelineJsDocument = Type.Object({
  title: Type.Object({ text: TimelineJsText }),
  events: Type.Array(
    Type.Object({
      start_date: Type.Object({ year: Type.String(), month: Type.String(), day: Type.String() }),
      text: TimelineJsText,
    })
  ),
});

export const Article = Type.Object({
  topic: Type.String(),
  markdown: Type.String(),
  eventCount: Type.Integer(),
  statementCount: Type.Integer(),
});

export const TopicParams = Type.Object({
  name: Type.String({ minLength: 1 }),
});
