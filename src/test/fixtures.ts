import type { Document, Event, ExtractionResult, Statement } from '@services/knowledge/types';

export function makeDocument(overrides: Partial<Document> = {}): Document {
  return {
    id: 'doc-1',
    webUrl: 'https://news.example.com/2024/03/05/transit-strike',
    headline: 'Transit workers walk out',
    abstract: 'Bus drivers began a strike after talks collapsed.',
    snippet: null,
    leadParagraph: 'Service stopped across the city on Tuesday.',
    byline: 'By A. Reporter',
    source: 'Example Daily',
    sectionName: 'U.S.',
    keywords: ['labor', 'transit'],
    wordCount: 640,
    observedAt: '2024-03-05T12:00:00.000Z',
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<Event> = {}): Event {
  return {
    id: 'event-1',
    description: 'Drivers walked off the job',
    eventType: 'strike',
    validTime: '2024-03-05T00:00:00.000Z',
    observationTime: '2024-03-05T12:00:00.000Z',
    participants: ['Transit Workers Union'],
    location: 'Minneapolis',
    sourceDocumentId: 'doc-1',
    sourceUrl: null,
    confidence: 0.9,
    ...overrides,
  };
}

export function makeStatement(overrides: Partial<Statement> = {}): Statement {
  return {
    id: 'statement-1',
    content: 'We will stay out until the contract is fair.',
    speaker: 'Dana Ruiz',
    speakerRole: 'union president',
    stance: 'pro',
    target: 'strike',
    validTime: null,
    observationTime: '2024-03-05T12:00:00.000Z',
    sourceDocumentId: 'doc-1',
    sourceUrl: null,
    ...overrides,
  };
}

export function makeResult(overrides: Partial<ExtractionResult> = {}): ExtractionResult {
  return {
    documentId: 'doc-1',
    events: [makeEvent()],
    statements: [makeStatement()],
    entities: [],
    topics: [{ name: 'Transit Strike', category: 'economy', relevance: 0.9 }],
    ...overrides,
  };
}
