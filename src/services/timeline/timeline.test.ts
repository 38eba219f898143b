import { describe, it, expect } from 'vitest';
import { buildTimeline, dualTimeline, rankTopics } from './timeline';
import { renderPerspectives, renderTimelineMarkdown, toTimelineJs } from './render';
import { makeEvent, makeStatement } from '@/test/fixtures';
import type { TopicIndex } from '@services/knowledge/types';

function makeIndex(overrides: Partial<TopicIndex> = {}): TopicIndex {
  return {
    name: 'Transit Strike',
    slug: 'Transit_Strike',
    category: 'economy',
    documentIds: ['doc-1'],
    events: [],
    statements: [],
    createdAt: '2024-03-06T00:00:00.000Z',
    updatedAt: '2024-03-06T00:00:00.000Z',
    ...overrides,
  };
}

const scenario = makeIndex({
  events: [
    makeEvent({ id: 'e-dated', description: 'Talks collapse', validTime: '2024-03-01', observationTime: '2024-03-06' }),
    makeEvent({ id: 'e-undated', description: 'Buses stop', validTime: null, observationTime: '2024-03-05' }),
  ],
  statements: [
    makeStatement({ id: 's-dated', content: 'We are ready.', validTime: '2024-02-20', observationTime: '2024-03-07' }),
  ],
});

describe('buildTimeline', () => {
  it('orders by valid time, falling back to observation time', () => {
    expect(buildTimeline(scenario, 'valid').map((item) => [item.factId, item.time])).toEqual([
      ['s-dated', '2024-02-20'],
      ['e-dated', '2024-03-01'],
      ['e-undated', '2024-03-05'],
    ]);
  });

  it('orders by observation time on the observation clock', () => {
    expect(buildTimeline(scenario, 'observation').map((item) => item.factId)).toEqual([
      'e-undated',
      'e-dated',
      's-dated',
    ]);
  });

  it('compares instants rather than strings', () => {
    const index = makeIndex({
      events: [
        makeEvent({ id: 'late', validTime: '2024-03-01T01:00:00-05:00' }),
        makeEvent({ id: 'early', validTime: '2024-03-01T05:00:00Z' }),
      ],
    });
    expect(buildTimeline(index, 'valid').map((item) => item.factId)).toEqual(['early', 'late']);
  });

  it('keeps events before statements on equal times', () => {
    const index = makeIndex({
      events: [makeEvent({ id: 'e', validTime: '2024-03-01' })],
      statements: [makeStatement({ id: 's', validTime: '2024-03-01' })],
    });
    expect(buildTimeline(index, 'valid').map((item) => item.kind)).toEqual(['event', 'statement']);
  });

  it('sorts unparsable times first', () => {
    const index = makeIndex({
      events: [
        makeEvent({ id: 'dated', validTime: '2024-01-01' }),
        makeEvent({ id: 'vague', validTime: 'last spring', observationTime: 'unknown' }),
      ],
    });
    expect(buildTimeline(index, 'valid').map((item) => item.factId)).toEqual(['vague', 'dated']);
  });

  it('carries the fact fields each kind needs', () => {
    const [statement] = buildTimeline(makeIndex({ statements: [makeStatement()] }), 'valid');
    expect(statement).toEqual({
      time: '2024-03-05T12:00:00.000Z',
      kind: 'statement',
      factId: 'statement-1',
      sourceDocumentId: 'doc-1',
      content: 'We will stay out until the contract is fair.',
      speaker: 'Dana Ruiz',
      stance: 'pro',
    });
  });
});

describe('rankTopics', () => {
  it('ranks by coverage, breaking ties by name', () => {
    const ranked = rankTopics([
      makeIndex({ name: 'Zoning', documentIds: ['a'] }),
      makeIndex({ name: 'Budget', documentIds: ['a'] }),
      makeIndex({ name: 'Transit', documentIds: ['a', 'b'], events: [makeEvent()] }),
    ]);
    expect(ranked.map((topic) => topic.name)).toEqual(['Transit', 'Budget', 'Zoning']);
  });
});

describe('renderTimelineMarkdown', () => {
  it('renders both orderings', () => {
    expect(renderTimelineMarkdown(dualTimeline(scenario))).toBe(
      [
        '## Timeline',
        '',
        '### When Events Occurred',
        '*Chronological order of when events actually happened*',
        '',
        '- **2024-02-20**: We are ready.',
        '- **2024-03-01**: Talks collapse',
        '- **2024-03-05**: Buses stop',
        '',
        '### When We Learned',
        '*Order in which information was reported*',
        '',
        '- **2024-03-05** (reported): Buses stop',
        '- **2024-03-06** (reported): Talks collapse',
        '- **2024-03-07** (reported): We are ready.',
        '',
      ].join('\n')
    );
  });

  it('honours the item limit', () => {
    const lines = renderTimelineMarkdown(dualTimeline(scenario), 1).split('\n');
    expect(lines.filter((line) => line.startsWith('- '))).toEqual([
      '- **2024-02-20**: We are ready.',
      '- **2024-03-05** (reported): Buses stop',
    ]);
  });

  it('is empty without facts', () => {
    expect(renderTimelineMarkdown(dualTimeline(makeIndex()))).toBe('');
  });
});

describe('renderPerspectives', () => {
  it('groups quotes by stance, at most three each', () => {
    const statements = [
      makeStatement({ speaker: 'A', content: 'one', stance: 'pro' }),
      makeStatement({ speaker: 'B', content: 'two', stance: 'con' }),
      makeStatement({ speaker: 'C', content: 'three', stance: 'pro' }),
      makeStatement({ speaker: 'D', content: 'four', stance: 'pro' }),
      makeStatement({ speaker: 'E', content: 'five', stance: 'pro' }),
      makeStatement({ speaker: 'F', content: 'six', stance: null }),
    ];
    expect(renderPerspectives(statements)).toBe(
      '## Perspectives\n\n### Supporting Views\n- **A**: "one"\n- **C**: "three"\n- **D**: "four"\n\n### Opposing Views\n- **B**: "two"\n'
    );
  });

  it('is empty when no quote has a stance', () => {
    expect(renderPerspectives([makeStatement({ stance: null })])).toBe('');
  });
});

describe('toTimelineJs', () => {
  it('builds slides for dated items only', () => {
    const items = buildTimeline(
      makeIndex({
        events: [makeEvent({ description: 'Talks collapse', validTime: '2024-03-01' })],
        statements: [makeStatement({ speaker: 'Dana Ruiz', content: 'We are ready.', validTime: 'soon', observationTime: 'n/a' })],
      }),
      'valid'
    );

    expect(toTimelineJs('Transit Strike', items)).toEqual({
      title: { text: { headline: 'Transit Strike', text: 'Timeline of events related to Transit Strike' } },
      events: [
        {
          start_date: { year: '2024', month: '03', day: '01' },
          text: { headline: 'Talks collapse', text: 'Talks collapse' },
        },
      ],
    });
  });

  it('prefixes statement headlines with the speaker', () => {
    const items = buildTimeline(makeIndex({ statements: [makeStatement({ content: 'x'.repeat(150) })] }), 'valid');
    const [slide] = toTimelineJs('Transit Strike', items).events;
    expect(slide?.text.headline).toBe(`Dana Ruiz: ${'x'.repeat(100)}`);
    expect(slide?.start_date).toEqual({ year: '2024', month: '03', day: '05' });
  });
});
