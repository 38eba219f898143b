import type { Statement } from '@services/knowledge/types';
import type { DualTimeline, TimelineItem, TimelineJsDocument, TimelineJsSlide } from './types';

const HEADLINE_LENGTH = 100;
const PERSPECTIVE_LIMIT = 3;

function label(item: TimelineItem): string {
  return item.description || item.content || '';
}

function day(time: string | null): string {
  return time ? time.slice(0, 10) : 'Unknown date';
}

/** Markdown "Timeline" section with both orderings. Empty when there is nothing to show. */
export function renderTimelineMarkdown(dual: DualTimeline, limit = 10): string {
  if (dual.validTime.length === 0 && dual.observationTime.length === 0) return '';

  const occurred = dual.validTime.slice(0, limit).map((item) => `- **${day(item.time)}**: ${label(item)}`);
  const learned = dual.observationTime
    .slice(0, limit)
    .map((item) => `- **${day(item.time)}** (reported): ${label(item)}`);

  return [
    '## Timeline',
    '',
    '### When Events Occurred',
    '*Chronological order of when events actually happened*',
    '',
    ...occurred,
    '',
    '### When We Learned',
    '*Order in which information was reported*',
    '',
    ...learned,
    '',
  ].join('\n');
}

/** Markdown "Perspectives" section grouping quotes by stance. */
export function renderPerspectives(statements: Statement[]): string {
  const groups: [string, Statement['stance']][] = [
    ['Supporting Views', 'pro'],
    ['Opposing Views', 'con'],
    ['Neutral Analysis', 'neutral'],
  ];

  const sections = groups.flatMap(([title, stance]) => {
    const quotes = statements.filter((s) => s.stance === stance).slice(0, PERSPECTIVE_LIMIT);
    if (quotes.length === 0) return [];
    return [[`### ${title}`, ...quotes.map((s) => `- **${s.speaker}**: "${s.content}"`)].join('\n')];
  });

  if (sections.length === 0) return '';
  return `## Perspectives\n\n${sections.join('\n\n')}\n`;
}

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

/** TimelineJS export. Items without a usable date are left out. */
export function toTimelineJs(topic: string, items: TimelineItem[]): TimelineJsDocument {
  const events: TimelineJsSlide[] = [];

  for (const item of items) {
    const match = item.time ? DATE_PREFIX.exec(item.time) : null;
    if (!match) continue;
    const [, year = '', month = '', dayOfMonth = ''] = match;

    const text = label(item);
    const headline =
      item.kind === 'statement' ? `${item.speaker ?? 'Unknown'}: ${text.slice(0, HEADLINE_LENGTH)}` : text.slice(0, HEADLINE_LENGTH);

    events.push({
      start_date: { year, month, day: dayOfMonth },
      text: { headline, text },
    });
  }

  return {
    title: {
      text: {
        headline: topic,
        text: `Timeline of events related to ${topic}`,
      },
    },
    events,
  };
}
