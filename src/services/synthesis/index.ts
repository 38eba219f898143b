import { NotFoundError } from '@utils/errors';
import { createLogger } from '@utils/logger';
import { prompts } from '@services/generation';
import type { GenerationGateway } from '@services/generation';
import type { KnowledgeStore } from '@services/knowledge';
import type { Event, Statement } from '@services/knowledge/types';
import { dualTimeline, renderPerspectives, renderTimelineMarkdown } from '@services/timeline';

const logger = createLogger('synthesis');

// Keeps the prompt within the smaller models' context windows
const MAX_PROMPT_EVENTS = 50;
const MAX_PROMPT_STATEMENTS = 30;

export interface ArticleOptions {
  perspectives?: boolean;
  signal?: AbortSignal;
}

export interface Article {
  topic: string;
  markdown: string;
  eventCount: number;
  statementCount: number;
}

const eventFacts = (events: Event[]) =>
  events.slice(0, MAX_PROMPT_EVENTS).map((event) => ({
    description: event.description,
    eventType: event.eventType,
    validTime: event.validTime,
    observationTime: event.observationTime,
    location: event.location,
    participants: event.participants,
  }));

const statementFacts = (statements: Statement[]) =>
  statements.slice(0, MAX_PROMPT_STATEMENTS).map((statement) => ({
    speaker: statement.speaker,
    speakerRole: statement.speakerRole,
    content: statement.content,
    stance: statement.stance,
    observationTime: statement.observationTime,
  }));

/**
 * Writes a markdown article for a topic from its accumulated facts. The model
 * writes the prose; the timeline and perspectives sections are rendered from
 * the store so their dates are exact.
 */
export class ArticleWriter {
  constructor(
    private readonly gateway: GenerationGateway,
    private readonly store: KnowledgeStore
  ) {}

  async generateArticle(topic: string, options: ArticleOptions = {}): Promise<Article> {
    const index = await this.store.getTopicIndex(topic);
    if (!index) {
      throw new NotFoundError(`Topic not found: ${topic}`);
    }

    const prompt = prompts.articlePrompt(
      index.name,
      JSON.stringify(eventFacts(index.events), null, 2),
      JSON.stringify(statementFacts(index.statements), null, 2)
    );
    const prose = (await this.gateway.generate(prompt, undefined, { signal: options.signal })).trim();

    const sections = [
      prose || `# ${index.name}`,
      renderTimelineMarkdown(dualTimeline(index)),
      options.perspectives ? renderPerspectives(index.statements) : '',
    ];
    const markdown = `${sections.map((section) => section.trim()).filter(Boolean).join('\n\n')}\n`;

    logger.info({ topic: index.name, events: index.events.length, statements: index.statements.length }, 'Article written');
    return {
      topic: index.name,
      markdown,
      eventCount: index.events.length,
      statementCount: index.statements.length,
    };
  }
}
