/**
 * Prompt templates for extraction and synthesis.
 * Field names in the requested JSON are snake_case; the extractors also accept camelCase.
 */

export const SYSTEM_PROMPT = `You analyze news articles and turn them into structured records.
You are precise about who did what, when it happened, and who said it.
When asked for JSON, reply with JSON only.`;

export function eventPrompt(articleText: string): string {
  return `List every event described in this news article: things that happened, not opinions about them.

For each event give:
- description: one factual sentence saying what happened
- event_type: a short category such as arrest, ruling, vote, protest, policy_change, meeting, announcement
- valid_time: when the event itself took place, as an ISO-8601 date or date-time; null if the article does not say
- participants: people and organizations involved
- location: where it happened, or null
- confidence: 0.0-1.0, how clearly the article states it

Article:
${articleText}

Reply with a JSON array:
[{"description": "...", "event_type": "...", "valid_time": "2024-03-01", "participants": ["..."], "location": "...", "confidence": 0.9}]`;
}

export function statementPrompt(articleText: string): string {
  return `List the notable quotes and attributed statements in this news article.

For each statement give:
- content: the quote, or a close paraphrase
- speaker: who said it
- speaker_role: their title or role, or null
- stance: pro, con or neutral toward the subject of the statement
- target: what the statement is about
- valid_time: when it was said, as an ISO-8601 date or date-time; null if the article does not say

Article:
${articleText}

Reply with a JSON array:
[{"content": "...", "speaker": "...", "speaker_role": "...", "stance": "neutral", "target": "...", "valid_time": null}]`;
}

export function entityPrompt(articleText: string): string {
  return `List the named entities in this news article.

For each entity give:
- name: the name as written
- entity_type: person, organization, location, law, event_name, or another short category
- aliases: other names the article uses for it
- description: a short description drawn from the article

Article:
${articleText}

Reply with a JSON array:
[{"name": "...", "entity_type": "...", "aliases": [], "description": "..."}]`;
}

export function topicPrompt(headline: string, summary: string): string {
  return `Name the main topics this news article covers.

For each topic give:
- name: a specific, reusable topic name ("Minneapolis Transit Strike" rather than "Labor")
- category: one of politics, law, international, economy, science, social, other
- relevance: 0.0-1.0, how central the topic is to the article

Headline: ${headline}
Summary: ${summary}

Reply with a JSON array of at most 5 topics:
[{"name": "...", "category": "politics", "relevance": 0.9}]`;
}

export function articlePrompt(topic: string, eventsJson: string, statementsJson: string): string {
  return `Write an encyclopedia-style article about: ${topic}

Source events:
${eventsJson}

Source statements:
${statementsJson}

Guidelines:
- Neutral, encyclopedic tone; no speculation
- Cite each fact as [Source: YYYY-MM-DD] using its observationTime
- Keep when something happened separate from when it was reported
- Quote notable statements with attribution

Reply in markdown, starting with a level-1 heading.`;
}
