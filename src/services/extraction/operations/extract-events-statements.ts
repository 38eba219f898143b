import type { ExtractionContext } from '../types';

/**
 * ExtractEventsStatements Operation
 */
export async function extractEventsStatements(ctx: ExtractionContext): Promise<ExtractionContext> {
  const { document, extractors, signal } = ctx;

  const [events, statements] = await Promise.all([
    extractors.events.extract(document, { signal }),
    extractors.statements.extract(document, { signal }),
  ]);
  ctx.events = events;
  ctx.statements = statements;
  ctx.reasonCodes.push(`extracted_${events.length}_events`, `extracted_${statements.length}_statements`);
  return ctx;
}
