import type { Document } from '@services/knowledge/types';

/** The text every extractor sees: headline, then abstract and lead when present. */
export function documentText(document: Document): string {
  const parts = [`Headline: ${document.headline}`];
  if (document.abstract) parts.push(`Abstract: ${document.abstract}`);
  if (document.leadParagraph) parts.push(`Lead: ${document.leadParagraph}`);
  return parts.join('\n\n');
}

export function clampUnit(value: number | undefined, fallback = 1): number {
  if (value === undefined) return fallback;
  return Math.min(1, Math.max(0, value));
}
