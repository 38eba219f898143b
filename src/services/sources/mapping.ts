import { isRecord, readNumber, readRecord, readString, readText } from '@utils/guards';
import { parseTimestamp } from '@utils/time';
import type { Document } from '@services/knowledge/types';
import type { ArchiveFilters } from './types';

export const DEFAULT_SOURCE = 'The New York Times';

/**
 * Map one article record from the news API to a Document. Records without an
 * id, without a headline or abstract, or without a parsable publication date
 * are dropped.
 */
export function toDocument(raw: unknown): Document | null {
  if (!isRecord(raw)) return null;

  const webUrl = readText(raw, 'web_url');
  const id = readText(raw, '_id', 'uri') ?? webUrl;
  const headline = readText(readRecord(raw, 'headline') ?? {}, 'main', 'print_headline');
  const abstract = readText(raw, 'abstract');
  const observedAt = parseTimestamp(readString(raw, 'pub_date'));
  if (!id || (!headline && !abstract) || !observedAt) return null;

  const keywords = Array.isArray(raw.keywords)
    ? raw.keywords.flatMap((keyword) => {
        const value = isRecord(keyword) ? readText(keyword, 'value') : null;
        return value ? [value] : [];
      })
    : [];
  const wordCount = readNumber(raw, 'word_count');

  return {
    id,
    webUrl,
    headline: headline ?? '',
    abstract,
    snippet: readText(raw, 'snippet'),
    leadParagraph: readText(raw, 'lead_paragraph'),
    byline: readText(readRecord(raw, 'byline') ?? {}, 'original'),
    source: readText(raw, 'source') ?? DEFAULT_SOURCE,
    sectionName: readText(raw, 'section_name'),
    keywords,
    wordCount: wordCount !== undefined && wordCount >= 0 ? Math.trunc(wordCount) : 0,
    observedAt,
  };
}

export function toDocuments(records: unknown[]): Document[] {
  return records.flatMap((record) => {
    const document = toDocument(record);
    return document ? [document] : [];
  });
}

/** `response.docs` of a search or archive payload; [] when absent. */
export function responseDocs(payload: unknown): unknown[] {
  const response = isRecord(payload) ? readRecord(payload, 'response') : undefined;
  const docs = response?.docs;
  return Array.isArray(docs) ? docs : [];
}

export function responseHits(payload: unknown): number {
  const response = isRecord(payload) ? readRecord(payload, 'response') : undefined;
  const meta = response ? (readRecord(response, 'meta') ?? readRecord(response, 'metadata')) : undefined;
  return meta ? (readNumber(meta, 'hits') ?? 0) : 0;
}

/** `section_name:("A" OR "B")` joined with any extra filter by AND. */
export function buildFilterQuery(sections: string[] = [], filterQuery?: string): string | undefined {
  const parts: string[] = [];
  if (sections.length > 0) {
    parts.push(`section_name:(${sections.map((section) => `"${section}"`).join(' OR ')})`);
  }
  if (filterQuery?.trim()) parts.push(filterQuery.trim());
  return parts.length > 0 ? parts.join(' AND ') : undefined;
}

/** Apply section, keyword and count filters in order. */
export function filterDocuments(documents: Document[], filters: ArchiveFilters = {}): Document[] {
  const sections = filters.sections?.map((section) => section.toLowerCase());
  const query = filters.query?.trim().toLowerCase();
  const kept: Document[] = [];

  for (const document of documents) {
    if (filters.maxDocuments !== undefined && kept.length >= filters.maxDocuments) break;
    if (sections?.length && !sections.includes((document.sectionName ?? '').toLowerCase())) continue;
    if (query) {
      const haystack = [document.headline, document.abstract, document.snippet].join(' ').toLowerCase();
      if (!haystack.includes(query)) continue;
    }
    kept.push(document);
  }
  return kept;
}

/** Documents from a monthly archive dump, filtered locally. */
export function parseArchive(payload: unknown, filters: ArchiveFilters = {}): Document[] {
  return filterDocuments(toDocuments(responseDocs(payload)), filters);
}
