import type { Document } from '@services/knowledge/types';

export type SearchSort = 'newest' | 'oldest' | 'relevance';

export interface SearchParams {
  query?: string;
  beginDate?: Date;
  endDate?: Date;
  /** Zero-based result page; each page holds up to ten documents */
  page?: number;
  sort?: SearchSort;
  /** Lucene-style filter query, combined with the section filter */
  filterQuery?: string;
  sections?: string[];
}

export interface SearchPage {
  documents: Document[];
  totalHits: number;
}

export interface ArchiveFilters {
  sections?: string[];
  /** Case-insensitive substring matched against headline, abstract and snippet */
  query?: string;
  maxDocuments?: number;
}

export interface ArchiveMonth {
  year: number;
  /** 1-12 */
  month: number;
}

export interface ArchiveMonthDocuments extends ArchiveMonth {
  documents: Document[];
}

export interface RequestOptions {
  signal?: AbortSignal;
}
