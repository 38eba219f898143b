export { NewsSourceClient, ARCHIVE_URL, PAGE_SIZE, SEARCH_URL, SOURCE_REQUESTS_PER_MINUTE } from './client';
export type { NewsSourceOptions } from './client';
export { buildFilterQuery, filterDocuments, parseArchive, toDocument, toDocuments, DEFAULT_SOURCE } from './mapping';
export type { ArchiveFilters, ArchiveMonth, ArchiveMonthDocuments, RequestOptions, SearchPage, SearchParams, SearchSort } from './types';
