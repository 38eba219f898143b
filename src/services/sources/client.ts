import { abortReason } from '@core/concurrency';
import { RateLimiter } from '@services/generation';
import type { Clock, FetchLike } from '@services/generation';
import { SourceError, ValidationError } from '@utils/errors';
import { createLogger } from '@utils/logger';
import type { Document } from '@services/knowledge/types';
import { buildFilterQuery, responseDocs, responseHits, toDocuments } from './mapping';
import type { ArchiveMonth, ArchiveMonthDocuments, RequestOptions, SearchPage, SearchParams } from './types';

const logger = createLogger('sources');

export const SEARCH_URL = 'https://api.nytimes.com/svc/search/v2/articlesearch.json';
export const ARCHIVE_URL = 'https://api.nytimes.com/svc/archive/v1';

/** The API allows five requests a minute: one every twelve seconds. */
export const SOURCE_REQUESTS_PER_MINUTE = 5;
export const PAGE_SIZE = 10;
const FIRST_ARCHIVE_YEAR = 1851;
const REQUEST_TIMEOUT_MS = 30_000;

export interface NewsSourceOptions {
  apiKey: string;
  fetchImpl?: FetchLike;
  /** Pacing clock; tests pass a virtual one */
  clock?: Clock;
  now?: () => Date;
}

function assertArchiveMonth({ year, month }: ArchiveMonth): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError(`Month must be 1-12, got ${month}`);
  }
  if (!Number.isInteger(year) || year < FIRST_ARCHIVE_YEAR) {
    throw new ValidationError(`Year must be ${FIRST_ARCHIVE_YEAR} or later, got ${year}`);
  }
}

const compactDate = (date: Date): string => date.toISOString().slice(0, 10).replace(/-/g, '');

/**
 * Client for the news article search and archive APIs. Every request goes
 * through a limiter of its own, separate from the generation backend's.
 */
export class NewsSourceClient {
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;
  private readonly limiter: RateLimiter;
  private readonly now: () => Date;

  constructor(options: NewsSourceOptions) {
    if (!options.apiKey.trim()) {
      throw new ValidationError('News source API key is empty');
    }
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.limiter = new RateLimiter(SOURCE_REQUESTS_PER_MINUTE, options.clock);
    this.now = options.now ?? (() => new Date());
  }

  async search(params: SearchParams = {}, options: RequestOptions = {}): Promise<SearchPage> {
    const query = new URLSearchParams({ 'api-key': this.apiKey });
    if (params.query?.trim()) query.set('q', params.query.trim());
    if (params.beginDate) query.set('begin_date', compactDate(params.beginDate));
    if (params.endDate) query.set('end_date', compactDate(params.endDate));
    if (params.page !== undefined) query.set('page', String(params.page));
    if (params.sort) query.set('sort', params.sort);
    const fq = buildFilterQuery(params.sections, params.filterQuery);
    if (fq) query.set('fq', fq);

    const payload = await this.getJson(`${SEARCH_URL}?${query.toString()}`, options.signal);
    return { documents: toDocuments(responseDocs(payload)), totalHits: responseHits(payload) };
  }

  /**
   * Page through search results until a short page, the reported total, or
   * `maxPages` pages.
   */
  async searchAll(params: SearchParams = {}, maxPages = 10, options: RequestOptions = {}): Promise<SearchPage> {
    const documents: Document[] = [];
    let totalHits = 0;
    let page = params.page ?? 0;

    for (let fetched = 0; fetched < maxPages; fetched++, page++) {
      const result = await this.search({ ...params, page }, options);
      documents.push(...result.documents);
      totalHits = result.totalHits;
      logger.debug({ page, received: result.documents.length, totalHits }, 'Search page fetched');

      if (result.documents.length < PAGE_SIZE || documents.length >= totalHits) break;
    }

    return { documents, totalHits };
  }

  /** The newest documents of the last `days` days, at most `maxDocuments`. */
  async searchRecent(
    query: string | undefined,
    days = 7,
    maxDocuments = 50,
    sections?: string[],
    options: RequestOptions = {}
  ): Promise<Document[]> {
    const endDate = this.now();
    const beginDate = new Date(endDate.getTime() - days * 24 * 60 * 60 * 1000);
    const maxPages = Math.max(1, Math.ceil(maxDocuments / PAGE_SIZE));

    const { documents } = await this.searchAll({ query, beginDate, endDate, sort: 'newest', sections }, maxPages, options);
    logger.info({ query, days, found: documents.length }, 'Recent documents fetched');
    return documents.slice(0, maxDocuments);
  }

  /** Every document the archive holds for one month. */
  async fetchArchive(year: number, month: number, options: RequestOptions = {}): Promise<Document[]> {
    assertArchiveMonth({ year, month });
    const query = new URLSearchParams({ 'api-key': this.apiKey });
    const payload = await this.getJson(`${ARCHIVE_URL}/${year}/${month}.json?${query.toString()}`, options.signal);
    return toDocuments(responseDocs(payload));
  }

  /** Fetch every monthly archive from `start` through `end`, inclusive, in order. */
  async fetchArchiveRange(
    start: ArchiveMonth,
    end: ArchiveMonth,
    options: RequestOptions = {}
  ): Promise<ArchiveMonthDocuments[]> {
    assertArchiveMonth(start);
    assertArchiveMonth(end);
    if (start.year * 12 + start.month > end.year * 12 + end.month) {
      throw new ValidationError(
        `Archive range starts after it ends: ${start.year}-${start.month} > ${end.year}-${end.month}`
      );
    }

    const months: ArchiveMonthDocuments[] = [];
    let { year, month } = start;
    while (year * 12 + month <= end.year * 12 + end.month) {
      const documents = await this.fetchArchive(year, month, options);
      logger.debug({ year, month, documents: documents.length }, 'Fetched archive month');
      months.push({ year, month, documents });
      month += 1;
      if (month > 12) {
        month = 1;
        year += 1;
      }
    }
    return months;
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    await this.limiter.acquire(signal);

    const signals = [AbortSignal.timeout(REQUEST_TIMEOUT_MS)];
    if (signal) signals.push(signal);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', signal: AbortSignal.any(signals) });
    } catch (error) {
      if (signal?.aborted) throw abortReason(signal);
      throw new SourceError('News source request failed: network error', 502, undefined, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new SourceError(
        `News source request failed: ${response.status} - ${text.slice(0, 200)}`,
        response.status === 429 ? 429 : 502,
        { status: response.status }
      );
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (error) {
      throw new SourceError('News source returned a non-JSON body', 502, undefined, { cause: error });
    }
  }
}
