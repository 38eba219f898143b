import { MalformedOutputError } from '@utils/errors';
import { isRecord } from '@utils/guards';
import type { JsonRecord } from '@utils/guards';
import { createLogger } from '@utils/logger';
import type { CallOptions, GenerationGateway } from '@services/generation';
import type { Document } from '@services/knowledge/types';

const logger = createLogger('extraction');

/**
 * One prompt, one gateway call, one mapping per array item.
 *
 * Unparseable output means "nothing found" and yields []. Failures of the
 * call itself propagate.
 */
export abstract class BaseExtractor<T> {
  /** Also accepted as a wrapper key, e.g. `{ "events": [...] }` */
  abstract readonly kind: string;

  constructor(protected readonly gateway: GenerationGateway) {}

  protected abstract buildPrompt(document: Document): string;
  protected abstract mapItem(item: JsonRecord, document: Document): T | null;

  protected finalize(items: T[]): T[] {
    return items;
  }

  async extract(document: Document, options: CallOptions = {}): Promise<T[]> {
    let payload: unknown;
    try {
      payload = await this.gateway.generateStructured(this.buildPrompt(document), undefined, options);
    } catch (error) {
      if (error instanceof MalformedOutputError) {
        logger.warn({ kind: this.kind, documentId: document.id }, 'No structured output, treating as empty');
        return [];
      }
      throw error;
    }

    const items = this.unwrap(payload);
    if (!items) {
      logger.warn({ kind: this.kind, documentId: document.id }, 'Expected a JSON array');
      return [];
    }

    const mapped: T[] = [];
    for (const item of items) {
      if (!isRecord(item)) continue;
      const fact = this.mapItem(item, document);
      if (fact !== null) mapped.push(fact);
    }
    return this.finalize(mapped);
  }

  private unwrap(payload: unknown): unknown[] | undefined {
    if (Array.isArray(payload)) return payload;
    if (isRecord(payload)) {
      const wrapped = payload[this.kind];
      if (Array.isArray(wrapped)) return wrapped;
    }
    return undefined;
  }
}
