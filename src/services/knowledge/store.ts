import { access, mkdir } from 'node:fs/promises';
import { constants } from 'node:fs';
import { join } from 'node:path';
import { Value } from '@sinclair/typebox/value';
import { KeyedMutex } from '@core/concurrency';
import { StoreIOError, ValidationError } from '@utils/errors';
import { createLogger } from '@utils/logger';
import { buildTimeline, rankTopics } from '@services/timeline/timeline';
import type { TimelineItem } from '@services/timeline/types';
import { listJsonFiles, readJson, writeJsonAtomic } from './json-file';
import { fileKey, slugify } from './slugify';
import { DocumentSchema, ExtractionResultSchema, OVERRIDE_TOPIC_CATEGORY, TopicIndexSchema } from './types';
import type {
  Document,
  Event,
  ExtractionResult,
  Statement,
  StoreStats,
  TimeClock,
  TopicIndex,
  TopicSummary,
} from './types';

const logger = createLogger('knowledge');

export interface KnowledgeStoreOptions {
  dataDir: string;
  now?: () => Date;
}

/**
 * File-backed knowledge base: documents, extraction results and one index per
 * topic, each a JSON file rewritten atomically.
 *
 * Merges into a topic index are serialized per slug, so overlapping batches
 * never lose each other's facts.
 */
export class KnowledgeStore {
  readonly dataDir: string;
  private readonly documentsDir: string;
  private readonly extractionsDir: string;
  private readonly topicsDir: string;
  private readonly topicLocks = new KeyedMutex();
  private readonly now: () => Date;

  constructor(options: KnowledgeStoreOptions) {
    this.dataDir = options.dataDir;
    this.documentsDir = join(options.dataDir, 'documents');
    this.extractionsDir = join(options.dataDir, 'extractions');
    this.topicsDir = join(options.dataDir, 'topics');
    this.now = options.now ?? (() => new Date());
  }

  async init(): Promise<void> {
    try {
      for (const dir of [this.documentsDir, this.extractionsDir, this.topicsDir]) {
        await mkdir(dir, { recursive: true });
      }
    } catch (error) {
      throw new StoreIOError(`Cannot create data directory ${this.dataDir}`, { dataDir: this.dataDir }, { cause: error });
    }
  }

  async isWritable(): Promise<boolean> {
    try {
      for (const dir of [this.documentsDir, this.extractionsDir, this.topicsDir]) {
        await access(dir, constants.W_OK);
      }
      return true;
    } catch {
      return false;
    }
  }

  // --- Documents ---

  async saveDocument(document: Document): Promise<void> {
    const candidate: unknown = document;
    if (!Value.Check(DocumentSchema, candidate)) {
      throw new ValidationError('Invalid document', { documentId: document.id });
    }
    await writeJsonAtomic(join(this.documentsDir, fileKey(document.id)), document);
  }

  async getDocument(id: string): Promise<Document | null> {
    return readJson(join(this.documentsDir, fileKey(id)), DocumentSchema);
  }

  // --- Extraction results ---

  /**
   * Persist a result, then merge it into every topic it names, plus
   * `topicOverride` when given. Returns the updated indices.
   */
  async saveExtractionResult(result: ExtractionResult, topicOverride?: string): Promise<TopicIndex[]> {
    this.assertProvenance(result);

    await writeJsonAtomic(join(this.extractionsDir, fileKey(result.documentId)), result);

    const targets = new Map<string, { name: string; category: string }>();
    const refs = [...result.topics];
    if (topicOverride?.trim()) refs.push({ name: topicOverride, category: OVERRIDE_TOPIC_CATEGORY, relevance: 1 });

    for (const ref of refs) {
      const name = ref.name.trim();
      const slug = slugify(name);
      if (slug && !targets.has(slug)) targets.set(slug, { name, category: ref.category });
    }

    return Promise.all(
      [...targets].map(([slug, target]) =>
        this.topicLocks.runExclusive(slug, () => this.mergeIntoTopic(slug, target.name, target.category, result))
      )
    );
  }

  async getExtractionResult(documentId: string): Promise<ExtractionResult | null> {
    return readJson(join(this.extractionsDir, fileKey(documentId)), ExtractionResultSchema);
  }

  private assertProvenance(result: ExtractionResult): void {
    const candidate: unknown = result;
    if (!Value.Check(ExtractionResultSchema, candidate)) {
      throw new ValidationError('Invalid extraction result', { documentId: result.documentId });
    }
    if (!result.documentId.trim()) {
      throw new ValidationError('Extraction result has no document id');
    }

    const orphans = [...result.events, ...result.statements]
      .filter((fact) => fact.sourceDocumentId !== result.documentId)
      .map((fact) => fact.id);
    if (orphans.length > 0) {
      throw new ValidationError('Facts must come from the result document', {
        documentId: result.documentId,
        factIds: orphans,
      });
    }
  }

  // Caller holds the slug's lock
  private async mergeIntoTopic(
    slug: string,
    name: string,
    category: string,
    result: ExtractionResult
  ): Promise<TopicIndex> {
    const path = this.topicPath(slug);
    const timestamp = this.now().toISOString();
    const index: TopicIndex = (await readJson(path, TopicIndexSchema)) ?? {
      name,
      slug,
      category,
      documentIds: [],
      events: [],
      statements: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    if (!index.documentIds.includes(result.documentId)) {
      index.documentIds.push(result.documentId);
    }
    const addedEvents = appendNew(index.events, result.events);
    const addedStatements = appendNew(index.statements, result.statements);
    index.updatedAt = timestamp;

    await writeJsonAtomic(path, index);
    logger.debug({ topic: index.name, documentId: result.documentId, addedEvents, addedStatements }, 'Merged into topic');
    return index;
  }

  // --- Topics ---

  private topicPath(slug: string): string {
    return join(this.topicsDir, `${slug}.json`);
  }

  async getTopicIndex(name: string): Promise<TopicIndex | null> {
    const slug = slugify(name);
    if (!slug) return null;
    return readJson(this.topicPath(slug), TopicIndexSchema);
  }

  async listTopicIndices(): Promise<TopicIndex[]> {
    const files = await listJsonFiles(this.topicsDir);
    const indices = await Promise.all(files.map((file) => readJson(join(this.topicsDir, file), TopicIndexSchema)));
    return indices.filter((index): index is TopicIndex => index !== null);
  }

  async listTopicNames(): Promise<string[]> {
    const indices = await this.listTopicIndices();
    return indices.map((index) => index.name).sort();
  }

  async topicsSummary(): Promise<TopicSummary[]> {
    return rankTopics(await this.listTopicIndices());
  }

  async getEvents(topicName: string): Promise<Event[]> {
    return (await this.getTopicIndex(topicName))?.events ?? [];
  }

  async getStatements(topicName: string): Promise<Statement[]> {
    return (await this.getTopicIndex(topicName))?.statements ?? [];
  }

  async timeline(topicName: string, clock: TimeClock = 'valid'): Promise<TimelineItem[]> {
    const index = await this.getTopicIndex(topicName);
    return index ? buildTimeline(index, clock) : [];
  }

  // --- Stats ---

  async aggregateStats(): Promise<StoreStats> {
    const [documents, extractions, indices] = await Promise.all([
      listJsonFiles(this.documentsDir),
      listJsonFiles(this.extractionsDir),
      this.listTopicIndices(),
    ]);

    return {
      documents: documents.length,
      extractions: extractions.length,
      topics: indices.length,
      events: indices.reduce((sum, index) => sum + index.events.length, 0),
      statements: indices.reduce((sum, index) => sum + index.statements.length, 0),
    };
  }
}

/** Append facts whose id is not already present; returns how many were added. */
function appendNew<T extends { id: string }>(target: T[], incoming: T[]): number {
  const seen = new Set(target.map((fact) => fact.id));
  let added = 0;
  for (const fact of incoming) {
    if (seen.has(fact.id)) continue;
    seen.add(fact.id);
    target.push(fact);
    added++;
  }
  return added;
}
