#!/usr/bin/env tsx

/**
 * Ingest Archive Script
 *
 * Loads articles, either from a local archive dump or from a range of months
 * of the archive API, and posts them to a running server in batches.
 *
 *   ARCHIVE_FILE=./2024-03.json tsx scripts/ingest-archive.ts
 *   YEAR=2024 MONTH=3 NYT_API_KEY=... tsx scripts/ingest-archive.ts
 *   YEAR=2023 MONTH=11 END_YEAR=2024 END_MONTH=2 NYT_API_KEY=... tsx scripts/ingest-archive.ts
 *
 * Filters: SECTIONS (comma-separated), QUERY, MAX_DOCUMENTS.
 */

import { readFile } from 'node:fs/promises';
import { NewsSourceClient, filterDocuments, parseArchive } from '@services/sources';
import { isRecord } from '@utils/guards';
import type { Document } from '@services/knowledge/types';

const API_URL = process.env.API_URL || 'http://localhost:3000';
const API_BASE = `${API_URL}/api/v1`;
const ARCHIVE_FILE = process.argv[2] ?? process.env.ARCHIVE_FILE;
const SECTIONS = (process.env.SECTIONS ?? '')
  .split(',')
  .map((section) => section.trim())
  .filter(Boolean);
const QUERY = process.env.QUERY;
const MAX_DOCUMENTS = process.env.MAX_DOCUMENTS ? parseInt(process.env.MAX_DOCUMENTS, 10) : undefined;
const BATCH_SIZE = parseInt(process.env.BATCH_SIZE || '10', 10);
const TOPIC = process.env.TOPIC;
const MODE = process.env.MODE === 'fail-fast' ? 'fail-fast' : 'partial';

async function loadDocuments(): Promise<Document[]> {
  const filters = { sections: SECTIONS, query: QUERY, maxDocuments: MAX_DOCUMENTS };

  if (ARCHIVE_FILE) {
    const payload: unknown = JSON.parse(await readFile(ARCHIVE_FILE, 'utf8'));
    return parseArchive(payload, filters);
  }

  const year = parseInt(process.env.YEAR ?? '', 10);
  const month = parseInt(process.env.MONTH ?? '', 10);
  const apiKey = process.env.NYT_API_KEY;
  if (!apiKey || Number.isNaN(year) || Number.isNaN(month)) {
    throw new Error('Pass an archive file, or set YEAR, MONTH and NYT_API_KEY');
  }

  const endYear = process.env.END_YEAR ? parseInt(process.env.END_YEAR, 10) : year;
  const endMonth = process.env.END_MONTH ? parseInt(process.env.END_MONTH, 10) : month;

  const client = new NewsSourceClient({ apiKey });
  const months = await client.fetchArchiveRange({ year, month }, { year: endYear, month: endMonth });
  return filterDocuments(
    months.flatMap((archive) => archive.documents),
    filters
  );
}

interface BatchSummary {
  extracted: number;
  failed: number;
  topics: string[];
}

function readSummary(body: unknown): BatchSummary | undefined {
  const data = isRecord(body) ? body.data : undefined;
  if (!isRecord(data) || typeof data.extracted !== 'number' || !Array.isArray(data.failed)) return undefined;
  const topics = Array.isArray(data.discoveredTopics)
    ? data.discoveredTopics.filter((topic): topic is string => typeof topic === 'string')
    : [];
  return { extracted: data.extracted, failed: data.failed.length, topics };
}

function readErrorMessage(body: unknown): string {
  const error = isRecord(body) ? body.error : undefined;
  return isRecord(error) && typeof error.message === 'string' ? error.message : 'unknown error';
}

async function postBatch(documents: Document[]): Promise<BatchSummary> {
  const response = await fetch(`${API_BASE}/ingest/documents`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ documents, topic: TOPIC, mode: MODE }),
  });
  const body: unknown = await response.json();
  if (!response.ok) {
    throw new Error(`Ingest failed (${response.status}): ${readErrorMessage(body)}`);
  }

  const summary = readSummary(body);
  if (!summary) throw new Error('Unexpected ingest response');
  return summary;
}

async function main() {
  const documents = await loadDocuments();
  console.log(`📰 Loaded ${documents.length} documents`);
  if (documents.length === 0) return;

  const topics = new Set<string>();
  let extracted = 0;
  let failed = 0;

  for (let i = 0; i < documents.length; i += BATCH_SIZE) {
    const batch = documents.slice(i, i + BATCH_SIZE);
    const result = await postBatch(batch);
    extracted += result.extracted;
    failed += result.failed;
    result.topics.forEach((topic) => topics.add(topic));
    console.log(`  ${Math.min(i + BATCH_SIZE, documents.length)}/${documents.length} posted (${result.failed} failed)`);
  }

  console.log(`\n✅ Extracted ${extracted}, failed ${failed}, ${topics.size} topics touched`);
}

main().catch((err: unknown) => {
  console.error('❌', err instanceof Error ? err.message : err);
  process.exit(1);
});
