import { Type } from '@sinclair/typebox';
import type { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';
import { ExtractionError } from '@utils/errors';
import type { IngestResult as IngestOutcome } from '@services/ingest';
import { BatchOptions, DocumentInput, ErrorBody, IngestResult, Ok, toDocument } from '../schemas';
import { requestSignal } from '../request-signal';

const ingestRoutes: FastifyPluginAsyncTypebox = async (fastify) => {
  const { extractedDocuments } = fastify.metrics;

  const record = (result: IngestOutcome): IngestOutcome => {
    extractedDocuments.inc({ status: 'succeeded' }, result.extracted);
    if (result.failed.length > 0) extractedDocuments.inc({ status: 'failed' }, result.failed.length);
    return result;
  };

  // Fail-fast batches report the failing document through the error handler
  const recordFailure = (error: unknown): never => {
    if (error instanceof ExtractionError) extractedDocuments.inc({ status: 'failed' });
    throw error;
  };

  fastify.post(
    '/documents',
    {
      schema: {
        description: 'Save documents, extract their facts and merge them into the knowledge base',
        tags: ['Ingest'],
        body: Type.Object({
          documents: Type.Array(DocumentInput, { minItems: 1, maxItems: 500 }),
          ...BatchOptions,
        }),
        response: {
          200: Ok(IngestResult),
          400: ErrorBody,
          502: ErrorBody,
        },
      },
    },
    async (request, reply) => {
      const { documents, topic, maxConcurrent, mode } = request.body;

      const result = await fastify.services.ingest
        .ingest({ documents: documents.map(toDocument), topic, maxConcurrent, mode }, { signal: requestSignal(reply) })
        .then(record, recordFailure);

      return reply.send({ success: true, data: result });
    }
  );

  fastify.post(
    '/search',
    {
      schema: {
        description: 'Pull recent documents from the news source, then ingest them',
        tags: ['Ingest'],
        body: Type.Object({
          query: Type.Optional(Type.String()),
          days: Type.Optional(Type.Integer({ minimum: 1, maximum: 365, default: 7 })),
          maxDocuments: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, default: 50 })),
          sections: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
          ...BatchOptions,
        }),
        response: {
          200: Ok(IngestResult),
          400: ErrorBody,
          502: ErrorBody,
          503: ErrorBody,
        },
      },
    },
    async (request, reply) => {
      const { query, days, maxDocuments, sections, topic, maxConcurrent, mode } = request.body;

      const result = await fastify.services.ingest
        .ingestRecent({ query, days, maxDocuments, sections }, { topic, maxConcurrent, mode }, { signal: requestSignal(reply) })
        .then(record, recordFailure);

      return reply.send({ success: true, data: result });
    }
  );
};

export default ingestRoutes;
