import { Type } from '@sinclair/typebox';
import type { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';
import { NotFoundError } from '@utils/errors';
import { DocumentSchema, ExtractionResultSchema } from '@services/knowledge/types';
import { ErrorBody, Ok, StoreStats } from '../schemas';

/** Raw stored records and aggregate counts. */
const recordsRoutes: FastifyPluginAsyncTypebox = async (fastify) => {
  const { store } = fastify;

  fastify.get(
    '/stats',
    {
      schema: {
        description: 'Aggregate statistics of the knowledge base',
        tags: ['Stats'],
        response: {
          200: Ok(StoreStats),
        },
      },
    },
    async (_request, reply) => {
      return reply.send({ success: true, data: await store.aggregateStats() });
    }
  );

  fastify.get(
    '/documents/:id',
    {
      schema: {
        description: 'A stored document',
        tags: ['Records'],
        params: Type.Object({ id: Type.String({ minLength: 1 }) }),
        response: {
          200: Ok(DocumentSchema),
          404: ErrorBody,
        },
      },
    },
    async (request, reply) => {
      const document = await store.getDocument(request.params.id);
      if (!document) throw new NotFoundError(`Document not found: ${request.params.id}`);
      return reply.send({ success: true, data: document });
    }
  );

  fastify.get(
    '/extractions/:documentId',
    {
      schema: {
        description: 'The extraction result of a document',
        tags: ['Records'],
        params: Type.Object({ documentId: Type.String({ minLength: 1 }) }),
        response: {
          200: Ok(ExtractionResultSchema),
          404: ErrorBody,
        },
      },
    },
    async (request, reply) => {
      const result = await store.getExtractionResult(request.params.documentId);
      if (!result) throw new NotFoundError(`No extraction for document: ${request.params.documentId}`);
      return reply.send({ success: true, data: result });
    }
  );
};

export default recordsRoutes;
