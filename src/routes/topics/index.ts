import { Type } from '@sinclair/typebox';
import type { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';
import { NotFoundError } from '@utils/errors';
import { dualTimeline, toTimelineJs } from '@services/timeline';
import type { TopicIndex } from '@services/knowledge/types';
import { Article, ErrorBody, Ok, TimelineItem, TimelineJsDocument, TopicParams, TopicSummary } from '../schemas';
import { requestSignal } from '../request-signal';

const Clock = Type.Union([Type.Literal('valid'), Type.Literal('observation')]);

const topicsRoutes: FastifyPluginAsyncTypebox = async (fastify) => {
  const { store } = fastify;

  async function requireTopic(name: string): Promise<TopicIndex> {
    const index = await store.getTopicIndex(name);
    if (!index) throw new NotFoundError(`Topic not found: ${name}`, { topic: name });
    return index;
  }

  // Coverage-ranked summary
  fastify.get(
    '/',
    {
      schema: {
        description: 'Topics ranked by coverage (documents + events + statements)',
        tags: ['Topics'],
        querystring: Type.Object({
          category: Type.Optional(Type.String()),
          limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })),
        }),
        response: {
          200: Ok(Type.Array(TopicSummary)),
        },
      },
    },
    async (request, reply) => {
      const { category, limit } = request.query;
      const ranked = await store.topicsSummary();
      const filtered = category ? ranked.filter((topic) => topic.category === category) : ranked;
      return reply.send({ success: true, data: filtered.slice(0, limit) });
    }
  );

  fastify.get(
    '/names',
    {
      schema: {
        description: 'Every topic name, sorted',
        tags: ['Topics'],
        response: {
          200: Ok(Type.Array(Type.String())),
        },
      },
    },
    async (_request, reply) => {
      return reply.send({ success: true, data: await store.listTopicNames() });
    }
  );

  fastify.get(
    '/:name/timeline',
    {
      schema: {
        description: 'Events and statements of a topic on one clock',
        tags: ['Topics'],
        params: TopicParams,
        querystring: Type.Object({
          clock: Type.Optional(Clock),
        }),
        response: {
          200: Ok(
            Type.Object({
              topic: Type.String(),
              clock: Clock,
              items: Type.Array(TimelineItem),
            })
          ),
          404: ErrorBody,
        },
      },
    },
    async (request, reply) => {
      const index = await requireTopic(request.params.name);
      const clock = request.query.clock ?? 'valid';
      return reply.send({
        success: true,
        data: { topic: index.name, clock, items: await store.timeline(index.name, clock) },
      });
    }
  );

  fastify.get(
    '/:name/timeline/dual',
    {
      schema: {
        description: 'Both orderings: when things happened and when they were reported',
        tags: ['Topics'],
        params: TopicParams,
        response: {
          200: Ok(
            Type.Object({
              topic: Type.String(),
              validTime: Type.Array(TimelineItem),
              observationTime: Type.Array(TimelineItem),
            })
          ),
          404: ErrorBody,
        },
      },
    },
    async (request, reply) => {
      const index = await requireTopic(request.params.name);
      return reply.send({ success: true, data: { topic: index.name, ...dualTimeline(index) } });
    }
  );

  // TimelineJS reads this body as-is, so it is not wrapped
  fastify.get(
    '/:name/timelinejs',
    {
      schema: {
        description: 'Valid-time timeline in TimelineJS format',
        tags: ['Topics'],
        params: TopicParams,
        response: {
          200: TimelineJsDocument,
          404: ErrorBody,
        },
      },
    },
    async (request, reply) => {
      const index = await requireTopic(request.params.name);
      return reply.send(toTimelineJs(index.name, await store.timeline(index.name, 'valid')));
    }
  );

  fastify.post(
    '/:name/article',
    {
      schema: {
        description: 'Synthesize a markdown article from the topic facts',
        tags: ['Topics'],
        params: TopicParams,
        querystring: Type.Object({
          perspectives: Type.Optional(Type.Boolean({ default: false })),
        }),
        response: {
          200: Ok(Article),
          404: ErrorBody,
          502: ErrorBody,
        },
      },
    },
    async (request, reply) => {
      const article = await fastify.services.writer.generateArticle(request.params.name, {
        perspectives: request.query.perspectives,
        signal: requestSignal(reply),
      });
      return reply.send({ success: true, data: article });
    }
  );
};

export default topicsRoutes;
