import fp from 'fastify-plugin';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUI from '@fastify/swagger-ui';
import type { FastifyPluginAsync } from 'fastify';

const swaggerPlugin: FastifyPluginAsync = async (fastify) => {
  // Register Swagger
  await fastify.register(fastifySwagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: 'Chronicle API',
        description:
          'News fact extraction with topic-indexed dual timelines. Ingest documents, extract events, statements, entities and topics, and read each topic as a timeline of when things happened and when they were reported.',
        version: '0.1.0',
      },
      // Servers are auto-detected from the browser URL
      tags: [
        { name: 'Health', description: 'Health check endpoints' },
        { name: 'Ingest', description: 'Save documents and extract their facts.' },
        { name: 'Topics', description: 'Topic summaries, timelines and synthesized articles.' },
        { name: 'Stats', description: 'Aggregate counts of the knowledge base.' },
        { name: 'Records', description: 'Raw stored documents and extraction results.' },
      ],
    },
  });

  // Register Swagger UI
  if (fastify.config.SWAGGER_ENABLED) {
    await fastify.register(fastifySwaggerUI, {
      routePrefix: fastify.config.SWAGGER_PATH,
      uiConfig: {
        docExpansion: 'none',
        deepLinking: true,
        tryItOutEnabled: true,
      },
      staticCSP: false,
    });
  }
};

export default fp(swaggerPlugin, {
  name: 'swagger',
  dependencies: ['env'],
});
