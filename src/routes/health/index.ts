import { Type } from '@sinclair/typebox';
import type { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';

const ReadyServices = Type.Object({
  store: Type.Boolean(),
  generation: Type.Boolean(),
  source: Type.Boolean(),
});

const healthRoutes: FastifyPluginAsyncTypebox = async (fastify) => {
  // Liveness
  fastify.get(
    '/health',
    {
      schema: {
        description: 'Health check endpoint',
        tags: ['Health'],
        response: {
          200: Type.Object({
            status: Type.Literal('ok'),
            timestamp: Type.String(),
            uptime: Type.Number(),
            environment: Type.String(),
          }),
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: 'ok',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        environment: fastify.config.NODE_ENV,
      });
    }
  );

  // Readiness: the data directory is writable and a generation backend is wired
  fastify.get(
    '/ready',
    {
      schema: {
        description: 'Readiness check endpoint - checks the knowledge store and generation backend',
        tags: ['Health'],
        response: {
          200: Type.Object({
            status: Type.Literal('ready'),
            services: ReadyServices,
            backend: Type.String(),
            timestamp: Type.String(),
          }),
          503: Type.Object({
            status: Type.Literal('not_ready'),
            services: ReadyServices,
            backend: Type.String(),
            timestamp: Type.String(),
          }),
        },
      },
    },
    async (_request, reply) => {
      const storeReady = await fastify.store.isWritable();
      if (!storeReady) {
        fastify.log.error({ dataDir: fastify.store.dataDir }, 'Knowledge store is not writable');
      }

      const services = {
        store: storeReady,
        generation: Boolean(fastify.services.gateway.backendName),
        source: fastify.services.ingest.hasSource,
      };
      const backend = fastify.services.gateway.backendName;
      const timestamp = new Date().toISOString();

      if (services.store && services.generation) {
        return reply.send({ status: 'ready', services, backend, timestamp });
      }
      return reply.status(503).send({ status: 'not_ready', services, backend, timestamp });
    }
  );
};

export default healthRoutes;
