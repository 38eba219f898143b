import fp from 'fastify-plugin';
import fastifyCors from '@fastify/cors';
import type { FastifyPluginAsync } from 'fastify';

const corsPlugin: FastifyPluginAsync = async (fastify) => {
  const allowedOrigins = fastify.config.CORS_ORIGIN.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  await fastify.register(fastifyCors, {
    origin: (origin, cb) => {
      // Server-to-server and curl requests carry no origin
      if (!origin || allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
        cb(null, true);
        return;
      }

      fastify.log.warn({ origin }, 'CORS request rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    credentials: fastify.config.CORS_CREDENTIALS,
    methods: ['GET', 'POST', 'OPTIONS'],
    exposedHeaders: ['Content-Length', 'x-request-id'],
  });
};

export default fp(corsPlugin, {
  name: 'cors',
  dependencies: ['env'],
});
