import Fastify from 'fastify';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { formatErrorResponse, statusCodeOf } from '@utils/errors';
import { logger, loggerOptions } from '@utils/logger';
import type { KnowledgeStore } from '@services/knowledge';
import type { Clock, GenerationBackend } from '@services/generation';
import type { NewsSourceClient } from '@services/sources';

// Import plugins
import envPlugin from '@plugins/env';
import corsPlugin from '@plugins/cors';
import knowledgePlugin from '@plugins/knowledge';
import servicesPlugin from '@plugins/services';
import metricsPlugin from '@plugins/metrics';
import swaggerPlugin from '@plugins/swagger';

// Import routes
import rootRoutes from '@routes/root';
import healthRoutes from '@routes/health/index';
import ingestRoutes from '@routes/ingest/index';
import topicsRoutes from '@routes/topics/index';
import recordsRoutes from '@routes/records/index';

export interface AppOptions {
  /** Values layered over process.env */
  env?: Record<string, string | number | boolean>;
  store?: KnowledgeStore;
  backend?: GenerationBackend;
  source?: NewsSourceClient;
  clock?: Clock;
}

export async function buildApp(options: AppOptions = {}) {
  const app = Fastify({
    logger: loggerOptions,
    trustProxy: true,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    disableRequestLogging: true,
    maxParamLength: 300,
  }).withTypeProvider<TypeBoxTypeProvider>();

  // Register plugins
  await app.register(envPlugin, { overrides: options.env });
  await app.register(corsPlugin);
  await app.register(knowledgePlugin, { store: options.store });
  await app.register(servicesPlugin, { backend: options.backend, source: options.source, clock: options.clock });
  await app.register(metricsPlugin);
  await app.register(swaggerPlugin);

  const sensiblePlugin = await import('@fastify/sensible');
  await app.register(sensiblePlugin.default);

  const helmetPlugin = await import('@fastify/helmet');
  await app.register(helmetPlugin.default, {
    contentSecurityPolicy: false,
  });

  const rateLimitPlugin = await import('@fastify/rate-limit');
  await app.register(rateLimitPlugin.default, {
    max: app.config.RATE_LIMIT_MAX,
    timeWindow: app.config.RATE_LIMIT_TIME_WINDOW,
  });

  await app.register(rootRoutes);

  await app.register(
    async function apiRoutes(fastify) {
      await fastify.register(healthRoutes);
      await fastify.register(ingestRoutes, { prefix: '/ingest' });
      await fastify.register(topicsRoutes, { prefix: '/topics' });
      await fastify.register(recordsRoutes);
    },
    { prefix: `${app.config.API_PREFIX}/${app.config.API_VERSION}` }
  );

  app.setErrorHandler((error, request, reply) => {
    const statusCode = statusCodeOf(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.warn({ err: error, statusCode }, 'Request rejected');
    }
    return reply.status(statusCode).send(formatErrorResponse(error, request.url, request.id));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      success: false,
      error: {
        message: 'Route not found',
        code: 'NotFound',
        statusCode: 404,
        timestamp: new Date().toISOString(),
        path: request.url,
        requestId: request.id,
      },
    });
  });

  app.addHook('onClose', async () => {
    logger.info('Server is shutting down...');
  });

  return app;
}
