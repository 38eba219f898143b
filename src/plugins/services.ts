import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { GenerationGateway, RateLimiter, createBackend } from '@services/generation';
import type { Clock, GenerationBackend } from '@services/generation';
import { ExtractionService } from '@services/extraction';
import { IngestService } from '@services/ingest';
import { NewsSourceClient } from '@services/sources';
import { ArticleWriter } from '@services/synthesis';

export interface Services {
  gateway: GenerationGateway;
  extraction: ExtractionService;
  ingest: IngestService;
  writer: ArticleWriter;
}

declare module 'fastify' {
  interface FastifyInstance {
    services: Services;
  }
}

export interface ServicesPluginOptions {
  /** Generation backend; defaults to the one LLM_MODEL names */
  backend?: GenerationBackend;
  /** Document source; defaults to a client when NYT_API_KEY is set */
  source?: NewsSourceClient;
  /** Pacing clock shared by the limiter and the retry backoff */
  clock?: Clock;
}

/**
 * Wires the service graph once per app. One RateLimiter sits in front of the
 * backend, so every extraction and article shares the same outbound budget.
 */
const servicesPlugin: FastifyPluginAsync<ServicesPluginOptions> = async (fastify, opts) => {
  const { config } = fastify;

  const backend = opts.backend ?? createBackend(config);
  const limiter = new RateLimiter(config.LLM_REQUESTS_PER_MINUTE, opts.clock);
  const gateway = new GenerationGateway(backend, limiter, {
    maxRetries: config.LLM_MAX_RETRIES,
    backoffUnitMs: config.LLM_RETRY_BACKOFF_MS,
    clock: opts.clock,
  });

  const source = opts.source ?? (config.NYT_API_KEY ? new NewsSourceClient({ apiKey: config.NYT_API_KEY }) : undefined);
  const extraction = new ExtractionService(gateway, {
    maxConcurrent: config.EXTRACTION_MAX_CONCURRENT,
    timeoutMs: config.EXTRACTION_TIMEOUT,
  });

  fastify.decorate('services', {
    gateway,
    extraction,
    ingest: new IngestService(fastify.store, extraction, source),
    writer: new ArticleWriter(gateway, fastify.store),
  });

  fastify.log.info(
    { backend: backend.name, requestsPerMinute: config.LLM_REQUESTS_PER_MINUTE, source: Boolean(source) },
    'Services ready'
  );
};

export default fp(servicesPlugin, {
  name: 'services',
  dependencies: ['env', 'knowledge'],
});
