import fp from 'fastify-plugin';
import fastifyEnv from '@fastify/env';
import { Type } from '@sinclair/typebox';
import type { Static } from '@sinclair/typebox';

const envSchema = Type.Object({
  NODE_ENV: Type.String({ default: 'development' }),
  PORT: Type.Number({ default: 3000 }),
  HOST: Type.String({ default: '0.0.0.0' }),
  LOG_LEVEL: Type.String({ default: 'info' }),

  // API
  API_PREFIX: Type.String({ default: '/api' }),
  API_VERSION: Type.String({ default: 'v1' }),

  // Rate Limiting (inbound HTTP)
  RATE_LIMIT_MAX: Type.Number({ default: 100 }),
  RATE_LIMIT_TIME_WINDOW: Type.Number({ default: 60000 }),

  // CORS
  CORS_ORIGIN: Type.String({ default: 'http://localhost:3001,http://localhost:3000' }),
  CORS_CREDENTIALS: Type.Boolean({ default: true }),

  // Monitoring
  METRICS_ENABLED: Type.Boolean({ default: true }),
  METRICS_PATH: Type.String({ default: '/metrics' }),

  // Swagger
  SWAGGER_ENABLED: Type.Boolean({ default: true }),
  SWAGGER_PATH: Type.String({ default: '/documentation' }),

  // Knowledge store
  DATA_DIR: Type.String({ default: 'data' }),

  // LLM - Model selection
  LLM_MODEL: Type.String({ default: 'gemini-2.0-flash' }),
  LLM_TIMEOUT: Type.Number({ default: 60000 }),

  // LLM - Outbound pacing and retries
  LLM_REQUESTS_PER_MINUTE: Type.Number({ default: 20, minimum: 1 }),
  LLM_MAX_RETRIES: Type.Number({ default: 3, minimum: 0 }),
  LLM_RETRY_BACKOFF_MS: Type.Number({ default: 10000, minimum: 0 }),

  // Extraction
  EXTRACTION_MAX_CONCURRENT: Type.Number({ default: 5, minimum: 1 }),
  EXTRACTION_TIMEOUT: Type.Number({ default: 0, minimum: 0 }),

  // LLM - Provider API Keys
  GEMINI_API_KEY: Type.String({ default: '' }),
  GROQ_API_KEY: Type.String({ default: '' }),
  ANTHROPIC_API_KEY: Type.String({ default: '' }),
  OPENAI_API_KEY: Type.String({ default: '' }),

  // Document source
  NYT_API_KEY: Type.String({ default: '' }),
});

export type Env = Static<typeof envSchema>;

declare module 'fastify' {
  interface FastifyInstance {
    config: Env;
  }
}

export interface EnvPluginOptions {
  /** Values layered over process.env, mainly for tests */
  overrides?: Record<string, string | number | boolean>;
}

export default fp<EnvPluginOptions>(
  async function envPlugin(fastify, opts) {
    await fastify.register(fastifyEnv, {
      confKey: 'config',
      schema: envSchema,
      dotenv: process.env.NODE_ENV !== 'test',
      data: { ...process.env, ...opts.overrides },
    });

    // Set the config for non-Fastify contexts
    setConfig(fastify.config);
  },
  {
    name: 'env',
  }
);

let config: Env | null = null;

export function setConfig(c: Env) {
  config = c;
}

export function getConfig(): Env {
  if (!config) throw new Error('Config not initialized');
  return config;
}
