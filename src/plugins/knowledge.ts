import { resolve } from 'node:path';
import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { KnowledgeStore } from '@services/knowledge';

declare module 'fastify' {
  interface FastifyInstance {
    store: KnowledgeStore;
  }
}

export interface KnowledgePluginOptions {
  /** Pre-built store; defaults to one rooted at DATA_DIR */
  store?: KnowledgeStore;
}

const knowledgePlugin: FastifyPluginAsync<KnowledgePluginOptions> = async (fastify, opts) => {
  const store = opts.store ?? new KnowledgeStore({ dataDir: resolve(fastify.config.DATA_DIR) });

  // Create the directory layout before the first request
  await store.init();

  fastify.decorate('store', store);
  fastify.log.info({ dataDir: store.dataDir }, 'Knowledge store ready');
};

export default fp(knowledgePlugin, {
  name: 'knowledge',
  dependencies: ['env'],
});
