export { KnowledgeStore } from './store';
export type { KnowledgeStoreOptions } from './store';
export { slugify, fileKey, MAX_SLUG_LENGTH } from './slugify';
export * from './types';
