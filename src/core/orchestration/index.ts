export * from './types';
export * from './performance-tracker';
export * from './base-orchestrator';
