export { GenerationGateway } from './gateway';
export { RateLimiter, systemClock } from './rate-limiter';
export { parseStructured } from './parse-structured';
export { createBackend, AnthropicBackend, OpenAICompatibleBackend } from './backends';
export type { BackendSettings, FetchLike } from './backends';
export * as prompts from './prompts';
export type { CallOptions, Clock, GatewayOptions, GenerationBackend } from './types';
