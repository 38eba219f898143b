import { getApiKey, getModelConfig } from '@config/llm-models';
import type { ApiKeys } from '@config/llm-models';
import type { GenerationBackend } from '../types';
import { AnthropicBackend } from './anthropic';
import { OpenAICompatibleBackend } from './openai-compatible';
import type { FetchLike } from './http';

export { AnthropicBackend } from './anthropic';
export { OpenAICompatibleBackend } from './openai-compatible';
export type { FetchLike } from './http';

export interface BackendSettings extends ApiKeys {
  LLM_MODEL: string;
  LLM_TIMEOUT: number;
}

/** Build the backend for the configured model. Throws when its API key is missing. */
export function createBackend(settings: BackendSettings, fetchImpl?: FetchLike): GenerationBackend {
  const model = getModelConfig(settings.LLM_MODEL);
  const apiKey = getApiKey(model.provider, settings);

  if (model.provider === 'anthropic') {
    return new AnthropicBackend(model, apiKey, settings.LLM_TIMEOUT, fetchImpl);
  }
  return new OpenAICompatibleBackend(model, apiKey, settings.LLM_TIMEOUT, fetchImpl);
}
