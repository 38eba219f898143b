/**
 * LLM Model Configuration
 * Maps model ids to the provider that serves them and the settings used for extraction
 */

import type { Env } from '@plugins/env';

export type Provider = 'gemini' | 'groq' | 'openai' | 'anthropic';

export interface ModelConfig {
  id: string;
  provider: Provider;
  baseUrl: string;
  supportsTemperature?: boolean; // defaults to true
  defaultTemperature: number;
  maxTokens: number;
  description: string;
}

const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai';
const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
const OPENAI_BASE_URL = 'https://api.openai.com/v1';
const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1';

export const MODEL_CONFIGS: Record<string, ModelConfig> = {
  // Gemini - served through its OpenAI-compatible endpoint
  'gemini-2.0-flash': {
    id: 'gemini-2.0-flash',
    provider: 'gemini',
    baseUrl: GEMINI_BASE_URL,
    defaultTemperature: 0.2,
    maxTokens: 8192,
    description: 'Default. Fast, long context, generous free tier.',
  },
  'gemini-2.5-flash': {
    id: 'gemini-2.5-flash',
    provider: 'gemini',
    baseUrl: GEMINI_BASE_URL,
    defaultTemperature: 0.2,
    maxTokens: 8192,
    description: 'Stronger reasoning, slower.',
  },

  // Groq
  'llama-3.3-70b-versatile': {
    id: 'llama-3.3-70b-versatile',
    provider: 'groq',
    baseUrl: GROQ_BASE_URL,
    defaultTemperature: 0.2,
    maxTokens: 4096,
    description: 'Balanced speed/quality. Follows JSON instructions well.',
  },
  'llama-3.1-8b-instant': {
    id: 'llama-3.1-8b-instant',
    provider: 'groq',
    baseUrl: GROQ_BASE_URL,
    defaultTemperature: 0.2,
    maxTokens: 2048,
    description: 'Fast, cheap. Misses quotes in long articles.',
  },

  // Anthropic
  'claude-haiku-4-5': {
    id: 'claude-haiku-4-5',
    provider: 'anthropic',
    baseUrl: ANTHROPIC_BASE_URL,
    defaultTemperature: 0.2,
    maxTokens: 4096,
    description: 'Fast, cheap. Great for structured extraction.',
  },
  'claude-sonnet-4-5': {
    id: 'claude-sonnet-4-5',
    provider: 'anthropic',
    baseUrl: ANTHROPIC_BASE_URL,
    defaultTemperature: 0.2,
    maxTokens: 8192,
    description: 'Best for article synthesis.',
  },

  // OpenAI - GPT-5 family (no temperature control)
  'gpt-5-mini': {
    id: 'gpt-5-mini',
    provider: 'openai',
    baseUrl: OPENAI_BASE_URL,
    supportsTemperature: false,
    defaultTemperature: 1,
    maxTokens: 4096,
    description: 'Balanced GPT-5 variant.',
  },
  'gpt-4o-mini': {
    id: 'gpt-4o-mini',
    provider: 'openai',
    baseUrl: OPENAI_BASE_URL,
    defaultTemperature: 0.2,
    maxTokens: 4096,
    description: 'Fast, cheap.',
  },
};

/**
 * Get model config with fallback to defaults
 */
export function getModelConfig(modelId: string): ModelConfig {
  return MODEL_CONFIGS[modelId] ?? {
    id: modelId,
    provider: 'gemini',
    baseUrl: GEMINI_BASE_URL,
    defaultTemperature: 0.2,
    maxTokens: 4096,
    description: 'Unknown model - using safe defaults',
  };
}

export type ApiKeys = Pick<Env, 'GEMINI_API_KEY' | 'GROQ_API_KEY' | 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'>;

/**
 * Get the API key for a provider from env config
 */
export function getApiKey(provider: Provider, env: ApiKeys): string {
  const keyMap: Record<Provider, string> = {
    gemini: env.GEMINI_API_KEY,
    groq: env.GROQ_API_KEY,
    anthropic: env.ANTHROPIC_API_KEY,
    openai: env.OPENAI_API_KEY,
  };

  const key = keyMap[provider];
  if (!key) {
    throw new Error(`No API key configured for provider: ${provider}. Set ${provider.toUpperCase()}_API_KEY in .env`);
  }
  return key;
}
