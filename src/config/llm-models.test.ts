import { describe, it, expect } from 'vitest';
import { getModelConfig, getApiKey, MODEL_CONFIGS } from './llm-models';
import type { ApiKeys } from './llm-models';

describe('getModelConfig', () => {
  it('returns config for the default Gemini model', () => {
    const config = getModelConfig('gemini-2.0-flash');
    expect(config.provider).toBe('gemini');
    expect(config.baseUrl).toBe('https://generativelanguage.googleapis.com/v1beta/openai');
  });

  it('returns config for known Groq model', () => {
    const config = getModelConfig('llama-3.3-70b-versatile');
    expect(config.provider).toBe('groq');
    expect(config.baseUrl).toBe('https://api.groq.com/openai/v1');
  });

  it('returns config for known Anthropic model', () => {
    const config = getModelConfig('claude-sonnet-4-5');
    expect(config.provider).toBe('anthropic');
    expect(config.baseUrl).toBe('https://api.anthropic.com/v1');
  });

  it('returns fallback for unknown model', () => {
    const config = getModelConfig('unknown-model-xyz');
    expect(config.id).toBe('unknown-model-xyz');
    expect(config.provider).toBe('gemini');
    expect(config.description).toContain('Unknown model');
  });

  it('includes supportsTemperature for GPT-5 models', () => {
    expect(getModelConfig('gpt-5-mini').supportsTemperature).toBe(false);
    expect(getModelConfig('gpt-4o-mini').supportsTemperature).toBeUndefined(); // defaults to true
  });
});

describe('getApiKey', () => {
  const keys: ApiKeys = {
    GEMINI_API_KEY: 'gemini-test-key',
    GROQ_API_KEY: 'groq-test-key',
    OPENAI_API_KEY: 'openai-test-key',
    ANTHROPIC_API_KEY: 'anthropic-test-key',
  };

  it('returns the key for each provider', () => {
    expect(getApiKey('gemini', keys)).toBe('gemini-test-key');
    expect(getApiKey('groq', keys)).toBe('groq-test-key');
    expect(getApiKey('openai', keys)).toBe('openai-test-key');
    expect(getApiKey('anthropic', keys)).toBe('anthropic-test-key');
  });

  it('throws when API key is missing', () => {
    const empty: ApiKeys = { GEMINI_API_KEY: '', GROQ_API_KEY: '', OPENAI_API_KEY: '', ANTHROPIC_API_KEY: '' };
    expect(() => getApiKey('gemini', empty)).toThrow(
      'No API key configured for provider: gemini. Set GEMINI_API_KEY in .env'
    );
  });
});

describe('MODEL_CONFIGS', () => {
  it('has all expected providers', () => {
    const providers = new Set(Object.values(MODEL_CONFIGS).map((c) => c.provider));
    expect([...providers].sort()).toEqual(['anthropic', 'gemini', 'groq', 'openai']);
  });

  it('all configs have required fields', () => {
    for (const [key, config] of Object.entries(MODEL_CONFIGS)) {
      expect(config.id).toBe(key);
      expect(config.baseUrl).toMatch(/^https:\/\//);
      expect(typeof config.defaultTemperature).toBe('number');
      expect(config.maxTokens).toBeGreaterThan(0);
      expect(config.description).toBeTruthy();
    }
  });
});
