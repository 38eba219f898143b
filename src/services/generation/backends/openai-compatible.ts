import { isRecord } from '@utils/guards';
import type { ModelConfig } from '@config/llm-models';
import type { CallOptions, GenerationBackend } from '../types';
import { postJson } from './http';
import type { FetchLike } from './http';

/**
 * Chat-completions backend for Gemini, Groq and OpenAI.
 */
export class OpenAICompatibleBackend implements GenerationBackend {
  readonly name: string;

  constructor(
    private readonly model: ModelConfig,
    private readonly apiKey: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.name = `${model.provider}:${model.id}`;
  }

  async complete(prompt: string, systemPrompt: string, options: CallOptions = {}): Promise<string> {
    // OpenAI uses max_completion_tokens, the others max_tokens
    const maxTokensKey = this.model.provider === 'openai' ? 'max_completion_tokens' : 'max_tokens';
    // GPT-5 family doesn't support temperature
    const supportsTemp = this.model.supportsTemperature !== false;

    const data = await postJson(`${this.model.baseUrl}/chat/completions`, {
      provider: this.model.provider,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        model: this.model.id,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: prompt },
        ],
        ...(supportsTemp && { temperature: this.model.defaultTemperature }),
        [maxTokensKey]: this.model.maxTokens,
      },
      timeoutMs: this.timeoutMs,
      signal: options.signal,
      fetchImpl: this.fetchImpl,
    });

    return readChoiceContent(data);
  }
}

function readChoiceContent(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices)) return '';
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return '';
  const content = first.message.content;
  return typeof content === 'string' ? content : '';
}
