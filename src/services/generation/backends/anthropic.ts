import { isRecord } from '@utils/guards';
import type { ModelConfig } from '@config/llm-models';
import type { CallOptions, GenerationBackend } from '../types';
import { postJson } from './http';
import type { FetchLike } from './http';

export class AnthropicBackend implements GenerationBackend {
  readonly name: string;

  constructor(
    private readonly model: ModelConfig,
    private readonly apiKey: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.name = `anthropic:${model.id}`;
  }

  async complete(prompt: string, systemPrompt: string, options: CallOptions = {}): Promise<string> {
    const data = await postJson(`${this.model.baseUrl}/messages`, {
      provider: 'anthropic',
      headers: {
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: {
        model: this.model.id,
        max_tokens: this.model.maxTokens,
        temperature: this.model.defaultTemperature,
        system: systemPrompt,
        messages: [{ role: 'user', content: prompt }],
      },
      timeoutMs: this.timeoutMs,
      signal: options.signal,
      fetchImpl: this.fetchImpl,
    });

    if (!isRecord(data) || !Array.isArray(data.content)) return '';
    return data.content
      .map((block: unknown) => (isRecord(block) && typeof block.text === 'string' ? block.text : ''))
      .join('');
  }
}
