import { MalformedOutputError, PermanentExtractionError, TransientBackendError } from '@utils/errors';
import { throwIfAborted } from '@core/concurrency';
import { createLogger } from '@utils/logger';
import { parseStructured } from './parse-structured';
import { SYSTEM_PROMPT } from './prompts';
import { systemClock } from './rate-limiter';
import type { RateLimiter } from './rate-limiter';
import type { CallOptions, Clock, GatewayOptions, GenerationBackend } from './types';

const logger = createLogger('generation');

/**
 * The only path to the generation backend.
 *
 * Every attempt, retries included, goes through the shared rate limiter.
 * Throttling is retried with linear backoff; every other failure propagates
 * on the first occurrence.
 */
export class GenerationGateway {
  private readonly maxRetries: number;
  private readonly backoffUnitMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly backend: GenerationBackend,
    private readonly limiter: RateLimiter,
    options: GatewayOptions
  ) {
    this.maxRetries = options.maxRetries;
    this.backoffUnitMs = options.backoffUnitMs;
    this.clock = options.clock ?? systemClock;
  }

  get backendName(): string {
    return this.backend.name;
  }

  async generate(prompt: string, systemPrompt = SYSTEM_PROMPT, options: CallOptions = {}): Promise<string> {
    const { signal } = options;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);
      await this.limiter.acquire(signal);

      try {
        return await this.backend.complete(prompt, systemPrompt, { signal });
      } catch (error) {
        if (!(error instanceof TransientBackendError)) throw error;

        if (attempt > this.maxRetries) {
          logger.error(
            { backend: this.backend.name, attempts: attempt, err: error },
            'Generation retries exhausted'
          );
          throw new PermanentExtractionError(
            `Generation failed after ${attempt} attempts: ${error.message}`,
            { backend: this.backend.name, attempts: attempt },
            { cause: error }
          );
        }

        const backoffMs = attempt * this.backoffUnitMs;
        logger.warn({ backend: this.backend.name, attempt, backoffMs }, 'Backend throttled, backing off');
        await this.clock.sleep(backoffMs, signal);
      }
    }
  }

  /** generate() followed by parseStructured(); throws MalformedOutputError when nothing parses. */
  async generateStructured(prompt: string, systemPrompt = SYSTEM_PROMPT, options: CallOptions = {}): Promise<unknown> {
    const text = await this.generate(prompt, systemPrompt, options);
    const parsed = parseStructured(text);

    if (parsed === undefined) {
      logger.warn({ backend: this.backend.name, raw: text.slice(0, 200) }, 'Model output had no structured data');
      throw new MalformedOutputError(undefined, { preview: text.slice(0, 200) });
    }

    return parsed;
  }
}
