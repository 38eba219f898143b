export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * A text-generation provider. Implementations throw TransientBackendError on
 * throttling and PermanentBackendError on anything else.
 */
export interface GenerationBackend {
  readonly name: string;
  complete(prompt: string, systemPrompt: string, options?: CallOptions): Promise<string>;
}

/** Time source for the rate limiter and retry backoff. */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface GatewayOptions {
  /** Retries after the first attempt on a throttling signal */
  maxRetries: number;
  /** Backoff after the k-th throttled attempt is k times this */
  backoffUnitMs: number;
  clock?: Clock;
}
