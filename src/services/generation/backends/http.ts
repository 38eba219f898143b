import { PermanentBackendError, TransientBackendError } from '@utils/errors';
import { abortReason } from '@core/concurrency';

const THROTTLE_PATTERN = /quota|RESOURCE_EXHAUSTED|rate[_ ]limit/i;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface PostJsonOptions {
  provider: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl: FetchLike;
}

/**
 * POST a JSON body and return the parsed JSON response, classifying failures:
 * throttling is transient, everything else permanent. Cancellation by the
 * caller's signal propagates as the signal's reason.
 */
export async function postJson(url: string, options: PostJsonOptions): Promise<unknown> {
  const { provider, signal } = options;
  const signals = [AbortSignal.timeout(options.timeoutMs)];
  if (signal) signals.push(signal);

  let response: Response;
  try {
    response = await options.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(options.body),
      signal: AbortSignal.any(signals),
    });
  } catch (error) {
    if (signal?.aborted) throw abortReason(signal);
    const timedOut = error instanceof Error && error.name === 'TimeoutError';
    throw new PermanentBackendError(
      timedOut ? `${provider} call timed out after ${options.timeoutMs}ms` : `${provider} call failed: network error`,
      { provider },
      { cause: error }
    );
  }

  if (!response.ok) {
    const text = await response.text();
    const details = { provider, status: response.status };
    if (response.status === 429 || THROTTLE_PATTERN.test(text)) {
      throw new TransientBackendError(`${provider} throttled: ${response.status}`, details);
    }
    throw new PermanentBackendError(`${provider} call failed: ${response.status} - ${text.slice(0, 500)}`, details);
  }

  try {
    const data: unknown = await response.json();
    return data;
  } catch (error) {
    throw new PermanentBackendError(`${provider} returned a non-JSON body`, { provider }, { cause: error });
  }
}
