/**
 * Retry decorator for any completion provider.
 * Applies the caller's RetryPolicy: fixed or exponential delay between attempts,
 * always exponential (and at least the backend's Retry-After hint) when rate limited.
 */

import type { CompletionOptions, ICompletionProvider } from './ICompletionProvider.js';
import type { ILogProvider } from './ILogProvider.js';
import type { RetryPolicy } from '../config.js';
import { CompletionError, describeError } from '../errors.js';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryingCompletionProvider implements ICompletionProvider {
  constructor(
    private readonly inner: ICompletionProvider,
    private readonly policy: RetryPolicy,
    private readonly logProvider?: ILogProvider,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const { maxRetries } = this.policy;
    const { signal } = options;
    let lastError: unknown;
    let attempts = 0;

    while (attempts < maxRetries) {
      signal?.throwIfAborted();
      attempts++;
      try {
        return await this.inner.complete(prompt, options);
      } catch (err) {
        signal?.throwIfAborted();
        lastError = err;
        if (attempts >= maxRetries || !isRetryable(err)) break;

        const delayMs = this.delayFor(attempts, err);
        this.logProvider?.warn('Completion attempt failed, retrying', {
          attempt: attempts,
          maxRetries,
          delayMs,
          error: describeError(err),
        });
        await this.sleep(delayMs);
      }
    }

    this.logProvider?.error('Completion failed', {
      attempts,
      error: describeError(lastError),
    });

    const status = lastError instanceof CompletionError ? lastError.status : undefined;
    const rateLimited = lastError instanceof CompletionError && lastError.rateLimited;
    throw new CompletionError(
      `Completion failed after ${attempts} attempt(s): ${describeError(lastError)}`,
      { status, rateLimited, attempts, cause: lastError }
    );
  }

  /** Delay before attempt `attempt + 1`. */
  delayFor(attempt: number, err: unknown): number {
    const { retryDelayMs, maxDelayMs, backoff } = this.policy;
    const exponential = retryDelayMs * 2 ** (attempt - 1);

    if (err instanceof CompletionError && err.rateLimited) {
      return Math.min(maxDelayMs, Math.max(exponential, err.retryAfterMs ?? 0));
    }
    return Math.min(maxDelayMs, backoff === 'exponential' ? exponential : retryDelayMs);
  }
}

/** Client errors other than timeouts and rate limits will not succeed on retry. */
function isRetryable(err: unknown): boolean {
  if (!(err instanceof CompletionError) || err.status === undefined) return true;
  if (err.rateLimited || err.status === 408) return true;
  return err.status < 400 || err.status >= 500;
}
