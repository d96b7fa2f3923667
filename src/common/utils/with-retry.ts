import type { RetryStrategy } from '../errors/index.js';
import { delay } from './delay.js';

/**
 * Execute an async function with exponential backoff retry.
 * Adds jitter to prevent thundering herd. An aborted signal stops the loop
 * immediately, including during the backoff wait.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  strategy: RetryStrategy,
  onRetry?: (attempt: number, error: Error) => void,
  signal?: AbortSignal,
): Promise<T> {
  let lastError: Error = new Error('withRetry: no attempt was made');

  for (let attempt = 0; attempt <= strategy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= strategy.maxRetries || signal?.aborted) {
        break;
      }

      const baseDelay =
        strategy.initialDelayMs * Math.pow(strategy.backoffMultiplier, attempt);
      const cappedDelay = Math.min(baseDelay, strategy.maxDelayMs);
      // Add jitter: 0.5x to 1.5x of the computed delay
      const jitter = cappedDelay * (0.5 + Math.random());
      const wait = Math.min(jitter, strategy.maxDelayMs);

      onRetry?.(attempt + 1, lastError);

      await delay(wait, signal);
    }
  }

  throw lastError;
}
