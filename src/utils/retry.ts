import { getLogger } from '../core/logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffFactor: number;
  /** Upper bound of the random delay added to each wait */
  jitter: number;
  /** Only errors for which this returns true are retried */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
  jitter: 1000,
};

/**
 * Retry a function with exponential backoff and jitter.
 * `maxRetries: 0` runs the function exactly once.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = getLogger();
  let attempt = 0;

  for (;;) {
    try {
      return await fn(attempt);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (attempt >= opts.maxRetries || (opts.shouldRetry && !opts.shouldRetry(error))) {
        throw error;
      }

      const delay = Math.min(
        opts.baseDelay * Math.pow(opts.backoffFactor, attempt) + Math.random() * opts.jitter,
        opts.maxDelay,
      );

      attempt++;
      logger.debug({ attempt, delay, error: error.message }, 'Retrying after error');
      opts.onRetry?.(attempt, error);

      await sleep(delay);
    }
  }
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
