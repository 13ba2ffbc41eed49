import { TransientNetworkError } from "./errors.ts";
import { sleep } from "./sleep.ts";

export interface RetryEvent {
  operationName: string;
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  backoffMultiplier: number;
  /** Errors not matching are rethrown on the first attempt */
  isRetryable: (err: unknown) => boolean;
  onRetry?: (event: RetryEvent) => void;
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMultiplier: 2,
  isRetryable: (err) => err instanceof TransientNetworkError,
  sleep,
};

export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const attempts = Math.max(1, retryConfig.maxAttempts);
  let delay = retryConfig.delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!retryConfig.isRetryable(err) || attempt >= attempts) {
        throw err;
      }
      retryConfig.onRetry?.({ operationName, attempt, delayMs: delay, error: err });
      await retryConfig.sleep(delay);
      delay *= retryConfig.backoffMultiplier;
    }
  }
}

/**
 * Wrap a network-calling function so every invocation goes through
 * {@link withRetry} with the same policy.
 */
export function retryable<A extends unknown[], T>(
  fn: (...args: A) => Promise<T>,
  operationName: string,
  config: Partial<RetryConfig> = {}
): (...args: A) => Promise<T> {
  return (...args: A) => withRetry(() => fn(...args), operationName, config);
}
