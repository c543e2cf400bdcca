import { isTransientError } from '../errors/pipeline.errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Delay before the retry that follows `attempt` (1-based): base, 2x base, 4x base... */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(2, attempt - 1);
}

export interface RetryOptions {
  sleep?: Sleep;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Runs `operation` until it succeeds or the policy is exhausted. Only errors
 * accepted by `shouldRetry` (transient ones by default) are retried; anything
 * else, and the last transient failure, is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delay = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
