/**
 * Bounded retry with pluggable backoff
 */

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before the given retry; attempt is 1 for the first retry */
  backoffMs: (attempt: number) => number;
}

export function exponentialBackoff(baseMs: number): (attempt: number) => number {
  return (attempt) => baseMs * Math.pow(2, attempt - 1);
}

export function createRetryPolicy(maxAttempts: number, baseMs: number): RetryPolicy {
  return {
    maxAttempts: Math.max(1, Math.floor(maxAttempts)),
    backoffMs: exponentialBackoff(baseMs),
  };
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    const reason =
      lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempt(s): ${reason}`);
    this.name = "RetryExhaustedError";
  }
}

/**
 * Run fn until it resolves or the policy runs out of attempts
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep =
    hooks.sleep ??
    ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt < policy.maxAttempts) {
        const delayMs = policy.backoffMs(attempt);
        hooks.onRetry?.(attempt, delayMs, error);
        await sleep(delayMs);
      }
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}
