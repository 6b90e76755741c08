/**
 * Retry policy for network operations with exponential backoff.
 *
 * Plain data plus pure functions: the caller owns the loop and asks
 * `nextRetry` what to do after each failed attempt.
 */
export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  factor: 2,
};

export interface RetryState {
  /** 1-based number of the attempt in progress */
  attempt: number;
  lastError?: Error;
}

export type RetryDecision =
  | { action: 'retry'; attempt: number; delay: number }
  | { action: 'give-up'; attempts: number };

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${policy.maxRetries}`);
  }
  if (policy.baseDelay < 0 || policy.maxDelay < 0 || policy.factor < 1) {
    throw new RangeError('Retry delays must be non-negative and factor at least 1');
  }
  return policy;
}

export function initialRetryState(): RetryState {
  return { attempt: 1 };
}

/**
 * Delay before the retry that follows `failedAttempt`
 */
export function computeBackoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  const delay = policy.baseDelay * Math.pow(policy.factor, failedAttempt - 1);
  return Math.min(policy.maxDelay, delay);
}

/**
 * Record a failure of the current attempt and decide what comes next
 */
export function nextRetry(
  policy: RetryPolicy,
  state: RetryState,
  error: Error,
): { state: RetryState; decision: RetryDecision } {
  const failed = state.attempt;
  if (failed > policy.maxRetries) {
    return {
      state: { attempt: failed, lastError: error },
      decision: { action: 'give-up', attempts: failed },
    };
  }
  return {
    state: { attempt: failed + 1, lastError: error },
    decision: {
      action: 'retry',
      attempt: failed + 1,
      delay: computeBackoffDelay(policy, failed),
    },
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
