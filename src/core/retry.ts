/**
 * Retry-until helper with exponential backoff.
 *
 * Only read operations go through here; writes are attempted once.
 */

import { Logger } from './logger.js';
import { errorMessage } from './errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
}

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
  /** false when attempts ran out before the predicate held */
  satisfied: boolean;
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before attempt `attempt + 1`, where `attempt` counts from 1.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.round(policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1));
}

export async function retryUntil<T>(
  operation: (attempt: number) => Promise<T>,
  predicate: (value: T) => boolean,
  policy: RetryPolicy,
  sleep: Sleep = defaultSleep,
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastValue: { value: T } | undefined;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      if (predicate(value)) {
        return { value, attempts: attempt, satisfied: true };
      }
      lastValue = { value };
      Logger.debug(`Attempt ${attempt}/${maxAttempts} not satisfied yet`);
    } catch (error) {
      lastError = error;
      Logger.debug(`Attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}`);
    }

    if (attempt < maxAttempts) {
      await sleep(backoffDelay(policy, attempt));
    }
  }

  if (lastValue) {
    return { value: lastValue.value, attempts: maxAttempts, satisfied: false };
  }
  throw lastError;
}
