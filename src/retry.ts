/**
 * Bounded exponential backoff for transient network failures.
 */
import {
  NetworkFatalError,
  NetworkTransientError,
  sleep as defaultSleep,
  type Logger,
  type RetryPolicy,
} from '@relaybot/core';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  sleep?: SleepFn;
  logger?: Logger;
  /** Called before each wait; `attempt` is the attempt that just failed. */
  onRetry?: (attempt: number, delayMs: number, error: NetworkTransientError) => void;
  /** Label used in log records and the exhaustion message. */
  label?: string;
}

/** Delay before the attempt following `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const computed = Math.min(
    policy.maxDelayMs,
    policy.initialDelayMs * Math.pow(policy.factor, attempt - 1),
  );
  return retryAfterMs !== undefined && retryAfterMs > computed ? retryAfterMs : computed;
}

/**
 * Run `operation` until it succeeds, retrying NetworkTransientError only.
 * With retries disabled the transient error reaches the caller unchanged;
 * once `maxAttempts` is used up it is escalated to NetworkFatalError.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, signal, logger, onRetry, label = 'request' } = options;
  const wait = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!(err instanceof NetworkTransientError)) throw err;
      if (!policy.enabled) throw err;
      if (attempt >= policy.maxAttempts) {
        throw new NetworkFatalError(
          `${label} failed after ${attempt} attempts: ${err.message}`,
          { cause: err },
        );
      }
      const delayMs = backoffDelay(policy, attempt, err.retryAfterMs);
      logger?.warn({ label, attempt, delayMs, err: err.message }, 'Transient failure, retrying');
      onRetry?.(attempt, delayMs, err);
      await wait(delayMs, signal);
    }
  }
}
