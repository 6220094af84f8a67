import { logger } from '../../config/logger';
import { PROVIDER_RETRY, type RetryPolicy } from '../../config/settings';
import { ConfigurationError, errorMessage } from '../pipeline/pipeline-error';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Prefix for retry warnings */
  label?: string;
  sleep?: Sleep;
}

/** Delay before the attempt after `attempt`: base * 2^(attempt-1), capped. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Call `fn` up to `policy.attempts` times with exponential backoff. Any error
 * is retryable except ConfigurationError; the last error propagates.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = PROVIDER_RETRY,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'Provider call';
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      lastError = error;
      if (attempt === policy.attempts) break;

      const delayMs = backoffDelay(policy, attempt);
      logger.warn(
        `${label} attempt ${attempt}/${policy.attempts} failed: ${errorMessage(error)}. Retrying in ${delayMs / 1000}s`
      );
      await wait(delayMs);
    }
  }

  logger.error(`${label} failed after ${policy.attempts} attempts: ${errorMessage(lastError)}`);
  throw lastError;
}
