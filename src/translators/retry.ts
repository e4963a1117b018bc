import { InvalidInputError, UnsupportedLanguageError } from '../core/errors';
import { log } from '../logging/log';
import { SleepFn, defaultSleep } from './timing';

/** Options for withRetry */
export interface RetryOptions {
  /** Total attempts, first one included (default: 3) */
  attempts?: number;
  /** Wait before retry n is baseDelayMs * n (default: 500) */
  baseDelayMs?: number;
  sleep?: SleepFn;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, attempts: number, error: unknown, delayMs: number) => void;
  /** Tag used in log lines */
  label?: string;
}

/**
 * Check if an error is worth another attempt.
 *
 * Non-retryable: bad input and unsupported languages fail the same way every time.
 */
export function isRetryableError(error: unknown): boolean {
  return !(error instanceof InvalidInputError || error instanceof UnsupportedLanguageError);
}

/**
 * Run an operation with retry and linear backoff.
 *
 * Only the final outcome reaches the caller: the result of the first
 * successful attempt, or the error of the last one.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options?.attempts ?? 3);
  const baseDelayMs = options?.baseDelayMs ?? 500;
  const sleep = options?.sleep ?? defaultSleep;
  const label = options?.label ?? 'Retry';

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !isRetryableError(error)) {
        throw error;
      }

      const delayMs = baseDelayMs * attempt;
      const reason = error instanceof Error ? error.message : String(error);
      log(`[${label}] Attempt ${attempt}/${attempts} failed: ${reason}`);
      log(`[${label}] Retrying in ${delayMs}ms...`);

      options?.onRetry?.(attempt, attempts, error, delayMs);

      await sleep(delayMs);
    }
  }
}
