import { createChildLogger } from '@prism/shared/src/logger.js';
import { LlmError, TimeoutError, toError } from '@prism/shared/src/utils/errors.js';
import { sleep, withTimeout } from '@prism/shared/src/utils/async.js';

const log = createChildLogger('llm:retry');

const DEFAULT_BASE_DELAY_MS = 1000;

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly timeoutMs: number;
  readonly baseDelayMs?: number;
}

function statusCodeOf(error: Error): number | undefined {
  for (const key of ['status', 'statusCode', 'code'] as const) {
    if (key in error) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'number') {
        return value;
      }
    }
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof LlmError) {
    return error.isRetryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) {
    return statusCode === 429 || statusCode >= 500;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429', 'rate limit', 'too many requests',
    '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
    'econnreset', 'etimedout', 'timeout', 'network',
    'socket hang up', 'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

function computeBackoffMs(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return exponential + jitter;
}

/**
 * Runs `call` under a per-attempt timeout. Transient failures are retried up
 * to `maxRetries` times; everything else fails on the first attempt.
 */
export async function invokeWithRetry<T>(
  label: string,
  call: () => Promise<T>,
  policy: RetryPolicy,
): Promise<T> {
  const attempts = policy.maxRetries + 1;
  const baseDelayMs = policy.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await withTimeout(call(), policy.timeoutMs, label);
    } catch (error) {
      lastError = toError(error);

      if (!isTransientError(error)) {
        throw new LlmError(`${label} failed: ${lastError.message}`, false, lastError);
      }

      log.warn(
        { label, attempt: attempt + 1, attempts, error: lastError.message },
        'Transient LLM error',
      );

      if (attempt < attempts - 1) {
        await sleep(computeBackoffMs(attempt, baseDelayMs));
      }
    }
  }

  throw new LlmError(
    `${label} failed after ${String(attempts)} attempt(s): ${lastError?.message ?? 'unknown error'}`,
    true,
    lastError,
  );
}
