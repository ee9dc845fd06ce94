import { isAxiosError, isCancel } from 'axios';

/**
 * Outcome of one outbound attempt.
 */
export type AttemptResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'retryable'; cause: unknown }
  | { kind: 'fatal'; cause: unknown };

export interface RetryPolicy {
  maxRetries: number;
  backoffMs: number;
}

export type RetryDecision<T> =
  | { action: 'return'; value: T }
  | { action: 'retry'; delayMs: number }
  | { action: 'fail'; cause: unknown; exhausted: boolean };

/**
 * Sort a failed attempt into retryable or fatal.
 *
 * Timeouts, transport errors and non-2xx responses all surface as axios
 * errors and are worth another attempt. A cancelled request, or anything that
 * is not an HTTP failure, is not.
 */
export function classifyError(
  error: unknown,
  signal?: AbortSignal,
): AttemptResult<never> {
  if (signal?.aborted || isCancel(error)) {
    return { kind: 'fatal', cause: signal?.reason ?? error };
  }
  if (isAxiosError(error)) {
    return { kind: 'retryable', cause: error };
  }
  return { kind: 'fatal', cause: error };
}

/**
 * Decide what follows attempt number `attempt` (0-based).
 */
export function planRetry<T>(
  result: AttemptResult<T>,
  attempt: number,
  policy: RetryPolicy,
): RetryDecision<T> {
  switch (result.kind) {
    case 'success':
      return { action: 'return', value: result.value };
    case 'fatal':
      return { action: 'fail', cause: result.cause, exhausted: false };
    case 'retryable':
      if (attempt >= policy.maxRetries) {
        return { action: 'fail', cause: result.cause, exhausted: true };
      }
      return { action: 'retry', delayMs: policy.backoffMs * 2 ** attempt };
  }
}
