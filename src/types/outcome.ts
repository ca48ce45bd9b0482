/**
 * Result of a single HTTP attempt.
 * RetryController branches on `kind`; throttling is its own variant so it can
 * never be mistaken for a failure that spends the attempt budget.
 */
export type AttemptOutcome<T> =
  | { kind: 'success'; payload: T; status: number }
  | { kind: 'throttled'; retryAfterMs: number | null; status: 429 }
  | { kind: 'failure'; error: Error; retryable: boolean; status?: number };

export const success = <T>(payload: T, status = 200): AttemptOutcome<T> => ({ kind: 'success', payload, status });

export const throttled = <T>(retryAfterMs: number | null): AttemptOutcome<T> => ({
  kind: 'throttled',
  retryAfterMs,
  status: 429
});

export const failure = <T>(error: Error, retryable: boolean, status?: number): AttemptOutcome<T> => ({
  kind: 'failure',
  error,
  retryable,
  status
});
