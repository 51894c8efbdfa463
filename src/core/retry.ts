export type RetryPolicy = {
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; aborted: boolean };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

type RetryOptions = {
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
  /** Stops further attempts and cuts a pending backoff short. */
  signal?: AbortSignal;
};

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);

export const withRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<RetryOutcome<T>> => {
  const maxAttempts = Math.max(1, Math.floor(policy.attempts));
  const wait = options.sleep ?? sleep;
  const { signal } = options;
  let attempt = 0;

  while (true) {
    attempt += 1;

    try {
      const value = await task(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, error, attempts: attempt, aborted: true };
      }

      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= maxAttempts) {
        return { ok: false, error, attempts: attempt, aborted: false };
      }

      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs, signal);

      if (signal?.aborted) {
        return { ok: false, error, attempts: attempt, aborted: true };
      }
    }
  }
};
