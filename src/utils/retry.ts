export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

/**
 * Decide what to do after a failed attempt. Return the delay in ms before the
 * next attempt, or `null` to give up immediately.
 */
export type RetryClassifier = (err: unknown, attempt: number) => number | null;

export type RetryOptions = {
  maxAttempts?: number;
  classify?: RetryClassifier;
  sleep?: Sleep;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

/** `multiplier × base × 2^attempt`, with attempt counted from 0. */
export function backoffDelay(attempt: number, baseDelayMs: number, multiplier = 1): number {
  return multiplier * baseDelayMs * 2 ** attempt;
}

const DEFAULT_MAX_ATTEMPTS = 3;

const defaultClassify: RetryClassifier = (_err, attempt) => backoffDelay(attempt, 500);

/**
 * Run `fn` up to `maxAttempts` times. The error of the last attempt (or of the
 * first attempt the classifier refuses to retry) is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, opts?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const classify = opts?.classify ?? defaultClassify;
  const wait = opts?.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const delay = classify(err, attempt);
      if (delay === null || attempt === maxAttempts - 1) break;
      opts?.onRetry?.(err, attempt, delay);
      await wait(delay);
    }
  }
  throw lastError;
}
