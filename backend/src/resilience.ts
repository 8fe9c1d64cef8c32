export class TimeoutError extends Error {
  constructor(message = "timeout") {
    super(message);
    this.name = "TimeoutError";
  }
}

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message = `http_error_${status}`) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export const isAbortError = (error: unknown): boolean => {
  if (!error || typeof error !== "object") return false;
  return "name" in error && (error as { name?: string }).name === "AbortError";
};

export const isRetryableStatus = (status: number): boolean =>
  status === 429 || (status >= 500 && status <= 599);

/** Timeouts, 429/5xx responses and network failures (fetch rejects with a TypeError). */
export const isTransientError = (error: unknown): boolean => {
  if (error instanceof TimeoutError) return true;
  if (error instanceof HttpError) return isRetryableStatus(error.status);
  return error instanceof TypeError;
};

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (ms <= 0) {
      resolve();
      return;
    }
    if (signal?.aborted) {
      reject(signal.reason ?? new Error("aborted"));
      return;
    }
    const timeout = setTimeout(resolve, ms);
    if (signal) {
      const onAbort = () => {
        clearTimeout(timeout);
        reject(signal.reason ?? new Error("aborted"));
      };
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

/**
 * Signal that aborts with a TimeoutError after `ms`. Call `clear` once the
 * guarded work settles so the timer does not outlive it.
 */
export const createTimeoutSignal = (ms: number): { signal: AbortSignal; clear: () => void } => {
  const controller = new AbortController();
  if (!Number.isFinite(ms) || ms <= 0) {
    controller.abort(new TimeoutError());
    return { signal: controller.signal, clear: () => undefined };
  }
  const timeout = setTimeout(() => controller.abort(new TimeoutError(`timeout after ${ms}ms`)), ms);
  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
};

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  signal?: AbortSignal;
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitterRatio, shouldRetry, onRetry, signal } = options;
  let attempt = 0;
  let lastError: unknown;

  while (attempt < maxAttempts) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (signal?.aborted) throw error;
      if (!shouldRetry(error) || attempt >= maxAttempts) {
        throw error;
      }
      onRetry?.(error, attempt);
      const expDelay = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
      const jitter = expDelay * jitterRatio;
      const delayMs = Math.max(0, expDelay - jitter + Math.random() * jitter * 2);
      await sleep(delayMs, signal);
    }
  }

  throw lastError ?? new Error("retry_failed");
}
