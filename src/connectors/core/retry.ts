export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface BackoffOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the delay added as random jitter (0 disables it). */
  jitter?: number;
}

export interface RetryOptions extends BackoffOptions {
  maxRetries?: number;
  retryOn?: (err: unknown) => boolean;
  /** Overrides the exponential delay for a given failure, e.g. from Retry-After. */
  delayFor?: (err: unknown, attempt: number) => number | undefined;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const NETWORK_ERROR_MARKERS = [
  "econnreset",
  "econnrefused",
  "etimedout",
  "enotfound",
  "socket hang up",
  "fetch failed",
];

export function isNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  return NETWORK_ERROR_MARKERS.some((marker) => msg.includes(marker));
}

function statusOf(err: unknown): number | undefined {
  if (err === null || typeof err !== "object" || !("status" in err)) {
    return undefined;
  }
  return typeof err.status === "number" ? err.status : undefined;
}

function isRetryableError(err: unknown): boolean {
  if (isNetworkError(err)) return true;
  const status = statusOf(err);
  return status !== undefined && status >= 500 && status < 600;
}

export function backoffDelay(attempt: number, opts: BackoffOptions = {}): number {
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const jitter = opts.jitter ?? 0.1;
  const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);
  return jitter > 0 ? delay + delay * jitter * Math.random() : delay;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const retryOn = opts.retryOn ?? isRetryableError;
  const wait = opts.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !retryOn(err)) {
        throw err;
      }
      const delay = opts.delayFor?.(err, attempt) ?? backoffDelay(attempt, opts);
      opts.onRetry?.(err, attempt + 1, delay);
      await wait(delay);
    }
  }
  throw lastError;
}
