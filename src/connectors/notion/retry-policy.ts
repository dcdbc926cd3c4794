import { backoffDelay } from "../core/index.js";
import { NotionApiError, NotionConnectionError, NotionRateLimitError } from "./errors.js";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export const RETRYABLE_STATUSES: readonly number[] = [429, 500, 502, 503, 504];
export const RETRYABLE_METHODS: readonly string[] = [
  "GET",
  "HEAD",
  "OPTIONS",
  "PATCH",
  "DELETE",
  "POST",
];

export interface RetryPolicyOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
  statuses?: readonly number[];
  methods?: readonly string[];
}

/**
 * Decides which failed attempts are retried and how long to wait.
 *
 * Connection errors and the configured statuses are retryable. A 429 with a
 * Retry-After header waits exactly that long; everything else backs off
 * exponentially from `baseDelayMs`.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly statuses: ReadonlySet<number>;
  private readonly methods: ReadonlySet<string>;

  constructor(opts: RetryPolicyOptions = {}) {
    this.maxRetries = opts.maxRetries ?? 3;
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${this.maxRetries}`);
    }
    this.baseDelayMs = opts.baseDelayMs ?? 1000;
    this.maxDelayMs = opts.maxDelayMs ?? 30_000;
    this.jitter = opts.jitter ?? 0;
    this.statuses = new Set(opts.statuses ?? RETRYABLE_STATUSES);
    this.methods = new Set(opts.methods ?? RETRYABLE_METHODS);
  }

  allowsMethod(method: HttpMethod): boolean {
    return this.methods.has(method);
  }

  isRetryable(err: unknown): boolean {
    if (err instanceof NotionConnectionError) return true;
    return (
      err instanceof NotionApiError && err.status !== undefined && this.statuses.has(err.status)
    );
  }

  delayFor(err: unknown, attempt: number): number {
    if (err instanceof NotionRateLimitError && err.retryAfter !== undefined) {
      return Math.min(err.retryAfter * 1000, this.maxDelayMs);
    }
    return backoffDelay(attempt, {
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      jitter: this.jitter,
    });
  }
}
