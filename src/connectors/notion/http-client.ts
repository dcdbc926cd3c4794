/**
 * Rate-limited, retrying HTTP transport for the Notion REST API.
 *
 * Each attempt takes a rate-limiter slot, asks the auth provider for fresh
 * headers and maps any non-2xx response to a typed error. Retries follow the
 * injected `RetryPolicy`.
 */

import type { JsonObject, Logger, RateLimiter } from "../core/index.js";
import { MinIntervalRateLimiter, sleep as realSleep, withRetry } from "../core/index.js";
import type { AuthProvider, FetchFn } from "./auth.js";
import {
  DEFAULT_API_VERSION,
  DEFAULT_BASE_URL,
  DEFAULT_REQUESTS_PER_SECOND,
  DEFAULT_TIMEOUT_MS,
} from "./config.js";
import { NotionClientError, NotionConnectionError, NotionRateLimitError, toNotionError } from "./errors.js";
import type { HttpMethod } from "./retry-policy.js";
import { RetryPolicy } from "./retry-policy.js";

export const USER_AGENT = "notion-workspace-client/0.1.0";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface SendOptions {
  /** Set to false for calls that must not be repeated, e.g. resource creation. */
  retry?: boolean;
}

/** What the endpoints need from a transport. */
export interface NotionTransport {
  get(path: string, params?: QueryParams): Promise<JsonObject>;
  post(path: string, body?: JsonObject, options?: SendOptions): Promise<JsonObject>;
  patch(path: string, body?: JsonObject, options?: SendOptions): Promise<JsonObject>;
  delete(path: string, params?: QueryParams): Promise<JsonObject>;
}

export interface HttpClientOptions {
  auth: AuthProvider;
  apiVersion?: string;
  baseUrl?: string;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  rateLimiter?: RateLimiter;
  maxRequestsPerSecond?: number;
  logger: Logger;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

interface RequestEnvelope {
  method: HttpMethod;
  path: string;
  params?: QueryParams;
  body?: JsonObject;
  retry?: boolean;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function parseBody(text: string): JsonObject {
  if (!text.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : { message: text };
  } catch {
    return { message: text };
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class HttpClient implements NotionTransport {
  readonly apiVersion: string;
  readonly retryPolicy: RetryPolicy;

  private readonly auth: AuthProvider;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly lifetime = new AbortController();

  constructor(opts: HttpClientOptions) {
    this.auth = opts.auth;
    this.apiVersion = opts.apiVersion ?? DEFAULT_API_VERSION;
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/*$/, "/");
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryPolicy = opts.retryPolicy ?? new RetryPolicy();
    this.sleep = opts.sleep ?? realSleep;
    this.rateLimiter =
      opts.rateLimiter ??
      new MinIntervalRateLimiter({
        maxRequestsPerSecond: opts.maxRequestsPerSecond ?? DEFAULT_REQUESTS_PER_SECOND,
        sleep: this.sleep,
      });
    this.logger = opts.logger;
    this.fetchFn = opts.fetch ?? fetch;
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  get(path: string, params?: QueryParams): Promise<JsonObject> {
    return this.request({ method: "GET", path, params });
  }

  post(path: string, body?: JsonObject, options: SendOptions = {}): Promise<JsonObject> {
    return this.request({ method: "POST", path, body: body ?? {}, retry: options.retry });
  }

  patch(path: string, body?: JsonObject, options: SendOptions = {}): Promise<JsonObject> {
    return this.request({ method: "PATCH", path, body: body ?? {}, retry: options.retry });
  }

  delete(path: string, params?: QueryParams): Promise<JsonObject> {
    return this.request({ method: "DELETE", path, params });
  }

  /** Abort in-flight requests; later requests fail with a connection error. */
  close(): void {
    if (this.closed) return;
    this.lifetime.abort();
    this.logger.debug("HTTP client closed");
  }

  buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(path.replace(/^\/+/, ""), this.baseUrl);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async request(req: RequestEnvelope): Promise<JsonObject> {
    const policy = this.retryPolicy;
    const retryable = req.retry !== false && policy.allowsMethod(req.method);
    const maxRetries = retryable ? policy.maxRetries : 0;

    return withRetry((attempt) => this.attempt(req, attempt), {
      maxRetries,
      retryOn: (err) => !this.closed && policy.isRetryable(err),
      delayFor: (err, attempt) => policy.delayFor(err, attempt),
      onRetry: (err, attempt, delayMs) => {
        if (err instanceof NotionRateLimitError) {
          this.rateLimiter.backoff(delayMs);
        }
        this.logger.warn(
          `Retrying ${req.method} ${req.path} in ${Math.round(delayMs)}ms (attempt ${attempt}/${maxRetries})`,
          { error: describe(err) },
        );
      },
      sleep: this.sleep,
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new NotionConnectionError("Client is closed");
    }
  }

  private async attempt(req: RequestEnvelope, attempt: number): Promise<JsonObject> {
    this.assertOpen();
    await this.rateLimiter.acquire();
    this.assertOpen();

    const url = this.buildUrl(req.path, req.params);
    const headers = {
      ...(await this.auth.headers()),
      "Notion-Version": this.apiVersion,
      "User-Agent": USER_AGENT,
    };
    // close() may have run while waiting on the limiter or a token refresh
    this.assertOpen();
    this.logger.debug(`${req.method} ${req.path}`, { attempt: attempt + 1 });

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onClose = (): void => controller.abort();
    this.lifetime.signal.addEventListener("abort", onClose, { once: true });

    let status: number;
    let responseHeaders: Headers;
    let text: string;
    try {
      const response = await this.fetchFn(url, {
        method: req.method,
        headers,
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        signal: controller.signal,
      });
      status = response.status;
      responseHeaders = response.headers;
      text = await response.text();
    } catch (err) {
      if (err instanceof NotionClientError) throw err;
      if (this.closed) {
        throw new NotionConnectionError("Client is closed", { cause: err });
      }
      if (timedOut) {
        throw new NotionConnectionError(`Request timed out after ${this.timeoutMs}ms`, {
          cause: err,
        });
      }
      throw new NotionConnectionError(`Connection error: ${describe(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
      this.lifetime.signal.removeEventListener("abort", onClose);
    }

    const body = parseBody(text);
    if (status >= 400) {
      throw toNotionError(status, body, responseHeaders);
    }
    return body;
  }
}
