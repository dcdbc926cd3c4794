/**
 * Error taxonomy for the Notion client.
 *
 * Every failure a caller can see is a `NotionClientError`; the `kind` field
 * lets callers branch without `instanceof` chains. Local validation errors
 * are raised before any I/O; all others originate from the transport.
 */

import type { JsonObject, JsonValue } from "../core/index.js";

export type NotionErrorKind =
  | "local_validation"
  | "config"
  | "auth"
  | "rate_limit"
  | "validation"
  | "not_found"
  | "conflict"
  | "connection"
  | "api";

export interface NotionErrorOptions {
  status?: number;
  /** Notion's machine-readable error code, e.g. `object_not_found`. */
  code?: string;
  body?: JsonObject;
  cause?: unknown;
}

export abstract class NotionClientError extends Error {
  abstract readonly kind: NotionErrorKind;
  readonly status: number | undefined;
  readonly code: string | undefined;
  readonly body: JsonObject;

  constructor(message: string, opts: NotionErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.status = opts.status;
    this.code = opts.code;
    this.body = opts.body ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
      code: this.code,
    };
  }
}

/** Bad input caught before a request was sent (malformed ID, empty update). */
export class LocalValidationError extends NotionClientError {
  readonly kind = "local_validation";
}

export class NotionConfigError extends NotionClientError {
  readonly kind = "config";
}

/** Any non-2xx response without a more specific kind. */
export class NotionApiError extends NotionClientError {
  readonly kind: NotionErrorKind = "api";
}

export class NotionAuthError extends NotionApiError {
  override readonly kind = "auth";
}

export class NotionRateLimitError extends NotionApiError {
  override readonly kind = "rate_limit";
  /** Seconds from the Retry-After header, when the server sent one. */
  readonly retryAfter: number | undefined;

  constructor(message: string, retryAfter?: number, opts: NotionErrorOptions = {}) {
    super(message, { status: 429, ...opts });
    this.retryAfter = retryAfter;
  }
}

export class NotionValidationError extends NotionApiError {
  override readonly kind = "validation";
  readonly fieldErrors: JsonValue[];

  constructor(message: string, fieldErrors: JsonValue[] = [], opts: NotionErrorOptions = {}) {
    super(message, { status: 400, ...opts });
    this.fieldErrors = fieldErrors;
  }
}

export class NotionNotFoundError extends NotionApiError {
  override readonly kind = "not_found";
}

export class NotionConflictError extends NotionApiError {
  override readonly kind = "conflict";
}

/** Network-level failure: refused connection, DNS, timeout, closed client. */
export class NotionConnectionError extends NotionApiError {
  override readonly kind = "connection";
}

export function isNotionClientError(err: unknown): err is NotionClientError {
  return err instanceof NotionClientError;
}

// ─── Status mapping ───

function stringField(body: JsonObject, key: string): string | undefined {
  const value = body[key];
  return typeof value === "string" ? value : undefined;
}

function fieldErrorsOf(body: JsonObject): JsonValue[] {
  const details = body.details;
  if (details === null || typeof details !== "object" || Array.isArray(details)) {
    return [];
  }
  const errors = details.errors;
  return Array.isArray(errors) ? errors : [];
}

export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isNaN(seconds) || seconds < 0 ? undefined : seconds;
}

/**
 * Convert a non-2xx response into exactly one error kind.
 */
export function toNotionError(
  status: number,
  body: JsonObject,
  headers: Pick<Headers, "get">,
): NotionApiError {
  const message = stringField(body, "message") ?? "Unknown error occurred";
  const opts: NotionErrorOptions = { status, code: stringField(body, "code"), body };

  switch (status) {
    case 400:
      return new NotionValidationError(message, fieldErrorsOf(body), opts);
    case 401:
      return new NotionAuthError(message, opts);
    case 403:
      return new NotionAuthError(`Access forbidden: ${message}`, opts);
    case 404:
      return new NotionNotFoundError(message, opts);
    case 409:
      return new NotionConflictError(message, opts);
    case 429:
      return new NotionRateLimitError(message, parseRetryAfter(headers.get("retry-after")), opts);
    default:
      return new NotionApiError(message, opts);
  }
}
