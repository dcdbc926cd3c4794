export type { AuthProvider, FetchFn, OAuthOptions, OAuthTokenResponse } from "./auth.js";
export {
  createAuthFromConfig,
  DEFAULT_OAUTH_BASE_URL,
  IntegrationTokenAuth,
  OAuthAuth,
  REFRESH_MARGIN_MS,
} from "./auth.js";
export type { ClientOptions, NotionClientOptions, WorkspaceInfo } from "./client.js";
export { NotionClient } from "./client.js";
export type { Environment, NotionConfig, OAuthSettings } from "./config.js";
export {
  DEFAULT_API_VERSION,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUESTS_PER_SECOND,
  DEFAULT_TIMEOUT_MS,
  loadConfig,
} from "./config.js";
export * from "./endpoints/index.js";
export type { NotionErrorKind, NotionErrorOptions } from "./errors.js";
export {
  isNotionClientError,
  LocalValidationError,
  NotionApiError,
  NotionAuthError,
  NotionClientError,
  NotionConfigError,
  NotionConflictError,
  NotionConnectionError,
  NotionNotFoundError,
  NotionRateLimitError,
  NotionValidationError,
  parseRetryAfter,
  toNotionError,
} from "./errors.js";
export * as helpers from "./helpers.js";
export type {
  HttpClientOptions,
  NotionTransport,
  QueryParams,
  SendOptions,
} from "./http-client.js";
export { HttpClient, USER_AGENT } from "./http-client.js";
export { formatId, isNotionId, MAX_PAGE_SIZE, normalizeId, validateId, validatePageSize } from "./ids.js";
export * from "./models/index.js";
export type { PageFetcher, PageOf, PaginateRequest } from "./pagination.js";
export { collectAll, CursorPaginator, fetchListPage, paginate } from "./pagination.js";
export type { HttpMethod, RetryPolicyOptions } from "./retry-policy.js";
export { RETRYABLE_METHODS, RETRYABLE_STATUSES, RetryPolicy } from "./retry-policy.js";
