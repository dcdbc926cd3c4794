// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Rate limiter
export { createRateLimiter, MinIntervalRateLimiter } from "./rate-limiter.js";
export type { BackoffOptions, RetryOptions } from "./retry.js";
// Retry helper
export { backoffDelay, isNetworkError, sleep, withRetry } from "./retry.js";
// Types
export { LOG_LEVELS } from "./types.js";
export type {
  JsonObject,
  JsonPrimitive,
  JsonValue,
  LogLevel,
  Logger,
  RateLimiter,
  RateLimiterConfig,
} from "./types.js";
