/**
 * ratelimit-retry: retry decisions for HTTP clients, driven by
 * `x-ratelimit-*` headers.
 *
 * @example
 * ```ts
 * import { HttpClient } from 'ratelimit-retry';
 *
 * const client = new HttpClient({
 *   baseUrl: 'https://api.example.com',
 *   retry: { mode: 'bounded', maxAttempts: 3 },
 * });
 * const response = await client.get('/repos');
 * ```
 *
 * @packageDocumentation
 */

// ---- Retry Policy ----
export { RetryPolicy } from './retry-policy.js';
export type { RetryDecision, RetryReason, RetryPolicyOptions } from './retry-policy.js';

// ---- Rate Limits ----
export { RateLimitSnapshot, RATE_LIMIT_HEADERS } from './rate-limit.js';
export type { Clock, HeadersLike } from './rate-limit.js';

// ---- Attempt Outcomes ----
export {
  classifyOutcome,
  errorOutcome,
  responseOutcome,
  THROTTLE_STATUSES,
} from './outcome.js';
export type { AttemptOutcome, OutcomeClass, ResponseLike } from './outcome.js';

// ---- Requests ----
export { BufferedBody, assembleRequest, createRequest } from './request.js';
export type {
  HttpRequest,
  HttpVersion,
  CreateRequestInit,
  RequestBodyInit,
  RequestParts,
} from './request.js';

// ---- Configuration ----
export {
  DEFAULT_RETRY_CONFIG,
  RETRY_ENV_VAR,
  resolveRetryConfig,
  retryConfigFromEnv,
  validateRetryConfig,
} from './config.js';
export type { RetryConfig } from './config.js';

// ---- Errors ----
export {
  RetryPolicyError,
  InvariantViolationError,
  UnclonableBodyError,
  ConnectionError,
  RequestTimeoutError,
  ConfigError,
} from './errors.js';
export type { ValidationIssue } from './errors.js';

// ---- Logging ----
export { createLogger } from './logging.js';
export type { Logger, LogLevel } from './logging.js';

// ---- Sleep ----
export { abortableSleep, MAX_TIMER_DELAY } from './sleep.js';

// ---- Transport ----
export { HttpClient, mergeHeaders } from './transport/http.js';
export type {
  FetchFunction,
  HttpClientConfig,
  RequestOptions,
  SendOptions,
} from './transport/types.js';
