/**
 * Configuration and option types for the retrying HTTP client.
 */

import type { RetryConfig } from '../config.js';
import type { LogLevel, Logger } from '../logging.js';
import type { Clock, HeadersLike } from '../rate-limit.js';
import type { HttpVersion } from '../request.js';

/** The fetch function the client sends through. */
export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

/** Configuration for creating an {@link HttpClient}. */
export interface HttpClientConfig {
  /** Base URL that request paths are resolved against. */
  baseUrl?: string | undefined;

  /** Retry configuration. Defaults to three bounded attempts. */
  retry?: RetryConfig | undefined;

  /** Per-attempt timeout in milliseconds. */
  timeout?: number | undefined;

  /** Headers included in every request built by {@link HttpClient.request}. */
  headers?: HeadersLike | undefined;

  /** Fetch implementation. Defaults to `globalThis.fetch`. */
  fetch?: FetchFunction | undefined;

  /** Logger instance. Defaults to `console`. */
  logger?: Logger | undefined;

  /** Minimum log level. Defaults to `'warn'`. */
  logLevel?: LogLevel | undefined;

  /** Wall-clock source for rate-limit math. Defaults to `Date.now`. */
  clock?: Clock | undefined;
}

/** Options for {@link HttpClient.send}. */
export interface SendOptions {
  /** Cancels the in-flight attempt or the wait before the next one. */
  signal?: AbortSignal | undefined;
}

/** Options for {@link HttpClient.request}. */
export interface RequestOptions extends SendOptions {
  headers?: HeadersLike | undefined;
  query?: Record<string, string | number | boolean> | undefined;
  /** Serialized as JSON, with `Content-Type: application/json` unless set. */
  json?: unknown;
  /** Raw body; ignored when `json` is given. */
  body?: string | Uint8Array | ArrayBuffer | undefined;
  /** Kept on the request for its clones; fetch chooses the wire protocol. */
  version?: HttpVersion | undefined;
}
