/**
 * HTTP client using the built-in `fetch` API, with the re-send loop driven
 * by {@link RetryPolicy}.
 */

import { DEFAULT_RETRY_CONFIG, resolveRetryConfig } from '../config.js';
import type { RetryConfig } from '../config.js';
import { ConnectionError, InvariantViolationError, RequestTimeoutError } from '../errors.js';
import { createLogger } from '../logging.js';
import type { Logger } from '../logging.js';
import { errorOutcome, responseOutcome } from '../outcome.js';
import type { AttemptOutcome } from '../outcome.js';
import type { Clock, HeadersLike } from '../rate-limit.js';
import { createRequest } from '../request.js';
import type { HttpRequest } from '../request.js';
import { RetryPolicy } from '../retry-policy.js';
import type {
  FetchFunction,
  HttpClientConfig,
  RequestOptions,
  SendOptions,
} from './types.js';

const DEFAULT_TIMEOUT = 30_000;
const JSON_CONTENT_TYPE = 'application/json';

export class HttpClient {
  private readonly baseUrl: string | undefined;
  private readonly retryConfig: RetryConfig;
  private readonly timeout: number;
  private readonly defaultHeaders: Headers;
  private readonly fetchImpl: FetchFunction;
  private readonly log: Logger;
  private readonly clock: Clock;

  /** @throws ConfigError if `config.retry` is invalid. */
  constructor(config: HttpClientConfig = {}) {
    this.baseUrl = config.baseUrl?.replace(/\/+$/, '');
    this.retryConfig = resolveRetryConfig(config.retry ?? DEFAULT_RETRY_CONFIG);
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.defaultHeaders = new Headers(config.headers);
    this.fetchImpl = config.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.log = createLogger(config.logger, config.logLevel);
    this.clock = config.clock ?? (() => Date.now());
  }

  /**
   * Send `request`, retrying as the policy decides.
   *
   * A fresh {@link RetryPolicy} is created per call. A clone is taken before
   * each attempt, so the resend never depends on a body fetch has consumed.
   *
   * @returns the last response the policy chose not to retry.
   * @throws ConnectionError if a transport failure outlives the retries.
   * @throws RequestTimeoutError if the last attempt timed out.
   * @throws the signal's reason if `options.signal` aborts.
   */
  async send(request: HttpRequest, options: SendOptions = {}): Promise<Response> {
    const { signal } = options;
    const policy = RetryPolicy.fromConfig(this.retryConfig, { clock: this.clock });
    const target = `${request.method} ${request.url.href}`;

    let current = request;
    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();
      const resend = policy.cloneRequest(current);

      this.log.debug(`${target} attempt ${attempt}`);
      const outcome = await this.execute(current, signal);

      if (signal?.aborted) {
        await discardBody(outcome);
        throw signal.reason;
      }

      const decision = policy.decide(outcome);
      if (decision === null) {
        return this.settle(target, outcome, attempt);
      }
      if (resend === null) {
        throw new InvariantViolationError('Retry decided without a request clone.', {
          details: { method: request.method, url: request.url.href },
        });
      }

      await discardBody(outcome);
      this.log.info(
        `${target} retrying in ${decision.delayMs}ms ` +
          `(${decision.reason}, ${policy.remainingAttempts ?? 0} attempts left)`,
      );
      await decision.wait(signal);
      current = resend;
    }
  }

  /**
   * Build a request from a path and send it. Request headers override the
   * client's default headers.
   *
   * @throws TypeError for a malformed URL, method or header.
   */
  async request(method: string, path: string, options: RequestOptions = {}): Promise<Response> {
    const headers = mergeHeaders(this.defaultHeaders, options.headers);

    let body = options.body;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      if (!headers.has('Content-Type')) headers.set('Content-Type', JSON_CONTENT_TYPE);
    }

    const request = createRequest({
      method,
      url: path,
      baseUrl: this.baseUrl,
      query: options.query,
      headers,
      body,
      version: options.version,
    });
    return this.send(request, { signal: options.signal });
  }

  async get(path: string, options?: Omit<RequestOptions, 'json' | 'body'>): Promise<Response> {
    return this.request('GET', path, options);
  }

  async post(path: string, json?: unknown, options?: Omit<RequestOptions, 'json'>): Promise<Response> {
    return this.request('POST', path, { ...options, json });
  }

  async put(path: string, json?: unknown, options?: Omit<RequestOptions, 'json'>): Promise<Response> {
    return this.request('PUT', path, { ...options, json });
  }

  async delete(path: string, options?: Omit<RequestOptions, 'json' | 'body'>): Promise<Response> {
    return this.request('DELETE', path, options);
  }

  private async execute(
    request: HttpRequest,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome<Response>> {
    // Set up timeout via AbortController
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    // Chain the external signal if provided
    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(request.url.href, {
        method: request.method,
        headers: request.headers,
        signal: controller.signal,
        ...(request.body.isEmpty ? {} : { body: request.body.toArrayBuffer() }),
      });
      return responseOutcome(response);
    } catch (error) {
      if (timedOut) {
        return errorOutcome(new RequestTimeoutError(request.url.href, this.timeout));
      }
      return errorOutcome(error);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private settle(target: string, outcome: AttemptOutcome<Response>, attempts: number): Response {
    if (outcome.kind === 'response') {
      this.log.debug(`${target} completed with ${outcome.response.status} after ${attempts} attempt(s)`);
      return outcome.response;
    }

    this.log.warn(`${target} failed after ${attempts} attempt(s)`, outcome.error);
    if (outcome.error instanceof RequestTimeoutError) {
      throw outcome.error;
    }
    const reason = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
    throw new ConnectionError(`Connection failed: ${reason}`, outcome.error);
  }
}

/** Release the body of a response that will not be returned. */
async function discardBody(outcome: AttemptOutcome<Response>): Promise<void> {
  if (outcome.kind !== 'response' || outcome.response.bodyUsed) return;
  await outcome.response.body?.cancel();
}

/** Merge header sets left to right; later values replace earlier ones. */
export function mergeHeaders(...sets: (HeadersLike | undefined)[]): Headers {
  const merged = new Headers();
  for (const set of sets) {
    new Headers(set).forEach((value, key) => merged.set(key, value));
  }
  return merged;
}
