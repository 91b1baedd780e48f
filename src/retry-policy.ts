/**
 * Per-request retry decisions driven by attempt outcomes and rate-limit
 * headers.
 *
 * @example
 * ```ts
 * const policy = RetryPolicy.bounded(3);
 * const resend = policy.cloneRequest(request);
 * const decision = policy.decide(responseOutcome(response));
 * if (decision && resend) {
 *   await decision.wait(signal);
 *   // send `resend`
 * }
 * ```
 *
 * @module
 */

import { resolveRetryConfig } from './config.js';
import type { RetryConfig } from './config.js';
import { InvariantViolationError } from './errors.js';
import { classifyOutcome } from './outcome.js';
import type { AttemptOutcome, OutcomeClass } from './outcome.js';
import { RateLimitSnapshot } from './rate-limit.js';
import type { Clock } from './rate-limit.js';
import { assembleRequest } from './request.js';
import type { HttpRequest } from './request.js';
import { abortableSleep } from './sleep.js';

/** Outcome classes that lead to a retry. */
export type RetryReason = Exclude<OutcomeClass['kind'], 'other'>;

/** A decision to retry, and the wait that must elapse first. */
export interface RetryDecision {
  /** Milliseconds to wait before resending; never negative. */
  readonly delayMs: number;
  readonly reason: RetryReason;
  /**
   * Suspend until the delay has elapsed. Rejects with the signal's reason
   * if the signal aborts first; nothing else is left behind.
   */
  wait(signal?: AbortSignal): Promise<void>;
}

export interface RetryPolicyOptions {
  /** Wall-clock source used for rate-limit reset math. Defaults to `Date.now`. */
  clock?: Clock | undefined;
}

type PolicyState =
  | { kind: 'disabled' }
  | { kind: 'bounded'; remaining: number };

export class RetryPolicy {
  private readonly state: PolicyState;
  private readonly clock: Clock;

  private constructor(state: PolicyState, options?: RetryPolicyOptions) {
    this.state = state;
    this.clock = options?.clock ?? (() => Date.now());
  }

  /** A policy that never retries. */
  static disabled(options?: RetryPolicyOptions): RetryPolicy {
    return new RetryPolicy({ kind: 'disabled' }, options);
  }

  /**
   * A policy that evaluates at most `attempts` outcomes.
   *
   * @throws ConfigError if `attempts` is not a non-negative integer.
   */
  static bounded(attempts: number, options?: RetryPolicyOptions): RetryPolicy {
    return RetryPolicy.fromConfig({ mode: 'bounded', maxAttempts: attempts }, options);
  }

  /** @throws ConfigError if the configuration is invalid. */
  static fromConfig(config: RetryConfig, options?: RetryPolicyOptions): RetryPolicy {
    const resolved = resolveRetryConfig(config);
    switch (resolved.mode) {
      case 'none':
        return new RetryPolicy({ kind: 'disabled' }, options);
      case 'bounded':
        return new RetryPolicy({ kind: 'bounded', remaining: resolved.maxAttempts }, options);
    }
  }

  get isDisabled(): boolean {
    return this.state.kind === 'disabled';
  }

  /** Attempts left to evaluate, or `null` when the policy is disabled. */
  get remainingAttempts(): number | null {
    return this.state.kind === 'bounded' ? this.state.remaining : null;
  }

  /**
   * Decide whether to retry after `outcome`.
   *
   * Every call on a bounded policy with attempts left consumes one attempt,
   * whatever the outcome. Returns `null` to stop.
   *
   * @throws InvariantViolationError if a negative wait is computed.
   */
  decide(outcome: AttemptOutcome): RetryDecision | null {
    if (this.state.kind === 'disabled') return null;
    if (this.state.remaining === 0) return null;
    this.state.remaining -= 1;

    const classified = classifyOutcome(outcome);
    switch (classified.kind) {
      case 'transport-error':
      case 'server-error':
        return retryAfter(0, classified.kind);
      case 'throttled': {
        // Without current rate-limit evidence a 403/429 would only repeat.
        const snapshot = RateLimitSnapshot.parse(classified.headers, this.clock);
        if (snapshot === null) return null;
        const now = this.clock();
        if (!snapshot.isRateLimited(now)) return null;
        return retryAfter(snapshot.timeUntilReset(now), classified.kind);
      }
      case 'other':
        return null;
    }
  }

  /**
   * Rebuild `original` for a resend: same method, URL, version, headers and
   * a duplicate of the body. Returns `null` when the policy is disabled.
   *
   * @throws InvariantViolationError if the clone cannot be assembled.
   */
  cloneRequest(original: HttpRequest): HttpRequest | null {
    if (this.state.kind === 'disabled') return null;

    try {
      return assembleRequest({
        method: original.method,
        url: original.url.href,
        version: original.version,
        headers: original.headers,
        body: original.body.duplicate(),
      });
    } catch (error) {
      throw new InvariantViolationError(
        'Could not assemble a clone of a valid request.',
        { details: { method: original.method, url: original.url.href }, cause: error },
      );
    }
  }
}

function retryAfter(delayMs: number, reason: RetryReason): RetryDecision {
  if (!(delayMs >= 0)) {
    throw new InvariantViolationError(`Computed a negative retry delay: ${delayMs}ms.`, {
      details: { delay_ms: delayMs, reason },
    });
  }
  return {
    delayMs,
    reason,
    wait: (signal?: AbortSignal) => abortableSleep(delayMs, signal),
  };
}
