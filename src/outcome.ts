/**
 * Attempt outcomes and their classification.
 */

import type { HeadersLike } from './rate-limit.js';

/** The parts of a response the retry policy reads. */
export interface ResponseLike {
  readonly status: number;
  readonly headers: HeadersLike;
}

/** What one attempt produced: a response, or an error with no response. */
export type AttemptOutcome<R extends ResponseLike = ResponseLike> =
  | { kind: 'response'; response: R }
  | { kind: 'error'; error: unknown };

/** The closed set of outcome classes the policy decides on. */
export type OutcomeClass =
  | { kind: 'transport-error'; error: unknown }
  | { kind: 'server-error'; status: number }
  | { kind: 'throttled'; status: number; headers: HeadersLike }
  | { kind: 'other'; status: number };

/** Statuses answered with rate-limit headers when a quota is spent. */
export const THROTTLE_STATUSES: ReadonlySet<number> = new Set([403, 429]);

export function responseOutcome<R extends ResponseLike>(response: R): AttemptOutcome<R> {
  return { kind: 'response', response };
}

export function errorOutcome(error: unknown): AttemptOutcome<never> {
  return { kind: 'error', error };
}

export function classifyOutcome(outcome: AttemptOutcome): OutcomeClass {
  if (outcome.kind === 'error') {
    return { kind: 'transport-error', error: outcome.error };
  }

  const { status, headers } = outcome.response;
  if (status >= 500 && status <= 599) {
    return { kind: 'server-error', status };
  }
  if (THROTTLE_STATUSES.has(status)) {
    return { kind: 'throttled', status, headers };
  }
  return { kind: 'other', status };
}
