/**
 * Rate-limit metadata parsed from `x-ratelimit-*` response headers.
 *
 * A snapshot is built fresh from each response and discarded once the retry
 * decision is made. It holds no relation to earlier snapshots.
 */

/** Header names read by {@link RateLimitSnapshot.parse}. */
export const RATE_LIMIT_HEADERS = {
  limit: 'x-ratelimit-limit',
  remaining: 'x-ratelimit-remaining',
  reset: 'x-ratelimit-reset',
  used: 'x-ratelimit-used',
} as const;

/** Anything a Fetch `Headers` can be built from. */
export type HeadersLike = Headers | Record<string, string> | [string, string][];

/** Source of the current wall-clock time in epoch milliseconds. */
export type Clock = () => number;

const U32_MAX = 4_294_967_295;
const UNSIGNED_PATTERN = /^\+?\d+$/;
const SIGNED_PATTERN = /^[+-]?\d+$/;
const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;
// Largest magnitude a Date can hold, in seconds.
const MAX_DATE_SECONDS = 8_640_000_000_000n;

export class RateLimitSnapshot {
  /** Quota per window. */
  readonly limit: number;
  /** Requests left in the current window. */
  readonly remaining: number;
  /** Requests used in the current window; 0 when the server omits it. */
  readonly used: number;

  private readonly resetMs: number;
  private readonly clock: Clock;

  private constructor(
    limit: number,
    remaining: number,
    resetMs: number,
    used: number,
    clock: Clock,
  ) {
    this.limit = limit;
    this.remaining = remaining;
    this.resetMs = resetMs;
    this.used = used;
    this.clock = clock;
  }

  /**
   * Build a snapshot from response headers (names are case-insensitive).
   *
   * Returns `null` when `x-ratelimit-limit`, `x-ratelimit-remaining` or
   * `x-ratelimit-reset` is missing or malformed. `x-ratelimit-used` falls
   * back to 0. A reset timestamp beyond the range of `Date` clamps to now.
   */
  static parse(headers: HeadersLike, clock: Clock = Date.now): RateLimitSnapshot | null {
    const normalized = toHeaders(headers);
    if (normalized === null) return null;

    const limit = parseUnsigned(normalized.get(RATE_LIMIT_HEADERS.limit));
    if (limit === null) return null;

    const remaining = parseUnsigned(normalized.get(RATE_LIMIT_HEADERS.remaining));
    if (remaining === null) return null;

    const resetSeconds = parseSigned64(normalized.get(RATE_LIMIT_HEADERS.reset));
    if (resetSeconds === null) return null;

    const used = parseUnsigned(normalized.get(RATE_LIMIT_HEADERS.used)) ?? 0;

    const inRange = resetSeconds >= -MAX_DATE_SECONDS && resetSeconds <= MAX_DATE_SECONDS;
    const resetMs = inRange ? Number(resetSeconds) * 1000 : clock();

    return new RateLimitSnapshot(limit, remaining, resetMs, used, clock);
  }

  /** The UTC instant the current window resets. */
  get resetTime(): Date {
    return new Date(this.resetMs);
  }

  /** Milliseconds until the window resets, never negative. */
  timeUntilReset(now: number = this.clock()): number {
    return Math.max(0, this.resetMs - now);
  }

  /** True when the quota is spent and the window has not yet reset. */
  isRateLimited(now: number = this.clock()): boolean {
    return this.remaining === 0 && this.timeUntilReset(now) > 0;
  }

  /**
   * True when the fraction of quota left is below `threshold` (0–1).
   * A zero `limit` never counts as near the limit.
   */
  isNearLimit(threshold: number): boolean {
    return this.remaining / this.limit < threshold;
  }

  toJSON(): Record<string, unknown> {
    return {
      limit: this.limit,
      remaining: this.remaining,
      resetTime: this.resetTime.toISOString(),
      used: this.used,
    };
  }
}

function toHeaders(headers: HeadersLike): Headers | null {
  if (headers instanceof Headers) return headers;
  try {
    return new Headers(headers);
  } catch {
    // Invalid header names or values carry no usable rate-limit data.
    return null;
  }
}

function parseUnsigned(raw: string | null): number | null {
  if (raw === null) return null;
  const value = raw.trim();
  if (!UNSIGNED_PATTERN.test(value)) return null;
  const parsed = Number(value);
  return parsed <= U32_MAX ? parsed : null;
}

function parseSigned64(raw: string | null): bigint | null {
  if (raw === null) return null;
  const value = raw.trim();
  if (!SIGNED_PATTERN.test(value)) return null;
  const parsed = BigInt(value);
  return parsed >= I64_MIN && parsed <= I64_MAX ? parsed : null;
}
