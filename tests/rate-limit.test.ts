import { describe, it, expect } from 'vitest';
import { RateLimitSnapshot, RATE_LIMIT_HEADERS } from '../src/rate-limit.js';

const NOW = Date.UTC(2026, 0, 1, 12, 0, 0);
const NOW_SECONDS = NOW / 1000;
const clock = (): number => NOW;

function headers(
  limit: number | string,
  remaining: number | string,
  reset: number | string,
  used?: number | string,
): Record<string, string> {
  const h: Record<string, string> = {
    'x-ratelimit-limit': String(limit),
    'x-ratelimit-remaining': String(remaining),
    'x-ratelimit-reset': String(reset),
  };
  if (used !== undefined) h['x-ratelimit-used'] = String(used);
  return h;
}

describe('RateLimitSnapshot.parse', () => {
  it('parses every rate-limit header', () => {
    const snapshot = RateLimitSnapshot.parse(headers(5000, 4000, NOW_SECONDS + 3600, 1000), clock);

    expect(snapshot).not.toBeNull();
    expect(snapshot?.limit).toBe(5000);
    expect(snapshot?.remaining).toBe(4000);
    expect(snapshot?.used).toBe(1000);
    expect(snapshot?.resetTime.toISOString()).toBe('2026-01-01T13:00:00.000Z');
    expect(snapshot?.timeUntilReset()).toBe(3_600_000);
  });

  it('matches header names case-insensitively', () => {
    const snapshot = RateLimitSnapshot.parse(
      {
        'X-RateLimit-Limit': '60',
        'X-RATELIMIT-REMAINING': '59',
        'x-RateLimit-Reset': String(NOW_SECONDS + 60),
      },
      clock,
    );
    expect(snapshot?.limit).toBe(60);
    expect(snapshot?.remaining).toBe(59);
  });

  it('accepts a Fetch Headers instance and header pairs', () => {
    const fromHeaders = RateLimitSnapshot.parse(new Headers(headers(10, 1, NOW_SECONDS)), clock);
    const fromPairs = RateLimitSnapshot.parse(Object.entries(headers(10, 2, NOW_SECONDS)), clock);
    expect(fromHeaders?.remaining).toBe(1);
    expect(fromPairs?.remaining).toBe(2);
  });

  it('defaults used to 0 when missing', () => {
    expect(RateLimitSnapshot.parse(headers(10, 5, NOW_SECONDS), clock)?.used).toBe(0);
  });

  it('defaults used to 0 when unparseable', () => {
    expect(RateLimitSnapshot.parse(headers(10, 5, NOW_SECONDS, 'many'), clock)?.used).toBe(0);
  });

  it.each(Object.values(RATE_LIMIT_HEADERS).filter((name) => name !== 'x-ratelimit-used'))(
    'returns null when %s is missing',
    (name) => {
      const h = headers(10, 0, NOW_SECONDS + 1);
      delete h[name];
      expect(RateLimitSnapshot.parse(h, clock)).toBeNull();
    },
  );

  it('returns null for a non-numeric limit', () => {
    expect(RateLimitSnapshot.parse(headers('lots', 0, NOW_SECONDS), clock)).toBeNull();
  });

  it('returns null for a negative remaining count', () => {
    expect(RateLimitSnapshot.parse(headers(10, -1, NOW_SECONDS), clock)).toBeNull();
  });

  it('returns null for a fractional reset', () => {
    expect(RateLimitSnapshot.parse(headers(10, 0, '1767268800.5'), clock)).toBeNull();
  });

  it('rejects counts beyond 32 bits', () => {
    expect(RateLimitSnapshot.parse(headers('4294967296', 0, NOW_SECONDS), clock)).toBeNull();
    expect(RateLimitSnapshot.parse(headers('4294967295', 0, NOW_SECONDS), clock)?.limit).toBe(
      4_294_967_295,
    );
  });

  it('accepts a leading plus sign', () => {
    expect(RateLimitSnapshot.parse(headers('+10', '+0', `+${NOW_SECONDS}`), clock)?.limit).toBe(10);
  });

  it('clamps a reset beyond the Date range to now', () => {
    const snapshot = RateLimitSnapshot.parse(headers(10, 0, '9999999999999'), clock);
    expect(snapshot?.resetTime.getTime()).toBe(NOW);
    expect(snapshot?.timeUntilReset()).toBe(0);
  });

  it('returns null for a reset beyond 64 bits', () => {
    expect(RateLimitSnapshot.parse(headers(10, 0, '99999999999999999999'), clock)).toBeNull();
  });

  it('returns null when the header record itself is malformed', () => {
    expect(RateLimitSnapshot.parse({ 'not a header': 'x' }, clock)).toBeNull();
  });
});

describe('RateLimitSnapshot queries', () => {
  it('floors time until reset at zero once the reset has passed', () => {
    const snapshot = RateLimitSnapshot.parse(headers(10, 0, NOW_SECONDS - 30), clock);
    expect(snapshot?.timeUntilReset()).toBe(0);
  });

  it('measures time until reset from an explicit instant', () => {
    const snapshot = RateLimitSnapshot.parse(headers(10, 0, NOW_SECONDS + 3600), clock);
    expect(snapshot?.timeUntilReset(NOW + 1000)).toBe(3_599_000);
  });

  it('is rate limited when nothing remains and the reset is ahead', () => {
    const snapshot = RateLimitSnapshot.parse(headers(10, 0, NOW_SECONDS + 1), clock);
    expect(snapshot?.isRateLimited()).toBe(true);
  });

  it('is not rate limited while requests remain', () => {
    const snapshot = RateLimitSnapshot.parse(headers(10, 1, NOW_SECONDS + 60), clock);
    expect(snapshot?.isRateLimited()).toBe(false);
  });

  it('is not rate limited when the reset is now', () => {
    const snapshot = RateLimitSnapshot.parse(headers(10, 0, NOW_SECONDS), clock);
    expect(snapshot?.isRateLimited()).toBe(false);
  });

  it('is not rate limited once the window has elapsed', () => {
    const snapshot = RateLimitSnapshot.parse(headers(10, 0, NOW_SECONDS + 60), clock);
    expect(snapshot?.isRateLimited(NOW + 61_000)).toBe(false);
  });

  it('reports near limit against a threshold', () => {
    const snapshot = RateLimitSnapshot.parse(headers(100, 5, NOW_SECONDS + 3600, 95), clock);
    expect(snapshot?.isNearLimit(0.1)).toBe(true);
    expect(snapshot?.isNearLimit(0.01)).toBe(false);
    expect(snapshot?.isNearLimit(0.05)).toBe(false);
  });

  it('never reports near limit for a zero limit', () => {
    expect(RateLimitSnapshot.parse(headers(0, 0, NOW_SECONDS), clock)?.isNearLimit(1)).toBe(false);
    expect(RateLimitSnapshot.parse(headers(0, 3, NOW_SECONDS), clock)?.isNearLimit(1)).toBe(false);
  });

  it('serializes with an ISO reset time', () => {
    const snapshot = RateLimitSnapshot.parse(headers(100, 5, NOW_SECONDS + 60, 95), clock);
    expect(JSON.parse(JSON.stringify(snapshot))).toEqual({
      limit: 100,
      remaining: 5,
      resetTime: '2026-01-01T12:01:00.000Z',
      used: 95,
    });
  });
});
