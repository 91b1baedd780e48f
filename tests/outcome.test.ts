import { describe, it, expect } from 'vitest';
import { classifyOutcome, errorOutcome, responseOutcome } from '../src/outcome.js';

describe('classifyOutcome', () => {
  it('treats an error without a response as a transport error', () => {
    const error = new TypeError('fetch failed');
    expect(classifyOutcome(errorOutcome(error))).toEqual({ kind: 'transport-error', error });
  });

  it('classifies the 5xx range inclusively', () => {
    expect(classifyOutcome(responseOutcome({ status: 500, headers: {} })).kind).toBe('server-error');
    expect(classifyOutcome(responseOutcome({ status: 599, headers: {} })).kind).toBe('server-error');
    expect(classifyOutcome(responseOutcome({ status: 499, headers: {} })).kind).toBe('other');
    expect(classifyOutcome(responseOutcome({ status: 600, headers: {} })).kind).toBe('other');
  });

  it('carries headers for throttling statuses', () => {
    const headers = { 'x-ratelimit-remaining': '0' };
    expect(classifyOutcome(responseOutcome({ status: 429, headers }))).toEqual({
      kind: 'throttled',
      status: 429,
      headers,
    });
    expect(classifyOutcome(responseOutcome({ status: 403, headers })).kind).toBe('throttled');
  });

  it('leaves everything else as other', () => {
    expect(classifyOutcome(responseOutcome({ status: 200, headers: {} }))).toEqual({
      kind: 'other',
      status: 200,
    });
    expect(classifyOutcome(responseOutcome({ status: 404, headers: {} })).kind).toBe('other');
  });
});
