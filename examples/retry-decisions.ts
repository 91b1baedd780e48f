/**
 * Example: Driving RetryPolicy by hand.
 *
 * Demonstrates decisions for each outcome class and rate-limit inspection.
 */

import {
  RateLimitSnapshot,
  RetryPolicy,
  createRequest,
  errorOutcome,
  responseOutcome,
} from '../src/index.js';

const policy = RetryPolicy.bounded(3);
const request = createRequest({
  method: 'POST',
  url: '/events',
  baseUrl: 'https://api.example.com',
  body: JSON.stringify({ type: 'ping' }),
});

// --- Clone before sending ---
const clone = policy.cloneRequest(request);
console.log(`Clone ready: ${clone !== null}`);

// --- Transport failure: retry immediately ---
const afterError = policy.decide(errorOutcome(new TypeError('fetch failed')));
console.log(`transport error -> ${afterError?.reason} after ${afterError?.delayMs}ms`);

// --- Server error: retry immediately ---
const afterServer = policy.decide(responseOutcome({ status: 503, headers: {} }));
console.log(`503 -> ${afterServer?.reason} after ${afterServer?.delayMs}ms`);

// --- Throttled with a future reset: wait until the window reopens ---
const headers = {
  'x-ratelimit-limit': '60',
  'x-ratelimit-remaining': '0',
  'x-ratelimit-reset': String(Math.floor(Date.now() / 1000) + 2),
};
const afterThrottle = policy.decide(responseOutcome({ status: 429, headers }));
if (afterThrottle) {
  console.log(`429 -> waiting ${afterThrottle.delayMs}ms`);
  await afterThrottle.wait();
}
console.log(`Attempts left: ${policy.remainingAttempts}`);

// --- Inspecting the snapshot directly ---
const snapshot = RateLimitSnapshot.parse(headers);
if (snapshot) {
  console.log(`Rate limit: ${snapshot.remaining}/${snapshot.limit}, resets ${snapshot.resetTime.toISOString()}`);
  console.log(`Near limit: ${snapshot.isNearLimit(0.1)}`);
}
