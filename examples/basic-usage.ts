/**
 * Example: Sending requests through HttpClient with bounded retries.
 *
 * Demonstrates client configuration, JSON requests, and configuration
 * from the environment.
 */

import { HttpClient, retryConfigFromEnv } from '../src/index.js';

const client = new HttpClient({
  baseUrl: 'https://api.example.com',
  retry: { mode: 'bounded', maxAttempts: 3 },
  headers: { Authorization: 'Bearer test-token' },
  timeout: 10_000,
  logLevel: 'info',
});

// --- Simple GET ---
const repos = await client.get('/repos', { query: { page: 1 } });
console.log(`GET /repos -> ${repos.status}`);

// --- JSON POST ---
const created = await client.post('/repos', { name: 'demo' });
console.log(`POST /repos -> ${created.status}`);

// --- Retries configured from RETRY_MAX_ATTEMPTS ---
const envClient = new HttpClient({
  baseUrl: 'https://api.example.com',
  retry: retryConfigFromEnv(process.env),
});
const health = await envClient.get('/health');
console.log(`GET /health -> ${health.status}`);

// --- Retries disabled ---
const once = new HttpClient({ baseUrl: 'https://api.example.com', retry: { mode: 'none' } });
const single = await once.delete('/repos/demo');
console.log(`DELETE /repos/demo -> ${single.status}`);
