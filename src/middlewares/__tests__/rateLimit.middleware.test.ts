import { describe, it, expect, afterEach } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { rateLimit } from '../rateLimit.middleware';
import type { RateLimitOptions } from '../rateLimit.middleware';

let server: Server | null = null;

const serve = (options: RateLimitOptions): Promise<string> => {
  const app = express();
  app.get('/ping', rateLimit(options), (_req, res) => {
    res.json({ success: true, message: 'pong' });
  });

  return new Promise((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = listening.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve(`http://127.0.0.1:${port}/ping`);
    });
    server = listening;
  });
};

const hit = async (url: string, headers: Record<string, string> = {}) => {
  const response = await fetch(url, { headers });
  const body: unknown = await response.json();
  const message = typeof body === 'object' && body !== null && 'message' in body ? body.message : undefined;
  return { status: response.status, headers: response.headers, message };
};

afterEach(async () => {
  const current = server;
  server = null;
  if (current) {
    await new Promise<void>((resolve, reject) => current.close((error) => (error ? reject(error) : resolve())));
  }
});

describe('rateLimit', () => {
  it('counts down the remaining requests in headers', async () => {
    const url = await serve({ windowMs: 60_000, maxRequests: 2, now: () => 0 });

    const first = await hit(url);

    expect(first.status).toBe(200);
    expect(first.headers.get('x-ratelimit-limit')).toBe('2');
    expect(first.headers.get('x-ratelimit-remaining')).toBe('1');
    expect(first.headers.get('x-ratelimit-reset')).toBe('1970-01-01T00:01:00.000Z');
  });

  it('rejects past the limit with the default message', async () => {
    const url = await serve({ windowMs: 60_000, maxRequests: 1, now: () => 15_000 });

    await hit(url);
    const rejected = await hit(url);

    expect(rejected.status).toBe(429);
    expect(rejected.message).toBe('Too many requests. Try again in 60 seconds.');
    expect(rejected.headers.get('retry-after')).toBe('60');
  });

  it('uses a configured message and opens a new window once the clock passes the reset', async () => {
    let clock = 0;
    const url = await serve({ windowMs: 60_000, maxRequests: 1, message: 'Slow down', now: () => clock });

    expect((await hit(url)).status).toBe(200);
    clock = 30_000;
    const rejected = await hit(url);
    clock = 60_000;
    const reopened = await hit(url);

    expect(rejected.status).toBe(429);
    expect(rejected.message).toBe('Slow down');
    expect(rejected.headers.get('retry-after')).toBe('30');
    expect(reopened.status).toBe(200);
  });

  it('keeps separate counters per client key', async () => {
    const url = await serve({
      windowMs: 60_000,
      maxRequests: 1,
      now: () => 0,
      keyBy: (req) => req.get('x-client') ?? 'anonymous',
    });

    expect((await hit(url, { 'x-client': 'a' })).status).toBe(200);
    expect((await hit(url, { 'x-client': 'b' })).status).toBe(200);
    expect((await hit(url, { 'x-client': 'a' })).status).toBe(429);
  });
});
