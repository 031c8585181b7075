// packages/conversion-backend/tests/transport.rate-limit-middleware.test.ts
//
// Token-bucket arithmetic with an injected clock, plus the Fastify preHandler
// wired through the shared error handler.
import Fastify from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { registerErrorHandler } from '../src/transport/error-handler.js';
import {
  createRateLimitMiddleware,
  RateLimiterService,
} from '../src/transport/rate-limit-middleware.js';

vi.mock('../src/infrastructure/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/infrastructure/logger.js')>();
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
});

describe('RateLimiterService', () => {
  it('admits a burst, then refills at the configured rate', () => {
    let clock = 0;
    const limiter = new RateLimiterService({ ratePerSecond: 1, burst: 5 }, { now: () => clock });

    const burst = Array.from({ length: 6 }, () => limiter.allow('10.0.0.1'));
    expect(burst).toEqual([true, true, true, true, true, false]);

    clock += 1_000;
    expect(limiter.allow('10.0.0.1')).toBe(true);
    expect(limiter.allow('10.0.0.1')).toBe(false);

    clock += 60_000;
    const refilled = Array.from({ length: 6 }, () => limiter.allow('10.0.0.1'));
    expect(refilled.filter(Boolean)).toHaveLength(5);
  });

  it('keeps separate buckets per key', () => {
    const limiter = new RateLimiterService({ ratePerSecond: 1, burst: 1 }, { now: () => 0 });

    expect(limiter.allow('a')).toBe(true);
    expect(limiter.allow('a')).toBe(false);
    expect(limiter.allow('b')).toBe(true);
  });

  it('clamps rate and burst to usable minimums', () => {
    let clock = 0;
    const limiter = new RateLimiterService({ ratePerSecond: 0, burst: 0 }, { now: () => clock });

    expect(limiter.allow('a')).toBe(true);
    expect(limiter.allow('a')).toBe(false);
    // 0.1 tokens per second
    clock += 10_000;
    expect(limiter.allow('a')).toBe(true);
  });

  it('drops idle buckets once the sweep interval passes', () => {
    let clock = 0;
    const limiter = new RateLimiterService(
      { ratePerSecond: 1, burst: 2, ttlSeconds: 60 },
      { now: () => clock },
    );
    limiter.allow('stale');

    clock = 61_000;
    limiter.allow('fresh');

    expect(limiter.size()).toBe(1);
    expect(limiter.sweep(clock + 120_000)).toBe(1);
    expect(limiter.size()).toBe(0);
  });
});

describe('createRateLimitMiddleware', () => {
  const apps: Array<ReturnType<typeof Fastify>> = [];

  afterEach(async () => {
    await Promise.all(apps.map((app) => app.close()));
    apps.length = 0;
  });

  function buildApp(limiter: RateLimiterService) {
    const app = Fastify({ logger: false });
    apps.push(app);
    registerErrorHandler(app);
    app.addHook('preHandler', createRateLimitMiddleware(limiter, { exemptPaths: ['/healthz'] }));
    app.get('/v1/ping', async () => ({ ok: true }));
    app.get('/healthz', async () => ({ status: 'ok' }));
    return app;
  }

  it('answers 429 with retry-after once the bucket is empty', async () => {
    const app = buildApp(new RateLimiterService({ ratePerSecond: 1, burst: 1 }, { now: () => 0 }));

    const first = await app.inject({ method: 'GET', url: '/v1/ping' });
    const second = await app.inject({ method: 'GET', url: '/v1/ping?x=1' });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(429);
    expect(second.headers['retry-after']).toBe('1');
    expect(second.json()).toMatchObject({ error: 'rate_limited', message: 'Rate limit exceeded' });
  });

  it('never limits exempt paths', async () => {
    const app = buildApp(new RateLimiterService({ ratePerSecond: 1, burst: 1 }, { now: () => 0 }));

    const statuses: number[] = [];
    for (let i = 0; i < 3; i += 1) {
      statuses.push((await app.inject({ method: 'GET', url: '/healthz' })).statusCode);
    }
    expect(statuses).toEqual([200, 200, 200]);
  });
});
