// packages/conversion-backend/src/transport/rate-limit-middleware.ts
//
// In-process token-bucket rate limiting keyed by client address.
// Buckets are created lazily and swept once untouched for `ttlSeconds`.
import type { FastifyReply, FastifyRequest } from 'fastify';

import { RateLimitError } from '@docuqueue/contracts';

import { errorMessage, logger } from '../infrastructure/logger.js';

const SWEEP_INTERVAL_MS = 60_000;

export interface RateLimitConfig {
  ratePerSecond: number;
  burst: number;
  ttlSeconds?: number;
}

interface Bucket {
  tokens: number;
  lastRefill: number;
}

export class RateLimiterService {
  private readonly buckets = new Map<string, Bucket>();
  private readonly rate: number;
  private readonly burst: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private lastSweep: number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(config: RateLimitConfig, deps: { now?: () => number } = {}) {
    this.rate = Math.max(0.1, config.ratePerSecond);
    this.burst = Math.max(1, Math.floor(config.burst));
    this.ttlMs = Math.max(60, Math.floor(config.ttlSeconds ?? 300)) * 1000;
    this.now = deps.now ?? Date.now;
    this.lastSweep = this.now();
  }

  /**
   * Debit `cost` tokens from the key's bucket if it holds enough.
   */
  allow(key: string, cost = 1): boolean {
    const now = this.now();
    if (now - this.lastSweep >= SWEEP_INTERVAL_MS) {
      this.sweep(now);
    }

    const bucket = this.buckets.get(key) ?? { tokens: this.burst, lastRefill: now };
    const elapsedSeconds = Math.max(0, now - bucket.lastRefill) / 1000;
    const tokens = Math.min(this.burst, bucket.tokens + this.rate * elapsedSeconds);

    const allowed = tokens >= cost;
    this.buckets.set(key, { tokens: allowed ? tokens - cost : tokens, lastRefill: now });
    return allowed;
  }

  /**
   * Remove buckets untouched for longer than the TTL. Returns how many were dropped.
   */
  sweep(now = this.now()): number {
    const cutoff = now - this.ttlMs;
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      if (bucket.lastRefill < cutoff) {
        this.buckets.delete(key);
        removed += 1;
      }
    }
    this.lastSweep = now;
    return removed;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      try {
        this.sweep();
      } catch (error) {
        logger.error('Rate limiter sweep failed', { error: errorMessage(error) });
      }
    }, SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  size(): number {
    return this.buckets.size;
  }
}

/**
 * Fastify preHandler rejecting over-limit clients with a RateLimitError (429).
 */
export function createRateLimitMiddleware(
  limiter: RateLimiterService,
  options: { exemptPaths?: string[] } = {},
) {
  const exempt = new Set(options.exemptPaths ?? []);

  return async function rateLimitMiddleware(
    request: FastifyRequest,
    _reply: FastifyReply,
  ): Promise<void> {
    const pathname = request.url.split('?')[0] ?? request.url;
    if (exempt.has(pathname)) return;

    const key = request.ip || 'unknown';
    if (!limiter.allow(key)) {
      logger.warn('Rate limit exceeded', {
        event: 'rate_limit_exceeded',
        key,
        method: request.method,
        url: pathname,
      });
      throw new RateLimitError('Rate limit exceeded', key);
    }
  };
}
