import { beforeEach, describe, expect, it, vi } from 'vitest';

/**
 * Intent:
 * - Guard defaults for queue, resource gate, limits and publishing.
 * - Ensure enabled-but-misconfigured features fail fast with ConfigurationError.
 */

async function withEnv(env: Record<string, string | undefined>, fn: () => void | Promise<void>) {
  const oldEnv = { ...process.env };
  process.env = { ...process.env, ...env };
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) delete process.env[key];
  }
  try {
    await fn();
  } finally {
    process.env = oldEnv;
  }
}

async function loadConfigFresh() {
  const module = await import('../src/config/env.js');
  return module.loadConfig();
}

const CLEAR = {
  ENGINE_BACKEND: undefined,
  ENGINE_CONCURRENT_ENDPOINT: undefined,
  PUBLISH_BACKEND: undefined,
  S3_BUCKET_NAME: undefined,
  S3_BUCKET: undefined,
  S3_ACCESS_KEY_ID: undefined,
  S3_SECRET_ACCESS_KEY: undefined,
  AWS_ACCESS_KEY_ID: undefined,
  AWS_SECRET_ACCESS_KEY: undefined,
  MAX_QUEUE_SIZE: undefined,
  MAX_WORKERS: undefined,
  MEM_PER_JOB_GB: undefined,
  RATE_LIMIT_EXEMPT: undefined,
};

describe('config/env - defaults', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  it('provides single-host defaults when only NODE_ENV is set', async () => {
    await withEnv({ ...CLEAR, NODE_ENV: 'test' }, async () => {
      const cfg = await loadConfigFresh();

      expect(cfg.nodeEnv).toBe('test');
      expect(cfg.queue).toEqual({ maxQueueSize: 100, maxWorkers: 1, pollIntervalMs: 500 });
      expect(cfg.resources.backend).toBe('standard');
      expect(cfg.resources.memPerJobGb).toBe(8);
      expect(cfg.resources.reserveGpuMemGb).toBe(1);
      expect(cfg.resources.idleUnloadSeconds).toBe(600);
      expect(cfg.limits.batchPageSize).toBe(50);
      expect(cfg.limits.maxPages).toBe(500);
      expect(cfg.publish.backend).toBe('local');
      expect(cfg.publish.autoPublish).toBe(false);
      expect(cfg.rateLimit.exemptPaths).toEqual(['/healthz', '/metrics']);
    });
  });

  it('reads numeric overrides', async () => {
    await withEnv(
      { ...CLEAR, MAX_QUEUE_SIZE: '3', MAX_WORKERS: '2', MEM_PER_JOB_GB: '2.5' },
      async () => {
        const cfg = await loadConfigFresh();
        expect(cfg.queue.maxQueueSize).toBe(3);
        expect(cfg.queue.maxWorkers).toBe(2);
        expect(cfg.resources.memPerJobGb).toBe(2.5);
      },
    );
  });
});

describe('config/env - misconfiguration', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  it('rejects an unknown engine backend', async () => {
    await withEnv({ ...CLEAR, ENGINE_BACKEND: 'turbo' }, async () => {
      await expect(loadConfigFresh()).rejects.toMatchObject({ kind: 'configuration' });
    });
  });

  it('requires an endpoint for the concurrent backend', async () => {
    await withEnv({ ...CLEAR, ENGINE_BACKEND: 'concurrent' }, async () => {
      await expect(loadConfigFresh()).rejects.toThrow(/ENGINE_CONCURRENT_ENDPOINT/);
    });
  });

  it('requires bucket and credentials for remote publishing', async () => {
    await withEnv({ ...CLEAR, PUBLISH_BACKEND: 'remote', S3_BUCKET_NAME: 'results' }, async () => {
      await expect(loadConfigFresh()).rejects.toThrow(/S3_BUCKET_NAME/);
    });
  });

  it('accepts remote publishing when fully configured', async () => {
    await withEnv(
      {
        ...CLEAR,
        PUBLISH_BACKEND: 'remote',
        S3_BUCKET_NAME: 'results',
        S3_ACCESS_KEY_ID: 'test-key',
        S3_SECRET_ACCESS_KEY: 'test-secret',
      },
      async () => {
        const cfg = await loadConfigFresh();
        expect(cfg.publish.backend).toBe('remote');
        expect(cfg.publish.s3.bucket).toBe('results');
        expect(cfg.publish.s3.prefix).toBe('conversions');
      },
    );
  });
});
