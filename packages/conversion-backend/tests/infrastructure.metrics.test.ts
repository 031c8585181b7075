import { describe, expect, it } from 'vitest';

import { createInMemoryMetrics } from '../src/infrastructure/metrics.js';

describe('infrastructure/metrics', () => {
  it('accumulates counters and keeps the last gauge value', () => {
    const metrics = createInMemoryMetrics();
    metrics.increment('tasks_submitted_total');
    metrics.increment('tasks_submitted_total', 2);
    metrics.gauge('queue_size', 4);
    metrics.gauge('queue_size', 1);

    const snapshot = metrics.snapshot();
    expect(snapshot.counters.tasks_submitted_total).toBe(3);
    expect(snapshot.gauges.queue_size).toBe(1);
  });

  it('keys series by sorted tags and drops undefined ones', () => {
    const metrics = createInMemoryMetrics();
    metrics.increment('http_requests', 1, { status: 200, route: '/healthz', extra: undefined });

    expect(Object.keys(metrics.snapshot().counters)).toEqual([
      'http_requests{route="/healthz",status="200"}',
    ]);
  });

  it('aggregates timings and resets', () => {
    const metrics = createInMemoryMetrics();
    metrics.timing('pipeline_duration_ms', 120);
    metrics.timing('pipeline_duration_ms', 30);
    expect(metrics.snapshot().timings.pipeline_duration_ms).toEqual({ count: 2, totalMs: 150 });

    metrics.reset();
    expect(metrics.snapshot()).toEqual({ counters: {}, gauges: {}, timings: {} });
  });
});
