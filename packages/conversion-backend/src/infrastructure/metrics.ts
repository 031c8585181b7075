// packages/conversion-backend/src/infrastructure/metrics.ts

// Minimal metrics facade for the conversion backend.
// The default implementation keeps values in process memory so a scrape
// endpoint (out of scope here) can read `snapshot()`. Swap the exported
// `metrics` in one place to forward to Prometheus/statsd instead.

export interface MetricsTags {
  [key: string]: string | number | boolean | undefined;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  timings: Record<string, { count: number; totalMs: number }>;
}

export interface Metrics {
  increment(name: string, value?: number, tags?: MetricsTags): void;
  gauge(name: string, value: number, tags?: MetricsTags): void;
  timing(name: string, ms: number, tags?: MetricsTags): void;
  snapshot(): MetricsSnapshot;
  reset(): void;
}

function seriesKey(name: string, tags?: MetricsTags): string {
  if (!tags) return name;
  const labels = Object.entries(tags)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}="${String(value)}"`);
  return labels.length > 0 ? `${name}{${labels.join(',')}}` : name;
}

export function createInMemoryMetrics(): Metrics {
  const counters = new Map<string, number>();
  const gauges = new Map<string, number>();
  const timings = new Map<string, { count: number; totalMs: number }>();

  return {
    increment(name, value = 1, tags) {
      const key = seriesKey(name, tags);
      counters.set(key, (counters.get(key) ?? 0) + value);
    },
    gauge(name, value, tags) {
      gauges.set(seriesKey(name, tags), value);
    },
    timing(name, ms, tags) {
      const key = seriesKey(name, tags);
      const current = timings.get(key) ?? { count: 0, totalMs: 0 };
      timings.set(key, { count: current.count + 1, totalMs: current.totalMs + ms });
    },
    snapshot() {
      return {
        counters: Object.fromEntries(counters),
        gauges: Object.fromEntries(gauges),
        timings: Object.fromEntries([...timings].map(([key, value]) => [key, { ...value }])),
      };
    },
    reset() {
      counters.clear();
      gauges.clear();
      timings.clear();
    },
  };
}

// metrics.declaration()
export const metrics: Metrics = createInMemoryMetrics();
