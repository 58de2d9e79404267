// Prometheus-compatible metrics collection
// Tracks HTTP requests, post views, upgrade outcomes and latencies

import { createMiddleware } from "hono/factory";

export type Labels = Record<string, string>;

interface CounterSeries {
  name: string;
  value: number;
}

interface HistogramSeries {
  name: string;
  values: number[];
}

export interface HistogramStats {
  count: number;
  sum: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
}

export interface MetricsSnapshot {
  timestamp: string;
  counters: Record<string, number>;
  histograms: Record<string, HistogramStats>;
}

export interface MetricsSummary {
  totalRequests: number;
  totalErrors: number;
  errorRate: number;
  totalViews: number;
  upgradesAccepted: number;
  upgradesRejected: number;
  avgRequestDuration: number;
  p95RequestDuration: number;
  p99RequestDuration: number;
}

function seriesKey(name: string, labels?: Labels): string {
  if (!labels) return name;
  const labelStr = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
  return `${name}{${labelStr}}`;
}

function sum(values: number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

export class MetricsCollector {
  private counters: Map<string, CounterSeries> = new Map();
  private histograms: Map<string, HistogramSeries> = new Map();

  // Histograms keep a sliding window of the most recent samples
  constructor(private readonly maxSamples: number = 1000) {}

  incrementCounter(name: string, value: number = 1, labels?: Labels): void {
    const key = seriesKey(name, labels);
    const series = this.counters.get(key) ?? { name, value: 0 };
    series.value += value;
    this.counters.set(key, series);
  }

  observe(name: string, value: number, labels?: Labels): void {
    const key = seriesKey(name, labels);
    const series = this.histograms.get(key) ?? { name, values: [] };
    series.values.push(value);
    if (series.values.length > this.maxSamples) {
      series.values.shift();
    }
    this.histograms.set(key, series);
  }

  counterValue(name: string, labels?: Labels): number {
    return this.counters.get(seriesKey(name, labels))?.value ?? 0;
  }

  // Sum of a counter across all of its label sets
  counterTotal(name: string): number {
    let total = 0;
    for (const series of this.counters.values()) {
      if (series.name === name) total += series.value;
    }
    return total;
  }

  exportPrometheus(): string {
    const lines: string[] = [];
    const declared = new Set<string>();
    const declare = (name: string, type: string) => {
      if (declared.has(name)) return;
      declared.add(name);
      lines.push(`# TYPE ${name} ${type}`);
    };

    for (const [key, series] of this.counters.entries()) {
      declare(series.name, "counter");
      lines.push(`${key} ${series.value}`);
    }

    for (const [key, series] of this.histograms.entries()) {
      const { name, values } = series;
      const labelStr = key.slice(name.length);

      declare(name, "summary");
      lines.push(`${name}_sum${labelStr} ${sum(values)}`);
      lines.push(`${name}_count${labelStr} ${values.length}`);
      lines.push(`${name}_p50${labelStr} ${percentile(values, 50)}`);
      lines.push(`${name}_p95${labelStr} ${percentile(values, 95)}`);
      lines.push(`${name}_p99${labelStr} ${percentile(values, 99)}`);
    }

    return lines.join("\n") + "\n";
  }

  exportJSON(): MetricsSnapshot {
    const snapshot: MetricsSnapshot = {
      timestamp: new Date().toISOString(),
      counters: {},
      histograms: {},
    };

    for (const [key, series] of this.counters.entries()) {
      snapshot.counters[key] = series.value;
    }

    for (const [key, { values }] of this.histograms.entries()) {
      const total = sum(values);
      snapshot.histograms[key] = {
        count: values.length,
        sum: total,
        avg: values.length > 0 ? total / values.length : 0,
        p50: percentile(values, 50),
        p95: percentile(values, 95),
        p99: percentile(values, 99),
        min: Math.min(...values),
        max: Math.max(...values),
      };
    }

    return snapshot;
  }

  getSummary(): MetricsSummary {
    const totalRequests = this.counterTotal("http_requests_total");
    const totalErrors = this.counterTotal("http_errors_total");

    const requestDurations: number[] = [];
    for (const series of this.histograms.values()) {
      if (series.name === "http_request_duration_ms") {
        requestDurations.push(...series.values);
      }
    }

    const avgRequestDuration =
      requestDurations.length > 0
        ? sum(requestDurations) / requestDurations.length
        : 0;

    return {
      totalRequests,
      totalErrors,
      errorRate: totalRequests > 0 ? (totalErrors / totalRequests) * 100 : 0,
      totalViews: this.counterTotal("post_views_total"),
      upgradesAccepted: this.counterValue("player_upgrades_total", {
        result: "upgraded",
      }),
      upgradesRejected: this.counterValue("player_upgrades_total", {
        result: "rejected",
      }),
      avgRequestDuration: Math.round(avgRequestDuration * 100) / 100,
      p95RequestDuration: percentile(requestDurations, 95),
      p99RequestDuration: percentile(requestDurations, 99),
    };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

// Shared by the running server
export const metrics = new MetricsCollector();

export function trackRequest(
  collector: MetricsCollector,
  method: string,
  path: string,
  status: number,
  duration: number,
): void {
  collector.incrementCounter("http_requests_total", 1, {
    method,
    path,
    status: status.toString(),
  });
  collector.observe("http_request_duration_ms", duration, { method, path });

  if (status >= 400) {
    collector.incrementCounter("http_errors_total", 1, {
      method,
      path,
      status: status.toString(),
    });
  }
}

export function trackView(collector: MetricsCollector, postId: number): void {
  collector.incrementCounter("post_views_total", 1, {
    post_id: postId.toString(),
  });
}

export function trackUpgrade(
  collector: MetricsCollector,
  result: "upgraded" | "rejected",
): void {
  collector.incrementCounter("player_upgrades_total", 1, { result });
}

export function metricsMiddleware(collector: MetricsCollector = metrics) {
  return createMiddleware(async (c, next) => {
    const start = performance.now();

    await next();

    const duration = performance.now() - start;
    // Label by route pattern (/player/:id), not by the concrete URL, so the
    // number of series stays bounded by the number of routes.
    trackRequest(
      collector,
      c.req.method,
      c.req.routePath,
      c.res.status,
      duration,
    );
  });
}
