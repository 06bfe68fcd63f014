import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    if (value === 0) {
      return;
    }
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = performance.now();
    return () => {
      const durationMs = performance.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    const count = (name: MetricCounterName): number => this.counters.get(name) ?? 0;
    return {
      docs_processed: count("docs_processed"),
      artifacts_written: count("artifacts_written"),
      artifacts_skipped: count("artifacts_skipped"),
      docs_failed: count("docs_failed"),
      transform_warnings: count("transform_warnings"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      normalize_ms: this.summarize("normalize_ms"),
      publish_ms: this.summarize("publish_ms"),
    };
  }

  snapshot(): MetricsSnapshot {
    return { counters: this.getCounters(), timers: this.getTimerSummaries() };
  }

  printSummary(): void {
    const payload = { ts: new Date().toISOString(), level: "info", msg: "metrics_summary", ...this.snapshot() };
    console.error(JSON.stringify(payload));
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    const total = values.reduce((sum, value) => sum + value, 0);
    return {
      count: values.length,
      min: Number(Math.min(...values).toFixed(2)),
      max: Number(Math.max(...values).toFixed(2)),
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
