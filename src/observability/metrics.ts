import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      index_fetches: this.counters.get("index_fetches") ?? 0,
      index_records_parsed: this.counters.get("index_records_parsed") ?? 0,
      filings_matched: this.counters.get("filings_matched") ?? 0,
      documents_fetched: this.counters.get("documents_fetched") ?? 0,
      documents_empty: this.counters.get("documents_empty") ?? 0,
      items_extracted: this.counters.get("items_extracted") ?? 0,
      filings_failed: this.counters.get("filings_failed") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      index_fetch_ms: this.summarize("index_fetch_ms"),
      document_fetch_ms: this.summarize("document_fetch_ms"),
    };
  }

  printSummary(runId: string): void {
    console.log(
      JSON.stringify({
        ts: new Date().toISOString(),
        level: "info",
        msg: "metrics_summary",
        component: "metrics",
        runId,
        counters: this.getCounters(),
        timers: this.getTimerSummaries(),
      }),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
