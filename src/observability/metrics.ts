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

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      targets_selected: this.counters.get("targets_selected") ?? 0,
      targets_skipped: this.counters.get("targets_skipped") ?? 0,
      extracts_ok: this.counters.get("extracts_ok") ?? 0,
      extracts_failed: this.counters.get("extracts_failed") ?? 0,
      documents_duplicate: this.counters.get("documents_duplicate") ?? 0,
      records_merged: this.counters.get("records_merged") ?? 0,
      records_duplicate: this.counters.get("records_duplicate") ?? 0,
      staged_files_quarantined: this.counters.get("staged_files_quarantined") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      fetch_ms: this.summarize("fetch_ms"),
      extract_ms: this.summarize("extract_ms"),
      merge_ms: this.summarize("merge_ms"),
    };
  }

  printSummary(runId: string): void {
    console.log(
      JSON.stringify({
        ts: new Date().toISOString(),
        level: "info",
        msg: "metrics_summary",
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
