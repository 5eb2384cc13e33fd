import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger, MetricsRegistry } from "../src/observability";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger", () => {
  it("writes one JSON line with the component and run id", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    new Logger({ component: "extract", runId: "run_1" }).info("target_attempt_start", { targetId: "T1", attempt: 1 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      level: "info",
      msg: "target_attempt_start",
      component: "extract",
      runId: "run_1",
      targetId: "T1",
      attempt: 1,
    });
  });

  it("drops messages below the minimum level and keeps it for children", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const child = new Logger({ component: "cli", runId: "run_1", minLevel: "warn" }).child("merge");

    child.info("merge_start");
    child.warn("merge_staged_file_skipped");
    child.error("merge_failed");

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({ component: "merge", level: "warn" });
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters and summarizes timers", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("extracts_ok");
    metrics.incrementCounter("extracts_ok", 2);
    metrics.startTimer("merge_ms")();

    expect(metrics.getCounters().extracts_ok).toBe(3);
    expect(metrics.getCounters().extracts_failed).toBe(0);
    expect(metrics.getTimerSummaries().merge_ms.count).toBe(1);
    expect(metrics.getTimerSummaries().fetch_ms).toEqual({ count: 0, min: 0, max: 0, avg: 0 });
  });
});
