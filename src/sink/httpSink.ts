import { MergeReport, TargetOutcome } from "../types";
import { BaseSink } from "./baseSink";

type ManifestKind = "target_outcomes" | "merge_report";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  runId: string;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

class PermanentHttpSinkError extends Error {}

/** POSTs run manifests as JSON, retrying transient failures with linear backoff. */
export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly runId: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpSinkOptions) {
    super();
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.runId = options.runId;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  async publishTargetOutcomes(outcomes: TargetOutcome[]): Promise<void> {
    if (outcomes.length === 0) {
      return;
    }
    await this.post("target_outcomes", outcomes, outcomes.map((outcome) => outcome.targetId).join(","));
  }

  async publishMergeReport(report: MergeReport): Promise<void> {
    await this.post("merge_report", [report], report.mergedAt);
  }

  private async post(kind: ManifestKind, items: unknown[], idempotencySuffix: string): Promise<void> {
    this.ensureConfigured("HTTP", Boolean(this.endpoint));
    const endpoint = this.endpoint ?? "";

    const body = JSON.stringify({
      kind,
      runId: this.runId,
      sentAt: new Date().toISOString(),
      items,
    });

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": `${this.runId}:${kind}:${idempotencySuffix}`,
    };

    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let attempt = 0;
    while (true) {
      attempt += 1;
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        const response = await this.fetchFn(endpoint, {
          method: "POST",
          headers,
          body,
          signal: controller.signal,
        });

        if (response.ok) {
          return;
        }

        const responseText = await response.text();
        if (!isRetriableStatus(response.status)) {
          throw new PermanentHttpSinkError(`HTTP sink permanent error ${response.status}: ${responseText}`);
        }

        if (attempt > this.maxRetries) {
          throw new Error(`HTTP sink exhausted retries on status ${response.status}: ${responseText}`);
        }
      } catch (error) {
        if (error instanceof PermanentHttpSinkError) {
          throw error;
        }
        if (attempt > this.maxRetries) {
          throw error;
        }
      } finally {
        clearTimeout(timeout);
      }

      await sleep(this.retryDelayMs * attempt);
    }
  }
}
