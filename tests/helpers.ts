import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ExtractionRequest, ExtractionService } from "../src/extract/extractionService";
import { DocumentFetcher } from "../src/fetch/documentFetcher";
import { Logger } from "../src/observability";
import { CrawlTarget, MonitoringCriteria } from "../src/types";

export const HEADER = "Name,Category,RaceName,Event,Location,Rank,Date";

export function makeTempDir(prefix = "race-results-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function quietLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_test", minLevel: "error" });
}

export const criteria: MonitoringCriteria = {
  groups: ["SC Alpina"],
  names: ["Jane Doe"],
};

export function makeTarget(overrides: Partial<CrawlTarget> = {}): CrawlTarget {
  return {
    id: "T1",
    locator: "https://results.test/T1.pdf",
    status: "queued",
    window: { validFrom: null, validUntil: null },
    tracking: {
      createdAt: "2025-01-01T00:00:00.000Z",
      updatedAt: "2025-01-01T00:00:00.000Z",
      lastAttemptAt: null,
      succeededAt: null,
      attemptCount: 0,
    },
    ...overrides,
  };
}

/** Serves fixed bytes per locator; unknown locators fail like an HTTP 404. */
export class FakeFetcher implements DocumentFetcher {
  readonly calls: string[] = [];
  private readonly documents: Map<string, Buffer>;

  constructor(documents: Record<string, string>) {
    this.documents = new Map(Object.entries(documents).map(([locator, body]) => [locator, Buffer.from(body)]));
  }

  async fetch(locator: string): Promise<Buffer> {
    this.calls.push(locator);
    const document = this.documents.get(locator);
    if (!document) {
      throw new Error(`HTTP 404 while fetching ${locator}`);
    }
    return document;
  }
}

export class FakeExtractor implements ExtractionService {
  readonly requests: ExtractionRequest[] = [];
  private readonly answer: (request: ExtractionRequest) => Promise<string>;

  constructor(answer: string | ((request: ExtractionRequest) => Promise<string>)) {
    this.answer = typeof answer === "string" ? async () => answer : answer;
  }

  async extract(request: ExtractionRequest): Promise<string> {
    this.requests.push(request);
    return this.answer(request);
  }
}
