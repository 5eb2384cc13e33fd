import { DuplicateDocumentPolicy } from "../config";
import { InputError, describeError } from "../core/errors";
import { ExtractionService, normalizeExtractionOutput } from "../extract";
import { DocumentFetcher } from "../fetch";
import { DuplicateDocumentRegistry, hashContent } from "../hash";
import { Logger, MetricsRegistry } from "../observability";
import { TargetEvent, isSelectableStatus, transition } from "../scheduler";
import { StagingArea } from "../staging";
import { CrawlTarget, MonitoringCriteria, TargetOutcome, TargetOutcomeKind } from "../types";

export interface OrchestratorDeps {
  fetcher: DocumentFetcher;
  extractor: ExtractionService;
  staging: StagingArea;
  registry: DuplicateDocumentRegistry;
  duplicateDocumentPolicy: DuplicateDocumentPolicy;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
}

export interface ProcessResult {
  target: CrawlTarget;
  outcome: TargetOutcome;
}

interface Finish {
  event: Exclude<TargetEvent, "begin">;
  kind: TargetOutcomeKind;
  recordCount?: number;
  duplicateOf?: string;
  contentHash?: string;
  error?: string;
}

/**
 * Drives one target through fetch, extract and stage. Never retries: a failed
 * target is picked up again by the scheduler on a later run.
 */
export class ExtractionOrchestrator {
  private readonly deps: OrchestratorDeps;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  async process(target: CrawlTarget, criteria: MonitoringCriteria): Promise<ProcessResult> {
    const { logger, metrics } = this.deps;
    const startedAt = this.now();

    const invalid = this.validate(target);
    if (invalid) {
      logger.warn("target_invalid", { targetId: target.id, url: target.locator, error: invalid.message });
      return {
        target,
        outcome: {
          targetId: target.id,
          url: target.locator,
          kind: "invalid",
          status: target.status,
          attemptCount: target.tracking.attemptCount,
          error: invalid.message,
          finishedAt: startedAt.toISOString(),
        },
      };
    }

    const attemptAt = startedAt.toISOString();
    const inFlight: CrawlTarget = {
      ...target,
      status: transition(target.status, "begin"),
      tracking: {
        ...target.tracking,
        lastAttemptAt: attemptAt,
        updatedAt: attemptAt,
        attemptCount: target.tracking.attemptCount + 1,
      },
    };
    const attempt = inFlight.tracking.attemptCount;
    logger.info("target_attempt_start", { targetId: target.id, url: target.locator, attempt });

    let document: Buffer;
    const stopFetchTimer = metrics.startTimer("fetch_ms");
    try {
      document = await this.deps.fetcher.fetch(target.locator);
      stopFetchTimer();
    } catch (error) {
      const durationMs = stopFetchTimer();
      logger.warn("target_fetch_failed", { targetId: target.id, url: target.locator, attempt, durationMs, error: describeError(error) });
      metrics.incrementCounter("extracts_failed");
      return this.finish(inFlight, { event: "fail", kind: "failed", error: describeError(error) });
    }

    const contentHash = hashContent(document);
    const duplicateOf = this.deps.registry.firstSeenBy(contentHash, target.id);
    if (duplicateOf) {
      return this.finishDuplicate(inFlight, contentHash, duplicateOf);
    }

    const stopExtractTimer = metrics.startTimer("extract_ms");
    try {
      const raw = await this.deps.extractor.extract({
        targetId: target.id,
        locator: target.locator,
        document,
        criteria,
      });
      const records = normalizeExtractionOutput(raw, target.locator);
      const stagedPath = await this.deps.staging.write({ targetId: target.id, locator: target.locator, records });
      const durationMs = stopExtractTimer();

      this.deps.registry.register(contentHash, target.id);
      metrics.incrementCounter("extracts_ok");
      logger.info("target_succeeded", {
        targetId: target.id,
        url: target.locator,
        attempt,
        durationMs,
        recordCount: records.length,
        file: stagedPath,
      });
      return this.finish(inFlight, { event: "succeed", kind: "succeeded", recordCount: records.length, contentHash });
    } catch (error) {
      const durationMs = stopExtractTimer();
      logger.warn("target_extract_failed", { targetId: target.id, url: target.locator, attempt, durationMs, error: describeError(error) });
      metrics.incrementCounter("extracts_failed");
      return this.finish(inFlight, { event: "fail", kind: "failed", error: describeError(error) });
    }
  }

  private async finishDuplicate(inFlight: CrawlTarget, contentHash: string, duplicateOf: string): Promise<ProcessResult> {
    const { logger, metrics } = this.deps;
    metrics.incrementCounter("documents_duplicate");
    logger.info("target_duplicate_document", {
      targetId: inFlight.id,
      url: inFlight.locator,
      duplicateOf,
      policy: this.deps.duplicateDocumentPolicy,
    });

    if (this.deps.duplicateDocumentPolicy === "leave_queued") {
      return this.finish(inFlight, { event: "release", kind: "duplicate", duplicateOf });
    }

    try {
      await this.deps.staging.write({ targetId: inFlight.id, locator: inFlight.locator, records: [] });
    } catch (error) {
      logger.warn("target_stage_failed", { targetId: inFlight.id, error: describeError(error) });
      return this.finish(inFlight, { event: "fail", kind: "failed", error: describeError(error) });
    }
    return this.finish(inFlight, { event: "succeed", kind: "duplicate", recordCount: 0, duplicateOf, contentHash });
  }

  private finish(inFlight: CrawlTarget, finish: Finish): ProcessResult {
    const finishedAt = inFlight.tracking.updatedAt;
    const target: CrawlTarget = {
      ...inFlight,
      status: transition(inFlight.status, finish.event),
      tracking: { ...inFlight.tracking },
    };
    if (finish.event === "succeed") {
      target.tracking.succeededAt = inFlight.tracking.succeededAt ?? finishedAt;
      target.contentHash = finish.contentHash;
    }

    const outcome: TargetOutcome = {
      targetId: target.id,
      url: target.locator,
      kind: finish.kind,
      status: target.status,
      attemptCount: target.tracking.attemptCount,
      finishedAt,
    };
    if (finish.recordCount !== undefined) {
      outcome.recordCount = finish.recordCount;
    }
    if (finish.duplicateOf !== undefined) {
      outcome.duplicateOf = finish.duplicateOf;
    }
    if (finish.error !== undefined) {
      outcome.error = finish.error;
    }
    return { target, outcome };
  }

  private validate(target: CrawlTarget): InputError | undefined {
    if (target.id.trim() === "") {
      return new InputError("Target has no id");
    }
    if (target.locator.trim() === "") {
      return new InputError(`Target ${target.id} has no locator`);
    }
    if (!isSelectableStatus(target.status)) {
      return new InputError(`Target ${target.id} is '${target.status}' and cannot be attempted`);
    }
    return undefined;
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }
}
