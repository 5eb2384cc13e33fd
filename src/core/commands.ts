import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { loadCriteria } from "../criteria";
import { ExtractionService, buildPrompt } from "../extract";
import { DocumentFetcher, HttpDocumentFetcher } from "../fetch";
import { DuplicateDocumentRegistry } from "../hash";
import { MasterDataset, StagingMergeEngine } from "../merge";
import { Logger, MetricsRegistry } from "../observability";
import { ExtractionOrchestrator, ExtractionSummary, runExtractionPass } from "../orchestrator";
import { selectTargets } from "../scheduler";
import { Sink } from "../sink";
import { StagingArea } from "../staging";
import { TargetStore } from "../store";
import { buildTargetsFromCalendar, mergeNewTargets, parseCalendarCsv } from "../targets";
import { MergeReport, TargetStatus } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: TargetStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetcher?: DocumentFetcher;
  extractor?: ExtractionService;
  now?: () => Date;
  signal?: AbortSignal;
}

export interface PreviewSummary {
  selected: number;
  skipped: number;
}

export interface StatusSummary {
  targets: Record<TargetStatus, number>;
  stagedFiles: number;
  masterRecords: number;
}

async function resolveExtractor(ctx: CommandContext): Promise<ExtractionService> {
  if (ctx.extractor) {
    return ctx.extractor;
  }
  // Loaded lazily so commands that never extract do not pull in the PDF and LLM clients.
  const { createExtractionService } = await import("../extract/factory");
  return createExtractionService(ctx.config, ctx.logger.child("extraction"));
}

export async function runExtract(ctx: CommandContext): Promise<ExtractionSummary> {
  const { config, logger } = ctx;
  logger.info("extract_start", { targetsLocation: ctx.store.location });

  const criteria = await loadCriteria(config.criteriaPath);
  const registry = new DuplicateDocumentRegistry();
  const orchestrator = new ExtractionOrchestrator({
    fetcher:
      ctx.fetcher ??
      new HttpDocumentFetcher({
        userAgent: config.userAgent,
        timeoutMs: config.downloadTimeoutMs,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
      }),
    extractor: await resolveExtractor(ctx),
    staging: new StagingArea(config.outputDirs.staging),
    registry,
    duplicateDocumentPolicy: config.duplicateDocumentPolicy,
    logger,
    metrics: ctx.metrics,
    now: ctx.now,
  });

  const summary = await runExtractionPass({
    store: ctx.store,
    criteria,
    orchestrator,
    registry,
    logger,
    metrics: ctx.metrics,
    now: ctx.now,
    signal: ctx.signal,
  });

  for (const outcome of summary.outcomes) {
    logger.info("target_outcome", { ...outcome });
  }
  await ctx.sink.publishTargetOutcomes(summary.outcomes);

  const { outcomes: _outcomes, ...counts } = summary;
  logger.info("extract_complete", { ...counts });
  return summary;
}

/** Dry run: reports what would be attempted. Nothing is fetched, staged or saved. */
export async function runExtractPreview(ctx: CommandContext): Promise<PreviewSummary> {
  const { config, logger } = ctx;
  const now = ctx.now ?? (() => new Date());
  const criteria = await loadCriteria(config.criteriaPath);
  const targets = await ctx.store.load();
  const selection = selectTargets(targets, now());
  const prompt = buildPrompt(criteria, "<document text>");

  for (const skipped of selection.skipped) {
    logger.info("dry_run_skip", { targetId: skipped.target.id, reason: skipped.reason });
  }
  for (const target of selection.selected) {
    logger.info("dry_run_would_attempt", {
      targetId: target.id,
      url: target.locator,
      status: target.status,
      attempt: target.tracking.attemptCount + 1,
    });
  }
  logger.info("dry_run_prompt", { model: config.extractionModel, system: prompt.system, user: prompt.user });

  const summary = { selected: selection.selected.length, skipped: selection.skipped.length };
  logger.info("dry_run_complete", { ...summary });
  return summary;
}

export async function runMerge(ctx: CommandContext): Promise<MergeReport> {
  const { config } = ctx;
  const engine = new StagingMergeEngine({
    master: new MasterDataset(config.masterPath),
    staging: new StagingArea(config.outputDirs.staging),
    logger: ctx.logger,
    metrics: ctx.metrics,
    corruptStagedPolicy: config.corruptStagedPolicy,
    quarantineDir: config.outputDirs.quarantine,
    lockStaleAfterMs: config.mergeLockStaleMs,
    now: ctx.now,
  });

  const report = await engine.merge();
  await ctx.sink.publishMergeReport(report);
  return report;
}

export async function runPipeline(ctx: CommandContext): Promise<{ extraction: ExtractionSummary; merge: MergeReport }> {
  ctx.logger.info("pipeline_start");
  const extraction = await runExtract(ctx);
  const merge = await runMerge(ctx);
  ctx.logger.info("pipeline_complete", { succeeded: extraction.succeeded, masterRecords: merge.masterRecords });
  return { extraction, merge };
}

export async function runStatus(ctx: CommandContext): Promise<StatusSummary> {
  ctx.logger.info("status_start");
  const targets = await ctx.store.load();
  const counts: Record<TargetStatus, number> = { queued: 0, processing: 0, processed: 0, failed: 0 };
  for (const target of targets) {
    counts[target.status] += 1;
  }

  const stagedFiles = await new StagingArea(ctx.config.outputDirs.staging).list();
  const masterRecords = await new MasterDataset(ctx.config.masterPath).read();
  const summary: StatusSummary = { targets: counts, stagedFiles: stagedFiles.length, masterRecords: masterRecords.length };
  ctx.logger.info("status_complete", { ...summary });
  return summary;
}

export async function runSeed(ctx: CommandContext, calendarPath: string): Promise<number> {
  const { config, logger } = ctx;
  const now = ctx.now ?? (() => new Date());
  const absolutePath = path.resolve(calendarPath);
  logger.info("seed_start", { file: absolutePath });

  const rows = parseCalendarCsv(await fs.promises.readFile(absolutePath, "utf-8"));
  const generated = buildTargetsFromCalendar(
    rows,
    { idPrefix: config.targetIdPrefix, urlTemplate: config.calendarUrlTemplate },
    now(),
  );
  for (const rejected of generated.rejected) {
    logger.warn("seed_row_rejected", { ...rejected });
  }

  const existing = (await ctx.store.exists()) ? await ctx.store.load() : [];
  const { targets, added } = mergeNewTargets(existing, generated.targets);
  if (added.length > 0) {
    await ctx.store.save(targets);
  }
  logger.info("seed_complete", { generated: generated.targets.length, added: added.length, total: targets.length });
  return added.length;
}
