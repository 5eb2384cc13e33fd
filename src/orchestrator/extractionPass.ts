import { DuplicateDocumentRegistry } from "../hash";
import { Logger, MetricsRegistry } from "../observability";
import { selectTargets } from "../scheduler";
import { TargetStore } from "../store";
import { CrawlTarget, MonitoringCriteria, TargetOutcome } from "../types";
import { ExtractionOrchestrator } from "./orchestrator";

export interface ExtractionPassDeps {
  store: TargetStore;
  criteria: MonitoringCriteria;
  orchestrator: ExtractionOrchestrator;
  registry: DuplicateDocumentRegistry;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
  signal?: AbortSignal;
}

export interface ExtractionSummary {
  total: number;
  selected: number;
  skipped: number;
  attempted: number;
  succeeded: number;
  duplicates: number;
  failed: number;
  invalid: number;
  aborted: boolean;
  saved: boolean;
  outcomes: TargetOutcome[];
}

/**
 * One scheduling pass: select eligible targets, process them one after the
 * other, then save every target update in a single batch. A store failure
 * propagates before anything is saved, so the previous snapshot stays intact.
 */
export async function runExtractionPass(deps: ExtractionPassDeps): Promise<ExtractionSummary> {
  const { store, criteria, orchestrator, registry, logger, metrics } = deps;
  const now = deps.now ?? (() => new Date());

  const targets = await store.load();
  registry.seed(targets);

  const selection = selectTargets(targets, now());
  metrics.incrementCounter("targets_selected", selection.selected.length);
  metrics.incrementCounter("targets_skipped", selection.skipped.length);
  for (const skipped of selection.skipped) {
    logger.info("target_skipped", {
      targetId: skipped.target.id,
      reason: skipped.reason,
      status: skipped.target.status,
    });
  }
  logger.info("extraction_pass_selected", {
    total: targets.length,
    selected: selection.selected.length,
    skipped: selection.skipped.length,
  });

  const updates = new Map<CrawlTarget, CrawlTarget>();
  const outcomes: TargetOutcome[] = [];
  let aborted = false;

  for (const target of selection.selected) {
    if (deps.signal?.aborted) {
      aborted = true;
      logger.warn("extraction_pass_aborted", { remaining: selection.selected.length - outcomes.length });
      break;
    }

    const result = await orchestrator.process(target, criteria);
    outcomes.push(result.outcome);
    if (result.target !== target) {
      updates.set(target, result.target);
    }
  }

  let saved = false;
  if (updates.size > 0) {
    await store.save(targets.map((target) => updates.get(target) ?? target));
    saved = true;
    logger.info("targets_saved", { location: store.location, updated: updates.size });
  }

  const count = (kind: TargetOutcome["kind"]) => outcomes.filter((outcome) => outcome.kind === kind).length;
  return {
    total: targets.length,
    selected: selection.selected.length,
    skipped: selection.skipped.length,
    attempted: updates.size,
    succeeded: count("succeeded"),
    duplicates: count("duplicate"),
    failed: count("failed"),
    invalid: count("invalid"),
    aborted,
    saved,
    outcomes,
  };
}
