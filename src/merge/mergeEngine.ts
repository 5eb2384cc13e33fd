import { CorruptStagedPolicy } from "../config";
import { MergeIntegrityError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { StagedFile, StagingArea } from "../staging";
import { MergeReport, ResultRecord } from "../types";
import { consolidateRecords } from "./consolidate";
import { MasterDataset } from "./masterDataset";
import { acquireMergeLock } from "./mergeLock";

export interface MergeEngineDeps {
  master: MasterDataset;
  staging: StagingArea;
  logger: Logger;
  metrics: MetricsRegistry;
  corruptStagedPolicy: CorruptStagedPolicy;
  quarantineDir: string;
  /** Age after which a lock left by a crashed merge is taken over. */
  lockStaleAfterMs: number;
  now?: () => Date;
}

export class StagingMergeEngine {
  private readonly deps: MergeEngineDeps;

  constructor(deps: MergeEngineDeps) {
    this.deps = deps;
  }

  async merge(): Promise<MergeReport> {
    const { staging, logger, metrics } = this.deps;
    const now = this.deps.now ?? (() => new Date());
    const lock = await acquireMergeLock(staging.dir, { staleAfterMs: this.deps.lockStaleAfterMs, now });
    if (lock.recovered) {
      logger.warn("merge_stale_lock_removed", { file: lock.path, reason: lock.recovered });
    }

    try {
      const stopTimer = metrics.startTimer("merge_ms");
      const mergedAt = now().toISOString();
      const existing = await this.deps.master.read();
      const files = await staging.list();
      logger.info("merge_start", { masterRecords: existing.length, stagedFiles: files.length });

      const consumed: StagedFile[] = [];
      const batches: ResultRecord[][] = [];
      let quarantinedFiles = 0;
      let skippedFiles = 0;

      for (const file of files) {
        try {
          batches.push(await staging.read(file));
          consumed.push(file);
        } catch (error) {
          if (!(error instanceof MergeIntegrityError)) {
            throw error;
          }
          if (this.deps.corruptStagedPolicy === "quarantine") {
            const destination = await staging.quarantine(file, this.deps.quarantineDir, mergedAt);
            quarantinedFiles += 1;
            logger.warn("merge_staged_file_quarantined", { file: file.path, destination, error: error.message });
          } else {
            skippedFiles += 1;
            logger.warn("merge_staged_file_skipped", { file: file.path, error: error.message });
          }
        }
      }

      const stagedRecords = batches.reduce((total, batch) => total + batch.length, 0);
      const report: MergeReport = {
        stagedFiles: files.length,
        mergedFiles: consumed.length,
        stagedRecords,
        duplicateRecords: 0,
        quarantinedFiles,
        skippedFiles,
        masterRecords: existing.length,
        mergedAt,
      };
      metrics.incrementCounter("staged_files_quarantined", quarantinedFiles);

      if (consumed.length === 0) {
        stopTimer();
        logger.info("merge_nothing_to_merge", { ...report });
        return report;
      }

      const { records, duplicates } = consolidateRecords(existing, batches);
      await this.deps.master.write(records);

      // Staged inputs go only once the new master is in place.
      for (const file of consumed) {
        await staging.remove(file);
      }

      report.duplicateRecords = duplicates;
      report.masterRecords = records.length;
      metrics.incrementCounter("records_merged", stagedRecords);
      metrics.incrementCounter("records_duplicate", duplicates);
      const durationMs = stopTimer();
      logger.info("merge_complete", { ...report, durationMs });
      return report;
    } finally {
      await lock.release();
    }
  }
}
