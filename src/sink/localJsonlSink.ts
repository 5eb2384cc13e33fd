import fs from "node:fs";
import path from "node:path";
import { MergeReport, TargetOutcome } from "../types";
import { BaseSink } from "./baseSink";

export class LocalJsonlSink extends BaseSink {
  private readonly outcomesPath: string;
  private readonly mergesPath: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    super();
    const absoluteDir = path.resolve(manifestsDir);
    fs.mkdirSync(absoluteDir, { recursive: true });
    this.outcomesPath = path.join(absoluteDir, "outcomes.jsonl");
    this.mergesPath = path.join(absoluteDir, "merges.jsonl");
    this.runId = runId;
  }

  async publishTargetOutcomes(outcomes: TargetOutcome[]): Promise<void> {
    await this.appendLines(
      this.outcomesPath,
      outcomes.map((outcome) => ({
        runId: this.runId,
        ...outcome,
      })),
    );
  }

  async publishMergeReport(report: MergeReport): Promise<void> {
    await this.appendLines(this.mergesPath, [{ runId: this.runId, ...report }]);
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
