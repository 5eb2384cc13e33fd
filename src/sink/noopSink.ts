import { MergeReport, TargetOutcome } from "../types";
import { BaseSink } from "./baseSink";

export class NoopSink extends BaseSink {
  async publishTargetOutcomes(_outcomes: TargetOutcome[]): Promise<void> {
    return;
  }

  async publishMergeReport(_report: MergeReport): Promise<void> {
    return;
  }
}
