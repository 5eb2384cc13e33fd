import { MergeReport, TargetOutcome } from "../types";

export interface Sink {
  publishTargetOutcomes(outcomes: TargetOutcome[]): Promise<void>;
  publishMergeReport(report: MergeReport): Promise<void>;
}
