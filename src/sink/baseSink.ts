import { MergeReport, TargetOutcome } from "../types";
import { Sink } from "./types";

export abstract class BaseSink implements Sink {
  abstract publishTargetOutcomes(outcomes: TargetOutcome[]): Promise<void>;
  abstract publishMergeReport(report: MergeReport): Promise<void>;

  protected ensureConfigured(name: string, ready: boolean): void {
    if (!ready) {
      throw new Error(`${name} sink is not configured`);
    }
  }
}
