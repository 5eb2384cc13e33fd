export type TargetStatus = "queued" | "processing" | "processed" | "failed";

export const TARGET_STATUSES: readonly TargetStatus[] = ["queued", "processing", "processed", "failed"];

export interface CrawlWindow {
  validFrom: string | null;
  validUntil: string | null;
}

export interface TargetTracking {
  createdAt: string;
  updatedAt: string;
  lastAttemptAt: string | null;
  succeededAt: string | null;
  attemptCount: number;
}

export interface RaceEventDates {
  startDate: string;
  endDate: string;
}

export interface CrawlTarget {
  id: string;
  locator: string;
  status: TargetStatus;
  window: CrawlWindow;
  tracking: TargetTracking;
  event?: RaceEventDates;
  /** sha256 of the document whose extraction last succeeded. */
  contentHash?: string;
}

export interface MonitoringCriteria {
  readonly groups: readonly string[];
  readonly names: readonly string[];
}

export interface ResultRecord {
  subjectName: string;
  category: string;
  eventName: string;
  discipline: string;
  location: string;
  rank: string;
  date: string;
  sourceLocator: string;
}

export interface StagedResultSet {
  targetId: string;
  locator: string;
  records: ResultRecord[];
}

export type TargetOutcomeKind = "succeeded" | "duplicate" | "failed" | "invalid";

export interface TargetOutcome {
  targetId: string;
  url: string;
  kind: TargetOutcomeKind;
  status: TargetStatus;
  attemptCount: number;
  recordCount?: number;
  duplicateOf?: string;
  error?: string;
  finishedAt: string;
}

export interface MergeReport {
  stagedFiles: number;
  mergedFiles: number;
  stagedRecords: number;
  duplicateRecords: number;
  quarantinedFiles: number;
  skippedFiles: number;
  masterRecords: number;
  mergedAt: string;
}
