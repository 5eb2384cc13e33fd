export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  targetId?: string;
  url?: string;
  attempt?: number;
  file?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "targets_selected"
  | "targets_skipped"
  | "extracts_ok"
  | "extracts_failed"
  | "documents_duplicate"
  | "records_merged"
  | "records_duplicate"
  | "staged_files_quarantined";

export type MetricTimerName = "fetch_ms" | "extract_ms" | "merge_ms";
