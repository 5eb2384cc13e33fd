import { LogLevel } from "../observability/types";

export interface OutputDirs {
  staging: string;
  quarantine: string;
  manifests: string;
}

export type StoreType = "json" | "sqlite";

/** What happens to a target whose document is byte-identical to one already extracted. */
export type DuplicateDocumentPolicy = "mark_processed" | "leave_queued";

/** What the merge does with a staged file it cannot parse. */
export type CorruptStagedPolicy = "leave" | "quarantine";

export type SinkType = "local_jsonl" | "http" | "none";

export interface AppConfig {
  targetsPath: string;
  criteriaPath: string;
  masterPath: string;
  storeType: StoreType;
  storePath: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  downloadTimeoutMs: number;
  extractTimeoutMs: number;
  extractionModel: string;
  openaiApiKey?: string;
  duplicateDocumentPolicy: DuplicateDocumentPolicy;
  corruptStagedPolicy: CorruptStagedPolicy;
  mergeLockStaleMs: number;
  sinkType: SinkType;
  httpSinkEndpoint?: string;
  httpSinkToken?: string;
  logLevel: LogLevel;
  calendarUrlTemplate: string;
  targetIdPrefix: string;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};
