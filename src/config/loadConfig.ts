import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { LogLevel } from "../observability/types";
import {
  AppConfig,
  ConfigOverrides,
  CorruptStagedPolicy,
  DuplicateDocumentPolicy,
  SinkType,
  StoreType,
} from "./types";

const DEFAULT_CONFIG: AppConfig = {
  targetsPath: "data/crawl_targets.json",
  criteriaPath: "data/monitoring_targets.json",
  masterPath: "data/race-results.csv",
  storeType: "json",
  storePath: "data/targets.sqlite",
  userAgent: "race-results-harvester/1.0",
  ignoreHttpsErrors: false,
  downloadTimeoutMs: 60_000,
  extractTimeoutMs: 180_000,
  extractionModel: "gpt-4o-mini",
  openaiApiKey: undefined,
  duplicateDocumentPolicy: "mark_processed",
  corruptStagedPolicy: "leave",
  mergeLockStaleMs: 6 * 60 * 60 * 1000,
  sinkType: "local_jsonl",
  httpSinkEndpoint: undefined,
  httpSinkToken: undefined,
  logLevel: "info",
  calendarUrlTemplate: "https://example.org/results/{eventNo}.pdf",
  targetIdPrefix: "race-",
  outputDirs: {
    staging: "data/staging",
    quarantine: "data/quarantine",
    manifests: "data/manifests",
  },
};

const STORE_TYPES = ["json", "sqlite"] as const;
const DUPLICATE_POLICIES = ["mark_processed", "leave_queued"] as const;
const CORRUPT_POLICIES = ["leave", "quarantine"] as const;
const SINK_TYPES = ["local_jsonl", "http", "none"] as const;
const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const configFileSchema = z.object({
  targetsPath: z.string().min(1).optional(),
  criteriaPath: z.string().min(1).optional(),
  masterPath: z.string().min(1).optional(),
  storeType: z.enum(STORE_TYPES).optional(),
  storePath: z.string().min(1).optional(),
  userAgent: z.string().optional(),
  ignoreHttpsErrors: z.boolean().optional(),
  downloadTimeoutMs: z.number().int().positive().optional(),
  extractTimeoutMs: z.number().int().positive().optional(),
  extractionModel: z.string().min(1).optional(),
  openaiApiKey: z.string().optional(),
  duplicateDocumentPolicy: z.enum(DUPLICATE_POLICIES).optional(),
  corruptStagedPolicy: z.enum(CORRUPT_POLICIES).optional(),
  mergeLockStaleMs: z.number().int().positive().optional(),
  sinkType: z.enum(SINK_TYPES).optional(),
  httpSinkEndpoint: z.string().optional(),
  httpSinkToken: z.string().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  calendarUrlTemplate: z.string().min(1).optional(),
  targetIdPrefix: z.string().optional(),
  outputDirs: z
    .object({
      staging: z.string().min(1).optional(),
      quarantine: z.string().min(1).optional(),
      manifests: z.string().min(1).optional(),
    })
    .optional(),
});

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = configFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid config file ${absolutePath}: ${issue.path.join(".")} ${issue.message}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toChoice<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  const match = choices.find((choice) => choice === value);
  return match ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    targetsPath: env.TARGETS_PATH ?? merged.targetsPath,
    criteriaPath: env.CRITERIA_PATH ?? merged.criteriaPath,
    masterPath: env.MASTER_PATH ?? merged.masterPath,
    storeType: toChoice<StoreType>(env.STORE_TYPE, STORE_TYPES, merged.storeType),
    storePath: env.STORE_PATH ?? merged.storePath,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    extractTimeoutMs: toInt(env.EXTRACT_TIMEOUT_MS, merged.extractTimeoutMs),
    extractionModel: env.EXTRACTION_MODEL ?? merged.extractionModel,
    openaiApiKey: env.OPENAI_API_KEY ?? merged.openaiApiKey,
    duplicateDocumentPolicy: toChoice<DuplicateDocumentPolicy>(
      env.DUPLICATE_DOCUMENT_POLICY,
      DUPLICATE_POLICIES,
      merged.duplicateDocumentPolicy,
    ),
    corruptStagedPolicy: toChoice<CorruptStagedPolicy>(env.CORRUPT_STAGED_POLICY, CORRUPT_POLICIES, merged.corruptStagedPolicy),
    mergeLockStaleMs: toInt(env.MERGE_LOCK_STALE_MS, merged.mergeLockStaleMs),
    sinkType: toChoice<SinkType>(env.SINK_TYPE, SINK_TYPES, merged.sinkType),
    httpSinkEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.httpSinkEndpoint,
    httpSinkToken: env.HTTP_SINK_TOKEN ?? merged.httpSinkToken,
    logLevel: toChoice<LogLevel>(env.LOG_LEVEL, LOG_LEVELS, merged.logLevel),
    outputDirs: {
      staging: env.STAGING_DIR ?? merged.outputDirs.staging,
      quarantine: env.QUARANTINE_DIR ?? merged.outputDirs.quarantine,
      manifests: env.MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  };
}

export { DEFAULT_CONFIG };
