import { config as loadEnv } from "dotenv";
import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";

loadEnv();

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type ClusteringMode = "online" | "batch";
export type QueuePolicy = "block" | "reject";

interface NumberOptions {
  readonly min?: number;
  readonly max?: number;
  readonly integer?: boolean;
}

const DEFAULT_RULES_PATH = fileURLToPath(new URL("../../config/recommendation-rules.json", import.meta.url));

const DEFAULTS = {
  CONFIDENCE_THRESHOLD: 0.55,
  SIMILARITY_THRESHOLD: 0.6,
  ESCALATION_THRESHOLD_PCT: 15,
  NOTABLE_TOP_K: 3,
  CLUSTERING_MODE: "batch" as ClusteringMode,
  PARTIAL_REPORT: false,
  QUEUE_CAPACITY: 100,
  QUEUE_POLICY: "block" as QueuePolicy,
  CLASSIFIER_CONCURRENCY: 4,
  CLASSIFIER_MAX_ATTEMPTS: 3,
  RETRY_BACKOFF_BASE: 0.5,
  LOOKBACK_HOURS: 48,
  RUN_TTL_SECONDS: 24 * 60 * 60,
  HTTP_PORT: 9000,
  PROMETHEUS_PORT: 9001,
  LOG_LEVEL: "info" as LogLevel,
  NODE_ENV: "development",
};

const warnings: string[] = [];

function warn(message: string): void {
  warnings.push(message);
}

function readString(key: string, fallback: string): string {
  const raw = process.env[key];
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }
  return raw.trim();
}

function readOptionalUrl(key: string): string | undefined {
  const raw = process.env[key];
  if (!raw || raw.trim().length === 0) {
    return undefined;
  }
  try {
    // eslint-disable-next-line no-new
    new URL(raw);
    return raw;
  } catch {
    warn(`${key} is invalid (${raw}); ignoring it.`);
    return undefined;
  }
}

function readNumber(key: string, fallback: number, options: NumberOptions = {}): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    warn(`${key} must be numeric; received "${raw}". Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.integer && !Number.isInteger(value)) {
    warn(`${key} must be an integer; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.min !== undefined && value < options.min) {
    warn(`${key} must be >= ${options.min}; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.max !== undefined && value > options.max) {
    warn(`${key} must be <= ${options.max}; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  return value;
}

function readBoolean(key: string, fallback: boolean): boolean {
  const raw = process.env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  warn(`${key} must be a boolean; received "${raw}". Falling back to ${fallback}.`);
  return fallback;
}

function readEnum<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    warn(`${key} must be one of ${allowed.join(", ")}; received "${raw}". Falling back to ${fallback}.`);
    return fallback;
  }
  return match;
}

const orchestratorId = (() => {
  const raw = process.env.ORCHESTRATOR_ID;
  if (!raw) {
    return `orchestrator-${randomUUID().slice(0, 8)}`;
  }
  return raw;
})();

export interface OrchestratorConfig {
  readonly ORCHESTRATOR_ID: string;
  readonly CONFIDENCE_THRESHOLD: number;
  readonly SIMILARITY_THRESHOLD: number;
  readonly ESCALATION_THRESHOLD_PCT: number;
  readonly NOTABLE_TOP_K: number;
  readonly CLUSTERING_MODE: ClusteringMode;
  readonly PARTIAL_REPORT: boolean;
  readonly QUEUE_CAPACITY: number;
  readonly QUEUE_POLICY: QueuePolicy;
  readonly CLASSIFIER_CONCURRENCY: number;
  readonly CLASSIFIER_MAX_ATTEMPTS: number;
  readonly RETRY_BACKOFF_BASE: number;
  readonly CLASSIFIER_URL?: string;
  readonly MODEL_VERSION?: string;
  readonly RECOMMENDATION_RULES_PATH: string;
  readonly LOOKBACK_HOURS: number;
  readonly REDIS_URL?: string;
  readonly RUN_TTL_SECONDS: number;
  readonly HTTP_PORT: number;
  readonly PROMETHEUS_PORT: number;
  readonly LOG_LEVEL: LogLevel;
  readonly NODE_ENV: string;
  readonly warnings: readonly string[];
}

export const config: OrchestratorConfig = {
  ORCHESTRATOR_ID: orchestratorId,
  CONFIDENCE_THRESHOLD: readNumber("CONFIDENCE_THRESHOLD", DEFAULTS.CONFIDENCE_THRESHOLD, { min: 0, max: 1 }),
  SIMILARITY_THRESHOLD: readNumber("SIMILARITY_THRESHOLD", DEFAULTS.SIMILARITY_THRESHOLD, { min: 0, max: 1 }),
  ESCALATION_THRESHOLD_PCT: readNumber("ESCALATION_THRESHOLD_PCT", DEFAULTS.ESCALATION_THRESHOLD_PCT, {
    integer: true,
    min: 0,
    max: 100,
  }),
  NOTABLE_TOP_K: readNumber("NOTABLE_TOP_K", DEFAULTS.NOTABLE_TOP_K, { integer: true, min: 0 }),
  CLUSTERING_MODE: readEnum("CLUSTERING_MODE", ["online", "batch"], DEFAULTS.CLUSTERING_MODE),
  PARTIAL_REPORT: readBoolean("PARTIAL_REPORT", DEFAULTS.PARTIAL_REPORT),
  QUEUE_CAPACITY: readNumber("QUEUE_CAPACITY", DEFAULTS.QUEUE_CAPACITY, { integer: true, min: 1 }),
  QUEUE_POLICY: readEnum("QUEUE_POLICY", ["block", "reject"], DEFAULTS.QUEUE_POLICY),
  CLASSIFIER_CONCURRENCY: readNumber("CLASSIFIER_CONCURRENCY", DEFAULTS.CLASSIFIER_CONCURRENCY, {
    integer: true,
    min: 1,
  }),
  CLASSIFIER_MAX_ATTEMPTS: readNumber("CLASSIFIER_MAX_ATTEMPTS", DEFAULTS.CLASSIFIER_MAX_ATTEMPTS, {
    integer: true,
    min: 1,
  }),
  RETRY_BACKOFF_BASE: readNumber("RETRY_BACKOFF_BASE", DEFAULTS.RETRY_BACKOFF_BASE, { min: 0 }),
  CLASSIFIER_URL: readOptionalUrl("CLASSIFIER_URL"),
  MODEL_VERSION: process.env.MODEL_VERSION?.trim() || undefined,
  RECOMMENDATION_RULES_PATH: readString("RECOMMENDATION_RULES_PATH", DEFAULT_RULES_PATH),
  LOOKBACK_HOURS: readNumber("LOOKBACK_HOURS", DEFAULTS.LOOKBACK_HOURS, { min: 1 }),
  REDIS_URL: readOptionalUrl("REDIS_URL"),
  RUN_TTL_SECONDS: readNumber("RUN_TTL_SECONDS", DEFAULTS.RUN_TTL_SECONDS, { integer: true, min: 60 }),
  HTTP_PORT: readNumber("HTTP_PORT", DEFAULTS.HTTP_PORT, { integer: true, min: 1 }),
  PROMETHEUS_PORT: readNumber("PROMETHEUS_PORT", DEFAULTS.PROMETHEUS_PORT, { integer: true, min: 1 }),
  LOG_LEVEL: readEnum("LOG_LEVEL", ["fatal", "error", "warn", "info", "debug", "trace", "silent"], DEFAULTS.LOG_LEVEL),
  NODE_ENV: readString("NODE_ENV", DEFAULTS.NODE_ENV),
  warnings,
};

export interface PipelineOptions {
  confidenceThreshold: number;
  similarityThreshold: number;
  escalationThresholdPct: number;
  notableTopK: number;
  clusteringMode: ClusteringMode;
  partialReport: boolean;
  queueCapacity: number;
  queuePolicy: QueuePolicy;
  classifierConcurrency: number;
  maxAttempts: number;
  retryBaseDelaySeconds: number;
}

export function resolvePipelineOptions(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    confidenceThreshold: config.CONFIDENCE_THRESHOLD,
    similarityThreshold: config.SIMILARITY_THRESHOLD,
    escalationThresholdPct: config.ESCALATION_THRESHOLD_PCT,
    notableTopK: config.NOTABLE_TOP_K,
    clusteringMode: config.CLUSTERING_MODE,
    partialReport: config.PARTIAL_REPORT,
    queueCapacity: config.QUEUE_CAPACITY,
    queuePolicy: config.QUEUE_POLICY,
    classifierConcurrency: config.CLASSIFIER_CONCURRENCY,
    maxAttempts: config.CLASSIFIER_MAX_ATTEMPTS,
    retryBaseDelaySeconds: config.RETRY_BACKOFF_BASE,
    ...overrides,
  };
}
