import { ConfigError } from "../../core/errors/syncErrors";
import { VENDOR_MAX_AOIS_PER_JOB, VENDOR_MAX_DAYS_PER_JOB } from "../../core/partition/partitionRequests";
import type { BackoffStrategy } from "../../shared/retry/retry";

export type NotifyOn = "failure" | "always";

export type SyncConfig = {
  concurrency: number;
  maxAttempts: number;
  backoff: BackoffStrategy;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  pollIntervalMs: number;
  maxPolls: number;
  maxConsecutivePollErrors: number;
  maxAoisPerChunk: number;
  maxDaysPerChunk: number;
  transferConcurrency: number;
  contentSuffix: string;
  sourceBucket: string;
  roleArn: string;
  roleSessionName: string;
  credentialRefreshMarginMs: number;
  credentialDurationSeconds: number;
  notifyOn: NotifyOn;
};

export type SyncConfigInput = Partial<SyncConfig> & Pick<SyncConfig, "sourceBucket" | "roleArn">;

export const defaultSyncConfig: Omit<SyncConfig, "sourceBucket" | "roleArn"> = {
  concurrency: 4,
  maxAttempts: 3,
  backoff: "exponential",
  retryBaseDelayMs: 30_000,
  retryMaxDelayMs: 600_000,
  pollIntervalMs: 60_000,
  maxPolls: 100,
  maxConsecutivePollErrors: 5,
  maxAoisPerChunk: VENDOR_MAX_AOIS_PER_JOB,
  maxDaysPerChunk: VENDOR_MAX_DAYS_PER_JOB,
  transferConcurrency: 8,
  contentSuffix: ".parquet",
  roleSessionName: "geofence-sync-session",
  credentialRefreshMarginMs: 5 * 60_000,
  credentialDurationSeconds: 3600,
  notifyOn: "failure"
};

type CappedField =
  | "concurrency"
  | "maxAttempts"
  | "retryBaseDelayMs"
  | "retryMaxDelayMs"
  | "pollIntervalMs"
  | "maxPolls"
  | "maxConsecutivePollErrors"
  | "maxAoisPerChunk"
  | "maxDaysPerChunk"
  | "transferConcurrency"
  | "credentialRefreshMarginMs"
  | "credentialDurationSeconds";

const cappedFields: readonly CappedField[] = [
  "concurrency",
  "maxAttempts",
  "retryBaseDelayMs",
  "retryMaxDelayMs",
  "pollIntervalMs",
  "maxPolls",
  "maxConsecutivePollErrors",
  "maxAoisPerChunk",
  "maxDaysPerChunk",
  "transferConcurrency",
  "credentialRefreshMarginMs",
  "credentialDurationSeconds"
];

export const syncCaps: Readonly<Record<CappedField, { min: number; max: number }>> = {
  concurrency: { min: 1, max: 50 },
  maxAttempts: { min: 1, max: 10 },
  retryBaseDelayMs: { min: 0, max: 3_600_000 },
  retryMaxDelayMs: { min: 0, max: 3_600_000 },
  pollIntervalMs: { min: 1, max: 3_600_000 },
  maxPolls: { min: 1, max: 10_000 },
  maxConsecutivePollErrors: { min: 1, max: 100 },
  maxAoisPerChunk: { min: 1, max: VENDOR_MAX_AOIS_PER_JOB },
  maxDaysPerChunk: { min: 1, max: VENDOR_MAX_DAYS_PER_JOB },
  transferConcurrency: { min: 1, max: 64 },
  credentialRefreshMarginMs: { min: 0, max: 3_600_000 },
  credentialDurationSeconds: { min: 900, max: 43_200 }
};

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`, { field: name });
  }
};

const assertNonEmpty = (name: string, value: string) => {
  if (value.trim() === "") {
    throw new ConfigError(`${name} must not be empty`, { field: name });
  }
};

export const validateSyncConfig = (config: SyncConfig): SyncConfig => {
  for (const name of cappedFields) {
    assertIntegerInRange(name, config[name], syncCaps[name].min, syncCaps[name].max);
  }
  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    throw new ConfigError(
      `retryMaxDelayMs=${config.retryMaxDelayMs} must be >= retryBaseDelayMs=${config.retryBaseDelayMs}`,
      { field: "retryMaxDelayMs" }
    );
  }
  if (config.backoff !== "linear" && config.backoff !== "exponential") {
    throw new ConfigError(`backoff must be linear or exponential. Received: ${String(config.backoff)}`, { field: "backoff" });
  }
  if (config.notifyOn !== "failure" && config.notifyOn !== "always") {
    throw new ConfigError(`notifyOn must be failure or always. Received: ${String(config.notifyOn)}`, { field: "notifyOn" });
  }
  assertNonEmpty("sourceBucket", config.sourceBucket);
  assertNonEmpty("roleArn", config.roleArn);
  assertNonEmpty("roleSessionName", config.roleSessionName);
  assertNonEmpty("contentSuffix", config.contentSuffix);
  return config;
};

export const resolveSyncConfig = (input: SyncConfigInput): SyncConfig =>
  validateSyncConfig({
    ...defaultSyncConfig,
    ...input,
    sourceBucket: input.sourceBucket.trim(),
    roleArn: input.roleArn.trim()
  });
