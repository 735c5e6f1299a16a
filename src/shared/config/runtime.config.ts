import { defaultSyncConfig, type NotifyOn, type SyncConfig } from "../../application/sync-run/sync.config";
import { isSchemaType, type SyncTarget } from "../../core/chunks/chunk.types";
import { ConfigError } from "../../core/errors/syncErrors";
import type { BackoffStrategy } from "../retry/retry";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 300_000 }
} as const;

/** Every tunable except the two identity settings, which come from `loadEnv`. */
export type RuntimeSyncSettings = Omit<SyncConfig, "sourceBucket" | "roleArn">;

export type RuntimeConfig = {
  sync: RuntimeSyncSettings;
  targets: SyncTarget[];
  timeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigError(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`, { field: name });
  }

  return value;
};

const parseBackoff = (raw: string | undefined): BackoffStrategy | undefined => {
  const value = raw?.trim().toLowerCase();
  if (!value) return undefined;
  if (value === "linear" || value === "exponential") return value;
  throw new ConfigError(`SYNC_BACKOFF must be linear or exponential. Received: ${raw}`, { field: "SYNC_BACKOFF" });
};

const parseNotifyOn = (raw: string | undefined): NotifyOn | undefined => {
  const value = raw?.trim().toLowerCase();
  if (!value) return undefined;
  if (value === "failure" || value === "always") return value;
  throw new ConfigError(`SYNC_NOTIFY_ON must be failure or always. Received: ${raw}`, { field: "SYNC_NOTIFY_ON" });
};

/**
 * One `endpoint|SCHEMA|bucket` entry, e.g. `movement/job/pings|FULL|mobility-data`.
 */
export const parseSyncTarget = (entry: string): SyncTarget => {
  const parts = entry.split("|").map((part) => part.trim());
  const [endpoint, schema, bucket] = parts;
  if (parts.length !== 3 || !endpoint || !schema || !bucket) {
    throw new ConfigError(`Sync target must look like endpoint|SCHEMA|bucket. Received: ${entry}`, { field: "SYNC_TARGETS" });
  }
  const normalizedSchema = schema.toUpperCase();
  if (!isSchemaType(normalizedSchema)) {
    throw new ConfigError(`Unknown schema type ${schema} in sync target ${entry}`, { field: "SYNC_TARGETS" });
  }
  return { endpoint: endpoint.replace(/^\/+|\/+$/g, ""), schema: normalizedSchema, bucket };
};

export const parseSyncTargets = (raw: string | undefined): SyncTarget[] =>
  (raw ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "")
    .map(parseSyncTarget);

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const sync: RuntimeSyncSettings = {
    ...defaultSyncConfig,
    concurrency: parseOptionalIntInRange(env, "SYNC_CONCURRENCY", { min: 1, max: 50 }) ?? defaultSyncConfig.concurrency,
    maxAttempts: parseOptionalIntInRange(env, "SYNC_MAX_ATTEMPTS", { min: 1, max: 10 }) ?? defaultSyncConfig.maxAttempts,
    pollIntervalMs:
      parseOptionalIntInRange(env, "SYNC_POLL_INTERVAL_MS", { min: 1, max: 3_600_000 }) ?? defaultSyncConfig.pollIntervalMs,
    maxPolls: parseOptionalIntInRange(env, "SYNC_MAX_POLLS", { min: 1, max: 10_000 }) ?? defaultSyncConfig.maxPolls,
    maxAoisPerChunk:
      parseOptionalIntInRange(env, "SYNC_MAX_AOIS_PER_CHUNK", { min: 1, max: 200 }) ?? defaultSyncConfig.maxAoisPerChunk,
    maxDaysPerChunk:
      parseOptionalIntInRange(env, "SYNC_MAX_DAYS_PER_CHUNK", { min: 1, max: 31 }) ?? defaultSyncConfig.maxDaysPerChunk,
    transferConcurrency:
      parseOptionalIntInRange(env, "TRANSFER_CONCURRENCY", { min: 1, max: 64 }) ?? defaultSyncConfig.transferConcurrency,
    credentialRefreshMarginMs:
      parseOptionalIntInRange(env, "CREDENTIAL_REFRESH_MARGIN_MS", { min: 0, max: 3_600_000 }) ??
      defaultSyncConfig.credentialRefreshMarginMs,
    backoff: parseBackoff(env.SYNC_BACKOFF) ?? defaultSyncConfig.backoff,
    notifyOn: parseNotifyOn(env.SYNC_NOTIFY_ON) ?? defaultSyncConfig.notifyOn
  };

  const timeoutMs =
    parseOptionalIntInRange(env, "VENDOR_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 30_000;

  return { sync, targets: parseSyncTargets(env.SYNC_TARGETS), timeoutMs };
};
