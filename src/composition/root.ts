import type { MongoClient } from "mongodb";
import { buildCoverageReport, type CoverageReport } from "../application/coverage/coverageReport";
import { fillCoverageGaps, type GapFillSummary } from "../application/coverage/gapFill";
import { CredentialBroker } from "../application/credentials/credentialBroker";
import type { RunSummary } from "../application/sync-run/sync.error-handler";
import type { SyncConfigInput } from "../application/sync-run/sync.config";
import { planSync, runSync, type SyncPlan, type SyncRunDeps } from "../application/sync-run/syncRun.usecase";
import type { Aoi } from "../core/aoi/aoi.types";
import type { DateRange, SyncTarget } from "../core/chunks/chunk.types";
import { ConfigError } from "../core/errors/syncErrors";
import { createS3ObjectStore, s3SourceStoreFactory } from "../infrastructure/aws/S3ObjectStore";
import { createSnsNotificationSink } from "../infrastructure/aws/SnsNotificationSink";
import { createStsRoleAssumer } from "../infrastructure/aws/StsRoleAssumer";
import { FileAoiRegistry } from "../infrastructure/file/FileAoiRegistry";
import { FileChunkProgressRepository } from "../infrastructure/file/FileChunkProgressRepository";
import { MongoAoiRegistry } from "../infrastructure/mongo/MongoAoiRegistry";
import { MongoChunkProgressRepository } from "../infrastructure/mongo/MongoChunkProgressRepository";
import { createMongoClient } from "../infrastructure/mongo/MongoClientFactory";
import { LogNotificationSink } from "../infrastructure/notifications/LogNotificationSink";
import { VendorHttpJobApi } from "../infrastructure/vendor/VendorHttpJobApi";
import { loadEnv, requireSetting, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";
import { systemClock } from "../shared/time/clock";

export type SyncCommand = {
  range: DateRange;
  runId: string;
  targets?: SyncTarget[]; // overrides SYNC_TARGETS when non-empty
};

export type CoverageCommand = {
  range: DateRange;
  targets?: SyncTarget[];
};

const resolveTargets = (override: SyncTarget[] | undefined, runtime: RuntimeConfig): SyncTarget[] => {
  const targets = override && override.length > 0 ? override : runtime.targets;
  if (targets.length === 0) {
    throw new ConfigError("No sync targets: set SYNC_TARGETS or pass --target", { field: "SYNC_TARGETS" });
  }
  return targets;
};

/** Opens Mongo only when one of the stores lives there, and always closes it. */
const withMongo = async <T>(env: Env, fn: (mongo: MongoClient | undefined) => Promise<T>): Promise<T> => {
  const needsMongo = env.AOI_SOURCE === "mongo" || env.PROGRESS_STORE === "mongo";
  const mongo = needsMongo ? createMongoClient(env.MONGO_URI) : undefined;
  try {
    return await fn(mongo);
  } finally {
    await mongo?.close();
  }
};

const loadAois = (env: Env, mongo: MongoClient | undefined): Promise<Aoi[]> => {
  const registry = env.AOI_SOURCE === "mongo" && mongo ? new MongoAoiRegistry(mongo) : new FileAoiRegistry(env.AOI_FILE);
  return registry.loadSnapshot();
};

export const planSyncFromEnv = async (command: Omit<SyncCommand, "runId">): Promise<SyncPlan> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const targets = resolveTargets(command.targets, runtime);

  return withMongo(env, async (mongo) => {
    const aois = await loadAois(env, mongo);
    return planSync({ aois, range: command.range, targets }, runtime.sync);
  });
};

type SyncContext = {
  deps: SyncRunDeps;
  aois: Aoi[];
  config: SyncConfigInput;
};

/**
 * Builds every adapter a sync run needs from the environment. Vendor settings
 * are checked before anything is opened.
 */
const withSyncContext = async <T>(
  env: Env,
  runtime: RuntimeConfig,
  fn: (context: SyncContext) => Promise<T>
): Promise<T> => {
  const sourceBucket = requireSetting(env, "VENDOR_SOURCE_BUCKET");
  const roleArn = requireSetting(env, "VENDOR_ROLE_ARN");

  const api = new VendorHttpJobApi({
    baseUrl: requireSetting(env, "VENDOR_BASE_URL"),
    apiKey: requireSetting(env, "VENDOR_API_KEY"),
    timeoutMs: runtime.timeoutMs
  });
  const credentials = new CredentialBroker(createStsRoleAssumer(env.AWS_REGION), {
    roleArn,
    sessionName: runtime.sync.roleSessionName,
    durationSeconds: runtime.sync.credentialDurationSeconds,
    refreshMarginMs: runtime.sync.credentialRefreshMarginMs
  });
  const notifier = env.SNS_TOPIC_ARN
    ? createSnsNotificationSink(env.AWS_REGION, env.SNS_TOPIC_ARN)
    : new LogNotificationSink();

  return withMongo(env, async (mongo) => {
    const aois = await loadAois(env, mongo);
    const progress =
      env.PROGRESS_STORE === "mongo" && mongo
        ? new MongoChunkProgressRepository(mongo)
        : new FileChunkProgressRepository(env.PROGRESS_DIR);

    return fn({
      deps: {
        api,
        clock: systemClock,
        credentials,
        openSourceStore: s3SourceStoreFactory(env.AWS_REGION),
        destinationStore: createS3ObjectStore(env.AWS_REGION),
        progress,
        notifier
      },
      aois,
      config: { ...runtime.sync, sourceBucket, roleArn }
    });
  });
};

export const runSyncFromEnv = async (command: SyncCommand): Promise<RunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const targets = resolveTargets(command.targets, runtime);

  return withSyncContext(env, runtime, ({ deps, aois, config }) =>
    runSync(deps, { runId: command.runId, aois, range: command.range, targets, config })
  );
};

export const runCoverageFromEnv = async (command: CoverageCommand): Promise<CoverageReport> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const targets = resolveTargets(command.targets, runtime);

  return withMongo(env, async (mongo) => {
    const aois = await loadAois(env, mongo);
    return buildCoverageReport({
      aois,
      range: command.range,
      targets,
      store: createS3ObjectStore(env.AWS_REGION),
      concurrency: runtime.sync.transferConcurrency
    });
  });
};

/** Reports coverage, then syncs exactly the missing ranges it found. */
export const fillCoverageGapsFromEnv = async (
  command: CoverageCommand
): Promise<{ report: CoverageReport; fill: GapFillSummary }> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const targets = resolveTargets(command.targets, runtime);

  return withSyncContext(env, runtime, async ({ deps, aois, config }) => {
    const report = await buildCoverageReport({
      aois,
      range: command.range,
      targets,
      store: deps.destinationStore,
      concurrency: runtime.sync.transferConcurrency
    });
    const fill = await fillCoverageGaps(deps, { report, aois, targets, config });
    return { report, fill };
  });
};
