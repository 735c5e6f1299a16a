import type { Aoi } from "../../core/aoi/aoi.types";
import { chunkFingerprint, type Chunk, type ChunkProgress, type DateRange, type SyncTarget } from "../../core/chunks/chunk.types";
import { partitionRequests } from "../../core/partition/partitionRequests";
import type { ChunkProgressRepository } from "../../ports/ChunkProgressRepository";
import type { NotificationSink } from "../../ports/NotificationSink";
import type { ObjectStore, SourceStoreFactory } from "../../ports/ObjectStore";
import type { VendorJobApi } from "../../ports/VendorJobApi";
import { createLimiter } from "../../shared/concurrency/limiter";
import { errorMessage, logError, logInfo, logWarn } from "../../shared/logging/log";
import { daysInclusive } from "../../shared/time/calendarDate";
import type { Clock } from "../../shared/time/clock";
import { processChunk } from "../sync-chunk/processChunk";
import type { CredentialSource } from "../transfer/transferExecutor";
import type { SyncConfig, SyncConfigInput } from "./sync.config";
import { resolveSyncConfig } from "./sync.config";
import { classifyChunkFailure, createRunSummaryTracker, type RunSummary } from "./sync.error-handler";

export type SyncRunDeps = {
  api: VendorJobApi;
  clock: Clock;
  credentials: CredentialSource;
  openSourceStore: SourceStoreFactory;
  destinationStore: ObjectStore;
  progress: ChunkProgressRepository;
  notifier?: NotificationSink;
};

export type SyncRunInput = {
  runId: string;
  aois: readonly Aoi[];
  range: DateRange;
  targets: readonly SyncTarget[];
  config: SyncConfigInput;
};

export type SyncPlan = {
  chunks: Chunk[];
  aois: number;
  days: number;
};

/** Partitions the run without contacting anything; used for dry runs too. */
export const planSync = (
  input: Pick<SyncRunInput, "aois" | "range" | "targets">,
  limits: Pick<SyncConfig, "maxAoisPerChunk" | "maxDaysPerChunk">
): SyncPlan => {
  const chunks = partitionRequests({
    aois: input.aois,
    range: input.range,
    targets: input.targets,
    limits: { maxAoisPerChunk: limits.maxAoisPerChunk, maxDaysPerChunk: limits.maxDaysPerChunk }
  });
  return { chunks, aois: input.aois.length, days: daysInclusive(input.range.from, input.range.to) };
};

const shouldNotify = (summary: RunSummary, config: SyncConfig) =>
  config.notifyOn === "always" || summary.status !== "SUCCESS";

/**
 * Runs every chunk of the plan to a terminal outcome with bounded concurrency.
 *
 * Chunks already SUCCEEDED under the same run id are skipped when they still
 * hold the same AOIs and window; a chunk key whose contents changed runs
 * again. A configuration error from any chunk stops dispatch: chunks in
 * flight finish, the rest are reported as not started.
 */
export const runSync = async (deps: SyncRunDeps, input: SyncRunInput): Promise<RunSummary> => {
  const config = resolveSyncConfig(input.config);
  const startedAt = new Date(deps.clock.now());
  const { chunks } = planSync(input, config);

  const previous = await deps.progress.listByRun(input.runId);
  const recorded = new Map<string, ChunkProgress>(previous.map((p) => [p.chunkKey, p]));

  const tracker = createRunSummaryTracker(input.runId, chunks.length, startedAt);
  const priorByKey = new Map<string, ChunkProgress>();
  const pending: Chunk[] = [];
  for (const chunk of chunks) {
    const prior = recorded.get(chunk.key);
    if (prior && prior.fingerprint !== chunkFingerprint(chunk)) {
      // same position in the plan, different AOIs or window
      logWarn("chunk.replanned", { runId: input.runId, chunkKey: chunk.key, outcome: prior.outcome });
      pending.push(chunk);
      continue;
    }
    if (prior) priorByKey.set(chunk.key, prior);
    if (prior?.outcome === "SUCCEEDED") {
      tracker.addResumed(chunk.key);
    } else {
      pending.push(chunk);
    }
  }

  logInfo("run.started", {
    runId: input.runId,
    from: input.range.from,
    to: input.range.to,
    chunks: chunks.length,
    resumed: chunks.length - pending.length,
    concurrency: config.concurrency
  });

  const limit = createLimiter(config.concurrency);
  const chunkDeps = {
    api: deps.api,
    clock: deps.clock,
    progress: deps.progress,
    transfer: {
      credentials: deps.credentials,
      openSourceStore: deps.openSourceStore,
      destinationStore: deps.destinationStore
    }
  };

  const settled = await Promise.allSettled(
    pending.map((chunk) =>
      limit(async () => {
        if (tracker.isAborted()) {
          tracker.addNotStarted(chunk.key);
          return;
        }

        const result = await processChunk(chunkDeps, chunk, input.runId, config, priorByKey.get(chunk.key));
        if (result.outcome === "SUCCEEDED") {
          tracker.addSucceeded(chunk.key, result.transfer);
          return;
        }

        tracker.addFailed({
          chunkKey: chunk.key,
          code: result.failure.code,
          message: result.failure.message,
          attempts: result.attempts
        });
        if (result.failure.abortRun) {
          logError("run.aborting", { runId: input.runId, chunkKey: chunk.key, reason: result.failure.message });
          tracker.abort(result.failure.message);
        }
      })
    )
  );

  // processChunk only rejects when the progress store itself fails.
  settled.forEach((outcome, index) => {
    if (outcome.status === "fulfilled") return;
    const chunk = pending[index];
    const decision = classifyChunkFailure(outcome.reason);
    tracker.addFailed({ chunkKey: chunk.key, code: decision.code, message: decision.message, attempts: 0 });
  });

  const summary = tracker.summary(new Date(deps.clock.now()));
  const log = summary.status === "SUCCESS" ? logInfo : logError;
  log("run.completed", {
    runId: summary.runId,
    status: summary.status,
    totalChunks: summary.totalChunks,
    succeeded: summary.succeeded.length,
    resumed: summary.resumed.length,
    failed: summary.failed.length,
    notStarted: summary.notStarted.length,
    copied: summary.transfer.copied,
    skipped: summary.transfer.skipped,
    bytesCopied: summary.transfer.bytesCopied
  });

  if (deps.notifier && shouldNotify(summary, config)) {
    try {
      await deps.notifier.notify(summary);
    } catch (err) {
      // The run outcome stands; a lost notification is only reported.
      logError("run.notify_failed", { runId: summary.runId, reason: errorMessage(err) });
    }
  }

  return summary;
};
