import { chunkFingerprint, type Chunk, type ChunkProgress } from "../../core/chunks/chunk.types";
import type { ChunkProgressRepository } from "../../ports/ChunkProgressRepository";
import type { VendorJobApi } from "../../ports/VendorJobApi";
import { logError, logWarn } from "../../shared/logging/log";
import { retry } from "../../shared/retry/retry";
import type { Clock } from "../../shared/time/clock";
import type { SyncConfig } from "../sync-run/sync.config";
import { classifyChunkFailure, type ChunkFailureDecision } from "../sync-run/sync.error-handler";
import { transferChunkOutput, type TransferDeps, type TransferResult } from "../transfer/transferExecutor";
import { runVendorJob } from "./vendorJob.runner";

export type ChunkDeps = {
  api: VendorJobApi;
  clock: Clock;
  progress: ChunkProgressRepository;
  transfer: Omit<TransferDeps, "clock">;
};

export type ChunkResult =
  | { outcome: "SUCCEEDED"; progress: ChunkProgress; transfer: TransferResult; attempts: number }
  | { outcome: "FAILED"; progress: ChunkProgress; failure: ChunkFailureDecision; attempts: number };

/**
 * Runs one chunk to a terminal outcome: submit, poll, transfer, verify, with up
 * to `maxAttempts` attempts. Once the vendor job has succeeded, later attempts
 * only redo the transfer from the same output location.
 *
 * Never rejects for chunk-level failures; the outcome is returned and persisted.
 */
export const processChunk = async (
  deps: ChunkDeps,
  chunk: Chunk,
  runId: string,
  config: SyncConfig,
  prior?: ChunkProgress
): Promise<ChunkResult> => {
  let progress: ChunkProgress = {
    runId,
    chunkKey: chunk.key,
    fingerprint: chunkFingerprint(chunk),
    attempts: prior?.attempts ?? 0,
    lastError: prior?.lastError,
    updatedAt: new Date(deps.clock.now())
  };
  let outputLocation: string | undefined;
  let attempts = 0;

  const save = async (patch: Partial<ChunkProgress>) => {
    progress = { ...progress, ...patch, updatedAt: new Date(deps.clock.now()) };
    await deps.progress.save(progress);
  };

  const attempt = async (attemptNo: number): Promise<TransferResult> => {
    attempts = attemptNo;
    await save({ attempts: progress.attempts + 1 });

    try {
      if (outputLocation == null) {
        const job = await runVendorJob({ api: deps.api, clock: deps.clock }, chunk, config, {
          onSubmitted: (submitted) => save({ jobId: submitted.jobId })
        });
        outputLocation = job.outputLocation;
        await save({ jobId: job.jobId, outputLocation });
      }

      return await transferChunkOutput(
        { ...deps.transfer, clock: deps.clock },
        chunk,
        outputLocation ?? "",
        {
          sourceBucket: config.sourceBucket,
          contentSuffix: config.contentSuffix,
          transferConcurrency: config.transferConcurrency
        }
      );
    } catch (err) {
      const decision = classifyChunkFailure(err);
      await save({ lastError: { code: decision.code, message: decision.message, at: new Date(deps.clock.now()) } });
      throw err;
    }
  };

  try {
    const transfer = await retry(attempt, {
      retries: config.maxAttempts - 1,
      minDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
      backoff: config.backoff,
      sleepFn: (ms) => deps.clock.sleep(ms),
      shouldRetry: (err) => classifyChunkFailure(err).retry,
      onRetry: ({ attempt: attemptNo, maxAttempts, delayMs, error }) => {
        const decision = classifyChunkFailure(error);
        logWarn("chunk.retry", {
          runId,
          chunkKey: chunk.key,
          attempt: attemptNo,
          maxAttempts,
          delayMs,
          code: decision.code,
          reason: decision.message
        });
      }
    });

    await save({ outcome: "SUCCEEDED", transfer: {
      listed: transfer.listed,
      matched: transfer.matched,
      ignored: transfer.ignored,
      copied: transfer.copied,
      skipped: transfer.skipped,
      verified: transfer.verified,
      bytesCopied: transfer.bytesCopied
    } });
    return { outcome: "SUCCEEDED", progress, transfer, attempts };
  } catch (err) {
    const failure = classifyChunkFailure(err);
    logError("chunk.failed", {
      runId,
      chunkKey: chunk.key,
      attempts,
      code: failure.code,
      reason: failure.message
    });
    await save({ outcome: "FAILED" });
    return { outcome: "FAILED", progress, failure, attempts };
  }
};
