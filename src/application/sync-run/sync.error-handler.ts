import type { TransferCounters } from "../../core/chunks/chunk.types";
import { ConfigError, isSyncError } from "../../core/errors/syncErrors";
import { errorMessage } from "../../shared/logging/log";

export type ChunkFailureCode = string;

export type ChunkFailureDecision = {
  code: ChunkFailureCode;
  message: string;
  retry: boolean;
  abortRun: boolean;
};

/**
 * Decides what a chunk-level failure means for the chunk and for the run.
 * Configuration errors stop the run; everything the vendor or the store may
 * recover from is retried within the chunk's attempt budget.
 */
export const classifyChunkFailure = (reason: unknown): ChunkFailureDecision => {
  if (reason instanceof ConfigError) {
    return { code: reason.code, message: reason.message, retry: false, abortRun: true };
  }
  if (isSyncError(reason)) {
    return { code: reason.code, message: reason.message, retry: reason.retryable, abortRun: false };
  }
  return { code: "unexpected", message: errorMessage(reason), retry: true, abortRun: false };
};

export type RunStatus = "SUCCESS" | "PARTIAL_FAILURE" | "ABORTED";

export type ChunkFailure = {
  chunkKey: string;
  code: ChunkFailureCode;
  message: string;
  attempts: number;
};

export type RunSummary = {
  runId: string;
  status: RunStatus;
  totalChunks: number;
  succeeded: string[];
  resumed: string[];
  failed: ChunkFailure[];
  notStarted: string[];
  transfer: TransferCounters;
  abortReason?: string;
  startedAt: string;
  finishedAt: string;
};

export const emptyTransferCounters = (): TransferCounters => ({
  listed: 0,
  matched: 0,
  ignored: 0,
  copied: 0,
  skipped: 0,
  verified: 0,
  bytesCopied: 0
});

export const addTransferCounters = (a: TransferCounters, b: TransferCounters): TransferCounters => ({
  listed: a.listed + b.listed,
  matched: a.matched + b.matched,
  ignored: a.ignored + b.ignored,
  copied: a.copied + b.copied,
  skipped: a.skipped + b.skipped,
  verified: a.verified + b.verified,
  bytesCopied: a.bytesCopied + b.bytesCopied
});

export const createRunSummaryTracker = (runId: string, totalChunks: number, startedAt: Date) => {
  const succeeded: string[] = [];
  const resumed: string[] = [];
  const failed: ChunkFailure[] = [];
  const notStarted: string[] = [];
  let transfer = emptyTransferCounters();
  let abortReason: string | undefined;

  return {
    isAborted: () => abortReason != null,
    abort: (reason: string) => {
      if (abortReason == null) abortReason = reason;
    },
    addResumed: (chunkKey: string) => {
      resumed.push(chunkKey);
    },
    addSucceeded: (chunkKey: string, counters: TransferCounters) => {
      succeeded.push(chunkKey);
      transfer = addTransferCounters(transfer, counters);
    },
    addFailed: (failure: ChunkFailure) => {
      failed.push(failure);
    },
    addNotStarted: (chunkKey: string) => {
      notStarted.push(chunkKey);
    },
    summary: (finishedAt: Date): RunSummary => {
      const status: RunStatus =
        abortReason != null ? "ABORTED" : failed.length === 0 && notStarted.length === 0 ? "SUCCESS" : "PARTIAL_FAILURE";
      const summary: RunSummary = {
        runId,
        status,
        totalChunks,
        succeeded: [...succeeded].sort(),
        resumed: [...resumed].sort(),
        failed: [...failed].sort((a, b) => (a.chunkKey < b.chunkKey ? -1 : a.chunkKey > b.chunkKey ? 1 : 0)),
        notStarted: [...notStarted].sort(),
        transfer,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString()
      };
      if (abortReason != null) summary.abortReason = abortReason;
      return summary;
    }
  };
};

export type RunSummaryTracker = ReturnType<typeof createRunSummaryTracker>;
