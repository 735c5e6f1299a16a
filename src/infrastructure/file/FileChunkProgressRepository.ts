import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ChunkError, ChunkProgress, TransferCounters } from "../../core/chunks/chunk.types";
import type { ChunkProgressRepository } from "../../ports/ChunkProgressRepository";

type StoredProgress = Omit<ChunkProgress, "updatedAt" | "lastError"> & {
  updatedAt: string;
  lastError?: Omit<ChunkError, "at"> & { at: string };
};

type RunFile = {
  runId: string;
  chunks: Record<string, StoredProgress>;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value);

export const runFileName = (runId: string): string => `${runId.replace(/[^A-Za-z0-9._-]/g, "_")}.json`;

const toStored = (progress: ChunkProgress): StoredProgress => {
  const { lastError, updatedAt, ...rest } = progress;
  const stored: StoredProgress = { ...rest, updatedAt: updatedAt.toISOString() };
  if (lastError) stored.lastError = { ...lastError, at: lastError.at.toISOString() };
  return stored;
};

const readCounters = (value: unknown): TransferCounters | undefined => {
  if (!isObject(value)) return undefined;
  const num = (field: string) => (typeof value[field] === "number" ? Number(value[field]) : 0);
  return {
    listed: num("listed"),
    matched: num("matched"),
    ignored: num("ignored"),
    copied: num("copied"),
    skipped: num("skipped"),
    verified: num("verified"),
    bytesCopied: num("bytesCopied")
  };
};

const fromStored = (runId: string, chunkKey: string, value: unknown): ChunkProgress | undefined => {
  if (!isObject(value)) return undefined;
  const progress: ChunkProgress = {
    runId,
    chunkKey,
    attempts: typeof value.attempts === "number" ? value.attempts : 0,
    updatedAt: new Date(typeof value.updatedAt === "string" ? value.updatedAt : 0)
  };
  if (typeof value.fingerprint === "string") progress.fingerprint = value.fingerprint;
  if (value.outcome === "SUCCEEDED" || value.outcome === "FAILED") progress.outcome = value.outcome;
  if (typeof value.jobId === "string") progress.jobId = value.jobId;
  if (typeof value.outputLocation === "string") progress.outputLocation = value.outputLocation;
  const transfer = readCounters(value.transfer);
  if (transfer) progress.transfer = transfer;
  const lastError = value.lastError;
  if (isObject(lastError) && typeof lastError.code === "string" && typeof lastError.message === "string") {
    progress.lastError = {
      code: lastError.code,
      message: lastError.message,
      at: new Date(typeof lastError.at === "string" ? lastError.at : 0)
    };
  }
  return progress;
};

/**
 * One JSON document per run under `dir`. Writes are queued so concurrent
 * workers never interleave a read-modify-write, and each write replaces the
 * file atomically through a rename.
 */
export class FileChunkProgressRepository implements ChunkProgressRepository {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly dir: string) {}

  private pathFor(runId: string) {
    return join(this.dir, runFileName(runId));
  }

  private async readRun(runId: string): Promise<RunFile> {
    let text: string;
    try {
      text = await readFile(this.pathFor(runId), "utf8");
    } catch (err) {
      if (isObject(err) && err.code === "ENOENT") return { runId, chunks: {} };
      throw err;
    }
    const parsed: unknown = JSON.parse(text);
    const chunks: Record<string, StoredProgress> = {};
    if (isObject(parsed) && isObject(parsed.chunks)) {
      for (const [chunkKey, value] of Object.entries(parsed.chunks)) {
        const progress = fromStored(runId, chunkKey, value);
        if (progress) chunks[chunkKey] = toStored(progress);
      }
    }
    return { runId, chunks };
  }

  async listByRun(runId: string): Promise<ChunkProgress[]> {
    await this.queue;
    const run = await this.readRun(runId);
    return Object.entries(run.chunks).flatMap(([chunkKey, stored]) => {
      const progress = fromStored(runId, chunkKey, stored);
      return progress ? [progress] : [];
    });
  }

  save(progress: ChunkProgress): Promise<void> {
    const write = this.queue.then(async () => {
      await mkdir(this.dir, { recursive: true });
      const run = await this.readRun(progress.runId);
      run.chunks[progress.chunkKey] = toStored(progress);
      const target = this.pathFor(progress.runId);
      const tmp = `${target}.tmp`;
      await writeFile(tmp, `${JSON.stringify(run, null, 2)}\n`, "utf8");
      await rename(tmp, target);
    });
    // keep the queue alive after a failed write; the caller still sees the failure
    this.queue = write.catch(() => undefined);
    return write;
  }
}
