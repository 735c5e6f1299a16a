import type { ChunkProgress } from "../../src/core/chunks/chunk.types";
import type { ChunkProgressRepository } from "../../src/ports/ChunkProgressRepository";

export class MemoryProgressRepository implements ChunkProgressRepository {
  readonly records = new Map<string, ChunkProgress>();
  readonly history: ChunkProgress[] = [];

  async listByRun(runId: string): Promise<ChunkProgress[]> {
    return Array.from(this.records.values()).filter((p) => p.runId === runId);
  }

  async save(progress: ChunkProgress): Promise<void> {
    this.history.push(progress);
    this.records.set(`${progress.runId}/${progress.chunkKey}`, progress);
  }

  get(runId: string, chunkKey: string): ChunkProgress | undefined {
    return this.records.get(`${runId}/${chunkKey}`);
  }
}
