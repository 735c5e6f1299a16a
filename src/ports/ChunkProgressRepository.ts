import type { ChunkProgress } from "../core/chunks/chunk.types";

/**
 * Concurrent writers are safe as long as they write distinct chunk keys,
 * which the run coordinator guarantees.
 */
export interface ChunkProgressRepository {
  listByRun(runId: string): Promise<ChunkProgress[]>;
  save(progress: ChunkProgress): Promise<void>;
}
