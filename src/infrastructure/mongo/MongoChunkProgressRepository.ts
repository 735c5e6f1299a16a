import type { Collection, MongoClient } from "mongodb";
import type { ChunkProgress } from "../../core/chunks/chunk.types";
import type { ChunkProgressRepository } from "../../ports/ChunkProgressRepository";
import { DEFAULT_DB_NAME } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type ChunkProgressDoc = ChunkProgress;

/** Drops undefined fields so `$set` never writes nulls over earlier values. */
export const toProgressUpdate = (progress: ChunkProgress): Partial<ChunkProgressDoc> => {
  const update: Partial<ChunkProgressDoc> = {
    runId: progress.runId,
    chunkKey: progress.chunkKey,
    attempts: progress.attempts,
    updatedAt: progress.updatedAt
  };
  if (progress.fingerprint) update.fingerprint = progress.fingerprint;
  if (progress.outcome) update.outcome = progress.outcome;
  if (progress.lastError) update.lastError = progress.lastError;
  if (progress.jobId) update.jobId = progress.jobId;
  if (progress.outputLocation) update.outputLocation = progress.outputLocation;
  if (progress.transfer) update.transfer = progress.transfer;
  return update;
};

export const fromProgressDoc = (doc: ChunkProgressDoc): ChunkProgress => {
  const progress: ChunkProgress = {
    runId: doc.runId,
    chunkKey: doc.chunkKey,
    attempts: doc.attempts,
    updatedAt: doc.updatedAt
  };
  if (doc.fingerprint) progress.fingerprint = doc.fingerprint;
  if (doc.outcome) progress.outcome = doc.outcome;
  if (doc.lastError) progress.lastError = doc.lastError;
  if (doc.jobId) progress.jobId = doc.jobId;
  if (doc.outputLocation) progress.outputLocation = doc.outputLocation;
  if (doc.transfer) progress.transfer = doc.transfer;
  return progress;
};

/**
 * One document per (runId, chunkKey), upserted on every save.
 */
export class MongoChunkProgressRepository implements ChunkProgressRepository {
  private collection?: Collection<ChunkProgressDoc>;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = DEFAULT_DB_NAME,
    private readonly collectionName = "chunk_progress"
  ) {}

  private async getCollection(): Promise<Collection<ChunkProgressDoc>> {
    if (this.collection) return this.collection;

    await this.client.connect();
    const col = this.client.db(this.dbName).collection<ChunkProgressDoc>(this.collectionName);
    for (const idx of mongoIndexes.chunkProgressCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async listByRun(runId: string): Promise<ChunkProgress[]> {
    const col = await this.getCollection();
    const docs = await col.find({ runId }, { projection: { _id: 0 } }).toArray();
    return docs.map(fromProgressDoc);
  }

  async save(progress: ChunkProgress): Promise<void> {
    const col = await this.getCollection();
    await col.updateOne(
      { runId: progress.runId, chunkKey: progress.chunkKey },
      { $set: toProgressUpdate(progress) },
      { upsert: true }
    );
  }
}
