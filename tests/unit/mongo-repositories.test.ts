import type { MongoClient } from "mongodb";
import type { ChunkProgress } from "../../src/core/chunks/chunk.types";
import { MongoAoiRegistry } from "../../src/infrastructure/mongo/MongoAoiRegistry";
import {
  fromProgressDoc,
  MongoChunkProgressRepository,
  toProgressUpdate
} from "../../src/infrastructure/mongo/MongoChunkProgressRepository";
import { createMongoClient } from "../../src/infrastructure/mongo/MongoClientFactory";

const progress: ChunkProgress = {
  runId: "run-1",
  chunkKey: "movement/job/pings:FULL:b0:w0",
  attempts: 2,
  jobId: "job-7",
  updatedAt: new Date("2025-06-10T00:00:00.000Z")
};

const fakeClient = (collection: unknown) => {
  const connect = jest.fn().mockResolvedValue(undefined);
  const db = jest.fn(() => ({ collection: jest.fn(() => collection) }));
  return { client: { connect, db } as unknown as MongoClient, connect, db };
};

describe("MongoChunkProgressRepository", () => {
  it("drops undefined fields from updates and documents", () => {
    expect(toProgressUpdate({ ...progress, outcome: undefined })).toEqual({
      runId: "run-1",
      chunkKey: "movement/job/pings:FULL:b0:w0",
      attempts: 2,
      jobId: "job-7",
      updatedAt: new Date("2025-06-10T00:00:00.000Z")
    });
    expect(Object.keys(fromProgressDoc(progress))).toEqual(["runId", "chunkKey", "attempts", "updatedAt", "jobId"]);
    expect(fromProgressDoc({ ...progress, fingerprint: "2025-06-01..2025-06-03|a" }).fingerprint).toBe(
      "2025-06-01..2025-06-03|a"
    );
  });

  it("upserts by run id and chunk key", async () => {
    const repo = new MongoChunkProgressRepository(createMongoClient("mongodb://localhost:27017"));
    const updateOne = jest.fn().mockResolvedValue({});
    (repo as unknown as { getCollection: () => Promise<{ updateOne: typeof updateOne }> }).getCollection =
      async () => ({ updateOne });

    await repo.save(progress);

    expect(updateOne).toHaveBeenCalledWith(
      { runId: "run-1", chunkKey: "movement/job/pings:FULL:b0:w0" },
      { $set: toProgressUpdate(progress) },
      { upsert: true }
    );
  });

  it("lists a run without Mongo ids", async () => {
    const repo = new MongoChunkProgressRepository(createMongoClient("mongodb://localhost:27017"));
    const toArray = jest.fn().mockResolvedValue([{ ...progress, outcome: "SUCCEEDED" }]);
    const find = jest.fn(() => ({ toArray }));
    (repo as unknown as { getCollection: () => Promise<{ find: typeof find }> }).getCollection = async () => ({ find });

    await expect(repo.listByRun("run-1")).resolves.toEqual([{ ...progress, outcome: "SUCCEEDED" }]);
    expect(find).toHaveBeenCalledWith({ runId: "run-1" }, { projection: { _id: 0 } });
  });

  it("connects once and creates the unique resume index", async () => {
    const createIndex = jest.fn().mockResolvedValue("runId_1_chunkKey_1");
    const updateOne = jest.fn().mockResolvedValue({});
    const { client, connect, db } = fakeClient({ createIndex, updateOne });
    const repo = new MongoChunkProgressRepository(client, "sync_test");

    await repo.save(progress);
    await repo.save({ ...progress, attempts: 3 });

    expect(connect).toHaveBeenCalledTimes(1);
    expect(db).toHaveBeenCalledWith("sync_test");
    expect(createIndex).toHaveBeenCalledTimes(1);
    expect(createIndex).toHaveBeenCalledWith({ runId: 1, chunkKey: 1 }, { unique: true });
    expect(updateOne).toHaveBeenCalledTimes(2);
  });
});

describe("MongoAoiRegistry", () => {
  const toronto = {
    country: "Canada",
    state_province: "Ontario",
    city: "Toronto",
    latitude: 43.6532,
    longitude: -79.3832,
    radius_meters: 50000
  };

  it("loads a snapshot of parsed AOIs", async () => {
    const toArray = jest.fn().mockResolvedValue([toronto]);
    const find = jest.fn(() => ({ toArray }));
    const { client } = fakeClient({ createIndex: jest.fn().mockResolvedValue("poi_id_1"), find });

    const aois = await new MongoAoiRegistry(client).loadSnapshot();

    expect(aois.map((aoi) => aoi.poiId)).toEqual(["toronto_center"]);
    expect(find).toHaveBeenCalledWith({}, { projection: { _id: 0 } });
  });
});
