import { planTransfer, transferChunkOutput, isUpToDate, type TransferDeps } from "../../src/application/transfer/transferExecutor";
import { AuthorizationError, TransferError } from "../../src/core/errors/syncErrors";
import type { CopyObjectParams, ObjectStore } from "../../src/ports/ObjectStore";
import type { Credentials } from "../../src/ports/RoleAssumer";
import { createFakeClock, makeChunk, radiusAoi } from "../helpers/fixtures";
import { MemoryObjectStore } from "../helpers/memoryObjectStore";

const SOURCE = "vendor-bucket";
const DEST = "mobility-data";
const OUTPUT = "s3://vendor-bucket/out/job-42";

const toronto = radiusAoi("a");
const vancouver = radiusAoi("b", { stateProvince: "British Columbia", city: "Vancouver" });

const creds = (token: string): Credentials => ({
  accessKeyId: "test-key",
  secretAccessKey: "test-secret",
  sessionToken: token,
  expiresAt: Date.UTC(2030, 0, 1)
});

const fakeCredentials = () => {
  let current = creds("stale");
  return {
    getCredentials: jest.fn(async () => current),
    refreshAfterAuthFailure: jest.fn(async () => {
      current = creds("fresh");
      return current;
    })
  };
};

const options = { sourceBucket: SOURCE, contentSuffix: ".parquet", transferConcurrency: 4, objectRetryDelayMs: 1 };

const seedVendorOutput = (store: MemoryObjectStore) => {
  store.put(SOURCE, "out/job-42/poi_id=a/date=2025-06-01/part-0.parquet", 100);
  store.put(SOURCE, "out/job-42/poi_id=b/date=2025-06-02/part-0.parquet", 200);
  store.put(SOURCE, "out/job-42/_SUCCESS", 0);
  store.put(SOURCE, "out/job-42/manifest.parquet", 10);
};

const depsFor = (store: MemoryObjectStore, source: (c: Credentials) => ObjectStore = () => store): TransferDeps => ({
  credentials: fakeCredentials(),
  openSourceStore: source,
  destinationStore: store,
  clock: createFakeClock().clock
});

describe("transferChunkOutput", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("copies job output into the per-city date layout", async () => {
    const store = new MemoryObjectStore();
    seedVendorOutput(store);

    const result = await transferChunkOutput(depsFor(store), makeChunk([toronto, vancouver]), OUTPUT, options);

    expect(store.keys(DEST)).toEqual([
      "data/canada/british_columbia/vancouver/date=2025-06-02/part-0.parquet",
      "data/canada/ontario/toronto/date=2025-06-01/part-0.parquet"
    ]);
    expect(store.copies.map((copy) => copy.size).sort((a, b) => (a ?? 0) - (b ?? 0))).toEqual([100, 200]);
    expect(result).toEqual({
      listed: 4,
      matched: 3,
      ignored: 1,
      copied: 2,
      skipped: 0,
      verified: 2,
      bytesCopied: 300,
      destinationPrefixes: ["data/canada/british_columbia/vancouver/", "data/canada/ontario/toronto/"]
    });
  });

  it("skips identical objects when run again", async () => {
    const store = new MemoryObjectStore();
    seedVendorOutput(store);
    const chunk = makeChunk([toronto, vancouver]);

    await transferChunkOutput(depsFor(store), chunk, OUTPUT, options);
    const again = await transferChunkOutput(depsFor(store), chunk, OUTPUT, options);

    expect(again.copied).toBe(0);
    expect(again.skipped).toBe(2);
    expect(store.copies).toHaveLength(2);
    expect(store.keys(DEST)).toHaveLength(2);
  });

  it("maps everything to the only AOI of a single-AOI chunk", async () => {
    const store = new MemoryObjectStore();
    store.put(SOURCE, "out/job-7/date=2025-06-03/hour=01/part-9.parquet", 5);

    await transferChunkOutput(depsFor(store), makeChunk([toronto]), "out/job-7/", options);

    expect(store.keys(DEST)).toEqual(["data/canada/ontario/toronto/date=2025-06-03/hour=01/part-9.parquet"]);
  });

  it("refreshes credentials once and retries the copy after an authorization failure", async () => {
    const store = new MemoryObjectStore();
    store.put(SOURCE, "out/job-42/poi_id=a/date=2025-06-01/part-0.parquet", 100);
    const deps = depsFor(store, (c) => ({
      listObjects: (bucket, prefix) => store.listObjects(bucket, prefix),
      listCommonPrefixes: (bucket, prefix) => store.listCommonPrefixes(bucket, prefix),
      headObject: (bucket, key) => store.headObject(bucket, key),
      copyObject: async (params: CopyObjectParams) => {
        if (c.sessionToken === "stale") throw new AuthorizationError({ message: "ExpiredToken" });
        await store.copyObject(params);
      }
    }));

    const result = await transferChunkOutput(deps, makeChunk([toronto]), OUTPUT, options);

    expect(result.copied).toBe(1);
    expect(deps.credentials.refreshAfterAuthFailure).toHaveBeenCalledTimes(1);
  });

  it("lets a second authorization failure propagate", async () => {
    const store = new MemoryObjectStore();
    store.put(SOURCE, "out/job-42/poi_id=a/date=2025-06-01/part-0.parquet", 100);
    const deps = depsFor(store, () => ({
      listObjects: (bucket, prefix) => store.listObjects(bucket, prefix),
      listCommonPrefixes: (bucket, prefix) => store.listCommonPrefixes(bucket, prefix),
      headObject: (bucket, key) => store.headObject(bucket, key),
      copyObject: async () => {
        throw new AuthorizationError({ message: "AccessDenied" });
      }
    }));

    await expect(transferChunkOutput(deps, makeChunk([toronto]), OUTPUT, options)).rejects.toBeInstanceOf(AuthorizationError);
    expect(deps.credentials.refreshAfterAuthFailure).toHaveBeenCalledTimes(1);
  });

  it("retries a throttled copy with backoff and then completes", async () => {
    const store = new MemoryObjectStore();
    store.put(SOURCE, "out/job-42/poi_id=a/date=2025-06-01/part-0.parquet", 100);
    const fake = createFakeClock();
    let calls = 0;
    const deps: TransferDeps = {
      ...depsFor(store, () => ({
        listObjects: (bucket, prefix) => store.listObjects(bucket, prefix),
        listCommonPrefixes: (bucket, prefix) => store.listCommonPrefixes(bucket, prefix),
        headObject: (bucket, key) => store.headObject(bucket, key),
        copyObject: async (params: CopyObjectParams) => {
          calls += 1;
          if (calls === 1) throw new TransferError({ message: "SlowDown", retryable: true });
          await store.copyObject(params);
        }
      })),
      clock: fake.clock
    };
    const warn = jest.mocked(console.warn);

    const result = await transferChunkOutput(deps, makeChunk([toronto]), OUTPUT, { ...options, objectRetryDelayMs: 100 });

    expect(calls).toBe(2);
    expect(result.copied).toBe(1);
    expect(result.verified).toBe(1);
    expect(fake.sleeps).toHaveLength(1);
    expect(fake.sleeps[0]).toBeGreaterThanOrEqual(100);
    expect(fake.sleeps[0]).toBeLessThanOrEqual(120);
    const events = warn.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(events).toContainEqual(
      expect.objectContaining({ event: "transfer.retry", op: "copy", attempt: 1, maxAttempts: 3 })
    );
  });

  it("surfaces a retryable TransferError once the copy retries are spent", async () => {
    const store = new MemoryObjectStore();
    store.put(SOURCE, "out/job-42/poi_id=a/date=2025-06-01/part-0.parquet", 100);
    const fake = createFakeClock();
    const copyObject = jest.fn(async (): Promise<void> => {
      throw new TransferError({ message: "connection reset", retryable: true });
    });
    const deps: TransferDeps = {
      ...depsFor(store, () => ({
        listObjects: (bucket, prefix) => store.listObjects(bucket, prefix),
        listCommonPrefixes: (bucket, prefix) => store.listCommonPrefixes(bucket, prefix),
        headObject: (bucket, key) => store.headObject(bucket, key),
        copyObject
      })),
      clock: fake.clock
    };

    const run = transferChunkOutput(deps, makeChunk([toronto]), OUTPUT, { ...options, objectRetryDelayMs: 100 });

    await expect(run).rejects.toMatchObject({ code: "transfer_failed", message: "connection reset", retryable: true });
    expect(copyObject).toHaveBeenCalledTimes(3);
    expect(fake.sleeps).toHaveLength(2);
    expect(fake.sleeps[0]).toBeGreaterThanOrEqual(100);
    expect(fake.sleeps[0]).toBeLessThanOrEqual(120);
    expect(fake.sleeps[1]).toBeGreaterThanOrEqual(200);
    expect(fake.sleeps[1]).toBeLessThanOrEqual(240);
    expect(store.keys(DEST)).toEqual([]);
  });

  it("fails verification when a copy did not land", async () => {
    const store = new MemoryObjectStore();
    store.put(SOURCE, "out/job-42/poi_id=a/date=2025-06-01/part-0.parquet", 100);
    const deps = depsFor(store, () => ({
      listObjects: (bucket, prefix) => store.listObjects(bucket, prefix),
      listCommonPrefixes: (bucket, prefix) => store.listCommonPrefixes(bucket, prefix),
      headObject: (bucket, key) => store.headObject(bucket, key),
      copyObject: async () => undefined
    }));

    const run = transferChunkOutput(deps, makeChunk([toronto]), OUTPUT, options);
    await expect(run).rejects.toThrow(
      "Verification failed for 1 of 1 objects (first: data/canada/ontario/toronto/date=2025-06-01/part-0.parquet)"
    );
    await expect(transferChunkOutput(deps, makeChunk([toronto]), OUTPUT, options)).rejects.toMatchObject({ retryable: true });
  });
});

describe("planTransfer", () => {
  it("refuses objects it cannot attribute to an AOI", () => {
    const objects = [{ key: "out/job-42/date=2025-06-01/x.parquet", size: 1, etag: "e" }];
    expect(() => planTransfer(makeChunk([toronto, vancouver]), OUTPUT, objects, ".parquet")).toThrow(
      "Output object out/job-42/date=2025-06-01/x.parquet has no poi_id partition and the chunk holds 2 AOIs"
    );
    try {
      planTransfer(makeChunk([toronto, vancouver]), OUTPUT, objects, ".parquet");
    } catch (err) {
      expect(err instanceof TransferError && err.retryable).toBe(false);
    }
  });

  it("refuses a poi_id that is not in the chunk", () => {
    const objects = [{ key: "out/job-42/poi_id=zzz/date=2025-06-01/x.parquet", size: 1, etag: "e" }];
    expect(() => planTransfer(makeChunk([toronto]), OUTPUT, objects, ".parquet")).toThrow(
      "Output object out/job-42/poi_id=zzz/date=2025-06-01/x.parquet belongs to unknown poi_id zzz"
    );
  });
});

describe("isUpToDate", () => {
  const source = { key: "k", size: 10, etag: "abc" };

  it("needs the same size and ETag", () => {
    expect(isUpToDate(source, { key: "d", size: 10, etag: "abc" })).toBe(true);
    expect(isUpToDate(source, { key: "d", size: 10, etag: "other" })).toBe(false);
    expect(isUpToDate(source, { key: "d", size: 11, etag: "abc" })).toBe(false);
    expect(isUpToDate(source, null)).toBe(false);
  });

  it("compares only size for multipart ETags", () => {
    expect(isUpToDate({ key: "k", size: 10, etag: "abc-3" }, { key: "d", size: 10, etag: "zzz" })).toBe(true);
  });
});
