import { processChunk, type ChunkDeps } from "../../src/application/sync-chunk/processChunk";
import { resolveSyncConfig } from "../../src/application/sync-run/sync.config";
import { ConfigError } from "../../src/core/errors/syncErrors";
import type { JobStatusReport } from "../../src/core/jobs/VendorJob";
import type { Credentials } from "../../src/ports/RoleAssumer";
import type { SubmittedJob, VendorJobApi } from "../../src/ports/VendorJobApi";
import { createFakeClock, makeChunk, radiusAoi } from "../helpers/fixtures";
import { MemoryObjectStore } from "../helpers/memoryObjectStore";
import { MemoryProgressRepository } from "../helpers/memoryProgressRepository";

const config = resolveSyncConfig({
  sourceBucket: "vendor-bucket",
  roleArn: "arn:aws:iam::000000000000:role/test-role",
  pollIntervalMs: 1000,
  maxPolls: 5,
  retryBaseDelayMs: 100,
  retryMaxDelayMs: 1000,
  backoff: "linear"
});

const testCredentials: Credentials = {
  accessKeyId: "test-key",
  secretAccessKey: "test-secret",
  sessionToken: "test-token",
  expiresAt: Date.UTC(2030, 0, 1)
};

const vendorApi = (statusFor: (jobId: string) => JobStatusReport) => {
  let submitted = 0;
  const api: VendorJobApi = {
    submitJob: jest.fn(async (): Promise<SubmittedJob> => {
      submitted += 1;
      return { jobId: `job-${submitted}` };
    }),
    getJobStatus: jest.fn(async (jobId: string) => statusFor(jobId))
  };
  return api;
};

const setup = (api: VendorJobApi, store = new MemoryObjectStore()) => {
  const fake = createFakeClock();
  const progress = new MemoryProgressRepository();
  const deps: ChunkDeps = {
    api,
    clock: fake.clock,
    progress,
    transfer: {
      credentials: {
        getCredentials: async () => testCredentials,
        refreshAfterAuthFailure: async () => testCredentials
      },
      openSourceStore: () => store,
      destinationStore: store
    }
  };
  return { deps, progress, store, sleeps: fake.sleeps };
};

const chunk = makeChunk([radiusAoi("toronto_center")]);

describe("processChunk", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("submits, polls, transfers and records SUCCEEDED", async () => {
    const store = new MemoryObjectStore();
    store.put("vendor-bucket", "out/job-1/date=2025-06-01/part-0.parquet", 64);
    const api = vendorApi((jobId) => ({ status: "SUCCESS", outputLocation: `s3://vendor-bucket/out/${jobId}/` }));
    const { deps, progress } = setup(api, store);

    const result = await processChunk(deps, chunk, "run-1", config);

    expect(result.outcome).toBe("SUCCEEDED");
    expect(result.attempts).toBe(1);
    expect(store.keys("mobility-data")).toEqual(["data/canada/ontario/toronto/date=2025-06-01/part-0.parquet"]);
    expect(progress.get("run-1", chunk.key)).toEqual(
      expect.objectContaining({
        attempts: 1,
        outcome: "SUCCEEDED",
        jobId: "job-1",
        outputLocation: "s3://vendor-bucket/out/job-1/",
        transfer: { listed: 1, matched: 1, ignored: 0, copied: 1, skipped: 0, verified: 1, bytesCopied: 64 }
      })
    );
  });

  it("fails permanently after maxAttempts failed jobs and records every attempt", async () => {
    const api = vendorApi(() => ({ status: "FAILED", errorMessage: "vendor exploded" }));
    const { deps, progress, sleeps } = setup(api);

    const result = await processChunk(deps, chunk, "run-1", config);

    expect(result.outcome).toBe("FAILED");
    expect(result.attempts).toBe(3);
    expect(api.submitJob).toHaveBeenCalledTimes(3);
    expect(result.outcome === "FAILED" ? result.failure : undefined).toEqual({
      code: "job_failed",
      message: "Job job-3 FAILED: vendor exploded",
      retry: true,
      abortRun: false
    });
    // one poll per attempt plus linear backoff (100, 200) with up to 20% jitter in between
    expect(sleeps.filter((ms) => ms === 1000)).toHaveLength(3);
    const backoffs = sleeps.filter((ms) => ms !== 1000);
    expect(backoffs).toHaveLength(2);
    expect(backoffs[0]).toBeGreaterThanOrEqual(100);
    expect(backoffs[0]).toBeLessThanOrEqual(120);
    expect(backoffs[1]).toBeGreaterThanOrEqual(200);
    expect(backoffs[1]).toBeLessThanOrEqual(240);

    const saved = progress.get("run-1", chunk.key);
    expect(saved?.outcome).toBe("FAILED");
    expect(saved?.attempts).toBe(3);
    expect(saved?.lastError).toEqual(expect.objectContaining({ code: "job_failed", message: "Job job-3 FAILED: vendor exploded" }));
  });

  it("resubmits a job that never leaves RUNNING until the attempts run out", async () => {
    const api = vendorApi(() => ({ status: "RUNNING" }));
    const { deps, progress, sleeps } = setup(api);

    const result = await processChunk(deps, chunk, "run-1", config);

    expect(result.outcome).toBe("FAILED");
    expect(result.attempts).toBe(3);
    expect(api.submitJob).toHaveBeenCalledTimes(3);
    expect(api.getJobStatus).toHaveBeenCalledTimes(15);
    expect(result.outcome === "FAILED" ? result.failure : undefined).toEqual({
      code: "poll_timeout",
      message: "Job job-3 not finished after 5 polls",
      retry: true,
      abortRun: false
    });
    expect(sleeps.filter((ms) => ms === 1000)).toHaveLength(15);
    expect(progress.get("run-1", chunk.key)).toEqual(
      expect.objectContaining({
        attempts: 3,
        outcome: "FAILED",
        jobId: "job-3",
        lastError: expect.objectContaining({ code: "poll_timeout" })
      })
    );
  });

  it("reuses the job output when only the transfer failed", async () => {
    const store = new MemoryObjectStore();
    const api = vendorApi(() => ({ status: "SUCCESS", outputLocation: "out/job-1/" }));
    const { deps } = setup(api, store);
    let copies = 0;
    deps.transfer.openSourceStore = () => ({
      listObjects: (bucket, prefix) => store.listObjects(bucket, prefix),
      listCommonPrefixes: (bucket, prefix) => store.listCommonPrefixes(bucket, prefix),
      headObject: (bucket, key) => store.headObject(bucket, key),
      copyObject: async (params) => {
        copies += 1;
        // the first copy is silently lost, so verification fails once
        if (copies > 1) await store.copyObject(params);
      }
    });
    store.put("vendor-bucket", "out/job-1/date=2025-06-01/part-0.parquet", 64);

    const result = await processChunk(deps, chunk, "run-1", config);

    expect(result.outcome).toBe("SUCCEEDED");
    expect(result.attempts).toBe(2);
    expect(api.submitJob).toHaveBeenCalledTimes(1);
  });

  it("does not retry configuration errors", async () => {
    const api: VendorJobApi = {
      submitJob: jest.fn(async (): Promise<SubmittedJob> => {
        throw new ConfigError("Vendor rejected the API key (401)", { status: 401 });
      }),
      getJobStatus: jest.fn()
    };
    const { deps } = setup(api);

    const result = await processChunk(deps, chunk, "run-1", config);

    expect(result.outcome).toBe("FAILED");
    expect(result.attempts).toBe(1);
    expect(result.outcome === "FAILED" && result.failure.abortRun).toBe(true);
  });

  it("keeps counting attempts from an interrupted earlier run", async () => {
    const api = vendorApi(() => ({ status: "CANCELLED" }));
    const { deps, progress } = setup(api);

    await processChunk(deps, chunk, "run-1", { ...config, maxAttempts: 1 }, {
      runId: "run-1",
      chunkKey: chunk.key,
      attempts: 2,
      outcome: "FAILED",
      updatedAt: new Date(0)
    });

    expect(progress.get("run-1", chunk.key)?.attempts).toBe(3);
  });
});
