import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ChunkProgress } from "../../src/core/chunks/chunk.types";
import { FileAoiRegistry } from "../../src/infrastructure/file/FileAoiRegistry";
import { FileChunkProgressRepository, runFileName } from "../../src/infrastructure/file/FileChunkProgressRepository";

const toronto = {
  country: "Canada",
  state_province: "Ontario",
  city: "Toronto",
  latitude: 43.6532,
  longitude: -79.3832,
  radius_meters: 50000
};

describe("file adapters", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mobility-sync-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("FileAoiRegistry", () => {
    it.each([
      { name: "a bare array", content: [toronto] },
      { name: "a cities object", content: { cities: [toronto] } }
    ])("reads $name", async ({ content }) => {
      const file = join(dir, "cities.json");
      await writeFile(file, JSON.stringify(content), "utf8");

      const aois = await new FileAoiRegistry(file).loadSnapshot();

      expect(aois).toEqual([
        {
          poiId: "toronto_center",
          country: "Canada",
          stateProvince: "Ontario",
          city: "Toronto",
          latitude: 43.6532,
          longitude: -79.3832,
          geometry: { kind: "radius", radiusMeters: 50000 }
        }
      ]);
    });

    it("loads without the MongoDB driver", async () => {
      const file = join(dir, "cities.json");
      await writeFile(file, JSON.stringify([toronto]), "utf8");

      jest.resetModules();
      jest.doMock("mongodb", () => {
        throw new Error("mongodb must not load for a file registry");
      });
      try {
        const { FileAoiRegistry: IsolatedRegistry } = await import("../../src/infrastructure/file/FileAoiRegistry");
        const aois = await new IsolatedRegistry(file).loadSnapshot();
        expect(aois.map((aoi) => aoi.poiId)).toEqual(["toronto_center"]);
      } finally {
        jest.dontMock("mongodb");
      }
    });

    it("reports a missing file as a configuration error", async () => {
      const file = join(dir, "missing.json");
      await expect(new FileAoiRegistry(file).loadSnapshot()).rejects.toThrow(`Cannot read AOI file ${file}:`);
    });

    it("rejects files of the wrong shape", async () => {
      const file = join(dir, "cities.json");
      await writeFile(file, JSON.stringify({ city: "Toronto" }), "utf8");

      await expect(new FileAoiRegistry(file).loadSnapshot()).rejects.toThrow(
        `AOI file ${file} must hold an array of records or { "cities": [...] }`
      );
    });

    it("rejects invalid JSON", async () => {
      const file = join(dir, "cities.json");
      await writeFile(file, "[{", "utf8");

      await expect(new FileAoiRegistry(file).loadSnapshot()).rejects.toThrow(`AOI file ${file} is not valid JSON:`);
    });
  });

  describe("FileChunkProgressRepository", () => {
    const base: ChunkProgress = {
      runId: "sync-2025-06-01-2025-06-03",
      chunkKey: "movement/job/pings:FULL:b0:w0",
      attempts: 1,
      updatedAt: new Date("2025-06-10T00:00:00.000Z")
    };

    it("sanitises the run id into a file name", () => {
      expect(runFileName("sync 2025/06:01")).toBe("sync_2025_06_01.json");
    });

    it("returns nothing for an unknown run", async () => {
      await expect(new FileChunkProgressRepository(dir).listByRun("run-x")).resolves.toEqual([]);
    });

    it("round-trips progress including dates and the last error", async () => {
      const repo = new FileChunkProgressRepository(join(dir, "progress"));
      const saved: ChunkProgress = {
        ...base,
        fingerprint: "2025-06-01..2025-06-03|toronto_center",
        attempts: 2,
        outcome: "FAILED",
        jobId: "job-3",
        lastError: { code: "job_failed", message: "Job job-3 FAILED: no reason given", at: new Date("2025-06-10T00:05:00.000Z") }
      };

      await repo.save(saved);

      await expect(new FileChunkProgressRepository(join(dir, "progress")).listByRun(base.runId)).resolves.toEqual([saved]);
    });

    it("keeps every chunk when saves run concurrently", async () => {
      const repo = new FileChunkProgressRepository(dir);
      const keys = ["k0", "k1", "k2", "k3", "k4", "k5"];

      await Promise.all(keys.map((chunkKey) => repo.save({ ...base, chunkKey })));

      const listed = await repo.listByRun(base.runId);
      expect(listed.map((p) => p.chunkKey).sort()).toEqual(keys);
      const file = JSON.parse(await readFile(join(dir, runFileName(base.runId)), "utf8"));
      expect(Object.keys(file.chunks).sort()).toEqual(keys);
      expect(file.chunks.k0.updatedAt).toBe("2025-06-10T00:00:00.000Z");
    });

    it("overwrites the previous state of a chunk", async () => {
      const repo = new FileChunkProgressRepository(dir);
      await repo.save(base);
      await repo.save({ ...base, attempts: 2, outcome: "SUCCEEDED" });

      await expect(repo.listByRun(base.runId)).resolves.toEqual([{ ...base, attempts: 2, outcome: "SUCCEEDED" }]);
    });
  });
});
