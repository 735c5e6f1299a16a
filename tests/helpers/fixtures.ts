import type { Aoi } from "../../src/core/aoi/aoi.types";
import type { Chunk, SyncTarget } from "../../src/core/chunks/chunk.types";
import { chunkKeyOf } from "../../src/core/chunks/chunk.types";
import type { Clock } from "../../src/shared/time/clock";

export const pingsTarget: SyncTarget = { endpoint: "movement/job/pings", schema: "FULL", bucket: "mobility-data" };

export const radiusAoi = (poiId: string, overrides: Partial<Aoi> = {}): Aoi => ({
  poiId,
  country: "Canada",
  stateProvince: "Ontario",
  city: "Toronto",
  latitude: 43.6532,
  longitude: -79.3832,
  geometry: { kind: "radius", radiusMeters: 50000 },
  ...overrides
});

export const makeChunk = (aois: Aoi[], overrides: Partial<Chunk> = {}): Chunk => ({
  key: chunkKeyOf(pingsTarget, 0, 0),
  batchIndex: 0,
  windowIndex: 0,
  aois,
  window: { from: "2025-06-01", to: "2025-06-03" },
  target: pingsTarget,
  ...overrides
});

/** Clock whose sleeps resolve immediately and advance virtual time. */
export const createFakeClock = (startMs = Date.UTC(2025, 5, 10)) => {
  let now = startMs;
  const sleeps: number[] = [];
  const clock: Clock = {
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    }
  };
  return {
    clock,
    sleeps,
    advance: (ms: number) => {
      now += ms;
    }
  };
};
