import type { Aoi } from "../aoi/aoi.types";
import { validateAoi } from "../aoi/parseAoi";
import { chunkKeyOf, type Chunk, type DateRange, type SyncTarget } from "../chunks/chunk.types";
import { ConfigError } from "../errors/syncErrors";
import { addDays, fromEpochDay, isCalendarDate, toEpochDay } from "../../shared/time/calendarDate";

export const VENDOR_MAX_AOIS_PER_JOB = 200;
export const VENDOR_MAX_DAYS_PER_JOB = 31;

export type PartitionLimits = {
  maxAoisPerChunk: number;
  maxDaysPerChunk: number;
};

export const defaultPartitionLimits: PartitionLimits = {
  maxAoisPerChunk: VENDOR_MAX_AOIS_PER_JOB,
  maxDaysPerChunk: VENDOR_MAX_DAYS_PER_JOB
};

export const validateDateRange = (range: DateRange): DateRange => {
  if (!isCalendarDate(range.from) || !isCalendarDate(range.to)) {
    throw new ConfigError(`Invalid date range ${range.from}..${range.to}: dates must be YYYY-MM-DD`);
  }
  if (toEpochDay(range.from) > toEpochDay(range.to)) {
    throw new ConfigError(`Invalid date range ${range.from}..${range.to}: from is after to`);
  }
  return range;
};

const assertLimit = (name: string, value: number, max: number) => {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new ConfigError(`${name}=${String(value)} is out of allowed range [1..${max}]`);
  }
};

/**
 * Contiguous windows of at most `maxDays` days covering the range exactly.
 */
export const splitDateRange = (range: DateRange, maxDays: number): DateRange[] => {
  validateDateRange(range);
  assertLimit("maxDaysPerChunk", maxDays, VENDOR_MAX_DAYS_PER_JOB);

  const end = toEpochDay(range.to);
  const windows: DateRange[] = [];
  for (let start = toEpochDay(range.from); start <= end; start += maxDays) {
    windows.push({ from: fromEpochDay(start), to: fromEpochDay(Math.min(start + maxDays - 1, end)) });
  }
  return windows;
};

export const batchAois = <T>(items: readonly T[], size: number): T[][] => {
  assertLimit("maxAoisPerChunk", size, VENDOR_MAX_AOIS_PER_JOB);
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

const byPoiId = (a: Aoi, b: Aoi) => (a.poiId < b.poiId ? -1 : a.poiId > b.poiId ? 1 : 0);

/**
 * Splits AOIs × date range × targets into vendor-compliant chunks.
 * AOIs are ordered by poi_id first so the same snapshot always yields the same chunk keys.
 */
export const partitionRequests = (input: {
  aois: readonly Aoi[];
  range: DateRange;
  targets: readonly SyncTarget[];
  limits?: Partial<PartitionLimits>;
}): Chunk[] => {
  const limits = { ...defaultPartitionLimits, ...input.limits };

  if (input.aois.length === 0) {
    throw new ConfigError("No AOIs to sync");
  }
  if (input.targets.length === 0) {
    throw new ConfigError("No sync targets configured");
  }

  const targetKeys = new Set(input.targets.map((target) => `${target.endpoint}:${target.schema}`));
  if (targetKeys.size !== input.targets.length) {
    throw new ConfigError("Duplicate (endpoint, schema) pair in sync targets");
  }

  const seen = new Set<string>();
  for (const aoi of input.aois) {
    validateAoi(aoi);
    if (seen.has(aoi.poiId)) {
      throw new ConfigError(`Duplicate poi_id in run: ${aoi.poiId}`, { poiId: aoi.poiId });
    }
    seen.add(aoi.poiId);
  }

  const windows = splitDateRange(input.range, limits.maxDaysPerChunk);
  const batches = batchAois([...input.aois].sort(byPoiId), limits.maxAoisPerChunk);

  const chunks: Chunk[] = [];
  for (const target of input.targets) {
    batches.forEach((batch, batchIndex) => {
      windows.forEach((window, windowIndex) => {
        chunks.push({
          key: chunkKeyOf(target, batchIndex, windowIndex),
          batchIndex,
          windowIndex,
          aois: batch,
          window,
          target
        });
      });
    });
  }
  return chunks;
};

export const rangeEndingAt = (to: string, days: number): DateRange => ({ from: addDays(to, -(days - 1)), to });
