import type { Aoi } from "../../core/aoi/aoi.types";
import type { DateRange, SyncTarget } from "../../core/chunks/chunk.types";
import { aoiPrefix } from "../../core/layout/destinationLayout";
import { validateDateRange } from "../../core/partition/partitionRequests";
import type { ObjectStore } from "../../ports/ObjectStore";
import { createLimiter } from "../../shared/concurrency/limiter";
import { enumerateDates, toEpochDay } from "../../shared/time/calendarDate";

export type AoiCoverage = {
  poiId: string;
  bucket: string;
  prefix: string;
  present: number;
  missingDates: string[];
  missingRanges: DateRange[];
};

export type CoverageReport = {
  range: DateRange;
  expectedDays: number;
  entries: AoiCoverage[];
  complete: number;
  incomplete: number;
};

const DATE_PREFIX = /date=(\d{4}-\d{2}-\d{2})\/?$/;

/**
 * Collapses sorted calendar dates into inclusive runs of consecutive days.
 * Input order does not matter; duplicates are dropped.
 */
export const groupDatesIntoRanges = (dates: readonly string[]): DateRange[] => {
  const sorted = Array.from(new Set(dates)).sort();
  const ranges: DateRange[] = [];
  for (const date of sorted) {
    const last = ranges[ranges.length - 1];
    if (last && toEpochDay(date) === toEpochDay(last.to) + 1) {
      last.to = date;
    } else {
      ranges.push({ from: date, to: date });
    }
  }
  return ranges;
};

/**
 * Reports which `date=` partitions are missing under each AOI's destination
 * prefix, per target bucket. Read-only.
 */
export const buildCoverageReport = async (input: {
  aois: readonly Aoi[];
  range: DateRange;
  targets: readonly SyncTarget[];
  store: ObjectStore;
  concurrency?: number;
}): Promise<CoverageReport> => {
  const range = validateDateRange(input.range);
  const expected = enumerateDates(range.from, range.to);
  const buckets = Array.from(new Set(input.targets.map((target) => target.bucket))).sort();
  const limit = createLimiter(input.concurrency ?? 8);

  const jobs = buckets.flatMap((bucket) => input.aois.map((aoi) => ({ bucket, aoi })));
  const entries = await Promise.all(
    jobs.map(({ bucket, aoi }) =>
      limit(async (): Promise<AoiCoverage> => {
        const prefix = aoiPrefix(aoi);
        const partitions = await input.store.listCommonPrefixes(bucket, prefix);
        const present = new Set<string>();
        for (const partition of partitions) {
          const match = DATE_PREFIX.exec(partition);
          if (match && match[1] >= range.from && match[1] <= range.to) present.add(match[1]);
        }
        const missingDates = expected.filter((date) => !present.has(date));
        return {
          poiId: aoi.poiId,
          bucket,
          prefix,
          present: present.size,
          missingDates,
          missingRanges: groupDatesIntoRanges(missingDates)
        };
      })
    )
  );

  entries.sort((a, b) => (a.bucket === b.bucket ? (a.poiId < b.poiId ? -1 : 1) : a.bucket < b.bucket ? -1 : 1));
  const incomplete = entries.filter((entry) => entry.missingDates.length > 0).length;

  return {
    range,
    expectedDays: expected.length,
    entries,
    complete: entries.length - incomplete,
    incomplete
  };
};

export const formatRange = (range: DateRange): string =>
  range.from === range.to ? range.from : `${range.from}..${range.to}`;
