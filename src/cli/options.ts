import { InvalidArgumentError } from "commander";
import type { DateRange, SyncTarget } from "../core/chunks/chunk.types";
import { ConfigError } from "../core/errors/syncErrors";
import { rangeEndingAt, validateDateRange } from "../core/partition/partitionRequests";
import { parseSyncTarget } from "../shared/config/runtime.config";
import { addDays, isCalendarDate, utcToday } from "../shared/time/calendarDate";

export type RangeOptions = {
  from?: string;
  to?: string;
  backfillDays?: number;
};

export const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
};

export const parseDateOption = (value: string): string => {
  if (!isCalendarDate(value)) throw new InvalidArgumentError("Must be a YYYY-MM-DD date.");
  return value;
};

export const collectTargets = (value: string, previous: SyncTarget[]): SyncTarget[] => {
  try {
    return [...previous, parseSyncTarget(value)];
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
};

/**
 * `--to` defaults to yesterday (UTC); `--from` defaults to `--to`, or to
 * `--backfill-days` days ending at `--to`.
 */
export const resolveRange = (options: RangeOptions, nowMs: number): DateRange => {
  if (options.from != null && options.backfillDays != null) {
    throw new ConfigError("Use either --from or --backfill-days, not both");
  }
  const to = options.to ?? addDays(utcToday(nowMs), -1);
  if (options.backfillDays != null) return validateDateRange(rangeEndingAt(to, options.backfillDays));
  return validateDateRange({ from: options.from ?? to, to });
};

export const defaultRunId = (range: DateRange): string => `sync-${range.from}-${range.to}`;
