/**
 * UTC calendar-date helpers. Dates travel as `YYYY-MM-DD` strings; arithmetic
 * goes through epoch days so no local timezone ever leaks in.
 */
const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isCalendarDate = (value: string): boolean => parseEpochDay(value) != null;

const parseEpochDay = (value: string): number | undefined => {
  const match = DATE_PATTERN.exec(value);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const roundTrip = new Date(ms);
  if (
    roundTrip.getUTCFullYear() !== year ||
    roundTrip.getUTCMonth() !== month - 1 ||
    roundTrip.getUTCDate() !== day
  ) {
    return undefined;
  }
  return ms / DAY_MS;
};

export const toEpochDay = (value: string): number => {
  const epochDay = parseEpochDay(value);
  if (epochDay == null) {
    throw new Error(`Invalid calendar date: ${value}`);
  }
  return epochDay;
};

export const fromEpochDay = (epochDay: number): string => new Date(epochDay * DAY_MS).toISOString().slice(0, 10);

export const addDays = (date: string, days: number): string => fromEpochDay(toEpochDay(date) + days);

export const daysInclusive = (from: string, to: string): number => toEpochDay(to) - toEpochDay(from) + 1;

export const utcToday = (nowMs: number): string => new Date(nowMs).toISOString().slice(0, 10);

export const enumerateDates = (from: string, to: string): string[] => {
  const start = toEpochDay(from);
  const end = toEpochDay(to);
  const out: string[] = [];
  for (let day = start; day <= end; day += 1) out.push(fromEpochDay(day));
  return out;
};
