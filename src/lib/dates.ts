import { ValidationError } from "./errors";

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export type DateRange = { from: string; to: string };

const toDateString = (value: Date): string => value.toISOString().slice(0, 10);

export function isDateString(value: string | null | undefined): value is string {
  if (!value || !DATE_RE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && toDateString(parsed) === value;
}

export function parseYmd(value: string, field = "date"): string {
  const trimmed = (value ?? "").trim();
  if (!isDateString(trimmed)) {
    throw new ValidationError(`Invalid ${field}: ${JSON.stringify(value)}. Expected YYYY-MM-DD.`);
  }
  return trimmed;
}

export function addDaysUtc(dateIso: string, days: number): string {
  const [y, m, d] = dateIso.split("-").map(Number);
  return toDateString(new Date(Date.UTC(y, m - 1, d) + days * DAY_MS));
}

export function dayCount(from: string, to: string): number {
  const [fy, fm, fd] = from.split("-").map(Number);
  const [ty, tm, td] = to.split("-").map(Number);
  return Math.round((Date.UTC(ty, tm - 1, td) - Date.UTC(fy, fm - 1, fd)) / DAY_MS) + 1;
}

export function enumerateDays(start: string, end: string): string[] {
  const days: string[] = [];
  let cursor = start;
  while (cursor <= end) {
    days.push(cursor);
    cursor = addDaysUtc(cursor, 1);
  }
  return days;
}

export function validateDateRange(from: string | null | undefined, to: string | null | undefined): DateRange {
  if (!from || !to) {
    throw new ValidationError("date_from and date_to are required (YYYY-MM-DD)");
  }
  const range = { from: parseYmd(from, "date_from"), to: parseYmd(to, "date_to") };
  if (range.to < range.from) {
    throw new ValidationError("date_to must be >= date_from");
  }
  return range;
}

/** Previous period of equal length, ending the day before `range.from`. */
export function previousPeriod(range: DateRange): DateRange {
  const days = dayCount(range.from, range.to);
  const to = addDaysUtc(range.from, -1);
  return { from: addDaysUtc(to, -(days - 1)), to };
}

export function todayUtc(now: Date = new Date()): string {
  return toDateString(now);
}

/**
 * Current-day data from both APIs is incomplete, so an end date on or after
 * `today` is moved back to yesterday.
 */
export function clampDateTo(
  range: DateRange,
  today: string
): { range: DateRange; requestedTo: string | null; warnings: string[] } {
  if (range.to < today) return { range, requestedTo: null, warnings: [] };
  const yesterday = addDaysUtc(today, -1);
  const warnings = [
    `date_to adjusted from ${range.to} to ${yesterday} (current day data is often incomplete for Direct/Metrica).`,
  ];
  if (yesterday < range.from) {
    throw new ValidationError("date_to must be >= date_from (after excluding current day).");
  }
  return { range: { from: range.from, to: yesterday }, requestedTo: range.to, warnings };
}
