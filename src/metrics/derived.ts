export type Trend =
  | { kind: "zero"; pct: 0 }
  | { kind: "infinite" }
  | { kind: "percent"; pct: number };

/** numerator / denominator, or null when the ratio is undefined. */
export function ratio(numerator: number, denominator: number): number | null {
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator)) return null;
  if (denominator === 0) return null;
  return numerator / denominator;
}

const scaled = (value: number | null, factor: number): number | null => (value === null ? null : value * factor);

export const ctr = (clicks: number, impressions: number): number | null => scaled(ratio(clicks, impressions), 100);

export const cpc = (cost: number, clicks: number): number | null => ratio(cost, clicks);

export const cpm = (cost: number, impressions: number): number | null => scaled(ratio(cost, impressions), 1000);

/** Change from `previous` to `current`; growth from a zero baseline is reported as "infinite". */
export function periodDelta(current: number, previous: number): Trend {
  if (previous === 0) {
    return current === 0 ? { kind: "zero", pct: 0 } : { kind: "infinite" };
  }
  return { kind: "percent", pct: (current / previous - 1) * 100 };
}

/** Last value against the first one. */
export function trend(values: readonly number[]): Trend | null {
  if (!values.length) return null;
  return periodDelta(values[values.length - 1], values[0]);
}

export function kpiDeltas(
  current: Record<string, number>,
  previous: Record<string, number>,
  keys: readonly string[]
): Record<string, Trend> {
  const out: Record<string, Trend> = {};
  for (const key of keys) out[key] = periodDelta(current[key] ?? 0, previous[key] ?? 0);
  return out;
}

/** Replaces NaN/Infinity with null so results serialize without losing "undefined" vs "zero". */
export function toJsonSafe(value: unknown): unknown {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toJsonSafe);
  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, v]) => [key, toJsonSafe(v)]));
  }
  return value;
}
