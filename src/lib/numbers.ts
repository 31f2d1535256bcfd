const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Tolerant numeric coercion for report cells.
 * Accepts "1 234,5", "1 234.5" and plain numbers; anything unparseable is 0.
 */
export function floatOrZero(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value !== "string") return 0;
  const cleaned = value.replace(/\u00a0/g, "").replace(/ /g, "").trim().replace(/,/g, ".");
  if (!DECIMAL_RE.test(cleaned)) return 0;
  const num = Number(cleaned);
  return Number.isFinite(num) ? num : 0;
}

export function sum(values: number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}
