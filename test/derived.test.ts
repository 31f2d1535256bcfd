import { describe, expect, it } from "vitest";
import { cpc, cpm, ctr, kpiDeltas, periodDelta, ratio, toJsonSafe, trend } from "../src/metrics/derived";

describe("derived metrics", () => {
  it("computes ctr, cpc and cpm", () => {
    expect(ctr(3, 30)).toBeCloseTo(10, 9);
    expect(cpc(300, 3)).toBe(100);
    expect(cpm(300, 30)).toBe(10000);
  });

  it("returns null for a zero or non-finite denominator", () => {
    expect(ctr(3, 0)).toBeNull();
    expect(cpc(10, 0)).toBeNull();
    expect(ratio(Number.NaN, 2)).toBeNull();
    expect(ratio(0, 0)).toBeNull();
  });
});

describe("trend", () => {
  it("compares the last value with the first", () => {
    expect(trend([])).toBeNull();
    expect(trend([0, 0])).toEqual({ kind: "zero", pct: 0 });
    expect(trend([0, 5])).toEqual({ kind: "infinite" });
    expect(trend([4, 5, 6])).toEqual({ kind: "percent", pct: 50 });
  });

  it("reports declines as negative percentages", () => {
    expect(periodDelta(50, 100)).toEqual({ kind: "percent", pct: -50 });
    expect(trend([4, 2])).toEqual({ kind: "percent", pct: -50 });
  });
});

describe("kpiDeltas", () => {
  it("treats missing keys as zero", () => {
    expect(kpiDeltas({ clicks: 20, cost: 5 }, { clicks: 10 }, ["clicks", "cost", "visits"])).toEqual({
      clicks: { kind: "percent", pct: 100 },
      cost: { kind: "infinite" },
      visits: { kind: "zero", pct: 0 },
    });
  });
});

describe("toJsonSafe", () => {
  it("replaces non-finite numbers with null at any depth", () => {
    expect(toJsonSafe({ a: Number.NaN, b: [1, Number.POSITIVE_INFINITY], c: { d: "x", e: null } })).toEqual({
      a: null,
      b: [1, null],
      c: { d: "x", e: null },
    });
  });
});
