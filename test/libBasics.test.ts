import { describe, expect, it } from "vitest";
import { firstSuccess } from "../src/lib/candidates";
import {
  addDaysUtc,
  clampDateTo,
  dayCount,
  enumerateDays,
  isDateString,
  previousPeriod,
  validateDateRange,
} from "../src/lib/dates";
import { AllCandidatesFailedError, describeError, ValidationError } from "../src/lib/errors";
import { floatOrZero, sum } from "../src/lib/numbers";
import { TtlCache } from "../src/lib/ttlCache";

describe("floatOrZero", () => {
  it("parses localized report numbers", () => {
    expect(floatOrZero("1 234,5")).toBe(1234.5);
    expect(floatOrZero("1\u00a0000")).toBe(1000);
    expect(floatOrZero(" 7.25 ")).toBe(7.25);
    expect(floatOrZero(3)).toBe(3);
  });

  it("falls back to zero", () => {
    expect(floatOrZero("abc")).toBe(0);
    expect(floatOrZero("")).toBe(0);
    expect(floatOrZero(Number.NaN)).toBe(0);
    expect(floatOrZero(null)).toBe(0);
    expect(floatOrZero({})).toBe(0);
  });

  it("accepts only decimal notation", () => {
    expect(floatOrZero("0x1A")).toBe(0);
    expect(floatOrZero("0b11")).toBe(0);
    expect(floatOrZero("Infinity")).toBe(0);
    expect(floatOrZero("1e3")).toBe(1000);
    expect(floatOrZero("-.5")).toBe(-0.5);
  });

  it("sums", () => {
    expect(sum([1, 2, 3.5])).toBe(6.5);
    expect(sum([])).toBe(0);
  });
});

describe("dates", () => {
  it("validates calendar dates", () => {
    expect(isDateString("2026-02-28")).toBe(true);
    expect(isDateString("2026-02-30")).toBe(false);
    expect(isDateString("2026-2-1")).toBe(false);
  });

  it("enumerates across month ends", () => {
    expect(enumerateDays("2026-01-30", "2026-02-02")).toEqual(["2026-01-30", "2026-01-31", "2026-02-01", "2026-02-02"]);
    expect(enumerateDays("2026-01-02", "2026-01-01")).toEqual([]);
    expect(addDaysUtc("2024-02-28", 1)).toBe("2024-02-29");
    expect(dayCount("2026-01-01", "2026-01-07")).toBe(7);
  });

  it("builds a previous period of equal length", () => {
    expect(previousPeriod({ from: "2026-01-10", to: "2026-01-16" })).toEqual({ from: "2026-01-03", to: "2026-01-09" });
    expect(previousPeriod({ from: "2026-03-01", to: "2026-03-01" })).toEqual({ from: "2026-02-28", to: "2026-02-28" });
  });

  it("rejects missing, malformed and reversed ranges", () => {
    expect(() => validateDateRange(undefined, "2026-01-01")).toThrow(ValidationError);
    expect(() => validateDateRange("2026-01-01", "2026/01/02")).toThrow("Invalid date_to");
    expect(() => validateDateRange("2026-01-05", "2026-01-01")).toThrow("date_to must be >= date_from");
  });

  it("moves an end date on or after today back to yesterday", () => {
    const result = clampDateTo({ from: "2026-03-01", to: "2026-03-05" }, "2026-03-05");
    expect(result.range).toEqual({ from: "2026-03-01", to: "2026-03-04" });
    expect(result.requestedTo).toBe("2026-03-05");
    expect(result.warnings).toEqual([
      "date_to adjusted from 2026-03-05 to 2026-03-04 (current day data is often incomplete for Direct/Metrica).",
    ]);
    expect(clampDateTo({ from: "2026-03-01", to: "2026-03-04" }, "2026-03-05")).toEqual({
      range: { from: "2026-03-01", to: "2026-03-04" },
      requestedTo: null,
      warnings: [],
    });
    expect(() => clampDateTo({ from: "2026-03-05", to: "2026-03-05" }, "2026-03-05")).toThrow(ValidationError);
  });
});

describe("TtlCache", () => {
  it("expires entries after the ttl", async () => {
    let now = 0;
    const cache = new TtlCache<string>(1000, () => now);
    cache.set("a", "x");
    now = 999;
    expect(cache.get("a")).toBe("x");
    now = 1000;
    expect(cache.get("a")).toBeUndefined();

    let calls = 0;
    const load = async () => {
      calls += 1;
      return `v${calls}`;
    };
    expect(await cache.getOrSet("b", load)).toBe("v1");
    expect(await cache.getOrSet("b", load)).toBe("v1");
    now = 2000;
    expect(await cache.getOrSet("b", load)).toBe("v2");
    expect(calls).toBe(2);
  });

  it("rejects a non-positive ttl", () => {
    expect(() => new TtlCache<string>(0)).toThrow("ttlMs must be > 0");
  });
});

describe("firstSuccess", () => {
  it("returns the first candidate that resolves and keeps earlier failures", async () => {
    const result = await firstSuccess([
      { label: "a", run: async () => Promise.reject(new Error("boom")) },
      { label: "b", run: async () => 2 },
      { label: "c", run: async () => 3 },
    ]);
    expect(result.value).toBe(2);
    expect(result.label).toBe("b");
    expect(result.index).toBe(1);
    expect(result.failures.map((failure) => failure.label)).toEqual(["a"]);
  });

  it("throws with every error when all candidates fail", async () => {
    const failing = firstSuccess([
      { label: "a", run: async () => Promise.reject(new Error("first")) },
      { label: "b", run: async () => Promise.reject(new ValidationError("second")) },
    ]);
    await expect(failing).rejects.toBeInstanceOf(AllCandidatesFailedError);
    await expect(failing).rejects.toThrow("All 2 candidates failed; last error: ValidationError: second");
  });
});

describe("describeError", () => {
  it("formats errors and error-like values", () => {
    expect(describeError(new Error("bad"))).toBe("Error: bad");
    expect(describeError({ status: 403, message: "denied" })).toBe("status 403 denied");
    expect(describeError({})).toBe("unknown error");
    expect(describeError("plain")).toBe("plain");
  });
});
