import { describe, expect, it } from "vitest";
import { metricaSeries, mergeGoalReaches, parseMetricaDaily } from "../src/metrica/daily";
import {
  goalReachesFromMetrics,
  goalsSelection,
  goalsSeries,
  goalTotals,
  leadsFromMetrics,
  parseGoalsReport,
  topGoalIds,
} from "../src/metrica/goals";
import { buildDirectAttributed, buildMetricaSources, isDirectEngine, trafficSourceKey } from "../src/metrica/sources";

const D1 = "2026-01-01";
const D2 = "2026-01-02";

describe("goals selection", () => {
  it("switches to selected mode only for explicit goal ids", () => {
    expect(goalsSelection([" 7 ", "7", ""])).toEqual({ mode: "selected", goalIds: ["7"] });
    expect(goalsSelection([], ["x"])).toEqual({ mode: "all", breakdownGoalIds: ["x"] });
    expect(goalsSelection(null)).toEqual({ mode: "all", breakdownGoalIds: [] });
  });

  it("reads leads and per-goal reaches from metric columns", () => {
    const metrics = [10, 20, 3, 1, 2];
    const all = goalsSelection([], ["a", "b"]);
    const selected = goalsSelection(["a", "b"]);

    expect(leadsFromMetrics(metrics, 2, all)).toBe(3);
    expect([...goalReachesFromMetrics(metrics, 2, all)]).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
    expect(leadsFromMetrics(metrics, 2, selected)).toBe(4);
    expect([...goalReachesFromMetrics(metrics, 2, selected)]).toEqual([
      ["a", 3],
      ["b", 1],
    ]);
  });
});

describe("goals report", () => {
  const goal = (date: string, id: string, name: string, reaches: number) => ({
    dimensions: [{ name: date }, { id, name }],
    metrics: [reaches],
  });
  const report = parseGoalsReport({
    data: [goal(D1, "7", "Lead form", 2), goal(D1, "8", "Call", 1), goal(D2, "7", "", 3), goal(D2, "", "ghost", 5)],
  });

  it("collects names and reaches per day", () => {
    expect(report.goalNames).toEqual({ "7": "Lead form", "8": "Call" });
    expect(report.byDateGoal.get(D1)?.get("7")).toBe(2);
    expect(report.byDateGoal.get(D2)?.get("7")).toBe(3);
  });

  it("ranks goals by reaches", () => {
    expect(topGoalIds(goalTotals(report.byDateGoal, [D1, D2]))).toEqual(["7", "8"]);
    expect(topGoalIds(goalTotals(report.byDateGoal, [D1, D2], ["9"]))).toEqual(["7", "8", "9"]);
    expect(topGoalIds(goalTotals(report.byDateGoal, [D1, D2]), 1)).toEqual(["7"]);
  });

  it("builds per-goal series with fallback names", () => {
    const series = goalsSeries([D1, D2], ["7", "9"], report.byDateGoal, report.goalNames);
    expect(series.available).toBe(true);
    expect(series.goals[0]).toEqual({
      id: "7",
      name: "Lead form",
      daily: [
        { date: D1, reaches: 2 },
        { date: D2, reaches: 3 },
      ],
      total: 5,
    });
    expect(series.goals[1].name).toBe("Goal 9");
    expect(series.goals[1].total).toBe(0);
    expect(goalsSeries([D1], [], report.byDateGoal).available).toBe(false);
  });
});

describe("metrica daily", () => {
  const payload = {
    data: [
      { dimensions: [{ name: D1 }], metrics: [10, 8, 20, 2, 60, 1] },
      { dimensions: [{ name: D1 }], metrics: [30, 25, 40, 4, 120, 2] },
      { dimensions: [{ name: D2 }], metrics: [0, 0, 0, 0, 0] },
    ],
  };

  it("weights rates by visits and sums selected goals into leads", () => {
    const daily = parseMetricaDaily(payload, goalsSelection(["g1"]));
    expect(daily.available).toBe(true);
    expect(daily.goalReaches.get(D1)?.get("g1")).toBe(3);
    expect(daily.goalReaches.has(D2)).toBe(false);

    const series = metricaSeries(daily.byDate, D1, "2026-01-03");
    expect(series.available).toBe(true);
    const first = series.daily[0];
    expect(first.visits).toBe(40);
    expect(first.users).toBe(33);
    expect(first.bounce_rate).toBe(35);
    expect(first.page_depth).toBe(3.5);
    expect(first.avg_visit_duration_seconds).toBe(105);
    expect(first.engaged).toBeCloseTo(26, 9);
    expect(first.leads).toBe(3);
    expect(series.daily[2]).toEqual({
      date: "2026-01-03",
      visits: 0,
      users: 0,
      bounce_rate: 0,
      page_depth: 0,
      avg_visit_duration_seconds: 0,
      engaged: 0,
      leads: 0,
    });
    expect(series.totals.visits).toBe(40);
    expect(series.totals.bounce_rate).toBe(35);
    expect(series.totals.leads).toBe(3);
  });

  it("adds all-goals reaches as leads", () => {
    const daily = parseMetricaDaily(payload, goalsSelection([]));
    expect(metricaSeries(daily.byDate, D1, D1).totals.leads).toBe(0);
    mergeGoalReaches(daily, new Map([[D1, new Map([["7", 2]])]]));
    expect(metricaSeries(daily.byDate, D1, D1).totals.leads).toBe(2);
    expect(daily.goalReaches.get(D1)?.get("7")).toBe(2);
  });

  it("has no rate totals without visits", () => {
    expect(parseMetricaDaily({}, goalsSelection([])).available).toBe(false);
    const empty = metricaSeries(new Map(), D1, D1);
    expect(empty.available).toBe(false);
    expect(empty.totals.bounce_rate).toBeNull();
  });
});

const ORGANIC = { id: "organic", name: "Переходы из поисковых систем" };
const AD = { id: "ad", name: "Переходы по рекламе" };
const DIRECT = { id: "direct", name: "Прямые заходы" };
const SOCIAL = { id: "social", name: "Переходы из социальных сетей" };
const engine = (name: string) => ({ id: "", name });

describe("traffic source classification", () => {
  it("matches ids and localized names", () => {
    expect(trafficSourceKey("organic", "")).toBe("organic");
    expect(trafficSourceKey("", "Прямые заходы")).toBe("direct");
    expect(trafficSourceKey("", "Переходы по РЕКЛАМЕ")).toBe("ad");
    expect(trafficSourceKey("referral", "")).toBe("referral");
    expect(trafficSourceKey("", "")).toBe("unknown");
    expect(isDirectEngine("Яндекс.Директ")).toBe(true);
    expect(isDirectEngine("Yandex Direct")).toBe(true);
    expect(isDirectEngine("ВКонтакте")).toBe(false);
  });
});

describe("buildMetricaSources", () => {
  const row = (date: string, source: { id: string; name: string }, engineName: string, visits: number) => ({
    dimensions: [{ name: date }, source, engine(engineName)],
    metrics: [visits],
  });
  const report = {
    data: [
      row(D1, ORGANIC, "Яндекс", 50),
      row(D1, ORGANIC, "Google", 30),
      row(D1, AD, "Яндекс.Директ", 20),
      row(D1, AD, "ВКонтакте", 10),
      row(D1, DIRECT, "", 15),
      row(D1, SOCIAL, "Telegram", 8),
      row(D2, AD, "Яндекс.Директ", 5),
      row(D2, AD, "ВКонтакте", 4),
      row(D2, ORGANIC, "Яндекс", 10),
    ],
  };

  it("orders search, the Direct engine, direct visits, other engines and the remainder", () => {
    const sources = buildMetricaSources([D1, D2], report);
    if (!sources.available) throw new Error("expected sources");

    expect(sources.meta).toEqual({ max_series: 8, picked_direct_engine: "Яндекс.Директ" });
    expect(sources.series.map((s) => s.key)).toEqual([
      "organic",
      "engine:Яндекс.Директ",
      "direct",
      "engine:ВКонтакте",
      "engine:Telegram",
      "other",
    ]);
    expect(sources.series[0].label).toBe("Переходы из поисковых систем");
    expect(sources.series[0].daily.map((p) => p.visits)).toEqual([80, 10]);
    expect(sources.series[1].total_visits).toBe(25);
    expect(sources.series[5].daily.map((p) => p.visits)).toEqual([0, 0]);
  });

  it("moves engines beyond the series budget into the remainder", () => {
    const sources = buildMetricaSources([D1, D2], report, 5);
    if (!sources.available) throw new Error("expected sources");

    expect(sources.series.map((s) => s.key)).toEqual([
      "organic",
      "engine:Яндекс.Директ",
      "direct",
      "engine:ВКонтакте",
      "other",
    ]);
    expect(sources.series[4].daily.map((p) => p.visits)).toEqual([8, 0]);
  });

  it("reports why nothing is shown", () => {
    expect(buildMetricaSources([D1], {})).toEqual({ available: false, series: [], meta: { reason: "no_data" } });
    expect(buildMetricaSources([D1], { data: [] })).toEqual({ available: false, series: [], meta: { reason: "empty" } });
  });
});

describe("buildDirectAttributed", () => {
  const row = (date: string, source: { id: string; name: string }, engineName: string, metrics: number[]) => ({
    dimensions: [{ name: date }, source, engine(engineName)],
    metrics,
  });
  const report = {
    data: [
      row(D1, AD, "Яндекс.Директ", [10, 20, 1]),
      row(D1, AD, "ВКонтакте", [5, 0, 0]),
      row(D2, AD, "Яндекс.Директ", [10, 40, 1]),
      row(D2, ORGANIC, "Яндекс", [100, 50, 9]),
    ],
  };
  const goals = goalsSelection(["g1"]);

  it("keeps only the picked engine", () => {
    const result = buildDirectAttributed(report, {
      days: [D1, D2],
      pickedEngine: "Яндекс.Директ",
      goals,
      goalNames: { g1: "Order" },
    });
    if (!result.available) throw new Error("expected attribution");

    expect(result.basis).toBe("sourceEngine");
    expect(result.goals_mode).toBe("selected");
    expect(result.totals.visits).toBe(20);
    expect(result.totals.leads).toBe(2);
    expect(result.totals.bounce_rate).toBe(30);
    expect(result.goals.goals[0].name).toBe("Order");
    expect(result.goals.goals[0].total).toBe(2);
  });

  it("falls back to the whole ad category", () => {
    const result = buildDirectAttributed(report, { days: [D1, D2], pickedEngine: null, goals });
    if (!result.available) throw new Error("expected attribution");

    expect(result.basis).toBe("trafficSource");
    expect(result.totals.visits).toBe(25);
    expect(result.totals.bounce_rate).toBe(24);
  });

  it("is unavailable without a data list", () => {
    expect(buildDirectAttributed({}, { days: [D1], pickedEngine: null, goals })).toEqual({ available: false });
  });
});
