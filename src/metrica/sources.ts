import { Bucket, emptyBucket } from "../aggregate/buckets";
import { addVisitRow, BOUNCE_RATE, buildVisitSeries, LEADS, VISITS, VisitDay, VisitTotals } from "../aggregate/visitSeries";
import { floatOrZero } from "../lib/numbers";
import { dayOf, readStatsRows, StatsDimension } from "../report/payloads";
import {
  addGoalReaches,
  breakdownIds,
  goalReachesFromMetrics,
  GoalReachesByDate,
  GoalsSelection,
  GoalsSeries,
  goalsSeries,
  leadsFromMetrics,
} from "./goals";

export type TrafficSourceKey = "organic" | "direct" | "ad" | (string & {});

/** Category of a lastsignTrafficSource dimension; matches ids and localized names. */
export function trafficSourceKey(sourceId: string, sourceName: string): TrafficSourceKey {
  const id = (sourceId ?? "").trim().toLowerCase();
  const name = (sourceName ?? "").trim().toLowerCase();
  if (id === "organic" || name.includes("поис")) return "organic";
  if (id === "direct" || name.includes("прям")) return "direct";
  if (id === "ad" || name.includes("реклам")) return "ad";
  return id || name || "unknown";
}

export function isDirectEngine(engineName: string): boolean {
  const lowered = (engineName ?? "").trim().toLowerCase();
  return lowered.includes("директ") || lowered.includes("direct");
}

const engineNameOf = (dimension: StatsDimension): string => dimension.name || dimension.id;

export type SourcePoint = { date: string; visits: number };

export type SourceSeries = {
  key: string;
  label: string;
  kind: "traffic_source" | "source_engine" | "remainder";
  daily: SourcePoint[];
  total_visits: number;
};

export type MetricaSources =
  | { available: false; series: []; meta: { reason: "no_data" | "empty" } }
  | {
      available: true;
      attribution: "lastsign";
      series: SourceSeries[];
      meta: { max_series: number; picked_direct_engine: string | null };
    };

const DEFAULT_LABELS = {
  organic: "Search engines",
  direct: "Direct visits",
  other: "Other sources",
};

const addTo = <K>(map: Map<K, number>, key: K, value: number): void => {
  map.set(key, (map.get(key) ?? 0) + value);
};

const nested = (map: Map<string, Map<string, number>>, key: string): Map<string, number> => {
  let inner = map.get(key);
  if (!inner) {
    inner = new Map();
    map.set(key, inner);
  }
  return inner;
};

function argMax(values: Map<string, number>): string | null {
  let best: string | null = null;
  let bestValue = -Infinity;
  for (const [key, value] of values) {
    if (value > bestValue) {
      best = key;
      bestValue = value;
    }
  }
  return best;
}

/**
 * Compact multi-line "sources" view from a date x lastsignTrafficSource x
 * lastsignSourceEngine visits report: search, the Direct engine, direct
 * visits, the largest other engines and an "other" remainder.
 */
export function buildMetricaSources(days: string[], report: unknown, maxSeries = 8): MetricaSources {
  const rows = readStatsRows(report, 3, 0);
  if (rows === null) return { available: false, series: [], meta: { reason: "no_data" } };

  const byDateTotal = new Map<string, number>();
  const byDateCategory = new Map<string, Map<string, number>>();
  const byDateEngine = new Map<string, Map<string, number>>();
  const engineTotals = new Map<string, number>();
  const engineByCategory = new Map<string, Map<string, number>>();
  const categoryNames = new Map<string, string>();

  for (const row of rows) {
    const date = dayOf(row.dimensions[0]);
    if (!date) continue;
    const source = row.dimensions[1];
    const category = trafficSourceKey(source.id, source.name);
    if (!categoryNames.has(category)) categoryNames.set(category, source.name || category);
    const engine = engineNameOf(row.dimensions[2]) || "—";
    const visits = floatOrZero(row.metrics[0]);

    addTo(byDateTotal, date, visits);
    addTo(nested(byDateCategory, date), category, visits);
    addTo(nested(byDateEngine, date), engine, visits);
    addTo(engineTotals, engine, visits);
    addTo(nested(engineByCategory, engine), category, visits);
  }
  if (!byDateTotal.size) return { available: false, series: [], meta: { reason: "empty" } };

  const adEngines = new Map<string, number>();
  for (const [engine, categories] of engineByCategory) {
    const adVisits = categories.get("ad") ?? 0;
    if (adVisits > 0) adEngines.set(engine, adVisits);
  }
  const directCandidates = new Map([...adEngines].filter(([engine]) => isDirectEngine(engine)));
  const pickedEngine = argMax(directCandidates.size ? directCandidates : adEngines);

  const topEngines = [...engineTotals]
    .filter(([engine, total]) => {
      if (engine === pickedEngine || total <= 0) return false;
      const primary = argMax(engineByCategory.get(engine) ?? new Map());
      return primary !== "organic" && primary !== "direct";
    })
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, maxSeries - 4))
    .map(([engine]) => engine);

  const fromMap = (byDate: Map<string, Map<string, number>>, key: string): SourcePoint[] =>
    days.map((date) => ({ date, visits: byDate.get(date)?.get(key) ?? 0 }));
  const makeSeries = (key: string, label: string, kind: SourceSeries["kind"], daily: SourcePoint[]): SourceSeries => ({
    key,
    label,
    kind,
    daily,
    total_visits: daily.reduce((acc, point) => acc + point.visits, 0),
  });

  const series: SourceSeries[] = [
    makeSeries("organic", categoryNames.get("organic") || DEFAULT_LABELS.organic, "traffic_source", fromMap(byDateCategory, "organic")),
  ];
  if (pickedEngine) {
    series.push(makeSeries(`engine:${pickedEngine}`, pickedEngine, "source_engine", fromMap(byDateEngine, pickedEngine)));
  }
  series.push(
    makeSeries("direct", categoryNames.get("direct") || DEFAULT_LABELS.direct, "traffic_source", fromMap(byDateCategory, "direct"))
  );
  for (const engine of topEngines) {
    series.push(makeSeries(`engine:${engine}`, engine, "source_engine", fromMap(byDateEngine, engine)));
  }

  const shownEngines = pickedEngine ? [pickedEngine, ...topEngines] : topEngines;
  const otherDaily = days.map((date): SourcePoint => {
    const categories = byDateCategory.get(date);
    const engines = byDateEngine.get(date);
    let remainder = (byDateTotal.get(date) ?? 0) - (categories?.get("organic") ?? 0) - (categories?.get("direct") ?? 0);
    for (const engine of shownEngines) remainder -= engines?.get(engine) ?? 0;
    return { date, visits: Math.max(0, remainder) };
  });
  series.push(makeSeries("other", DEFAULT_LABELS.other, "remainder", otherDaily));

  const fixedRank = new Map<string, number>([["organic", 0], ["direct", 2], ["other", 99]]);
  if (pickedEngine) fixedRank.set(`engine:${pickedEngine}`, 1);
  const rank = (item: SourceSeries): number => fixedRank.get(item.key) ?? 10;
  series.sort((a, b) => rank(a) - rank(b) || b.total_visits - a.total_visits);

  return {
    available: true,
    attribution: "lastsign",
    series: series.slice(0, Math.max(0, maxSeries)),
    meta: { max_series: maxSeries, picked_direct_engine: pickedEngine },
  };
}

export type DirectAttributedOptions = {
  days: string[];
  /** Engine picked by buildMetricaSources; without it the whole "ad" category counts. */
  pickedEngine: string | null;
  goals: GoalsSelection;
  goalNames?: Record<string, string>;
};

export type DirectAttributed =
  | { available: false }
  | {
      available: true;
      basis: "sourceEngine" | "trafficSource";
      engine: string | null;
      goals_mode: GoalsSelection["mode"];
      daily: VisitDay[];
      totals: VisitTotals;
      /** Per-goal Direct-attributed reaches for the selection's breakdown goals. */
      goals: GoalsSeries;
    };

/**
 * Direct-attributed visits and leads from a date x trafficSource x sourceEngine
 * report. Metrics: 0 visits, 1 bounce rate, 2.. goals (see GoalsSelection).
 */
export function buildDirectAttributed(report: unknown, options: DirectAttributedOptions): DirectAttributed {
  const rows = readStatsRows(report, 3, 2);
  if (rows === null) return { available: false };
  const { pickedEngine, goals } = options;

  const byDate = new Map<string, Bucket>();
  const goalReaches: GoalReachesByDate = new Map();
  for (const row of rows) {
    const date = dayOf(row.dimensions[0]);
    if (!date) continue;
    const source = row.dimensions[1];
    const isDirect = pickedEngine
      ? engineNameOf(row.dimensions[2]) === pickedEngine
      : trafficSourceKey(source.id, source.name) === "ad";
    if (!isDirect) continue;

    const visits = floatOrZero(row.metrics[0]);
    const bucket = byDate.get(date) ?? emptyBucket([VISITS, LEADS], [BOUNCE_RATE]);
    addVisitRow(bucket, visits, floatOrZero(row.metrics[1]), leadsFromMetrics(row.metrics, 2, goals));
    byDate.set(date, bucket);
    for (const [goalId, reaches] of goalReachesFromMetrics(row.metrics, 2, goals)) {
      addGoalReaches(goalReaches, date, goalId, reaches);
    }
  }

  const { daily, totals } = buildVisitSeries(byDate, options.days);
  return {
    available: true,
    basis: pickedEngine ? "sourceEngine" : "trafficSource",
    engine: pickedEngine,
    goals_mode: goals.mode,
    daily,
    totals,
    goals: goalsSeries(options.days, breakdownIds(goals), goalReaches, options.goalNames),
  };
}
