import { addValue, addWeighted, Bucket, emptyBucket, engagedVisits, sumBuckets, valueOf, weightedAverage } from "../aggregate/buckets";
import { enumerateDays } from "../lib/dates";
import { floatOrZero } from "../lib/numbers";
import { dayOf, readStatsRows } from "../report/payloads";
import { addGoalReaches, GoalReachesByDate, GoalsSelection } from "./goals";

// ym:s:visits, ym:s:users, ym:s:bounceRate, ym:s:pageDepth, ym:s:avgVisitDurationSeconds
export const BASE_METRICS = ["visits", "users", "bounceRate", "pageDepth", "avgVisitDurationSeconds"] as const;
const SUMMED = ["visits", "users", "leads"];
const WEIGHTED = ["bounceRate", "pageDepth", "avgVisitDurationSeconds"];

export type MetricaDaily = {
  /** The report carried a data list, even an empty one. */
  available: boolean;
  byDate: Map<string, Bucket>;
  goalReaches: GoalReachesByDate;
};

function bucketFor(byDate: Map<string, Bucket>, date: string): Bucket {
  let bucket = byDate.get(date);
  if (!bucket) {
    bucket = emptyBucket(SUMMED, WEIGHTED);
    byDate.set(date, bucket);
  }
  return bucket;
}

/**
 * Site-wide daily report (date dimension, base metrics). In "selected" goals
 * mode the goal reaches follow the base metrics and add up to leads.
 */
export function parseMetricaDaily(payload: unknown, goals: GoalsSelection): MetricaDaily {
  const rows = readStatsRows(payload, 1, 1);
  const byDate = new Map<string, Bucket>();
  const goalReaches: GoalReachesByDate = new Map();
  for (const row of rows ?? []) {
    const date = dayOf(row.dimensions[0]);
    if (!date) continue;
    const [visits, users, bounceRate, pageDepth, avgDuration] = BASE_METRICS.map((_, i) => floatOrZero(row.metrics[i]));
    const bucket = bucketFor(byDate, date);
    addValue(bucket, "visits", visits);
    addValue(bucket, "users", users);
    addWeighted(bucket, "bounceRate", bounceRate, visits);
    addWeighted(bucket, "pageDepth", pageDepth, visits);
    addWeighted(bucket, "avgVisitDurationSeconds", avgDuration, visits);
    if (goals.mode === "selected") {
      goals.goalIds.forEach((goalId, i) => {
        const index = BASE_METRICS.length + i;
        if (index >= row.metrics.length) return;
        const reaches = floatOrZero(row.metrics[index]);
        addGoalReaches(goalReaches, date, goalId, reaches);
        addValue(bucket, "leads", reaches);
      });
    }
  }
  return { available: rows !== null, byDate, goalReaches };
}

/** Folds an all-goals report into the daily data: every reach counts as a lead. */
export function mergeGoalReaches(daily: MetricaDaily, byDateGoal: GoalReachesByDate): void {
  for (const [date, perGoal] of byDateGoal) {
    const bucket = bucketFor(daily.byDate, date);
    for (const [goalId, reaches] of perGoal) {
      addGoalReaches(daily.goalReaches, date, goalId, reaches);
      addValue(bucket, "leads", reaches);
    }
  }
}

export type MetricaDay = {
  date: string;
  visits: number;
  users: number;
  bounce_rate: number;
  page_depth: number;
  avg_visit_duration_seconds: number;
  engaged: number;
  leads: number;
};

export type MetricaTotals = {
  visits: number;
  users: number;
  engaged: number;
  leads: number;
  bounce_rate: number | null;
  page_depth: number | null;
  avg_visit_duration_seconds: number | null;
};

export type MetricaSeries = {
  available: boolean;
  daily: MetricaDay[];
  totals: MetricaTotals;
};

export function metricaSeries(byDate: Map<string, Bucket>, from: string, to: string): MetricaSeries {
  const days = enumerateDays(from, to);
  const daily = days.map((date): MetricaDay => {
    const bucket = byDate.get(date);
    const visits = valueOf(bucket, "visits");
    const bounceRate = weightedAverage(bucket, "bounceRate", 0);
    return {
      date,
      visits,
      users: valueOf(bucket, "users"),
      bounce_rate: bounceRate,
      page_depth: weightedAverage(bucket, "pageDepth", 0),
      avg_visit_duration_seconds: weightedAverage(bucket, "avgVisitDurationSeconds", 0),
      engaged: engagedVisits(visits, bounceRate),
      leads: valueOf(bucket, "leads"),
    };
  });

  const total = sumBuckets(days.map((date) => byDate.get(date)).filter((b): b is Bucket => !!b));
  return {
    available: byDate.size > 0,
    daily,
    totals: {
      visits: valueOf(total, "visits"),
      users: valueOf(total, "users"),
      engaged: daily.reduce((acc, day) => acc + day.engaged, 0),
      leads: valueOf(total, "leads"),
      bounce_rate: weightedAverage(total, "bounceRate"),
      page_depth: weightedAverage(total, "pageDepth"),
      avg_visit_duration_seconds: weightedAverage(total, "avgVisitDurationSeconds"),
    },
  };
}
