import { floatOrZero } from "../lib/numbers";
import { dayOf, readStatsRows } from "../report/payloads";

export type GoalsSelection =
  | { mode: "selected"; goalIds: string[] }
  | { mode: "all"; breakdownGoalIds: string[] };

/** Explicit goal ids select "selected" mode; none means every goal counts as a lead. */
export function goalsSelection(goalIds: readonly string[] | null | undefined, breakdownGoalIds: readonly string[] = []): GoalsSelection {
  const ids = normalizeGoalIds(goalIds ?? []);
  if (ids.length) return { mode: "selected", goalIds: ids };
  return { mode: "all", breakdownGoalIds: normalizeGoalIds(breakdownGoalIds) };
}

export function normalizeGoalIds(ids: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of ids) {
    const id = String(raw).trim();
    if (id && !out.includes(id)) out.push(id);
  }
  return out;
}

/** Goal ids whose reaches are reported per goal in the given selection. */
export function breakdownIds(goals: GoalsSelection): string[] {
  return goals.mode === "selected" ? goals.goalIds : goals.breakdownGoalIds;
}

/**
 * Leads carried by a stats row's metrics starting at `offset`.
 * "selected": the sum of the per-goal reaches; "all": the any-goal total.
 */
export function leadsFromMetrics(metrics: readonly unknown[], offset: number, goals: GoalsSelection): number {
  if (goals.mode === "all") return floatOrZero(metrics[offset]);
  let leads = 0;
  for (let i = 0; i < goals.goalIds.length; i += 1) {
    leads += floatOrZero(metrics[offset + i]);
  }
  return leads;
}

/**
 * Per-goal reaches carried by a stats row, keyed by goal id. In "all" mode the
 * any-goal total sits at `offset` and the breakdown follows it.
 */
export function goalReachesFromMetrics(
  metrics: readonly unknown[],
  offset: number,
  goals: GoalsSelection
): Map<string, number> {
  const out = new Map<string, number>();
  const start = goals.mode === "selected" ? offset : offset + 1;
  breakdownIds(goals).forEach((id, i) => out.set(id, floatOrZero(metrics[start + i])));
  return out;
}

export type GoalReachesByDate = Map<string, Map<string, number>>;

export type GoalsReport = {
  goalNames: Record<string, string>;
  byDateGoal: GoalReachesByDate;
};

/**
 * Date x goal reaches report (metric 0: any-goal reaches), with the goal
 * names the report carries.
 */
export function parseGoalsReport(payload: unknown): GoalsReport {
  const goalNames: Record<string, string> = {};
  const byDateGoal: GoalReachesByDate = new Map();
  for (const row of readStatsRows(payload, 2, 1) ?? []) {
    const date = dayOf(row.dimensions[0]);
    const goal = row.dimensions[1];
    if (!date || !goal.id) continue;
    if (goal.name) goalNames[goal.id] = goal.name;
    addGoalReaches(byDateGoal, date, goal.id, floatOrZero(row.metrics[0]));
  }
  return { goalNames, byDateGoal };
}

export function addGoalReaches(byDateGoal: GoalReachesByDate, date: string, goalId: string, reaches: number): void {
  const perGoal = byDateGoal.get(date) ?? new Map<string, number>();
  perGoal.set(goalId, (perGoal.get(goalId) ?? 0) + reaches);
  byDateGoal.set(date, perGoal);
}

/** Reaches per goal over `days`; `goalIds` are listed first, in order, even when unreached. */
export function goalTotals(
  byDateGoal: GoalReachesByDate,
  days: readonly string[],
  goalIds: readonly string[] = []
): Map<string, number> {
  const totals = new Map<string, number>(goalIds.map((id) => [id, 0]));
  for (const date of days) {
    for (const [goalId, reaches] of byDateGoal.get(date) ?? []) {
      totals.set(goalId, (totals.get(goalId) ?? 0) + reaches);
    }
  }
  return totals;
}

/** Most-reached goals first; ties keep the order of `totals`. */
export function topGoalIds(totals: Map<string, number>, limit = 7): string[] {
  return [...totals.entries()]
    .filter(([goalId]) => goalId)
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, limit))
    .map(([goalId]) => goalId);
}

export type GoalDay = { date: string; reaches: number };

export type GoalSeries = {
  id: string;
  name: string;
  daily: GoalDay[];
  total: number;
};

export type GoalsSeries = {
  available: boolean;
  goal_ids: string[];
  goals: GoalSeries[];
};

export function goalsSeries(
  days: readonly string[],
  goalIds: readonly string[],
  byDateGoal: GoalReachesByDate,
  names: Record<string, string> = {}
): GoalsSeries {
  const goals = goalIds.map((id): GoalSeries => {
    const daily = days.map((date) => ({ date, reaches: byDateGoal.get(date)?.get(id) ?? 0 }));
    return {
      id,
      name: names[id] || `Goal ${id}`,
      daily,
      total: daily.reduce((acc, day) => acc + day.reaches, 0),
    };
  });
  return { available: goals.length > 0, goal_ids: [...goalIds], goals };
}
