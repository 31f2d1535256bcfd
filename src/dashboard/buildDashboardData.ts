import { CampaignData, campaignData, buildDirectDataset, campaignNamesFromPayload, DirectSeries, directSeries } from "../direct/campaignSeries";
import { CampaignTypeClassifier, keywordClassifier } from "../direct/campaignType";
import { UtmJoinResult, joinVisitsByUtm } from "../join/utmJoin";
import { clampDateTo, DateRange, enumerateDays, previousPeriod, validateDateRange } from "../lib/dates";
import { MetricaSeries, mergeGoalReaches, metricaSeries, parseMetricaDaily } from "../metrica/daily";
import {
  goalsSelection,
  GoalsSelection,
  GoalsSeries,
  goalsSeries,
  goalTotals,
  normalizeGoalIds,
  parseGoalsReport,
  topGoalIds,
} from "../metrica/goals";
import { buildDirectAttributed, buildMetricaSources, DirectAttributed, MetricaSources } from "../metrica/sources";
import { kpiDeltas, Trend } from "../metrics/derived";
import { readGoalNames } from "../report/payloads";

/** Report payloads the caller already fetched; absent ones are treated as unavailable. */
export type DashboardReports = {
  /** CAMPAIGN_PERFORMANCE_REPORT download: `{ raw, columns? }`. */
  direct: unknown;
  campaigns?: unknown;
  metricaDaily?: unknown;
  /** date x goal, sumGoalReachesAny; used when no goal ids are given. */
  metricaGoals?: unknown;
  metricaGoalsList?: unknown;
  metricaSources?: unknown;
  metricaDirect?: unknown;
  utm?: { payload: unknown; reportIsDirectOnly: boolean } | null;
};

export type DashboardLimits = {
  topUnclassified: number;
  goalBreakdown: number;
  sourcesMaxSeries: number;
};

export type DashboardInput = {
  dateFrom: string;
  dateTo: string;
  today: string;
  goalIds?: string[];
  reports: DashboardReports;
  classifier?: CampaignTypeClassifier;
  limits?: Partial<DashboardLimits>;
  warnings?: string[];
};

export type DailyCoverage = {
  count: number;
  first_date: string | null;
  last_date: string | null;
};

export type DashboardCoverage = {
  direct_current_daily: DailyCoverage;
  direct_prev_daily: DailyCoverage;
  metrica_current_daily: DailyCoverage;
  metrica_prev_daily: DailyCoverage;
  metrica_sources: { available: boolean; series: number };
  metrica_goals: { available: boolean; goals: number };
  metrica_direct: { available: boolean };
  metrica_direct_split: { available: boolean; method: string | null };
  metrica_direct_by_campaign: { available: boolean; method: string | null };
  metrica_goals_direct: { available: boolean; goals: number };
};

export type DashboardMeta = {
  date_from: string;
  date_to: string;
  requested_date_to: string | null;
  prev_date_from: string;
  prev_date_to: string;
  goals_mode: GoalsSelection["mode"];
  goal_ids: string[];
  goals_resolved_count: number;
};

export type DashboardData = {
  meta: DashboardMeta;
  coverage: DashboardCoverage;
  direct: { current: DirectSeries; prev: DirectSeries; campaign_data: CampaignData };
  metrica: {
    current: MetricaSeries;
    prev: MetricaSeries;
    sources: MetricaSources;
    goals: GoalsSeries;
    direct: DirectAttributed;
    direct_split: UtmJoinResult | { available: false };
    direct_by_campaign: UtmJoinResult | { available: false };
  };
  kpi_deltas: Record<string, Trend>;
  warnings: string[];
};

const DEFAULT_LIMITS: DashboardLimits = { topUnclassified: 8, goalBreakdown: 7, sourcesMaxSeries: 8 };

export const KPI_KEYS = ["impressions", "clicks", "cost", "visits", "leads"];

function dailyCoverage(daily: { date: string }[]): DailyCoverage {
  return {
    count: daily.length,
    first_date: daily[0]?.date ?? null,
    last_date: daily[daily.length - 1]?.date ?? null,
  };
}

const NO_GOALS: GoalsSeries = { available: false, goal_ids: [], goals: [] };

/**
 * Assembles the dashboard dataset for a date range and the equal-length
 * period before it. Data is kept for the whole fetched window so a client can
 * re-slice it; `current`/`prev` are the two fixed periods.
 */
export function buildDashboardData(input: DashboardInput): DashboardData {
  const limits = { ...DEFAULT_LIMITS, ...input.limits };
  const warnings = [...(input.warnings ?? [])];
  const clamped = clampDateTo(validateDateRange(input.dateFrom, input.dateTo), input.today);
  warnings.push(...clamped.warnings);
  const range: DateRange = clamped.range;
  const prev = previousPeriod(range);
  const allDays = enumerateDays(prev.from, range.to);
  const currentDays = enumerateDays(range.from, range.to);
  const { reports } = input;

  const dataset = buildDirectDataset(reports.direct);
  const names = reports.campaigns === undefined ? {} : campaignNamesFromPayload(reports.campaigns);
  const campaigns = campaignData(dataset, allDays, names, input.classifier ?? keywordClassifier());
  const directCurrent = directSeries(dataset, range.from, range.to);
  const directPrev = directSeries(dataset, prev.from, prev.to);

  const userGoalIds = normalizeGoalIds(input.goalIds ?? []);
  let goals = goalsSelection(userGoalIds);
  const daily = parseMetricaDaily(reports.metricaDaily, goals);
  let goalNames = reports.metricaGoalsList === undefined ? {} : readGoalNames(reports.metricaGoalsList);
  let effectiveGoalIds = userGoalIds;
  if (goals.mode === "all" && reports.metricaGoals !== undefined) {
    const parsed = parseGoalsReport(reports.metricaGoals);
    goalNames = { ...goalNames, ...parsed.goalNames };
    mergeGoalReaches(daily, parsed.byDateGoal);
    effectiveGoalIds = Object.keys(parsed.goalNames);
    const totals = goalTotals(daily.goalReaches, currentDays, effectiveGoalIds);
    goals = goalsSelection([], topGoalIds(totals, limits.goalBreakdown));
  }
  const metricaGoals = effectiveGoalIds.length
    ? goalsSeries(allDays, effectiveGoalIds, daily.goalReaches, goalNames)
    : NO_GOALS;

  const sources: MetricaSources =
    reports.metricaSources === undefined
      ? { available: false, series: [], meta: { reason: "no_data" } }
      : buildMetricaSources(allDays, reports.metricaSources, limits.sourcesMaxSeries);
  const pickedEngine = sources.available ? sources.meta.picked_direct_engine : null;

  const direct: DirectAttributed =
    reports.metricaDirect === undefined
      ? { available: false }
      : buildDirectAttributed(reports.metricaDirect, { days: allDays, pickedEngine, goals, goalNames });

  let directSplit: DashboardData["metrica"]["direct_split"] = { available: false };
  let directByCampaign: DashboardData["metrica"]["direct_by_campaign"] = { available: false };
  if (reports.utm && Object.keys(campaigns).length) {
    const utmOptions = {
      days: allDays,
      goals,
      reportIsDirectOnly: reports.utm.reportIsDirectOnly,
      topUnclassifiedLimit: limits.topUnclassified,
    };
    directSplit = joinVisitsByUtm(reports.utm.payload, campaigns, { ...utmOptions, groupBy: "type" });
    directByCampaign = joinVisitsByUtm(reports.utm.payload, campaigns, { ...utmOptions, groupBy: "campaign" });
  }

  const metricaCurrent = metricaSeries(daily.byDate, range.from, range.to);
  const metricaPrev = metricaSeries(daily.byDate, prev.from, prev.to);

  const kpis = (d: DirectSeries, m: MetricaSeries): Record<string, number> => ({
    impressions: d.totals.impressions,
    clicks: d.totals.clicks,
    cost: d.totals.cost,
    visits: m.totals.visits,
    leads: m.totals.leads,
  });

  const goalsDirect = direct.available ? direct.goals : NO_GOALS;
  return {
    meta: {
      date_from: range.from,
      date_to: range.to,
      requested_date_to: clamped.requestedTo,
      prev_date_from: prev.from,
      prev_date_to: prev.to,
      goals_mode: goals.mode,
      goal_ids: userGoalIds,
      goals_resolved_count: metricaGoals.goals.length,
    },
    coverage: {
      direct_current_daily: dailyCoverage(directCurrent.daily),
      direct_prev_daily: dailyCoverage(directPrev.daily),
      metrica_current_daily: dailyCoverage(metricaCurrent.daily),
      metrica_prev_daily: dailyCoverage(metricaPrev.daily),
      metrica_sources: { available: sources.available, series: sources.series.length },
      metrica_goals: { available: metricaGoals.available, goals: metricaGoals.goals.length },
      metrica_direct: { available: direct.available },
      metrica_direct_split: {
        available: directSplit.available,
        method: directSplit.available ? directSplit.method : null,
      },
      metrica_direct_by_campaign: {
        available: directByCampaign.available,
        method: directByCampaign.available ? directByCampaign.method : null,
      },
      metrica_goals_direct: { available: goalsDirect.available, goals: goalsDirect.goals.length },
    },
    direct: { current: directCurrent, prev: directPrev, campaign_data: campaigns },
    metrica: {
      current: metricaCurrent,
      prev: metricaPrev,
      sources,
      goals: metricaGoals,
      direct,
      direct_split: directSplit,
      direct_by_campaign: directByCampaign,
    },
    kpi_deltas: kpiDeltas(kpis(directCurrent, metricaCurrent), kpis(directPrev, metricaPrev), KPI_KEYS),
    warnings,
  };
}
