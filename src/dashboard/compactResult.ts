import { DashboardCoverage, DashboardData, DashboardMeta } from "./buildDashboardData";

export type CompactDirectTotals = {
  total_impressions: number;
  total_clicks: number;
  total_cost: number;
  ctr_pct: number | null;
  avg_cpc: number | null;
};

export type CompactMetricaTotals = {
  total_visits: number;
  total_users: number;
  bounce_rate_pct: number | null;
  avg_duration_seconds: number | null;
  avg_page_depth: number | null;
  engaged_visits: number;
  leads_total: number;
};

export type CompactResult = {
  summary: {
    direct: { current: CompactDirectTotals; prev: CompactDirectTotals };
    metrica: { current: CompactMetricaTotals; prev: CompactMetricaTotals };
  };
  meta: DashboardMeta;
  warnings: string[];
  coverage: DashboardCoverage;
};

type DirectBlock = DashboardData["direct"]["current"];
type MetricaBlock = DashboardData["metrica"]["current"];

const directTotals = ({ totals }: DirectBlock): CompactDirectTotals => ({
  total_impressions: totals.impressions,
  total_clicks: totals.clicks,
  total_cost: totals.cost,
  ctr_pct: totals.ctr,
  avg_cpc: totals.cpc,
});

const metricaTotals = ({ totals }: MetricaBlock): CompactMetricaTotals => ({
  total_visits: totals.visits,
  total_users: totals.users,
  bounce_rate_pct: totals.bounce_rate,
  avg_duration_seconds: totals.avg_visit_duration_seconds,
  avg_page_depth: totals.page_depth,
  engaged_visits: totals.engaged,
  leads_total: totals.leads,
});

/** Period totals only; for callers that cannot take the full daily dataset. */
export function buildCompactResult(data: DashboardData): CompactResult {
  return {
    summary: {
      direct: { current: directTotals(data.direct.current), prev: directTotals(data.direct.prev) },
      metrica: { current: metricaTotals(data.metrica.current), prev: metricaTotals(data.metrica.prev) },
    },
    meta: data.meta,
    warnings: data.warnings,
    coverage: data.coverage,
  };
}
