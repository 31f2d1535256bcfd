import { Bucket, emptyBucket } from "../aggregate/buckets";
import { addVisitRow, buildVisitSeries, VisitSeries } from "../aggregate/visitSeries";
import { floatOrZero } from "../lib/numbers";
import { GoalsSelection, leadsFromMetrics } from "../metrica/goals";
import { ratio } from "../metrics/derived";
import { dayOf, readStatsRows } from "../report/payloads";
import { buildNameIndex, EntityData, JoinResult, resolveJoinKey } from "./resolveJoinKey";

export const NOT_SET = "(not set)";

/** Entity types a group-by-type join reports on; everything else stays unclassified. */
export const JOINABLE_TYPES = ["search", "network"] as const;
export type JoinableType = (typeof JOINABLE_TYPES)[number];

const isJoinableType = (value: string | undefined): value is JoinableType =>
  JOINABLE_TYPES.some((type) => type === value);

export type UtmGroupBy = "type" | "campaign";

export type UtmJoinOptions = {
  days: string[];
  groupBy: UtmGroupBy;
  goals: GoalsSelection;
  /** The report was already filtered to Direct traffic, so its totals are the Direct totals. */
  reportIsDirectOnly: boolean;
  topUnclassifiedLimit?: number;
};

export type UnclassifiedUtm = {
  utm_campaign: string;
  visits: number;
  leads: number;
};

export type UtmJoinMeta = {
  report_is_direct_only: boolean;
  mapped_campaigns: number | null;
  classified_visits: number;
  classified_leads: number;
  total_direct_visits: number | null;
  total_direct_leads: number | null;
  classified_share_pct: number | null;
  classified_leads_share_pct: number | null;
  top_unclassified_utm: UnclassifiedUtm[];
  resolved_via: { embedded_id: number; name: number };
};

export type UtmJoinResult =
  | { available: false; method: "utm_campaign"; reason: "no_data"; warnings: string[] }
  | {
      available: true;
      method: "utm_campaign";
      group_by: UtmGroupBy;
      meta: UtmJoinMeta;
      series: Record<string, VisitSeries>;
      warnings: string[];
    };

const sharePct = (part: number, total: number): number | null => {
  const share = ratio(part, total);
  return share === null ? null : share * 100;
};

/**
 * Splits analytics visits (date x UTM campaign report) across Direct
 * campaigns, or across campaign types, by resolving each UTM tag.
 *
 * Metrics: 0 visits, 1 bounce rate, 2.. goal reaches (see GoalsSelection).
 */
export function joinVisitsByUtm(report: unknown, entities: EntityData, options: UtmJoinOptions): UtmJoinResult {
  const rows = readStatsRows(report, 2, 2);
  if (!rows || !rows.length) {
    return {
      available: false,
      method: "utm_campaign",
      reason: "no_data",
      warnings: ["UTM campaign report has no rows; Direct visits were not split."],
    };
  }

  const index = buildNameIndex(entities);
  const resolved = new Map<string, JoinResult>();
  const resolve = (utm: string): JoinResult => {
    let result = resolved.get(utm);
    if (!result) {
      result = resolveJoinKey(utm, entities, index);
      resolved.set(utm, result);
    }
    return result;
  };

  const targetOf = (result: JoinResult): string | null => {
    if (result.status !== "resolved") return null;
    if (options.groupBy === "campaign") return result.id;
    const type = entities[result.id]?.type;
    return isJoinableType(type) ? type : null;
  };

  const byTarget = new Map<string, Map<string, Bucket>>();
  const unclassified = new Map<string, UnclassifiedUtm>();
  const via = { embedded_id: 0, name: 0 };
  let totalVisits = 0;
  let totalLeads = 0;
  let classifiedVisits = 0;
  let classifiedLeads = 0;

  for (const row of rows) {
    const date = dayOf(row.dimensions[0]);
    if (!date) continue;
    const utmDim = row.dimensions[1];
    const utm = utmDim.name || utmDim.id;
    const visits = floatOrZero(row.metrics[0]);
    const bounceRate = floatOrZero(row.metrics[1]);
    const leads = leadsFromMetrics(row.metrics, 2, options.goals);
    totalVisits += visits;
    totalLeads += leads;

    const result = resolve(utm);
    const target = targetOf(result);
    if (target === null) {
      const key = utm || NOT_SET;
      const entry = unclassified.get(key) ?? { utm_campaign: key, visits: 0, leads: 0 };
      entry.visits += visits;
      entry.leads += leads;
      unclassified.set(key, entry);
      continue;
    }

    if (result.status === "resolved") via[result.via] += 1;
    classifiedVisits += visits;
    classifiedLeads += leads;
    const byDate = byTarget.get(target) ?? new Map<string, Bucket>();
    const bucket = byDate.get(date) ?? emptyBucket();
    addVisitRow(bucket, visits, bounceRate, leads);
    byDate.set(date, bucket);
    byTarget.set(target, byDate);
  }

  const series: Record<string, VisitSeries> = {};
  const targets = options.groupBy === "type" ? [...JOINABLE_TYPES] : [...byTarget.keys()].sort();
  for (const target of targets) {
    series[target] = buildVisitSeries(byTarget.get(target), options.days);
  }

  const directOnly = options.reportIsDirectOnly;
  const topLimit = options.topUnclassifiedLimit ?? 8;
  const warnings: string[] = [];
  if (!directOnly) {
    warnings.push("UTM campaign report is not limited to Direct traffic; Direct totals and shares are not reported.");
  } else if (unclassified.size) {
    const target = options.groupBy === "type" ? "campaign type" : "campaign";
    warnings.push(`${unclassified.size} UTM campaign tag(s) did not match a ${target}.`);
  }
  return {
    available: true,
    method: "utm_campaign",
    group_by: options.groupBy,
    meta: {
      report_is_direct_only: directOnly,
      mapped_campaigns: options.groupBy === "campaign" ? byTarget.size : null,
      classified_visits: classifiedVisits,
      classified_leads: classifiedLeads,
      total_direct_visits: directOnly ? totalVisits : null,
      total_direct_leads: directOnly ? totalLeads : null,
      classified_share_pct: directOnly ? sharePct(classifiedVisits, totalVisits) : null,
      classified_leads_share_pct: directOnly ? sharePct(classifiedLeads, totalLeads) : null,
      top_unclassified_utm: directOnly
        ? [...unclassified.values()].sort((a, b) => b.visits - a.visits).slice(0, Math.max(0, topLimit))
        : [],
      resolved_via: via,
    },
    series,
    warnings,
  };
}
