import { accumulate } from "../aggregate/accumulate";
import { valueOf } from "../aggregate/buckets";
import { ValidationError } from "../lib/errors";
import { floatOrZero } from "../lib/numbers";
import { cpc, cpm, ctr } from "../metrics/derived";
import { extractRawAndColumns, dayOf, readStatsRows } from "../report/payloads";
import { parseDelimited } from "../report/parseDelimited";
import { buildNameIndex, EntityData, resolveJoinKey } from "./resolveJoinKey";

export type MetricaVisitPoint = { date: string; visits: number };

export type JoinedDay = {
  date: string;
  impressions: number;
  clicks: number;
  cost: number;
  visits: number;
};

export type JoinedTotals = Omit<JoinedDay, "date">;

export type DirectVsMetricaInput = {
  /** Direct campaign performance report blob (`{ raw, columns? }` or `{ result: {...} }`). */
  directReport: unknown;
  metricaDaily: MetricaVisitPoint[];
  utmCampaign?: string;
  /** Skips UTM resolution when the campaign is already known. */
  campaignId?: string;
  entities?: EntityData;
  /** Rectangular output over these days; otherwise the union of report dates. */
  days?: string[];
};

export type DirectVsMetricaResult =
  | {
      available: false;
      method: "utm_campaign";
      reason: "unresolved_utm" | "no_data";
      utm_campaign: string | null;
      campaign_id: string | null;
      warnings: string[];
    }
  | {
      available: true;
      method: "utm_campaign";
      utm_campaign: string | null;
      campaign_id: string;
      daily: JoinedDay[];
      totals: JoinedTotals;
      derived: { ctr: number | null; cpc: number | null; cpm: number | null };
      warnings: string[];
    };

const DIRECT_FIELDS = ["Impressions", "Clicks", "Cost"];

/** Visits per day of a date-dimension stats report (metric 0). */
export function visitsFromStatsReport(payload: unknown): MetricaVisitPoint[] {
  const byDate = new Map<string, number>();
  for (const row of readStatsRows(payload, 1, 1) ?? []) {
    const date = dayOf(row.dimensions[0]);
    if (!date) continue;
    byDate.set(date, (byDate.get(date) ?? 0) + floatOrZero(row.metrics[0]));
  }
  return [...byDate.entries()].map(([date, visits]) => ({ date, visits }));
}

/** Resolved campaign id, or null when the UTM tag matches no known campaign. */
function campaignIdFor(input: DirectVsMetricaInput, utm: string): string | null {
  const explicit = (input.campaignId ?? "").trim();
  if (explicit) return explicit;
  if (!utm) throw new ValidationError("campaignId or utmCampaign is required");
  const entities = input.entities ?? {};
  const result = resolveJoinKey(utm, entities, buildNameIndex(entities));
  return result.status === "resolved" ? result.id : null;
}

/** Joins one campaign's Direct spend with the analytics visits tagged for it, day by day. */
export function joinDirectVsMetricaByUtm(input: DirectVsMetricaInput): DirectVsMetricaResult {
  const utm = (input.utmCampaign ?? "").trim();
  const campaignId = campaignIdFor(input, utm);
  if (campaignId === null) {
    return {
      available: false,
      method: "utm_campaign",
      reason: "unresolved_utm",
      utm_campaign: utm,
      campaign_id: null,
      warnings: [`utm_campaign '${utm}' does not match a known campaign`],
    };
  }

  const { raw, columns } = extractRawAndColumns(input.directReport);
  const parsed = parseDelimited(raw, { delimiter: "\t", columns });
  const hasCampaignColumn = parsed.columns.includes("CampaignId");
  const directRows = hasCampaignColumn
    ? parsed.rows.filter((row) => (row.CampaignId ?? "").trim() === campaignId)
    : parsed.rows;
  const direct = accumulate(directRows, { dateField: "Date", valueFields: DIRECT_FIELDS }).byDate;

  const visitsByDate = new Map<string, number>();
  for (const point of input.metricaDaily) {
    const date = String(point.date ?? "").slice(0, 10);
    if (!date) continue;
    visitsByDate.set(date, (visitsByDate.get(date) ?? 0) + floatOrZero(point.visits));
  }

  if (!direct.size && !visitsByDate.size) {
    return {
      available: false,
      method: "utm_campaign",
      reason: "no_data",
      utm_campaign: utm || null,
      campaign_id: campaignId,
      warnings: [`No Direct or analytics rows for campaign ${campaignId}.`],
    };
  }

  const days = input.days ?? [...new Set([...direct.keys(), ...visitsByDate.keys()])].sort();
  const daily = days.map((date): JoinedDay => {
    const bucket = direct.get(date);
    return {
      date,
      impressions: valueOf(bucket, "Impressions"),
      clicks: valueOf(bucket, "Clicks"),
      cost: valueOf(bucket, "Cost"),
      visits: visitsByDate.get(date) ?? 0,
    };
  });

  const totals: JoinedTotals = { impressions: 0, clicks: 0, cost: 0, visits: 0 };
  for (const day of daily) {
    totals.impressions += day.impressions;
    totals.clicks += day.clicks;
    totals.cost += day.cost;
    totals.visits += day.visits;
  }

  const warnings: string[] = [];
  if (!direct.size) warnings.push(`Direct report has no rows for campaign ${campaignId}.`);
  if (!visitsByDate.size) warnings.push("No analytics visits were supplied for the campaign.");

  return {
    available: true,
    method: "utm_campaign",
    utm_campaign: utm || null,
    campaign_id: campaignId,
    daily,
    totals,
    derived: {
      ctr: ctr(totals.clicks, totals.impressions),
      cpc: cpc(totals.cost, totals.clicks),
      cpm: cpm(totals.cost, totals.impressions),
    },
    warnings,
  };
}
