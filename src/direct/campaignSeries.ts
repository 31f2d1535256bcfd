import { accumulate, Accumulated } from "../aggregate/accumulate";
import { Bucket, valueOf } from "../aggregate/buckets";
import { enumerateDays } from "../lib/dates";
import { cpc, cpm, ctr } from "../metrics/derived";
import { parseDelimited } from "../report/parseDelimited";
import { asStr, extractRawAndColumns, isRecord } from "../report/payloads";
import { CampaignType, CampaignTypeClassifier, keywordClassifier } from "./campaignType";

// CAMPAIGN_PERFORMANCE_REPORT columns; Cost is in account currency.
const DATE = "Date";
const CAMPAIGN_ID = "CampaignId";
const IMPRESSIONS = "Impressions";
const CLICKS = "Clicks";
const COST = "Cost";

export const DIRECT_REPORT_FIELDS = [DATE, CAMPAIGN_ID, IMPRESSIONS, CLICKS, COST];

export type DirectDataset = Accumulated;

export function buildDirectDataset(payload: unknown): DirectDataset {
  const { raw, columns } = extractRawAndColumns(payload);
  const { rows } = parseDelimited(raw, { delimiter: "\t", columns });
  return accumulate(rows, {
    dateField: DATE,
    groupField: CAMPAIGN_ID,
    valueFields: [IMPRESSIONS, CLICKS, COST],
  });
}

/** Campaign id -> name from a campaigns listing (`{ result: { Campaigns: [{ Id, Name }] } }`). */
export function campaignNamesFromPayload(payload: unknown): Record<string, string> {
  const names: Record<string, string> = {};
  const result = isRecord(payload) ? payload.result : undefined;
  const campaigns = isRecord(result) ? result.Campaigns : undefined;
  if (!Array.isArray(campaigns)) return names;
  for (const item of campaigns) {
    if (!isRecord(item) || item.Id === null || item.Id === undefined) continue;
    if (typeof item.Name !== "string") continue;
    names[asStr(item.Id)] = item.Name;
  }
  return names;
}

export type DirectDay = {
  date: string;
  impressions: number;
  clicks: number;
  cost: number;
};

export type DirectTotals = {
  impressions: number;
  clicks: number;
  cost: number;
  cost_micros: number;
  ctr: number | null;
  cpc: number | null;
  cpm: number | null;
};

export type DirectSeries = {
  /** False when the report parsed to no rows at all. */
  available: boolean;
  daily: DirectDay[];
  totals: DirectTotals;
};

function directDays(byDate: Map<string, Bucket> | undefined, days: string[]): DirectDay[] {
  return days.map((date) => {
    const bucket = byDate?.get(date);
    return {
      date,
      impressions: valueOf(bucket, IMPRESSIONS),
      clicks: valueOf(bucket, CLICKS),
      cost: valueOf(bucket, COST),
    };
  });
}

export function directSeries(dataset: DirectDataset, from: string, to: string): DirectSeries {
  const daily = directDays(dataset.byDate, enumerateDays(from, to));
  let impressions = 0;
  let clicks = 0;
  let cost = 0;
  for (const day of daily) {
    impressions += day.impressions;
    clicks += day.clicks;
    cost += day.cost;
  }
  return {
    available: dataset.byDate.size > 0,
    daily,
    totals: {
      impressions,
      clicks,
      cost,
      cost_micros: Math.round(cost * 1_000_000),
      ctr: ctr(clicks, impressions),
      cpc: cpc(cost, clicks),
      cpm: cpm(cost, impressions),
    },
  };
}

const SHORT_NAME_MAX = 38;
const SHORT_NAME_CUT = 35;

/** "Brand - Moscow - search" -> ["Brand", "Moscow"]. */
export function campaignShortName(name: string): [short: string, sub: string] {
  const rawName = (name ?? "").trim();
  if (!rawName) return ["", ""];
  const parts = rawName
    .split(" - ")
    .map((part) => part.trim())
    .filter(Boolean);
  let short = parts[0] ?? rawName;
  const sub = parts[1] ?? "";
  if (short.length > SHORT_NAME_MAX) short = `${short.slice(0, SHORT_NAME_CUT).trimEnd()}…`;
  return [short, sub];
}

export type CampaignEntry = {
  name: string;
  shortName: string;
  subName: string;
  type: CampaignType;
  daily: DirectDay[];
};

export type CampaignData = Record<string, CampaignEntry>;

/**
 * Per-campaign daily rows over `days`. Campaigns with no impressions, clicks
 * or cost in the window are left out.
 */
export function campaignData(
  dataset: DirectDataset,
  days: string[],
  names: Record<string, string> = {},
  classify: CampaignTypeClassifier = keywordClassifier()
): CampaignData {
  const out: CampaignData = {};
  for (const [campaignId, byDate] of dataset.byGroup) {
    const daily = directDays(byDate, days);
    const active = daily.some((day) => day.impressions > 0 || day.clicks > 0 || day.cost > 0);
    if (!active) continue;
    const name = names[campaignId] ?? "";
    const [shortName, subName] = campaignShortName(name);
    out[campaignId] = {
      name: name || `#${campaignId}`,
      shortName: shortName || `#${campaignId}`,
      subName,
      type: classify(name),
      daily,
    };
  }
  return out;
}
