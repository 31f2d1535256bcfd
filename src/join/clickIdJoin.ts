import { ReportShapeError } from "../lib/errors";
import { ReportRow, parseDelimited } from "../report/parseDelimited";
import { asStr, extractRawAndColumns, isRecord } from "../report/payloads";

export type ClickIdIndexOptions = {
  clickIdField?: string;
  campaignIdField?: string;
  maxRows?: number;
};

export type ClickIdIndexMeta = {
  rows: number;
  columns: string[];
  unique_click_ids: number;
  skipped: number;
};

export type ClickIdIndex = {
  index: Map<string, string>;
  meta: ClickIdIndexMeta;
};

const normalizeKey = (value: unknown): string => asStr(value).trim();

/**
 * Click id -> campaign id from a Direct report that carries click ids.
 * The first row seen for a click id wins.
 */
export function buildClickIdIndex(payload: unknown, options: ClickIdIndexOptions = {}): ClickIdIndex {
  const clickIdField = options.clickIdField ?? "ClickId";
  const campaignIdField = options.campaignIdField ?? "CampaignId";
  const { raw, columns } = extractRawAndColumns(payload);
  const parsed = parseDelimited(raw, { delimiter: "\t", columns, maxRows: options.maxRows ?? 200_000 });

  const index = new Map<string, string>();
  if (!parsed.rows.length) {
    return { index, meta: { rows: 0, columns: parsed.columns, unique_click_ids: 0, skipped: 0 } };
  }
  const missing = [clickIdField, campaignIdField].filter((field) => !parsed.columns.includes(field));
  if (missing.length) {
    throw new ReportShapeError(
      `Click id report is missing columns ${missing.join(", ")} (got: ${parsed.columns.join(", ")})`
    );
  }

  let skipped = 0;
  for (const row of parsed.rows) {
    const clickId = normalizeKey(row[clickIdField]);
    const campaignId = normalizeKey(row[campaignIdField]);
    if (!clickId || !campaignId) {
      skipped += 1;
      continue;
    }
    if (!index.has(clickId)) index.set(clickId, campaignId);
  }

  return {
    index,
    meta: { rows: parsed.rows.length, columns: parsed.columns, unique_click_ids: index.size, skipped },
  };
}

/** `yclid` query parameter of a landing URL, if any. */
export function extractClickIdFromUrl(value: unknown): string | null {
  const url = normalizeKey(value);
  const queryStart = url.indexOf("?");
  if (queryStart < 0) return null;
  const query = url.slice(queryStart + 1).split("#")[0];
  const clickId = (new URLSearchParams(query).get("yclid") ?? "").trim();
  return clickId || null;
}

export type CampaignVisits = { campaign_id: string; visits: number };

/** Visits per campaign, most visited first; ties by id. */
export function summarizeByCampaign(byCampaign: Map<string, number>): CampaignVisits[] {
  return [...byCampaign.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([campaign_id, visits]) => ({ campaign_id, visits }));
}

export type LogsFields = {
  clickIdField?: string;
  startUrlField?: string;
  dateTimeField?: string;
  bannerField?: string;
};

export const DEFAULT_LOGS_FIELDS = {
  clickIdField: "ym:s:yclid",
  startUrlField: "ym:s:startURL",
  dateTimeField: "ym:s:dateTime",
  bannerField: "ym:s:lastDirectClickBanner",
} as const;

export type ClickIdSample = {
  click_id: string;
  campaign_id: string;
  dateTime: string | null;
  startURL: string | null;
};

export type ClickIdJoin = {
  join_mode: "click_id";
  matched_visits: number;
  unmatched_visits: number;
  skipped_no_click_id: number;
  by_campaign: CampaignVisits[];
  sample_matches: ClickIdSample[];
};

const SAMPLE_LIMIT = 10;

/** Attributes visit-level log rows to campaigns through their click id. */
export function joinByClickId(rows: ReportRow[], index: Map<string, string>, fields: LogsFields = {}): ClickIdJoin {
  const clickIdField = fields.clickIdField ?? DEFAULT_LOGS_FIELDS.clickIdField;
  const startUrlField = fields.startUrlField ?? DEFAULT_LOGS_FIELDS.startUrlField;
  const dateTimeField = fields.dateTimeField ?? DEFAULT_LOGS_FIELDS.dateTimeField;

  let matched = 0;
  let unmatched = 0;
  let skipped = 0;
  const byCampaign = new Map<string, number>();
  const samples: ClickIdSample[] = [];

  for (const row of rows) {
    const clickId = normalizeKey(row[clickIdField]) || extractClickIdFromUrl(row[startUrlField]) || "";
    if (!clickId) {
      skipped += 1;
      continue;
    }
    const campaignId = index.get(clickId);
    if (!campaignId) {
      unmatched += 1;
      continue;
    }
    matched += 1;
    byCampaign.set(campaignId, (byCampaign.get(campaignId) ?? 0) + 1);
    if (samples.length < SAMPLE_LIMIT) {
      samples.push({
        click_id: clickId,
        campaign_id: campaignId,
        dateTime: row[dateTimeField] ?? null,
        startURL: row[startUrlField] ?? null,
      });
    }
  }

  return {
    join_mode: "click_id",
    matched_visits: matched,
    unmatched_visits: unmatched,
    skipped_no_click_id: skipped,
    by_campaign: summarizeByCampaign(byCampaign),
    sample_matches: samples,
  };
}

export type BannerCounts = {
  counts: Map<string, number>;
  skipped: number;
};

export function countBanners(rows: ReportRow[], bannerField: string = DEFAULT_LOGS_FIELDS.bannerField): BannerCounts {
  const counts = new Map<string, number>();
  let skipped = 0;
  for (const row of rows) {
    const banner = normalizeKey(row[bannerField]);
    if (!banner) {
      skipped += 1;
      continue;
    }
    counts.set(banner, (counts.get(banner) ?? 0) + 1);
  }
  return { counts, skipped };
}

/** Numeric banner ids, most visited first, for an ads lookup. */
export function bannerIdsToFetch(counts: Map<string, number>, limit = 1000): number[] {
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, Math.max(0, limit))
    .filter(([banner]) => /^\d+$/.test(banner))
    .map(([banner]) => Number(banner));
}

/** Banner id -> campaign id from an ads listing (`{ result: { Ads: [{ Id, CampaignId }] } }`). */
export function bannerCampaignMap(adsPayload: unknown): Map<string, string> {
  const map = new Map<string, string>();
  const result = isRecord(adsPayload) ? adsPayload.result : undefined;
  const ads = isRecord(result) ? result.Ads : undefined;
  if (!Array.isArray(ads)) return map;
  for (const ad of ads) {
    if (!isRecord(ad)) continue;
    if (ad.Id === null || ad.Id === undefined || ad.CampaignId === null || ad.CampaignId === undefined) continue;
    map.set(asStr(ad.Id), asStr(ad.CampaignId));
  }
  return map;
}

export type BannerJoin = {
  join_mode: "banner_id";
  matched_visits: number;
  unmatched_visits: number;
  skipped_no_banner: number;
  by_campaign: CampaignVisits[];
};

export function joinByBannerId(banners: BannerCounts, bannerToCampaign: Map<string, string>): BannerJoin {
  const byCampaign = new Map<string, number>();
  let unmatched = 0;
  for (const [banner, count] of banners.counts) {
    const campaignId = bannerToCampaign.get(banner);
    if (!campaignId) {
      unmatched += count;
      continue;
    }
    byCampaign.set(campaignId, (byCampaign.get(campaignId) ?? 0) + count);
  }
  let matched = 0;
  for (const visits of byCampaign.values()) matched += visits;
  return {
    join_mode: "banner_id",
    matched_visits: matched,
    unmatched_visits: unmatched,
    skipped_no_banner: banners.skipped,
    by_campaign: summarizeByCampaign(byCampaign),
  };
}
