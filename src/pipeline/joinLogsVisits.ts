import {
  bannerCampaignMap,
  BannerJoin,
  bannerIdsToFetch,
  buildClickIdIndex,
  ClickIdIndexMeta,
  ClickIdJoin,
  countBanners,
  DEFAULT_LOGS_FIELDS,
  joinByBannerId,
  joinByClickId,
  LogsFields,
} from "../join/clickIdJoin";
import { describeError, ValidationError } from "../lib/errors";
import { parseDelimited, ReportRow } from "../report/parseDelimited";
import { extractRawAndColumns } from "../report/payloads";

export type LogsDownload = {
  rows: ReportRow[];
  meta: { rows: number; downloaded_parts: number[]; columns: string[] };
};

/** Downloads log parts in order until `maxRows` rows are collected. */
export async function downloadLogsRows(
  partNumbers: number[],
  downloadPart: (partNumber: number) => Promise<unknown>,
  options: { maxRows?: number } = {}
): Promise<LogsDownload> {
  const maxRows = options.maxRows ?? 200_000;
  const rows: ReportRow[] = [];
  const downloaded: number[] = [];
  let columns: string[] | null = null;

  for (const partNumber of partNumbers) {
    if (rows.length >= maxRows) break;
    const payload = await downloadPart(partNumber);
    const extracted = extractRawAndColumns(payload);
    if (!columns && extracted.columns?.length) columns = extracted.columns;
    const parsed = parseDelimited(extracted.raw, {
      delimiter: "\t",
      columns,
      maxRows: maxRows - rows.length,
    });
    if (!columns && parsed.columns.length) columns = parsed.columns;
    rows.push(...parsed.rows);
    downloaded.push(partNumber);
  }

  return { rows, meta: { rows: rows.length, downloaded_parts: downloaded, columns: columns ?? [] } };
}

export type LogsJoinSources = {
  /** Direct report with a click id column; optional because many accounts cannot build it. */
  fetchClickIdReport?: () => Promise<unknown>;
  fetchAds: (bannerIds: number[]) => Promise<unknown>;
};

export type LogsJoinResult =
  | (ClickIdJoin & { direct: ClickIdIndexMeta; warnings: string[] })
  | (BannerJoin & {
      direct: { ads_fetched: number; ads_matched: number; click_index_error: string | null };
      warnings: string[];
    });

const unmatchedWarning = (unmatched: number, key: string): string[] =>
  unmatched ? [`${unmatched} visit(s) did not match a Direct campaign by ${key}.`] : [];

/**
 * Attributes visit-level log rows to Direct campaigns: through click ids when
 * a click id report is available, otherwise through the last clicked banner.
 */
export async function joinLogsVisits(
  rows: ReportRow[],
  sources: LogsJoinSources,
  options: { fields?: LogsFields; clickIndexMaxRows?: number; bannerLimit?: number } = {}
): Promise<LogsJoinResult> {
  let clickIndexError: string | null = null;
  if (sources.fetchClickIdReport) {
    try {
      const report = await sources.fetchClickIdReport();
      const { index, meta } = buildClickIdIndex(report, { maxRows: options.clickIndexMaxRows });
      if (index.size) {
        const joined = joinByClickId(rows, index, options.fields);
        return { ...joined, direct: meta, warnings: unmatchedWarning(joined.unmatched_visits, "click id") };
      }
      clickIndexError = "click id report has no rows";
    } catch (err) {
      clickIndexError = describeError(err);
    }
  }

  const banners = countBanners(rows, options.fields?.bannerField ?? DEFAULT_LOGS_FIELDS.bannerField);
  if (!banners.counts.size) {
    throw new ValidationError(
      "No join keys found in logs rows. Include a Direct attribution field (e.g. ym:s:lastDirectClickBanner) or provide a click id report."
    );
  }
  const bannerIds = bannerIdsToFetch(banners.counts, options.bannerLimit ?? 1000);
  const bannerToCampaign = bannerCampaignMap(await sources.fetchAds(bannerIds));
  const joined = joinByBannerId(banners, bannerToCampaign);
  const warnings = clickIndexError
    ? [`Click id join unavailable (${clickIndexError}); visits joined by last clicked banner.`]
    : [];
  warnings.push(...unmatchedWarning(joined.unmatched_visits, "banner"));
  return {
    ...joined,
    direct: { ads_fetched: bannerIds.length, ads_matched: bannerToCampaign.size, click_index_error: clickIndexError },
    warnings,
  };
}
