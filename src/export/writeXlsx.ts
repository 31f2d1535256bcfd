import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { DashboardData } from "../dashboard/buildDashboardData";
import { UtmJoinResult } from "../join/utmJoin";

export type Cell = string | number | boolean | null;

export type Sheet = {
  name: string;
  rows: Cell[][];
};

// Excel caps sheet names at 31 characters and rejects : \ / ? * [ ]
export function sheetName(name: string): string {
  return name.replace(/[:\\/?*[\]]/g, "_").slice(0, 31) || "Sheet";
}

export function writeSheetsXlsx(outPath: string, sheets: Sheet[]): string {
  const outDir = path.dirname(outPath);
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }
  const workbook = XLSX.utils.book_new();
  const used = new Set<string>();
  for (const sheet of sheets) {
    let name = sheetName(sheet.name);
    for (let i = 2; used.has(name); i += 1) name = sheetName(`${sheet.name.slice(0, 27)} (${i})`);
    used.add(name);
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(sheet.rows), name);
  }
  XLSX.writeFile(workbook, outPath);
  return outPath;
}

export function dashboardSheets(data: DashboardData): Sheet[] {
  const direct: Cell[][] = [["date", "impressions", "clicks", "cost"]];
  for (const day of data.direct.current.daily) direct.push([day.date, day.impressions, day.clicks, day.cost]);

  const metrica: Cell[][] = [["date", "visits", "users", "bounce_rate", "page_depth", "avg_visit_duration_seconds", "engaged", "leads"]];
  for (const day of data.metrica.current.daily) {
    metrica.push([
      day.date,
      day.visits,
      day.users,
      day.bounce_rate,
      day.page_depth,
      day.avg_visit_duration_seconds,
      day.engaged,
      day.leads,
    ]);
  }

  const campaigns: Cell[][] = [["campaign_id", "name", "type", "impressions", "clicks", "cost"]];
  const from = data.meta.date_from;
  const to = data.meta.date_to;
  for (const [campaignId, entry] of Object.entries(data.direct.campaign_data)) {
    const inRange = entry.daily.filter((day) => day.date >= from && day.date <= to);
    campaigns.push([
      campaignId,
      entry.name,
      entry.type,
      inRange.reduce((acc, day) => acc + day.impressions, 0),
      inRange.reduce((acc, day) => acc + day.clicks, 0),
      inRange.reduce((acc, day) => acc + day.cost, 0),
    ]);
  }

  const warnings: Cell[][] = [["warning"], ...data.warnings.map((warning): Cell[] => [warning])];
  return [
    { name: "direct", rows: direct },
    { name: "metrica", rows: metrica },
    { name: "campaigns", rows: campaigns },
    { name: "warnings", rows: warnings },
  ];
}

export function utmJoinSheets(result: UtmJoinResult): Sheet[] {
  if (!result.available) return [{ name: "join", rows: [["available", false], ["reason", result.reason]] }];
  const daily: Cell[][] = [["group", "date", "visits", "bounce_rate", "engaged", "leads"]];
  for (const [group, series] of Object.entries(result.series)) {
    for (const day of series.daily) daily.push([group, day.date, day.visits, day.bounceRate, day.engaged, day.leads]);
  }
  const unclassified: Cell[][] = [["utm_campaign", "visits", "leads"]];
  for (const entry of result.meta.top_unclassified_utm) unclassified.push([entry.utm_campaign, entry.visits, entry.leads]);
  return [
    { name: "daily", rows: daily },
    { name: "unclassified", rows: unclassified },
  ];
}
