import fs from "node:fs";
import path from "node:path";
import { getConfig } from "../config/env";

export const REPORT_FILES = {
  directCampaignPerformance: "direct_campaign_performance.tsv",
  campaigns: "campaigns.json",
  metricaDaily: "metrica_daily.json",
  metricaGoals: "metrica_goals.json",
  metricaGoalsList: "metrica_goals_list.json",
  metricaSources: "metrica_sources.json",
  metricaDirect: "metrica_direct.json",
  metricaUtm: "metrica_utm.json",
  metricaUtmDirectOnly: "metrica_utm_direct_only.json",
} as const;

export type ReportFileKey = keyof typeof REPORT_FILES;

export function resolveDateFolder(inputPathOrDate: string, root: string = getConfig().reportsRoot): string {
  const isDate = /^\d{4}-\d{2}-\d{2}$/.test(inputPathOrDate);
  if (!isDate) {
    return inputPathOrDate;
  }
  return path.join(root, inputPathOrDate);
}

function ensureFolder(dateFolder: string): void {
  if (!fs.existsSync(dateFolder)) {
    throw new Error(`Folder not found: ${dateFolder}`);
  }
}

export function getDirectCampaignTsv(dateFolder: string): string {
  ensureFolder(dateFolder);
  const filePath = path.join(dateFolder, REPORT_FILES.directCampaignPerformance);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Missing Direct campaign performance report: ${filePath}`);
  }
  return filePath;
}

/** Raw Direct report wrapped the way report downloads return it. */
export function readDirectReport(dateFolder: string): { raw: string } {
  return { raw: fs.readFileSync(getDirectCampaignTsv(dateFolder), "utf8") };
}

/** Parsed JSON of an optional report file; null when the file is absent. */
export function readJsonReport(dateFolder: string, key: ReportFileKey): unknown {
  ensureFolder(dateFolder);
  const filePath = path.join(dateFolder, REPORT_FILES[key]);
  if (!fs.existsSync(filePath)) return null;
  const text = fs.readFileSync(filePath, "utf8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
