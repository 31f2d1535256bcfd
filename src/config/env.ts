import { config as loadEnv } from "dotenv";
import { CampaignTypeKeywords, DEFAULT_CAMPAIGN_TYPE_KEYWORDS } from "../direct/campaignType";

loadEnv({ path: ".env.local" });

export type AppConfig = {
  reportsRoot: string;
  joinTopUnclassifiedLimit: number;
  goalBreakdownLimit: number;
  metricaSourcesMaxSeries: number;
  campaignTypeKeywords: CampaignTypeKeywords;
};

type Env = Record<string, string | undefined>;

const DEFAULT_REPORTS_ROOT = "./reports";

function intEnv(env: Env, name: string, fallback: number, min: number): number {
  const raw = (env[name] ?? "").trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: expected an integer >= ${min}, got '${raw}'. Fix it in .env.local`);
  }
  return value;
}

function keywordsEnv(env: Env, name: string): CampaignTypeKeywords {
  const raw = (env[name] ?? "").trim();
  if (!raw) return DEFAULT_CAMPAIGN_TYPE_KEYWORDS;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid ${name}: not JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Invalid ${name}: expected an object like {"search":["..."],"network":["..."]}`);
  }
  const keywords: CampaignTypeKeywords = {};
  for (const type of ["search", "network"] as const) {
    const list: unknown = Object.getOwnPropertyDescriptor(parsed, type)?.value;
    if (list === undefined) continue;
    if (!Array.isArray(list) || !list.every((item): item is string => typeof item === "string")) {
      throw new Error(`Invalid ${name}: '${type}' must be a list of strings`);
    }
    keywords[type] = list;
  }
  return keywords;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    reportsRoot: (env.REPORTS_ROOT ?? "").trim() || DEFAULT_REPORTS_ROOT,
    joinTopUnclassifiedLimit: intEnv(env, "JOIN_TOP_UNCLASSIFIED_LIMIT", 8, 0),
    goalBreakdownLimit: intEnv(env, "GOAL_BREAKDOWN_LIMIT", 7, 0),
    metricaSourcesMaxSeries: intEnv(env, "METRICA_SOURCES_MAX_SERIES", 8, 1),
    campaignTypeKeywords: keywordsEnv(env, "CAMPAIGN_TYPE_KEYWORDS"),
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cached) return cached;
  cached = loadConfig();
  return cached;
}
