import fs from "node:fs";
import path from "node:path";
import { getConfig } from "../config/env";
import { buildDashboardData } from "../dashboard/buildDashboardData";
import { buildCompactResult } from "../dashboard/compactResult";
import { keywordClassifier } from "../direct/campaignType";
import { dashboardSheets, writeSheetsXlsx } from "../export/writeXlsx";
import { readDirectReport, readJsonReport, resolveDateFolder } from "../fs/reportLocator";
import { todayUtc } from "../lib/dates";
import { toJsonSafe } from "../metrics/derived";

function usage() {
  console.log(
    "Usage: npm run dashboard:date -- <date-folder-or-date> --from YYYY-MM-DD --to YYYY-MM-DD " +
      "[--goal-ids 1,2] [--today YYYY-MM-DD] [--out dashboard.json] [--xlsx dashboard.xlsx] [--compact]"
  );
}

function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function getPositionalArgs(): string[] {
  const args = process.argv.slice(2);
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--compact") continue;
    if (arg.startsWith("--")) {
      i += 1;
      continue;
    }
    positionals.push(arg);
  }
  return positionals;
}

const orUndefined = (value: unknown): unknown => (value === null ? undefined : value);

async function main() {
  const dateInput = getPositionalArgs()[0];
  const from = getArg("--from");
  const to = getArg("--to");
  if (!dateInput || !from || !to) {
    usage();
    process.exit(1);
  }

  const config = getConfig();
  const dateFolder = resolveDateFolder(dateInput, config.reportsRoot);
  const utmDirectOnly = readJsonReport(dateFolder, "metricaUtmDirectOnly");
  const utmUnfiltered = readJsonReport(dateFolder, "metricaUtm");
  const utm =
    utmDirectOnly !== null
      ? { payload: utmDirectOnly, reportIsDirectOnly: true }
      : utmUnfiltered !== null
        ? { payload: utmUnfiltered, reportIsDirectOnly: false }
        : null;

  const data = buildDashboardData({
    dateFrom: from,
    dateTo: to,
    today: getArg("--today") ?? todayUtc(),
    goalIds: (getArg("--goal-ids") ?? "").split(",").filter(Boolean),
    classifier: keywordClassifier(config.campaignTypeKeywords),
    limits: {
      topUnclassified: config.joinTopUnclassifiedLimit,
      goalBreakdown: config.goalBreakdownLimit,
      sourcesMaxSeries: config.metricaSourcesMaxSeries,
    },
    reports: {
      direct: readDirectReport(dateFolder),
      campaigns: orUndefined(readJsonReport(dateFolder, "campaigns")),
      metricaDaily: orUndefined(readJsonReport(dateFolder, "metricaDaily")),
      metricaGoals: orUndefined(readJsonReport(dateFolder, "metricaGoals")),
      metricaGoalsList: orUndefined(readJsonReport(dateFolder, "metricaGoalsList")),
      metricaSources: orUndefined(readJsonReport(dateFolder, "metricaSources")),
      metricaDirect: orUndefined(readJsonReport(dateFolder, "metricaDirect")),
      utm,
    },
  });

  for (const warning of data.warnings) console.warn(warning);

  const output = process.argv.includes("--compact") ? buildCompactResult(data) : data;
  const outPath = getArg("--out") ?? path.join(dateFolder, `dashboard_${data.meta.date_from}_${data.meta.date_to}.json`);
  fs.writeFileSync(outPath, JSON.stringify(toJsonSafe(output), null, 2));
  console.log(`Wrote ${outPath}`);

  const xlsxPath = getArg("--xlsx");
  if (xlsxPath) {
    console.log(`Wrote ${writeSheetsXlsx(xlsxPath, dashboardSheets(data))}`);
  }

  console.log({
    dateFrom: data.meta.date_from,
    dateTo: data.meta.date_to,
    campaigns: Object.keys(data.direct.campaign_data).length,
    cost: data.direct.current.totals.cost,
    visits: data.metrica.current.totals.visits,
    warnings: data.warnings.length,
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
