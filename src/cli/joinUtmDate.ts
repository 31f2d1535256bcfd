import { getConfig } from "../config/env";
import { buildDirectDataset, campaignData, campaignNamesFromPayload } from "../direct/campaignSeries";
import { keywordClassifier } from "../direct/campaignType";
import { utmJoinSheets, writeSheetsXlsx } from "../export/writeXlsx";
import { readDirectReport, readJsonReport, resolveDateFolder } from "../fs/reportLocator";
import { UtmGroupBy, joinVisitsByUtm } from "../join/utmJoin";
import { enumerateDays, validateDateRange } from "../lib/dates";
import { goalsSelection } from "../metrica/goals";

function usage() {
  console.log(
    "Usage: npm run join:utm -- <date-folder-or-date> --from YYYY-MM-DD --to YYYY-MM-DD " +
      "[--group-by type|campaign] [--direct-only] [--goal-ids 1,2] [--out join.xlsx]\n" +
      "Reads metrica_utm_direct_only.json with --direct-only, metrica_utm.json otherwise."
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
    if (arg === "--direct-only") continue;
    if (arg.startsWith("--")) {
      i += 1;
      continue;
    }
    positionals.push(arg);
  }
  return positionals;
}

function parseGroupBy(value: string | undefined): UtmGroupBy {
  if (value === undefined || value === "type") return "type";
  if (value === "campaign") return "campaign";
  throw new Error(`Invalid --group-by: ${value} (expected type or campaign)`);
}

async function main() {
  const dateInput = getPositionalArgs()[0];
  const from = getArg("--from");
  const to = getArg("--to");
  if (!dateInput || !from || !to) {
    usage();
    process.exit(1);
  }

  const config = getConfig();
  const range = validateDateRange(from, to);
  const days = enumerateDays(range.from, range.to);
  const directOnly = process.argv.includes("--direct-only");
  const dateFolder = resolveDateFolder(dateInput, config.reportsRoot);

  const utmReport = readJsonReport(dateFolder, directOnly ? "metricaUtmDirectOnly" : "metricaUtm");
  if (utmReport === null) {
    throw new Error(`Missing UTM campaign report in ${dateFolder}`);
  }
  const campaignsPayload = readJsonReport(dateFolder, "campaigns");
  const names = campaignsPayload === null ? {} : campaignNamesFromPayload(campaignsPayload);
  const entities = campaignData(
    buildDirectDataset(readDirectReport(dateFolder)),
    days,
    names,
    keywordClassifier(config.campaignTypeKeywords)
  );

  const result = joinVisitsByUtm(utmReport, entities, {
    days,
    groupBy: parseGroupBy(getArg("--group-by")),
    goals: goalsSelection((getArg("--goal-ids") ?? "").split(",")),
    reportIsDirectOnly: directOnly,
    topUnclassifiedLimit: config.joinTopUnclassifiedLimit,
  });

  for (const warning of result.warnings) console.warn(warning);
  if (!result.available) return;

  console.log("Join complete.");
  console.log(result.meta);
  for (const [group, series] of Object.entries(result.series)) {
    console.log(`${group}: visits=${series.totals.visits} leads=${series.totals.leads}`);
  }

  const outPath = getArg("--out");
  if (outPath) {
    console.log(`Wrote ${writeSheetsXlsx(outPath, utmJoinSheets(result))}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
