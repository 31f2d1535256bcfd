import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env";
import { DEFAULT_CAMPAIGN_TYPE_KEYWORDS } from "../src/direct/campaignType";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      reportsRoot: "./reports",
      joinTopUnclassifiedLimit: 8,
      goalBreakdownLimit: 7,
      metricaSourcesMaxSeries: 8,
      campaignTypeKeywords: DEFAULT_CAMPAIGN_TYPE_KEYWORDS,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      REPORTS_ROOT: " /data/reports ",
      JOIN_TOP_UNCLASSIFIED_LIMIT: "0",
      CAMPAIGN_TYPE_KEYWORDS: '{"search":["search"],"network":["display","rsya"]}',
    });
    expect(config.reportsRoot).toBe("/data/reports");
    expect(config.joinTopUnclassifiedLimit).toBe(0);
    expect(config.campaignTypeKeywords).toEqual({ search: ["search"], network: ["display", "rsya"] });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ METRICA_SOURCES_MAX_SERIES: "0" })).toThrow(
      "Invalid METRICA_SOURCES_MAX_SERIES: expected an integer >= 1, got '0'. Fix it in .env.local"
    );
    expect(() => loadConfig({ GOAL_BREAKDOWN_LIMIT: "2.5" })).toThrow("Invalid GOAL_BREAKDOWN_LIMIT");
    expect(() => loadConfig({ CAMPAIGN_TYPE_KEYWORDS: "[1]" })).toThrow("Invalid CAMPAIGN_TYPE_KEYWORDS: expected an object");
    expect(() => loadConfig({ CAMPAIGN_TYPE_KEYWORDS: '{"search":"x"}' })).toThrow(
      "Invalid CAMPAIGN_TYPE_KEYWORDS: 'search' must be a list of strings"
    );
    expect(() => loadConfig({ CAMPAIGN_TYPE_KEYWORDS: "{" })).toThrow("Invalid CAMPAIGN_TYPE_KEYWORDS: not JSON");
  });
});
