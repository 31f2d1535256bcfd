import { describe, expect, it, vi } from "vitest";
import { AllCandidatesFailedError, ValidationError } from "../src/lib/errors";
import { createCampaignCache, withCampaignCache } from "../src/pipeline/campaignCache";
import { collectUtmReport } from "../src/pipeline/collectUtmReport";
import { downloadLogsRows, joinLogsVisits } from "../src/pipeline/joinLogsVisits";

describe("collectUtmReport", () => {
  it("prefers the engine-filtered report", async () => {
    const fetchFiltered = vi.fn(async () => ({ data: ["filtered"] }));
    const fetchUnfiltered = vi.fn(async () => ({ data: ["all"] }));
    const result = await collectUtmReport({ fetchFiltered, fetchUnfiltered }, { pickedEngine: "Яндекс.Директ" });

    expect(result).toEqual({ payload: { data: ["filtered"] }, reportIsDirectOnly: true, warnings: [] });
    expect(fetchFiltered).toHaveBeenCalledWith("Яндекс.Директ");
    expect(fetchUnfiltered).not.toHaveBeenCalled();
  });

  it("falls back to the unfiltered report with a warning", async () => {
    const result = await collectUtmReport(
      {
        fetchFiltered: async () => {
          throw new Error("status 400");
        },
        fetchUnfiltered: async () => ({ data: [] }),
      },
      { pickedEngine: "Яндекс.Директ" }
    );
    expect(result.reportIsDirectOnly).toBe(false);
    expect(result.warnings).toEqual([
      "UTM campaign report (engine-filtered) rejected, using unfiltered report: Error: status 400",
    ]);
  });

  it("skips the filtered report without a picked engine", async () => {
    const fetchFiltered = vi.fn(async () => ({}));
    const result = await collectUtmReport({ fetchFiltered, fetchUnfiltered: async () => ({}) }, { pickedEngine: null });
    expect(result.reportIsDirectOnly).toBe(false);
    expect(fetchFiltered).not.toHaveBeenCalled();
  });

  it("fails when no variant can be fetched", async () => {
    await expect(
      collectUtmReport(
        {
          fetchUnfiltered: async () => {
            throw new Error("down");
          },
        },
        { pickedEngine: null }
      )
    ).rejects.toThrow(AllCandidatesFailedError);
  });
});

describe("campaign cache", () => {
  it("loads names once per account and TTL window", async () => {
    let now = 0;
    const cache = createCampaignCache(300, () => now);
    const load = vi.fn(async () => ({ "1": "Brand" }));

    expect(await withCampaignCache(cache, "acc", load)).toEqual({ "1": "Brand" });
    await withCampaignCache(cache, "acc", load);
    expect(load).toHaveBeenCalledTimes(1);

    await withCampaignCache(cache, "", load);
    expect(load).toHaveBeenCalledTimes(2);

    now = 300_000;
    await withCampaignCache(cache, "acc", load);
    expect(load).toHaveBeenCalledTimes(3);
  });
});

describe("downloadLogsRows", () => {
  it("stops downloading once enough rows are collected", async () => {
    const parts: Record<number, unknown> = {
      1: { raw: "a\tb\n1\t2\n3\t4" },
      2: { raw: "5\t6\n7\t8" },
      3: { raw: "9\t10" },
    };
    const downloadPart = vi.fn(async (part: number) => parts[part]);
    const result = await downloadLogsRows([1, 2, 3], downloadPart, { maxRows: 3 });

    expect(result.rows).toEqual([
      { a: "1", b: "2" },
      { a: "3", b: "4" },
      { a: "5", b: "6" },
    ]);
    expect(result.meta).toEqual({ rows: 3, downloaded_parts: [1, 2], columns: ["a", "b"] });
    expect(downloadPart).toHaveBeenCalledTimes(2);
  });
});

describe("joinLogsVisits", () => {
  const bannerRows = ["100", "100", "200"].map((banner) => ({ "ym:s:lastDirectClickBanner": banner }));

  it("joins through click ids when the index has entries", async () => {
    const fetchAds = vi.fn(async () => ({}));
    const result = await joinLogsVisits([{ "ym:s:yclid": "abc" }], {
      fetchClickIdReport: async () => ({ raw: "ClickId\tCampaignId\nabc\t111" }),
      fetchAds,
    });

    expect(result.join_mode).toBe("click_id");
    expect(result.matched_visits).toBe(1);
    expect(result.direct).toEqual({ rows: 1, columns: ["ClickId", "CampaignId"], unique_click_ids: 1, skipped: 0 });
    expect(result.warnings).toEqual([]);
    expect(fetchAds).not.toHaveBeenCalled();
  });

  it("falls back to banners when the click id report fails", async () => {
    const fetchAds = vi.fn(async () => ({ result: { Ads: [{ Id: 100, CampaignId: 9 }] } }));
    const result = await joinLogsVisits(bannerRows, {
      fetchClickIdReport: async () => {
        throw new Error("not supported");
      },
      fetchAds,
    });

    expect(fetchAds).toHaveBeenCalledWith([100, 200]);
    expect(result).toEqual({
      join_mode: "banner_id",
      matched_visits: 2,
      unmatched_visits: 1,
      skipped_no_banner: 0,
      by_campaign: [{ campaign_id: "9", visits: 2 }],
      direct: { ads_fetched: 2, ads_matched: 1, click_index_error: "Error: not supported" },
      warnings: [
        "Click id join unavailable (Error: not supported); visits joined by last clicked banner.",
        "1 visit(s) did not match a Direct campaign by banner.",
      ],
    });
  });

  it("falls back to banners on an empty click index", async () => {
    const result = await joinLogsVisits(bannerRows, {
      fetchClickIdReport: async () => ({ raw: "" }),
      fetchAds: async () => ({}),
    });
    if (result.join_mode !== "banner_id") throw new Error("expected a banner join");
    expect(result.unmatched_visits).toBe(3);
    expect(result.direct.click_index_error).toBe("click id report has no rows");
    expect(result.warnings[0]).toBe(
      "Click id join unavailable (click id report has no rows); visits joined by last clicked banner."
    );
  });

  it("requires some join key", async () => {
    await expect(joinLogsVisits([{ "ym:s:yclid": "" }], { fetchAds: async () => ({}) })).rejects.toThrow(
      ValidationError
    );
  });
});
