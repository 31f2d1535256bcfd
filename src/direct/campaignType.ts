export type CampaignType = "search" | "network" | "unknown";

export type CampaignTypeClassifier = (campaignName: string) => CampaignType;

/** Lowercased name fragments per type; the first type with a matching fragment wins. */
export type CampaignTypeKeywords = Partial<Record<Exclude<CampaignType, "unknown">, string[]>>;

export const DEFAULT_CAMPAIGN_TYPE_KEYWORDS: CampaignTypeKeywords = {
  search: ["поиск"],
  network: ["рся"],
};

export function keywordClassifier(keywords: CampaignTypeKeywords = DEFAULT_CAMPAIGN_TYPE_KEYWORDS): CampaignTypeClassifier {
  const entries = (["search", "network"] as const).map(
    (type) => [type, (keywords[type] ?? []).map((k) => k.toLowerCase()).filter(Boolean)] as const
  );
  return (campaignName) => {
    const lowered = (campaignName ?? "").toLowerCase();
    for (const [type, fragments] of entries) {
      if (fragments.some((fragment) => lowered.includes(fragment))) return type;
    }
    return "unknown";
  };
}
