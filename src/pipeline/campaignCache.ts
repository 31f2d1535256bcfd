import { TtlCache } from "../lib/ttlCache";

export type CampaignNames = Record<string, string>;

export function createCampaignCache(ttlSeconds: number, now?: () => number): TtlCache<CampaignNames> {
  return new TtlCache<CampaignNames>(ttlSeconds * 1000, now);
}

/** Campaign names per account, loaded at most once per TTL window. */
export function withCampaignCache(
  cache: TtlCache<CampaignNames>,
  accountKey: string,
  load: () => Promise<CampaignNames>
): Promise<CampaignNames> {
  return cache.getOrSet(`campaigns:${accountKey || "default"}`, load);
}
