export * from "./lib/errors";
export * from "./lib/numbers";
export * from "./lib/dates";
export * from "./lib/ttlCache";
export * from "./lib/candidates";

export * from "./report/payloads";
export * from "./report/parseDelimited";

export * from "./aggregate/buckets";
export * from "./aggregate/accumulate";
export * from "./aggregate/visitSeries";

export * from "./metrics/derived";

export * from "./direct/campaignType";
export * from "./direct/campaignSeries";

export * from "./join/resolveJoinKey";
export * from "./join/clickIdJoin";
export * from "./join/utmJoin";
export * from "./join/directVsMetrica";

export * from "./metrica/goals";
export * from "./metrica/daily";
export * from "./metrica/sources";

export * from "./dashboard/buildDashboardData";
export * from "./dashboard/compactResult";

export * from "./pipeline/collectUtmReport";
export * from "./pipeline/campaignCache";
export * from "./pipeline/joinLogsVisits";
