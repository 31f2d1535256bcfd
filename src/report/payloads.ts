import { ReportShapeError } from "../lib/errors";

export type RecordValue = Record<string, unknown>;

export function isRecord(value: unknown): value is RecordValue {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function asStr(value: unknown): string {
  if (value === null || value === undefined) return "";
  return typeof value === "string" ? value : String(value);
}

/** Value stored under the first alias present on `record`. */
export function firstKey(record: RecordValue, aliases: readonly string[]): unknown {
  for (const key of aliases) {
    if (key in record) return record[key];
  }
  return undefined;
}

// Report download wrappers return either the raw blob at the top level or nested under `result`.
export type RawReport = { raw: string; columns?: string[] };
export type ReportPayload = RawReport | { result: RawReport };

const stringList = (value: unknown): string[] | null =>
  Array.isArray(value) ? value.map((item) => asStr(item)) : null;

export function extractRawAndColumns(payload: unknown): { raw: string; columns: string[] | null } {
  if (!isRecord(payload)) return { raw: "", columns: null };
  if (typeof payload.raw === "string") {
    return { raw: payload.raw, columns: stringList(payload.columns) };
  }
  const result = payload.result;
  if (isRecord(result) && typeof result.raw === "string") {
    return { raw: result.raw, columns: stringList(result.columns) };
  }
  return { raw: "", columns: null };
}

// Metrica Stats API: { data: [{ dimensions: [...], metrics: [...] }] }
export type StatsDimension = { id: string; name: string };

export type StatsRow = {
  dimensions: StatsDimension[];
  metrics: unknown[];
};

function normalizeDimension(value: unknown): StatsDimension {
  if (isRecord(value)) {
    return { id: asStr(value.id).trim(), name: asStr(value.name).trim() };
  }
  return { id: "", name: asStr(value).trim() };
}

/**
 * Rows of a Stats API payload with at least `minDimensions` dimensions and
 * `minMetrics` metrics. Returns null when the payload carries no `data` list.
 */
export function readStatsRows(payload: unknown, minDimensions = 1, minMetrics = 1): StatsRow[] | null {
  if (!isRecord(payload) || !Array.isArray(payload.data)) return null;
  const rows: StatsRow[] = [];
  for (const item of payload.data) {
    if (!isRecord(item)) continue;
    const { dimensions, metrics } = item;
    if (!Array.isArray(dimensions) || !Array.isArray(metrics)) continue;
    if (dimensions.length < minDimensions || metrics.length < minMetrics) continue;
    rows.push({ dimensions: dimensions.map(normalizeDimension), metrics });
  }
  return rows;
}

/** First 10 characters of a date dimension; tolerates `YYYY-MM-DD HH:MM:SS`. */
export function dayOf(dimension: StatsDimension | undefined): string {
  return (dimension?.name ?? "").slice(0, 10);
}

// Management API goals: { goals: [...] } or { goals: { goals: [...] } }
const GOAL_ID_ALIASES = ["id", "goal_id", "goalId"] as const;

export function readGoalNames(payload: unknown): Record<string, string> {
  const names: Record<string, string> = {};
  if (!isRecord(payload)) return names;
  let list: unknown = payload.goals;
  if (isRecord(list)) list = list.goals;
  if (!Array.isArray(list)) return names;
  for (const goal of list) {
    if (!isRecord(goal)) continue;
    const id = asStr(firstKey(goal, GOAL_ID_ALIASES)).trim();
    const name = typeof goal.name === "string" ? goal.name.trim() : "";
    if (id && name) names[id] = name;
  }
  return names;
}

// Logs API create / info / allinfo responses.
const REQUEST_ID_ALIASES = ["request_id", "requestId", "requestID", "id"] as const;

export function logsRequestId(createPayload: unknown): string {
  if (isRecord(createPayload)) {
    const nested = createPayload.log_request;
    if (isRecord(nested)) {
      const id = asStr(firstKey(nested, REQUEST_ID_ALIASES)).trim();
      if (id) return id;
    }
    const id = asStr(firstKey(createPayload, REQUEST_ID_ALIASES)).trim();
    if (id) return id;
  }
  throw new ReportShapeError(
    `Could not extract request_id from logs create response: ${JSON.stringify(createPayload)}`
  );
}

const logRequestOf = (payload: RecordValue): RecordValue =>
  isRecord(payload.log_request) ? payload.log_request : payload;

export function findLogsRequestInfo(allInfoPayload: unknown, requestId: string): RecordValue | null {
  if (!isRecord(allInfoPayload)) return null;
  let candidates: unknown[] = [];
  for (const key of ["requests", "data", "result", "log_requests"]) {
    const value = allInfoPayload[key];
    if (Array.isArray(value) && value.length) {
      candidates = value;
      break;
    }
  }
  for (const item of candidates) {
    if (!isRecord(item)) continue;
    const id = asStr(firstKey(logRequestOf(item), ["request_id", "requestId", "id"])).trim();
    if (id === requestId) return item;
  }
  return null;
}

export function logsStatus(infoPayload: unknown): string {
  if (!isRecord(infoPayload)) return "";
  return asStr(firstKey(logRequestOf(infoPayload), ["status", "state"])).trim().toLowerCase();
}

export type LogsStatusKind = "ready" | "failed" | "pending";

const READY_STATUSES = new Set(["processed", "completed", "done", "ready"]);
const FAILED_STATUSES = new Set(["canceled", "cancelled", "failed", "error"]);

export function logsStatusKind(status: string): LogsStatusKind {
  if (READY_STATUSES.has(status)) return "ready";
  if (FAILED_STATUSES.has(status)) return "failed";
  return "pending";
}

export function logsPartNumbers(infoPayload: unknown): number[] {
  if (!isRecord(infoPayload)) return [];
  const parts = firstKey(logRequestOf(infoPayload), ["parts", "part", "files"]);
  if (!Array.isArray(parts)) return [];
  const out = new Set<number>();
  for (const part of parts) {
    const raw = isRecord(part) ? firstKey(part, ["part_number", "partNumber", "number"]) : part;
    const num = typeof raw === "number" ? raw : Number.parseInt(asStr(raw).trim(), 10);
    if (Number.isInteger(num)) out.add(num);
  }
  return [...out].sort((a, b) => a - b);
}
