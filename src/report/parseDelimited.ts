export type ReportRow = Record<string, string>;

export type ParseDelimitedOptions = {
  delimiter?: string;
  columns?: string[] | null;
  maxRows?: number;
};

export type ParsedReport = {
  rows: ReportRow[];
  columns: string[];
};

// Footer summary rows emitted by Direct/Metrica report generators.
const TOTALS_PREFIXES = ["total", "итого", "всего"];

export function guessDelimiter(text: string): string {
  if (text.includes("\t")) return "\t";
  if (text.includes(";")) return ";";
  return ",";
}

function looksNumeric(field: string): boolean {
  return /^\d+$/.test(field.replace(/[._]/g, ""));
}

function looksLikeHeader(fields: string[]): boolean {
  return fields.length >= 2 && fields.every((field) => field !== "" && !looksNumeric(field));
}

/**
 * Splits a delimited report blob into string-valued rows.
 *
 * Supplied `columns` are used as given and every non-empty line is data.
 * Lines whose field count differs from the resolved column count are dropped,
 * as are footer rows starting with a totals marker. Values are never coerced.
 */
export function parseDelimited(raw: string, options: ParseDelimitedOptions = {}): ParsedReport {
  const text = raw ?? "";
  const delimiter = options.delimiter || guessDelimiter(text);
  let lines = text.split(/\r\n|\r|\n/).filter((line) => line.trim());
  const given = options.columns?.length ? [...options.columns] : [];
  if (!lines.length) return { rows: [], columns: given };

  let columns = given;
  if (!columns.length) {
    const header = lines[0].split(delimiter).map((field) => field.trim());
    if (looksLikeHeader(header)) {
      columns = header;
      lines = lines.slice(1);
    }
  }

  const maxRows = options.maxRows;
  const rows: ReportRow[] = [];
  for (const line of lines) {
    if (maxRows !== undefined && rows.length >= maxRows) break;
    const lowered = line.toLowerCase();
    if (TOTALS_PREFIXES.some((prefix) => lowered.startsWith(prefix))) continue;
    const parts = line.split(delimiter);
    if (!columns.length) {
      columns = parts.map((_, i) => `col_${i}`);
    }
    if (parts.length !== columns.length) continue;
    rows.push(Object.fromEntries(columns.map((column, i) => [column, parts[i]])));
  }
  return { rows, columns };
}
