import { ValidationError } from "../lib/errors";
import { floatOrZero } from "../lib/numbers";
import { addValue, addWeighted, Bucket, DatedBucket, emptyBucket, mergeBuckets } from "./buckets";

export type WeightedField = {
  field: string;
  weightField: string;
};

export type AccumulateOptions = {
  dateField: string;
  valueFields: string[];
  weighted?: WeightedField[];
  groupField?: string;
};

export type Accumulated = {
  byDate: Map<string, Bucket>;
  byGroup: Map<string, Map<string, Bucket>>;
};

type RowLike = Record<string, unknown>;

const cell = (row: RowLike, field: string): string => {
  const value = row[field];
  return value === null || value === undefined ? "" : String(value).trim();
};

function bucketFor(map: Map<string, Bucket>, key: string, options: AccumulateOptions): Bucket {
  let bucket = map.get(key);
  if (!bucket) {
    bucket = emptyBucket(
      options.valueFields,
      (options.weighted ?? []).map((w) => w.field)
    );
    map.set(key, bucket);
  }
  return bucket;
}

/**
 * Sums numeric report fields per day and, when `groupField` is set, per entity per day.
 * Rows without a date (or without a group value when grouping) are ignored.
 */
export function accumulate(rows: RowLike[], options: AccumulateOptions): Accumulated {
  if (!options.dateField) throw new ValidationError("dateField is required");
  if (!options.valueFields.length && !(options.weighted ?? []).length) {
    throw new ValidationError("valueFields must not be empty");
  }

  const byDate = new Map<string, Bucket>();
  const byGroup = new Map<string, Map<string, Bucket>>();

  for (const row of rows) {
    const date = cell(row, options.dateField).slice(0, 10);
    if (!date) continue;
    let group = "";
    if (options.groupField) {
      group = cell(row, options.groupField);
      if (!group) continue;
    }

    const targets = [bucketFor(byDate, date, options)];
    if (options.groupField) {
      let perDate = byGroup.get(group);
      if (!perDate) {
        perDate = new Map();
        byGroup.set(group, perDate);
      }
      targets.push(bucketFor(perDate, date, options));
    }

    for (const target of targets) {
      for (const field of options.valueFields) addValue(target, field, floatOrZero(row[field]));
      for (const w of options.weighted ?? []) {
        addWeighted(target, w.field, floatOrZero(row[w.field]), floatOrZero(row[w.weightField]));
      }
    }
  }

  return { byDate, byGroup };
}

/** One entry per day in `days`; days without data get a zero bucket. */
export function reindex(
  byDate: Map<string, Bucket> | undefined,
  days: string[],
  valueFields: readonly string[] = []
): DatedBucket[] {
  return days.map((date) => {
    const zero = emptyBucket(valueFields);
    const found = byDate?.get(date);
    return { date, ...(found ? mergeBuckets(zero, found) : zero) };
  });
}
