export type WeightedSum = {
  sum: number;
  weight: number;
};

/**
 * Accumulated totals for one day (or one day of one entity).
 * Rate-like metrics are kept as weighted sum + weight so buckets merge exactly.
 */
export type Bucket = {
  values: Record<string, number>;
  weighted: Record<string, WeightedSum>;
};

export type DatedBucket = Bucket & { date: string };

export function emptyBucket(valueFields: readonly string[] = [], weightedFields: readonly string[] = []): Bucket {
  const bucket: Bucket = { values: {}, weighted: {} };
  for (const field of valueFields) bucket.values[field] = 0;
  for (const field of weightedFields) bucket.weighted[field] = { sum: 0, weight: 0 };
  return bucket;
}

export function addValue(bucket: Bucket, field: string, value: number): void {
  bucket.values[field] = (bucket.values[field] ?? 0) + value;
}

export function addWeighted(bucket: Bucket, field: string, value: number, weight: number): void {
  const current = bucket.weighted[field] ?? { sum: 0, weight: 0 };
  if (weight > 0) {
    current.sum += value * weight;
    current.weight += weight;
  }
  bucket.weighted[field] = current;
}

export function valueOf(bucket: Bucket | undefined, field: string): number {
  return bucket?.values[field] ?? 0;
}

export function weightedAverage(bucket: Bucket | undefined, field: string): number | null;
export function weightedAverage(bucket: Bucket | undefined, field: string, empty: number): number;
export function weightedAverage(
  bucket: Bucket | undefined,
  field: string,
  empty: number | null = null
): number | null {
  const entry = bucket?.weighted[field];
  if (!entry || entry.weight <= 0) return empty;
  return entry.sum / entry.weight;
}

export function mergeBuckets(a: Bucket, b: Bucket): Bucket {
  const merged: Bucket = { values: { ...a.values }, weighted: {} };
  for (const [field, value] of Object.entries(b.values)) addValue(merged, field, value);
  for (const source of [a.weighted, b.weighted]) {
    for (const [field, entry] of Object.entries(source)) {
      const current = merged.weighted[field] ?? { sum: 0, weight: 0 };
      merged.weighted[field] = { sum: current.sum + entry.sum, weight: current.weight + entry.weight };
    }
  }
  return merged;
}

export function mergeBucketMaps(a: Map<string, Bucket>, b: Map<string, Bucket>): Map<string, Bucket> {
  const merged = new Map<string, Bucket>(a);
  for (const [key, bucket] of b) {
    const existing = merged.get(key);
    merged.set(key, existing ? mergeBuckets(existing, bucket) : mergeBuckets(emptyBucket(), bucket));
  }
  return merged;
}

export function sumBuckets(buckets: Iterable<Bucket>): Bucket {
  let total = emptyBucket();
  for (const bucket of buckets) total = mergeBuckets(total, bucket);
  return total;
}

/** Visits that did not bounce; malformed (negative) bounce rates count as no engagement. */
export function engagedVisits(visits: number, bounceRatePct: number): number {
  return bounceRatePct >= 0 ? visits * (1 - bounceRatePct / 100) : 0;
}
